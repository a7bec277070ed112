import { injectable, inject } from 'inversify';
import { IPolicyRepository } from '../../domain/repositories/IPolicyRepository';
import { IClock } from '../../domain/services/IClock';
import { FlightStatus, Policy } from '../../domain/entities/Policy';
import { Caller, PolicyOperation, assertAuthorized } from '../../domain/entities/Caller';
import { AppError } from '../../domain/errors/AppError';
import { FlightInfoUpdatedEvent } from '../../domain/events/PolicyEvent';
import { PolicyLockRegistry, policyLockKey } from '../../infrastructure/coordination/PolicyLockRegistry';
import { PolicyEventEmitter } from '../../infrastructure/events/PolicyEventEmitter';
import { logger } from '../../infrastructure/logging/Logger';

export interface UpdateFlightInfoInput {
  caller: Caller;
  policyId: number;
  actualArrival: number | null;
  flightStatus: FlightStatus;
}

/**
 * Oracle ingest. Last write wins; there is no staleness check between reports.
 */
@injectable()
export class UpdateFlightInfoUseCase {
  constructor(
    @inject('IPolicyRepository') private policyRepository: IPolicyRepository,
    @inject('IClock') private clock: IClock,
    @inject('PolicyLockRegistry') private locks: PolicyLockRegistry,
    @inject('PolicyEventEmitter') private events: PolicyEventEmitter
  ) {}

  async execute(input: UpdateFlightInfoInput): Promise<Policy> {
    assertAuthorized(input.caller, PolicyOperation.UPDATE_FLIGHT_INFO);

    return this.locks.runExclusive(policyLockKey(input.policyId), async () => {
      const policy = await this.policyRepository.findById(input.policyId);
      if (!policy) {
        throw AppError.policyNotFound(input.policyId);
      }

      if (!policy.isActive()) {
        logger.warn('Flight info rejected for settled policy', {
          policyId: policy.id,
          policyStatus: policy.policyStatus,
          caller: input.caller.id
        });
        throw AppError.policyNotActive(policy.id);
      }

      policy.recordFlightInfo(input.actualArrival, input.flightStatus, this.clock.now());
      await this.policyRepository.update(policy);
      this.events.emitPolicyEvent(new FlightInfoUpdatedEvent(policy.id, input.actualArrival, input.flightStatus));

      logger.info('Flight info updated', {
        policyId: policy.id,
        actualArrival: input.actualArrival,
        flightStatus: input.flightStatus,
        caller: input.caller.id
      });

      return policy;
    });
  }
}
