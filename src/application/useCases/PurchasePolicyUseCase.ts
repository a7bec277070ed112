import { injectable, inject } from 'inversify';
import { IPolicyRepository } from '../../domain/repositories/IPolicyRepository';
import { IClock } from '../../domain/services/IClock';
import { ISettlementGateway } from '../../domain/services/ISettlementGateway';
import { Policy } from '../../domain/entities/Policy';
import { Caller, PolicyOperation, assertAuthorized } from '../../domain/entities/Caller';
import { AppError } from '../../domain/errors/AppError';
import { PolicyCreatedEvent } from '../../domain/events/PolicyEvent';
import { InsuranceConfig } from '../../config/insuranceConfig';
import { PolicyLockRegistry, holderLockKey } from '../../infrastructure/coordination/PolicyLockRegistry';
import { PolicyEventEmitter } from '../../infrastructure/events/PolicyEventEmitter';
import { logger } from '../../infrastructure/logging/Logger';

export interface PurchasePolicyInput {
  caller: Caller;
  holder: string;
  flightCode: string;
  scheduledDeparture: number;
  scheduledArrival: number;
  paidAmount: bigint;
}

@injectable()
export class PurchasePolicyUseCase {
  constructor(
    @inject('IPolicyRepository') private policyRepository: IPolicyRepository,
    @inject('InsuranceConfig') private config: InsuranceConfig,
    @inject('ISettlementGateway') private settlementGateway: ISettlementGateway,
    @inject('IClock') private clock: IClock,
    @inject('PolicyLockRegistry') private locks: PolicyLockRegistry,
    @inject('PolicyEventEmitter') private events: PolicyEventEmitter
  ) {}

  async execute(input: PurchasePolicyInput): Promise<Policy> {
    assertAuthorized(input.caller, PolicyOperation.CREATE_POLICY);

    // All checks run before an id is allocated so a rejected purchase leaves no trace
    Policy.assertSchedule(input.scheduledDeparture, input.scheduledArrival);
    if (!this.settlementGateway.acceptsDestination(input.holder)) {
      logger.warn('Policy purchase rejected: holder cannot be paid', { holder: input.holder });
      throw AppError.invalidHolder(input.holder);
    }
    if (input.paidAmount !== this.config.premium) {
      logger.warn('Policy purchase rejected: incorrect premium', {
        holder: input.holder,
        expected: this.config.premium.toString(),
        received: input.paidAmount.toString()
      });
      throw AppError.incorrectPremium(this.config.premium, input.paidAmount);
    }

    return this.locks.runExclusive(holderLockKey(input.holder), async () => {
      const policy = Policy.open({
        id: await this.policyRepository.nextId(),
        holder: input.holder,
        flightCode: input.flightCode,
        scheduledDeparture: input.scheduledDeparture,
        scheduledArrival: input.scheduledArrival,
        terms: this.config,
        createdAt: this.clock.now()
      });

      await this.policyRepository.save(policy);
      this.events.emitPolicyEvent(new PolicyCreatedEvent(policy.id, policy.holder));

      logger.info('Policy created', {
        policyId: policy.id,
        holder: policy.holder,
        flightCode: policy.flightCode,
        scheduledArrival: policy.scheduledArrival
      });

      return policy;
    });
  }
}
