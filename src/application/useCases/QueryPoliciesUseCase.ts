import { injectable, inject } from 'inversify';
import { IPolicyRepository } from '../../domain/repositories/IPolicyRepository';
import { Policy } from '../../domain/entities/Policy';
import { AppError } from '../../domain/errors/AppError';
import { PolicyEventType } from '../../domain/events/PolicyEvent';
import { PolicyEventEmitter } from '../../infrastructure/events/PolicyEventEmitter';

/** Read-only queries. None of these take a lock or emit events. */
@injectable()
export class QueryPoliciesUseCase {
  constructor(
    @inject('IPolicyRepository') private policyRepository: IPolicyRepository,
    @inject('PolicyEventEmitter') private events: PolicyEventEmitter
  ) {}

  async getPolicy(policyId: number): Promise<Policy> {
    const policy = await this.policyRepository.findById(policyId);
    if (!policy) {
      throw AppError.policyNotFound(policyId);
    }
    return policy;
  }

  /** Creation order; empty for a holder with no policies. */
  async getPoliciesByHolder(holder: string): Promise<number[]> {
    return this.policyRepository.findIdsByHolder(holder);
  }

  async getPolicyEvents(policyId: number): Promise<PolicyEventType[]> {
    await this.getPolicy(policyId);
    return this.events.getHistory(policyId);
  }
}
