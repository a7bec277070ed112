import { injectable, inject } from 'inversify';
import { IPolicyRepository } from '../../domain/repositories/IPolicyRepository';
import { IClock } from '../../domain/services/IClock';
import { ISettlementGateway, SettlementReceipt } from '../../domain/services/ISettlementGateway';
import { ClaimDecision, ClaimDecisionKind, decideClaim } from '../../domain/services/ClaimEvaluator';
import { ClaimOutcome, FlightStatus, Policy, PolicyStatus } from '../../domain/entities/Policy';
import { Caller, PolicyOperation, assertAuthorized } from '../../domain/entities/Caller';
import { AppError } from '../../domain/errors/AppError';
import {
  AwaitingFlightDataEvent,
  PayoutFailedEvent,
  PolicyClaimedEvent,
  PolicyTerminatedEvent
} from '../../domain/events/PolicyEvent';
import { PolicyLockRegistry, policyLockKey } from '../../infrastructure/coordination/PolicyLockRegistry';
import { PolicyEventEmitter } from '../../infrastructure/events/PolicyEventEmitter';
import { logger } from '../../infrastructure/logging/Logger';

export interface EvaluateClaimInput {
  caller: Caller;
  policyId: number;
  /** Unix seconds; defaults to the injected clock. */
  now?: number;
}

export interface EvaluateClaimOutput {
  policyId: number;
  decision: ClaimDecisionKind;
  policyStatus: PolicyStatus;
  claimOutcome: ClaimOutcome;
  payout?: SettlementReceipt;
}

export const claimReference = (policyId: number): string => `claim:${policyId}`;

/**
 * Applies the claim decision to one policy.
 *
 * Safe to call on any cadence: a policy that has left ACTIVE is rejected with
 * POLICY_NOT_ACTIVE, so at most one terminal transition and one payout happen.
 *
 * Payouts are pay-then-commit. The transfer is requested with a stable
 * reference while the policy is still ACTIVE, and CLAIMED is written only
 * after it settles. A failed transfer leaves the stored policy untouched; a
 * failed commit after a settled transfer is retried with the same reference,
 * which the gateway answers with the original receipt.
 */
@injectable()
export class EvaluateClaimUseCase {
  constructor(
    @inject('IPolicyRepository') private policyRepository: IPolicyRepository,
    @inject('ISettlementGateway') private settlementGateway: ISettlementGateway,
    @inject('IClock') private clock: IClock,
    @inject('PolicyLockRegistry') private locks: PolicyLockRegistry,
    @inject('PolicyEventEmitter') private events: PolicyEventEmitter
  ) {}

  async execute(input: EvaluateClaimInput): Promise<EvaluateClaimOutput> {
    assertAuthorized(input.caller, PolicyOperation.EVALUATE);
    const now = input.now ?? this.clock.now();

    return this.locks.runExclusive(policyLockKey(input.policyId), async () => {
      const policy = await this.policyRepository.findById(input.policyId);
      if (!policy) {
        throw AppError.policyNotFound(input.policyId);
      }

      if (!policy.isActive()) {
        logger.debug('Evaluation skipped: policy already settled', {
          policyId: policy.id,
          policyStatus: policy.policyStatus
        });
        throw AppError.policyNotActive(policy.id);
      }

      const decision = decideClaim(policy, now);
      logger.info('Claim decision computed', { policyId: policy.id, decision: decision.kind, now });

      const payout = await this.apply(policy, decision, now);

      return {
        policyId: policy.id,
        decision: decision.kind,
        policyStatus: policy.policyStatus,
        claimOutcome: policy.claimOutcome,
        ...(payout && { payout })
      };
    });
  }

  private async apply(policy: Policy, decision: ClaimDecision, now: number): Promise<SettlementReceipt | undefined> {
    switch (decision.kind) {
      case 'awaiting-data':
        policy.markEvaluated(now);
        await this.policyRepository.update(policy);
        this.events.emitPolicyEvent(new AwaitingFlightDataEvent(policy.id, now, decision.deadline));
        return undefined;

      case 'cancelled':
      case 'on-time':
        policy.deny(now);
        await this.commitDenial(policy, decision.kind);
        return undefined;

      case 'no-data-timeout':
        policy.deny(now, FlightStatus.OTHER);
        await this.commitDenial(policy, decision.kind);
        return undefined;

      case 'late': {
        const receipt = await this.sendPayout(policy, decision.payoutAmount);
        policy.markClaimed(now, receipt.transactionHash);
        await this.policyRepository.update(policy);
        this.events.emitPolicyEvent(
          new PolicyClaimedEvent(policy.id, policy.holder, receipt.amount, receipt.transactionHash)
        );
        logger.info('Policy claimed', {
          policyId: policy.id,
          holder: policy.holder,
          delay: decision.delay,
          amount: receipt.amount.toString(),
          transactionHash: receipt.transactionHash
        });
        return receipt;
      }
    }
  }

  private async commitDenial(policy: Policy, reason: 'cancelled' | 'no-data-timeout' | 'on-time'): Promise<void> {
    await this.policyRepository.update(policy);
    this.events.emitPolicyEvent(new PolicyTerminatedEvent(policy.id, reason));
    logger.info('Policy terminated', { policyId: policy.id, reason });
  }

  private async sendPayout(policy: Policy, amount: bigint): Promise<SettlementReceipt> {
    try {
      return await this.settlementGateway.payout({
        holder: policy.holder,
        amount,
        reference: claimReference(policy.id)
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'Unknown error';
      logger.error('Payout failed; policy left active for retry', {
        policyId: policy.id,
        holder: policy.holder,
        amount: amount.toString(),
        error: reason
      });
      this.events.emitPolicyEvent(new PayoutFailedEvent(policy.id, policy.holder, amount, reason));
      throw AppError.settlementFailure(`Payout for policy ${policy.id} did not complete`, { reason });
    }
  }
}
