import { injectable, inject } from 'inversify';
import { IPolicyRepository } from '../../domain/repositories/IPolicyRepository';
import { IClock } from '../../domain/services/IClock';
import { isTerminalDecision } from '../../domain/services/ClaimEvaluator';
import { Caller } from '../../domain/entities/Caller';
import { AppError, ErrorCode } from '../../domain/errors/AppError';
import { EvaluateClaimUseCase } from './EvaluateClaimUseCase';
import { logger } from '../../infrastructure/logging/Logger';

export interface MonitorSummary {
  scanned: number;
  settled: number;
  awaiting: number;
  skipped: number;
  failed: number;
}

/**
 * Periodic sweep over active policies. Each policy is evaluated on its own;
 * one failure never stops the sweep.
 */
@injectable()
export class MonitorPoliciesUseCase {
  private readonly caller = Caller.system();

  constructor(
    @inject('IPolicyRepository') private policyRepository: IPolicyRepository,
    @inject('EvaluateClaimUseCase') private evaluateClaimUseCase: EvaluateClaimUseCase,
    @inject('IClock') private clock: IClock
  ) {}

  async execute(now: number = this.clock.now()): Promise<MonitorSummary> {
    const summary: MonitorSummary = { scanned: 0, settled: 0, awaiting: 0, skipped: 0, failed: 0 };
    const activePolicies = await this.policyRepository.findActive();

    for (const policy of activePolicies) {
      summary.scanned += 1;
      try {
        const result = await this.evaluateClaimUseCase.execute({ caller: this.caller, policyId: policy.id, now });
        if (isTerminalDecision(result.decision)) {
          summary.settled += 1;
        } else {
          summary.awaiting += 1;
        }
      } catch (error) {
        if (error instanceof AppError && error.code === ErrorCode.POLICY_NOT_ACTIVE) {
          // Settled by a concurrent request since the scan
          logger.debug('Skipping policy settled elsewhere', { policyId: policy.id });
          summary.skipped += 1;
          continue;
        }

        summary.failed += 1;
        const level = error instanceof AppError && error.code === ErrorCode.SETTLEMENT_FAILURE ? 'warn' : 'error';
        logger.log(level, `Evaluation failed for policy ${policy.id}`, {
          policyId: policy.id,
          error: error instanceof Error ? error.message : 'Unknown error'
        });
      }
    }

    if (summary.scanned > 0) {
      logger.info('Policy monitor sweep finished', { now, ...summary });
    }

    return summary;
  }
}
