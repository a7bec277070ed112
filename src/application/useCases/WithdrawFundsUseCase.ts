import { injectable, inject } from 'inversify';
import { ISettlementGateway, SettlementReceipt } from '../../domain/services/ISettlementGateway';
import { Caller, PolicyOperation, assertAuthorized } from '../../domain/entities/Caller';
import { AppError } from '../../domain/errors/AppError';
import { FundsWithdrawnEvent } from '../../domain/events/PolicyEvent';
import { PolicyEventEmitter } from '../../infrastructure/events/PolicyEventEmitter';
import { logger } from '../../infrastructure/logging/Logger';

export interface WithdrawFundsInput {
  caller: Caller;
  destination: string;
}

@injectable()
export class WithdrawFundsUseCase {
  constructor(
    @inject('ISettlementGateway') private settlementGateway: ISettlementGateway,
    @inject('PolicyEventEmitter') private events: PolicyEventEmitter
  ) {}

  async execute(input: WithdrawFundsInput): Promise<SettlementReceipt> {
    assertAuthorized(input.caller, PolicyOperation.WITHDRAW_ALL);

    logger.info('Treasury withdrawal requested', { caller: input.caller.id, destination: input.destination });

    let receipt: SettlementReceipt;
    try {
      receipt = await this.settlementGateway.withdrawAll(input.destination);
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'Unknown error';
      logger.error('Treasury withdrawal failed', { destination: input.destination, error: reason });
      throw AppError.settlementFailure('Withdrawal did not complete', { reason });
    }

    this.events.emitTreasuryEvent(
      new FundsWithdrawnEvent(receipt.destination, receipt.amount, receipt.transactionHash)
    );

    logger.info('Treasury withdrawal completed', {
      destination: receipt.destination,
      amount: receipt.amount.toString(),
      transactionHash: receipt.transactionHash
    });

    return receipt;
  }
}
