import { ISettlementGateway, PayoutInstruction, SettlementReceipt } from '../../domain/services/ISettlementGateway';
import { logger } from '../logging/Logger';

/**
 * Process-local ledger used in development and tests. Holds a single float
 * balance; payouts and withdrawals draw it down.
 */
export class InMemorySettlementGateway implements ISettlementGateway {
  private balance: bigint;
  private receipts: Map<string, SettlementReceipt> = new Map();
  private sequence = 0;

  constructor(initialBalance: bigint = 0n) {
    this.balance = initialBalance;
  }

  fund(amount: bigint): void {
    this.balance += amount;
  }

  getBalance(): bigint {
    return this.balance;
  }

  getReceipts(): SettlementReceipt[] {
    return Array.from(this.receipts.values());
  }

  acceptsDestination(destination: string): boolean {
    return destination.trim().length > 0;
  }

  async payout(instruction: PayoutInstruction): Promise<SettlementReceipt> {
    const existing = this.receipts.get(instruction.reference);
    if (existing) {
      logger.info('Payout already settled for reference, returning original receipt', {
        reference: instruction.reference
      });
      return existing;
    }

    if (instruction.amount > this.balance) {
      throw new Error(`Insufficient settlement balance: requested ${instruction.amount}, available ${this.balance}`);
    }

    this.balance -= instruction.amount;
    const receipt = this.record(instruction.reference, instruction.holder, instruction.amount);
    logger.info('Payout settled', { reference: receipt.reference, holder: receipt.destination, amount: receipt.amount.toString() });
    return receipt;
  }

  async withdrawAll(destination: string): Promise<SettlementReceipt> {
    const amount = this.balance;
    this.balance = 0n;
    const receipt = this.record(`withdraw:${this.sequence + 1}`, destination, amount);
    logger.info('Treasury withdrawn', { destination, amount: amount.toString() });
    return receipt;
  }

  private record(reference: string, destination: string, amount: bigint): SettlementReceipt {
    this.sequence += 1;
    const receipt: SettlementReceipt = {
      reference,
      destination,
      amount,
      transactionHash: `0xmemory${this.sequence.toString(16).padStart(8, '0')}`
    };
    this.receipts.set(reference, receipt);
    return receipt;
  }
}
