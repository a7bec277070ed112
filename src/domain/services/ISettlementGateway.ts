export interface PayoutInstruction {
  holder: string;
  amount: bigint;
  /** Idempotency key; a gateway never moves funds twice for one reference. */
  reference: string;
}

export interface SettlementReceipt {
  reference: string;
  destination: string;
  amount: bigint;
  transactionHash: string;
}

/**
 * Moves funds on behalf of the oracle. Both calls reject when the transfer
 * did not complete.
 */
export interface ISettlementGateway {
  /** Whether `destination` is something this gateway can pay. Checked before a policy is sold. */
  acceptsDestination(destination: string): boolean;
  payout(instruction: PayoutInstruction): Promise<SettlementReceipt>;
  withdrawAll(destination: string): Promise<SettlementReceipt>;
}
