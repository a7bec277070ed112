import { Policy } from '../../domain/entities/Policy';
import { SettlementReceipt } from '../../domain/services/ISettlementGateway';
import { FundsWithdrawnEvent, PolicyEventType } from '../../domain/events/PolicyEvent';

export interface PolicyView {
  id: number;
  holder: string;
  flightCode: string;
  scheduledDeparture: number;
  scheduledArrival: number;
  actualArrival: number | null;
  delayThreshold: number;
  premium: string;
  claimAmount: string;
  policyStatus: string;
  claimOutcome: string;
  observedFlightStatus: string;
  createdAt: number;
  lastEvaluatedAt: number | null;
  payoutReference: string | null;
}

export interface ReceiptView {
  reference: string;
  destination: string;
  amount: string;
  transactionHash: string;
}

// Amounts leave the process as decimal strings; JSON has no bigint
export function presentPolicy(policy: Policy): PolicyView {
  return {
    id: policy.id,
    holder: policy.holder,
    flightCode: policy.flightCode,
    scheduledDeparture: policy.scheduledDeparture,
    scheduledArrival: policy.scheduledArrival,
    actualArrival: policy.actualArrival,
    delayThreshold: policy.delayThreshold,
    premium: policy.premium.toString(),
    claimAmount: policy.claimAmount.toString(),
    policyStatus: policy.policyStatus,
    claimOutcome: policy.claimOutcome,
    observedFlightStatus: policy.observedFlightStatus,
    createdAt: policy.createdAt,
    lastEvaluatedAt: policy.lastEvaluatedAt,
    payoutReference: policy.payoutReference
  };
}

export function presentReceipt(receipt: SettlementReceipt): ReceiptView {
  return {
    reference: receipt.reference,
    destination: receipt.destination,
    amount: receipt.amount.toString(),
    transactionHash: receipt.transactionHash
  };
}

export function presentEvent(event: PolicyEventType | FundsWithdrawnEvent): Record<string, unknown> {
  const view: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(event)) {
    if (typeof value === 'bigint') {
      view[key] = value.toString();
    } else if (value instanceof Date) {
      view[key] = value.toISOString();
    } else {
      view[key] = value;
    }
  }
  return view;
}
