import { FlightStatus } from '../entities/Policy';

export abstract class PolicyEvent {
  abstract readonly type: string;

  constructor(
    public readonly policyId: number,
    public readonly timestamp: Date = new Date()
  ) {}
}

export class PolicyCreatedEvent extends PolicyEvent {
  readonly type = 'PolicyCreated';

  constructor(
    policyId: number,
    public readonly holder: string
  ) {
    super(policyId);
  }
}

export class FlightInfoUpdatedEvent extends PolicyEvent {
  readonly type = 'FlightInfoUpdated';

  constructor(
    policyId: number,
    public readonly actualArrival: number | null,
    public readonly flightStatus: FlightStatus
  ) {
    super(policyId);
  }
}

export class AwaitingFlightDataEvent extends PolicyEvent {
  readonly type = 'AwaitingFlightData';

  constructor(
    policyId: number,
    public readonly evaluatedAt: number,
    public readonly deadline: number
  ) {
    super(policyId);
  }
}

export type DenialReason = 'cancelled' | 'no-data-timeout' | 'on-time';

export class PolicyTerminatedEvent extends PolicyEvent {
  readonly type = 'PolicyTerminated';

  constructor(
    policyId: number,
    public readonly reason: DenialReason
  ) {
    super(policyId);
  }
}

export class PolicyClaimedEvent extends PolicyEvent {
  readonly type = 'PolicyClaimed';

  constructor(
    policyId: number,
    public readonly holder: string,
    public readonly amount: bigint,
    public readonly payoutReference: string
  ) {
    super(policyId);
  }
}

export class PayoutFailedEvent extends PolicyEvent {
  readonly type = 'PayoutFailed';

  constructor(
    policyId: number,
    public readonly holder: string,
    public readonly amount: bigint,
    public readonly reason: string
  ) {
    super(policyId);
  }
}

export type PolicyEventType =
  | PolicyCreatedEvent
  | FlightInfoUpdatedEvent
  | AwaitingFlightDataEvent
  | PolicyTerminatedEvent
  | PolicyClaimedEvent
  | PayoutFailedEvent;

/** Treasury withdrawals are not tied to a policy. */
export class FundsWithdrawnEvent {
  readonly type = 'FundsWithdrawn';

  constructor(
    public readonly destination: string,
    public readonly amount: bigint,
    public readonly transactionHash: string,
    public readonly timestamp: Date = new Date()
  ) {}
}
