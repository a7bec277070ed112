import { AppError } from '../errors/AppError';

export enum PolicyStatus {
  ACTIVE = 'ACTIVE',
  TERMINATED = 'TERMINATED',
  CLAIMED = 'CLAIMED'
}

export enum ClaimOutcome {
  NONE = 'NONE',
  PAID = 'PAID',
  DENIED = 'DENIED'
}

export enum FlightStatus {
  NORMAL = 'NORMAL',
  CANCELED = 'CANCELED',
  OTHER = 'OTHER'
}

/**
 * Terms copied onto every policy when it is opened. Later configuration
 * changes never reach an existing policy.
 */
export interface PolicyTerms {
  delayThreshold: number;
  premium: bigint;
  claimAmount: bigint;
}

export interface OpenPolicyParams {
  id: number;
  holder: string;
  flightCode: string;
  scheduledDeparture: number;
  scheduledArrival: number;
  terms: PolicyTerms;
  createdAt: number;
}

/**
 * One flight-delay insurance contract. All timestamps are unix seconds;
 * `actualArrival === null` means the oracle has not reported an arrival yet.
 */
export class Policy {
  constructor(
    public readonly id: number,
    public readonly holder: string,
    public readonly flightCode: string,
    public readonly scheduledDeparture: number,
    public readonly scheduledArrival: number,
    public readonly delayThreshold: number,
    public readonly premium: bigint,
    public readonly claimAmount: bigint,
    public readonly createdAt: number,
    public policyStatus: PolicyStatus = PolicyStatus.ACTIVE,
    public claimOutcome: ClaimOutcome = ClaimOutcome.NONE,
    public observedFlightStatus: FlightStatus = FlightStatus.NORMAL,
    public actualArrival: number | null = null,
    public lastEvaluatedAt: number | null = null,
    public payoutReference: string | null = null
  ) {}

  static assertSchedule(scheduledDeparture: number, scheduledArrival: number): void {
    if (scheduledArrival <= scheduledDeparture) {
      throw AppError.invalidSchedule(scheduledDeparture, scheduledArrival);
    }
  }

  static open(params: OpenPolicyParams): Policy {
    Policy.assertSchedule(params.scheduledDeparture, params.scheduledArrival);

    return new Policy(
      params.id,
      params.holder,
      params.flightCode,
      params.scheduledDeparture,
      params.scheduledArrival,
      params.terms.delayThreshold,
      params.terms.premium,
      params.terms.claimAmount,
      params.createdAt
    );
  }

  isActive(): boolean {
    return this.policyStatus === PolicyStatus.ACTIVE;
  }

  recordFlightInfo(actualArrival: number | null, flightStatus: FlightStatus, touchedAt: number): void {
    this.assertActive();
    this.actualArrival = actualArrival;
    this.observedFlightStatus = flightStatus;
    this.lastEvaluatedAt = touchedAt;
  }

  markEvaluated(at: number): void {
    this.assertActive();
    this.lastEvaluatedAt = at;
  }

  /**
   * Terminal denial. `forcedFlightStatus` overwrites the observed status,
   * used when the denial was caused by missing data rather than the flight.
   */
  deny(at: number, forcedFlightStatus?: FlightStatus): void {
    this.assertActive();
    this.policyStatus = PolicyStatus.TERMINATED;
    this.claimOutcome = ClaimOutcome.DENIED;
    if (forcedFlightStatus !== undefined) {
      this.observedFlightStatus = forcedFlightStatus;
    }
    this.lastEvaluatedAt = at;
  }

  /** Only call once the payout carrying `payoutReference` has settled. */
  markClaimed(at: number, payoutReference: string): void {
    this.assertActive();
    this.policyStatus = PolicyStatus.CLAIMED;
    this.claimOutcome = ClaimOutcome.PAID;
    this.payoutReference = payoutReference;
    this.lastEvaluatedAt = at;
  }

  clone(): Policy {
    return new Policy(
      this.id,
      this.holder,
      this.flightCode,
      this.scheduledDeparture,
      this.scheduledArrival,
      this.delayThreshold,
      this.premium,
      this.claimAmount,
      this.createdAt,
      this.policyStatus,
      this.claimOutcome,
      this.observedFlightStatus,
      this.actualArrival,
      this.lastEvaluatedAt,
      this.payoutReference
    );
  }

  private assertActive(): void {
    if (!this.isActive()) {
      throw AppError.policyNotActive(this.id);
    }
  }
}
