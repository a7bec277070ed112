import { FlightStatus, Policy } from '../entities/Policy';

/** Grace period after scheduled arrival before a flight with no reported arrival is denied. */
export const NO_DATA_TIMEOUT_SECONDS = 72 * 60 * 60;

export type ClaimSubject = Pick<
  Policy,
  'scheduledArrival' | 'delayThreshold' | 'actualArrival' | 'observedFlightStatus' | 'claimAmount'
>;

export type ClaimDecision =
  | { kind: 'cancelled' }
  | { kind: 'no-data-timeout'; deadline: number }
  | { kind: 'awaiting-data'; deadline: number }
  | { kind: 'on-time'; actualArrival: number; latestOnTimeArrival: number }
  | { kind: 'late'; actualArrival: number; delay: number; payoutAmount: bigint };

export type ClaimDecisionKind = ClaimDecision['kind'];

/**
 * Decides what happens to an active policy at `now`.
 *
 * The checks run in a fixed order: cancellation and the no-data timeout come
 * before any comparison against `actualArrival`, which may still be unknown.
 * `awaiting-data` is the only outcome that leaves the policy active.
 */
export function decideClaim(policy: ClaimSubject, now: number): ClaimDecision {
  if (policy.observedFlightStatus === FlightStatus.CANCELED) {
    return { kind: 'cancelled' };
  }

  const deadline = policy.scheduledArrival + NO_DATA_TIMEOUT_SECONDS;

  if (policy.actualArrival === null) {
    if (now >= deadline) {
      return { kind: 'no-data-timeout', deadline };
    }
    return { kind: 'awaiting-data', deadline };
  }

  const latestOnTimeArrival = policy.scheduledArrival + policy.delayThreshold;
  if (policy.actualArrival <= latestOnTimeArrival) {
    return { kind: 'on-time', actualArrival: policy.actualArrival, latestOnTimeArrival };
  }

  return {
    kind: 'late',
    actualArrival: policy.actualArrival,
    delay: policy.actualArrival - policy.scheduledArrival,
    payoutAmount: policy.claimAmount
  };
}

export function isTerminalDecision(kind: ClaimDecisionKind): boolean {
  return kind !== 'awaiting-data';
}
