import { ClaimOutcome, FlightStatus, Policy, PolicyStatus } from '../../../domain/entities/Policy';
import { AppError, ErrorCode } from '../../../domain/errors/AppError';

describe('Policy Entity', () => {
  let policy: Policy;

  beforeEach(() => {
    policy = Policy.open({
      id: 7,
      holder: 'holder-1',
      flightCode: 'KE123',
      scheduledDeparture: 1000,
      scheduledArrival: 2000,
      terms: { delayThreshold: 14400, premium: 10n, claimAmount: 50n },
      createdAt: 900
    });
  });

  describe('open', () => {
    it('should start active with no outcome, normal status and unknown arrival', () => {
      expect(policy.policyStatus).toBe(PolicyStatus.ACTIVE);
      expect(policy.claimOutcome).toBe(ClaimOutcome.NONE);
      expect(policy.observedFlightStatus).toBe(FlightStatus.NORMAL);
      expect(policy.actualArrival).toBeNull();
      expect(policy.lastEvaluatedAt).toBeNull();
      expect(policy.payoutReference).toBeNull();
    });

    it('should copy the terms onto the policy', () => {
      expect(policy.delayThreshold).toBe(14400);
      expect(policy.premium).toBe(10n);
      expect(policy.claimAmount).toBe(50n);
      expect(policy.createdAt).toBe(900);
    });

    it('should reject an arrival that is not after departure', () => {
      const open = () => Policy.open({
        id: 8,
        holder: 'holder-1',
        flightCode: 'KE123',
        scheduledDeparture: 2000,
        scheduledArrival: 2000,
        terms: { delayThreshold: 14400, premium: 10n, claimAmount: 50n },
        createdAt: 900
      });

      expect(open).toThrow(AppError);
      expect(open).toThrow('Scheduled arrival must be after scheduled departure');
    });
  });

  describe('recordFlightInfo', () => {
    it('should overwrite arrival and status and touch lastEvaluatedAt', () => {
      policy.recordFlightInfo(5000, FlightStatus.NORMAL, 1200);
      policy.recordFlightInfo(null, FlightStatus.CANCELED, 1300);

      expect(policy.actualArrival).toBeNull();
      expect(policy.observedFlightStatus).toBe(FlightStatus.CANCELED);
      expect(policy.lastEvaluatedAt).toBe(1300);
    });
  });

  describe('deny', () => {
    it('should terminate with a denied outcome', () => {
      policy.deny(3000);

      expect(policy.policyStatus).toBe(PolicyStatus.TERMINATED);
      expect(policy.claimOutcome).toBe(ClaimOutcome.DENIED);
      expect(policy.observedFlightStatus).toBe(FlightStatus.NORMAL);
      expect(policy.lastEvaluatedAt).toBe(3000);
    });

    it('should force the observed status when one is given', () => {
      policy.deny(3000, FlightStatus.OTHER);
      expect(policy.observedFlightStatus).toBe(FlightStatus.OTHER);
    });
  });

  describe('markClaimed', () => {
    it('should mark the policy paid with its payout reference', () => {
      policy.markClaimed(3000, '0xabc');

      expect(policy.policyStatus).toBe(PolicyStatus.CLAIMED);
      expect(policy.claimOutcome).toBe(ClaimOutcome.PAID);
      expect(policy.payoutReference).toBe('0xabc');
    });
  });

  describe('terminal policies', () => {
    it.each([
      ['recordFlightInfo', (p: Policy) => p.recordFlightInfo(1, FlightStatus.NORMAL, 4000)],
      ['markEvaluated', (p: Policy) => p.markEvaluated(4000)],
      ['deny', (p: Policy) => p.deny(4000)],
      ['markClaimed', (p: Policy) => p.markClaimed(4000, '0xdef')]
    ])('should reject %s once claimed', (_name, mutate) => {
      policy.markClaimed(3000, '0xabc');

      let caught: unknown;
      try {
        mutate(policy);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(AppError);
      expect(caught).toMatchObject({ code: ErrorCode.POLICY_NOT_ACTIVE, message: 'Policy 7 is no longer active' });
      expect(policy.payoutReference).toBe('0xabc');
      expect(policy.lastEvaluatedAt).toBe(3000);
    });
  });

  describe('clone', () => {
    it('should produce an independent copy', () => {
      const copy = policy.clone();
      copy.recordFlightInfo(9000, FlightStatus.NORMAL, 1500);

      expect(copy.actualArrival).toBe(9000);
      expect(policy.actualArrival).toBeNull();
      expect(copy.premium).toBe(policy.premium);
    });
  });
});
