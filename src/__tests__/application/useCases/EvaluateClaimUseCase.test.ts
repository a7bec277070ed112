import { AppError, ErrorCode } from '../../../domain/errors/AppError';
import { ClaimOutcome, FlightStatus, PolicyStatus } from '../../../domain/entities/Policy';
import { claimReference } from '../../../application/useCases/EvaluateClaimUseCase';
import {
  ADMIN,
  CLAIM_AMOUNT,
  ONE_ETHER,
  ORACLE,
  PolicyHarness,
  createHarness,
  openStandardPolicy,
  outcomeMatchesStatus
} from '../../helpers/policyHarness';

describe('EvaluateClaimUseCase', () => {
  let harness: PolicyHarness;

  const reportArrival = (actualArrival: number | null, flightStatus = FlightStatus.NORMAL) =>
    harness.updateFlightInfo.execute({ caller: ORACLE, policyId: 1, actualArrival, flightStatus });

  beforeEach(async () => {
    harness = createHarness({ now: 500 });
    await openStandardPolicy(harness);
    harness.clock.current = 2500;
  });

  afterEach(() => {
    harness.events.removeAllListeners();
  });

  describe('awaiting data', () => {
    it('should stay active and emit an awaiting notification', async () => {
      const result = await harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 1500 });

      expect(result).toEqual({
        policyId: 1,
        decision: 'awaiting-data',
        policyStatus: PolicyStatus.ACTIVE,
        claimOutcome: ClaimOutcome.NONE
      });

      const stored = await harness.query.getPolicy(1);
      expect(stored.policyStatus).toBe(PolicyStatus.ACTIVE);
      expect(stored.lastEvaluatedAt).toBe(1500);

      const history = harness.events.getHistory(1);
      expect(history[history.length - 1]).toMatchObject({
        type: 'AwaitingFlightData',
        evaluatedAt: 1500,
        deadline: 261200
      });
    });

    it('should use the injected clock when no time is given', async () => {
      harness.clock.current = 3000;
      await harness.evaluate.execute({ caller: ADMIN, policyId: 1 });

      expect((await harness.query.getPolicy(1)).lastEvaluatedAt).toBe(3000);
    });
  });

  describe('denials', () => {
    it('should deny an arrival on the threshold boundary', async () => {
      await reportArrival(2000);
      const result = await harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 3000 });

      expect(result.decision).toBe('on-time');
      const stored = await harness.query.getPolicy(1);
      expect(stored.policyStatus).toBe(PolicyStatus.TERMINATED);
      expect(stored.claimOutcome).toBe(ClaimOutcome.DENIED);
      expect(stored.observedFlightStatus).toBe(FlightStatus.NORMAL);
      expect(harness.gateway.getReceipts()).toEqual([]);
    });

    it('should deny after the no-data timeout and record OTHER', async () => {
      const result = await harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 2000 + 259200 + 1 });

      expect(result.decision).toBe('no-data-timeout');
      const stored = await harness.query.getPolicy(1);
      expect(stored.policyStatus).toBe(PolicyStatus.TERMINATED);
      expect(stored.claimOutcome).toBe(ClaimOutcome.DENIED);
      expect(stored.observedFlightStatus).toBe(FlightStatus.OTHER);
      expect(stored.lastEvaluatedAt).toBe(261201);

      const history = harness.events.getHistory(1);
      expect(history[history.length - 1]).toMatchObject({ type: 'PolicyTerminated', reason: 'no-data-timeout' });
    });

    it('should deny a cancelled flight with no arrival', async () => {
      await reportArrival(null, FlightStatus.CANCELED);
      const result = await harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 1500 });

      expect(result).toEqual({
        policyId: 1,
        decision: 'cancelled',
        policyStatus: PolicyStatus.TERMINATED,
        claimOutcome: ClaimOutcome.DENIED
      });
      expect((await harness.query.getPolicy(1)).observedFlightStatus).toBe(FlightStatus.CANCELED);
    });

    it('should deny a cancelled flight even when reported very late', async () => {
      await reportArrival(90000, FlightStatus.CANCELED);
      const result = await harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 100000 });

      expect(result.decision).toBe('cancelled');
      expect(harness.gateway.getReceipts()).toEqual([]);
    });
  });

  describe('late arrival', () => {
    it('should pay the claim amount once and mark the policy claimed', async () => {
      await reportArrival(20000);
      const result = await harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 21000 });

      expect(result).toEqual({
        policyId: 1,
        decision: 'late',
        policyStatus: PolicyStatus.CLAIMED,
        claimOutcome: ClaimOutcome.PAID,
        payout: {
          reference: 'claim:1',
          destination: 'holder-1',
          amount: CLAIM_AMOUNT,
          transactionHash: '0xmemory00000001'
        }
      });

      const stored = await harness.query.getPolicy(1);
      expect(stored.policyStatus).toBe(PolicyStatus.CLAIMED);
      expect(stored.payoutReference).toBe('0xmemory00000001');
      expect(stored.lastEvaluatedAt).toBe(21000);
      expect(harness.gateway.getBalance()).toBe(ONE_ETHER - CLAIM_AMOUNT);
    });

    it('should reject every later evaluation without paying again', async () => {
      await reportArrival(20000);
      await harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 21000 });

      for (const now of [22000, 300000]) {
        await expect(harness.evaluate.execute({ caller: ADMIN, policyId: 1, now }))
          .rejects.toMatchObject({ code: ErrorCode.POLICY_NOT_ACTIVE });
      }

      expect(harness.gateway.getReceipts()).toHaveLength(1);
      expect((await harness.query.getPolicy(1)).lastEvaluatedAt).toBe(21000);
    });

    it('should pay exactly once under concurrent evaluations', async () => {
      await reportArrival(20000);

      const results = await Promise.allSettled([
        harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 21000 }),
        harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 21000 }),
        harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 21000 })
      ]);

      expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(rejected).toHaveLength(2);
      for (const r of rejected) {
        expect(r.reason).toMatchObject({ code: ErrorCode.POLICY_NOT_ACTIVE });
      }
      expect(harness.gateway.getReceipts()).toHaveLength(1);
    });
  });

  describe('payout failure', () => {
    beforeEach(async () => {
      harness = createHarness({ now: 500, float: 0n });
      await openStandardPolicy(harness);
      harness.clock.current = 2500;
      await reportArrival(20000);
    });

    it('should leave the policy active and unchanged when the transfer fails', async () => {
      let caught: unknown;
      try {
        await harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 21000 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(AppError);
      expect(caught).toMatchObject({
        code: ErrorCode.SETTLEMENT_FAILURE,
        statusCode: 502,
        message: 'Payout for policy 1 did not complete',
        details: { reason: 'Insufficient settlement balance: requested 50000000000000000, available 0' }
      });

      const stored = await harness.query.getPolicy(1);
      expect(stored.policyStatus).toBe(PolicyStatus.ACTIVE);
      expect(stored.claimOutcome).toBe(ClaimOutcome.NONE);
      expect(stored.payoutReference).toBeNull();
      expect(stored.lastEvaluatedAt).toBe(2500);

      const history = harness.events.getHistory(1);
      expect(history[history.length - 1]).toMatchObject({ type: 'PayoutFailed', holder: 'holder-1' });
    });

    it('should settle on a retry once funds are available', async () => {
      await expect(harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 21000 }))
        .rejects.toMatchObject({ code: ErrorCode.SETTLEMENT_FAILURE });

      harness.gateway.fund(CLAIM_AMOUNT);
      const result = await harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 22000 });

      expect(result.policyStatus).toBe(PolicyStatus.CLAIMED);
      expect(harness.gateway.getBalance()).toBe(0n);
      expect(harness.gateway.getReceipts()).toHaveLength(1);
    });
  });

  describe('commit failure after payout', () => {
    it('should not pay twice when the state write is retried', async () => {
      await reportArrival(20000);
      jest.spyOn(harness.repository, 'update').mockRejectedValueOnce(new Error('write conflict'));

      await expect(harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 21000 }))
        .rejects.toThrow('write conflict');

      expect((await harness.query.getPolicy(1)).policyStatus).toBe(PolicyStatus.ACTIVE);
      expect(harness.gateway.getReceipts()).toHaveLength(1);

      const result = await harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 22000 });

      expect(result.payout?.transactionHash).toBe('0xmemory00000001');
      expect(harness.gateway.getReceipts()).toHaveLength(1);
      expect(harness.gateway.getBalance()).toBe(ONE_ETHER - CLAIM_AMOUNT);
      expect((await harness.query.getPolicy(1)).policyStatus).toBe(PolicyStatus.CLAIMED);
    });
  });

  describe('rejections', () => {
    it('should require admin capability', async () => {
      await expect(harness.evaluate.execute({ caller: ORACLE, policyId: 1, now: 1500 }))
        .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED, statusCode: 403 });

      expect((await harness.query.getPolicy(1)).lastEvaluatedAt).toBeNull();
    });

    it('should reject an unknown policy', async () => {
      await expect(harness.evaluate.execute({ caller: ADMIN, policyId: 99, now: 1500 }))
        .rejects.toMatchObject({ code: ErrorCode.POLICY_NOT_FOUND, statusCode: 404 });
    });
  });

  it('should keep outcome NONE exactly while the policy is active', async () => {
    const check = async () => expect(outcomeMatchesStatus(await harness.query.getPolicy(1))).toBe(true);

    await check();
    await harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 1500 });
    await check();
    await reportArrival(20000);
    await check();
    await harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 21000 });
    await check();
  });

  it('should derive the payout reference from the policy id', () => {
    expect(claimReference(12)).toBe('claim:12');
  });
});
