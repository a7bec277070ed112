import { ErrorCode } from '../../../domain/errors/AppError';
import { FlightStatus, PolicyStatus } from '../../../domain/entities/Policy';
import { ADMIN, HOLDER, ORACLE, PolicyHarness, createHarness, openStandardPolicy } from '../../helpers/policyHarness';

describe('UpdateFlightInfoUseCase', () => {
  let harness: PolicyHarness;

  beforeEach(async () => {
    harness = createHarness({ now: 500 });
    await openStandardPolicy(harness);
    harness.clock.current = 2100;
  });

  it('should record arrival and status reported by the oracle', async () => {
    const policy = await harness.updateFlightInfo.execute({
      caller: ORACLE,
      policyId: 1,
      actualArrival: 2050,
      flightStatus: FlightStatus.NORMAL
    });

    expect(policy.actualArrival).toBe(2050);
    expect(policy.lastEvaluatedAt).toBe(2100);

    const stored = await harness.query.getPolicy(1);
    expect(stored.actualArrival).toBe(2050);
    expect(stored.observedFlightStatus).toBe(FlightStatus.NORMAL);
  });

  it('should accept admin and keep the last write', async () => {
    await harness.updateFlightInfo.execute({ caller: ORACLE, policyId: 1, actualArrival: 2050, flightStatus: FlightStatus.NORMAL });
    await harness.updateFlightInfo.execute({ caller: ADMIN, policyId: 1, actualArrival: null, flightStatus: FlightStatus.CANCELED });

    const stored = await harness.query.getPolicy(1);
    expect(stored.actualArrival).toBeNull();
    expect(stored.observedFlightStatus).toBe(FlightStatus.CANCELED);
  });

  it('should emit an update event', async () => {
    await harness.updateFlightInfo.execute({ caller: ORACLE, policyId: 1, actualArrival: 2050, flightStatus: FlightStatus.NORMAL });

    const history = harness.events.getHistory(1);
    expect(history.map(event => event.type)).toEqual(['PolicyCreated', 'FlightInfoUpdated']);
    expect(history[1]).toMatchObject({ actualArrival: 2050, flightStatus: FlightStatus.NORMAL });
  });

  it('should reject callers without oracle or admin capability', async () => {
    await expect(
      harness.updateFlightInfo.execute({ caller: HOLDER, policyId: 1, actualArrival: 2050, flightStatus: FlightStatus.NORMAL })
    ).rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED, statusCode: 403 });

    expect((await harness.query.getPolicy(1)).actualArrival).toBeNull();
  });

  it('should reject an unknown policy', async () => {
    await expect(
      harness.updateFlightInfo.execute({ caller: ORACLE, policyId: 42, actualArrival: 2050, flightStatus: FlightStatus.NORMAL })
    ).rejects.toMatchObject({ code: ErrorCode.POLICY_NOT_FOUND, message: 'Policy 42 not found' });
  });

  it('should reject updates once the policy is terminal and leave it untouched', async () => {
    await harness.updateFlightInfo.execute({ caller: ORACLE, policyId: 1, actualArrival: 2000, flightStatus: FlightStatus.NORMAL });
    await harness.evaluate.execute({ caller: ADMIN, policyId: 1, now: 3000 });

    harness.clock.current = 4000;
    await expect(
      harness.updateFlightInfo.execute({ caller: ORACLE, policyId: 1, actualArrival: 50000, flightStatus: FlightStatus.NORMAL })
    ).rejects.toMatchObject({ code: ErrorCode.POLICY_NOT_ACTIVE, statusCode: 409 });

    const stored = await harness.query.getPolicy(1);
    expect(stored.policyStatus).toBe(PolicyStatus.TERMINATED);
    expect(stored.actualArrival).toBe(2000);
    expect(stored.lastEvaluatedAt).toBe(3000);
  });
});
