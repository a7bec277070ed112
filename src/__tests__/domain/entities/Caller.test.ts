import {
  Caller,
  Capability,
  PolicyOperation,
  assertAuthorized,
  isCapability
} from '../../../domain/entities/Caller';
import { AppError, ErrorCode } from '../../../domain/errors/AppError';

describe('Caller', () => {
  const anyone = new Caller('holder-1');
  const oracle = new Caller('oracle-1', [Capability.ORACLE]);
  const admin = new Caller('admin-1', [Capability.ADMIN]);

  it('should let any authenticated caller create a policy', () => {
    expect(anyone.canPerform(PolicyOperation.CREATE_POLICY)).toBe(true);
  });

  it('should accept oracle or admin for flight info', () => {
    expect(anyone.canPerform(PolicyOperation.UPDATE_FLIGHT_INFO)).toBe(false);
    expect(oracle.canPerform(PolicyOperation.UPDATE_FLIGHT_INFO)).toBe(true);
    expect(admin.canPerform(PolicyOperation.UPDATE_FLIGHT_INFO)).toBe(true);
  });

  it('should reserve evaluation and withdrawal for admin', () => {
    expect(oracle.canPerform(PolicyOperation.EVALUATE)).toBe(false);
    expect(oracle.canPerform(PolicyOperation.WITHDRAW_ALL)).toBe(false);
    expect(admin.canPerform(PolicyOperation.EVALUATE)).toBe(true);
    expect(admin.canPerform(PolicyOperation.WITHDRAW_ALL)).toBe(true);
  });

  it('should give the system caller admin capability', () => {
    const system = Caller.system();
    expect(system.id).toBe('system:monitor');
    expect(system.has(Capability.ADMIN)).toBe(true);
  });

  it('should throw a 403 unauthorized error for a missing capability', () => {
    let caught: unknown;
    try {
      assertAuthorized(oracle, PolicyOperation.EVALUATE);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppError);
    expect(caught).toMatchObject({
      code: ErrorCode.UNAUTHORIZED,
      statusCode: 403,
      message: 'Caller is not allowed to perform evaluate'
    });
  });

  it('should recognise only known capability names', () => {
    expect(isCapability('ADMIN')).toBe(true);
    expect(isCapability('ORACLE')).toBe(true);
    expect(isCapability('ROOT')).toBe(false);
    expect(isCapability(1)).toBe(false);
  });
});
