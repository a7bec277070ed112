import { PolicyLockRegistry, holderLockKey, policyLockKey } from '../../../infrastructure/coordination/PolicyLockRegistry';

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('PolicyLockRegistry', () => {
  let locks: PolicyLockRegistry;

  beforeEach(() => {
    locks = new PolicyLockRegistry();
  });

  it('should build distinct keys for policies and holders', () => {
    expect(policyLockKey(3)).toBe('policy:3');
    expect(holderLockKey('holder-1')).toBe('holder:holder-1');
  });

  it('should serialize work on the same key', async () => {
    const order: string[] = [];

    await Promise.all([
      locks.runExclusive('policy:1', async () => {
        order.push('a-start');
        await delay(10);
        order.push('a-end');
      }),
      locks.runExclusive('policy:1', async () => {
        order.push('b');
      })
    ]);

    expect(order).toEqual(['a-start', 'a-end', 'b']);
  });

  it('should let different keys run in parallel', async () => {
    const order: string[] = [];

    await Promise.all([
      locks.runExclusive('policy:1', async () => {
        order.push('a-start');
        await delay(10);
        order.push('a-end');
      }),
      locks.runExclusive('policy:2', async () => {
        order.push('b');
      })
    ]);

    expect(order).toEqual(['a-start', 'b', 'a-end']);
  });

  it('should release the lock when the work throws', async () => {
    await expect(locks.runExclusive('policy:1', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(locks.isLocked('policy:1')).toBe(false);
    expect(await locks.runExclusive('policy:1', async () => 'ok')).toBe('ok');
  });
});
