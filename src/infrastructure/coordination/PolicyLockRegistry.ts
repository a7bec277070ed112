import { injectable } from 'inversify';
import { Mutex } from 'async-mutex';
import { logger } from '../logging/Logger';

export const policyLockKey = (policyId: number): string => `policy:${policyId}`;
export const holderLockKey = (holder: string): string => `holder:${holder}`;

/**
 * Serializes work per key. Mutations of one policy never interleave, while
 * different keys run in parallel.
 */
@injectable()
export class PolicyLockRegistry {
  private mutexes: Map<string, Mutex> = new Map();

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const mutex = this.getMutex(key);
    if (mutex.isLocked()) {
      logger.debug('PolicyLockRegistry: waiting for lock', { key });
    }

    try {
      return await mutex.runExclusive(work);
    } finally {
      // Drop idle mutexes so the map does not grow with every policy ever touched
      if (!mutex.isLocked() && this.mutexes.get(key) === mutex) {
        this.mutexes.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.mutexes.get(key)?.isLocked() ?? false;
  }

  private getMutex(key: string): Mutex {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(key, mutex);
    }
    return mutex;
  }
}
