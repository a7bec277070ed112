import { EventEmitter } from 'events';
import { FundsWithdrawnEvent, PolicyEventType } from '../../domain/events/PolicyEvent';
import { logger } from '../logging/Logger';

const DEFAULT_HISTORY_LIMIT = 50;
const DEFAULT_TRACKED_POLICY_LIMIT = 10000;

export interface PolicyEventHistoryOptions {
  /** Events kept per policy. */
  historyLimit?: number;
  /** Policies with a kept history; the least recently active one is dropped first. */
  trackedPolicyLimit?: number;
}

/**
 * Publishes policy notifications.
 *
 * Subscribers can listen to `policy-event` for every policy or to
 * `policy-event:<id>` for one. The emitter also keeps the last few events per
 * policy so audit queries work without an external log. Only the most
 * recently active policies keep a history.
 */
export class PolicyEventEmitter extends EventEmitter {
  private history: Map<number, PolicyEventType[]> = new Map();
  private readonly historyLimit: number;
  private readonly trackedPolicyLimit: number;

  constructor(options: PolicyEventHistoryOptions = {}) {
    super();
    this.setMaxListeners(50);
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.trackedPolicyLimit = options.trackedPolicyLimit ?? DEFAULT_TRACKED_POLICY_LIMIT;
  }

  emitPolicyEvent(event: PolicyEventType): void {
    this.record(event);

    this.emit('policy-event', event);
    this.emit(`policy-event:${event.policyId}`, event);

    logger.debug('Policy event emitted', {
      policyId: event.policyId,
      type: event.type
    });
  }

  emitTreasuryEvent(event: FundsWithdrawnEvent): void {
    this.emit('treasury-event', event);
    logger.debug('Treasury event emitted', {
      type: event.type,
      destination: event.destination
    });
  }

  getHistory(policyId: number): PolicyEventType[] {
    return [...(this.history.get(policyId) ?? [])];
  }

  private record(event: PolicyEventType): void {
    const entries = this.history.get(event.policyId) ?? [];
    entries.push(event);
    if (entries.length > this.historyLimit) {
      entries.splice(0, entries.length - this.historyLimit);
    }

    // Map keeps insertion order, so re-inserting moves the policy to the newest end
    this.history.delete(event.policyId);
    this.history.set(event.policyId, entries);

    for (const policyId of this.history.keys()) {
      if (this.history.size <= this.trackedPolicyLimit) {
        break;
      }
      this.history.delete(policyId);
    }
  }
}
