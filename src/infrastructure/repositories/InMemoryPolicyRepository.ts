import { injectable } from 'inversify';
import { IPolicyRepository } from '../../domain/repositories/IPolicyRepository';
import { Policy } from '../../domain/entities/Policy';
import { AppError } from '../../domain/errors/AppError';

/**
 * Process-local store. Policies are copied in and out so a caller holding an
 * entity never mutates stored state without going through `update`.
 */
@injectable()
export class InMemoryPolicyRepository implements IPolicyRepository {
  private policies: Map<number, Policy> = new Map();
  private holderIndex: Map<string, number[]> = new Map();
  private lastId = 0;

  async nextId(): Promise<number> {
    this.lastId += 1;
    return this.lastId;
  }

  async findById(id: number): Promise<Policy | null> {
    const policy = this.policies.get(id);
    return policy ? policy.clone() : null;
  }

  async findIdsByHolder(holder: string): Promise<number[]> {
    return [...(this.holderIndex.get(holder) ?? [])];
  }

  async findActive(): Promise<Policy[]> {
    const active: Policy[] = [];
    for (const policy of this.policies.values()) {
      if (policy.isActive()) {
        active.push(policy.clone());
      }
    }
    return active.sort((a, b) => a.id - b.id);
  }

  async save(policy: Policy): Promise<void> {
    if (this.policies.has(policy.id)) {
      throw new Error(`Policy ${policy.id} already exists`);
    }
    this.policies.set(policy.id, policy.clone());

    const ids = this.holderIndex.get(policy.holder) ?? [];
    ids.push(policy.id);
    this.holderIndex.set(policy.holder, ids);
  }

  async update(policy: Policy): Promise<void> {
    const stored = this.policies.get(policy.id);
    if (!stored) {
      throw AppError.policyNotFound(policy.id);
    }
    if (!stored.isActive()) {
      throw AppError.policyNotActive(policy.id);
    }
    this.policies.set(policy.id, policy.clone());
  }
}
