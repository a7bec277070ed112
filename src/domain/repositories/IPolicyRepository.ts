import { Policy } from '../entities/Policy';

export interface IPolicyRepository {
  /** Allocates the next policy id. Ids are strictly increasing and never reused. */
  nextId(): Promise<number>;
  findById(id: number): Promise<Policy | null>;
  /** Policy ids of a holder in creation order; empty for an unknown holder. */
  findIdsByHolder(holder: string): Promise<number[]>;
  findActive(): Promise<Policy[]>;
  /** Inserts a new policy and appends its id to the holder index. */
  save(policy: Policy): Promise<void>;
  /**
   * Persists a mutation. Rejects with POLICY_NOT_ACTIVE when the stored
   * policy has already left the ACTIVE state.
   */
  update(policy: Policy): Promise<void>;
}
