/**
 * pool-registry.ts
 *
 * Ordered collection of reward pools. Removal copies the last pool over the
 * removed slot and truncates, so indexes shift on every reclamation; callers
 * that need a stable reference keep the pool hash.
 */

import type { Pool, PoolParams } from "@stakevest/types";
import { LedgerError } from "./errors";
import { derivePoolHash } from "./pool-hash";
import { rewardFor } from "./reward-accountant";

export interface ReclaimResult {
  removed: Pool[];
  unusedReward: bigint;
}

/** Reject parameter sets that break the pool invariants. */
export function validatePoolParams(params: PoolParams): void {
  if (params.endTime <= params.startTime || params.lockPeriod === 0n) {
    throw new LedgerError("TimestampsMisconfigured");
  }
  if (params.minStake >= params.maxStake || params.maxTotalStaked < params.maxStake) {
    throw new LedgerError("InvalidPoolBounds");
  }
}

/** Reward reserved up front for a pool filled to capacity. */
export function poolReserve(params: PoolParams): bigint {
  return rewardFor(params.maxTotalStaked, params.rewardRateMilli);
}

/** Reserve a closed pool leaves unused. */
export function unusedReserve(pool: Pool): bigint {
  return rewardFor(pool.maxTotalStaked - pool.totalStaked, pool.rewardRateMilli);
}

export class PoolRegistry {
  private pools: Pool[] = [];

  get count(): number {
    return this.pools.length;
  }

  /** Pool at `index`, or undefined once the index has shifted out of range. */
  at(index: number): Pool | undefined {
    const pool = this.pools[index];
    return pool ? { ...pool } : undefined;
  }

  get(index: number): Pool {
    const pool = this.at(index);
    if (!pool) throw new LedgerError("WrongPoolIndex", `${index} of ${this.pools.length}`);
    return pool;
  }

  list(): Pool[] {
    return this.pools.map((pool) => ({ ...pool }));
  }

  /** Append a validated pool; returns its index. */
  add(params: PoolParams, poolHash: string = derivePoolHash(params)): number {
    this.pools.push({ ...params, totalStaked: 0n, poolHash });
    return this.pools.length - 1;
  }

  recordStake(index: number, amount: bigint): void {
    const pool = this.pools[index];
    if (!pool) throw new LedgerError("WrongPoolIndex", `${index} of ${this.pools.length}`);
    pool.totalStaked += amount;
  }

  /**
   * Remove every pool whose deposit window has closed, in a single pass.
   * After a swap-in the cursor stays put so the moved pool is examined too.
   */
  removeClosed(now: bigint): ReclaimResult {
    const removed: Pool[] = [];
    let unusedReward = 0n;
    let i = 0;
    while (i < this.pools.length) {
      const pool = this.pools[i];
      if (pool && now >= pool.endTime) {
        removed.push(pool);
        unusedReward += unusedReserve(pool);
        const last = this.pools.pop();
        if (last && i < this.pools.length) this.pools[i] = last;
      } else {
        i++;
      }
    }
    return { removed, unusedReward };
  }

  /** Shallow restore point for rolling back a failed reclamation. */
  snapshot(): Pool[] {
    return [...this.pools];
  }

  restore(snapshot: Pool[]): void {
    this.pools = snapshot;
  }
}
