// Types for the staking ledger (reward pools and the vesting bridge target)

/** Stacks-style principal identifying a caller or a ledger instance. */
export type Principal = string;

/**
 * Parameters an administrator supplies when opening a reward pool.
 * All amounts are token base units (1 token = 10^decimals), times are
 * unix seconds.
 */
export interface PoolParams {
  minStake: bigint;        // per-caller cumulative lower bound
  maxStake: bigint;        // per-caller cumulative upper bound
  startTime: bigint;       // deposits accepted strictly after this
  endTime: bigint;         // deposits rejected from this moment on
  rewardRateMilli: bigint; // reward per 1000 units of principal
  lockPeriod: bigint;      // seconds from deposit to maturity
  maxTotalStaked: bigint;  // pool capacity in principal
}

/**
 * A live reward pool.
 *
 * Pools are stored in an array compacted by swap-with-last on removal, so an
 * index only addresses the same pool until the next reclamation. `poolHash`
 * is the stable identity.
 */
export interface Pool extends PoolParams {
  totalStaked: bigint;     // principal accepted so far
  poolHash: string;        // hex sha256 over the serialized PoolParams
}

/**
 * Pool the vesting ledger may deposit into on a claimant's behalf.
 * Remembered by index and hash; the pair must still agree at deposit time.
 */
export interface BridgeTarget {
  poolIndex: number;
  poolHash: string;
}
