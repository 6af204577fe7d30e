// Types for staking positions held by a caller

/**
 * One stake instance. Principal and reward are fixed at deposit time and the
 * whole amount is released once `unlockTime` has passed.
 */
export interface Position {
  unlockTime: bigint;   // unix seconds; claimable when now > unlockTime
  totalAmount: bigint;  // principal + reward (base units)
}

/** Aggregate view of one caller's positions at a given moment. */
export interface PositionSummary {
  count: number;
  stakedWithRewards: bigint; // sum of every open position
  claimable: bigint;         // sum of matured positions only
}
