// Types for the vesting ledger (linear-release grants)

/**
 * A linear-release grant.
 *
 * `startAmount` is released at `startDate`, the remainder up to
 * `totalAmount` streams linearly until `endDate`. Grants are never removed;
 * a fully claimed grant simply has nothing left to release.
 */
export interface Vest {
  startAmount: bigint;  // released at startDate (base units)
  totalAmount: bigint;  // released in full by endDate (base units)
  startDate: bigint;    // unix seconds
  endDate: bigint;      // unix seconds
  claimed: bigint;      // cumulative amount withdrawn from this grant
}

export type VestParams = Omit<Vest, "claimed">;
