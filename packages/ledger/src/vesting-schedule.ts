/**
 * vesting-schedule.ts
 *
 * Per-beneficiary linear-release grants and the release arithmetic.
 * Amounts are integer base units (10^18 per token for an 18-decimal token);
 * division truncates, so rounding always leaves dust in the ledger rather
 * than over-releasing.
 */

import type { Principal, Vest, VestParams } from "@stakevest/types";
import { LedgerError } from "./errors";

/** Cumulative amount a grant has released by `now`. */
export function releasedAt(vest: VestParams, now: bigint): bigint {
  if (now <= vest.startDate) return 0n;
  if (now >= vest.endDate) return vest.totalAmount;
  const streamed = ((vest.totalAmount - vest.startAmount) * (now - vest.startDate)) /
    (vest.endDate - vest.startDate);
  return vest.startAmount + streamed;
}

/** Released but not yet withdrawn. */
export function claimableAt(vest: Vest, now: bigint): bigint {
  const released = releasedAt(vest, now);
  return released > vest.claimed ? released - vest.claimed : 0n;
}

export class VestingSchedule {
  private grants = new Map<Principal, Vest[]>();

  count(beneficiary: Principal): number {
    return this.grants.get(beneficiary)?.length ?? 0;
  }

  list(beneficiary: Principal): Vest[] {
    return (this.grants.get(beneficiary) ?? []).map((v) => ({ ...v }));
  }

  get(beneficiary: Principal, index: number): Vest {
    const vest = this.grants.get(beneficiary)?.[index];
    if (!vest) throw new LedgerError("WrongVestIndex", `${index} of ${this.count(beneficiary)}`);
    return { ...vest };
  }

  add(beneficiary: Principal, params: VestParams): Vest {
    const vest: Vest = { ...params, claimed: 0n };
    const list = this.grants.get(beneficiary);
    if (list) list.push(vest);
    else this.grants.set(beneficiary, [vest]);
    return { ...vest };
  }

  claimable(beneficiary: Principal, now: bigint): bigint {
    let total = 0n;
    for (const vest of this.grants.get(beneficiary) ?? []) total += claimableAt(vest, now);
    return total;
  }

  /** Everything not yet withdrawn, released or not. */
  unclaimed(beneficiary: Principal): bigint {
    let total = 0n;
    for (const vest of this.grants.get(beneficiary) ?? []) total += vest.totalAmount - vest.claimed;
    return total;
  }

  /** Move each grant's `claimed` up to what it has released; returns the sum. */
  release(beneficiary: Principal, now: bigint): bigint {
    let total = 0n;
    for (const vest of this.grants.get(beneficiary) ?? []) {
      const amount = claimableAt(vest, now);
      vest.claimed += amount;
      total += amount;
    }
    return total;
  }

  /** Per-grant `claimed` values, restorable after a refused payout. */
  snapshot(beneficiary: Principal): bigint[] {
    return (this.grants.get(beneficiary) ?? []).map((v) => v.claimed);
  }

  restore(beneficiary: Principal, claimed: bigint[]): void {
    (this.grants.get(beneficiary) ?? []).forEach((vest, i) => {
      const value = claimed[i];
      if (value !== undefined) vest.claimed = value;
    });
  }
}
