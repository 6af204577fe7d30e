/**
 * position-ledger.ts
 *
 * Per-caller open positions plus the (poolHash, caller) principal totals used
 * to enforce per-caller pool bounds. Positions are removed by copying the
 * last one over the claimed slot, so their order is not stable across claims.
 */

import type { Position, PositionSummary, Principal } from "@stakevest/types";
import { LedgerError } from "./errors";

function isMatured(position: Position, now: bigint): boolean {
  return now > position.unlockTime;
}

export class PositionLedger {
  private positions = new Map<Principal, Position[]>();
  // principal per pool and caller; never reduced by claims
  private poolBalances = new Map<string, bigint>();

  count(caller: Principal): number {
    return this.positions.get(caller)?.length ?? 0;
  }

  list(caller: Principal): Position[] {
    return (this.positions.get(caller) ?? []).map((p) => ({ ...p }));
  }

  poolBalanceOf(poolHash: string, caller: Principal): bigint {
    return this.poolBalances.get(balanceKey(poolHash, caller)) ?? 0n;
  }

  summarize(caller: Principal, now: bigint): PositionSummary {
    let stakedWithRewards = 0n;
    let claimable = 0n;
    const list = this.positions.get(caller) ?? [];
    for (const position of list) {
      stakedWithRewards += position.totalAmount;
      if (isMatured(position, now)) claimable += position.totalAmount;
    }
    return { count: list.length, stakedWithRewards, claimable };
  }

  open(caller: Principal, poolHash: string, principal: bigint, position: Position): void {
    const key = balanceKey(poolHash, caller);
    this.poolBalances.set(key, (this.poolBalances.get(key) ?? 0n) + principal);
    const list = this.positions.get(caller);
    if (list) list.push({ ...position });
    else this.positions.set(caller, [{ ...position }]);
  }

  /** Remove every matured position of `caller`; returns their summed amount. */
  takeMatured(caller: Principal, now: bigint): bigint {
    const list = this.positions.get(caller);
    if (!list) return 0n;

    let total = 0n;
    let i = 0;
    while (i < list.length) {
      const position = list[i];
      if (position && isMatured(position, now)) {
        total += position.totalAmount;
        removeAt(list, i);
        // slot i now holds the former last position; examine it next
      } else {
        i++;
      }
    }
    return total;
  }

  /** Remove the position at `index` if it has matured; returns its amount. */
  takeOne(caller: Principal, index: number, now: bigint): bigint {
    const list = this.positions.get(caller);
    const position = list?.[index];
    if (!list || !position) {
      throw new LedgerError("WrongStakeIndex", `${index} of ${list?.length ?? 0}`);
    }
    if (!isMatured(position, now)) throw new LedgerError("NothingToClaim");
    removeAt(list, index);
    return position.totalAmount;
  }

  snapshot(caller: Principal): Position[] {
    return [...(this.positions.get(caller) ?? [])];
  }

  restore(caller: Principal, snapshot: Position[]): void {
    this.positions.set(caller, snapshot);
  }
}

function removeAt(list: Position[], index: number): void {
  const last = list.pop();
  if (last && index < list.length) list[index] = last;
}

function balanceKey(poolHash: string, caller: Principal): string {
  return `${poolHash}/${caller}`;
}
