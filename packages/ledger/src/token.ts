/**
 * token.ts
 *
 * The fungible-token collaborator. The ledgers never implement token
 * mechanics; they only call into this interface as their own principal.
 * Calls return false on failure instead of throwing, and the ledger turns a
 * false into a TransferFailed abort.
 */

import type { Principal } from "@stakevest/types";

/** uint256 max; an allowance at this value is never decremented. */
export const UNLIMITED_ALLOWANCE = 2n ** 256n - 1n;

export interface FungibleToken {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;

  balanceOf(owner: Principal): bigint;
  allowance(owner: Principal, spender: Principal): bigint;
  approve(owner: Principal, spender: Principal, amount: bigint): boolean;
  transfer(sender: Principal, to: Principal, amount: bigint): boolean;
  transferFrom(spender: Principal, from: Principal, to: Principal, amount: bigint): boolean;
}

/**
 * In-process token used by tests and by the keeper's scenario boot.
 */
export class MemoryToken implements FungibleToken {
  private balances = new Map<Principal, bigint>();
  private allowances = new Map<string, bigint>();
  private supply = 0n;

  constructor(
    readonly name: string,
    readonly symbol: string,
    readonly decimals: number = 18
  ) {}

  totalSupply(): bigint {
    return this.supply;
  }

  /** Genesis issuance. */
  mint(to: Principal, amount: bigint): void {
    if (amount < 0n) throw new Error(`Cannot mint a negative amount (${amount})`);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.supply += amount;
  }

  balanceOf(owner: Principal): bigint {
    return this.balances.get(owner) ?? 0n;
  }

  allowance(owner: Principal, spender: Principal): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  approve(owner: Principal, spender: Principal, amount: bigint): boolean {
    if (amount < 0n || owner === "" || spender === "") return false;
    this.allowances.set(allowanceKey(owner, spender), amount);
    return true;
  }

  transfer(sender: Principal, to: Principal, amount: bigint): boolean {
    return this.move(sender, to, amount);
  }

  transferFrom(spender: Principal, from: Principal, to: Principal, amount: bigint): boolean {
    const allowed = this.allowance(from, spender);
    if (allowed < amount) return false;
    if (!this.move(from, to, amount)) return false;
    if (allowed !== UNLIMITED_ALLOWANCE) {
      this.allowances.set(allowanceKey(from, spender), allowed - amount);
    }
    return true;
  }

  private move(from: Principal, to: Principal, amount: bigint): boolean {
    if (amount < 0n || to === "") return false;
    const balance = this.balanceOf(from);
    if (balance < amount) return false;
    this.balances.set(from, balance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return true;
  }
}

function allowanceKey(owner: Principal, spender: Principal): string {
  return `${owner}->${spender}`;
}
