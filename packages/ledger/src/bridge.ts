/**
 * bridge.ts
 *
 * The vesting ledger's one-way link into a staking ledger. Binding is a
 * handshake: the staking ledger must already name this vesting ledger as its
 * counterpart, and only then does the vesting ledger grant it an unlimited
 * allowance over its escrow.
 */

import type { Position, Principal } from "@stakevest/types";
import { LedgerError } from "./errors";
import type { Logger } from "./logger";
import { UNLIMITED_ALLOWANCE, type FungibleToken } from "./token";

/** What the vesting ledger needs from a staking ledger. */
export interface StakingCounterpart {
  readonly address: Principal;
  readonly vestingAddress: Principal;
  claim2stake(beneficiary: Principal, amount: bigint, sender: Principal): Position;
}

export class CrossLedgerBridge {
  private target: StakingCounterpart | null = null;

  constructor(
    private readonly vestingAddress: Principal,
    private readonly token: FungibleToken,
    private readonly log: Logger
  ) {}

  get bound(): boolean {
    return this.target !== null;
  }

  get stakingAddress(): Principal | null {
    return this.target?.address ?? null;
  }

  bind(staking: StakingCounterpart): void {
    if (this.target) throw new LedgerError("ContractAlreadySet", this.target.address);
    if (staking.vestingAddress !== this.vestingAddress) {
      throw new LedgerError(
        "ContractMismatch",
        `${staking.address} expects ${staking.vestingAddress}, not ${this.vestingAddress}`
      );
    }
    if (!this.token.approve(this.vestingAddress, staking.address, UNLIMITED_ALLOWANCE)) {
      throw new LedgerError("TransferFailed", `approve ${staking.address}`);
    }
    this.target = staking;
    this.log.info(`bridge bound to ${staking.address}`);
  }

  /** Deposit `amount` of escrow into the bound staking pool for `beneficiary`. */
  forward(beneficiary: Principal, amount: bigint): Position {
    if (!this.target) throw new LedgerError("StakeContractNotSet");
    return this.target.claim2stake(beneficiary, amount, this.vestingAddress);
  }
}
