/**
 * vesting-ledger.ts
 *
 * Escrows grants funded by the administrator and releases them linearly.
 * A claim either pays the beneficiary (claimAll) or is redirected into the
 * bound staking ledger's claim2stake pool (claim2stake).
 *
 * The ledger also looks like a read-mostly token to wallets: balanceOf is
 * the unclaimed remainder and transfer() simply triggers a claim.
 */

import type { Position, Principal, Vest, VestingEvents } from "@stakevest/types";
import { requireAdministrator, type Administration } from "./administration";
import { CrossLedgerBridge, type StakingCounterpart } from "./bridge";
import { systemClock, type Clock } from "./clock";
import { LedgerError } from "./errors";
import { LedgerEmitter } from "./events";
import { createLogger, type Logger } from "./logger";
import { parseVestParams } from "./schemas";
import type { FungibleToken } from "./token";
import { VestingSchedule } from "./vesting-schedule";

export interface VestingLedgerOptions {
  address: Principal;
  token: FungibleToken;
  administration: Administration;
  clock?: Clock;
  logger?: Logger;
}

export interface Claim2StakeResult {
  amount: bigint;
  position: Position;
}

export class VestingLedger extends LedgerEmitter<VestingEvents> {
  readonly address: Principal;

  private readonly token: FungibleToken;
  private readonly administration: Administration;
  private readonly clock: Clock;
  private readonly log: Logger;

  private readonly schedule = new VestingSchedule();
  private readonly bridge: CrossLedgerBridge;
  private vested = 0n;

  constructor(options: VestingLedgerOptions) {
    super();
    if (options.address === "") throw new LedgerError("ZeroAddress");
    this.address = options.address;
    this.token = options.token;
    this.administration = options.administration;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger("vesting");
    this.bridge = new CrossLedgerBridge(this.address, this.token, this.log);
  }

  // -----------------------------------------------------------------------
  // Token façade
  // -----------------------------------------------------------------------

  get name(): string {
    return `vested ${this.token.name}`;
  }

  get symbol(): string {
    return `v${this.token.symbol}`;
  }

  get decimals(): number {
    return this.token.decimals;
  }

  /** Unclaimed remainder over all of the caller's grants. */
  balanceOf(caller: Principal): bigint {
    return this.schedule.unclaimed(caller);
  }

  /** Wallet-friendly claim trigger; recipient and amount are ignored. */
  transfer(_to: Principal, _amount: bigint, sender: Principal): boolean {
    this.claimAll(sender);
    return true;
  }

  // -----------------------------------------------------------------------
  // Administration
  // -----------------------------------------------------------------------

  addLock(
    beneficiary: Principal,
    startAmount: bigint,
    totalAmount: bigint,
    startDate: bigint,
    endDate: bigint,
    sender: Principal
  ): Vest {
    requireAdministrator(this.administration, sender);
    if (beneficiary === "") throw new LedgerError("ZeroAddress");
    const params = parseVestParams({ startAmount, totalAmount, startDate, endDate });
    if (params.totalAmount === 0n) throw new LedgerError("ZeroAmount");
    if (params.startAmount > params.totalAmount) {
      throw new LedgerError("InvalidInput", "startAmount above totalAmount");
    }
    if (params.startDate <= this.clock.now()) throw new LedgerError("StartDateInPast");
    if (params.endDate <= params.startDate) throw new LedgerError("TimestampsMisconfigured");

    if (!this.token.transferFrom(this.address, sender, this.address, params.totalAmount)) {
      throw new LedgerError("TransferFailed", `pull ${params.totalAmount} from ${sender}`);
    }

    const vest = this.schedule.add(beneficiary, params);
    this.vested += params.totalAmount;

    this.log.info(`lock of ${params.totalAmount} added for ${beneficiary} (${params.startDate}..${params.endDate})`);
    this.emit("VestingAdded", { beneficiary, ...params });
    return vest;
  }

  /**
   * Bind the staking ledger claim2stake deposits go to. One-time; the
   * staking ledger must already name this ledger as its vesting counterpart.
   */
  setStakingLedger(staking: StakingCounterpart, sender: Principal): void {
    requireAdministrator(this.administration, sender);
    this.bridge.bind(staking);
    this.emit("StakingLedgerBound", { staking: staking.address });
  }

  // -----------------------------------------------------------------------
  // Claims
  // -----------------------------------------------------------------------

  claimAll(sender: Principal): bigint {
    const { amount, claimedBefore, vestedBefore } = this.release(sender);

    if (!this.token.transfer(this.address, sender, amount)) {
      this.rollback(sender, claimedBefore, vestedBefore);
      this.log.warn(`payout of ${amount} to ${sender} refused, state restored`);
      throw new LedgerError("TransferFailed", `push ${amount} to ${sender}`);
    }

    this.log.info(`claimed ${amount} by ${sender}`);
    this.emit("Claimed", { caller: sender, amount });
    return amount;
  }

  /** Claim and stake the released amount in the bound staking pool. */
  claim2stake(sender: Principal): Claim2StakeResult {
    if (!this.bridge.bound) throw new LedgerError("StakeContractNotSet");
    const { amount, claimedBefore, vestedBefore } = this.release(sender);

    let position: Position;
    try {
      position = this.bridge.forward(sender, amount);
    } catch (err) {
      this.rollback(sender, claimedBefore, vestedBefore);
      throw err;
    }

    this.log.info(`claimed ${amount} by ${sender} into staking`);
    this.emit("Claimed", { caller: sender, amount });
    return { amount, position };
  }

  // -----------------------------------------------------------------------
  // Readers
  // -----------------------------------------------------------------------

  /** Escrowed and not yet released to anyone. */
  vestedTotal(): bigint {
    return this.vested;
  }

  vestCount(caller: Principal): number {
    return this.schedule.count(caller);
  }

  vest(caller: Principal, index: number): Vest {
    return this.schedule.get(caller, index);
  }

  vests(caller: Principal): Vest[] {
    return this.schedule.list(caller);
  }

  claimable(caller: Principal): bigint {
    return this.schedule.claimable(caller, this.clock.now());
  }

  stakingAddress(): Principal | null {
    return this.bridge.stakingAddress;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private release(caller: Principal) {
    if (this.schedule.count(caller) === 0) throw new LedgerError("NoLocksForCaller");
    const now = this.clock.now();

    const claimedBefore = this.schedule.snapshot(caller);
    const vestedBefore = this.vested;
    const amount = this.schedule.release(caller, now);
    if (amount === 0n) throw new LedgerError("NothingToClaim");

    this.vested -= amount;
    return { amount, claimedBefore, vestedBefore };
  }

  private rollback(caller: Principal, claimedBefore: bigint[], vestedBefore: bigint): void {
    this.schedule.restore(caller, claimedBefore);
    this.vested = vestedBefore;
  }
}
