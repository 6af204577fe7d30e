/**
 * staking-ledger.ts
 *
 * Timed reward pools and the positions opened in them.
 *
 * Lifecycle:
 *   1. createPool         administrator funds the full reward for the pool's
 *                         capacity up front
 *   2. deposit            callers stake principal between startTime and
 *                         endTime; the position's reward is taken from the
 *                         reserve at once
 *   3. claimAll/claimOne  matured positions pay out principal + reward
 *   4. reclaimExpiredPools closed pools are removed and their unused reserve
 *                         returned to the administrator
 *
 * The vesting ledger may also deposit on a claimant's behalf through
 * claim2stake, into the single pool bound with setBridgePool.
 *
 * Entry points take the calling principal as their last argument. Pulls
 * happen after validation and before any mutation; pushes happen last and
 * restore the pre-call state if the token refuses them.
 */

import type {
  BridgeTarget,
  Pool,
  PoolParams,
  Position,
  PositionSummary,
  Principal,
  StakingEvents,
} from "@stakevest/types";
import { requireAdministrator, type Administration } from "./administration";
import type { StakingCounterpart } from "./bridge";
import { systemClock, type Clock } from "./clock";
import { LedgerError } from "./errors";
import { LedgerEmitter } from "./events";
import { createLogger, type Logger } from "./logger";
import { derivePoolHash } from "./pool-hash";
import { PoolRegistry, poolReserve, validatePoolParams } from "./pool-registry";
import { PositionLedger } from "./position-ledger";
import { RewardAccountant, rewardFor } from "./reward-accountant";
import { parsePoolParams } from "./schemas";
import type { FungibleToken } from "./token";

export interface StakingLedgerOptions {
  /** Principal the ledger holds tokens under. */
  address: Principal;
  /** The only principal allowed to call claim2stake. */
  vestingAddress: Principal;
  token: FungibleToken;
  administration: Administration;
  clock?: Clock;
  logger?: Logger;
}

export class StakingLedger extends LedgerEmitter<StakingEvents> implements StakingCounterpart {
  readonly address: Principal;
  readonly vestingAddress: Principal;

  private readonly token: FungibleToken;
  private readonly administration: Administration;
  private readonly clock: Clock;
  private readonly log: Logger;

  private readonly registry = new PoolRegistry();
  private readonly positionLedger = new PositionLedger();
  private readonly accountant = new RewardAccountant();
  private bridge: BridgeTarget | null = null;

  constructor(options: StakingLedgerOptions) {
    super();
    if (options.address === "" || options.vestingAddress === "") {
      throw new LedgerError("ZeroAddress");
    }
    this.address = options.address;
    this.vestingAddress = options.vestingAddress;
    this.token = options.token;
    this.administration = options.administration;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger("staking");
  }

  // -----------------------------------------------------------------------
  // Administration
  // -----------------------------------------------------------------------

  /** Open a pool, pulling its full reserve from the administrator. */
  createPool(params: PoolParams, sender: Principal): Pool {
    requireAdministrator(this.administration, sender);
    const parsed = parsePoolParams(params);
    validatePoolParams(parsed);

    const poolHash = derivePoolHash(parsed);
    const reward = poolReserve(parsed);
    this.pull(sender, reward);

    const poolIndex = this.registry.add(parsed, poolHash);
    this.accountant.reserve(reward);

    const pool = this.registry.get(poolIndex);
    this.log.info(`pool ${poolIndex} created (${pool.poolHash.slice(0, 12)}…), reserve ${reward}`);
    this.emit("PoolCreated", { poolIndex, poolHash: pool.poolHash, reward });
    return pool;
  }

  /**
   * Remove every pool whose window has closed and send the reserve they left
   * unused back to the administrator. Returns the amount sent.
   */
  reclaimExpiredPools(sender: Principal): bigint {
    requireAdministrator(this.administration, sender);
    const now = this.clock.now();

    const poolsBefore = this.registry.snapshot();
    const { removed, unusedReward } = this.registry.removeClosed(now);
    if (removed.length === 0 || unusedReward === 0n) {
      this.registry.restore(poolsBefore);
      throw new LedgerError("NothingToReclaim");
    }

    const accountsBefore = this.accountant.snapshot();
    this.accountant.release(unusedReward);
    this.push(sender, unusedReward, () => {
      this.registry.restore(poolsBefore);
      this.accountant.restore(accountsBefore);
    });

    this.log.info(`reclaimed ${unusedReward} from ${removed.length} closed pool(s)`);
    this.emit("PoolsReclaimed", { removed: removed.length, amount: unusedReward });
    return unusedReward;
  }

  /** Bind the pool the vesting ledger deposits into. */
  setBridgePool(poolIndex: number, sender: Principal): BridgeTarget {
    requireAdministrator(this.administration, sender);
    const pool = this.registry.get(poolIndex);
    this.bridge = { poolIndex, poolHash: pool.poolHash };
    this.log.info(`claim2stake pool set to ${poolIndex}`);
    this.emit("BridgePoolUpdated", { ...this.bridge });
    return { ...this.bridge };
  }

  // -----------------------------------------------------------------------
  // Staking
  // -----------------------------------------------------------------------

  deposit(poolIndex: number, amount: bigint, sender: Principal): Position {
    return this.stake(poolIndex, amount, sender, sender);
  }

  /**
   * Deposit on behalf of a vesting claimant. Principal comes out of the
   * vesting ledger's escrow, bounds apply to the beneficiary.
   */
  claim2stake(beneficiary: Principal, amount: bigint, sender: Principal): Position {
    if (sender !== this.vestingAddress) throw new LedgerError("OnlyVestingContract");
    if (!this.bridge) throw new LedgerError("BridgePoolNotSet");

    const live = this.registry.at(this.bridge.poolIndex);
    if (!live || live.poolHash !== this.bridge.poolHash) {
      throw new LedgerError("PoolHashMismatch", `index ${this.bridge.poolIndex}`);
    }
    return this.stake(this.bridge.poolIndex, amount, beneficiary, sender);
  }

  /** Pay out every matured position of the caller. */
  claimAll(sender: Principal): bigint {
    if (this.positionLedger.count(sender) === 0) throw new LedgerError("NoStakesForCaller");
    const now = this.clock.now();

    const positionsBefore = this.positionLedger.snapshot(sender);
    const amount = this.positionLedger.takeMatured(sender, now);
    if (amount === 0n) {
      this.positionLedger.restore(sender, positionsBefore);
      throw new LedgerError("NothingToClaim");
    }
    return this.payOut(sender, amount, positionsBefore);
  }

  /**
   * Pay out a single matured slot. Slot indexes shift after any claim, so
   * read `positions(caller)` again before the next call.
   */
  claimOne(index: number, sender: Principal): bigint {
    if (this.positionLedger.count(sender) === 0) throw new LedgerError("NoStakesForCaller");
    const now = this.clock.now();

    const positionsBefore = this.positionLedger.snapshot(sender);
    const amount = this.positionLedger.takeOne(sender, index, now);
    return this.payOut(sender, amount, positionsBefore);
  }

  // -----------------------------------------------------------------------
  // Readers
  // -----------------------------------------------------------------------

  poolCount(): number {
    return this.registry.count;
  }

  pool(index: number): Pool {
    return this.registry.get(index);
  }

  pools(): Pool[] {
    return this.registry.list();
  }

  totalStakedAndReward(): bigint {
    return this.accountant.totalStakedAndReward;
  }

  totalFreeRewards(): bigint {
    return this.accountant.totalFreeRewards;
  }

  positions(caller: Principal): Position[] {
    return this.positionLedger.list(caller);
  }

  positionCount(caller: Principal): number {
    return this.positionLedger.count(caller);
  }

  summary(caller: Principal): PositionSummary {
    return this.positionLedger.summarize(caller, this.clock.now());
  }

  /** Sum of the caller's matured positions. */
  claimable(caller: Principal): bigint {
    return this.summary(caller).claimable;
  }

  /** Sum of all the caller's open positions. */
  stakedWithRewards(caller: Principal): bigint {
    return this.summary(caller).stakedWithRewards;
  }

  poolBalanceOf(poolHash: string, caller: Principal): bigint {
    return this.positionLedger.poolBalanceOf(poolHash, caller);
  }

  bridgeConfigured(): boolean {
    return this.bridge !== null;
  }

  bridgeTarget(): BridgeTarget | null {
    return this.bridge ? { ...this.bridge } : null;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private stake(poolIndex: number, amount: bigint, beneficiary: Principal, payer: Principal): Position {
    const pool = this.registry.get(poolIndex);
    if (amount <= 0n) throw new LedgerError("ZeroAmount");
    if (beneficiary === "") throw new LedgerError("ZeroAddress");
    const now = this.clock.now();

    if (now <= pool.startTime) throw new LedgerError("PoolNotYetOpen");
    if (now >= pool.endTime) throw new LedgerError("AlreadyClosed");
    if (pool.totalStaked + amount > pool.maxTotalStaked) throw new LedgerError("PoolIsFull");

    const userStake = this.positionLedger.poolBalanceOf(pool.poolHash, beneficiary) + amount;
    if (userStake < pool.minStake) throw new LedgerError("PoolMinStake");
    if (userStake > pool.maxStake) throw new LedgerError("PoolMaxStake");

    const reward = rewardFor(amount, pool.rewardRateMilli);
    const position: Position = { unlockTime: now + pool.lockPeriod, totalAmount: amount + reward };

    this.pull(payer, amount);

    this.registry.recordStake(poolIndex, amount);
    this.positionLedger.open(beneficiary, pool.poolHash, amount, position);
    this.accountant.allocate(amount, reward);

    this.log.info(`deposit ${amount} by ${beneficiary} into pool ${poolIndex}, unlocks at ${position.unlockTime}`);
    this.emit("Deposit", { caller: beneficiary, poolIndex, amount, unlockTime: position.unlockTime });
    return { ...position };
  }

  private payOut(caller: Principal, amount: bigint, positionsBefore: Position[]): bigint {
    const accountsBefore = this.accountant.snapshot();
    this.accountant.settle(amount);
    this.push(caller, amount, () => {
      this.positionLedger.restore(caller, positionsBefore);
      this.accountant.restore(accountsBefore);
    });

    this.log.info(`withdraw ${amount} to ${caller}`);
    this.emit("Withdraw", { caller, amount });
    return amount;
  }

  private pull(from: Principal, amount: bigint): void {
    if (!this.token.transferFrom(this.address, from, this.address, amount)) {
      throw new LedgerError("TransferFailed", `pull ${amount} from ${from}`);
    }
  }

  private push(to: Principal, amount: bigint, rollback: () => void): void {
    if (!this.token.transfer(this.address, to, amount)) {
      rollback();
      this.log.warn(`push of ${amount} to ${to} refused, state restored`);
      throw new LedgerError("TransferFailed", `push ${amount} to ${to}`);
    }
  }
}
