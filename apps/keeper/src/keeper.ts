/**
 * keeper.ts
 *
 * The ledgers have no scheduler of their own: pools close on wall-clock time
 * but stay in the registry until someone reclaims them. The keeper is that
 * someone. Each tick it
 *
 *   1. calls reclaimExpiredPools as the administrator (an idle tick just
 *      gets NothingToReclaim back), and
 *   2. audits both ledgers against their token balances:
 *        staking  balance >= totalStakedAndReward + totalFreeRewards
 *        vesting  balance >= vestedTotal
 */

import { isLedgerError, type Logger } from "@stakevest/ledger";
import type { Principal } from "@stakevest/types";
import { logger as defaultLogger } from "./logger";
import type { Deployment } from "./scenario";

export interface KeeperOptions {
  /** Principal the keeper reclaims as. */
  administrator: Principal;
  tickIntervalMs: number;
}

export interface LedgerAudit {
  held: bigint;     // token balance of the ledger
  owed: bigint;     // what its counters say it must hold
  surplus: bigint;  // held - owed; negative means the invariant is broken
}

export interface AuditReport {
  staking: LedgerAudit;
  vesting: LedgerAudit;
  balanced: boolean;
}

export class Keeper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticks = 0;

  constructor(
    private readonly deployment: Deployment,
    private readonly options: KeeperOptions,
    private readonly log: Logger = defaultLogger
  ) {}

  // -----------------------------------------------------------------------
  // Public: lifecycle
  // -----------------------------------------------------------------------

  start(): void {
    this.log.info(`Keeper starting — admin: ${this.options.administrator}`);
    this.log.info(`Tick interval: ${this.options.tickIntervalMs / 1000}s`);

    // Run immediately on start, then on a timer
    this.runTick();
    this.timer = setInterval(() => this.runTick(), this.options.tickIntervalMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.log.info("Keeper stopped.");
  }

  get tickCount(): number {
    return this.ticks;
  }

  // -----------------------------------------------------------------------
  // Duties
  // -----------------------------------------------------------------------

  runTick(): AuditReport {
    this.ticks++;
    try {
      this.reclaim();
    } catch (err) {
      this.log.error(`Reclaim failed: ${err}`);
    }
    return this.audit();
  }

  /** Reclaim closed pools; returns the amount recovered (0 when idle). */
  reclaim(): bigint {
    try {
      const amount = this.deployment.staking.reclaimExpiredPools(this.options.administrator);
      this.log.info(`Reclaimed ${amount} of unused reward.`);
      return amount;
    } catch (err) {
      if (isLedgerError(err, "NothingToReclaim")) {
        this.log.debug("No closed pools to reclaim.");
        return 0n;
      }
      throw err;
    }
  }

  audit(): AuditReport {
    const { token, staking, vesting } = this.deployment;

    const stakingAudit = compare(
      token.balanceOf(staking.address),
      staking.totalStakedAndReward() + staking.totalFreeRewards()
    );
    const vestingAudit = compare(token.balanceOf(vesting.address), vesting.vestedTotal());
    const balanced = stakingAudit.surplus >= 0n && vestingAudit.surplus >= 0n;

    if (balanced) {
      this.log.debug(
        `Audit ok — staking surplus ${stakingAudit.surplus}, vesting surplus ${vestingAudit.surplus}`
      );
    } else {
      this.log.warn(
        `Audit FAILED — staking held ${stakingAudit.held} / owed ${stakingAudit.owed}, ` +
        `vesting held ${vestingAudit.held} / owed ${vestingAudit.owed}`
      );
    }
    return { staking: stakingAudit, vesting: vestingAudit, balanced };
  }
}

function compare(held: bigint, owed: bigint): LedgerAudit {
  return { held, owed, surplus: held - owed };
}
