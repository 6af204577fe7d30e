/**
 * reward-accountant.ts
 *
 * Aggregate counters of the staking ledger.
 *
 *   totalFreeRewards      reward reserved by live pools but not yet backing
 *                         a position
 *   totalStakedAndReward  principal + reward of every open position
 *
 * Each `reserve` at pool creation is later matched by exactly one debit of
 * the same reward: `allocate` when a deposit takes it, `release` when
 * reclamation returns it. The token balance of the staking ledger is never
 * below the sum of both counters.
 */

import { LedgerError } from "./errors";

const PER_MILLE = 1000n;

/** Reward earned by `principal` at a per-mille rate (truncating). */
export function rewardFor(principal: bigint, rewardRateMilli: bigint): bigint {
  return (principal * rewardRateMilli) / PER_MILLE;
}

export interface AccountantSnapshot {
  freeRewards: bigint;
  stakedAndReward: bigint;
}

export class RewardAccountant {
  private freeRewards = 0n;
  private stakedAndReward = 0n;

  get totalFreeRewards(): bigint {
    return this.freeRewards;
  }

  get totalStakedAndReward(): bigint {
    return this.stakedAndReward;
  }

  /** Everything the ledger owes out of its token balance. */
  get liabilities(): bigint {
    return this.freeRewards + this.stakedAndReward;
  }

  /** Pool creation: the full reward for the pool's capacity is set aside. */
  reserve(reward: bigint): void {
    this.freeRewards += reward;
  }

  /** Deposit: part of the reserve now backs a position. */
  allocate(principal: bigint, reward: bigint): void {
    this.debitFree(reward);
    this.stakedAndReward += principal + reward;
  }

  /** Reclamation: unused reserve of closed pools goes back to the administrator. */
  release(amount: bigint): void {
    this.debitFree(amount);
  }

  /** Claim: matured positions leave the ledger. */
  settle(amount: bigint): void {
    if (amount > this.stakedAndReward) {
      throw new LedgerError(
        "AccountingInvariantViolated",
        `settling ${amount} with only ${this.stakedAndReward} outstanding`
      );
    }
    this.stakedAndReward -= amount;
  }

  snapshot(): AccountantSnapshot {
    return { freeRewards: this.freeRewards, stakedAndReward: this.stakedAndReward };
  }

  restore(snapshot: AccountantSnapshot): void {
    this.freeRewards = snapshot.freeRewards;
    this.stakedAndReward = snapshot.stakedAndReward;
  }

  private debitFree(amount: bigint): void {
    if (amount > this.freeRewards) {
      throw new LedgerError(
        "AccountingInvariantViolated",
        `debiting ${amount} from ${this.freeRewards} free rewards`
      );
    }
    this.freeRewards -= amount;
  }
}
