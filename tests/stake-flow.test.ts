import { describe, it, expect, beforeAll } from "vitest";
import {
  DAY,
  T0,
  WEEK,
  deployer,
  expectLedgerError,
  fund,
  setup,
  units,
  wallet1 as user1,
  wallet2 as user2,
  wallet3 as user3,
  type Harness,
} from "./fixtures";

// Multi-user walk through four pools; every step builds on the previous one.

const one = units("1");
const two = units("2");
const ten = units("10");
const hun = units("100");
const tho = units("1000");

let h: Harness;

beforeAll(() => {
  h = setup();
});

// =========================================================================
// Pools
// =========================================================================
describe("stake flow: pools", () => {
  it("adds four pools", () => {
    const minAmt = [one, one, one, two];
    const maxAmt = [ten, ten, ten, hun];
    const sd = [T0 + DAY, T0 + WEEK, T0 + DAY, T0 + WEEK];
    const ed = [T0 + 2n * WEEK, T0 + WEEK + DAY, T0 + 2n * DAY, T0 + WEEK + DAY];
    const rpm = [10n, 20n, 1n, 500n];
    const period = [WEEK + 2n * DAY, WEEK, DAY, 2n * WEEK];

    for (let i = 0; i < 4; i++) {
      h.staking.createPool(
        {
          minStake: minAmt[i] ?? 0n,
          maxStake: maxAmt[i] ?? 0n,
          startTime: sd[i] ?? 0n,
          endTime: ed[i] ?? 0n,
          rewardRateMilli: rpm[i] ?? 0n,
          lockPeriod: period[i] ?? 0n,
          maxTotalStaked: tho,
        },
        deployer
      );
    }

    expect(h.staking.poolCount()).toBe(4);
    expect(h.staking.pool(2).rewardRateMilli).toBe(1n);
    expect(h.staking.totalFreeRewards()).toBe(units("531"));
  });
});

// =========================================================================
// Deposits
// =========================================================================
describe("stake flow: deposits", () => {
  it("accepts deposits from different users into different open pools", () => {
    fund(h, user1);
    fund(h, user2);
    fund(h, user3);

    h.clock.setTo(T0 + DAY + 1n); // pools 0 and 2 open
    h.staking.deposit(0, ten, user1);
    h.staking.deposit(2, ten, user1);
    h.staking.deposit(0, two, user2);
    h.staking.deposit(2, ten, user3);
    h.staking.deposit(2, two, user2);

    h.clock.setTo(T0 + WEEK + 1n); // pools 1 and 3 open, pool 2 closed
    expectLedgerError(() => h.staking.deposit(2, two, user1), "AlreadyClosed");
    h.staking.deposit(1, two, user2);
    h.staking.deposit(3, ten, user2);
    h.staking.deposit(1, two, user3);
    h.staking.deposit(3, ten, user3);
    h.staking.deposit(3, two, user3);
  });

  it("reads pool totals", () => {
    const pools = h.staking.pools();
    expect(pools.map((p) => p.totalStaked)).toEqual([
      units("12"),
      units("4"),
      units("22"),
      units("22"),
    ]);
    // 531 - (12*1% + 4*2% + 22*0.1% + 22*50%)
    expect(h.staking.totalFreeRewards()).toBe(units("519.778"));
  });

  it("reads user positions", () => {
    expect(h.staking.positionCount(user1)).toBe(2);
    expect(h.staking.positionCount(user2)).toBe(4);
    expect(h.staking.positionCount(user3)).toBe(4);

    for (const user of [user1, user2, user3]) {
      const sum = h.staking.positions(user).reduce((acc, p) => acc + p.totalAmount, 0n);
      expect(h.staking.stakedWithRewards(user)).toBe(sum);
    }
    expect(h.staking.stakedWithRewards(user2)).toBe(units("21.062"));
  });
});

// =========================================================================
// Claiming
// =========================================================================
describe("stake flow: claiming", () => {
  it("administrator reclaims the unused reserve of the closed pool", () => {
    // pool 2: 0.1% of 1000 reserved, 22 staked
    const pre = h.token.balanceOf(deployer);
    expect(h.staking.reclaimExpiredPools(deployer)).toBe(units("0.978"));
    expect(h.token.balanceOf(deployer) - pre).toBe(units("0.978"));

    // former pool 3 moved into slot 2
    expect(h.staking.poolCount()).toBe(3);
    expect(h.staking.pool(2).lockPeriod).toBe(2n * WEEK);
    expect(h.staking.totalFreeRewards()).toBe(units("518.8"));
  });

  it("claims a single matured position", () => {
    const withdrawals: bigint[] = [];
    const off = h.staking.on("Withdraw", (e) => withdrawals.push(e.amount));
    expect(h.staking.claimOne(0, user3)).toBe(units("10.01"));
    off();
    expect(withdrawals).toEqual([units("10.01")]);
  });

  it("claims from many pools", () => {
    expect(h.staking.claimable(user1)).toBe(units("10.01"));
    expect(h.staking.claimable(user2)).toBe(units("2.002"));
    expect(h.staking.claimable(user3)).toBe(0n);

    h.clock.setTo(T0 + 2n * WEEK + DAY); // pools 0 and 1 positions mature
    const cl1 = h.staking.claimable(user1);
    const cl2 = h.staking.claimable(user2);
    const cl3 = h.staking.claimable(user3);
    expect(cl1).toBe(units("20.11"));
    expect(cl2).toBe(units("6.062"));
    expect(cl3).toBe(units("2.04"));

    const pre = [user1, user2, user3].map((u) => h.token.balanceOf(u));
    expect(h.staking.claimAll(user1)).toBe(cl1);
    expect(h.staking.claimAll(user2)).toBe(cl2);
    expect(h.staking.claimAll(user3)).toBe(cl3);
    expect(h.token.balanceOf(user1)).toBe((pre[0] ?? 0n) + cl1);
    expect(h.token.balanceOf(user2)).toBe((pre[1] ?? 0n) + cl2);
    expect(h.token.balanceOf(user3)).toBe((pre[2] ?? 0n) + cl3);
  });
});

// =========================================================================
// Storage compaction
// =========================================================================
describe("stake flow: cleanup", () => {
  it("leaves only the unmatured positions, in swapped order", () => {
    h.clock.setTo(T0 + 5n * WEEK);
    expect(h.staking.positions(user1)).toEqual([]);
    expect(h.staking.positions(user2).map((p) => p.totalAmount)).toEqual([units("15")]);
    expect(h.staking.positions(user3).map((p) => p.totalAmount)).toEqual([units("3"), units("15")]);
  });

  it("reclaims every closed pool", () => {
    const free = h.staking.totalFreeRewards();
    const pre = h.token.balanceOf(deployer);
    expect(h.staking.reclaimExpiredPools(deployer)).toBe(free);
    expect(h.token.balanceOf(deployer) - pre).toBe(units("518.8"));
    expect(h.staking.poolCount()).toBe(0);
    expect(h.staking.totalFreeRewards()).toBe(0n);
  });

  it("pays positions after their pools are gone", () => {
    const pre2 = h.token.balanceOf(user2);
    const pre3 = h.token.balanceOf(user3);

    expectLedgerError(() => h.staking.claimAll(user1), "NoStakesForCaller");
    h.staking.claimAll(user2);
    h.staking.claimAll(user3);

    expect(h.token.balanceOf(user2) - pre2).toBe(units("15"));
    expect(h.token.balanceOf(user3) - pre3).toBe(units("18"));
    expect(h.staking.totalStakedAndReward()).toBe(0n);
    expect(h.token.balanceOf(h.staking.address)).toBe(0n);
  });
});
