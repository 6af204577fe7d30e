import { describe, it, expect, beforeEach } from "vitest";
import { StakingLedger, UNLIMITED_ALLOWANCE } from "@stakevest/ledger";
import type { StakingEvents } from "@stakevest/types";
import {
  DAY,
  T0,
  WEEK,
  VESTING,
  deployer,
  expectLedgerError,
  poolParams,
  setup,
  units,
  wallet1 as user1,
  wallet2 as user2,
  type Harness,
} from "./fixtures";

const one = units("1");
const ten = units("10");
const hun = units("100");

let h: Harness;

// -----------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------

/** Pool 0 takes claim2stake deposits: 1..10 per caller, 1% reward. */
function openBridgePool(): void {
  h.staking.createPool(
    poolParams({ minStake: one, maxStake: ten, maxTotalStaked: hun }),
    deployer
  );
  h.staking.setBridgePool(0, deployer);
}

// =========================================================================
// Binding
// =========================================================================
describe("claim2stake: binding", () => {
  beforeEach(() => {
    h = setup();
  });

  it("throws when a non-administrator binds", () => {
    expectLedgerError(() => h.vesting.setStakingLedger(h.staking, user1), "OnlyAdministrator");
  });

  it("binds and grants the staking ledger an unlimited allowance", () => {
    const bound: string[] = [];
    h.vesting.on("StakingLedgerBound", (e) => bound.push(e.staking));

    h.vesting.setStakingLedger(h.staking, deployer);

    expect(h.vesting.stakingAddress()).toBe(h.staking.address);
    expect(h.token.allowance(h.vesting.address, h.staking.address)).toBe(UNLIMITED_ALLOWANCE);
    expect(bound).toEqual([h.staking.address]);
  });

  it("binds only once", () => {
    h.vesting.setStakingLedger(h.staking, deployer);
    expectLedgerError(() => h.vesting.setStakingLedger(h.staking, deployer), "ContractAlreadySet");
  });

  it("refuses a staking ledger that names another vesting ledger", () => {
    const stranger = new StakingLedger({
      address: `${deployer}.staking-2`,
      vestingAddress: `${deployer}.vesting-2`,
      token: h.token,
      administration: h.administration,
      clock: h.clock,
    });
    expectLedgerError(() => h.vesting.setStakingLedger(stranger, deployer), "ContractMismatch");
    expect(h.vesting.stakingAddress()).toBeNull();
    expect(h.token.allowance(h.vesting.address, stranger.address)).toBe(0n);
  });

  it("sets the bridge pool", () => {
    const updates: StakingEvents["BridgePoolUpdated"][] = [];
    h.staking.on("BridgePoolUpdated", (e) => updates.push(e));
    h.staking.createPool(poolParams(), deployer);

    expectLedgerError(() => h.staking.setBridgePool(0, user1), "OnlyAdministrator");
    expectLedgerError(() => h.staking.setBridgePool(1, deployer), "WrongPoolIndex");
    expect(h.staking.bridgeConfigured()).toBe(false);

    const target = h.staking.setBridgePool(0, deployer);
    expect(h.staking.bridgeConfigured()).toBe(true);
    expect(target).toEqual({ poolIndex: 0, poolHash: h.staking.pool(0).poolHash });
    expect(h.staking.bridgeTarget()).toEqual(target);
    expect(updates).toEqual([target]);
  });
});

// =========================================================================
// Claim into staking
// =========================================================================
describe("claim2stake: staking a claim", () => {
  beforeEach(() => {
    h = setup();
    h.vesting.setStakingLedger(h.staking, deployer);
    h.vesting.addLock(user1, 0n, ten, T0 + DAY, T0 + WEEK, deployer);
  });

  it("throws for a caller without locks", () => {
    openBridgePool();
    expectLedgerError(() => h.vesting.claim2stake(user2), "NoLocksForCaller");
  });

  it("stakes the released amount", () => {
    openBridgePool();
    h.clock.setTo(T0 + 4n * DAY);
    const claimed: bigint[] = [];
    h.vesting.on("Claimed", (e) => claimed.push(e.amount));

    const { amount, position } = h.vesting.claim2stake(user1);

    // 3 of 6 days of 10 tokens
    expect(amount).toBe(units("5"));
    expect(claimed).toEqual([units("5")]);
    expect(position).toEqual({ unlockTime: T0 + 4n * DAY + WEEK, totalAmount: units("5.05") });
    expect(h.staking.totalStakedAndReward()).toBe(units("5.05"));
    expect(h.staking.positions(user1)).toEqual([position]);
    expect(h.vesting.vestedTotal()).toBe(units("5"));
    // tokens went straight from escrow to staking
    expect(h.token.balanceOf(user1)).toBe(0n);
    expect(h.token.balanceOf(h.vesting.address)).toBe(units("5"));
  });

  it("rejects direct calls from anyone but the vesting ledger", () => {
    openBridgePool();
    h.clock.setTo(T0 + 4n * DAY);
    expectLedgerError(() => h.staking.claim2stake(user1, one, user1), "OnlyVestingContract");
    expect(h.staking.claim2stake(user1, one, VESTING).totalAmount).toBe(units("1.01"));
  });

  it("fails and restores the grant when no bridge pool is set", () => {
    h.staking.createPool(poolParams(), deployer);
    h.clock.setTo(T0 + 4n * DAY);

    expectLedgerError(() => h.vesting.claim2stake(user1), "BridgePoolNotSet");
    expect(h.vesting.vest(user1, 0).claimed).toBe(0n);
    expect(h.vesting.vestedTotal()).toBe(ten);
  });

  it("applies the pool bounds to the beneficiary", () => {
    openBridgePool();
    h.vesting.addLock(user2, 0n, units("20"), T0 + DAY, T0 + WEEK, deployer);
    h.clock.setTo(T0 + 5n * DAY);

    // 20 * 4/6 is above the per-caller cap of 10
    expectLedgerError(() => h.vesting.claim2stake(user2), "PoolMaxStake");
    expect(h.vesting.vest(user2, 0).claimed).toBe(0n);
    expect(h.vesting.claimable(user2)).toBe(13333333333333333333n);
  });

  it("detects a reclaimed bridge pool by its hash", () => {
    openBridgePool();
    // second pool outlives the first and moves into slot 0 on reclamation
    h.staking.createPool(poolParams({ endTime: T0 + 3n * WEEK }), deployer);
    h.clock.setTo(T0 + 4n * DAY);
    h.vesting.claim2stake(user1);

    h.clock.setTo(T0 + WEEK);
    expect(h.staking.reclaimExpiredPools(deployer)).toBe(units("0.95")); // (100 - 5) * 1%
    expect(h.staking.poolCount()).toBe(1);

    expectLedgerError(() => h.vesting.claim2stake(user1), "PoolHashMismatch");
    expect(h.vesting.vest(user1, 0).claimed).toBe(units("5"));
    expect(h.vesting.vestedTotal()).toBe(units("5"));

    // after rebinding, the surviving pool's bounds (1..2) apply
    h.staking.setBridgePool(0, deployer);
    expectLedgerError(() => h.vesting.claim2stake(user1), "PoolMaxStake");
  });
});
