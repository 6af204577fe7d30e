/**
 * scenario.ts
 *
 * Declarative ledger deployment. A scenario names the token, the principals
 * involved, genesis balances, and the pools and locks to open. Times are
 * offsets in seconds from genesis so the same file can be replayed at any
 * wall-clock time. Genesis is `genesisOffset` seconds before the deployment
 * clock's current time, which lets a replay start with pools already closed.
 *
 * Amounts are base-unit integers written as decimal strings, since 10^18
 * scale values do not fit a JSON number.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import {
  MemoryToken,
  StakingLedger,
  TwoStepAdministration,
  UNLIMITED_ALLOWANCE,
  VestingLedger,
  type Clock,
} from "@stakevest/ledger";
import type { Principal } from "@stakevest/types";
import { logger } from "./logger";

// -----------------------------------------------------------------------
// Schema
// -----------------------------------------------------------------------

const amount = z
  .union([z.string().regex(/^\d+$/, "expected a non-negative integer"), z.number().int().nonnegative()])
  .transform((v) => BigInt(v));

const principal = z.string().min(1);

const poolSchema = z.object({
  minStake:        amount,
  maxStake:        amount,
  startOffset:     amount,
  duration:        amount,
  rewardRateMilli: amount,
  lockPeriod:      amount,
  maxTotalStaked:  amount,
});

const lockSchema = z.object({
  beneficiary: principal,
  startAmount: amount,
  totalAmount: amount,
  startOffset: amount,
  duration:    amount,
});

export const scenarioSchema = z.object({
  token: z.object({
    name:     z.string().min(1),
    symbol:   z.string().min(1),
    decimals: z.number().int().min(0).max(36).default(18),
  }),
  administrator: principal,
  staking:       principal,
  vesting:       principal,
  balances:      z.record(principal, amount).default({}),
  pools:         z.array(poolSchema).default([]),
  locks:         z.array(lockSchema).default([]),
  bridgePool:    z.number().int().nonnegative().optional(),
  genesisOffset: amount.default(0),
});

export type Scenario = z.infer<typeof scenarioSchema>;

export interface Deployment {
  token: MemoryToken;
  administration: TwoStepAdministration;
  staking: StakingLedger;
  vesting: VestingLedger;
  administrator: Principal;
}

// -----------------------------------------------------------------------
// Loading
// -----------------------------------------------------------------------

export function parseScenario(raw: unknown): Scenario {
  const result = scenarioSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid scenario — ${detail}`);
  }
  return result.data;
}

export async function loadScenario(path: string): Promise<Scenario> {
  const text = await readFile(path, "utf8");
  return parseScenario(JSON.parse(text));
}

// -----------------------------------------------------------------------
// Deployment
// -----------------------------------------------------------------------

/**
 * Build the token, the administration gate and both ledgers, wire the
 * bridge, then open every pool and lock the scenario lists.
 */
export function deployScenario(scenario: Scenario, clock: Clock): Deployment {
  const admin = scenario.administrator;
  const genesis = clock.now() - scenario.genesisOffset;

  // Ledgers see genesis while the scenario is replayed, then `clock`.
  let replaying = true;
  const ledgerClock: Clock = { now: () => (replaying ? genesis : clock.now()) };

  const token = new MemoryToken(scenario.token.name, scenario.token.symbol, scenario.token.decimals);
  for (const [holder, balance] of Object.entries(scenario.balances)) {
    token.mint(holder, balance);
  }

  const administration = new TwoStepAdministration(admin);
  const vesting = new VestingLedger({
    address: scenario.vesting,
    token,
    administration,
    clock: ledgerClock,
  });
  const staking = new StakingLedger({
    address: scenario.staking,
    vestingAddress: scenario.vesting,
    token,
    administration,
    clock: ledgerClock,
  });
  vesting.setStakingLedger(staking, admin);

  token.approve(admin, staking.address, UNLIMITED_ALLOWANCE);
  token.approve(admin, vesting.address, UNLIMITED_ALLOWANCE);

  for (const pool of scenario.pools) {
    const startTime = genesis + pool.startOffset;
    staking.createPool(
      {
        minStake:        pool.minStake,
        maxStake:        pool.maxStake,
        startTime,
        endTime:         startTime + pool.duration,
        rewardRateMilli: pool.rewardRateMilli,
        lockPeriod:      pool.lockPeriod,
        maxTotalStaked:  pool.maxTotalStaked,
      },
      admin
    );
  }

  for (const lock of scenario.locks) {
    const startDate = genesis + lock.startOffset;
    vesting.addLock(
      lock.beneficiary,
      lock.startAmount,
      lock.totalAmount,
      startDate,
      startDate + lock.duration,
      admin
    );
  }

  if (scenario.bridgePool !== undefined) {
    staking.setBridgePool(scenario.bridgePool, admin);
  }

  replaying = false;
  logger.info(
    `Deployed ${scenario.pools.length} pool(s) and ${scenario.locks.length} lock(s) ` +
    `for ${scenario.token.symbol}`
  );
  return { token, administration, staking, vesting, administrator: admin };
}
