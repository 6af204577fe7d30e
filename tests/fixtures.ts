import { expect } from "vitest";
import {
  LedgerError,
  ManualClock,
  MemoryToken,
  StakingLedger,
  TwoStepAdministration,
  UNLIMITED_ALLOWANCE,
  VestingLedger,
  type LedgerErrorCode,
} from "@stakevest/ledger";
import type { PoolParams, Principal } from "@stakevest/types";

// -----------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------

export const TOKEN = 10n ** 18n; // 1 token in base units
export const DAY   = 86_400n;
export const WEEK  = 7n * DAY;
export const T0    = 1_700_000_000n; // clock start for every harness

export const deployer = "ST1PQHQKV0RJXZFY1DGX8MNSNYVE3VGZJSRTPGZGM";
export const wallet1  = "ST1SJ3DTE5DN7X54YDH5D64R3BCB6A2AG2ZQ8YPD5";
export const wallet2  = "ST2CY5V39NHDPWSXMW9QDT3HC3GD6Q6XX4CFRK9AG";
export const wallet3  = "ST2JHG361ZXG51QTKY2NQCVBPPRRE2KZB1HR05NNC";
export const wallet4  = "ST2NEB84ASENDXKYGJPQW86YXQCEFEX2ZQPG87ND";
export const wallet5  = "ST2REHHS5J3CERCRBEPMGH7921Q6PYKAADT7JP2VB";

export const STAKING = `${deployer}.staking`;
export const VESTING = `${deployer}.vesting`;

// -----------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------

/** Decimal token string to base units, like toWei: "0.1" → 10^17. */
export function units(tokens: string): bigint {
  const [whole, frac = ""] = tokens.split(".");
  return BigInt(whole) * TOKEN + BigInt(frac.padEnd(18, "0"));
}

/** Token whose outgoing transfers can be switched off per sender. */
export class FlakyToken extends MemoryToken {
  readonly blocked = new Set<Principal>();

  override transfer(sender: Principal, to: Principal, amount: bigint): boolean {
    if (this.blocked.has(sender)) return false;
    return super.transfer(sender, to, amount);
  }
}

export interface Harness {
  clock: ManualClock;
  token: FlakyToken;
  administration: TwoStepAdministration;
  staking: StakingLedger;
  vesting: VestingLedger;
}

/**
 * Fresh token + ledger pair at T0. The deployer holds `supply` and, unless
 * `approve` is false, has granted both ledgers an unlimited allowance.
 */
export function setup(options: { supply?: bigint; approve?: boolean } = {}): Harness {
  const clock = new ManualClock(T0);
  const token = new FlakyToken("Stakevest Token", "SVT");
  token.mint(deployer, options.supply ?? 1_000_000n * TOKEN);

  const administration = new TwoStepAdministration(deployer);
  const vesting = new VestingLedger({ address: VESTING, token, administration, clock });
  const staking = new StakingLedger({
    address: STAKING,
    vestingAddress: VESTING,
    token,
    administration,
    clock,
  });

  if (options.approve ?? true) {
    token.approve(deployer, STAKING, UNLIMITED_ALLOWANCE);
    token.approve(deployer, VESTING, UNLIMITED_ALLOWANCE);
  }
  return { clock, token, administration, staking, vesting };
}

/** Give `who` tokens and let the staking ledger pull them. */
export function fund(h: Harness, who: Principal, amount: bigint = 1000n * TOKEN): void {
  h.token.transfer(deployer, who, amount);
  h.token.approve(who, STAKING, UNLIMITED_ALLOWANCE);
}

/** Pool opening a day after T0 and closing a week after T0. */
export function poolParams(overrides: Partial<PoolParams> = {}): PoolParams {
  return {
    minStake:        TOKEN,
    maxStake:        2n * TOKEN,
    startTime:       T0 + DAY,
    endTime:         T0 + WEEK,
    rewardRateMilli: 10n,
    lockPeriod:      WEEK,
    maxTotalStaked:  10n * TOKEN,
    ...overrides,
  };
}

/** Assert that `fn` throws a LedgerError with the given code. */
export function expectLedgerError(fn: () => unknown, code: LedgerErrorCode): void {
  let thrown: unknown;
  try {
    fn();
  } catch (err) {
    thrown = err;
  }
  expect(thrown).toBeInstanceOf(LedgerError);
  expect(thrown).toHaveProperty("code", code);
}
