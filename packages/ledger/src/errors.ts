/**
 * errors.ts
 *
 * Every ledger failure is a LedgerError carrying a named code and a stable
 * numeric id. Ids are grouped by hundreds the way Clarity contracts number
 * their `(err uN)` constants:
 *
 *   1xx  authorization
 *   2xx  input validation (caller-correctable)
 *   3xx  state precondition / misconfiguration
 *   4xx  token collaborator failure
 *   5xx  internal accounting invariant
 */

export const ERROR_IDS = {
  OnlyAdministrator:           100,
  OnlyPendingAdministrator:    101,
  OnlyVestingContract:         102,

  WrongPoolIndex:              200,
  PoolNotYetOpen:              201,
  AlreadyClosed:               202,
  PoolMinStake:                203,
  PoolMaxStake:                204,
  PoolIsFull:                  205,
  ZeroAmount:                  206,
  ZeroAddress:                 207,
  TimestampsMisconfigured:     208,
  StartDateInPast:             209,
  InvalidPoolBounds:           210,
  WrongStakeIndex:             211,
  WrongVestIndex:              212,
  InvalidInput:                213,

  NoStakesForCaller:           300,
  NoLocksForCaller:            301,
  NothingToClaim:              302,
  NothingToReclaim:            303,
  PoolHashMismatch:            304,
  StakeContractNotSet:         305,
  BridgePoolNotSet:            306,
  ContractAlreadySet:          307,
  ContractMismatch:            308,

  TransferFailed:              400,

  AccountingInvariantViolated: 500,
} as const;

export type LedgerErrorCode = keyof typeof ERROR_IDS;

export type LedgerErrorCategory =
  | "authorization"
  | "validation"
  | "precondition"
  | "collaborator"
  | "invariant";

const MESSAGES: Record<LedgerErrorCode, string> = {
  OnlyAdministrator:           "Only for administrator",
  OnlyPendingAdministrator:    "Only for pending administrator",
  OnlyVestingContract:         "Only for vesting contract",
  WrongPoolIndex:              "Wrong pool index",
  PoolNotYetOpen:              "Pool not yet open",
  AlreadyClosed:               "Already closed",
  PoolMinStake:                "Pool min stake per user",
  PoolMaxStake:                "Pool max stake per user",
  PoolIsFull:                  "Pool is full",
  ZeroAmount:                  "Zero amount",
  ZeroAddress:                 "Zero address",
  TimestampsMisconfigured:     "Timestamps misconfigured",
  StartDateInPast:             "startDate below current time",
  InvalidPoolBounds:           "Pool stake bounds misconfigured",
  WrongStakeIndex:             "Wrong stake index",
  WrongVestIndex:              "Wrong vesting index",
  InvalidInput:                "Invalid input",
  NoStakesForCaller:           "No stakes for user",
  NoLocksForCaller:            "No locks for user",
  NothingToClaim:              "Nothing to claim",
  NothingToReclaim:            "Nothing to reclaim",
  PoolHashMismatch:            "Pool hash mismatch",
  StakeContractNotSet:         "Stake contract not set",
  BridgePoolNotSet:            "Claim2stake pool not set",
  ContractAlreadySet:          "Contract already set",
  ContractMismatch:            "Counterpart does not point back",
  TransferFailed:              "Token transfer failed",
  AccountingInvariantViolated: "Accounting invariant violated",
};

const CATEGORIES: Record<number, LedgerErrorCategory> = {
  1: "authorization",
  2: "validation",
  3: "precondition",
  4: "collaborator",
  5: "invariant",
};

export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly id: number;
  public readonly category: LedgerErrorCategory;

  constructor(code: LedgerErrorCode, detail?: string) {
    super(detail ? `${MESSAGES[code]}: ${detail}` : MESSAGES[code]);
    this.name = "LedgerError";
    this.code = code;
    this.id = ERROR_IDS[code];
    this.category = CATEGORIES[Math.floor(this.id / 100)] ?? "invariant";
  }
}

/** Narrow an unknown thrown value, optionally to one specific code. */
export function isLedgerError(err: unknown, code?: LedgerErrorCode): err is LedgerError {
  return err instanceof LedgerError && (code === undefined || err.code === code);
}
