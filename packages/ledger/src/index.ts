export { StakingLedger } from "./staking-ledger";
export type { StakingLedgerOptions } from "./staking-ledger";
export { VestingLedger } from "./vesting-ledger";
export type { VestingLedgerOptions, Claim2StakeResult } from "./vesting-ledger";
export { CrossLedgerBridge } from "./bridge";
export type { StakingCounterpart } from "./bridge";
export { PoolRegistry, poolReserve, unusedReserve, validatePoolParams } from "./pool-registry";
export type { ReclaimResult } from "./pool-registry";
export { PositionLedger } from "./position-ledger";
export { RewardAccountant, rewardFor } from "./reward-accountant";
export type { AccountantSnapshot } from "./reward-accountant";
export { VestingSchedule, claimableAt, releasedAt } from "./vesting-schedule";
export { derivePoolHash } from "./pool-hash";
export { TwoStepAdministration, requireAdministrator } from "./administration";
export type { Administration } from "./administration";
export { MemoryToken, UNLIMITED_ALLOWANCE } from "./token";
export type { FungibleToken } from "./token";
export { ManualClock, systemClock } from "./clock";
export type { Clock } from "./clock";
export { LedgerError, isLedgerError, ERROR_IDS } from "./errors";
export type { LedgerErrorCode, LedgerErrorCategory } from "./errors";
export { LedgerEmitter } from "./events";
export { createLogger } from "./logger";
export type { Logger } from "./logger";
export { poolParamsSchema, vestParamsSchema, uint, UINT_MAX } from "./schemas";
