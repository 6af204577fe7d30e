export type { Principal, PoolParams, Pool, BridgeTarget } from "./pool";
export type { Position, PositionSummary } from "./position";
export type { Vest, VestParams } from "./vest";
export type { StakingEvents, VestingEvents, AdministrationEvents } from "./events";
