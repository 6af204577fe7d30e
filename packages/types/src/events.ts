// Notifications published by the ledgers for observers and indexers

import type { Principal } from "./pool";

export interface StakingEvents {
  Deposit: { caller: Principal; poolIndex: number; amount: bigint; unlockTime: bigint };
  Withdraw: { caller: Principal; amount: bigint };
  PoolCreated: { poolIndex: number; poolHash: string; reward: bigint };
  PoolsReclaimed: { removed: number; amount: bigint };
  BridgePoolUpdated: { poolIndex: number; poolHash: string };
}

export interface VestingEvents {
  VestingAdded: {
    beneficiary: Principal;
    startAmount: bigint;
    totalAmount: bigint;
    startDate: bigint;
    endDate: bigint;
  };
  Claimed: { caller: Principal; amount: bigint };
  StakingLedgerBound: { staking: Principal };
}

export interface AdministrationEvents {
  // `to` is null once administration has been renounced
  AdministratorChanged: { from: Principal; to: Principal | null };
}
