import { createHash } from "node:crypto";
import { serializeCV, tupleCV, uintCV } from "@stacks/transactions";
import type { PoolParams } from "@stakevest/types";

/**
 * Stable pool identity: sha256 over the Clarity consensus serialization of
 * the seven creation parameters, hex encoded. Identical parameters give an
 * identical hash.
 */
export function derivePoolHash(params: PoolParams): string {
  const tuple = tupleCV({
    "min-stake":         uintCV(params.minStake),
    "max-stake":         uintCV(params.maxStake),
    "start-time":        uintCV(params.startTime),
    "end-time":          uintCV(params.endTime),
    "reward-rate-milli": uintCV(params.rewardRateMilli),
    "lock-period":       uintCV(params.lockPeriod),
    "max-total-staked":  uintCV(params.maxTotalStaked),
  });
  return createHash("sha256").update(serializeCV(tuple)).digest("hex");
}
