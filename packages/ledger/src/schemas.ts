import { z } from "zod";
import type { PoolParams, VestParams } from "@stakevest/types";
import { LedgerError } from "./errors";

// Clarity uint: 0 ..= 2^128 - 1
export const UINT_MAX = 2n ** 128n - 1n;
export const uint = z.bigint().nonnegative().lte(UINT_MAX);

export const poolParamsSchema = z.object({
  minStake:        uint,
  maxStake:        uint,
  startTime:       uint,
  endTime:         uint,
  rewardRateMilli: uint,
  lockPeriod:      uint,
  maxTotalStaked:  uint,
});

export const vestParamsSchema = z.object({
  startAmount: uint,
  totalAmount: uint,
  startDate:   uint,
  endDate:     uint,
});

function parseOrThrow<T>(schema: z.ZodType<T>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new LedgerError("InvalidInput", issue ? `${issue.path.join(".")} ${issue.message}` : undefined);
  }
  return result.data;
}

export function parsePoolParams(input: PoolParams): PoolParams {
  return parseOrThrow(poolParamsSchema, input);
}

export function parseVestParams(input: VestParams): VestParams {
  return parseOrThrow(vestParamsSchema, input);
}
