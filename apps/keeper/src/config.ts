import "dotenv/config";
import { fileURLToPath } from "node:url";

export const config = {
  // JSON scenario the keeper deploys its ledgers from (see scenarios/devnet.json).
  scenarioPath:
    process.env.KEEPER_SCENARIO ||
    fileURLToPath(new URL("../scenarios/devnet.json", import.meta.url)),

  // Principal the keeper acts as when reclaiming. Empty = the scenario's
  // administrator.
  administrator: process.env.KEEPER_ADMIN || "",

  keeper: {
    // How often to sweep closed pools and audit balances.
    // Pools close on wall-clock time, so once a minute is plenty.
    tickIntervalMs: Number(process.env.KEEPER_INTERVAL_MS || 60_000),
  },
} as const;
