/**
 * stakevest keeper v0.3.0
 *
 * Responsibilities:
 *   - Deploy a staking/vesting ledger pair from a JSON scenario.
 *   - Sweep closed pools back to the administrator every tick.
 *   - Audit both ledgers' token balances against their counters.
 *
 * Usage:
 *   npm start -w @stakevest/keeper               — run the duty loop
 *   npm start -w @stakevest/keeper -- --reclaim  — one sweep + audit, then exit
 *
 * The scenario's genesisOffset backdates the replay, so pools whose window
 * ended before now are swept on the first tick (devnet.json closes pool 0).
 *
 * Environment variables (see .env.example):
 *   KEEPER_SCENARIO, KEEPER_ADMIN, KEEPER_INTERVAL_MS, LOG_LEVEL
 */

import { systemClock } from "@stakevest/ledger";
import { config } from "./config";
import { Keeper } from "./keeper";
import { logger } from "./logger";
import { deployScenario, loadScenario } from "./scenario";

async function main() {
  logger.info("stakevest keeper v0.3.0");
  logger.info(`Scenario: ${config.scenarioPath}`);

  const scenario = await loadScenario(config.scenarioPath);
  const deployment = deployScenario(scenario, systemClock);

  const keeper = new Keeper(deployment, {
    administrator: config.administrator || deployment.administrator,
    tickIntervalMs: config.keeper.tickIntervalMs,
  });

  if (process.argv.includes("--reclaim")) {
    const report = keeper.runTick();
    logger.info(`CLI: single sweep done, ledgers ${report.balanced ? "balanced" : "UNBALANCED"}.`);
    process.exit(report.balanced ? 0 : 2);
  }

  keeper.start();

  // Graceful shutdown on SIGINT / SIGTERM
  const shutdown = () => {
    keeper.stop();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  logger.error(`Fatal: ${err}`);
  process.exit(1);
});
