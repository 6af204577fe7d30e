import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  // keep test output clean unless a level is asked for explicitly
  return process.env.VITEST || process.env.NODE_ENV === "test" ? "silent" : "info";
}

const root = pino({
  level: defaultLevel(),
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** Child logger tagged with the component name. */
export function createLogger(component: string): Logger {
  return root.child({ component });
}
