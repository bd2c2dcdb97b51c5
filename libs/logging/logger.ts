import pino from "pino";
import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "query-timing-correlator"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

export interface RunLogContext {
  readonly runId: string;
  readonly mode: string;
  readonly warehouseId?: string;
}

/**
 * Returns a child logger with correlation run context attached.
 */
export function getRunLogger(context: RunLogContext) {
  return logger.child({
    runId: context.runId,
    mode: context.mode,
    warehouseId: context.warehouseId
  });
}
