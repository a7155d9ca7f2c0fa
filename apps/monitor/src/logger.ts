import pino from "pino";
import type { BaseLogger, Logger } from "pino";

/** The subset of pino the runtime logs through; Fastify's `app.log` satisfies it too. */
export type MonitorLogger = Pick<BaseLogger, "info" | "warn" | "error" | "debug">;

export function createLogger(level = "info"): Logger {
  return pino({ name: "wristcheck-monitor", level });
}
