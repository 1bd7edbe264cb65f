import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

/** Root logger for the service and scripts; children carry page ids */
export function createLogger(level: LevelWithSilent = "info"): Logger {
  return pino({ name: "layout-correct", level });
}

/** Logger that drops everything, for tests and library callers */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
