import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from "pino";
import { DEFAULT_LOG_LEVEL } from "../configs";

export type { Logger };

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime,
});

export function createLogger(level: string = DEFAULT_LOG_LEVEL): Logger {
  return pino(createLoggerOptions(level));
}

/**
 * Logger that drops everything; the default when the host passes none.
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
