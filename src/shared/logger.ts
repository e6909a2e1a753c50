// Logging (pino)
import { pino, destination, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export interface LoggerOptions {
  name: string;
  level?: LevelWithSilent;
  /** File descriptor to write to; stdout unless given. */
  fd?: number;
}

export function createLogger({ name, level = "info", fd = 1 }: LoggerOptions): Logger {
  return pino({ name, level }, destination(fd));
}

// Loggers for tests and for callers that pass none.
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
