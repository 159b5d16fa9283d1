import { pino, type LevelWithSilent, type Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent"
] as const satisfies readonly LevelWithSilent[];

export function createLogger(level: LevelWithSilent): Logger {
  return pino({
    level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  });
}
