import pino, { type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export function createLogger(level: LevelWithSilent = "info"): Logger {
  return pino({
    level,
    base: { service: "playlist-transcripts" },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** For tests and for components built without a parent logger. */
export const silentLogger: Logger = pino({ level: "silent" });
