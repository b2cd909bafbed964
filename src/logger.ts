import { type Logger, type LevelWithSilent, pino } from "pino";

export type { Logger, LevelWithSilent };

export function createLogger(level: LevelWithSilent = "info"): Logger {
  return pino({ name: "datebook", level });
}
