import { pino } from 'pino';
import type { DestinationStream, LevelWithSilent, Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
  /** Defaults to stdout. */
  destination?: DestinationStream;
}

/** Root logger for the arbiter. Components take `child({ component })` loggers from it. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? 'audio-arbiter',
      level: options.level ?? 'info',
    },
    options.destination,
  );
}
