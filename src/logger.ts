import pino, { type Logger } from 'pino';
import type { GameConfig } from './config';

/** Stdout is the playfield, so logs only ever go to a file. */
export function createLogger(config: Pick<GameConfig, 'logLevel' | 'logFile'>): Logger {
  if (!config.logFile) {
    return pino({ enabled: false });
  }
  return pino({
    name: 'skyguard',
    level: config.logLevel,
    transport: {
      target: 'pino/file',
      options: { destination: config.logFile, mkdir: true },
    },
  });
}
