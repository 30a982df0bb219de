import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
  name?: string;
}

/**
 * Structured logger for the CLI and the aggregator. Pretty printing is for local runs only;
 * anything shipped to a log pipeline should stay on plain JSON lines.
 */
export const createLogger = (options: LoggerOptions = {}): Logger =>
  pino({
    name: options.name ?? 'jp-market-metrics',
    level: options.level ?? 'info',
    ...(options.pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss',
              ignore: 'pid,hostname',
            },
          },
        }
      : {}),
  });

export const silentLogger = (): Logger => pino({ level: 'silent' });
