/**
 * Pino logging for the factory engine.
 *
 * The engine logs at `debug` level; the shared logger is silent unless
 * `FACTORY_LOG_LEVEL` says otherwise.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@forgekit/factory';
 *
 * const logger = createLogger({ level: 'debug', pretty: true });
 * const post = new PostFactory({ logger }).make();
 * ```
 *
 * @module
 */
import { type DestinationStream, type Logger, pino } from 'pino';
import { getConfig, type LogLevel } from './config';

export type { Logger };

export interface CreateLoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  /** Write JSON lines to this stream instead of stdout */
  destination?: DestinationStream;
}

/**
 * Creates a pino logger for factory output.
 *
 * @param options - Logger configuration options
 * @returns A configured pino logger instance
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pretty = options.pretty && process.env.NODE_ENV !== 'production';
  const baseOptions = pretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }
    : {};

  const loggerOptions = {
    ...baseOptions,
    level: options.level ?? 'info',
    base: { component: 'factory' },
    formatters: {
      level: (label: string) => {
        return { level: label.toUpperCase() };
      },
    },
  };

  return options.destination && !pretty
    ? pino(loggerOptions, options.destination)
    : pino(loggerOptions);
}

let shared: Logger | undefined;

/**
 * The engine-wide logger, configured from the environment on first use.
 */
export function getLogger(): Logger {
  if (!shared) {
    const config = getConfig();
    shared = createLogger({ level: config.logLevel, pretty: config.prettyLogs });
  }
  return shared;
}
