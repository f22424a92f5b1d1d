/**
 * Logger
 *
 * Pino-based structured logger shared by every package. Log lines always go
 * to stderr; stdout belongs to the CLI's own output.
 */

import { pino, type Logger as PinoLogger } from 'pino';

export type Logger = PinoLogger;

export interface LoggerSettings {
  level: string;
  nodeEnv: string;
}

export function createRootLogger({ level, nodeEnv }: LoggerSettings): Logger {
  const options = {
    level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'remuxer',
      env: nodeEnv,
    },
  };

  if (nodeEnv === 'development') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(options, process.stderr);
}

export const logger = createRootLogger({
  level: process.env['LOG_LEVEL'] ?? 'info',
  nodeEnv: process.env['NODE_ENV'] ?? 'development',
});

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
