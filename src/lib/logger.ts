/**
 * Pino logger factory.
 *
 * Library code logs to stderr only; stdout belongs to whatever embeds the
 * engine. Context is attached through child loggers (getLogger('remote')).
 */

import pino from 'pino';
import { config } from '@/lib/config';

let rootLogger: pino.Logger | null = null;

export interface LoggerConfig {
  level: string;
}

function createRootLogger(level: string): pino.Logger {
  return pino(
    {
      level,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2)
  );
}

/**
 * Replace the root logger. Call once at startup when the level
 * should differ from LOG_LEVEL.
 */
export function initLogger(loggerConfig: LoggerConfig): pino.Logger {
  rootLogger = createRootLogger(loggerConfig.level);
  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger(config.logging.level);
  }
  return rootLogger.child({ subsystem });
}

export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
