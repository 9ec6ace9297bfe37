/**
 * Structured logging for sensorcorr
 */

import pino from 'pino';
import { getConfig, getDefaultConfig, type Config } from '../config/index.js';
import { ConfigurationError } from '../errors/index.js';

export type LogLevel = Config['logLevel'];

// Re-export pino.Logger type for convenience
export type Logger = pino.Logger;

export interface LogContext {
  component?: string;
  [key: string]: unknown;
}

// Logging must not fail on a bad environment; fall back to the defaults
function resolveLoggerConfig(): { config: Config; configError?: ConfigurationError } {
  try {
    return { config: getConfig() };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return { config: getDefaultConfig(), configError: error };
    }
    throw error;
  }
}

// Create base logger
function createBaseLogger(): pino.Logger {
  const { config, configError } = resolveLoggerConfig();
  const logger = pino({
    level: config.logLevel,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: {
      service: config.serviceName,
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });

  if (configError) {
    logger.warn({ err: configError }, 'Invalid configuration, logging with defaults');
  }
  return logger;
}

// Singleton logger instance
let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = createBaseLogger();
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

// Convenience function to create a named logger
export function createLogger(name: string): pino.Logger {
  return createChildLogger({ component: name });
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}
