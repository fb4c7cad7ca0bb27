/**
 * Logging for the engine.
 *
 * Components depend on the small `Logger` interface; `createLogger` builds the
 * winston-backed default. Resolved values are never passed to the logger.
 */

import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type LogFormat = 'json' | 'simple';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(meta: Record<string, unknown>): Logger;
}

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
}

/**
 * Priority: explicit config, then STRATA_LOG_LEVEL / STRATA_LOG_FORMAT, then info/simple.
 * Under NODE_ENV=test only errors are logged unless a level is given explicitly.
 */
export function getLoggerConfig(config: Partial<LoggerConfig> = {}): LoggerConfig {
  const envLevel = parseLevel(process.env.STRATA_LOG_LEVEL);
  const fallback: LogLevel = process.env.NODE_ENV === 'test' ? 'error' : 'info';

  return {
    level: config.level ?? envLevel ?? fallback,
    format: config.format ?? (process.env.STRATA_LOG_FORMAT === 'json' ? 'json' : 'simple'),
  };
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  if (value === 'error' || value === 'warn' || value === 'info' || value === 'debug') return value;
  return undefined;
}

function createFormat(config: LoggerConfig): winston.Logform.Format {
  if (config.format === 'json') return winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json());

  return winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${metaStr}`;
    })
  );
}

export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  const resolved = getLoggerConfig(config);

  // Logs go to stderr so command output on stdout stays machine-readable
  return winston.createLogger({
    level: resolved.level,
    format: createFormat(resolved),
    transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] })],
    exitOnError: false,
  });
}
