/**
 * Logging
 *
 * Converters only depend on the `Logger` interface. `createLogger` builds
 * the default winston logger, which writes every level to stderr so stdout
 * stays free for converted output.
 */

import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  label?: string;
  silent?: boolean;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

/**
 * Create a winston logger. The level falls back to `ADF_LOG_LEVEL`, then `warn`.
 */
export function createLogger(config: LoggerConfig = {}): winston.Logger {
  const envLevel = process.env.ADF_LOG_LEVEL;
  const level = config.level ?? (isLogLevel(envLevel) ? envLevel : 'warn');

  return winston.createLogger({
    level,
    silent: config.silent ?? false,
    format: winston.format.combine(
      winston.format.label({ label: config.label ?? 'asciidoc-adf' }),
      winston.format.printf(info => `[${String(info.label)}] ${info.level.toUpperCase()}: ${String(info.message)}`)
    ),
    transports: [
      new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })
    ]
  });
}

let defaultLogger: Logger | undefined;

/**
 * Shared logger used when a caller does not inject one
 */
export function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger();
  return defaultLogger;
}
