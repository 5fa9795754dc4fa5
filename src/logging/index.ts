/**
 * Structured logging API.
 *
 * All log messages go through one root pino logger, created on first use
 * from the environment (see `loggingConfigFromEnv`). Development
 * environments get the pino-pretty transport; everything else writes JSON
 * lines to stdout.
 */

import { type Logger, type LoggerOptions, pino } from 'pino';
import { type LogLevel, loggingConfigFromEnv } from '../config/types.js';

/**
 * Structured logging fields.
 *
 * All fields are optional. Common fields include:
 * - component: Component/subsystem identifier (e.g., "registry", "invoker")
 * - operation: Operation being performed (e.g., "register", "dispatch")
 * - registry: Registry name
 * - key: Dispatch key
 * - signature: Formatted entry signature
 * - error_message: Error message for error logs
 * - duration_ms: Execution duration for timed operations
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

let rootLogger: Logger | null = null;

function createRootLogger(): Logger {
  const config = loggingConfigFromEnv();
  const options: LoggerOptions = {
    name: 'callable-registry',
    level: config.level,
  };

  if (config.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(options);
}

/**
 * Get the root logger, creating it on first use.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  return rootLogger;
}

/**
 * Replace the root logger, e.g. with one writing to a custom destination.
 *
 * @example
 * configureLogger(pino({ level: 'debug' }, pino.destination('/var/log/registry.log')));
 */
export function configureLogger(logger: Logger): void {
  rootLogger = logger;
}

/**
 * Drop the root logger so the next log call rebuilds it from the environment.
 */
export function resetLogger(): void {
  rootLogger = null;
}

/**
 * Check whether the root logger writes messages at `level`.
 */
export function isLevelEnabled(level: LogLevel): boolean {
  return getRootLogger().isLevelEnabled(level);
}

/**
 * Copy fields for pino, without undefined values.
 */
function toPinoFields(fields?: LogFields): Record<string, string | number | boolean | null> {
  const result: Record<string, string | number | boolean | null> = {};
  if (!fields) {
    return result;
  }

  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Log an ERROR level message with structured fields.
 *
 * @example
 * logError('Listener crashed', {
 *   component: 'registry-events',
 *   error_message: 'boom',
 * });
 */
export function logError(message: string, fields?: LogFields): void {
  getRootLogger().error(toPinoFields(fields), message);
}

/**
 * Log a WARN level message with structured fields.
 */
export function logWarn(message: string, fields?: LogFields): void {
  getRootLogger().warn(toPinoFields(fields), message);
}

/**
 * Log an INFO level message with structured fields.
 *
 * Use this for lifecycle events and state transitions.
 */
export function logInfo(message: string, fields?: LogFields): void {
  getRootLogger().info(toPinoFields(fields), message);
}

/**
 * Log a DEBUG level message with structured fields.
 *
 * @example
 * logDebug('Registered entry', {
 *   component: 'registry',
 *   key: 'area',
 *   signature: '(Circle)',
 * });
 */
export function logDebug(message: string, fields?: LogFields): void {
  getRootLogger().debug(toPinoFields(fields), message);
}

/**
 * Log a TRACE level message with structured fields.
 *
 * Used for per-dispatch selection details; disabled at the default level.
 */
export function logTrace(message: string, fields?: LogFields): void {
  getRootLogger().trace(toPinoFields(fields), message);
}

/**
 * Logger with preset fields.
 */
export interface ComponentLogger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

/**
 * Create a logger with preset fields.
 *
 * @example
 * const logger = createLogger({ component: 'registry' });
 * logger.info('Registered entry', { key: 'area' });
 * // Logs: { component: 'registry', key: 'area' }
 */
export function createLogger(defaultFields: LogFields): ComponentLogger {
  const mergeFields = (fields?: LogFields): LogFields => ({
    ...defaultFields,
    ...fields,
  });

  return {
    error: (message, fields) => logError(message, mergeFields(fields)),
    warn: (message, fields) => logWarn(message, mergeFields(fields)),
    info: (message, fields) => logInfo(message, mergeFields(fields)),
    debug: (message, fields) => logDebug(message, mergeFields(fields)),
    trace: (message, fields) => logTrace(message, mergeFields(fields)),
  };
}
