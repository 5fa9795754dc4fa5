/**
 * Registry and logging configuration.
 *
 * `RegistryConfig` is what callers pass to `new Registry()`;
 * `resolveRegistryConfig` fills in defaults and validates it. Logging is
 * configured from the environment:
 *
 *   CALLABLE_REGISTRY_LOG_LEVEL - trace, debug, info, warn, error, fatal, silent (default: info)
 *   CALLABLE_REGISTRY_ENV       - development enables pretty output (falls back to NODE_ENV)
 */

import type { RegistryEventEmitter } from '../events/event-emitter.js';
import { InvalidRegistrationError } from '../registry/errors.js';

/**
 * Configuration for a registry instance.
 */
export interface RegistryConfig {
  /** Registry name used in logs, events and toString() (default: "default"). */
  name?: string;

  /**
   * Pass each entry's metadata to its implementation as one trailing
   * argument (default: false).
   */
  bindMetadata?: boolean;

  /** Emit dispatch.* events around every invocation (default: true). */
  trace?: boolean;

  /** Emitter to publish events on. A new one is created when omitted. */
  events?: RegistryEventEmitter;
}

/**
 * Registry configuration with defaults applied.
 */
export interface ResolvedRegistryConfig {
  name: string;
  bindMetadata: boolean;
  trace: boolean;
  events?: RegistryEventEmitter;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Logging configuration read from the environment.
 */
export interface LoggingConfig {
  level: LogLevel;

  /** Use the pino-pretty transport */
  pretty: boolean;
}

export const DEFAULT_REGISTRY_NAME = 'default';

/**
 * Apply defaults to a registry configuration.
 *
 * @throws InvalidRegistrationError if the name is empty or not a string
 */
export function resolveRegistryConfig(config?: RegistryConfig): ResolvedRegistryConfig {
  if (!config) {
    return { name: DEFAULT_REGISTRY_NAME, bindMetadata: false, trace: true };
  }

  const name = config.name ?? DEFAULT_REGISTRY_NAME;
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new InvalidRegistrationError('Registry name must be a non-empty string');
  }

  return {
    name,
    bindMetadata: config.bindMetadata ?? false,
    trace: config.trace ?? true,
    events: config.events,
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Read logging configuration from environment variables.
 *
 * Unknown log levels fall back to "info".
 */
export function loggingConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const rawLevel = env.CALLABLE_REGISTRY_LOG_LEVEL?.trim().toLowerCase();
  const environment = env.CALLABLE_REGISTRY_ENV ?? env.NODE_ENV;

  return {
    level: isLogLevel(rawLevel) ? rawLevel : 'info',
    pretty: environment === 'development',
  };
}
