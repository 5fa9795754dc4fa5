/**
 * callable-registry
 *
 * Register several implementations under one operation name and dispatch
 * to the most specific one for the runtime types of the arguments.
 *
 * @packageDocumentation
 */

// =============================================================================
// Registry - registration, resolution and dispatch
// =============================================================================
export * from './registry/index.js';

// =============================================================================
// Events module
// =============================================================================
export * from './events/index.js';

// =============================================================================
// Configuration
// =============================================================================
export * from './config/index.js';

// =============================================================================
// Logging API
// =============================================================================
export {
  type ComponentLogger,
  configureLogger,
  createLogger,
  getRootLogger,
  isLevelEnabled,
  type LogFields,
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
  resetLogger,
} from './logging/index.js';
