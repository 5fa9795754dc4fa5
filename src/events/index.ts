/**
 * Events module for registry lifecycle and dispatch tracing.
 *
 * Provides event names and the typed emitter.
 */

// Event emitter
export {
  type DispatchFailedPayload,
  type DispatchReturnedPayload,
  type DispatchSelectedPayload,
  type EntryEventPayload,
  type EntryOverriddenPayload,
  RegistryEventEmitter,
  type RegistryEventMap,
} from './event-emitter.js';
// Event names
export {
  type DispatchEventName,
  DispatchEventNames,
  type EventName,
  EventNames,
  type RegistryEventName,
  RegistryEventNames,
} from './event-names.js';
