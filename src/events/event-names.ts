/**
 * Standard event names emitted by a registry.
 *
 * These constants provide type-safe event names for subscribers.
 */

/**
 * Event names for registration lifecycle
 */
export const RegistryEventNames = {
  /** Emitted after an entry is added under a key */
  ENTRY_REGISTERED: 'entry.registered',

  /** Emitted after an entry is removed through its handle or unregisterAll() */
  ENTRY_UNREGISTERED: 'entry.unregistered',

  /** Emitted when an override registration retires an earlier entry */
  ENTRY_OVERRIDDEN: 'entry.overridden',
} as const;

/**
 * Event names for dispatch tracing
 */
export const DispatchEventNames = {
  /** Emitted after resolution, before the implementation is called */
  DISPATCH_SELECTED: 'dispatch.selected',

  /** Emitted after the implementation returns */
  DISPATCH_RETURNED: 'dispatch.returned',

  /** Emitted when the implementation throws, before the error propagates */
  DISPATCH_FAILED: 'dispatch.failed',
} as const;

/**
 * All event names combined
 */
export const EventNames = {
  ...RegistryEventNames,
  ...DispatchEventNames,
} as const;

/**
 * Type representing all possible event names
 */
export type EventName = (typeof EventNames)[keyof typeof EventNames];

/**
 * Type representing registration event names
 */
export type RegistryEventName = (typeof RegistryEventNames)[keyof typeof RegistryEventNames];

/**
 * Type representing dispatch event names
 */
export type DispatchEventName = (typeof DispatchEventNames)[keyof typeof DispatchEventNames];
