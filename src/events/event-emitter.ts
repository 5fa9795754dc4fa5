/**
 * Event emitter for registry lifecycle and dispatch tracing.
 *
 * The `emit*` helpers only observe: a listener that throws is logged and
 * never changes the outcome of the registration or dispatch being reported.
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import { createLogger } from '../logging/index.js';
import type { Entry } from '../registry/entry.js';
import { formatSignature, type Key } from '../registry/signature.js';
import { DispatchEventNames, RegistryEventNames } from './event-names.js';

/**
 * Event payload types
 */
export interface EntryEventPayload {
  registry: string;
  key: Key;
  signature: string;
  registrationOrder: number;
  timestamp: Date;
}

export interface EntryOverriddenPayload extends EntryEventPayload {
  /** Registration number of the entry that replaced this one */
  replacedBy: number;
}

export interface DispatchSelectedPayload extends EntryEventPayload {
  argumentTypes: string[];
}

export interface DispatchReturnedPayload extends EntryEventPayload {
  result: unknown;
  durationMs: number;
}

export interface DispatchFailedPayload extends EntryEventPayload {
  error: unknown;
  durationMs: number;
}

/**
 * Event map for type-safe event handling
 */
export interface RegistryEventMap {
  // Registration events
  'entry.registered': (payload: EntryEventPayload) => void;
  'entry.unregistered': (payload: EntryEventPayload) => void;
  'entry.overridden': (payload: EntryOverriddenPayload) => void;

  // Dispatch events
  'dispatch.selected': (payload: DispatchSelectedPayload) => void;
  'dispatch.returned': (payload: DispatchReturnedPayload) => void;
  'dispatch.failed': (payload: DispatchFailedPayload) => void;
}

const log = createLogger({ component: 'registry-events' });

function basePayload(registry: string, entry: Entry<unknown>): EntryEventPayload {
  return {
    registry,
    key: entry.key,
    signature: formatSignature(entry.signature),
    registrationOrder: entry.sequence,
    timestamp: new Date(),
  };
}

/**
 * Type-safe event emitter for registry events
 */
export class RegistryEventEmitter extends EventEmitter<RegistryEventMap> {
  private readonly instanceId: string;

  constructor() {
    super();
    this.instanceId = randomUUID();
  }

  /**
   * Get the unique instance ID for this emitter
   */
  getInstanceId(): string {
    return this.instanceId;
  }

  /**
   * Whether any dispatch.* event has a listener
   */
  hasDispatchListeners(): boolean {
    return (
      this.listenerCount(DispatchEventNames.DISPATCH_SELECTED) > 0 ||
      this.listenerCount(DispatchEventNames.DISPATCH_RETURNED) > 0 ||
      this.listenerCount(DispatchEventNames.DISPATCH_FAILED) > 0
    );
  }

  /**
   * Emit an entry registered event
   */
  emitRegistered(registry: string, entry: Entry<unknown>): void {
    this.guard(RegistryEventNames.ENTRY_REGISTERED, () =>
      this.emit(RegistryEventNames.ENTRY_REGISTERED, basePayload(registry, entry))
    );
  }

  /**
   * Emit an entry unregistered event
   */
  emitUnregistered(registry: string, entry: Entry<unknown>): void {
    this.guard(RegistryEventNames.ENTRY_UNREGISTERED, () =>
      this.emit(RegistryEventNames.ENTRY_UNREGISTERED, basePayload(registry, entry))
    );
  }

  /**
   * Emit an entry overridden event for the retired entry
   */
  emitOverridden(registry: string, retired: Entry<unknown>, replacement: Entry<unknown>): void {
    this.guard(RegistryEventNames.ENTRY_OVERRIDDEN, () =>
      this.emit(RegistryEventNames.ENTRY_OVERRIDDEN, {
        ...basePayload(registry, retired),
        replacedBy: replacement.sequence,
      })
    );
  }

  /**
   * Emit a dispatch selected event
   */
  emitSelected(registry: string, entry: Entry<unknown>, argumentTypes: string[]): void {
    this.guard(DispatchEventNames.DISPATCH_SELECTED, () =>
      this.emit(DispatchEventNames.DISPATCH_SELECTED, {
        ...basePayload(registry, entry),
        argumentTypes,
      })
    );
  }

  /**
   * Emit a dispatch returned event
   */
  emitReturned(registry: string, entry: Entry<unknown>, result: unknown, durationMs: number): void {
    this.guard(DispatchEventNames.DISPATCH_RETURNED, () =>
      this.emit(DispatchEventNames.DISPATCH_RETURNED, {
        ...basePayload(registry, entry),
        result,
        durationMs,
      })
    );
  }

  /**
   * Emit a dispatch failed event
   */
  emitFailed(registry: string, entry: Entry<unknown>, error: unknown, durationMs: number): void {
    this.guard(DispatchEventNames.DISPATCH_FAILED, () =>
      this.emit(DispatchEventNames.DISPATCH_FAILED, {
        ...basePayload(registry, entry),
        error,
        durationMs,
      })
    );
  }

  private guard(event: keyof RegistryEventMap, emit: () => void): void {
    if (this.listenerCount(event) === 0) {
      return;
    }
    try {
      emit();
    } catch (error) {
      log.warn('Event listener threw', {
        event,
        error_message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
