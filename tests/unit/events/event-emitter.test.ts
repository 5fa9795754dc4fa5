/**
 * Event emitter tests.
 *
 * Verifies that RegistryEventEmitter emits events with proper payloads and
 * that listener failures never reach the caller.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  type DispatchFailedPayload,
  type DispatchReturnedPayload,
  type DispatchSelectedPayload,
  type EntryEventPayload,
  type EntryOverriddenPayload,
  RegistryEventEmitter,
} from '../../../src/events/event-emitter.js';
import { DispatchEventNames, EventNames, RegistryEventNames } from '../../../src/events/event-names.js';
import { createEntry, type Entry } from '../../../src/registry/entry.js';
import { normalizeSignature } from '../../../src/registry/signature.js';

class Circle {}

function makeEntry(sequence: number): Entry<number> {
  return createEntry<number>({
    key: 'area',
    signature: normalizeSignature([Circle]),
    implementation: () => 1,
    sequence,
    override: false,
    metadata: {},
  });
}

describe('RegistryEventEmitter', () => {
  let emitter: RegistryEventEmitter;

  beforeEach(() => {
    emitter = new RegistryEventEmitter();
  });

  describe('construction', () => {
    it('generates a unique instance ID', () => {
      expect(emitter.getInstanceId()).not.toBe(new RegistryEventEmitter().getInstanceId());
    });

    it('instance ID is a UUID', () => {
      expect(emitter.getInstanceId()).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i
      );
    });
  });

  describe('event names', () => {
    it('combines registry and dispatch names', () => {
      expect(EventNames).toEqual({ ...RegistryEventNames, ...DispatchEventNames });
      expect(RegistryEventNames.ENTRY_REGISTERED).toBe('entry.registered');
      expect(DispatchEventNames.DISPATCH_FAILED).toBe('dispatch.failed');
    });
  });

  describe('registration events', () => {
    it('emits entry.registered', () => {
      const received: EntryEventPayload[] = [];
      emitter.on(RegistryEventNames.ENTRY_REGISTERED, (payload) => received.push(payload));

      emitter.emitRegistered('shapes', makeEntry(4));

      expect(received).toHaveLength(1);
      expect(received[0]).toMatchObject({
        registry: 'shapes',
        key: 'area',
        signature: '(Circle)',
        registrationOrder: 4,
      });
    });

    it('emits entry.unregistered', () => {
      const listener = vi.fn();
      emitter.on(RegistryEventNames.ENTRY_UNREGISTERED, listener);

      emitter.emitUnregistered('shapes', makeEntry(1));

      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('emits entry.overridden for the retired entry', () => {
      const received: EntryOverriddenPayload[] = [];
      emitter.on(RegistryEventNames.ENTRY_OVERRIDDEN, (payload) => received.push(payload));

      emitter.emitOverridden('shapes', makeEntry(1), makeEntry(5));

      expect(received[0]).toMatchObject({ registrationOrder: 1, replacedBy: 5 });
    });
  });

  describe('dispatch events', () => {
    it('emits dispatch.selected with argument types', () => {
      const received: DispatchSelectedPayload[] = [];
      emitter.on(DispatchEventNames.DISPATCH_SELECTED, (payload) => received.push(payload));

      emitter.emitSelected('shapes', makeEntry(2), ['Circle']);

      expect(received[0]?.argumentTypes).toEqual(['Circle']);
    });

    it('emits dispatch.returned with the result and duration', () => {
      const received: DispatchReturnedPayload[] = [];
      emitter.on(DispatchEventNames.DISPATCH_RETURNED, (payload) => received.push(payload));

      emitter.emitReturned('shapes', makeEntry(2), 12.5, 3);

      expect(received[0]).toMatchObject({ result: 12.5, durationMs: 3 });
    });

    it('emits dispatch.failed with the thrown value', () => {
      const received: DispatchFailedPayload[] = [];
      const failure = new Error('boom');
      emitter.on(DispatchEventNames.DISPATCH_FAILED, (payload) => received.push(payload));

      emitter.emitFailed('shapes', makeEntry(2), failure, 1);

      expect(received[0]?.error).toBe(failure);
    });
  });

  describe('hasDispatchListeners', () => {
    it('is false until a dispatch event has a listener', () => {
      emitter.on(RegistryEventNames.ENTRY_REGISTERED, () => undefined);
      expect(emitter.hasDispatchListeners()).toBe(false);

      emitter.on(DispatchEventNames.DISPATCH_FAILED, () => undefined);
      expect(emitter.hasDispatchListeners()).toBe(true);
    });
  });

  describe('listener failures', () => {
    it('does not propagate a listener error', () => {
      emitter.on(RegistryEventNames.ENTRY_REGISTERED, () => {
        throw new Error('listener failed');
      });

      expect(() => emitter.emitRegistered('shapes', makeEntry(1))).not.toThrow();
    });

    it('supports multiple listeners and removal', () => {
      const first = vi.fn();
      const second = vi.fn();
      emitter.on(RegistryEventNames.ENTRY_REGISTERED, first);
      emitter.on(RegistryEventNames.ENTRY_REGISTERED, second);
      emitter.off(RegistryEventNames.ENTRY_REGISTERED, first);

      emitter.emitRegistered('shapes', makeEntry(1));

      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledTimes(1);
      expect(emitter.listenerCount(RegistryEventNames.ENTRY_REGISTERED)).toBe(1);
    });
  });
});
