/**
 * Invoker tests: argument passing, result and error pass-through, tracing.
 */

import { describe, expect, it, vi } from 'vitest';
import {
  type DispatchFailedPayload,
  type DispatchReturnedPayload,
  type DispatchSelectedPayload,
  RegistryEventEmitter,
} from '../../../src/events/event-emitter.js';
import { createEntry, type Entry, type Implementation } from '../../../src/registry/entry.js';
import { invoke } from '../../../src/registry/invoker.js';
import { normalizeSignature } from '../../../src/registry/signature.js';

function entryFor<T>(implementation: Implementation<T>): Entry<T> {
  return createEntry<T>({
    key: 'compute',
    signature: normalizeSignature(['number']),
    implementation,
    sequence: 7,
    override: false,
    metadata: {},
  });
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('invoke', () => {
  it('passes the arguments in order', () => {
    const implementation = vi.fn((a: number, b: string) => `${a}${b}`);

    const result = invoke(entryFor(implementation), [1, 'a']);

    expect(result).toBe('1a');
    expect(implementation).toHaveBeenCalledWith(1, 'a');
  });

  it('returns the implementation result unchanged', () => {
    const payload = { total: 3 };

    expect(invoke(entryFor(() => payload), [1])).toBe(payload);
  });

  it('hands back returned promises untouched', async () => {
    const pending = Promise.resolve(5);

    const result = invoke(entryFor(() => pending), [1]);

    expect(result).toBe(pending);
    await expect(result).resolves.toBe(5);
  });

  it('appends the bound argument after the dispatch arguments', () => {
    const implementation = vi.fn((_value: number, _options: unknown) => 'ok');

    invoke(entryFor(implementation), [1], { bound: { index: 2 } });

    expect(implementation).toHaveBeenCalledWith(1, { index: 2 });
  });

  it('rethrows the same error value', () => {
    const failure = new Error('implementation failed');

    const caught = captureError(() =>
      invoke(
        entryFor(() => {
          throw failure;
        }),
        [1]
      )
    );

    expect(caught).toBe(failure);
  });

  it('rethrows non-Error values as they are', () => {
    const caught = captureError(() =>
      invoke(
        entryFor(() => {
          throw 'plain string';
        }),
        [1]
      )
    );

    expect(caught).toBe('plain string');
  });

  describe('tracing', () => {
    it('emits selected then returned', () => {
      const events = new RegistryEventEmitter();
      const order: string[] = [];
      const selected: DispatchSelectedPayload[] = [];
      const returned: DispatchReturnedPayload[] = [];
      events.on('dispatch.selected', (payload) => {
        order.push('selected');
        selected.push(payload);
      });
      events.on('dispatch.returned', (payload) => {
        order.push('returned');
        returned.push(payload);
      });

      invoke(
        entryFor(() => {
          order.push('call');
          return 42;
        }),
        [1],
        { registry: 'math', events }
      );

      expect(order).toEqual(['selected', 'call', 'returned']);
      expect(selected[0]).toMatchObject({
        registry: 'math',
        key: 'compute',
        signature: '(number)',
        registrationOrder: 7,
        argumentTypes: ['number'],
      });
      expect(returned[0]?.result).toBe(42);
      expect(returned[0]?.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('emits failed and no returned event on a throw', () => {
      const events = new RegistryEventEmitter();
      const failed: DispatchFailedPayload[] = [];
      const onReturned = vi.fn();
      const failure = new Error('boom');
      events.on('dispatch.failed', (payload) => failed.push(payload));
      events.on('dispatch.returned', onReturned);

      const caught = captureError(() =>
        invoke(
          entryFor(() => {
            throw failure;
          }),
          [1],
          { events }
        )
      );

      expect(caught).toBe(failure);
      expect(failed).toHaveLength(1);
      expect(failed[0]?.error).toBe(failure);
      expect(failed[0]?.registry).toBe('default');
      expect(onReturned).not.toHaveBeenCalled();
    });

    it('skips tracing when no dispatch event has a listener', () => {
      const events = new RegistryEventEmitter();
      events.on('entry.registered', () => undefined);
      const emitSelected = vi.spyOn(events, 'emitSelected');
      const emitReturned = vi.spyOn(events, 'emitReturned');

      expect(invoke(entryFor(() => 42), [1], { events })).toBe(42);

      expect(emitSelected).not.toHaveBeenCalled();
      expect(emitReturned).not.toHaveBeenCalled();
    });

    it('keeps the result when a listener throws', () => {
      const events = new RegistryEventEmitter();
      events.on('dispatch.returned', () => {
        throw new Error('listener failed');
      });

      expect(invoke(entryFor(() => 42), [1], { events })).toBe(42);
    });
  });
});
