/**
 * Registry of dispatch entries.
 *
 * Maps each key to an ordered, frozen list of entries. Registration and
 * unregistration never modify a published list: they build a new one and
 * swap it in, so a dispatch that already looked up a key keeps working on
 * the complete list it saw, even if an async implementation awaits while
 * the registry changes underneath it.
 *
 * There is no global instance; create one and pass it to the code that
 * registers and dispatches.
 *
 * @example
 * ```typescript
 * const registry = new Registry<number>({ name: 'shapes' });
 *
 * registry.register('area', [Circle], (c: Circle) => Math.PI * c.radius ** 2);
 * const generic = registry.register('area', [Shape], (s: Shape) => s.boundingBoxArea());
 *
 * registry.dispatch('area', new Circle(2)); // Circle entry, more specific
 * registry.dispatch('area', new Square(3)); // Shape entry
 *
 * registry.unregister(generic);
 * registry.dispatch('area', new Square(3)); // throws NoMatchError
 * ```
 */

import { type RegistryConfig, resolveRegistryConfig } from '../config/types.js';
import { RegistryEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import {
  cloneMetadata,
  createEntry,
  DispatchHandle,
  describeEntry,
  type Entry,
  type EntryDescription,
  type Implementation,
} from './entry.js';
import {
  DuplicateRegistrationError,
  formatKey,
  InvalidRegistrationError,
  UnknownKeyError,
} from './errors.js';
import { invoke } from './invoker.js';
import { resolve } from './resolver.js';
import {
  formatSignature,
  type Key,
  normalizeSignature,
  sameSignature,
  type Signature,
  type SignatureSpec,
} from './signature.js';

const log = createLogger({ component: 'registry' });

/**
 * Options for a single registration.
 */
export interface RegisterOptions {
  /** Replace an entry with an identical signature instead of failing */
  override?: boolean;

  /** Data attached to the entry; see `RegistryConfig.bindMetadata` */
  metadata?: Record<string, unknown>;
}

function validateKey(key: Key): void {
  if (typeof key === 'symbol') {
    return;
  }
  if (typeof key !== 'string' || key.length === 0) {
    throw new InvalidRegistrationError('Key must be a non-empty string or a symbol');
  }
}

/**
 * Detect ES class syntax. Classes are functions that throw when called
 * without `new`; old-style constructor functions remain callable.
 */
function isClassSyntax(value: Implementation<unknown>): boolean {
  return /^class[\s{]/.test(Function.prototype.toString.call(value));
}

function compareKeys(a: Key, b: Key): number {
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'string') {
    return -1;
  }
  if (typeof b === 'string') {
    return 1;
  }
  const left = a.description ?? '';
  const right = b.description ?? '';
  return left < right ? -1 : left > right ? 1 : 0;
}

export class Registry<TResult = unknown> {
  readonly name: string;

  /** Pass entry metadata to implementations as a trailing argument */
  readonly bindMetadata: boolean;

  readonly events: RegistryEventEmitter;

  private readonly trace: boolean;
  private snapshots: Map<Key, readonly Entry<TResult>[]> = new Map();
  private readonly handleEntries: WeakMap<DispatchHandle, Entry<TResult>> = new WeakMap();
  private lastSequence = 0;

  constructor(config?: RegistryConfig) {
    const resolved = resolveRegistryConfig(config);
    this.name = resolved.name;
    this.bindMetadata = resolved.bindMetadata;
    this.trace = resolved.trace;
    this.events = resolved.events ?? new RegistryEventEmitter();
  }

  /**
   * Register an implementation under a key.
   *
   * @param key - Operation name
   * @param signature - One constraint (or class / primitive tag shorthand) per argument
   * @param implementation - Called with the dispatch arguments when this entry wins
   * @param options - Override and metadata options
   * @returns Handle that unregisters exactly this entry
   * @throws DuplicateRegistrationError if an identical signature is registered
   *   under the key and `override` is not set
   * @throws InvalidRegistrationError for a malformed key, signature or implementation
   *
   * @example
   * ```typescript
   * const handle = registry.register('area', [Circle], areaOfCircle);
   * registry.register('area', [Circle], fasterAreaOfCircle, { override: true });
   * handle.active; // false, the first entry was retired
   * ```
   */
  register(
    key: Key,
    signature: SignatureSpec,
    implementation: Implementation<TResult>,
    options: RegisterOptions = {}
  ): DispatchHandle {
    validateKey(key);
    if (typeof implementation !== 'function') {
      throw new InvalidRegistrationError(
        `Implementation for key ${formatKey(key)} must be a function, got ${typeof implementation}`
      );
    }
    if (isClassSyntax(implementation)) {
      throw new InvalidRegistrationError(
        `Implementation for key ${formatKey(key)} is a class (${implementation.name}); ` +
          'register a function that constructs or calls it'
      );
    }

    const normalized = normalizeSignature(signature);
    const override = options.override ?? false;
    const current: readonly Entry<TResult>[] = this.snapshots.get(key) ?? [];
    const existing = current.find((entry) => sameSignature(entry.signature, normalized));

    if (existing && !override) {
      log.debug('Rejected duplicate registration', {
        operation: 'register',
        registry: this.name,
        key: String(key),
        signature: formatSignature(normalized),
      });
      throw new DuplicateRegistrationError(key, formatSignature(normalized));
    }

    this.lastSequence += 1;
    const entry = createEntry<TResult>({
      key,
      signature: normalized,
      implementation,
      sequence: this.lastSequence,
      override,
      metadata: options.metadata ?? {},
    });

    const next = current.filter((e) => e !== existing);
    next.push(entry);
    this.publish(key, next);

    const handle = new DispatchHandle(key, normalized, () => this.isRegistered(entry));
    this.handleEntries.set(handle, entry);

    if (existing) {
      log.debug('Overrode entry', {
        operation: 'register',
        registry: this.name,
        key: String(key),
        signature: formatSignature(normalized),
        replaced: existing.sequence,
      });
      this.events.emitOverridden(this.name, existing, entry);
    }

    log.debug('Registered entry', {
      operation: 'register',
      registry: this.name,
      key: String(key),
      signature: formatSignature(normalized),
      sequence: entry.sequence,
    });
    this.events.emitRegistered(this.name, entry);

    return handle;
  }

  /**
   * Remove the entry a handle was issued for.
   *
   * Stale handles (already unregistered, retired by an override, or issued
   * by another registry) are ignored.
   *
   * @returns True if an entry was removed
   */
  unregister(handle: DispatchHandle): boolean {
    const entry = this.handleEntries.get(handle);
    if (!entry) {
      return false;
    }

    const current = this.snapshots.get(entry.key);
    if (!current || !current.includes(entry)) {
      return false;
    }

    this.publish(entry.key, current.filter((e) => e !== entry));
    log.debug('Unregistered entry', {
      operation: 'unregister',
      registry: this.name,
      key: String(entry.key),
      signature: formatSignature(entry.signature),
    });
    this.events.emitUnregistered(this.name, entry);
    return true;
  }

  /**
   * Remove every entry under a key. The key keeps its registration history,
   * so later lookups return an empty list rather than failing.
   *
   * @returns Number of entries removed
   * @throws UnknownKeyError if nothing was ever registered under the key
   */
  unregisterAll(key: Key): number {
    const current = this.entriesFor(key);
    this.publish(key, []);

    for (const entry of current) {
      this.events.emitUnregistered(this.name, entry);
    }
    log.debug('Unregistered all entries', {
      operation: 'unregister_all',
      registry: this.name,
      key: String(key),
      removed: current.length,
    });
    return current.length;
  }

  /**
   * Snapshot of the entries registered under a key, in registration order.
   *
   * The returned array is frozen and never changes; later registrations
   * publish a new array.
   *
   * @throws UnknownKeyError if nothing was ever registered under the key
   */
  lookup(key: Key): readonly Entry<TResult>[] {
    return this.entriesFor(key);
  }

  /**
   * Signatures registered under a key, in registration order.
   *
   * @throws UnknownKeyError if nothing was ever registered under the key
   */
  signatures(key: Key): Signature[] {
    return this.entriesFor(key).map((entry) => entry.signature);
  }

  /**
   * Describe the entries under a key for debugging or documentation.
   *
   * @throws UnknownKeyError if nothing was ever registered under the key
   */
  describe(key: Key): EntryDescription[] {
    return this.entriesFor(key).map(describeEntry);
  }

  /**
   * Resolve without invoking: describe the entry `dispatch` would call.
   *
   * @throws UnknownKeyError, NoMatchError or AmbiguousDispatchError
   */
  select(key: Key, ...args: unknown[]): EntryDescription {
    return describeEntry(resolve(key, this.entriesFor(key), args));
  }

  /**
   * Call the most specific implementation registered under `key` for
   * these arguments.
   *
   * @returns The implementation's return value, unchanged
   * @throws UnknownKeyError, NoMatchError or AmbiguousDispatchError; errors
   *   thrown by the implementation propagate as they are
   */
  dispatch(key: Key, ...args: unknown[]): TResult {
    const entry = resolve(key, this.entriesFor(key), args);
    return invoke(entry, args, {
      registry: this.name,
      events: this.trace ? this.events : undefined,
      bound: this.bindMetadata ? cloneMetadata(entry.metadata) : undefined,
    });
  }

  /**
   * Dispatch and pass `bound` as one trailing argument.
   *
   * With `bindMetadata` enabled, `bound` is merged over the winning
   * entry's metadata. Matching only ever sees `args`.
   *
   * @example
   * ```typescript
   * const words = new Registry<string>({ bindMetadata: true });
   * words.register('word', ['string'], (line: string, opts: { index: number }) =>
   *   line.split(' ')[opts.index] ?? '', { metadata: { index: 0 } });
   *
   * words.dispatchWith('word', ['only way to be sure'], { index: 1 }); // "way"
   * ```
   */
  dispatchWith(key: Key, args: readonly unknown[], bound: Record<string, unknown>): TResult {
    const entry = resolve(key, this.entriesFor(key), args);
    return invoke(entry, args, {
      registry: this.name,
      events: this.trace ? this.events : undefined,
      bound: this.bindMetadata ? { ...cloneMetadata(entry.metadata), ...bound } : { ...bound },
    });
  }

  /**
   * Check if a key has at least one registered entry.
   */
  has(key: Key): boolean {
    return (this.snapshots.get(key)?.length ?? 0) > 0;
  }

  /**
   * Number of keys with at least one registered entry.
   */
  get size(): number {
    let count = 0;
    for (const entries of this.snapshots.values()) {
      if (entries.length > 0) {
        count += 1;
      }
    }
    return count;
  }

  /**
   * Keys with at least one registered entry: strings sorted, then symbols
   * sorted by description.
   */
  availableKeys(): Key[] {
    return Array.from(this.snapshots.entries())
      .filter(([, entries]) => entries.length > 0)
      .map(([key]) => key)
      .sort(compareKeys);
  }

  /**
   * Get debug information about the registry.
   *
   * @returns Object with registry state
   */
  debugInfo(): Record<string, unknown> {
    const keys: Record<string, string[]> = {};
    for (const [key, entries] of this.snapshots) {
      keys[String(key)] = entries.map((entry) => formatSignature(entry.signature));
    }

    return {
      name: this.name,
      bindMetadata: this.bindMetadata,
      keyCount: this.size,
      keys,
    };
  }

  toString(): string {
    const keys = this.availableKeys().map(formatKey).join(', ');
    return `Registry(name=${this.name}, bindMetadata=${this.bindMetadata}, keys=[${keys}])`;
  }

  private entriesFor(key: Key): readonly Entry<TResult>[] {
    const entries = this.snapshots.get(key);
    if (!entries) {
      throw new UnknownKeyError(key);
    }
    return entries;
  }

  private isRegistered(entry: Entry<TResult>): boolean {
    return this.snapshots.get(entry.key)?.includes(entry) ?? false;
  }

  /**
   * Swap in a new frozen entry list for a key.
   */
  private publish(key: Key, entries: Entry<TResult>[]): void {
    this.snapshots.set(key, Object.freeze(entries));
  }
}
