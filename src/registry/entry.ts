/**
 * Registered entries and the handles that own them.
 */

import { formatKey } from './errors.js';
import { formatSignature, type Key, type Signature } from './signature.js';

/**
 * A registered implementation.
 *
 * Declared through a method so that parameters are checked bivariantly:
 * `(shape: Circle) => number` is accepted where the registry will only
 * ever pass arguments that its signature admitted.
 */
export type Implementation<TResult = unknown> = {
  bivarianceHack(...args: unknown[]): TResult;
}['bivarianceHack'];

/**
 * Arbitrary data attached to an entry at registration.
 */
export type EntryMetadata = Readonly<Record<string, unknown>>;

/**
 * One registered (signature, implementation) pair under a key.
 *
 * Frozen on creation and owned by the registry that created it.
 */
export interface Entry<TResult = unknown> {
  readonly key: Key;
  readonly signature: Signature;
  readonly implementation: Implementation<TResult>;

  /** Registry-wide, monotonically increasing registration number */
  readonly sequence: number;

  /** Whether the registration asked to replace an identical signature */
  readonly override: boolean;

  readonly metadata: EntryMetadata;
}

/**
 * Public view of an entry, without its sequence number.
 */
export interface EntryDescription {
  /** Formatted signature, e.g. `(Circle)` */
  signature: string;
  metadata: EntryMetadata;
  override: boolean;
}

function isPlainObject(value: unknown): value is Readonly<Record<string, unknown>> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function copyValue(value: unknown, freeze: boolean): unknown {
  if (Array.isArray(value)) {
    const items = value.map((item: unknown) => copyValue(item, freeze));
    return freeze ? Object.freeze(items) : items;
  }
  if (isPlainObject(value)) {
    return copyRecord(value, freeze);
  }
  return value;
}

function copyRecord(record: EntryMetadata, freeze: boolean): Record<string, unknown> {
  const copy: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(record)) {
    copy[name] = copyValue(value, freeze);
  }
  return freeze ? Object.freeze(copy) : copy;
}

/**
 * Fresh, mutable copy of entry metadata for one invocation.
 *
 * Plain objects and arrays are copied at every depth; class instances,
 * functions and other values are passed by reference.
 */
export function cloneMetadata(metadata: EntryMetadata): Record<string, unknown> {
  return copyRecord(metadata, false);
}

/**
 * Create a frozen entry. Metadata is copied and frozen at every depth
 * reached through plain objects and arrays.
 */
export function createEntry<TResult>(fields: Entry<TResult>): Entry<TResult> {
  return Object.freeze({
    key: fields.key,
    signature: fields.signature,
    implementation: fields.implementation,
    sequence: fields.sequence,
    override: fields.override,
    metadata: copyRecord(fields.metadata, true),
  });
}

export function describeEntry(entry: Entry<unknown>): EntryDescription {
  return {
    signature: formatSignature(entry.signature),
    metadata: entry.metadata,
    override: entry.override,
  };
}

/**
 * Handle returned by registration.
 *
 * Pass it to `Registry.unregister()` to remove exactly the entry it was
 * issued for. Once that entry is gone (unregistered, or retired by an
 * override) the handle is inert.
 */
export class DispatchHandle {
  readonly key: Key;
  readonly signature: Signature;

  private readonly probe: () => boolean;

  /**
   * @param probe - Reports whether the entry is still registered
   */
  constructor(key: Key, signature: Signature, probe: () => boolean) {
    this.key = key;
    this.signature = signature;
    this.probe = probe;
  }

  /**
   * Whether the entry behind this handle is still registered.
   */
  get active(): boolean {
    return this.probe();
  }

  toString(): string {
    return `DispatchHandle(key=${formatKey(this.key)}, signature=${formatSignature(this.signature)}, active=${this.active})`;
  }
}
