/**
 * String transforms looked up by name and chained into a pipeline.
 *
 * The `getword-*` entries share one implementation and differ only in the
 * metadata bound at registration.
 *
 * @example
 * ```typescript
 * const registry = createStringRegistry();
 * runPipeline(registry, [' nuke the site from orbit...'], ['strip', 'getword-1', toUpper]);
 * // ['THE']
 * ```
 */

import type { EntryMetadata } from '../registry/entry.js';
import { Registry } from '../registry/registry.js';

/**
 * A pipeline step: a registered key, or a plain function.
 */
export type PipelineStep = string | ((line: string) => string);

export function strip(line: string): string {
  return line.trim();
}

export function getWord(line: string, options: EntryMetadata): string {
  const index = typeof options.index === 'number' ? options.index : 0;
  return line.split(' ')[index] ?? '';
}

export function toUpper(line: string): string {
  return line.toUpperCase();
}

export function createStringRegistry(): Registry<string> {
  const registry = new Registry<string>({ name: 'string', bindMetadata: true });

  registry.register('strip', ['string'], strip);
  registry.register('getword-0', ['string'], getWord, { metadata: { index: 0 } });
  registry.register('getword-1', ['string'], getWord, { metadata: { index: 1 } });

  return registry;
}

/**
 * Run every line through the steps in order.
 */
export function runPipeline(registry: Registry<string>, lines: readonly string[], steps: readonly PipelineStep[]): string[] {
  return lines.map((line) =>
    steps.reduce<string>(
      (current, step) => (typeof step === 'string' ? registry.dispatch(step, current) : step(current)),
      line
    )
  );
}
