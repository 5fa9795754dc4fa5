/**
 * Tests for the structured logging API.
 *
 * Log lines are captured by swapping in a pino logger that writes to an
 * in-memory stream.
 */

import { Writable } from 'node:stream';
import { pino } from 'pino';
import { afterEach, describe, expect, it } from 'vitest';
import {
  configureLogger,
  createLogger,
  getRootLogger,
  isLevelEnabled,
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
  resetLogger,
} from '../../../src/logging/index.js';
import { Registry } from '../../../src/registry/registry.js';

function captureLogs(level = 'trace'): () => unknown[] {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    },
  });
  configureLogger(pino({ level }, stream));
  return () => lines.map((line): unknown => JSON.parse(line));
}

describe('Logging API', () => {
  afterEach(() => {
    resetLogger();
  });

  it('writes each level with its pino level number', () => {
    const records = captureLogs();

    logTrace('t');
    logDebug('d');
    logInfo('i');
    logWarn('w');
    logError('e');

    expect(records()).toMatchObject([
      { level: 10, msg: 't' },
      { level: 20, msg: 'd' },
      { level: 30, msg: 'i' },
      { level: 40, msg: 'w' },
      { level: 50, msg: 'e' },
    ]);
  });

  it('writes structured fields', () => {
    const records = captureLogs();

    logInfo('Registered entry', { component: 'test', count: 2, active: true, note: null });

    expect(records()[0]).toMatchObject({
      msg: 'Registered entry',
      component: 'test',
      count: 2,
      active: true,
      note: null,
    });
  });

  it('drops undefined fields', () => {
    const records = captureLogs();

    logWarn('Careful', { missing: undefined, present: 'x' });

    expect(records()[0]).not.toHaveProperty('missing');
    expect(records()[0]).toMatchObject({ present: 'x' });
  });

  it('filters below the configured level', () => {
    const records = captureLogs('warn');

    logDebug('hidden');
    logWarn('shown');

    expect(records()).toHaveLength(1);
    expect(records()[0]).toMatchObject({ msg: 'shown' });
  });

  it('createLogger presets fields that call fields can override', () => {
    const records = captureLogs();
    const logger = createLogger({ component: 'registry', registry: 'default' });

    logger.info('Dispatching', { registry: 'shapes', key: 'area' });

    expect(records()[0]).toMatchObject({ component: 'registry', registry: 'shapes', key: 'area' });
  });

  it('returns the configured logger as the root', () => {
    const logger = pino({ level: 'error' });
    configureLogger(logger);

    expect(getRootLogger()).toBe(logger);
  });

  it('rebuilds the root logger from the environment after a reset', () => {
    const custom = pino({ level: 'error' });
    configureLogger(custom);

    resetLogger();
    const rebuilt = getRootLogger();

    expect(rebuilt).not.toBe(custom);
    expect(rebuilt.level).toBe('silent');
  });

  it('reports whether a level is enabled', () => {
    captureLogs('warn');

    expect(isLevelEnabled('error')).toBe(true);
    expect(isLevelEnabled('warn')).toBe(true);
    expect(isLevelEnabled('debug')).toBe(false);
  });

  it('logs invocations at trace level', () => {
    const records = captureLogs('trace');
    const registry = new Registry({ name: 'math' });
    registry.register('double', ['number'], (n: number) => n * 2);

    registry.dispatch('double', 2);

    expect(records()).toContainEqual(
      expect.objectContaining({
        level: 10,
        msg: 'Invoking entry',
        component: 'invoker',
        registry: 'math',
        key: 'double',
        signature: '(number)',
      })
    );
  });

  it('logs registrations at debug level', () => {
    const records = captureLogs('debug');
    const registry = new Registry({ name: 'shapes' });

    registry.register('area', ['number'], () => 1);

    expect(records()).toContainEqual(
      expect.objectContaining({
        level: 20,
        msg: 'Registered entry',
        component: 'registry',
        operation: 'register',
        registry: 'shapes',
        key: 'area',
        signature: '(number)',
        sequence: 1,
      })
    );
  });
});
