/**
 * Example registries
 *
 * @module examples
 */

export * from './shapes.js';
export * from './string-pipeline.js';
