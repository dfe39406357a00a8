/**
 * Types aggregator.
 * Services and hooks import from here; the modular definitions live in ./types/.
 */

export * from './types/index';
