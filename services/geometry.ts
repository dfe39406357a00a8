/**
 * GEOMETRY SERVICE (Aggregator)
 * Entry point for the geometric helpers; the modules live in services/geometry/.
 */

export * from './geometry/math';
export * from './geometry/angles';
export * from './geometry/transform';
