/**
 * PROGRESS SERVICE (Aggregator)
 */

export * from './progress/progressMath';
export * from './progress/sectorProgressTracker';
