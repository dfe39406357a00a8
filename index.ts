/**
 * Public entry point of the hole-map engine.
 */

export * from './types';
export * from './utils/errors';
export { describeEngineError } from './utils/errorHandler';
export { formatHoleId, parseHoleId, getSectorLabel, getStatusName } from './utils/helpers';
export { DEFAULT_ENGINE_CONFIG, MIN_SECTOR_COUNT, MAX_SECTOR_COUNT } from './data/defaults';
export * from './services/config';
export * from './services/holeCollection';
export * from './services/dxfParser';
export * from './services/geometryExtractor';
export * from './services/coordinateNormalizer';
export * from './services/gridNumberer';
export * from './services/sectorPartitioner';
export * from './services/progress';
export * from './services/pathPlanner';
export * from './services/inspection';
export * from './services/holeMapBuilder';
export * from './hooks/useHoleMap';
export * from './hooks/useSectorProgress';
export * from './hooks/useInspectionSimulation';
