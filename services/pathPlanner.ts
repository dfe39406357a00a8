/**
 * PATH PLANNER SERVICE (Aggregator)
 * Snake ordering per sector and the full inspection route across sectors.
 */
import { PathPlanOptions, PathStep, SectorId, SectorLayout } from '../types';
import { PathError } from '../utils/errors';
import { HoleCollection } from './holeCollection';
import { holesInSector } from './sectorPartitioner';
import { planSnakePath } from './path/snakePath';

export * from './path/snakePath';
export * from './path/intervalPairing';
export * from './path/pathMetrics';

/**
 * One path per sector, each indexed from 0. Empty sectors map to an empty path.
 */
export const planSectorPaths = (
    collection: HoleCollection,
    layout: SectorLayout,
    options: PathPlanOptions = {}
): Map<SectorId, PathStep[]> => {
    const paths = new Map<SectorId, PathStep[]>();
    for (const sector of layout.sectors) {
        paths.set(sector.id, planSnakePath(holesInSector(collection, sector.id), {
            ...options,
            center: options.center ?? layout.center,
            allowEmpty: true,
        }));
    }
    return paths;
};

/**
 * Sectors 0..N-1 in order, concatenated into one route with continuous step indices.
 */
export const planInspectionRoute = (
    collection: HoleCollection,
    layout: SectorLayout,
    options: PathPlanOptions = {}
): PathStep[] => {
    if (collection.isEmpty) {
        if (options.allowEmpty) return [];
        throw new PathError('EmptyInput', 'No holes to plan a route over');
    }

    const route: PathStep[] = [];
    for (const steps of planSectorPaths(collection, layout, options).values()) {
        for (const step of steps) route.push({ ...step, index: route.length });
    }
    return route;
};
