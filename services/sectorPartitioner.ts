import { Hole, Point, SectorDefinition, SectorId, SectorLayout, SectorSettings } from '../types';
import { PartitionError } from '../utils/errors';
import { getSectorLabel } from '../utils/helpers';
import { MAX_SECTOR_COUNT, MIN_SECTOR_COUNT } from '../data/defaults';
import { HoleCollection, cloneHole } from './holeCollection';
import { boundsCenter, polarAngle } from './geometry';

export interface PartitionResult {
    collection: HoleCollection;
    layout: SectorLayout;
}

const assertSectorCount = (sectorCount: number) => {
    if (!Number.isInteger(sectorCount) || sectorCount < MIN_SECTOR_COUNT || sectorCount > MAX_SECTOR_COUNT) {
        throw new PartitionError('InvalidSectorCount',
            `Sector count must be an integer in [${MIN_SECTOR_COUNT}, ${MAX_SECTOR_COUNT}], got ${sectorCount}`,
            { sectorCount });
    }
};

/**
 * Sector k spans [k * 360/N, (k + 1) * 360/N) degrees, CCW from +X.
 */
export const buildSectorLayout = (sectorCount: number, center: Point): SectorLayout => {
    assertSectorCount(sectorCount);
    const span = 360 / sectorCount;
    const sectors: SectorDefinition[] = Array.from({ length: sectorCount }, (_, k) => ({
        id: k,
        label: getSectorLabel(k),
        startAngle: k * span,
        endAngle: (k + 1) * span,
    }));
    return { sectorCount, center: { ...center }, sectors };
};

/**
 * Sector of a point. A point on the center itself has angle 0 and belongs to sector 0.
 */
export const sectorForPoint = (point: Point, center: Point, sectorCount: number): SectorId => {
    const angle = polarAngle(point.x - center.x, point.y - center.y);
    const k = Math.floor(angle / (360 / sectorCount));
    return Math.min(k, sectorCount - 1);
};

/**
 * SECTOR PARTITIONER
 * Assigns every hole to exactly one of N angular sectors around the center
 * (bounding-box centroid unless given). Coordinates must already be normalized.
 * Every call reassigns all holes; nothing is patched incrementally.
 */
export const partitionSectors = (collection: HoleCollection, settings: SectorSettings): PartitionResult => {
    const { sectorCount } = settings;
    assertSectorCount(sectorCount);

    const center = settings.center ?? boundsCenter(collection.bounds);
    const layout = buildSectorLayout(sectorCount, center);

    const holes: Hole[] = collection.toArray().map(hole =>
        cloneHole(hole, { sector: sectorForPoint({ x: hole.centerX, y: hole.centerY }, center, sectorCount) })
    );

    return { collection: new HoleCollection(holes, collection.metadata), layout };
};

export const holesInSector = (collection: HoleCollection, sector: SectorId): Hole[] =>
    collection.filter(h => h.sector === sector);
