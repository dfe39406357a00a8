import { EngineConfig } from '../types';

export const MIN_SECTOR_COUNT = 2;
export const MAX_SECTOR_COUNT = 12;

const freezeDeep = <T extends object>(value: T): Readonly<T> => {
    const children: unknown[] = Object.values(value);
    for (const child of children) {
        if (typeof child === 'object' && child !== null) freezeDeep(child);
    }
    return Object.freeze(value);
};

// Tube plate drawings: holes are two half arcs of radius 8.865 mm
export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = freezeDeep<EngineConfig>({
    extraction: {
        positionTolerance: 0.01,
        radiusTolerance: 0.1,
        expectedRadius: 8.865,
        angularGapTolerance: 1,
        onAmbiguous: 'fail',
    },
    normalization: {
        rotationDegrees: 0,
        flipY: false,
    },
    numbering: {
        minimumSpacing: 1,
    },
    sectors: {
        sectorCount: 4,
    },
    path: {
        pairing: { enabled: false, interval: 4 },
        allowEmpty: false,
    },
    progress: {
        flushIntervalMs: 1000,
        coalesce: true,
    },
    simulation: {
        stepIntervalMs: 100,
        successRate: 0.995,
    },
});

export const FALLBACK_CLUSTER_TOLERANCE = 5;

// Coordinate gaps below this share of the hole spacing count as noise within one row or column
export const AXIS_GAP_FRACTION = 0.25;
