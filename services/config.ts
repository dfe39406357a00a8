import { EngineConfig, EngineConfigOverrides } from '../types';
import { DEFAULT_ENGINE_CONFIG, MAX_SECTOR_COUNT, MIN_SECTOR_COUNT } from '../data/defaults';
import { ConfigError } from '../utils/errors';

const invalid = (path: string, value: unknown, expectation: string): never => {
    throw new ConfigError('InvalidValue', `${path} = ${String(value)}: ${expectation}`, { path, value });
};

const requirePositive = (path: string, value: number) => {
    if (!Number.isFinite(value) || value <= 0) invalid(path, value, 'expected a positive number');
};

const requireNonNegative = (path: string, value: number) => {
    if (!Number.isFinite(value) || value < 0) invalid(path, value, 'expected a non-negative number');
};

/**
 * Checks ranges of a complete configuration and returns it unchanged.
 */
export const validateEngineConfig = (config: EngineConfig): EngineConfig => {
    const { extraction, normalization, numbering, sectors, path, progress, simulation } = config;

    requireNonNegative('extraction.positionTolerance', extraction.positionTolerance);
    requireNonNegative('extraction.radiusTolerance', extraction.radiusTolerance);
    requirePositive('extraction.expectedRadius', extraction.expectedRadius);
    if (!(extraction.angularGapTolerance >= 0 && extraction.angularGapTolerance < 360)) {
        invalid('extraction.angularGapTolerance', extraction.angularGapTolerance, 'expected a value in [0, 360)');
    }
    if (extraction.onAmbiguous !== 'fail' && extraction.onAmbiguous !== 'resolve') {
        invalid('extraction.onAmbiguous', extraction.onAmbiguous, "expected 'fail' or 'resolve'");
    }

    if (!Number.isFinite(normalization.rotationDegrees)) {
        invalid('normalization.rotationDegrees', normalization.rotationDegrees, 'expected a finite number');
    }

    if (numbering.rowTolerance !== undefined) requirePositive('numbering.rowTolerance', numbering.rowTolerance);
    if (numbering.columnTolerance !== undefined) requirePositive('numbering.columnTolerance', numbering.columnTolerance);
    requireNonNegative('numbering.minimumSpacing', numbering.minimumSpacing);

    if (!Number.isInteger(sectors.sectorCount) || sectors.sectorCount < MIN_SECTOR_COUNT || sectors.sectorCount > MAX_SECTOR_COUNT) {
        invalid('sectors.sectorCount', sectors.sectorCount, `expected an integer in [${MIN_SECTOR_COUNT}, ${MAX_SECTOR_COUNT}]`);
    }
    if (sectors.center && !(Number.isFinite(sectors.center.x) && Number.isFinite(sectors.center.y))) {
        invalid('sectors.center', JSON.stringify(sectors.center), 'expected finite coordinates');
    }

    if (!Number.isInteger(path.pairing.interval) || path.pairing.interval < 1) {
        invalid('path.pairing.interval', path.pairing.interval, 'expected a positive integer');
    }

    requirePositive('progress.flushIntervalMs', progress.flushIntervalMs);
    requirePositive('simulation.stepIntervalMs', simulation.stepIntervalMs);
    if (!(simulation.successRate >= 0 && simulation.successRate <= 1)) {
        invalid('simulation.successRate', simulation.successRate, 'expected a value in [0, 1]');
    }

    return config;
};

/**
 * Defaults merged with partial overrides (one level deep), then validated.
 */
export const resolveEngineConfig = (overrides: EngineConfigOverrides = {}): EngineConfig => {
    const base = DEFAULT_ENGINE_CONFIG;
    return validateEngineConfig({
        extraction: { ...base.extraction, ...overrides.extraction },
        normalization: { ...base.normalization, ...overrides.normalization },
        numbering: { ...base.numbering, ...overrides.numbering },
        sectors: { ...base.sectors, ...overrides.sectors },
        path: {
            ...base.path,
            ...overrides.path,
            pairing: { ...base.path.pairing, ...overrides.path?.pairing },
        },
        progress: { ...base.progress, ...overrides.progress },
        simulation: { ...base.simulation, ...overrides.simulation },
    });
};
