import { describe, it, expect } from 'vitest';
import { DEFAULT_ENGINE_CONFIG } from '../data/defaults';
import { ConfigError } from '../utils/errors';
import { resolveEngineConfig } from './config';

const failurePath = (fn: () => unknown): unknown => {
    try {
        fn();
    } catch (e) {
        return e instanceof ConfigError ? e.details.path : 'other';
    }
    return null;
};

describe('resolveEngineConfig', () => {
    it('returns the defaults without overrides', () => {
        expect(resolveEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
    });

    it('merges partial groups over the defaults', () => {
        const config = resolveEngineConfig({
            sectors: { sectorCount: 6 },
            path: { pairing: { enabled: true } },
            progress: { coalesce: false },
        });
        expect(config.sectors.sectorCount).toBe(6);
        expect(config.path.pairing).toEqual({ enabled: true, interval: 4 });
        expect(config.path.allowEmpty).toBe(false);
        expect(config.progress).toEqual({ flushIntervalMs: 1000, coalesce: false });
        expect(config.extraction).toEqual(DEFAULT_ENGINE_CONFIG.extraction);
    });

    it('keeps the shared defaults read-only', () => {
        expect(() => Object.assign(DEFAULT_ENGINE_CONFIG.sectors, { sectorCount: 8 })).toThrowError(TypeError);
        expect(Object.isFrozen(DEFAULT_ENGINE_CONFIG.path.pairing)).toBe(true);

        const config = resolveEngineConfig();
        config.progress.coalesce = false;
        expect(DEFAULT_ENGINE_CONFIG.progress.coalesce).toBe(true);
        expect(resolveEngineConfig().sectors.sectorCount).toBe(4);
    });

    it('rejects out-of-range values with the offending path', () => {
        expect(failurePath(() => resolveEngineConfig({ sectors: { sectorCount: 13 } }))).toBe('sectors.sectorCount');
        expect(failurePath(() => resolveEngineConfig({ simulation: { successRate: 1.5 } }))).toBe('simulation.successRate');
        expect(failurePath(() => resolveEngineConfig({ path: { pairing: { interval: 0 } } }))).toBe('path.pairing.interval');
        expect(failurePath(() => resolveEngineConfig({ extraction: { expectedRadius: 0 } }))).toBe('extraction.expectedRadius');
        expect(failurePath(() => resolveEngineConfig({ progress: { flushIntervalMs: -5 } }))).toBe('progress.flushIntervalMs');
    });
});
