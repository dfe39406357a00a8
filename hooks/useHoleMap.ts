/**
 * RESPONSIBILITY: Holds the current hole map and rebuilds it on import or sector-count change.
 * MUST CONTAIN: holeMap, the last error message, load/repartition handlers.
 * MUST NOT CONTAIN: JSX or progress state.
 */
import { useState } from 'react';
import { CadPrimitive, EngineConfig } from '../types';
import { DEFAULT_ENGINE_CONFIG } from '../data/defaults';
import { buildHoleMap, buildHoleMapFromDxf, repartition, HoleMap } from '../services/holeMapBuilder';
import { describeEngineError } from '../utils/errorHandler';

export const useHoleMap = (config: EngineConfig = DEFAULT_ENGINE_CONFIG) => {
    const [holeMap, setHoleMap] = useState<HoleMap | null>(null);
    const [error, setError] = useState<string | null>(null);

    const run = (build: () => HoleMap): boolean => {
        try {
            setHoleMap(build());
            setError(null);
            return true;
        } catch (e) {
            setError(describeEngineError(e));
            return false;
        }
    };

    const loadDxf = (content: string) => run(() => buildHoleMapFromDxf(content, config));

    const loadPrimitives = (primitives: CadPrimitive[]) => run(() => buildHoleMap(primitives, config));

    const changeSectorCount = (sectorCount: number) => {
        if (!holeMap) return false;
        return run(() => repartition(holeMap, sectorCount));
    };

    const clear = () => {
        setHoleMap(null);
        setError(null);
    };

    return { holeMap, error, loadDxf, loadPrimitives, changeSectorCount, clear };
};
