import { CadPrimitive, EngineConfig, GridSummary, PathSettings, PathStep, Point, SectorLayout, SkippedPrimitive } from '../types';
import { engineLog } from '../utils/errorHandler';
import { DEFAULT_ENGINE_CONFIG } from '../data/defaults';
import { HoleCollection } from './holeCollection';
import { extractHoles } from './geometryExtractor';
import { normalize } from './coordinateNormalizer';
import { assignGridNumbers } from './gridNumberer';
import { partitionSectors } from './sectorPartitioner';
import { dxfEntitiesToPrimitives, parseDxf } from './dxfParser';
import { planInspectionRoute } from './pathPlanner';

export interface HoleMap {
    collection: HoleCollection;
    layout: SectorLayout;
    grid: GridSummary;
    diagnostics: SkippedPrimitive[];
}

/**
 * HOLE MAP PIPELINE
 * extract -> normalize -> number -> partition. Every stage is a pure transformation
 * of the previous collection.
 */
export const buildHoleMap = (primitives: CadPrimitive[], config: EngineConfig = DEFAULT_ENGINE_CONFIG): HoleMap => {
    const { collection: extracted, diagnostics } = extractHoles(primitives, config.extraction);
    const normalized = normalize(extracted, config.normalization.rotationDegrees, config.normalization.flipY);
    const { collection: numbered, grid } = assignGridNumbers(normalized, config.numbering);
    const { collection, layout } = partitionSectors(numbered, config.sectors);

    engineLog('HoleMap', `${collection.size} holes, ${diagnostics.length} skipped primitives, ${layout.sectorCount} sectors`);
    return { collection, layout, grid, diagnostics };
};

export const buildHoleMapFromDxf = (dxfContent: string, config: EngineConfig = DEFAULT_ENGINE_CONFIG): HoleMap => {
    const primitives = dxfEntitiesToPrimitives(parseDxf(dxfContent));
    const map = buildHoleMap(primitives, config);
    return {
        ...map,
        collection: new HoleCollection(map.collection, { ...map.collection.metadata, source: 'dxf' }),
    };
};

/**
 * Reassigns every hole for a new sector count. The center stays where it was unless given.
 */
export const repartition = (holeMap: HoleMap, sectorCount: number, center: Point = holeMap.layout.center): HoleMap => {
    const { collection, layout } = partitionSectors(holeMap.collection, { sectorCount, center });
    return { ...holeMap, collection, layout };
};

/**
 * Inspection route over the whole map, sector by sector around the layout center.
 */
export const planHoleMapRoute = (holeMap: HoleMap, settings: PathSettings = DEFAULT_ENGINE_CONFIG.path): PathStep[] =>
    planInspectionRoute(holeMap.collection, holeMap.layout, {
        pairing: settings.pairing,
        allowEmpty: settings.allowEmpty,
    });
