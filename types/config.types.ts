
/**
 * Domain: Engine configuration.
 * Every knob is passed explicitly; no service reads ambient settings.
 */
import { AmbiguityPolicy } from './enums.types';
import { Point } from './geometry.types';
import { IntervalPairingSettings } from './path.types';

export interface ExtractionSettings {
    positionTolerance: number; // max center distance for two primitives to merge
    radiusTolerance: number; // max radius difference, also vs. expectedRadius
    expectedRadius: number;
    angularGapTolerance: number; // degrees of missing coverage still accepted as closed
    onAmbiguous: AmbiguityPolicy;
}

export interface NormalizationSettings {
    rotationDegrees: number; // CCW positive; "90° clockwise" is -90
    flipY: boolean; // device Y-down input
}

export interface NumberingSettings {
    rowTolerance?: number;
    columnTolerance?: number;
    minimumSpacing: number; // center distances at or below this are ignored when measuring hole spacing
}

export interface SectorSettings {
    sectorCount: number;
    center?: Point;
}

export interface PathSettings {
    pairing: IntervalPairingSettings;
    allowEmpty: boolean;
}

export interface ProgressSettings {
    flushIntervalMs: number;
    coalesce: boolean;
}

export interface SimulationSettings {
    stepIntervalMs: number;
    successRate: number;
}

export interface EngineConfig {
    extraction: ExtractionSettings;
    normalization: NormalizationSettings;
    numbering: NumberingSettings;
    sectors: SectorSettings;
    path: PathSettings;
    progress: ProgressSettings;
    simulation: SimulationSettings;
}

export type EngineConfigOverrides = {
    [K in Exclude<keyof EngineConfig, 'path'>]?: Partial<EngineConfig[K]>;
} & {
    path?: Partial<Omit<PathSettings, 'pairing'>> & { pairing?: Partial<IntervalPairingSettings> };
};
