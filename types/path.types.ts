
/**
 * Domain: Inspection path planning.
 * Types for the serpentine step order consumed by the inspection driver.
 */
import { Point } from './geometry.types';

export interface PathStep {
    index: number;
    holeIds: string[]; // one hole, or two when interval pairing applies
    isPair: boolean;
}

export interface IntervalPairingSettings {
    enabled: boolean;
    interval: number; // column-index difference between the two holes of a unit
}

export interface PathPlanOptions {
    center?: Point;
    pairing?: IntervalPairingSettings;
    allowEmpty?: boolean;
}

export interface PathMetrics {
    stepCount: number;
    holeCount: number;
    totalDistance: number;
    averageStep: number;
    maxJump: number;
}
