/**
 * Domain: Holes.
 * A hole is created by the extractor, enriched by numbering and partitioning,
 * and mutated only through status and sector.
 */
import { HoleStatus } from './enums.types';
import { CadPrimitive } from './geometry.types';

export type SectorId = number;

export interface Hole {
  readonly id: string;
  readonly centerX: number;
  readonly centerY: number;
  readonly radius: number;
  readonly layer: string;
  readonly row: number | null;
  readonly column: number | null;
  status: HoleStatus;
  sector: SectorId | null;
}

export interface NormalizationRecord {
  rotationDegrees: number;
  flipY: boolean;
}

export interface HoleCollectionMetadata {
  source?: string;
  normalizations: NormalizationRecord[];
}

export type SkipReason =
  | 'invalid-primitive'
  | 'unmatched-arc'
  | 'incomplete-coverage'
  | 'radius-mismatch'
  | 'ambiguous';

export interface SkippedPrimitive {
  index: number;
  primitive: CadPrimitive;
  reason: SkipReason;
  message: string;
}

export interface ClusterInfo {
  index: number;
  centroid: number;
  count: number;
}

export interface GridSummary {
  rows: ClusterInfo[];
  columns: ClusterInfo[];
  rowTolerance: number;
  columnTolerance: number;
}
