/**
 * Domain: Sectors and progress.
 */
import { Point } from './geometry.types';
import { SectorId } from './hole.types';

export interface SectorDefinition {
  id: SectorId;
  label: string;
  startAngle: number; // inclusive, degrees CCW from +X
  endAngle: number;   // exclusive
}

export interface SectorLayout {
  sectorCount: number;
  center: Point;
  sectors: SectorDefinition[];
}

export interface SectorProgress {
  sector: SectorId | null; // null = global aggregate
  total: number;
  completed: number;
  pending: number;
  processing: number;
  qualified: number;
  defective: number;
  blind: number;
  tieRod: number;
  progressPct: number;
  qualificationRate: number;
}

export interface ProgressSnapshot {
  version: number;
  flushedAt: number;
  global: SectorProgress;
  sectors: readonly SectorProgress[];
}
