/**
 * Domain: Inspection session.
 */
import { HoleStatus } from './enums.types';

export interface StatusChange {
  holeId: string;
  from: HoleStatus;
  to: HoleStatus;
  reason: string;
  at: number;
}

export interface StatusUpdateOptions {
  redetect?: boolean;
  reason?: string;
}

export type StatusCounts = Record<HoleStatus, number>;
