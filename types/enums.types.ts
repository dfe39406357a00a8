
/**
 * Global engine enums.
 * Hole lifecycle states and fixed value selections shared by every service.
 */

export enum HoleStatus {
  Pending = 'pending',
  Processing = 'processing',
  Qualified = 'qualified',
  Defective = 'defective',
  Blind = 'blind',
  TieRod = 'tie_rod',
}

export const TERMINAL_STATUSES: readonly HoleStatus[] = [
  HoleStatus.Qualified,
  HoleStatus.Defective,
  HoleStatus.Blind,
  HoleStatus.TieRod,
];

export const ALL_STATUSES: readonly HoleStatus[] = [
  HoleStatus.Pending,
  HoleStatus.Processing,
  ...TERMINAL_STATUSES,
];

export enum PrimitiveKind {
  Circle = 'circle',
  Arc = 'arc',
}

export type AmbiguityPolicy = 'fail' | 'resolve';

export type RowDirection = 'ascending' | 'descending';
