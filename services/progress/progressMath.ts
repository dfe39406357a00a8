import { ALL_STATUSES, HoleStatus, SectorId, SectorProgress, StatusCounts } from '../../types';
import { emptyStatusCounts } from '../holeCollection';

/**
 * Derived progress for one bucket of status counters. `total` is the number of holes
 * the bucket owns; the status counters must add up to it.
 */
export const toSectorProgress = (sector: SectorId | null, counts: StatusCounts, total: number): SectorProgress => {
    const pending = counts[HoleStatus.Pending];
    const processing = counts[HoleStatus.Processing];
    const qualified = counts[HoleStatus.Qualified];
    const defective = counts[HoleStatus.Defective];
    const blind = counts[HoleStatus.Blind];
    const tieRod = counts[HoleStatus.TieRod];

    const completed = qualified + defective + blind + tieRod;

    return {
        sector,
        total,
        completed,
        pending,
        processing,
        qualified,
        defective,
        blind,
        tieRod,
        progressPct: total > 0 ? (completed / total) * 100 : 0,
        qualificationRate: completed > 0 ? (qualified / completed) * 100 : 0,
    };
};

export const sumCounts = (buckets: StatusCounts[]): StatusCounts => {
    const total = emptyStatusCounts();
    for (const bucket of buckets) {
        for (const status of ALL_STATUSES) total[status] += bucket[status];
    }
    return total;
};

export const isBalanced = (progress: SectorProgress): boolean =>
    progress.total === progress.pending + progress.processing + progress.qualified + progress.defective + progress.blind + progress.tieRod;
