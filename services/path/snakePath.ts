import { Hole, PathPlanOptions, PathStep, Point, RowDirection } from '../../types';
import { PathError } from '../../utils/errors';
import { mean } from '../geometry';
import { pairRowUnits } from './intervalPairing';

const groupByRow = (holes: Hole[]): Map<number, Hole[]> => {
    const rows = new Map<number, Hole[]>();
    for (const hole of holes) {
        if (hole.row === null || hole.column === null) {
            throw new PathError('UnnumberedHole', `Hole ${hole.id} has no row/column; run grid numbering first`, { holeId: hole.id });
        }
        const bucket = rows.get(hole.row);
        if (bucket) bucket.push(hole);
        else rows.set(hole.row, [hole]);
    }
    return rows;
};

const columnOf = (hole: Hole): number => hole.column ?? 0;

const rowDirection = (rows: Map<number, Hole[]>, center?: Point): RowDirection => {
    if (!center) return 'ascending';
    const indices = [...rows.keys()];
    const offset = (row: number) => Math.abs(mean((rows.get(row) ?? []).map(h => h.centerY)) - center.y);
    return offset(Math.min(...indices)) <= offset(Math.max(...indices)) ? 'ascending' : 'descending';
};

/**
 * SNAKE PATH
 * Serpentine order over numbered holes. Of the lowest and highest row, the one whose
 * mean Y lies nearer `center` is traversed first (the lowest on a tie or without a
 * center) and rows move on from there. The first row runs left to right and every
 * following row reverses.
 */
export const planSnakePath = (holes: Iterable<Hole>, options: PathPlanOptions = {}): PathStep[] => {
    const list = [...holes];
    if (list.length === 0) {
        if (options.allowEmpty) return [];
        throw new PathError('EmptyInput', 'No holes to plan a path over');
    }

    const rows = groupByRow(list);
    const direction = rowDirection(rows, options.center);
    const rowOrder = [...rows.keys()].sort((a, b) => (direction === 'ascending' ? a - b : b - a));

    const steps: PathStep[] = [];
    rowOrder.forEach((rowIndex, i) => {
        const row = [...(rows.get(rowIndex) ?? [])].sort((a, b) => columnOf(a) - columnOf(b));
        const units = pairRowUnits(row, options.pairing);
        if (i % 2 === 1) units.reverse();

        for (const unit of units) {
            steps.push({
                index: steps.length,
                holeIds: unit.map(h => h.id),
                isPair: unit.length > 1,
            });
        }
    });

    return steps;
};

/**
 * Every hole id of a path, in visiting order.
 */
export const flattenPath = (steps: PathStep[]): string[] => steps.flatMap(step => step.holeIds);
