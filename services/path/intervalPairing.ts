import { Hole, IntervalPairingSettings } from '../../types';

/**
 * Splits one row into detection units. A hole at column `c` is paired with the
 * hole at `c + interval` when neither has been claimed yet; the rest stay single.
 * `row` must be sorted by ascending column. Units come back ordered by their lower column.
 */
export const pairRowUnits = (row: Hole[], pairing?: IntervalPairingSettings): Hole[][] => {
    if (!pairing || !pairing.enabled) return row.map(hole => [hole]);

    const byColumn = new Map<number, Hole>();
    for (const hole of row) {
        if (hole.column !== null) byColumn.set(hole.column, hole);
    }

    const claimed = new Set<string>();
    const units: Hole[][] = [];

    for (const hole of row) {
        if (claimed.has(hole.id)) continue;
        claimed.add(hole.id);

        const partner = hole.column === null ? undefined : byColumn.get(hole.column + pairing.interval);
        if (partner && !claimed.has(partner.id)) {
            claimed.add(partner.id);
            units.push([hole, partner]);
        } else {
            units.push([hole]);
        }
    }
    return units;
};
