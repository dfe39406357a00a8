import { GridSummary, Hole, NumberingSettings } from '../types';
import { NumberingError } from '../utils/errors';
import { engineLog } from '../utils/errorHandler';
import { formatHoleId } from '../utils/helpers';
import { DEFAULT_ENGINE_CONFIG } from '../data/defaults';
import { HoleCollection, cloneHole } from './holeCollection';
import { clusterValues, deriveTolerance, minimumCenterSpacing, Cluster1D } from './numbering/clustering';

export interface NumberingResult {
    collection: HoleCollection;
    grid: GridSummary;
}

const indexByMember = (clusters: Cluster1D[], size: number): number[] => {
    const result = new Array<number>(size).fill(0);
    clusters.forEach((cluster, k) => {
        for (const i of cluster.members) result[i] = k + 1;
    });
    return result;
};

/**
 * GRID NUMBERER
 * Rows cluster center Y, columns cluster center X. Indices are 1-based in ascending
 * coordinate order: row 1 is the lowest Y cluster, column 1 the leftmost X cluster
 * (in normalized coordinates). Ids follow `C{column:03}R{row:03}`.
 *
 * Numbering depends only on coordinates, so running it again on its own output
 * yields the same rows, columns and ids.
 */
export const assignGridNumbers = (
    collection: HoleCollection,
    settings: NumberingSettings = DEFAULT_ENGINE_CONFIG.numbering
): NumberingResult => {
    const holes = collection.toArray();
    const xs = holes.map(h => h.centerX);
    const ys = holes.map(h => h.centerY);

    const spacing = minimumCenterSpacing(holes.map(h => ({ x: h.centerX, y: h.centerY })), settings.minimumSpacing);

    const rowTolerance = settings.rowTolerance ?? deriveTolerance(ys, spacing);
    const columnTolerance = settings.columnTolerance ?? deriveTolerance(xs, spacing);

    const rowClusters = clusterValues(ys, rowTolerance);
    const columnClusters = clusterValues(xs, columnTolerance);

    const grid: GridSummary = {
        rows: rowClusters.map((c, k) => ({ index: k + 1, centroid: c.centroid, count: c.members.length })),
        columns: columnClusters.map((c, k) => ({ index: k + 1, centroid: c.centroid, count: c.members.length })),
        rowTolerance,
        columnTolerance,
    };

    if (holes.length === 0) {
        return { collection: new HoleCollection([], collection.metadata), grid };
    }
    if (rowClusters.length < 1 || columnClusters.length < 1) {
        throw new NumberingError('DegenerateGrid',
            `${holes.length} holes produced ${rowClusters.length} rows and ${columnClusters.length} columns`,
            { rowCount: rowClusters.length, columnCount: columnClusters.length });
    }

    const rows = indexByMember(rowClusters, holes.length);
    const columns = indexByMember(columnClusters, holes.length);

    const seen = new Map<string, string>();
    const numbered: Hole[] = holes.map((hole, i) => {
        const id = formatHoleId(columns[i], rows[i]);
        const previous = seen.get(id);
        if (previous !== undefined) {
            throw new NumberingError('CellCollision',
                `Holes ${previous} and ${hole.id} both fall into ${id}; clustering tolerance is too coarse`,
                { id, holes: [previous, hole.id], rowTolerance, columnTolerance });
        }
        seen.set(id, hole.id);
        return cloneHole(hole, { id, row: rows[i], column: columns[i] });
    });

    engineLog('GridNumberer', `${rowClusters.length} rows x ${columnClusters.length} columns`, { rowTolerance, columnTolerance });

    return { collection: new HoleCollection(numbered, collection.metadata), grid };
};
