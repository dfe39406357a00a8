import { Point } from '../../types';
import { AXIS_GAP_FRACTION, FALLBACK_CLUSTER_TOLERANCE } from '../../data/defaults';

export interface Cluster1D {
    centroid: number;
    members: number[]; // indices into the input values
}

/**
 * Greedy 1-D clustering. Values are sorted, and a new cluster starts whenever the gap
 * to the previous value exceeds `tolerance`. The result depends only on the multiset
 * of values, not on their order. Clusters come back in ascending order.
 */
export const clusterValues = (values: number[], tolerance: number): Cluster1D[] => {
    const order = values.map((_, i) => i).sort((a, b) => values[a] - values[b] || a - b);
    const clusters: Cluster1D[] = [];
    let current: number[] = [];
    let previous = -Infinity;

    for (const i of order) {
        const v = values[i];
        if (current.length > 0 && v - previous > tolerance) {
            clusters.push(finish(current, values));
            current = [];
        }
        current.push(i);
        previous = v;
    }
    if (current.length > 0) clusters.push(finish(current, values));

    return clusters;
};

const finish = (members: number[], values: number[]): Cluster1D => ({
    centroid: members.reduce((sum, i) => sum + values[i], 0) / members.length,
    members,
});

/**
 * Smallest center-to-center distance above `minimumSpacing`, or `null` when no two
 * centers are that far apart. Points are swept in X order, so a candidate is
 * dropped as soon as its X offset alone reaches the best distance found.
 */
export const minimumCenterSpacing = (points: Point[], minimumSpacing: number): number | null => {
    const sorted = [...points].sort((a, b) => a.x - b.x);
    let best = Infinity;
    for (let i = 0; i < sorted.length; i++) {
        for (let j = i + 1; j < sorted.length; j++) {
            const dx = sorted[j].x - sorted[i].x;
            if (dx >= best) break;
            const d = Math.hypot(dx, sorted[j].y - sorted[i].y);
            if (d > minimumSpacing && d < best) best = d;
        }
    }
    return best === Infinity ? null : best;
};

/**
 * Default clustering tolerance for one axis, from the hole spacing.
 * Half of the smallest gap between sorted values that is at least a fraction of
 * `spacing` (staggered layouts put columns half a pitch apart); half of `spacing`
 * when no such gap exists.
 */
export const deriveTolerance = (values: number[], spacing: number | null): number => {
    if (spacing === null) return FALLBACK_CLUSTER_TOLERANCE;
    const floor = spacing * AXIS_GAP_FRACTION;
    const sorted = [...values].sort((a, b) => a - b);
    let smallest = Infinity;
    for (let i = 1; i < sorted.length; i++) {
        const gap = sorted[i] - sorted[i - 1];
        if (gap >= floor && gap < smallest) smallest = gap;
    }
    return (smallest === Infinity ? spacing : smallest) / 2;
};
