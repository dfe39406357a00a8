import { PrimitiveKind, CadPrimitive } from '../../types';

export interface IndexedPrimitive {
    index: number;
    primitive: CadPrimitive;
}

export interface PrimitiveGroup {
    reference: CadPrimitive;
    members: IndexedPrimitive[];
}

/**
 * Why a primitive cannot take part in reconstruction, or null when it is usable.
 */
export const validatePrimitive = (primitive: CadPrimitive): string | null => {
    const { centerX, centerY, radius } = primitive;
    if (!Number.isFinite(centerX) || !Number.isFinite(centerY)) return 'center is not a finite number';
    if (!Number.isFinite(radius) || radius <= 0) return `radius ${radius} is not a positive number`;
    if (primitive.kind === PrimitiveKind.Arc) {
        if (primitive.startAngle === undefined || primitive.endAngle === undefined) return 'arc without start/end angle';
        if (!Number.isFinite(primitive.startAngle) || !Number.isFinite(primitive.endAngle)) return 'arc angles are not finite';
    }
    return null;
};

/**
 * Greedy grouping of primitives sharing a center and radius. A primitive joins the
 * first (oldest) group whose reference primitive lies within `positionTolerance`
 * (Euclidean) and `radiusTolerance`. Candidate groups are found through a hash grid
 * with cells of `positionTolerance`, so only the 3x3 neighbourhood is scanned.
 */
export const groupPrimitives = (
    primitives: IndexedPrimitive[],
    positionTolerance: number,
    radiusTolerance: number
): PrimitiveGroup[] => {
    const groups: PrimitiveGroup[] = [];
    const cellSize = positionTolerance > 0 ? positionTolerance : 1e-9;
    const grid = new Map<string, number[]>();
    const cellOf = (x: number, y: number) => [Math.floor(x / cellSize), Math.floor(y / cellSize)];
    const toleranceSq = positionTolerance * positionTolerance;

    for (const item of primitives) {
        const { centerX, centerY, radius } = item.primitive;
        const [cx, cy] = cellOf(centerX, centerY);

        let target = -1;
        for (let dx = -1; dx <= 1; dx++) {
            for (let dy = -1; dy <= 1; dy++) {
                const bucket = grid.get(`${cx + dx},${cy + dy}`);
                if (!bucket) continue;
                for (const groupIndex of bucket) {
                    const ref = groups[groupIndex].reference;
                    const dSq = (ref.centerX - centerX)**2 + (ref.centerY - centerY)**2;
                    if (dSq <= toleranceSq && Math.abs(ref.radius - radius) <= radiusTolerance) {
                        if (target === -1 || groupIndex < target) target = groupIndex;
                    }
                }
            }
        }

        if (target !== -1) {
            groups[target].members.push(item);
            continue;
        }

        const key = `${cx},${cy}`;
        const bucket = grid.get(key);
        if (bucket) bucket.push(groups.length);
        else grid.set(key, [groups.length]);
        groups.push({ reference: item.primitive, members: [item] });
    }

    return groups;
};
