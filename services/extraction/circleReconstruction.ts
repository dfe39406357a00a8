import { PrimitiveKind, CadPrimitive } from '../../types';
import { angularCoverage, mean } from '../geometry';
import { IndexedPrimitive } from './primitiveGrouping';

export interface CircleCandidate {
    members: IndexedPrimitive[];
    gap: number; // degrees of the full turn left uncovered
}

export interface ReconstructedCircle {
    centerX: number;
    centerY: number;
    radius: number;
    layer: string;
    members: IndexedPrimitive[];
}

/**
 * Uncovered angle of a set of primitives. A circle covers everything.
 */
export const coverageGap = (primitives: CadPrimitive[]): number => {
    if (primitives.some(p => p.kind === PrimitiveKind.Circle)) return 0;
    const arcs = primitives.map(p => ({ startAngle: p.startAngle ?? 0, endAngle: p.endAngle ?? 0 }));
    return Math.max(0, 360 - angularCoverage(arcs));
};

const candidateOf = (members: IndexedPrimitive[]): CircleCandidate => ({
    members,
    gap: coverageGap(members.map(m => m.primitive)),
});

/**
 * Every single primitive and every pair of the group, closed within `gapTolerance`,
 * ordered by gap and then by the source indices of their members.
 */
export const closedCandidates = (members: IndexedPrimitive[], gapTolerance: number): CircleCandidate[] => {
    const candidates: CircleCandidate[] = [];
    for (let i = 0; i < members.length; i++) {
        candidates.push(candidateOf([members[i]]));
        for (let j = i + 1; j < members.length; j++) {
            candidates.push(candidateOf([members[i], members[j]]));
        }
    }

    const indexKey = (c: CircleCandidate) => c.members.map(m => m.index);
    return candidates
        .filter(c => c.gap <= gapTolerance)
        .sort((a, b) => {
            if (a.gap !== b.gap) return a.gap - b.gap;
            const ka = indexKey(a);
            const kb = indexKey(b);
            for (let k = 0; k < Math.min(ka.length, kb.length); k++) {
                if (ka[k] !== kb[k]) return ka[k] - kb[k];
            }
            return ka.length - kb.length;
        });
};

/**
 * The circle described by a candidate: mean center and mean radius of its members.
 */
export const reconstructCircle = (members: IndexedPrimitive[]): ReconstructedCircle => ({
    centerX: mean(members.map(m => m.primitive.centerX)),
    centerY: mean(members.map(m => m.primitive.centerY)),
    radius: mean(members.map(m => m.primitive.radius)),
    layer: members[0].primitive.layer ?? '0',
    members,
});
