import { PrimitiveKind, CadPrimitive, ExtractionSettings, Hole, SkippedPrimitive, SkipReason } from '../types';
import { GeometryError } from '../utils/errors';
import { engineLog } from '../utils/errorHandler';
import { provisionalHoleId } from '../utils/helpers';
import { DEFAULT_ENGINE_CONFIG } from '../data/defaults';
import { HoleCollection, createHole } from './holeCollection';
import { groupPrimitives, validatePrimitive, IndexedPrimitive, PrimitiveGroup } from './extraction/primitiveGrouping';
import { closedCandidates, reconstructCircle, ReconstructedCircle } from './extraction/circleReconstruction';
import { mean } from './geometry';

export interface ExtractionResult {
    collection: HoleCollection;
    diagnostics: SkippedPrimitive[];
}

const skip = (item: IndexedPrimitive, reason: SkipReason, message: string): SkippedPrimitive => ({
    index: item.index,
    primitive: item.primitive,
    reason,
    message,
});

const describeGroup = (group: PrimitiveGroup) =>
    `(${group.reference.centerX.toFixed(3)}, ${group.reference.centerY.toFixed(3)}) r=${group.reference.radius.toFixed(3)}`;

/**
 * Resolves one center/radius group into at most one circle. Groups of more than two
 * primitives are ambiguous: they either fail or keep the candidate with the smallest gap.
 */
const resolveGroup = (
    group: PrimitiveGroup,
    settings: ExtractionSettings,
    diagnostics: SkippedPrimitive[]
): ReconstructedCircle | null => {
    const { members } = group;
    const groupRadius = mean(members.map(m => m.primitive.radius));

    // Boundary and reference circles are rejected before any ambiguity check
    if (Math.abs(groupRadius - settings.expectedRadius) > settings.radiusTolerance) {
        for (const m of members) {
            diagnostics.push(skip(m, 'radius-mismatch',
                `radius ${m.primitive.radius} differs from expected ${settings.expectedRadius} by more than ${settings.radiusTolerance}`));
        }
        return null;
    }

    const candidates = closedCandidates(members, settings.angularGapTolerance);
    const winner = candidates[0];

    if (members.length > 2) {
        const rejected = members.filter(m => !winner || !winner.members.includes(m));
        if (settings.onAmbiguous === 'fail') {
            throw new GeometryError('AmbiguousMatch',
                `${members.length} primitives share center/radius ${describeGroup(group)}`,
                {
                    center: { x: group.reference.centerX, y: group.reference.centerY },
                    radius: group.reference.radius,
                    candidateIndices: members.map(m => m.index),
                    winnerIndices: winner ? winner.members.map(m => m.index) : [],
                    winnerGap: winner ? winner.gap : null,
                    rejectedIndices: rejected.map(m => m.index),
                });
        }
        if (!winner) {
            for (const m of members) {
                diagnostics.push(skip(m, 'incomplete-coverage', `no closed circle among ${members.length} primitives at ${describeGroup(group)}`));
            }
            return null;
        }
        for (const m of rejected) {
            diagnostics.push(skip(m, 'ambiguous', `superseded by primitives ${winner.members.map(w => w.index).join(', ')} at ${describeGroup(group)}`));
        }
        return reconstructCircle(winner.members);
    }

    if (winner && winner.members.length === members.length) {
        return reconstructCircle(winner.members);
    }

    if (members.length === 1) {
        const only = members[0];
        const reason: SkipReason = only.primitive.kind === PrimitiveKind.Arc ? 'unmatched-arc' : 'incomplete-coverage';
        diagnostics.push(skip(only, reason, `no matching primitive at ${describeGroup(group)}`));
        return null;
    }

    // Two primitives that do not close (or only one of them is closed by itself)
    if (winner) {
        const rest = members.filter(m => !winner.members.includes(m));
        for (const m of rest) {
            diagnostics.push(skip(m, 'ambiguous', `duplicate of closed primitive ${winner.members[0].index} at ${describeGroup(group)}`));
        }
        return reconstructCircle(winner.members);
    }
    for (const m of members) {
        diagnostics.push(skip(m, 'incomplete-coverage', `arcs at ${describeGroup(group)} leave more than ${settings.angularGapTolerance}° uncovered`));
    }
    return null;
};

/**
 * GEOMETRY EXTRACTOR
 * Reconstructs holes from CAD circles and arc pairs.
 * Pure function of the primitives and the extraction settings.
 */
export const extractHoles = (
    primitives: CadPrimitive[],
    settings: ExtractionSettings = DEFAULT_ENGINE_CONFIG.extraction
): ExtractionResult => {
    const diagnostics: SkippedPrimitive[] = [];
    if (primitives.length === 0) {
        return { collection: new HoleCollection(), diagnostics };
    }

    const usable: IndexedPrimitive[] = [];
    primitives.forEach((primitive, index) => {
        const problem = validatePrimitive(primitive);
        if (problem) diagnostics.push({ index, primitive, reason: 'invalid-primitive', message: problem });
        else usable.push({ index, primitive });
    });

    const groups = groupPrimitives(usable, settings.positionTolerance, settings.radiusTolerance);
    const holes: Hole[] = [];

    for (const group of groups) {
        const circle = resolveGroup(group, settings, diagnostics);
        if (!circle) continue;
        // Merged radius may drift out of the window even when every member is within it
        if (Math.abs(circle.radius - settings.expectedRadius) > settings.radiusTolerance) {
            for (const m of circle.members) {
                diagnostics.push(skip(m, 'radius-mismatch', `reconstructed radius ${circle.radius} is out of tolerance`));
            }
            continue;
        }
        holes.push(createHole({
            id: provisionalHoleId(holes.length + 1),
            centerX: circle.centerX,
            centerY: circle.centerY,
            radius: circle.radius,
            layer: circle.layer,
        }));
    }

    diagnostics.sort((a, b) => a.index - b.index);
    engineLog('GeometryExtractor', `${primitives.length} primitives -> ${holes.length} holes, ${diagnostics.length} skipped`);

    if (holes.length === 0) {
        throw new GeometryError('EmptyResult',
            `No holes reconstructed from ${primitives.length} primitives (expected radius ${settings.expectedRadius} ± ${settings.radiusTolerance})`,
            { primitiveCount: primitives.length, diagnostics });
    }

    return { collection: new HoleCollection(holes), diagnostics };
};
