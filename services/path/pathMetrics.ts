import { PathMetrics, PathStep, Point } from '../../types';
import { HoleCollection } from '../holeCollection';
import { distance, mean } from '../geometry';

// A paired unit is visited at the midpoint of its holes.
const stepPosition = (step: PathStep, collection: HoleCollection): Point | null => {
    const holes = step.holeIds.flatMap(id => {
        const hole = collection.get(id);
        return hole ? [hole] : [];
    });
    if (holes.length === 0) return null;
    return { x: mean(holes.map(h => h.centerX)), y: mean(holes.map(h => h.centerY)) };
};

/**
 * Travel statistics of a planned path. Steps whose holes are not in the collection
 * are counted but do not contribute to distances.
 */
export const computePathMetrics = (steps: PathStep[], collection: HoleCollection): PathMetrics => {
    const positions = steps
        .map(step => stepPosition(step, collection))
        .filter((p): p is Point => p !== null);

    let totalDistance = 0;
    let maxJump = 0;
    for (let i = 1; i < positions.length; i++) {
        const d = distance(positions[i - 1], positions[i]);
        totalDistance += d;
        if (d > maxJump) maxJump = d;
    }

    const moves = positions.length - 1;
    return {
        stepCount: steps.length,
        holeCount: steps.reduce((sum, step) => sum + step.holeIds.length, 0),
        totalDistance,
        averageStep: moves > 0 ? totalDistance / moves : 0,
        maxJump,
    };
};
