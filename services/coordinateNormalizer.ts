import { Hole } from '../types';
import { HoleCollection, cloneHole } from './holeCollection';
import { boundsCenter, boundsOf, flipPointY, normalizeDegrees, rotatePoint } from './geometry';

/**
 * COORDINATE NORMALIZER
 * Brings raw CAD coordinates into the single convention used downstream:
 * X right, Y up, angles counter-clockwise from +X.
 *
 * `flipY` negates y (device Y-down input); the rotation (CCW positive, so "90° clockwise"
 * is -90) is then applied about the bounding-box center of the flipped holes.
 * Quarter turns use exact trigonometry.
 *
 * Zero rotation without flip returns the collection unchanged. Any other call compounds
 * with previous ones: every application is appended to `metadata.normalizations`, and
 * callers check `normalizationCount` before normalizing again.
 */
export const normalize = (collection: HoleCollection, rotationDegrees: number, flipY: boolean): HoleCollection => {
    const rotation = normalizeDegrees(rotationDegrees);
    if (rotation === 0 && !flipY) return collection;

    const flipped = collection.toArray().map(h => (flipY ? flipPointY({ x: h.centerX, y: h.centerY }) : { x: h.centerX, y: h.centerY }));
    const pivot = boundsCenter(boundsOf(flipped));

    const holes: Hole[] = collection.toArray().map((hole, i) => {
        const p = rotation === 0 ? flipped[i] : rotatePoint(flipped[i], pivot, rotation);
        return cloneHole(hole, { centerX: p.x, centerY: p.y });
    });

    return new HoleCollection(holes, {
        ...collection.metadata,
        normalizations: [...collection.metadata.normalizations, { rotationDegrees, flipY }],
    });
};

export const normalizationCount = (collection: HoleCollection): number => collection.metadata.normalizations.length;

export const isNormalized = (collection: HoleCollection): boolean => normalizationCount(collection) > 0;
