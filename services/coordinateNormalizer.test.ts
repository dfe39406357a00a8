import { describe, it, expect } from 'vitest';
import { HoleCollection, createHole } from './holeCollection';
import { isNormalized, normalizationCount, normalize } from './coordinateNormalizer';

const collectionOf = (points: [number, number][]) =>
    new HoleCollection(points.map(([x, y], i) => createHole({ id: `H${i + 1}`, centerX: x, centerY: y, radius: 8.865 })));

const centers = (collection: HoleCollection) => collection.toArray().map(h => [h.centerX, h.centerY]);

describe('normalize', () => {
    it('returns the same collection for zero rotation without flip', () => {
        const source = collectionOf([[1, 2]]);
        expect(normalize(source, 0, false)).toBe(source);
        expect(normalize(source, 360, false)).toBe(source);
        expect(isNormalized(source)).toBe(false);
    });

    it('negates y when flipping', () => {
        const result = normalize(collectionOf([[0, 10], [10, 20]]), 0, true);
        expect(centers(result)).toEqual([[0, -10], [10, -20]]);
        expect(result.metadata.normalizations).toEqual([{ rotationDegrees: 0, flipY: true }]);
    });

    it('rotates counter-clockwise about the bounding-box center', () => {
        const result = normalize(collectionOf([[300, 100], [100, 300], [200, 200]]), 90, false);
        expect(centers(result)).toEqual([[300, 300], [100, 100], [200, 200]]);
    });

    it('keeps ids, radius and status', () => {
        const source = collectionOf([[300, 100], [100, 300]]);
        const result = normalize(source, -90, false);
        expect(result.ids()).toEqual(source.ids());
        expect(result.toArray().map(h => h.radius)).toEqual([8.865, 8.865]);
    });

    it('compounds repeated calls and records each one', () => {
        const once = normalize(collectionOf([[300, 100], [100, 300]]), 90, false);
        const twice = normalize(once, 90, false);
        expect(centers(twice)).toEqual([[100, 300], [300, 100]]);
        expect(normalizationCount(twice)).toBe(2);
    });
});
