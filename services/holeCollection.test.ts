import { describe, it, expect } from 'vitest';
import { HoleStatus } from '../types';
import { CollectionError } from '../utils/errors';
import { HoleCollection, cloneHole, createHole } from './holeCollection';

const hole = (id: string, x: number, y: number) => createHole({ id, centerX: x, centerY: y, radius: 8.865 });

describe('HoleCollection', () => {
    it('fills defaults for new holes', () => {
        expect(hole('A', 1, 2)).toEqual({
            id: 'A', centerX: 1, centerY: 2, radius: 8.865, layer: '0',
            row: null, column: null, status: HoleStatus.Pending, sector: null,
        });
    });

    it('looks holes up by id and keeps insertion order', () => {
        const collection = new HoleCollection([hole('B', 0, 0), hole('A', 5, 5)]);
        expect(collection.ids()).toEqual(['B', 'A']);
        expect(collection.get('A')?.centerX).toBe(5);
        expect(collection.has('C')).toBe(false);
        expect([...collection].map(h => h.id)).toEqual(['B', 'A']);
    });

    it('rejects duplicate ids', () => {
        expect(() => new HoleCollection([hole('A', 0, 0), hole('A', 1, 1)])).toThrowError(CollectionError);
    });

    it('computes bounds of the centers', () => {
        const collection = new HoleCollection([hole('A', -5, 2), hole('B', 10, 7)]);
        expect(collection.bounds).toEqual({ minX: -5, minY: 2, maxX: 10, maxY: 7 });
        expect(new HoleCollection().bounds).toEqual({ minX: 0, minY: 0, maxX: 0, maxY: 0 });
    });

    it('maps into a new collection and carries metadata', () => {
        const source = new HoleCollection([hole('A', 1, 1)], { source: 'dxf' });
        const moved = source.map(h => cloneHole(h, { centerX: h.centerX + 1 }));
        expect(moved).not.toBe(source);
        expect(moved.get('A')?.centerX).toBe(2);
        expect(source.get('A')?.centerX).toBe(1);
        expect(moved.metadata).toEqual({ source: 'dxf', normalizations: [] });
    });

    it('counts statuses', () => {
        const collection = new HoleCollection([hole('A', 0, 0), createHole({ id: 'B', centerX: 1, centerY: 1, radius: 1, status: HoleStatus.Blind })]);
        const counts = collection.statusCounts();
        expect(counts[HoleStatus.Pending]).toBe(1);
        expect(counts[HoleStatus.Blind]).toBe(1);
        expect(counts[HoleStatus.Qualified]).toBe(0);
    });
});
