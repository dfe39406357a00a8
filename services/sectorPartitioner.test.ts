import { describe, it, expect } from 'vitest';
import { PartitionError } from '../utils/errors';
import { HoleCollection, createHole } from './holeCollection';
import { buildSectorLayout, holesInSector, partitionSectors, sectorForPoint } from './sectorPartitioner';

const collectionOf = (points: [number, number][]) =>
    new HoleCollection(points.map(([x, y], i) => createHole({ id: `H${i + 1}`, centerX: x, centerY: y, radius: 8.865 })));

const grid3x3 = () => {
    const points: [number, number][] = [];
    for (const y of [100, 200, 300]) for (const x of [100, 200, 300]) points.push([x, y]);
    return collectionOf(points);
};

describe('buildSectorLayout', () => {
    it('divides the full turn into equal spans starting at +X', () => {
        const layout = buildSectorLayout(4, { x: 0, y: 0 });
        expect(layout.sectors.map(s => [s.id, s.label, s.startAngle, s.endAngle])).toEqual([
            [0, 'sector_1', 0, 90],
            [1, 'sector_2', 90, 180],
            [2, 'sector_3', 180, 270],
            [3, 'sector_4', 270, 360],
        ]);
    });
});

describe('sectorForPoint', () => {
    const center = { x: 200, y: 200 };

    it('puts boundary points into the sector that starts there', () => {
        expect(sectorForPoint({ x: 300, y: 200 }, center, 4)).toBe(0);
        expect(sectorForPoint({ x: 200, y: 300 }, center, 4)).toBe(1);
        expect(sectorForPoint({ x: 100, y: 200 }, center, 4)).toBe(2);
        expect(sectorForPoint({ x: 200, y: 100 }, center, 4)).toBe(3);
    });

    it('assigns the center itself to sector 0', () => {
        expect(sectorForPoint(center, center, 6)).toBe(0);
    });
});

describe('partitionSectors', () => {
    it('places the corner holes of a 3x3 grid into the four quadrants', () => {
        const { collection, layout } = partitionSectors(grid3x3(), { sectorCount: 4 });
        const sectorAt = (x: number, y: number) => collection.toArray().find(h => h.centerX === x && h.centerY === y)?.sector;

        expect(layout.center).toEqual({ x: 200, y: 200 });
        expect(sectorAt(300, 300)).toBe(0);
        expect(sectorAt(100, 300)).toBe(1);
        expect(sectorAt(100, 100)).toBe(2);
        expect(sectorAt(300, 100)).toBe(3);
        expect(sectorAt(200, 200)).toBe(0);
    });

    it('assigns every hole to exactly one valid sector for every allowed count', () => {
        const ring = collectionOf(Array.from({ length: 36 }, (_, i): [number, number] => [
            Math.round(1000 * Math.cos((i * 10 + 5) * Math.PI / 180)),
            Math.round(1000 * Math.sin((i * 10 + 5) * Math.PI / 180)),
        ]));
        for (let n = 2; n <= 12; n++) {
            const { collection } = partitionSectors(ring, { sectorCount: n, center: { x: 0, y: 0 } });
            const sizes = Array.from({ length: n }, (_, k) => holesInSector(collection, k).length);
            expect(sizes.reduce((a, b) => a + b, 0)).toBe(36);
            expect(collection.toArray().every(h => h.sector !== null && h.sector >= 0 && h.sector < n)).toBe(true);
        }
    });

    it('uses an explicit center when given', () => {
        const { collection } = partitionSectors(collectionOf([[10, 10], [-10, 10]]), { sectorCount: 2, center: { x: 0, y: 0 } });
        expect(collection.toArray().map(h => h.sector)).toEqual([0, 0]);
    });

    it('rejects sector counts outside 2..12', () => {
        for (const n of [1, 13, 2.5]) {
            expect(() => partitionSectors(grid3x3(), { sectorCount: n })).toThrowError(PartitionError);
        }
    });

    it('leaves the source collection untouched', () => {
        const source = grid3x3();
        partitionSectors(source, { sectorCount: 4 });
        expect(source.toArray().every(h => h.sector === null)).toBe(true);
    });
});
