import { Point, Bounds } from '../../types';

/**
 * Squared distance between two points.
 */
export const distanceSq = (p1: Point, p2: Point) => (p1.x - p2.x)**2 + (p1.y - p2.y)**2;

export const distance = (p1: Point, p2: Point) => Math.sqrt(distanceSq(p1, p2));

/**
 * Axis-aligned bounds of a point set. Empty input yields zero bounds.
 */
export const boundsOf = (points: Iterable<Point>): Bounds => {
    let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
    for (const p of points) {
        if (p.x < minX) minX = p.x;
        if (p.x > maxX) maxX = p.x;
        if (p.y < minY) minY = p.y;
        if (p.y > maxY) maxY = p.y;
    }
    if (minX === Infinity) return { minX: 0, minY: 0, maxX: 0, maxY: 0 };
    return { minX, minY, maxX, maxY };
};

/**
 * Center of a bounding box.
 */
export const boundsCenter = (bounds: Bounds): Point => ({
    x: (bounds.minX + bounds.maxX) / 2,
    y: (bounds.minY + bounds.maxY) / 2
});

export const mean = (values: number[]): number => values.reduce((sum, v) => sum + v, 0) / values.length;
