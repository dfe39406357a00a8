import { Point } from '../../types';
import { degreesToRadians, normalizeDegrees } from './angles';

/**
 * Cosine and sine of an angle in degrees; quarter turns are returned exactly so that
 * rotated grids stay on their axes.
 */
export const exactTrig = (degrees: number): { cos: number; sin: number } => {
    const d = normalizeDegrees(degrees);
    if (d === 0) return { cos: 1, sin: 0 };
    if (d === 90) return { cos: 0, sin: 1 };
    if (d === 180) return { cos: -1, sin: 0 };
    if (d === 270) return { cos: 0, sin: -1 };
    const rad = degreesToRadians(d);
    return { cos: Math.cos(rad), sin: Math.sin(rad) };
};

/**
 * Rotates a point CCW about a pivot.
 */
export const rotatePoint = (p: Point, pivot: Point, degrees: number): Point => {
    const { cos, sin } = exactTrig(degrees);
    const x = p.x - pivot.x;
    const y = p.y - pivot.y;
    return {
        x: pivot.x + (x * cos - y * sin),
        y: pivot.y + (x * sin + y * cos)
    };
};

/**
 * Mirrors a point across the X axis (device Y-down to math Y-up).
 */
export const flipPointY = (p: Point): Point => ({ x: p.x, y: p.y === 0 ? 0 : -p.y });
