/**
 * Angle helpers. Degrees, counter-clockwise from +X.
 */

export const degreesToRadians = (degrees: number) => degrees * (Math.PI / 180);
export const radiansToDegrees = (radians: number) => radians * (180 / Math.PI);

/**
 * Normalizes an angle into [0, 360).
 */
export const normalizeDegrees = (degrees: number): number => {
    const d = ((degrees % 360) + 360) % 360;
    // -1e-15 + 360 rounds to exactly 360
    return d >= 360 ? 0 : d;
};

/**
 * CCW sweep of a DXF arc from start to end. Equal angles describe a full turn.
 */
export const arcSweep = (startAngle: number, endAngle: number): number => {
    const sweep = normalizeDegrees(endAngle - startAngle);
    return sweep === 0 ? 360 : sweep;
};

interface AngularInterval { start: number; end: number; }

/**
 * Total angle of [0, 360) covered by the union of the given CCW arcs.
 */
export const angularCoverage = (arcs: { startAngle: number; endAngle: number }[]): number => {
    const intervals: AngularInterval[] = [];
    for (const arc of arcs) {
        const start = normalizeDegrees(arc.startAngle);
        const sweep = arcSweep(arc.startAngle, arc.endAngle);
        if (sweep >= 360) return 360;
        const end = start + sweep;
        if (end <= 360) {
            intervals.push({ start, end });
        } else {
            intervals.push({ start, end: 360 });
            intervals.push({ start: 0, end: end - 360 });
        }
    }

    intervals.sort((a, b) => a.start - b.start);

    let covered = 0;
    let current: AngularInterval | null = null;
    for (const interval of intervals) {
        if (current && interval.start <= current.end) {
            current.end = Math.max(current.end, interval.end);
            continue;
        }
        if (current) covered += current.end - current.start;
        current = { ...interval };
    }
    if (current) covered += current.end - current.start;

    return Math.min(covered, 360);
};

/**
 * Polar angle of (dx, dy) in [0, 360). The origin itself maps to 0.
 * Rounded to 1e-9 degrees so that points on a sector boundary are not pushed below it.
 */
export const polarAngle = (dx: number, dy: number): number =>
    normalizeDegrees(Math.round(radiansToDegrees(Math.atan2(dy, dx)) * 1e9) / 1e9);
