import { describe, it, expect } from 'vitest';
import { HoleStatus, Hole } from '../../types';
import { StatusError } from '../../utils/errors';
import { HoleCollection, createHole } from '../holeCollection';
import { canTransition } from './statusRules';
import { InspectionSession } from './inspectionSession';

const session = (now: () => number = () => 42) => {
    const holes: Hole[] = [
        createHole({ id: 'A', centerX: 1, centerY: 1, radius: 8.865, sector: 0 }),
        createHole({ id: 'B', centerX: -1, centerY: 1, radius: 8.865, sector: 1 }),
    ];
    return new InspectionSession(new HoleCollection(holes), 2, { flushIntervalMs: 1000, coalesce: false }, now);
};

const errorKind = (fn: () => unknown): string | null => {
    try {
        fn();
    } catch (e) {
        return e instanceof StatusError ? e.kind : 'other';
    }
    return null;
};

describe('canTransition', () => {
    it('lets open states move anywhere', () => {
        expect(canTransition(HoleStatus.Pending, HoleStatus.Blind)).toBe(true);
        expect(canTransition(HoleStatus.Processing, HoleStatus.Pending)).toBe(true);
    });

    it('locks terminal states unless re-detecting', () => {
        expect(canTransition(HoleStatus.Qualified, HoleStatus.Processing)).toBe(false);
        expect(canTransition(HoleStatus.Qualified, HoleStatus.Processing, { redetect: true })).toBe(true);
        expect(canTransition(HoleStatus.Defective, HoleStatus.Defective)).toBe(true);
    });
});

describe('InspectionSession', () => {
    it('updates the hole, the tracker and the history', () => {
        const s = session();
        const change = s.updateStatus('A', HoleStatus.Processing);

        expect(change).toEqual({ holeId: 'A', from: HoleStatus.Pending, to: HoleStatus.Processing, reason: 'inspection', at: 42 });
        expect(s.collection.get('A')?.status).toBe(HoleStatus.Processing);
        expect(s.tracker.snapshot(0).processing).toBe(1);
        expect(s.statusCounts()[HoleStatus.Processing]).toBe(1);
    });

    it('returns null and records nothing for a no-op change', () => {
        const s = session();
        expect(s.updateStatus('A', HoleStatus.Pending)).toBeNull();
        expect(s.history()).toEqual([]);
    });

    it('rejects changing a terminal status without re-detection', () => {
        const s = session();
        s.updateStatus('A', HoleStatus.Qualified);
        expect(errorKind(() => s.updateStatus('A', HoleStatus.Defective))).toBe('IllegalTransition');

        const change = s.updateStatus('A', HoleStatus.Defective, { redetect: true });
        expect(change?.reason).toBe('redetect');
        expect(s.tracker.snapshot(0)).toMatchObject({ qualified: 0, defective: 1 });
    });

    it('rejects unknown holes', () => {
        expect(errorKind(() => session().updateStatus('Z', HoleStatus.Qualified))).toBe('UnknownHole');
    });

    it('filters history by hole', () => {
        const s = session();
        s.updateStatus('A', HoleStatus.Processing, { reason: 'probe' });
        s.updateStatus('B', HoleStatus.Blind);
        s.updateStatus('A', HoleStatus.Qualified);

        expect(s.history().map(c => c.holeId)).toEqual(['A', 'B', 'A']);
        expect(s.history('A').map(c => [c.to, c.reason])).toEqual([
            [HoleStatus.Processing, 'probe'],
            [HoleStatus.Qualified, 'inspection'],
        ]);
    });

    it('resets every hole to pending', () => {
        const s = session();
        s.updateStatus('A', HoleStatus.Qualified);
        s.updateStatus('B', HoleStatus.TieRod);

        expect(s.resetAll()).toBe(2);
        expect(s.tracker.snapshot().pending).toBe(2);
        expect(s.history().slice(-2).map(c => c.reason)).toEqual(['reset', 'reset']);
    });
});
