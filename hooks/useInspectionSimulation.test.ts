import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { renderHook, act } from '@testing-library/react';
import { HoleStatus, Hole, PathStep } from '../types';
import { HoleCollection, createHole } from '../services/holeCollection';
import { InspectionSession } from '../services/inspection/inspectionSession';
import { useInspectionSimulation } from './useInspectionSimulation';

const settings = { stepIntervalMs: 100, successRate: 0.5 };
const alwaysPass = () => 0;
const steps: PathStep[] = [
    { index: 0, holeIds: ['A'], isPair: false },
    { index: 1, holeIds: ['B'], isPair: false },
];

const makeSession = () => {
    const holes: Hole[] = [
        createHole({ id: 'A', centerX: 0, centerY: 0, radius: 8.865, sector: 0 }),
        createHole({ id: 'B', centerX: 10, centerY: 0, radius: 8.865, sector: 0 }),
    ];
    return new InspectionSession(new HoleCollection(holes), 2, { flushIntervalMs: 1000, coalesce: false });
};

describe('useInspectionSimulation', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('plays the path on the step interval and stops at the end', () => {
        const session = makeSession();
        const { result } = renderHook(() => useInspectionSimulation(session, steps, settings, alwaysPass));

        act(() => {
            result.current.startSimulation();
        });
        expect(result.current.isSimulating).toBe(true);

        act(() => {
            vi.advanceTimersByTime(100);
        });
        expect(result.current.currentStep).toBe(0);
        expect(session.collection.get('A')?.status).toBe(HoleStatus.Processing);

        act(() => {
            vi.advanceTimersByTime(200);
        });
        expect(result.current.isComplete).toBe(true);
        expect(result.current.isSimulating).toBe(false);
        expect(session.statusCounts()[HoleStatus.Qualified]).toBe(2);
    });

    it('steps manually and resets', () => {
        const session = makeSession();
        const { result } = renderHook(() => useInspectionSimulation(session, steps, settings, alwaysPass));

        act(() => {
            result.current.stepSimulation();
        });
        act(() => {
            result.current.stepSimulation();
        });
        expect(result.current.currentStep).toBe(1);
        expect(session.collection.get('A')?.status).toBe(HoleStatus.Qualified);

        act(() => {
            result.current.resetSimulation();
        });
        expect(result.current.currentStep).toBe(-1);
        expect(session.statusCounts()[HoleStatus.Pending]).toBe(2);
    });

    it('does nothing without a session', () => {
        const { result } = renderHook(() => useInspectionSimulation(null, steps, settings, alwaysPass));
        act(() => {
            result.current.startSimulation();
        });
        expect(result.current.isSimulating).toBe(false);
    });
});
