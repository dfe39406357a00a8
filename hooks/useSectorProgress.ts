/**
 * RESPONSIBILITY: Exposes the tracker's published snapshot to the UI.
 * Publishes arrive through the subscription; the interval only gives the tracker
 * a chance to flush its buffer when no one else reads it.
 */
import { useState, useEffect } from 'react';
import { ProgressSnapshot } from '../types';
import { SectorProgressTracker } from '../services/progress/sectorProgressTracker';

export const useSectorProgress = (tracker: SectorProgressTracker | null, pollIntervalMs: number) => {
    const [snapshot, setSnapshot] = useState<ProgressSnapshot | null>(() => tracker?.snapshotAll() ?? null);

    useEffect(() => {
        if (!tracker) {
            setSnapshot(null);
            return;
        }
        setSnapshot(tracker.snapshotAll());
        const unsubscribe = tracker.subscribe(setSnapshot);
        const interval = window.setInterval(() => tracker.snapshotAll(), pollIntervalMs);
        return () => {
            unsubscribe();
            clearInterval(interval);
        };
    }, [tracker, pollIntervalMs]);

    return snapshot;
};
