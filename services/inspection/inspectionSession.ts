import { HoleStatus, Hole, ProgressSettings, StatusChange, StatusCounts, StatusUpdateOptions } from '../../types';
import { StatusError } from '../../utils/errors';
import { engineLog } from '../../utils/errorHandler';
import { getStatusName } from '../../utils/helpers';
import { DEFAULT_ENGINE_CONFIG } from '../../data/defaults';
import { HoleCollection } from '../holeCollection';
import { SectorProgressTracker } from '../progress/sectorProgressTracker';
import { canTransition } from './statusRules';

/**
 * INSPECTION SESSION
 * The single writer of hole statuses. Every accepted change mutates the hole,
 * is forwarded to the progress tracker and lands in the history.
 */
export class InspectionSession {
    readonly tracker: SectorProgressTracker;
    private readonly changes: StatusChange[] = [];

    constructor(
        readonly collection: HoleCollection,
        sectorCount: number,
        progress: ProgressSettings = DEFAULT_ENGINE_CONFIG.progress,
        private readonly now: () => number = Date.now
    ) {
        this.tracker = new SectorProgressTracker(collection, sectorCount, progress, now);
    }

    private requireHole(holeId: string): Hole {
        const hole = this.collection.get(holeId);
        if (!hole) {
            throw new StatusError('UnknownHole', `Hole ${holeId} is not part of this session`, { holeId });
        }
        return hole;
    }

    /**
     * Applies a status change. Returns the recorded change, or null when the hole
     * already had that status.
     */
    updateStatus(holeId: string, status: HoleStatus, options: StatusUpdateOptions = {}): StatusChange | null {
        const hole = this.requireHole(holeId);
        const from = hole.status;
        if (from === status) return null;

        if (!canTransition(from, status, options)) {
            throw new StatusError('IllegalTransition',
                `${holeId}: ${getStatusName(from)} -> ${getStatusName(status)} requires re-detection`,
                { holeId, from, to: status });
        }

        hole.status = status;
        this.tracker.onStatusChange(holeId, from, status);

        const change: StatusChange = {
            holeId,
            from,
            to: status,
            reason: options.reason ?? (options.redetect ? 'redetect' : 'inspection'),
            at: this.now(),
        };
        this.changes.push(change);
        engineLog('InspectionSession', `${holeId} ${from} -> ${status}`);
        return change;
    }

    /**
     * Puts every hole back to pending, as a re-detection.
     */
    resetAll(reason = 'reset'): number {
        let count = 0;
        for (const hole of this.collection) {
            if (this.updateStatus(hole.id, HoleStatus.Pending, { redetect: true, reason })) count++;
        }
        return count;
    }

    history(holeId?: string): StatusChange[] {
        return holeId === undefined ? [...this.changes] : this.changes.filter(c => c.holeId === holeId);
    }

    statusCounts(): StatusCounts {
        return this.collection.statusCounts();
    }
}
