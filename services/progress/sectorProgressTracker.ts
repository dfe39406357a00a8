import { HoleStatus, ProgressSettings, ProgressSnapshot, SectorId, SectorProgress, StatusCounts } from '../../types';
import { ProgressError } from '../../utils/errors';
import { DEFAULT_ENGINE_CONFIG } from '../../data/defaults';
import { HoleCollection, emptyStatusCounts } from '../holeCollection';
import { sumCounts, toSectorProgress } from './progressMath';

interface PendingChange {
    holeId: string;
    from: HoleStatus;
    to: HoleStatus;
}

export type ProgressListener = (snapshot: ProgressSnapshot) => void;

/**
 * SECTOR PROGRESS TRACKER
 * Per-sector and global status counters, fed by status-change events.
 *
 * Writes come from a single writer (the inspection session). With `coalesce`, events
 * are buffered and applied on flush; a read flushes once `flushIntervalMs` has passed
 * since the previous flush. Readers always get a frozen snapshot that is swapped in
 * whole, never a half-applied batch. No timers are owned here.
 */
export class SectorProgressTracker {
    private readonly sectorOf = new Map<string, SectorId>();
    private readonly statusOf = new Map<string, HoleStatus>();
    private readonly counters: StatusCounts[];
    private readonly sectorTotals: number[];
    private readonly listeners = new Set<ProgressListener>();
    private buffer: PendingChange[] = [];
    private published: ProgressSnapshot;
    private lastFlushAt: number;
    private version = 0;
    private mismatches = 0;

    constructor(
        collection: HoleCollection,
        public readonly sectorCount: number,
        private readonly settings: ProgressSettings = DEFAULT_ENGINE_CONFIG.progress,
        private readonly now: () => number = Date.now
    ) {
        this.counters = Array.from({ length: sectorCount }, () => emptyStatusCounts());
        this.sectorTotals = new Array<number>(sectorCount).fill(0);

        for (const hole of collection) {
            if (hole.sector === null || hole.sector < 0 || hole.sector >= sectorCount) {
                throw new ProgressError('UnpartitionedHole',
                    `Hole ${hole.id} has no sector within 0..${sectorCount - 1}`,
                    { holeId: hole.id, sector: hole.sector });
            }
            this.sectorOf.set(hole.id, hole.sector);
            this.statusOf.set(hole.id, hole.status);
            this.counters[hole.sector][hole.status]++;
            this.sectorTotals[hole.sector]++;
        }

        this.lastFlushAt = this.now();
        this.published = this.buildSnapshot();
    }

    /**
     * Records a status change. Buffered when coalescing, published immediately otherwise.
     */
    onStatusChange(holeId: string, oldStatus: HoleStatus, newStatus: HoleStatus): void {
        if (!this.sectorOf.has(holeId)) {
            throw new ProgressError('UnknownHole', `Hole ${holeId} is not tracked`, { holeId });
        }
        if (oldStatus === newStatus) return;

        const change: PendingChange = { holeId, from: oldStatus, to: newStatus };
        if (this.settings.coalesce) {
            this.buffer.push(change);
            return;
        }
        this.apply(change);
        this.publish();
    }

    /**
     * Applies every buffered change and publishes a new snapshot.
     */
    flush(): ProgressSnapshot {
        const batch = this.buffer;
        this.buffer = [];
        for (const change of batch) this.apply(change);
        this.publish();
        return this.published;
    }

    snapshot(sector?: SectorId): SectorProgress {
        const current = this.snapshotAll();
        if (sector === undefined) return current.global;
        const found = current.sectors[sector];
        if (!found) {
            throw new ProgressError('UnknownSector', `Sector ${sector} is outside 0..${this.sectorCount - 1}`, { sector });
        }
        return found;
    }

    snapshotAll(): ProgressSnapshot {
        if (this.buffer.length > 0 && this.now() - this.lastFlushAt >= this.settings.flushIntervalMs) {
            this.flush();
        }
        return this.published;
    }

    subscribe(listener: ProgressListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    get pendingCount(): number {
        return this.buffer.length;
    }

    /**
     * Events whose reported old status disagreed with the tracked one.
     */
    get mismatchCount(): number {
        return this.mismatches;
    }

    private apply(change: PendingChange): void {
        const sector = this.sectorOf.get(change.holeId);
        const recorded = this.statusOf.get(change.holeId);
        if (sector === undefined || recorded === undefined) return;

        // Recorded status wins over the reported one
        if (recorded !== change.from) this.mismatches++;
        if (recorded === change.to) return;

        this.counters[sector][recorded]--;
        this.counters[sector][change.to]++;
        this.statusOf.set(change.holeId, change.to);
    }

    private publish(): void {
        this.version++;
        this.lastFlushAt = this.now();
        this.published = this.buildSnapshot();
        for (const listener of this.listeners) listener(this.published);
    }

    private buildSnapshot(): ProgressSnapshot {
        const sectors = this.counters.map((counts, k) => Object.freeze(toSectorProgress(k, counts, this.sectorTotals[k])));
        const total = this.sectorTotals.reduce((sum, n) => sum + n, 0);
        return Object.freeze({
            version: this.version,
            flushedAt: this.lastFlushAt,
            global: Object.freeze(toSectorProgress(null, sumCounts(this.counters), total)),
            sectors: Object.freeze(sectors),
        });
    }
}
