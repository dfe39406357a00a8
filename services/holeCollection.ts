import { HoleStatus, Bounds, Hole, HoleCollectionMetadata, SectorId, StatusCounts } from '../types';
import { CollectionError } from '../utils/errors';
import { boundsOf } from './geometry';

export interface HoleInit {
    id: string;
    centerX: number;
    centerY: number;
    radius: number;
    layer?: string;
    row?: number | null;
    column?: number | null;
    status?: HoleStatus;
    sector?: SectorId | null;
}

export const createHole = (init: HoleInit): Hole => ({
    id: init.id,
    centerX: init.centerX,
    centerY: init.centerY,
    radius: init.radius,
    layer: init.layer ?? '0',
    row: init.row ?? null,
    column: init.column ?? null,
    status: init.status ?? HoleStatus.Pending,
    sector: init.sector ?? null,
});

export const emptyStatusCounts = (): StatusCounts => ({
    [HoleStatus.Pending]: 0,
    [HoleStatus.Processing]: 0,
    [HoleStatus.Qualified]: 0,
    [HoleStatus.Defective]: 0,
    [HoleStatus.Blind]: 0,
    [HoleStatus.TieRod]: 0,
});

/**
 * Keyed set of holes. Lookups go through the id map, iteration follows insertion
 * order. Transformations build a new collection; only `status` and `sector` of a
 * hole are ever changed in place.
 */
export class HoleCollection implements Iterable<Hole> {
    private readonly byId = new Map<string, Hole>();
    private cachedBounds: Bounds | null = null;
    readonly metadata: Readonly<HoleCollectionMetadata>;

    constructor(holes: Iterable<Hole> = [], metadata?: Partial<HoleCollectionMetadata>) {
        for (const hole of holes) {
            if (this.byId.has(hole.id)) {
                throw new CollectionError('DuplicateId', `Hole id "${hole.id}" appears more than once`, { id: hole.id });
            }
            this.byId.set(hole.id, hole);
        }
        this.metadata = {
            source: metadata?.source,
            normalizations: [...(metadata?.normalizations ?? [])],
        };
    }

    get size(): number {
        return this.byId.size;
    }

    get isEmpty(): boolean {
        return this.byId.size === 0;
    }

    has(id: string): boolean {
        return this.byId.has(id);
    }

    get(id: string): Hole | undefined {
        return this.byId.get(id);
    }

    ids(): string[] {
        return [...this.byId.keys()];
    }

    toArray(): Hole[] {
        return [...this.byId.values()];
    }

    [Symbol.iterator](): Iterator<Hole> {
        return this.byId.values();
    }

    /**
     * Bounds of the hole centers, computed once.
     */
    get bounds(): Bounds {
        if (!this.cachedBounds) {
            this.cachedBounds = boundsOf(this.toArray().map(h => ({ x: h.centerX, y: h.centerY })));
        }
        return this.cachedBounds;
    }

    /**
     * New collection built from a per-hole transform. Metadata is carried over unless replaced.
     */
    map(transform: (hole: Hole) => Hole, metadata?: Partial<HoleCollectionMetadata>): HoleCollection {
        return new HoleCollection(this.toArray().map(transform), { ...this.metadata, ...metadata });
    }

    filter(predicate: (hole: Hole) => boolean): Hole[] {
        return this.toArray().filter(predicate);
    }

    statusCounts(): StatusCounts {
        const counts = emptyStatusCounts();
        for (const hole of this.byId.values()) counts[hole.status]++;
        return counts;
    }
}

/**
 * Copy of a hole with overrides; the immutable geometry is taken from the source
 * unless explicitly replaced by a coordinate transform.
 */
export const cloneHole = (hole: Hole, overrides: Partial<Hole> = {}): Hole => ({ ...hole, ...overrides });
