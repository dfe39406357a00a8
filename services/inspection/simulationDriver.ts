import { HoleStatus, PathStep } from '../../types';
import { DEFAULT_ENGINE_CONFIG } from '../../data/defaults';
import { InspectionSession } from './inspectionSession';
import { isTerminalStatus } from './statusRules';

export interface SimulationOptions {
    successRate?: number;
    random?: () => number;
}

/**
 * SIMULATION DRIVER
 * Walks a planned path one step at a time. Each `advance()` closes the step in
 * progress (qualified with probability `successRate`, defective otherwise) and
 * opens the next one. Holes already carrying a terminal status are left alone.
 * Timing belongs to the caller.
 */
export class InspectionSimulation {
    private index = -1;
    private readonly touched = new Set<string>();
    private readonly successRate: number;
    private readonly random: () => number;

    constructor(
        private readonly session: InspectionSession,
        readonly steps: PathStep[],
        options: SimulationOptions = {}
    ) {
        this.successRate = options.successRate ?? DEFAULT_ENGINE_CONFIG.simulation.successRate;
        this.random = options.random ?? Math.random;
    }

    /**
     * Index of the step currently being inspected; -1 before the first advance.
     */
    get currentIndex(): number {
        return this.index;
    }

    get isComplete(): boolean {
        return this.index >= this.steps.length;
    }

    /**
     * Returns false once the path is exhausted.
     */
    advance(): boolean {
        if (this.isComplete) return false;

        const current = this.steps[this.index];
        if (current) this.finalize(current);

        this.index++;
        const next = this.steps[this.index];
        if (next) this.start(next);
        return true;
    }

    /**
     * Returns every hole this simulation changed to pending and rewinds to the start.
     */
    reset(): void {
        for (const holeId of this.touched) {
            this.session.updateStatus(holeId, HoleStatus.Pending, { redetect: true, reason: 'simulation reset' });
        }
        this.touched.clear();
        this.index = -1;
    }

    private start(step: PathStep): void {
        for (const holeId of step.holeIds) {
            const hole = this.session.collection.get(holeId);
            if (!hole || isTerminalStatus(hole.status)) continue;
            this.session.updateStatus(holeId, HoleStatus.Processing, { reason: 'simulation' });
            this.touched.add(holeId);
        }
    }

    private finalize(step: PathStep): void {
        for (const holeId of step.holeIds) {
            const hole = this.session.collection.get(holeId);
            if (!hole || hole.status !== HoleStatus.Processing) continue;
            const outcome = this.random() < this.successRate ? HoleStatus.Qualified : HoleStatus.Defective;
            this.session.updateStatus(holeId, outcome, { reason: 'simulation' });
        }
    }
}
