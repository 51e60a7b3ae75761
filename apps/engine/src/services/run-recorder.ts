import type { StepOutcome } from '@quarry/sdk';
import { RunSealedError } from '../errors/run-sealed.error';
import type { RunStore } from '../repositories/run-store';

export type OutcomeLookup = (stageGraph: string, step: string) => StepOutcome | undefined;

/**
 * Append-only outcome log of one run. Each step writes exactly one outcome;
 * `seq` is taken synchronously at append time, so concurrent steps of a stage
 * land on distinct entries without further locking.
 */
export class RunRecorder {
    private readonly outcomes: StepOutcome[] = [];
    private readonly byStep = new Map<string, StepOutcome>();
    private sealed = false;

    constructor(
        readonly runId: string,
        private readonly store: RunStore,
    ) { }

    async record(outcome: StepOutcome): Promise<StepOutcome> {
        if (this.sealed) throw new RunSealedError(this.runId);

        const key = `${outcome.stageGraph}/${outcome.step}`;
        if (this.byStep.has(key)) {
            throw new Error(`run ${this.runId}: step ${key} already has an outcome`);
        }

        const frozen = Object.freeze({ ...outcome });
        const seq = this.outcomes.length;
        this.outcomes.push(frozen);
        this.byStep.set(key, frozen);

        await this.store.appendOutcome(this.runId, seq, frozen);
        return frozen;
    }

    readonly lookup: OutcomeLookup = (stageGraph, step) => this.byStep.get(`${stageGraph}/${step}`);

    /** Completion order. */
    all(): readonly StepOutcome[] {
        return this.outcomes;
    }

    seal(): void {
        this.sealed = true;
    }

    get isSealed(): boolean {
        return this.sealed;
    }
}
