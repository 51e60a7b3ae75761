import type { RunStatus, StepOutcome, TriggerKind } from '@quarry/sdk';

export type TerminalRunStatus = Exclude<RunStatus, 'running'>;

export interface NewRun {
    runId: string;
    workflow: string;
    trigger: TriggerKind;
    input: Record<string, unknown>;
    startedAt: Date;
}

export interface RunSummary extends NewRun {
    status: RunStatus;
    finishedAt: Date | null;
}

export interface RunRecord extends RunSummary {
    /** Completion order. */
    outcomes: StepOutcome[];
}

export interface RunQuery {
    /** Inclusive lower bound on `startedAt`. */
    from?: Date;
    /** Exclusive upper bound on `startedAt`. */
    to?: Date;
    limit?: number;
}

/** Durable run history. `RunRepository` is the Postgres implementation. */
export interface RunStore {
    createRun(run: NewRun): Promise<void>;
    appendOutcome(runId: string, seq: number, outcome: StepOutcome): Promise<void>;
    sealRun(runId: string, status: TerminalRunStatus, finishedAt: Date): Promise<void>;
    findById(runId: string): Promise<RunRecord | null>;
    listByWorkflow(workflow: string, query?: RunQuery): Promise<RunSummary[]>;
}
