import type { Schema } from './schema';

export interface TaskDefinition<I = unknown, O = unknown> {
    name: string;
    input: Schema<I>;
    /** Omit for tasks that produce no output. */
    output?: Schema<O>;
    run(input: I): O | Promise<O>;
    description?: string;
    tags?: string[];
    /** Additional attempts after a body failure. Parameter validation failures are never retried. */
    retries?: number;
    /** Overrides the engine default. 0 disables the timeout. */
    timeoutMs?: number;
}

export type Task<I = unknown, O = unknown> = Readonly<TaskDefinition<I, O>>;

export interface LiteralParam {
    kind: 'literal';
    value: unknown;
}

export interface ReferenceParam {
    kind: 'reference';
    step: string;
    /** Stage graph owning `step`; absent means the graph the instruction belongs to. */
    graph?: string;
    /** Field path into the referenced output. */
    path?: readonly (string | number)[];
}

export interface RunInputParam {
    kind: 'input';
    key: string;
}

export type ParamValue = LiteralParam | ReferenceParam | RunInputParam;

export interface StepInstruction {
    name: string;
    task: string;
    params?: Readonly<Record<string, ParamValue>>;
    /**
     * Steps sharing a stage number are eligible to run concurrently; ties are a
     * concurrency hint, not an ambiguity. A step's dependencies must all sit in
     * strictly lower stages.
     */
    stage: number;
    dependsOn?: readonly string[];
}

export interface PlannedStage {
    stage: number;
    /** Declaration order. */
    steps: readonly string[];
}

export type StagePlan = readonly PlannedStage[];

export interface StageGraphDefinition {
    name: string;
    steps: StepInstruction[];
    description?: string;
}

export interface StageGraph {
    readonly name: string;
    readonly description?: string;
    readonly steps: ReadonlyMap<string, Readonly<StepInstruction>>;
    readonly plan: StagePlan;
}

export interface WorkflowEntry {
    stageGraph: string;
    /** Entries sharing a position run concurrently. */
    position: number;
    /** Stage graphs at lower positions whose outputs this one consumes. */
    dependsOn?: readonly string[];
}

export interface WorkflowDefinition {
    name: string;
    stageGraphs: WorkflowEntry[];
    description?: string;
    tags?: string[];
}

export interface PlannedPosition {
    position: number;
    entries: readonly Readonly<WorkflowEntry>[];
}

export interface Workflow {
    readonly name: string;
    readonly description?: string;
    readonly tags: readonly string[];
    readonly entries: readonly Readonly<WorkflowEntry>[];
    readonly positions: readonly PlannedPosition[];
}

// --- run records ---

export type StepStatus = 'succeeded' | 'failed' | 'skipped';

export type SkipReason = 'dependency_failed' | 'dependency_skipped' | 'upstream_failed' | 'cancelled';

export interface ErrorDetail {
    name: string;
    message: string;
}

export interface StepOutcome {
    stageGraph: string;
    step: string;
    task: string;
    status: StepStatus;
    inputs: Record<string, unknown> | null;
    output: unknown;
    error: ErrorDetail | null;
    skipReason: SkipReason | null;
    attempts: number;
    startedAt: Date;
    finishedAt: Date;
}

export type StageGraphStatus = 'succeeded' | 'failed' | 'skipped' | 'cancelled';

export type RunStatus = 'running' | 'succeeded' | 'failed' | 'partially_failed' | 'cancelled';

export type TriggerKind = 'once' | 'scheduled';

export interface StageGraphResult {
    stageGraph: string;
    status: StageGraphStatus;
    outcomes: StepOutcome[];
}

export interface RunResult {
    runId: string;
    workflow: string;
    trigger: TriggerKind;
    status: Exclude<RunStatus, 'running'>;
    input: Record<string, unknown>;
    startedAt: Date;
    finishedAt: Date;
    stageGraphs: StageGraphResult[];
    outcomes: StepOutcome[];
}
