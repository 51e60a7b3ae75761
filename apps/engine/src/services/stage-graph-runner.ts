import {
    DEFAULT_MAX_PAYLOAD_BYTES,
    deserialize,
    err,
    ErrorDetail,
    ok,
    OutputValidationError,
    Result,
    serialize,
    SerializationError,
    SkipReason,
    StageGraph,
    StageGraphResult,
    StageGraphStatus,
    StepInstruction,
    StepOutcome,
    StepStatus,
    Task,
    UnknownTaskError,
} from '@quarry/sdk';
import { StepTimeoutError } from '../errors/step-timeout.error';
import { BackoffOptions, calculateBackOff, sleep } from '../utils/backoff';
import type { Limiter } from '../utils/limiter';
import { substituteParameters, validateParameters } from './parameter-resolver';
import type { RunRecorder } from './run-recorder';

const TAG = '[stage-runner]';

export interface RunContext {
    runId: string;
    input: Readonly<Record<string, unknown>>;
    recorder: RunRecorder;
    /** Checked at stage and position barriers only. */
    signal: AbortSignal;
}

export interface TaskSource {
    getTask(name: string): Task | undefined;
}

export interface StepExecutionOptions {
    /** Applies when a task sets no timeout of its own. 0 disables. */
    stepTimeoutMs: number;
    retry: BackoffOptions;
    /** Encoded size limit for a step's inputs and output. */
    maxPayloadBytes?: number;
}

export function toErrorDetail(error: unknown): ErrorDetail {
    return error instanceof Error
        ? { name: error.name, message: error.message }
        : { name: 'Error', message: String(error) };
}

export function graphStatus(outcomes: readonly StepOutcome[]): StageGraphStatus {
    if (outcomes.some(o => o.status === 'failed')) return 'failed';
    if (outcomes.some(o => o.skipReason === 'cancelled')) return 'cancelled';
    if (outcomes.every(o => o.status === 'succeeded')) return 'succeeded';
    return 'skipped';
}

/**
 * Executes one stage graph: stages strictly in order, the steps of a stage
 * concurrently. A step whose dependency failed or was skipped is itself skipped
 * without running; a failing step never aborts its siblings.
 */
export class StageGraphRunner {
    constructor(
        private readonly tasks: TaskSource,
        private readonly limiter: Limiter,
        private readonly options: StepExecutionOptions,
    ) { }

    async run(graph: StageGraph, run: RunContext): Promise<StageGraphResult> {
        console.log(`${TAG} run ${run.runId}: stage graph "${graph.name}" started (${graph.plan.length} stages)`);
        const statuses = new Map<string, StepStatus>();
        const outcomes: StepOutcome[] = [];
        let cancelled = false;

        for (const stage of graph.plan) {
            if (!cancelled && run.signal.aborted) {
                console.log(`${TAG} run ${run.runId}: cancelled before stage ${stage.stage} of "${graph.name}"`);
                cancelled = true;
            }

            const settled = await Promise.allSettled(
                stage.steps.map(name => this.runStep(graph, name, statuses, run, cancelled)),
            );

            const failure = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
            if (failure) throw failure.reason;

            for (const result of settled) {
                if (result.status !== 'fulfilled') continue;
                statuses.set(result.value.step, result.value.status);
                outcomes.push(result.value);
            }
        }

        const status = graphStatus(outcomes);
        console.log(`${TAG} run ${run.runId}: stage graph "${graph.name}" ${status}`);
        return { stageGraph: graph.name, status, outcomes };
    }

    /** Records every step of the graph as skipped without running anything. */
    async skip(graph: StageGraph, run: RunContext, reason: SkipReason): Promise<StageGraphResult> {
        const outcomes: StepOutcome[] = [];
        for (const stage of graph.plan) {
            for (const name of stage.steps) {
                outcomes.push(await this.recordSkip(graph, this.instruction(graph, name), run, reason, new Date()));
            }
        }
        console.log(`${TAG} run ${run.runId}: stage graph "${graph.name}" skipped (${reason})`);
        return { stageGraph: graph.name, status: reason === 'cancelled' ? 'cancelled' : 'skipped', outcomes };
    }

    private instruction(graph: StageGraph, name: string): Readonly<StepInstruction> {
        const step = graph.steps.get(name);
        if (!step) throw new Error(`stage graph "${graph.name}" has no step "${name}" in its plan`);
        return step;
    }

    private async runStep(
        graph: StageGraph,
        name: string,
        statuses: ReadonlyMap<string, StepStatus>,
        run: RunContext,
        cancelled: boolean,
    ): Promise<StepOutcome> {
        const step = this.instruction(graph, name);
        const startedAt = new Date();
        if (cancelled) {
            return this.recordSkip(graph, step, run, 'cancelled', startedAt);
        }

        const depStatuses = (step.dependsOn ?? []).map(dep => statuses.get(dep));
        if (depStatuses.includes('failed')) {
            return this.recordSkip(graph, step, run, 'dependency_failed', startedAt);
        }
        if (depStatuses.some(s => s !== 'succeeded')) {
            return this.recordSkip(graph, step, run, 'dependency_skipped', startedAt);
        }

        const task = this.tasks.getTask(step.task);
        if (!task) {
            return this.recordFailure(graph, step, run, new UnknownTaskError(graph.name, step.name, step.task), null, 0, startedAt);
        }

        const substituted = substituteParameters(step, {
            stageGraph: graph.name,
            lookup: run.recorder.lookup,
            runInput: run.input,
        });
        if (!substituted.ok) {
            return this.recordFailure(graph, step, run, substituted.error, null, 0, startedAt);
        }
        const params = substituted.value;

        const storable = this.storable(params);
        if (!storable.ok) {
            return this.recordFailure(graph, step, run, storable.error, null, 0, startedAt);
        }

        const validated = validateParameters(step, task, params);
        if (!validated.ok) {
            return this.recordFailure(graph, step, run, validated.error, params, 0, startedAt);
        }
        const value = validated.value;

        const retries = task.retries ?? 0;
        let attempts = 0;
        let output: unknown;
        for (;;) {
            attempts++;
            try {
                output = await this.limiter.run(() => this.invoke(task, step.name, value));
                break;
            } catch (error) {
                if (attempts > retries) {
                    return this.recordFailure(graph, step, run, error, params, attempts, startedAt);
                }
                const delay = calculateBackOff(attempts, this.options.retry);
                console.warn(`${TAG} run ${run.runId}: ${graph.name}/${step.name} attempt ${attempts} failed, retrying in ${delay}ms:`, toErrorDetail(error).message);
                await sleep(delay);
            }
        }

        if (task.output) {
            const checked = task.output.validate(output);
            if (!checked.ok) {
                return this.recordFailure(graph, step, run, new OutputValidationError(step.name, checked.error.issues), params, attempts, startedAt);
            }
            output = checked.value;
        }

        // The recorded output is a copy the body no longer holds.
        const recorded = this.storable(output);
        if (!recorded.ok) {
            return this.recordFailure(graph, step, run, recorded.error, params, attempts, startedAt);
        }

        return run.recorder.record({
            stageGraph: graph.name,
            step: step.name,
            task: step.task,
            status: 'succeeded',
            inputs: params,
            output: recorded.value,
            error: null,
            skipReason: null,
            attempts,
            startedAt,
            finishedAt: new Date(),
        });
    }

    /** Encodes a payload the way the run store will, returning the decoded copy. */
    private storable(value: unknown): Result<unknown, SerializationError> {
        try {
            const encoded = serialize(value, this.options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES);
            return ok(deserialize(encoded) ?? null);
        } catch (error) {
            if (error instanceof SerializationError) return err(error);
            throw error;
        }
    }

    private invoke(task: Task, stepName: string, input: unknown): Promise<unknown> {
        const timeoutMs = task.timeoutMs ?? this.options.stepTimeoutMs;
        const body = Promise.resolve().then(() => task.run(input));
        if (!timeoutMs) return body;

        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new StepTimeoutError(stepName, timeoutMs)), timeoutMs);
        });
        return Promise.race([body, timeout]).finally(() => clearTimeout(timer));
    }

    private recordFailure(
        graph: StageGraph,
        step: Readonly<StepInstruction>,
        run: RunContext,
        error: unknown,
        inputs: Record<string, unknown> | null,
        attempts: number,
        startedAt: Date,
    ): Promise<StepOutcome> {
        const detail = toErrorDetail(error);
        console.error(`${TAG} run ${run.runId}: ${graph.name}/${step.name} failed: ${detail.name}: ${detail.message}`);
        return run.recorder.record({
            stageGraph: graph.name,
            step: step.name,
            task: step.task,
            status: 'failed',
            inputs,
            output: null,
            error: detail,
            skipReason: null,
            attempts,
            startedAt,
            finishedAt: new Date(),
        });
    }

    private recordSkip(
        graph: StageGraph,
        step: Readonly<StepInstruction>,
        run: RunContext,
        reason: SkipReason,
        startedAt: Date,
    ): Promise<StepOutcome> {
        return run.recorder.record({
            stageGraph: graph.name,
            step: step.name,
            task: step.task,
            status: 'skipped',
            inputs: null,
            output: null,
            error: null,
            skipReason: reason,
            attempts: 0,
            startedAt,
            finishedAt: new Date(),
        });
    }
}
