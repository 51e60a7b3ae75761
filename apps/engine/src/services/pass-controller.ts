import {
    DefinitionRegistry,
    RunResult,
    StageGraphResult,
    TriggerKind,
    UnknownWorkflowError,
} from '@quarry/sdk';
import { v7 as uuid } from 'uuid';
import type { RunStore, TerminalRunStatus } from '../repositories/run-store';
import type { BackoffOptions } from '../utils/backoff';
import { createLimiter, Limiter } from '../utils/limiter';
import { parseSchedule, ScheduleSpec, validateSchedule } from '../utils/schedule';
import { RunRecorder } from './run-recorder';
import { ScheduleTrigger, TimerTrigger, TriggerHandle } from './schedule-trigger';
import { StageGraphRunner } from './stage-graph-runner';
import { WorkflowRunner } from './workflow-runner';

const TAG = '[pass]';

export interface PassControllerOptions {
    /** Shared bound on concurrently running task bodies. */
    limiter?: Limiter;
    maxConcurrentSteps?: number;
    stepTimeoutMs?: number;
    retry?: BackoffOptions;
    /** Should match the run store's limit; larger step payloads fail the step. */
    maxPayloadBytes?: number;
    trigger?: ScheduleTrigger;
    generateId?: () => string;
}

export interface PassOptions {
    input?: Record<string, unknown>;
    trigger?: TriggerKind;
}

export interface RunHandle {
    runId: string;
    result: Promise<RunResult>;
    /** Steps already running finish; everything after the next barrier is skipped. */
    cancel(): void;
}

export interface ScheduledPassOptions {
    input?: Record<string, unknown>;
    onRun?: (result: RunResult) => void;
    onError?: (error: unknown) => void;
}

export interface ScheduleHandle {
    id: string;
    workflow: string;
    schedule: ScheduleSpec;
}

export function runStatus(graphs: readonly StageGraphResult[]): TerminalRunStatus {
    if (graphs.some(g => g.status === 'cancelled')) return 'cancelled';
    const succeeded = graphs.filter(g => g.status === 'succeeded').length;
    if (succeeded === graphs.length) return 'succeeded';
    if (succeeded === 0) return 'failed';
    return 'partially_failed';
}

/**
 * Entry point for executing workflows: one-off passes, cancellable passes and
 * recurring scheduled passes. Every pass gets its own run id and record;
 * overlapping passes of the same workflow share nothing but the limiter.
 */
export class PassController {
    private readonly limiter: Limiter;
    private readonly trigger: ScheduleTrigger;
    private readonly generateId: () => string;
    private readonly workflowRunner: WorkflowRunner;
    private readonly schedules = new Map<string, TriggerHandle>();
    private readonly inFlight = new Map<string, Promise<RunResult>>();

    constructor(
        private readonly registry: DefinitionRegistry,
        private readonly store: RunStore,
        options: PassControllerOptions = {},
    ) {
        this.limiter = options.limiter ?? createLimiter(options.maxConcurrentSteps ?? 4);
        this.trigger = options.trigger ?? new TimerTrigger();
        this.generateId = options.generateId ?? (() => uuid());

        const stageRunner = new StageGraphRunner(registry, this.limiter, {
            stepTimeoutMs: options.stepTimeoutMs ?? 30_000,
            retry: options.retry ?? {},
            maxPayloadBytes: options.maxPayloadBytes,
        });
        this.workflowRunner = new WorkflowRunner(registry, stageRunner);
    }

    async firstPass(workflowName: string, input: Record<string, unknown> = {}): Promise<RunResult> {
        return this.startPass(workflowName, { input, trigger: 'once' }).result;
    }

    /** Throws `UnknownWorkflowError` synchronously; nothing is persisted in that case. */
    startPass(workflowName: string, options: PassOptions = {}): RunHandle {
        const release = this.registry.acquire(workflowName);
        const runId = this.generateId();
        const controller = new AbortController();

        const result = this.execute(workflowName, runId, options, controller.signal).finally(() => {
            release();
            this.inFlight.delete(runId);
        });
        this.inFlight.set(runId, result);

        return {
            runId,
            result,
            cancel: () => {
                if (!controller.signal.aborted) {
                    console.log(`${TAG} run ${runId}: cancellation requested`);
                    controller.abort();
                }
            },
        };
    }

    scheduledPass(
        workflowName: string,
        schedule: ScheduleSpec | string,
        options: ScheduledPassOptions = {},
    ): ScheduleHandle {
        if (!this.registry.getWorkflow(workflowName)) {
            throw new UnknownWorkflowError(workflowName);
        }
        const parsed = typeof schedule === 'string' ? parseSchedule(schedule) : schedule;
        validateSchedule(parsed);

        const id = this.generateId();
        const handle = this.trigger.schedule(parsed, firedAt => {
            console.log(`${TAG} schedule ${id}: "${workflowName}" fired at ${firedAt.toISOString()}`);
            this.fire(workflowName, options);
        });
        this.schedules.set(id, handle);

        console.log(`${TAG} schedule ${id} installed for "${workflowName}"`);
        return { id, workflow: workflowName, schedule: parsed };
    }

    /** Stops future occurrences; runs already started finish on their own. */
    cancel(handle: ScheduleHandle): boolean {
        const trigger = this.schedules.get(handle.id);
        if (!trigger) return false;
        trigger.stop();
        this.schedules.delete(handle.id);
        console.log(`${TAG} schedule ${handle.id} cancelled`);
        return true;
    }

    get activeRuns(): number {
        return this.inFlight.size;
    }

    async shutdown(): Promise<void> {
        for (const [id, trigger] of this.schedules) {
            trigger.stop();
            this.schedules.delete(id);
        }
        await Promise.allSettled(Array.from(this.inFlight.values()));
        console.log(`${TAG} shutdown complete`);
    }

    private fire(workflowName: string, options: ScheduledPassOptions): void {
        const report = (error: unknown) => {
            if (options.onError) options.onError(error);
            else console.error(`${TAG} scheduled pass of "${workflowName}" failed:`, error);
        };

        let handle: RunHandle;
        try {
            handle = this.startPass(workflowName, { input: options.input, trigger: 'scheduled' });
        } catch (error) {
            report(error);
            return;
        }

        handle.result
            .then(result => options.onRun?.(result))
            .catch(report);
    }

    private async execute(
        workflowName: string,
        runId: string,
        options: PassOptions,
        signal: AbortSignal,
    ): Promise<RunResult> {
        const wf = this.registry.getWorkflow(workflowName);
        if (!wf) throw new UnknownWorkflowError(workflowName);

        const input = options.input ?? {};
        const trigger = options.trigger ?? 'once';
        const startedAt = new Date();
        const recorder = new RunRecorder(runId, this.store);

        await this.store.createRun({ runId, workflow: wf.name, trigger, input, startedAt });
        console.log(`${TAG} run ${runId}: "${wf.name}" started (${trigger})`);

        let stageGraphs: StageGraphResult[];
        try {
            stageGraphs = await this.workflowRunner.run(wf, { runId, input, recorder, signal });
        } catch (error) {
            recorder.seal();
            console.error(`${TAG} run ${runId}: aborted by infrastructure failure:`, error);
            try {
                await this.store.sealRun(runId, 'failed', new Date());
            } catch (sealError) {
                console.error(`${TAG} run ${runId}: could not be sealed as failed:`, sealError);
            }
            throw error;
        }

        recorder.seal();
        const status = runStatus(stageGraphs);
        const finishedAt = new Date();
        await this.store.sealRun(runId, status, finishedAt);
        console.log(`${TAG} run ${runId}: "${wf.name}" ${status} in ${finishedAt.getTime() - startedAt.getTime()}ms`);

        return {
            runId,
            workflow: wf.name,
            trigger,
            status,
            input,
            startedAt,
            finishedAt,
            stageGraphs,
            outcomes: stageGraphs.flatMap(g => g.outcomes),
        };
    }
}
