import { StageGraph, StageGraphResult, StageGraphStatus, Workflow, WorkflowEntry } from '@quarry/sdk';
import { RunContext, StageGraphRunner } from './stage-graph-runner';

const TAG = '[workflow-runner]';

export interface StageGraphSource {
    getStageGraph(name: string): StageGraph | undefined;
}

/**
 * Runs a workflow's positions in ascending order; stage graphs sharing a
 * position run concurrently. A stage graph whose declared upstream did not
 * succeed is skipped, and that skip propagates to its own dependents. Graphs
 * with no such dependency run regardless.
 */
export class WorkflowRunner {
    constructor(
        private readonly graphs: StageGraphSource,
        private readonly stageRunner: StageGraphRunner,
    ) { }

    async run(wf: Workflow, run: RunContext): Promise<StageGraphResult[]> {
        console.log(`${TAG} run ${run.runId}: workflow "${wf.name}" started (${wf.positions.length} positions)`);
        const statuses = new Map<string, StageGraphStatus>();
        const results: StageGraphResult[] = [];

        for (const position of wf.positions) {
            const cancelled = run.signal.aborted;
            if (cancelled) {
                console.log(`${TAG} run ${run.runId}: cancelled before position ${position.position}`);
            }

            const settled = await Promise.allSettled(
                position.entries.map(entry => this.runEntry(entry, statuses, run, cancelled)),
            );

            const failure = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
            if (failure) throw failure.reason;

            for (const result of settled) {
                if (result.status !== 'fulfilled') continue;
                statuses.set(result.value.stageGraph, result.value.status);
                results.push(result.value);
            }
        }

        return results;
    }

    private async runEntry(
        entry: Readonly<WorkflowEntry>,
        statuses: ReadonlyMap<string, StageGraphStatus>,
        run: RunContext,
        cancelled: boolean,
    ): Promise<StageGraphResult> {
        const graph = this.graphs.getStageGraph(entry.stageGraph);
        if (!graph) {
            throw new Error(`stage graph "${entry.stageGraph}" is no longer registered`);
        }

        if (cancelled) {
            return this.stageRunner.skip(graph, run, 'cancelled');
        }

        const blocked = (entry.dependsOn ?? []).filter(name => statuses.get(name) !== 'succeeded');
        if (blocked.length > 0) {
            console.warn(`${TAG} run ${run.runId}: skipping "${graph.name}", upstream did not succeed: ${blocked.join(', ')}`);
            return this.stageRunner.skip(graph, run, 'upstream_failed');
        }

        return this.stageRunner.run(graph, run);
    }
}
