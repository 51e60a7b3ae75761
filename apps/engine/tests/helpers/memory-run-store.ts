import type { StepOutcome } from '@quarry/sdk';
import type {
    NewRun,
    RunQuery,
    RunRecord,
    RunStore,
    RunSummary,
    TerminalRunStatus,
} from '../../src/repositories/run-store';

// In-process stand-in for RunRepository. Same contract, including the refusal
// to seal a run twice.
export class MemoryRunStore implements RunStore {
    readonly runs = new Map<string, RunRecord>();

    async createRun(run: NewRun): Promise<void> {
        if (this.runs.has(run.runId)) throw new Error(`run ${run.runId} already exists`);
        this.runs.set(run.runId, { ...run, status: 'running', finishedAt: null, outcomes: [] });
    }

    async appendOutcome(runId: string, seq: number, outcome: StepOutcome): Promise<void> {
        const run = this.require(runId);
        if (run.status !== 'running') throw new Error(`run ${runId} is sealed`);
        if (seq !== run.outcomes.length) throw new Error(`run ${runId}: expected seq ${run.outcomes.length}, got ${seq}`);
        run.outcomes.push(outcome);
    }

    async sealRun(runId: string, status: TerminalRunStatus, finishedAt: Date): Promise<void> {
        const run = this.require(runId);
        if (run.status !== 'running') throw new Error(`run ${runId} is not running and cannot be sealed`);
        run.status = status;
        run.finishedAt = finishedAt;
    }

    async findById(runId: string): Promise<RunRecord | null> {
        return this.runs.get(runId) ?? null;
    }

    async listByWorkflow(workflow: string, query: RunQuery = {}): Promise<RunSummary[]> {
        const matches = [...this.runs.values()]
            .filter(r => r.workflow === workflow)
            .filter(r => !query.from || r.startedAt >= query.from)
            .filter(r => !query.to || r.startedAt < query.to)
            .sort((a, b) => a.startedAt.getTime() - b.startedAt.getTime())
            .map(({ outcomes: _outcomes, ...summary }) => summary);
        return query.limit === undefined ? matches : matches.slice(0, query.limit);
    }

    private require(runId: string): RunRecord {
        const run = this.runs.get(runId);
        if (!run) throw new Error(`run ${runId} does not exist`);
        return run;
    }
}
