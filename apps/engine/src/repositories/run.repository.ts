import { Pool } from 'pg';
import { deserialize, serialize, StepOutcome, DEFAULT_MAX_PAYLOAD_BYTES } from '@quarry/sdk';
import { RunRow } from '../db/run.entity';
import { StepOutcomeRow } from '../db/step_outcome.entity';
import { NewRun, RunQuery, RunRecord, RunStore, RunSummary, TerminalRunStatus } from './run-store';

function toSummary(row: RunRow): RunSummary {
    return {
        runId: row.id,
        workflow: row.workflow_name,
        trigger: row.trigger_kind,
        status: row.status,
        input: deserialize<Record<string, unknown>>(row.input) ?? {},
        startedAt: row.started_at,
        finishedAt: row.finished_at,
    };
}

function toOutcome(row: StepOutcomeRow): StepOutcome {
    return {
        stageGraph: row.stage_graph,
        step: row.step_name,
        task: row.task_name,
        status: row.status,
        inputs: deserialize<Record<string, unknown>>(row.inputs) ?? null,
        output: deserialize(row.output) ?? null,
        error: row.error,
        skipReason: row.skip_reason,
        attempts: row.attempts,
        startedAt: row.started_at,
        finishedAt: row.finished_at,
    };
}

export class RunRepository implements RunStore {
    constructor(
        private readonly pool: Pick<Pool, 'query'>,
        private readonly maxPayloadBytes: number = DEFAULT_MAX_PAYLOAD_BYTES,
    ) { }

    async createRun(run: NewRun): Promise<void> {
        await this.pool.query(
            `INSERT INTO runs (id, workflow_name, trigger_kind, status, input, started_at)
             VALUES ($1, $2, $3, 'running', $4, $5)`,
            [run.runId, run.workflow, run.trigger, serialize(run.input, this.maxPayloadBytes), run.startedAt],
        );
    }

    async appendOutcome(runId: string, seq: number, outcome: StepOutcome): Promise<void> {
        await this.pool.query(
            `INSERT INTO step_outcomes
                (run_id, seq, stage_graph, step_name, task_name, status, inputs, output, error, skip_reason, attempts, started_at, finished_at)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)`,
            [
                runId,
                seq,
                outcome.stageGraph,
                outcome.step,
                outcome.task,
                outcome.status,
                outcome.inputs === null ? null : serialize(outcome.inputs, this.maxPayloadBytes),
                outcome.output === null ? null : serialize(outcome.output, this.maxPayloadBytes),
                outcome.error === null ? null : JSON.stringify(outcome.error),
                outcome.skipReason,
                outcome.attempts,
                outcome.startedAt,
                outcome.finishedAt,
            ],
        );
    }

    async sealRun(runId: string, status: TerminalRunStatus, finishedAt: Date): Promise<void> {
        const res = await this.pool.query(
            `UPDATE runs SET status = $1, finished_at = $2 WHERE id = $3 AND status = 'running'`,
            [status, finishedAt, runId],
        );
        if (res.rowCount === 0) {
            throw new Error(`run ${runId} is not running and cannot be sealed`);
        }
    }

    async findById(runId: string): Promise<RunRecord | null> {
        const res = await this.pool.query<RunRow>('SELECT * FROM runs WHERE id = $1', [runId]);
        const row = res.rows[0];
        if (!row) return null;

        const outcomes = await this.pool.query<StepOutcomeRow>(
            'SELECT * FROM step_outcomes WHERE run_id = $1 ORDER BY seq ASC',
            [runId],
        );
        return { ...toSummary(row), outcomes: outcomes.rows.map(toOutcome) };
    }

    async listByWorkflow(workflow: string, query: RunQuery = {}): Promise<RunSummary[]> {
        const conditions = ['workflow_name = $1'];
        const params: unknown[] = [workflow];

        if (query.from) {
            params.push(query.from);
            conditions.push(`started_at >= $${params.length}`);
        }
        if (query.to) {
            params.push(query.to);
            conditions.push(`started_at < $${params.length}`);
        }
        let sql = `SELECT * FROM runs WHERE ${conditions.join(' AND ')} ORDER BY started_at ASC`;
        if (query.limit !== undefined) {
            params.push(query.limit);
            sql += ` LIMIT $${params.length}`;
        }

        const res = await this.pool.query<RunRow>(sql, params);
        return res.rows.map(toSummary);
    }
}
