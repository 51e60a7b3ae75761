import type { QueryResultRow } from 'pg';
import type { SkipReason, StepStatus } from '@quarry/sdk';

/**
 * Recorded result of one step inside a run. Append-only: one row per step,
 * ordered by `seq` in completion order.
 */
export interface StepOutcomeRow extends QueryResultRow {
    id: string;
    run_id: string;
    seq: number;
    stage_graph: string;
    step_name: string;
    task_name: string;
    status: StepStatus;
    inputs: string | null;  // superjson
    output: string | null;  // superjson
    error: { name: string; message: string } | null;
    skip_reason: SkipReason | null;
    attempts: number;
    started_at: Date;
    finished_at: Date;
}
