import type { QueryResultRow } from 'pg';
import type { RunStatus, TriggerKind } from '@quarry/sdk';

/**
 * A single execution of a workflow.
 * Runs progress: running → succeeded / failed / partially_failed / cancelled
 */
export interface RunRow extends QueryResultRow {
    id: string;
    workflow_name: string;
    trigger_kind: TriggerKind;
    status: RunStatus;
    input: string | null;  // superjson
    started_at: Date;
    finished_at: Date | null;
    created_at: Date;
}
