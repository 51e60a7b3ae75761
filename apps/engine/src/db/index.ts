/**
 * Postgres connection management.
 *
 * - max: 20 connections (runs write one row per step, concurrently within a stage)
 * - idleTimeoutMillis: 30s
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
import { Pool } from 'pg';

export function createPool(connectionString: string | undefined): Pool {
    return new Pool({
        connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
}

export { TransactionManager } from './transaction.manager';
export type { RunRow } from './run.entity';
export type { StepOutcomeRow } from './step_outcome.entity';
