import { Pool, PoolClient } from 'pg';

const TAG = '[db]';

/**
 * Runs a callback inside BEGIN/COMMIT, rolling back and re-throwing on error.
 *
 * @example
 * await tx.run(async (client) => {
 *   await client.query('DELETE FROM step_instructions WHERE stage_graph = $1', [name]);
 *   await client.query('INSERT INTO step_instructions ...');
 * });
 */
export class TransactionManager {
    constructor(private readonly pool: Pick<Pool, 'connect'>) { }

    async run<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');
            return result;
        } catch (e) {
            console.warn(`${TAG} transaction rolled back:`, e instanceof Error ? e.message : e);
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                console.error(`${TAG} rollback failed:`, rollbackError);
            }
            throw e;
        } finally {
            client.release();
        }
    }
}
