import { PoolClient } from 'pg';
import { DefinitionRegistry } from '@quarry/sdk';
import { TransactionManager } from '../db/transaction.manager';

export interface SyncSummary {
    tasks: number;
    stageGraphs: number;
    workflows: number;
}

// Mirrors registered definitions into Postgres so run history can be joined
// against what was deployed. The registry stays the source of truth.
export class DefinitionRepository {
    constructor(private readonly tx: TransactionManager) { }

    async sync(registry: DefinitionRegistry): Promise<SyncSummary> {
        return this.tx.run(async (client) => {
            const tasks = registry.listTasks();
            for (const name of tasks) {
                await this.upsertTask(client, registry, name);
            }

            const stageGraphs = registry.listStageGraphs();
            for (const name of stageGraphs) {
                await this.replaceStageGraph(client, registry, name);
            }

            const workflows = registry.listWorkflows();
            for (const name of workflows) {
                await this.replaceWorkflow(client, registry, name);
            }

            return { tasks: tasks.length, stageGraphs: stageGraphs.length, workflows: workflows.length };
        });
    }

    private async upsertTask(client: PoolClient, registry: DefinitionRegistry, name: string): Promise<void> {
        const task = registry.getTask(name);
        if (!task) return;
        await client.query(
            `INSERT INTO tasks (name, description, tags, retries, timeout_ms, updated_at)
             VALUES ($1, $2, $3, $4, $5, NOW())
             ON CONFLICT (name) DO UPDATE
             SET description = EXCLUDED.description, tags = EXCLUDED.tags, retries = EXCLUDED.retries,
                 timeout_ms = EXCLUDED.timeout_ms, updated_at = NOW()`,
            [task.name, task.description ?? null, JSON.stringify(task.tags ?? []), task.retries ?? 0, task.timeoutMs ?? null],
        );
    }

    private async replaceStageGraph(client: PoolClient, registry: DefinitionRegistry, name: string): Promise<void> {
        const graph = registry.getStageGraph(name);
        if (!graph) return;
        await client.query(
            `INSERT INTO stage_graphs (name, description, updated_at)
             VALUES ($1, $2, NOW())
             ON CONFLICT (name) DO UPDATE SET description = EXCLUDED.description, updated_at = NOW()`,
            [graph.name, graph.description ?? null],
        );
        await client.query('DELETE FROM step_instructions WHERE stage_graph = $1', [graph.name]);
        for (const step of graph.steps.values()) {
            await client.query(
                `INSERT INTO step_instructions (stage_graph, step_name, task_name, stage, params, depends_on)
                 VALUES ($1, $2, $3, $4, $5, $6)`,
                [graph.name, step.name, step.task, step.stage, JSON.stringify(step.params ?? {}), JSON.stringify(step.dependsOn ?? [])],
            );
        }
    }

    private async replaceWorkflow(client: PoolClient, registry: DefinitionRegistry, name: string): Promise<void> {
        const wf = registry.getWorkflow(name);
        if (!wf) return;
        await client.query(
            `INSERT INTO workflows (name, description, tags, updated_at)
             VALUES ($1, $2, $3, NOW())
             ON CONFLICT (name) DO UPDATE SET description = EXCLUDED.description, tags = EXCLUDED.tags, updated_at = NOW()`,
            [wf.name, wf.description ?? null, JSON.stringify(wf.tags)],
        );
        await client.query('DELETE FROM workflow_entries WHERE workflow = $1', [wf.name]);
        for (const entry of wf.entries) {
            await client.query(
                `INSERT INTO workflow_entries (workflow, stage_graph, position, depends_on)
                 VALUES ($1, $2, $3, $4)`,
                [wf.name, entry.stageGraph, entry.position, JSON.stringify(entry.dependsOn ?? [])],
            );
        }
    }
}
