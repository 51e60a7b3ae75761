import { DefinitionInUseError, InvalidDefinitionError, UnknownWorkflowError } from './errors';
import { buildStageGraph, TaskLookup } from './graph/builder';
import { buildWorkflow, StageGraphLookup } from './graph/workflow-builder';
import type { StageGraph, StageGraphDefinition, Task, TaskDefinition, Workflow, WorkflowDefinition } from './types';

const TAG = '[registry]';

/**
 * Process-wide name → definition maps for tasks, stage graphs and workflows.
 *
 * Registration is idempotent by name: registering an existing name replaces the
 * definition, unless a run that uses it is in flight. Runs take a lease on their
 * workflow for their whole lifetime (see `acquire`).
 */
export class DefinitionRegistry implements TaskLookup, StageGraphLookup {
    private tasks = new Map<string, Task>();
    private stageGraphs = new Map<string, StageGraph>();
    private workflows = new Map<string, Workflow>();
    private leases = new Map<string, number>();

    private static readonly NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;
    private static readonly MAX_NAME_LENGTH = 100;

    private checkName(kind: string, name: string): void {
        if (!name || name.length === 0) {
            throw new InvalidDefinitionError(`${kind} name cannot be empty`);
        }
        if (name.length > DefinitionRegistry.MAX_NAME_LENGTH) {
            throw new InvalidDefinitionError(`${kind} name exceeds maximum length of ${DefinitionRegistry.MAX_NAME_LENGTH} characters`);
        }
        if (!DefinitionRegistry.NAME_PATTERN.test(name)) {
            throw new InvalidDefinitionError(`${kind} name must contain only alphanumeric characters, dashes, and underscores`);
        }
    }

    registerTask<I, O>(def: TaskDefinition<I, O>): Task<I, O> {
        this.checkName('task', def.name);
        if (this.tasks.has(def.name)) {
            if (this.taskInUse(def.name)) throw new DefinitionInUseError('task', def.name);
            console.log(`${TAG} replacing task "${def.name}"`);
        }
        if (def.retries !== undefined && (!Number.isInteger(def.retries) || def.retries < 0)) {
            throw new InvalidDefinitionError(`task "${def.name}": retries must be a non-negative integer`);
        }
        const task: Task<I, O> = Object.freeze({ ...def, tags: [...(def.tags ?? [])] });
        this.tasks.set(task.name, task);
        return task;
    }

    registerStageGraph(def: StageGraphDefinition): StageGraph {
        this.checkName('stage graph', def.name);
        for (const step of def.steps) this.checkName('step', step.name);
        if (this.stageGraphs.has(def.name)) {
            if (this.stageGraphInUse(def.name)) throw new DefinitionInUseError('stage graph', def.name);
            console.log(`${TAG} replacing stage graph "${def.name}"`);
        }
        const graph = buildStageGraph(def, this);
        this.revalidateWorkflows(graph);
        this.stageGraphs.set(graph.name, graph);
        return graph;
    }

    registerWorkflow(def: WorkflowDefinition): Workflow {
        this.checkName('workflow', def.name);
        if (this.workflows.has(def.name)) {
            if (this.workflowInUse(def.name)) throw new DefinitionInUseError('workflow', def.name);
            console.log(`${TAG} replacing workflow "${def.name}"`);
        }
        const wf = buildWorkflow(def, this);
        this.workflows.set(wf.name, wf);
        return wf;
    }

    hasTask(name: string): boolean {
        return this.tasks.has(name);
    }

    getTask(name: string): Task | undefined {
        return this.tasks.get(name);
    }

    getStageGraph(name: string): StageGraph | undefined {
        return this.stageGraphs.get(name);
    }

    getWorkflow(name: string): Workflow | undefined {
        return this.workflows.get(name);
    }

    listTasks(): string[] {
        return Array.from(this.tasks.keys());
    }

    listStageGraphs(): string[] {
        return Array.from(this.stageGraphs.keys());
    }

    listWorkflows(): string[] {
        return Array.from(this.workflows.keys());
    }

    /**
     * Marks a workflow as in flight. The returned function releases the lease and
     * is safe to call more than once.
     */
    acquire(workflowName: string): () => void {
        if (!this.workflows.has(workflowName)) {
            throw new UnknownWorkflowError(workflowName);
        }
        this.leases.set(workflowName, (this.leases.get(workflowName) ?? 0) + 1);

        let released = false;
        return () => {
            if (released) return;
            released = true;
            const remaining = (this.leases.get(workflowName) ?? 1) - 1;
            if (remaining > 0) this.leases.set(workflowName, remaining);
            else this.leases.delete(workflowName);
        };
    }

    inFlight(workflowName: string): number {
        return this.leases.get(workflowName) ?? 0;
    }

    // Cross-graph references are checked when a workflow is built, so every
    // workflow listing a replaced graph is rebuilt against the replacement.
    private revalidateWorkflows(graph: StageGraph): void {
        const lookup: StageGraphLookup = {
            getStageGraph: name => (name === graph.name ? graph : this.stageGraphs.get(name)),
        };
        for (const wf of this.workflows.values()) {
            if (!wf.entries.some(e => e.stageGraph === graph.name)) continue;
            buildWorkflow(
                { name: wf.name, description: wf.description, tags: [...wf.tags], stageGraphs: [...wf.entries] },
                lookup,
            );
        }
    }

    private workflowInUse(name: string): boolean {
        return this.inFlight(name) > 0;
    }

    private stageGraphInUse(name: string): boolean {
        for (const wfName of this.leases.keys()) {
            if (this.workflows.get(wfName)?.entries.some(e => e.stageGraph === name)) return true;
        }
        return false;
    }

    private taskInUse(name: string): boolean {
        for (const wfName of this.leases.keys()) {
            for (const entry of this.workflows.get(wfName)?.entries ?? []) {
                const graph = this.stageGraphs.get(entry.stageGraph);
                for (const step of graph?.steps.values() ?? []) {
                    if (step.task === name) return true;
                }
            }
        }
        return false;
    }

    clear(): void {
        this.tasks.clear();
        this.stageGraphs.clear();
        this.workflows.clear();
        this.leases.clear();
    }
}

export const globalRegistry = new DefinitionRegistry();

export function task<I, O>(def: TaskDefinition<I, O>): Task<I, O> {
    return globalRegistry.registerTask(def);
}

export function stageGraph(def: StageGraphDefinition): StageGraph {
    return globalRegistry.registerStageGraph(def);
}

export function workflow(def: WorkflowDefinition): Workflow {
    return globalRegistry.registerWorkflow(def);
}
