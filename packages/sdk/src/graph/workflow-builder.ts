import {
    DuplicateStageGraphError,
    InvalidDefinitionError,
    UnknownDependencyError,
    UnknownStageGraphError,
    WorkflowOrderingViolation,
} from '../errors';
import { isReference } from '../params';
import type { PlannedPosition, StageGraph, Workflow, WorkflowDefinition, WorkflowEntry } from '../types';

export interface StageGraphLookup {
    getStageGraph(name: string): StageGraph | undefined;
}

// Each stage graph may appear once per workflow; re-running a graph at a later
// position is expressed by registering it under a second name.
export function buildWorkflow(def: WorkflowDefinition, graphs: StageGraphLookup): Workflow {
    const wf = def.name;
    if (def.stageGraphs.length === 0) {
        throw new InvalidDefinitionError(`workflow "${wf}" has no stage graphs`);
    }

    const entries = new Map<string, Readonly<WorkflowEntry>>();
    for (const entry of def.stageGraphs) {
        if (!graphs.getStageGraph(entry.stageGraph)) {
            throw new UnknownStageGraphError(wf, entry.stageGraph);
        }
        if (entries.has(entry.stageGraph)) {
            throw new DuplicateStageGraphError(wf, entry.stageGraph);
        }
        if (!Number.isInteger(entry.position)) {
            throw new InvalidDefinitionError(`workflow "${wf}": stage graph "${entry.stageGraph}" has non-integer position ${entry.position}`);
        }
        entries.set(entry.stageGraph, Object.freeze({
            stageGraph: entry.stageGraph,
            position: entry.position,
            dependsOn: Object.freeze([...new Set(entry.dependsOn ?? [])]),
        }));
    }

    for (const entry of entries.values()) {
        const declared = entry.dependsOn ?? [];
        for (const upstream of declared) {
            const target = entries.get(upstream);
            if (!target) {
                throw new WorkflowOrderingViolation(wf, entry.stageGraph, `depends on "${upstream}", which is not part of the workflow`);
            }
            if (target.position >= entry.position) {
                throw new WorkflowOrderingViolation(
                    wf,
                    entry.stageGraph,
                    `(position ${entry.position}) depends on "${upstream}" (position ${target.position}), which is not at a lower position`,
                );
            }
        }

        const graph = graphs.getStageGraph(entry.stageGraph);
        for (const step of graph?.steps.values() ?? []) {
            for (const param of Object.values(step.params ?? {})) {
                if (!isReference(param) || param.graph === undefined) continue;
                if (!declared.includes(param.graph)) {
                    throw new WorkflowOrderingViolation(
                        wf,
                        entry.stageGraph,
                        `step "${step.name}" references stage graph "${param.graph}" without declaring it in dependsOn`,
                    );
                }
                if (!graphs.getStageGraph(param.graph)?.steps.has(param.step)) {
                    throw new UnknownDependencyError(wf, step.name, `${param.graph}.${param.step}`);
                }
            }
        }
    }

    const byPosition = new Map<number, Readonly<WorkflowEntry>[]>();
    for (const entry of entries.values()) {
        const members = byPosition.get(entry.position) ?? [];
        members.push(entry);
        byPosition.set(entry.position, members);
    }
    const positions = [...byPosition.keys()]
        .sort((a, b) => a - b)
        .map((position): PlannedPosition => Object.freeze({ position, entries: Object.freeze(byPosition.get(position) ?? []) }));

    return Object.freeze({
        name: wf,
        description: def.description,
        tags: Object.freeze([...(def.tags ?? [])]),
        entries: Object.freeze([...entries.values()]),
        positions: Object.freeze(positions),
    });
}
