import {
    CyclicDependencyError,
    DuplicateStepError,
    InvalidDefinitionError,
    StageOrderingViolation,
    UnknownDependencyError,
    UnknownTaskError,
} from '../errors';
import { localReferences } from '../params';
import type { PlannedStage, StageGraph, StageGraphDefinition, StagePlan, StepInstruction } from '../types';

export interface TaskLookup {
    hasTask(name: string): boolean;
}

type Instructions = ReadonlyMap<string, Readonly<StepInstruction>>;

function freezeInstruction(step: StepInstruction): Readonly<StepInstruction> {
    return Object.freeze({
        name: step.name,
        task: step.task,
        stage: step.stage,
        params: Object.freeze({ ...(step.params ?? {}) }),
        dependsOn: Object.freeze([...new Set(step.dependsOn ?? [])]),
    });
}

/**
 * Depth-first search over "depends on" edges, in declaration order. Returns the
 * first cycle met as step names with the entry point repeated at the end
 * (`a -> b -> a`), or null when the relation is acyclic.
 */
export function findCycle(steps: Instructions): string[] | null {
    const state = new Map<string, 'visiting' | 'done'>();
    const path: string[] = [];

    const visit = (name: string): string[] | null => {
        const mark = state.get(name);
        if (mark === 'done') return null;
        if (mark === 'visiting') return [...path.slice(path.indexOf(name)), name];

        state.set(name, 'visiting');
        path.push(name);
        for (const dep of steps.get(name)?.dependsOn ?? []) {
            const cycle = visit(dep);
            if (cycle) return cycle;
        }
        path.pop();
        state.set(name, 'done');
        return null;
    };

    for (const name of steps.keys()) {
        const cycle = visit(name);
        if (cycle) return cycle;
    }
    return null;
}

function planStages(steps: Instructions): StagePlan {
    const byStage = new Map<number, string[]>();
    for (const step of steps.values()) {
        const members = byStage.get(step.stage) ?? [];
        members.push(step.name);
        byStage.set(step.stage, members);
    }
    return Object.freeze(
        [...byStage.keys()]
            .sort((a, b) => a - b)
            .map((stage): PlannedStage => Object.freeze({ stage, steps: Object.freeze(byStage.get(stage) ?? []) })),
    );
}

/**
 * Validates a stage graph and derives its plan. Checks run in this order and
 * the first failure is thrown:
 *   1. tasks exist, step names unique
 *   2. dependencies and same-graph references name steps of this graph
 *   3. no dependency cycle
 *   4. every dependency sits in a strictly lower stage, every reference is a declared dependency
 */
export function buildStageGraph(def: StageGraphDefinition, tasks: TaskLookup): StageGraph {
    const graphName = def.name;
    const steps = new Map<string, Readonly<StepInstruction>>();

    for (const step of def.steps) {
        if (!tasks.hasTask(step.task)) {
            throw new UnknownTaskError(graphName, step.name, step.task);
        }
        if (steps.has(step.name)) {
            throw new DuplicateStepError(graphName, step.name);
        }
        if (!Number.isInteger(step.stage)) {
            throw new InvalidDefinitionError(`stage graph "${graphName}": step "${step.name}" has non-integer stage ${step.stage}`);
        }
        steps.set(step.name, freezeInstruction(step));
    }

    for (const step of steps.values()) {
        for (const dep of step.dependsOn ?? []) {
            if (!steps.has(dep)) throw new UnknownDependencyError(graphName, step.name, dep);
        }
        for (const reference of localReferences(step.params)) {
            if (!steps.has(reference.step)) throw new UnknownDependencyError(graphName, step.name, reference.step);
        }
    }

    const cycle = findCycle(steps);
    if (cycle) {
        throw new CyclicDependencyError(graphName, cycle);
    }

    for (const step of steps.values()) {
        const declared = step.dependsOn ?? [];
        for (const dep of declared) {
            const depStage = steps.get(dep)?.stage ?? Number.POSITIVE_INFINITY;
            if (depStage >= step.stage) {
                throw new StageOrderingViolation(
                    graphName,
                    step.name,
                    `(stage ${step.stage}) depends on "${dep}" (stage ${depStage}), which is not in a lower stage`,
                );
            }
        }
        for (const reference of localReferences(step.params)) {
            if (!declared.includes(reference.step)) {
                throw new StageOrderingViolation(
                    graphName,
                    step.name,
                    `references "${reference.step}" without declaring it in dependsOn`,
                );
            }
        }
    }

    return Object.freeze({
        name: graphName,
        description: def.description,
        steps,
        plan: planStages(steps),
    });
}
