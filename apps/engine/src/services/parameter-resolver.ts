import {
    clonePayload,
    err,
    ok,
    ParameterValidationError,
    ParamValue,
    Result,
    SerializationError,
    StepInstruction,
    Task,
    UnresolvedReferenceError,
} from '@quarry/sdk';
import type { OutcomeLookup } from './run-recorder';

export interface ResolutionContext {
    /** Graph owning the step; unqualified references resolve here. */
    stageGraph: string;
    lookup: OutcomeLookup;
    runInput: Readonly<Record<string, unknown>>;
}

export interface ResolvedParameters {
    /** Bindings after substitution, as recorded in the outcome. */
    params: Record<string, unknown>;
    /** What the input schema produced; this is what the task body receives. */
    value: unknown;
}

export type ResolutionError = UnresolvedReferenceError | SerializationError | ParameterValidationError;

const hasOwn = (target: object, key: PropertyKey): boolean => Object.prototype.hasOwnProperty.call(target, key);

function walk(value: unknown, path: readonly (string | number)[]): { found: boolean; value: unknown } {
    let current = value;
    for (const segment of path) {
        if (current === null || typeof current !== 'object' || !hasOwn(current, segment)) {
            return { found: false, value: undefined };
        }
        current = Reflect.get(current, segment);
    }
    return { found: true, value: current };
}

function resolveValue(
    step: string,
    parameter: string,
    binding: ParamValue,
    ctx: ResolutionContext,
): Result<unknown, UnresolvedReferenceError> {
    switch (binding.kind) {
        case 'literal':
            return ok(binding.value);

        case 'input':
            if (!hasOwn(ctx.runInput, binding.key)) {
                return err(new UnresolvedReferenceError(step, parameter, `run input has no key "${binding.key}"`));
            }
            return ok(ctx.runInput[binding.key]);

        case 'reference': {
            const graph = binding.graph ?? ctx.stageGraph;
            const source = ctx.lookup(graph, binding.step);
            const label = binding.graph ? `${graph}.${binding.step}` : binding.step;
            if (!source) {
                return err(new UnresolvedReferenceError(step, parameter, `step "${label}" has no recorded outcome`));
            }
            if (source.status !== 'succeeded') {
                return err(new UnresolvedReferenceError(step, parameter, `step "${label}" ${source.status}`));
            }
            if (!binding.path || binding.path.length === 0) {
                return ok(source.output);
            }
            const found = walk(source.output, binding.path);
            if (!found.found) {
                return err(new UnresolvedReferenceError(
                    step,
                    parameter,
                    `output of step "${label}" has no field "${binding.path.join('.')}"`,
                ));
            }
            return ok(found.value);
        }
    }
}

/**
 * Substitutes literals, run input and references. Every value is a deep copy,
 * so nothing the step later does reaches an upstream outcome, the run input
 * or a literal shared by other runs.
 */
export function substituteParameters(
    step: Readonly<StepInstruction>,
    ctx: ResolutionContext,
): Result<Record<string, unknown>, UnresolvedReferenceError | SerializationError> {
    const params: Record<string, unknown> = {};
    for (const [name, binding] of Object.entries(step.params ?? {})) {
        const resolved = resolveValue(step.name, name, binding, ctx);
        if (!resolved.ok) return resolved;
        try {
            params[name] = clonePayload(resolved.value);
        } catch (error) {
            if (error instanceof SerializationError) return err(error);
            throw error;
        }
    }
    return ok(params);
}

/** Runs the task's input schema over a private copy of the substituted bindings. */
export function validateParameters(
    step: Readonly<StepInstruction>,
    task: Task,
    params: Readonly<Record<string, unknown>>,
): Result<unknown, ParameterValidationError> {
    const validated = task.input.validate(clonePayload(params));
    if (!validated.ok) {
        const first = validated.error.issues[0];
        const parameter = first && first.path.length > 0 ? String(first.path[0]) : '<input>';
        return err(new ParameterValidationError(step.name, parameter, validated.error.issues));
    }
    return ok(validated.value);
}

/**
 * Substitutes references and validates the result against the task's input
 * schema. Pure: reads recorded outcomes, writes nothing, and returns the same
 * answer for the same outcomes.
 */
export function resolveParameters(
    step: Readonly<StepInstruction>,
    task: Task,
    ctx: ResolutionContext,
): Result<ResolvedParameters, ResolutionError> {
    const substituted = substituteParameters(step, ctx);
    if (!substituted.ok) return substituted;

    const validated = validateParameters(step, task, substituted.value);
    if (!validated.ok) return validated;
    return ok({ params: substituted.value, value: validated.value });
}
