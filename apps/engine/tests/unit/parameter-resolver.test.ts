import { z } from 'zod';
import {
    anyValue,
    input,
    literal,
    ParameterValidationError,
    ref,
    StepInstruction,
    StepOutcome,
    Task,
    UnresolvedReferenceError,
    zodSchema,
} from '@quarry/sdk';
import { resolveParameters, ResolutionContext } from '../../src/services/parameter-resolver';

function outcome(stageGraph: string, step: string, status: StepOutcome['status'], output: unknown): StepOutcome {
    return {
        stageGraph,
        step,
        task: step,
        status,
        inputs: {},
        output,
        error: null,
        skipReason: status === 'skipped' ? 'dependency_failed' : null,
        attempts: status === 'skipped' ? 0 : 1,
        startedAt: new Date(0),
        finishedAt: new Date(0),
    };
}

describe('resolveParameters', () => {
    const recorded = new Map<string, StepOutcome>([
        ['etl/extract', outcome('etl', 'extract', 'succeeded', { value: 42, meta: { source: 'orders' } })],
        ['etl/broken', outcome('etl', 'broken', 'failed', null)],
        ['etl/skipped', outcome('etl', 'skipped', 'skipped', null)],
        ['ingest/pull', outcome('ingest', 'pull', 'succeeded', { rows: [3, 5] })],
    ]);
    const ctx: ResolutionContext = {
        stageGraph: 'etl',
        lookup: (graph, step) => recorded.get(`${graph}/${step}`),
        runInput: { date: '2026-03-01' },
    };
    const passthrough: Task = { name: 'pass', input: anyValue(), run: (value: unknown) => value };

    function step(params: StepInstruction['params']): StepInstruction {
        return { name: 'consume', task: 'pass', stage: 1, params };
    }

    it('substitutes literals, references, paths and run input', () => {
        const result = resolveParameters(step({
            all: ref('extract'),
            source: ref('extract', { path: ['meta', 'source'] }),
            rows: ref('pull', { graph: 'ingest', path: ['rows'] }),
            first: ref('pull', { graph: 'ingest', path: ['rows', 0] }),
            date: input('date'),
            limit: literal(10),
        }), passthrough, ctx);

        expect(result).toEqual({
            ok: true,
            value: {
                params: {
                    all: { value: 42, meta: { source: 'orders' } },
                    source: 'orders',
                    rows: [3, 5],
                    first: 3,
                    date: '2026-03-01',
                    limit: 10,
                },
                value: {
                    all: { value: 42, meta: { source: 'orders' } },
                    source: 'orders',
                    rows: [3, 5],
                    first: 3,
                    date: '2026-03-01',
                    limit: 10,
                },
            },
        });
    });

    it('returns the same answer when repeated', () => {
        const instruction = step({ value: ref('extract', { path: ['value'] }) });
        expect(resolveParameters(instruction, passthrough, ctx)).toEqual(resolveParameters(instruction, passthrough, ctx));
    });

    it('hands the schema output to the task, keeps the raw bindings for the record', () => {
        const task: Task = {
            name: 'count',
            input: zodSchema(z.object({ value: z.coerce.number() })),
            run: () => null,
        };
        const result = resolveParameters(step({ value: literal('7') }), task, ctx);
        expect(result).toEqual({ ok: true, value: { params: { value: '7' }, value: { value: 7 } } });
    });

    it.each([
        ['a missing step', ref('transform'), 'step "consume", parameter "p": step "transform" has no recorded outcome'],
        ['a failed step', ref('broken'), 'step "consume", parameter "p": step "broken" failed'],
        ['a skipped step', ref('skipped'), 'step "consume", parameter "p": step "skipped" skipped'],
        ['a missing field', ref('extract', { path: ['meta', 'owner'] }), 'step "consume", parameter "p": output of step "extract" has no field "meta.owner"'],
        ['a cross-graph miss', ref('push', { graph: 'ingest' }), 'step "consume", parameter "p": step "ingest.push" has no recorded outcome'],
        ['a missing input key', input('region'), 'step "consume", parameter "p": run input has no key "region"'],
        ['an inherited input key', input('toString'), 'step "consume", parameter "p": run input has no key "toString"'],
        ['an inherited field', ref('extract', { path: ['meta', 'constructor'] }), 'step "consume", parameter "p": output of step "extract" has no field "meta.constructor"'],
    ])('fails with UnresolvedReferenceError for %s', (_label, binding, message) => {
        const result = resolveParameters(step({ p: binding }), passthrough, ctx);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(UnresolvedReferenceError);
        expect(result.error.message).toBe(message);
    });

    it('names the parameter, the field path and the shapes on a schema mismatch', () => {
        const task: Task = {
            name: 'load',
            input: zodSchema(z.object({ data: z.object({ result: z.number() }) })),
            run: () => null,
        };
        const result = resolveParameters(step({ data: literal({ result: 'many' }) }), task, ctx);
        if (result.ok) throw new Error('expected failure');

        expect(result.error).toBeInstanceOf(ParameterValidationError);
        expect(result.error).toMatchObject({
            step: 'consume',
            parameter: 'data',
            issues: [{ path: ['data', 'result'], expected: 'number', actual: 'string' }],
        });
        expect(result.error.message).toBe('step "consume", parameter "data.result": expected number, got string');
    });

    it('reports whole-input refinements against <input>', () => {
        const task: Task = {
            name: 'pair',
            input: zodSchema(z.object({ a: z.number(), b: z.number() }).refine(v => v.a < v.b, 'a must be below b')),
            run: () => null,
        };
        const result = resolveParameters(step({ a: literal(2), b: literal(1) }), task, ctx);
        if (result.ok) throw new Error('expected failure');
        expect(result.error).toMatchObject({ parameter: '<input>' });
        expect(result.error.message).toBe('step "consume", parameter "<input>": expected a must be below b, got object');
    });

    it('gives the task and the record copies that do not share upstream objects', () => {
        const result = resolveParameters(step({ rows: ref('pull', { graph: 'ingest', path: ['rows'] }) }), passthrough, ctx);
        if (!result.ok) throw new Error('expected success');

        const seen = result.value.value;
        if (typeof seen !== 'object' || seen === null || !('rows' in seen) || !Array.isArray(seen.rows)) {
            throw new Error('expected rows');
        }
        seen.rows.push(999);

        expect(recorded.get('ingest/pull')?.output).toEqual({ rows: [3, 5] });
        expect(result.value.params).toEqual({ rows: [3, 5] });
    });

    it('does not touch the recorded outcomes', () => {
        const before = JSON.stringify([...recorded.values()]);
        resolveParameters(step({ all: ref('extract') }), passthrough, ctx);
        expect(JSON.stringify([...recorded.values()])).toBe(before);
    });
});
