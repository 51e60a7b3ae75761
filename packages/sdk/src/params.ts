import type { LiteralParam, ParamValue, ReferenceParam, RunInputParam } from './types';

export function literal(value: unknown): LiteralParam {
    return { kind: 'literal', value };
}

/**
 * Uses the output of another step. Without `graph` the step must be a declared
 * dependency in the same stage graph; with `graph` it names a step of an upstream
 * stage graph the workflow entry depends on.
 *
 * @example
 * ref('extract')                          // whole output of `extract`
 * ref('extract', { path: ['rows'] })      // extract's output.rows
 * ref('load', { graph: 'ingest' })        // `load` from stage graph `ingest`
 */
export function ref(step: string, opts: { graph?: string; path?: readonly (string | number)[] } = {}): ReferenceParam {
    const param: ReferenceParam = { kind: 'reference', step };
    if (opts.graph !== undefined) param.graph = opts.graph;
    if (opts.path !== undefined) param.path = [...opts.path];
    return param;
}

/** Reads a key of the input object the pass was started with. */
export function input(key: string): RunInputParam {
    return { kind: 'input', key };
}

export function isReference(value: ParamValue): value is ReferenceParam {
    return value.kind === 'reference';
}

/** Same-graph references only. */
export function localReferences(params: Readonly<Record<string, ParamValue>> | undefined): ReferenceParam[] {
    return Object.values(params ?? {}).filter(isReference).filter(p => p.graph === undefined);
}
