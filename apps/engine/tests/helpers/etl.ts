import { z } from 'zod';
import { anyValue, DefinitionRegistry, ref, zodSchema } from '@quarry/sdk';

export interface EtlBodies {
    extract: jest.Mock<{ value: number }, [unknown]>;
    transform: jest.Mock<{ result: number }, [{ value: number }]>;
    load: jest.Mock<undefined, [{ data: { result: number } }]>;
}

/**
 * extract → transform → load, one step per stage. Bodies are jest mocks so
 * tests can make them fail or inspect what they received.
 */
export function etlRegistry(registry = new DefinitionRegistry()): { registry: DefinitionRegistry; bodies: EtlBodies } {
    const bodies: EtlBodies = {
        extract: jest.fn((_input: unknown) => ({ value: 42 })),
        transform: jest.fn(({ value }: { value: number }) => ({ result: value * 2 })),
        load: jest.fn((_input: { data: { result: number } }) => undefined),
    };

    registry.registerTask({
        name: 'extract',
        input: anyValue(),
        output: zodSchema(z.object({ value: z.number() })),
        run: input => bodies.extract(input),
    });
    registry.registerTask({
        name: 'transform',
        input: zodSchema(z.object({ value: z.number() })),
        output: zodSchema(z.object({ result: z.number() })),
        run: input => bodies.transform(input),
    });
    registry.registerTask({
        name: 'load',
        input: zodSchema(z.object({ data: z.object({ result: z.number() }) })),
        run: input => bodies.load(input),
    });
    registry.registerStageGraph({
        name: 'etl',
        steps: [
            { name: 'extract', task: 'extract', stage: 0 },
            {
                name: 'transform',
                task: 'transform',
                stage: 1,
                dependsOn: ['extract'],
                params: { value: ref('extract', { path: ['value'] }) },
            },
            { name: 'load', task: 'load', stage: 2, dependsOn: ['transform'], params: { data: ref('transform') } },
        ],
    });
    registry.registerWorkflow({ name: 'nightly-etl', stageGraphs: [{ stageGraph: 'etl', position: 0 }] });

    return { registry, bodies };
}

export function silenceLogs(): void {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
}
