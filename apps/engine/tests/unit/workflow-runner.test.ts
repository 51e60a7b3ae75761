import { z } from 'zod';
import { anyValue, DefinitionRegistry, ref, Workflow, zodSchema } from '@quarry/sdk';
import { RunRecorder } from '../../src/services/run-recorder';
import { RunContext, StageGraphRunner } from '../../src/services/stage-graph-runner';
import { WorkflowRunner } from '../../src/services/workflow-runner';
import { createLimiter } from '../../src/utils/limiter';
import { silenceLogs } from '../helpers/etl';
import { MemoryRunStore } from '../helpers/memory-run-store';
import { deferred, waitUntil } from '../helpers/poll';

describe('WorkflowRunner', () => {
    let registry: DefinitionRegistry;
    let store: MemoryRunStore;
    let runner: WorkflowRunner;
    let pull: jest.Mock<{ rows: number[] }, [unknown]>;
    let render: jest.Mock<string, [{ rows: number[] }]>;
    let scan: jest.Mock<string, [unknown]>;

    async function context(signal = new AbortController().signal): Promise<RunContext> {
        await store.createRun({ runId: 'run-1', workflow: 'reports', trigger: 'once', input: {}, startedAt: new Date() });
        return { runId: 'run-1', input: {}, recorder: new RunRecorder('run-1', store), signal };
    }

    function workflow(name: string): Workflow {
        const found = registry.getWorkflow(name);
        if (!found) throw new Error(`missing workflow ${name}`);
        return found;
    }

    beforeEach(() => {
        silenceLogs();
        registry = new DefinitionRegistry();
        store = new MemoryRunStore();
        pull = jest.fn((_input: unknown) => ({ rows: [3, 5] }));
        render = jest.fn(({ rows }: { rows: number[] }) => `rows=${rows.join(',')}`);
        scan = jest.fn((_input: unknown) => 'clean');

        registry.registerTask({ name: 'pull', input: anyValue(), run: input => pull(input) });
        registry.registerTask({
            name: 'render',
            input: zodSchema(z.object({ rows: z.array(z.number()) })),
            run: input => render(input),
        });
        registry.registerTask({ name: 'scan', input: anyValue(), run: input => scan(input) });

        registry.registerStageGraph({ name: 'ingest', steps: [{ name: 'pull', task: 'pull', stage: 0 }] });
        registry.registerStageGraph({ name: 'audit', steps: [{ name: 'scan', task: 'scan', stage: 0 }] });
        registry.registerStageGraph({
            name: 'report',
            steps: [{ name: 'render', task: 'render', stage: 0, params: { rows: ref('pull', { graph: 'ingest', path: ['rows'] }) } }],
        });
        registry.registerStageGraph({
            name: 'publish',
            steps: [{ name: 'announce', task: 'scan', stage: 0 }],
        });
        registry.registerWorkflow({
            name: 'reports',
            stageGraphs: [
                { stageGraph: 'ingest', position: 0 },
                { stageGraph: 'report', position: 1, dependsOn: ['ingest'] },
                { stageGraph: 'audit', position: 1 },
                { stageGraph: 'publish', position: 2, dependsOn: ['report'] },
            ],
        });

        runner = new WorkflowRunner(registry, new StageGraphRunner(registry, createLimiter(4), {
            stepTimeoutMs: 1000,
            retry: { initialIntervalMs: 1, jitterRatio: 0 },
        }));
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('threads outputs across stage graph boundaries', async () => {
        const results = await runner.run(workflow('reports'), await context());

        expect(results.map(r => [r.stageGraph, r.status])).toEqual([
            ['ingest', 'succeeded'],
            ['report', 'succeeded'],
            ['audit', 'succeeded'],
            ['publish', 'succeeded'],
        ]);
        expect(render).toHaveBeenCalledWith({ rows: [3, 5] });
        expect(results[1].outcomes[0].output).toBe('rows=3,5');
    });

    it('skips dependents of a failed graph transitively and still runs independent graphs', async () => {
        pull.mockImplementation(() => {
            throw new Error('warehouse unreachable');
        });

        const results = await runner.run(workflow('reports'), await context());

        expect(results.map(r => [r.stageGraph, r.status])).toEqual([
            ['ingest', 'failed'],
            ['report', 'skipped'],
            ['audit', 'succeeded'],
            ['publish', 'skipped'],
        ]);
        expect(results[1].outcomes[0]).toMatchObject({ step: 'render', status: 'skipped', skipReason: 'upstream_failed' });
        expect(results[3].outcomes[0]).toMatchObject({ step: 'announce', status: 'skipped', skipReason: 'upstream_failed' });
        expect(render).not.toHaveBeenCalled();
        expect(scan).toHaveBeenCalledTimes(1);
    });

    it('runs graphs that share a position concurrently', async () => {
        const gate = deferred();
        const started: string[] = [];
        registry.registerTask({
            name: 'render',
            input: anyValue(),
            run: async () => {
                started.push('render');
                await gate.promise;
                return 'late';
            },
        });
        registry.registerTask({
            name: 'scan',
            input: anyValue(),
            run: async () => {
                started.push('scan');
                await gate.promise;
                return 'clean';
            },
        });

        const pending = runner.run(workflow('reports'), await context());
        await waitUntil(() => started.includes('render') && started.includes('scan'));
        expect(started.slice(0, 2).sort()).toEqual(['render', 'scan']);
        gate.resolve();

        const results = await pending;
        expect(results.every(r => r.status === 'succeeded')).toBe(true);
    });

    it('records graphs after a cancellation as cancelled', async () => {
        const controller = new AbortController();
        pull.mockImplementation(() => {
            controller.abort();
            return { rows: [] };
        });

        const results = await runner.run(workflow('reports'), await context(controller.signal));

        expect(results.map(r => [r.stageGraph, r.status])).toEqual([
            ['ingest', 'succeeded'],
            ['report', 'cancelled'],
            ['audit', 'cancelled'],
            ['publish', 'cancelled'],
        ]);
        expect(results.flatMap(r => r.outcomes).filter(o => o.skipReason === 'cancelled')).toHaveLength(3);
    });
});
