import { ConcreteMap, PermanentAPIError, TransientAPIError, computeChangeSet } from '@stackplan/core';
import { Executor, ExecutorOptions } from '../../src/executor/executor';
import {
    AdapterRegistry,
    CreateRequest,
    DeleteRequest,
    DescribeRequest,
    ResourceAdapter,
    ResourceResult,
    UpdateRequest,
} from '../../src/providers/adapter';
import { StateLease } from '../../src/state/state-store';
import { MemoryStateStore } from '../../src/state/memory-state-store';
import { TEST_ACCOUNT, TEST_REGION, desiredFromYaml, mockLogger } from '../utils';

/**
 * Records every mutating call. Failures are queued per call, e.g. `create B`.
 */
class FakeAdapter implements ResourceAdapter {
    readonly calls: string[] = [];
    readonly failures = new Map<string, Error[]>();
    readonly live = new Map<string, ConcreteMap>();
    active = 0;
    maxActive = 0;
    private counter = 0;

    constructor(
        private readonly delayMs = 0,
        private readonly onCall?: (call: string) => void,
    ) {}

    async create(request: CreateRequest): Promise<ResourceResult> {
        await this.call(`create ${request.context.logicalId}`);
        const physicalId = `${request.context.logicalId.toLowerCase()}-${++this.counter}`;
        this.live.set(physicalId, request.properties);
        return { physicalId, attributes: { Arn: `arn:test:${physicalId}` } };
    }

    async update(request: UpdateRequest): Promise<ResourceResult> {
        await this.call(`update ${request.context.logicalId}`);
        this.live.set(request.physicalId, request.properties);
        return { physicalId: request.physicalId, attributes: { Arn: `arn:test:${request.physicalId}` } };
    }

    async delete(request: DeleteRequest): Promise<void> {
        await this.call(`delete ${request.context.logicalId}`);
        this.live.delete(request.physicalId);
    }

    async describe(request: DescribeRequest): Promise<ResourceResult | undefined> {
        return this.live.has(request.physicalId)
            ? { physicalId: request.physicalId, attributes: { Arn: `arn:test:${request.physicalId}` } }
            : undefined;
    }

    private async call(name: string): Promise<void> {
        this.calls.push(name);
        this.onCall?.(name);
        this.active++;
        this.maxActive = Math.max(this.maxActive, this.active);
        try {
            if (this.delayMs > 0) {
                await new Promise((resolve) => setTimeout(resolve, this.delayMs));
            }
            const failure = this.failures.get(name)?.shift();
            if (failure) {
                throw failure;
            }
        } finally {
            this.active--;
        }
    }
}

const CHAIN = `
Resources:
  A:
    Type: Test::Thing::Item
    Properties:
      Name: a
  B:
    Type: Test::Thing::Item
    Properties:
      Name: b
      Parent: !GetAtt A.Arn
  C:
    Type: Test::Thing::Item
    DeletionPolicy: Retain
    Properties:
      Name: c
      Parent: !Ref B
  D:
    Type: Test::Thing::Item
    Properties:
      Name: d
`;

const NO_DELAY = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

describe('Executor', () => {
    let store: MemoryStateStore;
    let lease: StateLease;
    let adapter: FakeAdapter;

    beforeAll(() => {
        mockLogger();
    });

    beforeEach(async () => {
        store = new MemoryStateStore();
        lease = await store.acquire('test-stack', 'apply');
        adapter = new FakeAdapter();
    });

    afterEach(async () => {
        await lease.release();
    });

    function executor(options: Partial<ExecutorOptions> = {}): Executor {
        return new Executor({
            registry: new AdapterRegistry({ 'Test::Thing::Item': adapter, 'Test::Thing::Other': adapter }),
            lease,
            region: TEST_REGION,
            accountId: TEST_ACCOUNT,
            concurrency: 1,
            retry: NO_DELAY,
            ...options,
        });
    }

    async function apply(template: string, options: Partial<ExecutorOptions> = {}) {
        const changeSet = computeChangeSet(desiredFromYaml(template), lease.state);
        return executor(options).execute(changeSet);
    }

    test('creates resources after their dependencies', async () => {
        const report = await apply(CHAIN);
        expect(report.status).toBe('succeeded');
        expect(adapter.calls).toEqual(['create A', 'create B', 'create C', 'create D']);
        expect(report.outcomes.map((o) => [o.logicalId, o.status, o.physicalId, o.attempts])).toEqual([
            ['A', 'succeeded', 'a-1', 1],
            ['B', 'succeeded', 'b-2', 1],
            ['C', 'succeeded', 'c-3', 1],
            ['D', 'succeeded', 'd-4', 1],
        ]);
        expect(lease.state.resources.B).toEqual({
            type: 'Test::Thing::Item',
            properties: { Name: 'b', Parent: 'arn:test:a-1' },
            physicalId: 'b-2',
            attributes: { Arn: 'arn:test:b-2' },
            dependencies: ['A'],
            deletionPolicy: 'Delete',
        });
        expect(lease.state.resources.C.properties).toEqual({ Name: 'c', Parent: 'b-2' });
        expect(lease.state.resources.C.deletionPolicy).toBe('Retain');
        expect((await store.read('test-stack'))?.serial).toBe(4);
    });

    test('skips dependents of a failed change and continues with the rest', async () => {
        adapter.failures.set('create B', [new PermanentAPIError('bad parent')]);
        const report = await apply(CHAIN);
        expect(report.status).toBe('failed');
        expect(adapter.calls).toEqual(['create A', 'create B', 'create D']);
        expect(report.outcomes.map((o) => [o.logicalId, o.status, o.error])).toEqual([
            ['A', 'succeeded', undefined],
            ['B', 'failed', 'bad parent'],
            ['C', 'skipped', 'dependency B did not succeed'],
            ['D', 'succeeded', undefined],
        ]);
        expect(Object.keys(lease.state.resources)).toEqual(['A', 'D']);
        expect(lease.state.resources.D.physicalId).toBe('d-2');
    });

    test('rolls back completed changes', async () => {
        adapter.failures.set('create B', [new PermanentAPIError('bad parent')]);
        const report = await apply(CHAIN, { failurePolicy: 'rollback' });
        expect(report.status).toBe('rolledBack');
        expect(adapter.calls).toEqual(['create A', 'create B', 'delete A']);
        expect(report.outcomes.map((o) => [o.logicalId, o.status, o.error])).toEqual([
            ['A', 'rolledBack', undefined],
            ['B', 'failed', 'bad parent'],
            ['C', 'skipped', 'dependency B did not succeed'],
            ['D', 'skipped', 'apply is rolling back'],
        ]);
        expect(lease.state.resources).toEqual({});
    });

    test('retries transient failures', async () => {
        adapter.failures.set('create B', [new TransientAPIError('throttled', 'Throttling')]);
        const report = await apply(CHAIN);
        expect(report.status).toBe('succeeded');
        expect(adapter.calls).toEqual(['create A', 'create B', 'create B', 'create C', 'create D']);
        expect(report.outcomes[1]).toMatchObject({ logicalId: 'B', status: 'succeeded', attempts: 2 });
    });

    test('a failure that outlasts the retries names the attempts', async () => {
        adapter.failures.set('create D', [
            new TransientAPIError('throttled'),
            new TransientAPIError('throttled'),
            new TransientAPIError('still throttled'),
        ]);
        const report = await apply(CHAIN);
        expect(report.outcomes[3]).toMatchObject({
            logicalId: 'D',
            status: 'failed',
            attempts: 3,
            error: 'still throttled',
        });
    });

    test('stops starting changes once cancelled', async () => {
        const controller = new AbortController();
        adapter = new FakeAdapter(0, (call) => {
            if (call === 'create A') {
                controller.abort();
            }
        });
        const report = await apply(CHAIN, { signal: controller.signal });
        expect(report.status).toBe('cancelled');
        expect(adapter.calls).toEqual(['create A']);
        expect(report.outcomes.map((o) => [o.logicalId, o.status, o.error])).toEqual([
            ['A', 'succeeded', undefined],
            ['B', 'cancelled', 'operation was cancelled'],
            ['C', 'skipped', 'dependency B did not succeed'],
            ['D', 'cancelled', 'operation was cancelled'],
        ]);
        expect(Object.keys(lease.state.resources)).toEqual(['A']);
    });

    test('never runs more changes at once than allowed', async () => {
        adapter = new FakeAdapter(5);
        const template = ['Resources:']
            .concat(
                [1, 2, 3, 4, 5, 6].flatMap((i) => [
                    `  R${i}:`,
                    '    Type: Test::Thing::Item',
                    '    Properties:',
                    `      Name: r${i}`,
                ]),
            )
            .join('\n');
        const report = await apply(template, { concurrency: 2 });
        expect(report.status).toBe('succeeded');
        expect(adapter.calls).toHaveLength(6);
        expect(adapter.maxActive).toBe(2);
    });

    test('updates, deletes and retains', async () => {
        await apply(CHAIN);
        adapter.calls.length = 0;

        const report = await apply(`
Resources:
  A:
    Type: Test::Thing::Item
    Properties:
      Name: a2
  B:
    Type: Test::Thing::Item
    Properties:
      Name: b
      Parent: !GetAtt A.Arn
`);
        expect(report.status).toBe('succeeded');
        expect(adapter.calls).toEqual(['update A', 'delete D']);
        expect(report.outcomes.map((o) => [o.action, o.logicalId, o.attempts])).toEqual([
            ['update', 'A', 1],
            ['update', 'B', 0],
            ['delete', 'D', 2],
            ['delete', 'C', 0],
        ]);
        expect(Object.keys(lease.state.resources)).toEqual(['A', 'B']);
        expect(lease.state.resources.A.properties).toEqual({ Name: 'a2' });
        expect(adapter.live.has('c-3')).toBe(true);
    });

    test('a permanently failing update skips every dependent change', async () => {
        await apply(CHAIN);
        adapter.calls.length = 0;
        adapter.failures.set('update A', [new PermanentAPIError('invalid property Name')]);

        const report = await apply(
            CHAIN.replace('Name: a', 'Name: a2').replace('Name: b', 'Name: b2').replace('Name: c', 'Name: c2'),
        );
        expect(report.status).toBe('failed');
        expect(adapter.calls).toEqual(['update A']);
        expect(report.outcomes.map((o) => [o.logicalId, o.status, o.error])).toEqual([
            ['A', 'failed', 'invalid property Name'],
            ['B', 'skipped', 'dependency A did not succeed'],
            ['C', 'skipped', 'dependency B did not succeed'],
        ]);
        expect(lease.state.resources.A.properties).toEqual({ Name: 'a' });
    });

    test('a delete of a resource that is already gone succeeds', async () => {
        await apply(CHAIN);
        adapter.live.delete('d-4');
        adapter.calls.length = 0;

        const report = await apply(CHAIN.replace(/ {2}D:\n(.*\n){3}/, ''));
        expect(report.outcomes).toEqual([expect.objectContaining({ logicalId: 'D', status: 'succeeded', attempts: 1 })]);
        expect(adapter.calls).toEqual([]);
    });

    test('replaces resources whose type changed', async () => {
        await apply(CHAIN);
        adapter.calls.length = 0;

        const report = await apply(CHAIN.replace('Type: Test::Thing::Item', 'Type: Test::Thing::Other'));
        expect(report.status).toBe('succeeded');
        expect(adapter.calls).toEqual(['delete A', 'create A', 'update B']);
        expect(report.outcomes[0]).toMatchObject({ action: 'replace', logicalId: 'A', physicalId: 'a-5', attempts: 3 });
        expect(lease.state.resources.A.type).toBe('Test::Thing::Other');
        expect(lease.state.resources.B.properties).toEqual({ Name: 'b', Parent: 'arn:test:a-5' });
    });

    test('recreates the old resource when a replace fails after deleting it', async () => {
        await apply(CHAIN);
        adapter.calls.length = 0;
        adapter.failures.set('create A', [new PermanentAPIError('type not allowed')]);

        const report = await apply(CHAIN.replace('Type: Test::Thing::Item', 'Type: Test::Thing::Other'), {
            failurePolicy: 'rollback',
        });
        expect(report.status).toBe('rolledBack');
        expect(adapter.calls).toEqual(['delete A', 'create A', 'create A']);
        expect(report.outcomes.map((o) => [o.logicalId, o.status, o.error])).toEqual([
            ['A', 'failed', 'type not allowed'],
            ['B', 'skipped', 'dependency A did not succeed'],
            ['C', 'skipped', 'dependency B did not succeed'],
        ]);
        expect(lease.state.resources.A).toMatchObject({
            type: 'Test::Thing::Item',
            physicalId: 'a-5',
            properties: { Name: 'a' },
        });
        expect(adapter.live.get('a-5')).toEqual({ Name: 'a' });
    });

    test('reports a failed rollback as a failure', async () => {
        await apply(CHAIN);
        adapter.failures.set('create A', [
            new PermanentAPIError('type not allowed'),
            new PermanentAPIError('quota exceeded'),
        ]);

        const report = await apply(CHAIN.replace('Type: Test::Thing::Item', 'Type: Test::Thing::Other'), {
            failurePolicy: 'rollback',
        });
        expect(report.status).toBe('failed');
        expect(report.outcomes[0]).toMatchObject({
            logicalId: 'A',
            status: 'failed',
            error: 'type not allowed',
            rollbackError: 'quota exceeded',
        });
        expect(lease.state.resources.A).toBeUndefined();
    });

    test('an update whose references kept their values makes no call', async () => {
        await apply(CHAIN);
        adapter.calls.length = 0;

        const report = await apply(CHAIN.replace('Name: a', 'Name: a2'));
        expect(adapter.calls).toEqual(['update A']);
        expect(report.outcomes.map((o) => [o.action, o.logicalId, o.status, o.attempts])).toEqual([
            ['update', 'A', 'succeeded', 1],
            ['update', 'B', 'succeeded', 0],
            ['update', 'C', 'succeeded', 0],
        ]);
        expect(lease.state.resources.B.properties).toEqual({ Name: 'b', Parent: 'arn:test:a-1' });
        expect(computeChangeSet(desiredFromYaml(CHAIN.replace('Name: a', 'Name: a2')), lease.state).changes).toEqual([]);
    });

    test('rolls back updates to their previous properties', async () => {
        await apply(CHAIN);
        adapter.calls.length = 0;
        adapter.failures.set('create E', [new PermanentAPIError('quota exceeded')]);

        const report = await apply(
            `${CHAIN.replace('Name: a', 'Name: a2')}  E:
    Type: Test::Thing::Item
    Properties:
      Name: e
`,
            { failurePolicy: 'rollback' },
        );
        expect(report.status).toBe('rolledBack');
        expect(adapter.calls).toEqual(['update A', 'create E', 'update A']);
        expect(report.outcomes.map((o) => [o.logicalId, o.status])).toEqual([
            ['A', 'rolledBack'],
            ['B', 'rolledBack'],
            ['C', 'rolledBack'],
            ['E', 'failed'],
        ]);
        expect(lease.state.resources.A.properties).toEqual({ Name: 'a' });
        expect(adapter.live.get('a-1')).toEqual({ Name: 'a' });
    });

    test('reports resource types without an adapter', async () => {
        const report = await apply('Resources:\n  X:\n    Type: Test::Thing::Unknown\n');
        expect(report.status).toBe('failed');
        expect(report.outcomes).toEqual([
            expect.objectContaining({
                logicalId: 'X',
                status: 'failed',
                attempts: 0,
                error: 'No adapter registered for resource type Test::Thing::Unknown',
            }),
        ]);
    });
});
