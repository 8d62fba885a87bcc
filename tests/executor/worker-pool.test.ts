import { WorkerPool } from '../../src/executor/worker-pool';

function deferred<T>() {
    let resolve: (value: T) => void = () => {};
    let reject: (error: unknown) => void = () => {};
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

describe('WorkerPool', () => {
    test('reports tasks in the order they settle', async () => {
        const pool = new WorkerPool<string>(2);
        const slow = deferred<string>();
        const fast = deferred<string>();
        pool.start('slow', () => slow.promise);
        pool.start('fast', () => fast.promise);
        expect(pool.size).toBe(2);
        expect(pool.hasCapacity).toBe(false);

        fast.resolve('f');
        await expect(pool.next()).resolves.toEqual({ id: 'fast', ok: true, value: 'f' });
        expect(pool.hasCapacity).toBe(true);

        slow.reject(new Error('boom'));
        await expect(pool.next()).resolves.toEqual({ id: 'slow', ok: false, error: new Error('boom') });
        await expect(pool.next()).resolves.toBeUndefined();
    });

    test('captures synchronous throws', async () => {
        const pool = new WorkerPool<void>(1);
        pool.start('bad', () => {
            throw new Error('sync');
        });
        await expect(pool.next()).resolves.toMatchObject({ id: 'bad', ok: false });
    });

    test('refuses work beyond its capacity', () => {
        const pool = new WorkerPool<void>(1);
        pool.start('a', () => new Promise(() => {}));
        expect(() => pool.start('b', async () => {})).toThrow('Worker pool is full, cannot start b');
    });

    test('refuses duplicate ids', () => {
        const pool = new WorkerPool<void>(2);
        pool.start('a', () => new Promise(() => {}));
        expect(() => pool.start('a', async () => {})).toThrow('Task a is already running');
    });

    test('rejects invalid concurrency', () => {
        expect(() => new WorkerPool(0)).toThrow(RangeError);
        expect(() => new WorkerPool(1.5)).toThrow('concurrency must be a positive integer, got 1.5');
    });
});
