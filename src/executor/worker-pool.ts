export type TaskResult<T> = { id: string; ok: true; value: T } | { id: string; ok: false; error: unknown };

/**
 * Runs at most `concurrency` tasks at a time. The caller feeds it from its own ready queue: start tasks while
 * `hasCapacity`, then wait for `next` to learn which one settled.
 */
export class WorkerPool<T> {
    private readonly running = new Map<string, Promise<TaskResult<T>>>();

    constructor(readonly concurrency: number) {
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
        }
    }

    get size(): number {
        return this.running.size;
    }

    get hasCapacity(): boolean {
        return this.running.size < this.concurrency;
    }

    start(id: string, task: () => Promise<T>): void {
        if (!this.hasCapacity) {
            throw new Error(`Worker pool is full, cannot start ${id}`);
        }
        if (this.running.has(id)) {
            throw new Error(`Task ${id} is already running`);
        }
        const settled = Promise.resolve()
            .then(task)
            .then(
                (value): TaskResult<T> => ({ id, ok: true, value }),
                (error: unknown): TaskResult<T> => ({ id, ok: false, error }),
            );
        this.running.set(id, settled);
    }

    /**
     * Waits for the next running task to settle. Undefined when nothing is running.
     */
    async next(): Promise<TaskResult<T> | undefined> {
        if (this.running.size === 0) {
            return undefined;
        }
        const result = await Promise.race(this.running.values());
        this.running.delete(result.id);
        return result;
    }
}
