import { ConflictError, LockInfo, StackState } from '@stackplan/core';
import { BaseStateLease, StateLease, StateStore, currentLockInfo, validateState } from './state-store';

/**
 * Keeps state in process. Records are copied in and out so callers never share objects with the store.
 */
export class MemoryStateStore implements StateStore {
    private readonly states = new Map<string, string>();
    private readonly locks = new Map<string, LockInfo>();

    async acquire(stackName: string, operation: string): Promise<StateLease> {
        const holder = this.locks.get(stackName);
        if (holder) {
            throw new ConflictError(stackName, holder);
        }
        this.locks.set(stackName, currentLockInfo(operation));
        try {
            return new MemoryStateLease(this, stackName, await this.read(stackName));
        } catch (e) {
            this.locks.delete(stackName);
            throw e;
        }
    }

    async read(stackName: string): Promise<StackState | undefined> {
        const text = this.states.get(stackName);
        return text === undefined ? undefined : validateState(JSON.parse(text), stackName);
    }

    async forceUnlock(stackName: string): Promise<boolean> {
        return this.locks.delete(stackName);
    }

    isLocked(stackName: string): boolean {
        return this.locks.has(stackName);
    }

    /**
     * Replaces the stored state without taking the lock.
     */
    put(state: StackState): void {
        this.states.set(state.stackName, JSON.stringify(state));
    }

    delete(stackName: string): void {
        this.states.delete(stackName);
    }

    unlock(stackName: string): void {
        this.locks.delete(stackName);
    }
}

class MemoryStateLease extends BaseStateLease {
    constructor(
        private readonly store: MemoryStateStore,
        stackName: string,
        state: StackState | undefined,
    ) {
        super(stackName, state);
    }

    protected async write(state: StackState): Promise<void> {
        this.store.put(state);
    }

    protected async delete(): Promise<void> {
        this.store.delete(this.stackName);
    }

    protected async unlock(): Promise<void> {
        this.store.unlock(this.stackName);
    }
}
