import * as fs from 'fs-extra';
import * as path from 'path';
import { ConflictError, LockInfo, StackState, StateError, debug, errorMessage, isTemplateObject } from '@stackplan/core';
import { BaseStateLease, StateLease, StateStore, currentLockInfo, validateState } from './state-store';

/**
 * Keeps each stack's state in `<dir>/<stack>.json`, guarded by `<dir>/<stack>.lock`.
 *
 * The lock file is created exclusively, so two processes can never both hold it. State is written to a temporary
 * file and renamed into place, so readers never see a partial record.
 */
export class FileStateStore implements StateStore {
    constructor(readonly dir: string) {}

    statePath(stackName: string): string {
        return path.join(this.dir, `${stackName}.json`);
    }

    lockPath(stackName: string): string {
        return path.join(this.dir, `${stackName}.lock`);
    }

    async acquire(stackName: string, operation: string): Promise<StateLease> {
        await fs.ensureDir(this.dir);
        const lockPath = this.lockPath(stackName);
        const info = currentLockInfo(operation);
        try {
            await fs.writeFile(lockPath, JSON.stringify(info, undefined, 2), { flag: 'wx' });
        } catch (e) {
            if (isErrnoException(e) && e.code === 'EEXIST') {
                throw new ConflictError(stackName, await this.readLock(stackName));
            }
            throw e;
        }
        debug(`acquired lock ${lockPath}`);

        try {
            const state = await this.read(stackName);
            return new FileStateLease(this, stackName, state);
        } catch (e) {
            await fs.remove(lockPath);
            throw e;
        }
    }

    async read(stackName: string): Promise<StackState | undefined> {
        const statePath = this.statePath(stackName);
        if (!(await fs.pathExists(statePath))) {
            return undefined;
        }
        const text = await fs.readFile(statePath, 'utf8');
        let value: unknown;
        try {
            value = JSON.parse(text);
        } catch (e) {
            throw new StateError(`Unable to parse ${statePath}: ${errorMessage(e)}`, { cause: e });
        }
        return validateState(value, stackName);
    }

    async forceUnlock(stackName: string): Promise<boolean> {
        const lockPath = this.lockPath(stackName);
        if (!(await fs.pathExists(lockPath))) {
            return false;
        }
        await fs.remove(lockPath);
        return true;
    }

    /**
     * Returns the holder of the lock, if the lock file can be read.
     */
    async readLock(stackName: string): Promise<LockInfo | undefined> {
        try {
            const value: unknown = JSON.parse(await fs.readFile(this.lockPath(stackName), 'utf8'));
            if (
                isTemplateObject(value) &&
                typeof value.pid === 'number' &&
                typeof value.hostname === 'string' &&
                typeof value.operation === 'string' &&
                typeof value.acquiredAt === 'string'
            ) {
                return {
                    pid: value.pid,
                    hostname: value.hostname,
                    operation: value.operation,
                    acquiredAt: value.acquiredAt,
                };
            }
            return undefined;
        } catch (e) {
            debug(`unable to read lock of stack ${stackName}: ${errorMessage(e)}`);
            return undefined;
        }
    }

    async writeState(stackName: string, state: StackState): Promise<void> {
        const statePath = this.statePath(stackName);
        const tempPath = `${statePath}.${process.pid}.tmp`;
        await fs.writeFile(tempPath, JSON.stringify(state, undefined, 2) + '\n');
        await fs.rename(tempPath, statePath);
    }

    async deleteState(stackName: string): Promise<void> {
        await fs.remove(this.statePath(stackName));
    }

    async releaseLock(stackName: string): Promise<void> {
        await fs.remove(this.lockPath(stackName));
        debug(`released lock ${this.lockPath(stackName)}`);
    }
}

class FileStateLease extends BaseStateLease {
    constructor(
        private readonly store: FileStateStore,
        stackName: string,
        state: StackState | undefined,
    ) {
        super(stackName, state);
    }

    protected write(state: StackState): Promise<void> {
        return this.store.writeState(this.stackName, state);
    }

    protected delete(): Promise<void> {
        return this.store.deleteState(this.stackName);
    }

    protected unlock(): Promise<void> {
        return this.store.releaseLock(this.stackName);
    }
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
    return e instanceof Error && 'code' in e;
}
