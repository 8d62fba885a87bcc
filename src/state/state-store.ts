// Copyright 2016-2024, Pulumi Corporation.
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import * as os from 'os';
import {
    LockInfo,
    OutputState,
    ResourceState,
    STATE_VERSION,
    StackState,
    StateError,
    emptyState,
    errorMessage,
    isTemplateObject,
    error as logError,
} from '@stackplan/core';

/**
 * Exclusive access to one stack's state, held from `acquire` until `release`.
 */
export interface StateLease {
    readonly stackName: string;

    /**
     * The working copy. Mutate it, then `commit` to persist.
     */
    state: StackState;

    /**
     * Whether a state record existed when the lease was taken.
     */
    readonly existed: boolean;

    /**
     * Persists the working copy, incrementing its serial.
     */
    commit(): Promise<void>;

    /**
     * Commits if the working copy changed since the last commit.
     */
    flush(): Promise<void>;

    /**
     * Deletes the state record. Later commits recreate it.
     */
    remove(): Promise<void>;
    release(): Promise<void>;
}

export interface StateStore {
    /**
     * @throws ConflictError if another operation holds the lock
     */
    acquire(stackName: string, operation: string): Promise<StateLease>;

    /**
     * Reads the state without taking the lock. Undefined when no record exists.
     */
    read(stackName: string): Promise<StackState | undefined>;

    /**
     * Removes a lock left behind by a process that went away. Returns whether a lock was removed.
     */
    forceUnlock(stackName: string): Promise<boolean>;
}

/**
 * Runs `fn` while holding the lock on `stackName`. Pending changes to the state are flushed and the lock is
 * released however `fn` exits.
 */
export async function withStackState<T>(
    store: StateStore,
    stackName: string,
    operation: string,
    fn: (lease: StateLease) => Promise<T>,
): Promise<T> {
    const lease = await store.acquire(stackName, operation);
    try {
        const result = await fn(lease);
        await lease.flush();
        return result;
    } catch (e) {
        try {
            await lease.flush();
        } catch (flushError) {
            logError(`Unable to save state of stack '${stackName}': ${errorMessage(flushError)}`);
        }
        throw e;
    } finally {
        await lease.release();
    }
}

/**
 * Implements the commit bookkeeping shared by every store. Subclasses persist and unlock.
 */
export abstract class BaseStateLease implements StateLease {
    state: StackState;
    readonly existed: boolean;
    private committed: string;
    private released = false;
    private writes: Promise<void> = Promise.resolve();

    constructor(
        readonly stackName: string,
        state: StackState | undefined,
    ) {
        this.existed = state !== undefined;
        this.state = state ?? emptyState(stackName);
        this.committed = JSON.stringify(this.state);
    }

    protected abstract write(state: StackState): Promise<void>;
    protected abstract delete(): Promise<void>;
    protected abstract unlock(): Promise<void>;

    /**
     * Commits run one at a time, in call order.
     */
    commit(): Promise<void> {
        const run = this.writes.then(() => this.writeWorkingCopy());
        this.writes = run.catch(() => undefined);
        return run;
    }

    private async writeWorkingCopy(): Promise<void> {
        this.assertHeld();
        this.state.serial++;
        this.state.updatedAt = new Date().toISOString();
        await this.write(this.state);
        this.committed = JSON.stringify(this.state);
    }

    async flush(): Promise<void> {
        if (!this.released && JSON.stringify(this.state) !== this.committed) {
            await this.commit();
        }
    }

    async remove(): Promise<void> {
        this.assertHeld();
        await this.delete();
        this.state = emptyState(this.stackName);
        this.committed = JSON.stringify(this.state);
    }

    async release(): Promise<void> {
        if (this.released) {
            return;
        }
        this.released = true;
        await this.unlock();
    }

    private assertHeld() {
        if (this.released) {
            throw new StateError(`Lock on stack '${this.stackName}' has already been released`);
        }
    }
}

export function currentLockInfo(operation: string): LockInfo {
    return {
        pid: process.pid,
        hostname: os.hostname(),
        operation,
        acquiredAt: new Date().toISOString(),
    };
}

/**
 * Checks the shape of a state record read from storage.
 *
 * @throws StateError if the record is not a state or has an unsupported version
 */
export function validateState(value: unknown, stackName: string): StackState {
    if (!isTemplateObject(value)) {
        throw new StateError(`State of stack '${stackName}' is not an object`);
    }
    if (value.version !== STATE_VERSION) {
        throw new StateError(
            `State of stack '${stackName}' has unsupported version ${JSON.stringify(value.version)} (expected ${STATE_VERSION})`,
        );
    }
    if (typeof value.stackName !== 'string' || typeof value.serial !== 'number' || !isTemplateObject(value.resources)) {
        throw new StateError(`State of stack '${stackName}' is malformed`);
    }
    const resources: { [logicalId: string]: ResourceState } = {};
    for (const [logicalId, resource] of Object.entries(value.resources)) {
        if (
            !isTemplateObject(resource) ||
            typeof resource.type !== 'string' ||
            typeof resource.physicalId !== 'string' ||
            !isTemplateObject(resource.properties) ||
            !isTemplateObject(resource.attributes) ||
            !Array.isArray(resource.dependencies)
        ) {
            throw new StateError(`State of stack '${stackName}' has a malformed entry for ${logicalId}`);
        }
        const policy = resource.deletionPolicy;
        resources[logicalId] = {
            type: resource.type,
            properties: resource.properties,
            physicalId: resource.physicalId,
            attributes: resource.attributes,
            dependencies: resource.dependencies.filter((id): id is string => typeof id === 'string'),
            deletionPolicy: policy === 'Retain' || policy === 'Delete' ? policy : undefined,
        };
    }

    let outputs: { [name: string]: OutputState } | undefined;
    if (isTemplateObject(value.outputs)) {
        outputs = {};
        for (const [name, output] of Object.entries(value.outputs)) {
            if (!isTemplateObject(output) || output.value === undefined) {
                throw new StateError(`State of stack '${stackName}' has a malformed output ${name}`);
            }
            outputs[name] = {
                value: output.value,
                description: typeof output.description === 'string' ? output.description : undefined,
                exportName: typeof output.exportName === 'string' ? output.exportName : undefined,
                noEcho: output.noEcho === true || undefined,
            };
        }
    }

    return {
        version: STATE_VERSION,
        stackName: value.stackName,
        serial: value.serial,
        updatedAt: typeof value.updatedAt === 'string' ? value.updatedAt : undefined,
        resources,
        outputs,
    };
}
