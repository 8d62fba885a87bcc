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

import equal from 'fast-deep-equal';
import {
    ChangeAction,
    ChangeSet,
    PermanentAPIError,
    ResourceChange,
    ResourceState,
    attributeLookup,
    errorMessage,
    error as logError,
    info,
    materializeKnown,
    warn,
} from '@stackplan/core';
import { AdapterRegistry, ResourceContext, ResourceResult } from '../providers/adapter';
import { StateLease } from '../state/state-store';
import { DEFAULT_RETRY_OPTIONS, RetryExhaustedError, RetryOptions, withRetry } from './retry';
import { WorkerPool } from './worker-pool';

export type FailurePolicy = 'continue' | 'rollback';

export const FAILURE_POLICIES: readonly FailurePolicy[] = ['continue', 'rollback'];

export const DEFAULT_CONCURRENCY = 4;

export type ChangeStatus = 'succeeded' | 'failed' | 'skipped' | 'cancelled' | 'rolledBack';

export type ExecutionStatus = 'succeeded' | 'failed' | 'cancelled' | 'rolledBack';

export interface ChangeOutcome {
    logicalId: string;
    action: ChangeAction;
    type: string;
    status: ChangeStatus;

    /**
     * Control-plane calls made, retries included.
     */
    attempts: number;
    durationMs: number;
    physicalId?: string;
    error?: string;

    /**
     * Set when undoing a completed change failed during rollback.
     */
    rollbackError?: string;
}

export interface ExecutionReport {
    stackName: string;
    status: ExecutionStatus;

    /**
     * One entry per change, in change-set order.
     */
    outcomes: ChangeOutcome[];
    durationMs: number;
}

export interface ExecutorOptions {
    registry: AdapterRegistry;

    /**
     * Lease on the stack's state. Every settled change is committed through it.
     */
    lease: StateLease;
    region: string;
    accountId: string;
    concurrency?: number;
    failurePolicy?: FailurePolicy;
    retry?: RetryOptions;

    /**
     * Aborting stops changes that have not started yet. Running calls finish.
     */
    signal?: AbortSignal;
}

interface Applied {
    attempts: number;
    physicalId?: string;
}

/**
 * Applies a change set through the adapter registry.
 *
 * A change starts once every change it depends on has succeeded. Up to `concurrency` changes run at a time. When a
 * change fails, everything that depends on it is skipped; with the `rollback` policy nothing new starts and the
 * changes that completed are undone in reverse order.
 */
export class Executor {
    private readonly registry: AdapterRegistry;
    private readonly lease: StateLease;
    private readonly region: string;
    private readonly accountId: string;
    private readonly concurrency: number;
    private readonly failurePolicy: FailurePolicy;
    private readonly retry: RetryOptions;
    private readonly signal?: AbortSignal;

    constructor(options: ExecutorOptions) {
        this.registry = options.registry;
        this.lease = options.lease;
        this.region = options.region;
        this.accountId = options.accountId;
        this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
        this.failurePolicy = options.failurePolicy ?? 'continue';
        this.retry = options.retry ?? DEFAULT_RETRY_OPTIONS;
        this.signal = options.signal;
    }

    async execute(changeSet: ChangeSet): Promise<ExecutionReport> {
        const started = Date.now();
        const changes = new Map(changeSet.changes.map((change) => [change.logicalId, change]));
        const outcomes = new Map<string, ChangeOutcome>();
        const startedAt = new Map<string, number>();
        const completed: ResourceChange[] = [];
        const deletedForReplace = new Set<string>();
        const pool = new WorkerPool<Applied>(this.concurrency);
        let failed = false;

        const settle = (change: ResourceChange, outcome: Omit<ChangeOutcome, 'logicalId' | 'action' | 'type'>) => {
            outcomes.set(change.logicalId, {
                logicalId: change.logicalId,
                action: change.action,
                type: change.type,
                ...outcome,
            });
        };

        const schedule = () => {
            let progress = true;
            while (progress) {
                progress = false;
                for (const change of changes.values()) {
                    if (outcomes.has(change.logicalId) || startedAt.has(change.logicalId)) {
                        continue;
                    }

                    const blockedBy = change.dependsOn.find((id) => {
                        const status = outcomes.get(id)?.status;
                        return status !== undefined && status !== 'succeeded';
                    });
                    if (blockedBy !== undefined) {
                        settle(change, {
                            status: 'skipped',
                            attempts: 0,
                            durationMs: 0,
                            error: `dependency ${blockedBy} did not succeed`,
                        });
                        progress = true;
                        continue;
                    }

                    if (this.signal?.aborted) {
                        settle(change, { status: 'cancelled', attempts: 0, durationMs: 0, error: 'operation was cancelled' });
                        progress = true;
                        continue;
                    }
                    if (failed && this.failurePolicy === 'rollback') {
                        settle(change, { status: 'skipped', attempts: 0, durationMs: 0, error: 'apply is rolling back' });
                        progress = true;
                        continue;
                    }

                    const ready = change.dependsOn.every(
                        (id) => !changes.has(id) || outcomes.get(id)?.status === 'succeeded',
                    );
                    if (ready && pool.hasCapacity) {
                        info(`${change.action} ${change.logicalId} (${change.type})`);
                        startedAt.set(change.logicalId, Date.now());
                        pool.start(change.logicalId, () => this.applyChange(change, deletedForReplace));
                    }
                }
            }
        };

        schedule();
        for (let result = await pool.next(); result !== undefined; result = await pool.next()) {
            const change = changes.get(result.id);
            if (change === undefined) {
                continue;
            }
            const durationMs = Date.now() - (startedAt.get(result.id) ?? started);
            if (result.ok) {
                info(`${change.action} ${change.logicalId} succeeded in ${durationMs}ms`);
                settle(change, {
                    status: 'succeeded',
                    attempts: result.value.attempts,
                    durationMs,
                    physicalId: result.value.physicalId,
                });
                completed.push(change);
            } else {
                const attempts = result.error instanceof RetryExhaustedError ? result.error.attempts : 0;
                const cause = result.error instanceof RetryExhaustedError ? result.error.lastError : result.error;
                logError(`${change.action} ${change.logicalId} failed: ${errorMessage(cause)}`);
                settle(change, { status: 'failed', attempts, durationMs, error: errorMessage(cause) });
                if (deletedForReplace.has(change.logicalId)) {
                    // The old resource is already gone, rollback recreates it.
                    completed.push(change);
                }
                failed = true;
            }
            schedule();
        }

        let status: ExecutionStatus = 'succeeded';
        if (failed && this.failurePolicy === 'rollback') {
            status = (await this.rollback(completed, outcomes)) ? 'rolledBack' : 'failed';
        } else if (failed) {
            status = 'failed';
        } else if ([...outcomes.values()].some((outcome) => outcome.status === 'cancelled')) {
            status = 'cancelled';
        }

        return {
            stackName: changeSet.stackName,
            status,
            outcomes: changeSet.changes.flatMap((change) => {
                const outcome = outcomes.get(change.logicalId);
                return outcome ? [outcome] : [];
            }),
            durationMs: Date.now() - started,
        };
    }

    private async applyChange(change: ResourceChange, deletedForReplace: Set<string>): Promise<Applied> {
        const context = this.context(change.logicalId);
        const previous = change.previous;
        const desired = change.desired;

        if (change.action === 'delete') {
            if (previous === undefined) {
                throw new PermanentAPIError(`No recorded state for ${change.logicalId}`);
            }
            const attempts = change.retain ? 0 : await this.deletePhysical(context, previous);
            if (change.retain) {
                info(`${change.logicalId} is retained, removing it from state only`);
            }
            delete this.lease.state.resources[change.logicalId];
            await this.lease.commit();
            return { attempts, physicalId: previous.physicalId };
        }

        if (desired === undefined) {
            throw new PermanentAPIError(`No desired properties for ${change.logicalId}`);
        }
        const properties = materializeKnown(desired.properties, attributeLookup(this.lease.state));
        const adapter = this.registry.get(desired.type);

        if (change.action === 'update' && previous !== undefined && equal(properties, previous.properties)) {
            // Planned against attributes that were unknown, which kept their values.
            info(`${change.logicalId} is unchanged, no update needed`);
            this.lease.state.resources[change.logicalId] = {
                ...previous,
                dependencies: desired.dependencies,
                deletionPolicy: desired.deletionPolicy,
            };
            await this.lease.commit();
            return { attempts: 0, physicalId: previous.physicalId };
        }

        let attempts = 0;
        let result: ResourceResult;
        if (change.action === 'update' && previous !== undefined) {
            const updated = await withRetry(
                () =>
                    adapter.update({
                        context,
                        type: desired.type,
                        properties,
                        physicalId: previous.physicalId,
                        previousProperties: previous.properties,
                    }),
                `update ${change.logicalId}`,
                this.retry,
            );
            attempts += updated.attempts;
            result = updated.value;
        } else {
            if (change.action === 'replace' && previous !== undefined) {
                attempts += await this.deletePhysical(context, previous);
                delete this.lease.state.resources[change.logicalId];
                await this.lease.commit();
                deletedForReplace.add(change.logicalId);
            }
            const created = await withRetry(
                () => adapter.create({ context, type: desired.type, properties }),
                `create ${change.logicalId}`,
                this.retry,
            );
            attempts += created.attempts;
            result = created.value;
        }

        this.lease.state.resources[change.logicalId] = {
            type: desired.type,
            properties,
            physicalId: result.physicalId,
            attributes: result.attributes,
            dependencies: desired.dependencies,
            deletionPolicy: desired.deletionPolicy,
        };
        await this.lease.commit();
        return { attempts, physicalId: result.physicalId };
    }

    /**
     * Deletes the physical resource. Returns the number of control-plane calls made.
     */
    private async deletePhysical(context: ResourceContext, resource: ResourceState): Promise<number> {
        const adapter = this.registry.get(resource.type);
        const request = { context, type: resource.type, physicalId: resource.physicalId };

        let attempts = 0;
        if (adapter.describe) {
            const describe = adapter.describe.bind(adapter);
            const described = await withRetry(() => describe(request), `describe ${context.logicalId}`, this.retry);
            attempts += described.attempts;
            if (described.value === undefined) {
                info(`${context.logicalId} (${resource.physicalId}) no longer exists`);
                return attempts;
            }
        }

        const deleted = await withRetry(
            () => adapter.delete({ ...request, properties: resource.properties }),
            `delete ${context.logicalId}`,
            this.retry,
        );
        return attempts + deleted.attempts;
    }

    /**
     * Undoes completed creates, updates and replaces, most recent first. Deletes cannot be undone. Returns whether
     * every change was undone.
     */
    private async rollback(completed: ResourceChange[], outcomes: Map<string, ChangeOutcome>): Promise<boolean> {
        let undone = true;
        for (const change of [...completed].reverse()) {
            if (change.action === 'delete') {
                continue;
            }
            const outcome = outcomes.get(change.logicalId);
            warn(`rolling back ${change.action} of ${change.logicalId}`);
            try {
                await this.undo(change);
                if (outcome?.status === 'succeeded') {
                    outcome.status = 'rolledBack';
                }
            } catch (e) {
                const message = errorMessage(e instanceof RetryExhaustedError ? e.lastError : e);
                logError(`rollback of ${change.logicalId} failed: ${message}`);
                undone = false;
                if (outcome) {
                    outcome.rollbackError = message;
                }
            }
        }
        return undone;
    }

    private async undo(change: ResourceChange): Promise<void> {
        const context = this.context(change.logicalId);
        const current = this.lease.state.resources[change.logicalId];
        const previous = change.previous;

        if (
            change.action === 'update' &&
            current !== undefined &&
            previous !== undefined &&
            current.physicalId === previous.physicalId &&
            equal(current.properties, previous.properties)
        ) {
            this.lease.state.resources[change.logicalId] = previous;
            await this.lease.commit();
            return;
        }

        if (change.action === 'update' && current !== undefined && previous !== undefined) {
            const adapter = this.registry.get(previous.type);
            const restored = await withRetry(
                () =>
                    adapter.update({
                        context,
                        type: previous.type,
                        properties: previous.properties,
                        physicalId: current.physicalId,
                        previousProperties: current.properties,
                    }),
                `restore ${change.logicalId}`,
                this.retry,
            );
            this.lease.state.resources[change.logicalId] = {
                ...previous,
                physicalId: restored.value.physicalId,
                attributes: restored.value.attributes,
            };
            await this.lease.commit();
            return;
        }

        if (current !== undefined) {
            await this.deletePhysical(context, current);
            delete this.lease.state.resources[change.logicalId];
            await this.lease.commit();
        }

        if (change.action === 'replace' && previous !== undefined) {
            const adapter = this.registry.get(previous.type);
            const recreated = await withRetry(
                () => adapter.create({ context, type: previous.type, properties: previous.properties }),
                `recreate ${change.logicalId}`,
                this.retry,
            );
            this.lease.state.resources[change.logicalId] = {
                ...previous,
                physicalId: recreated.value.physicalId,
                attributes: recreated.value.attributes,
            };
            await this.lease.commit();
        }
    }

    private context(logicalId: string): ResourceContext {
        return {
            stackName: this.lease.stackName,
            logicalId,
            region: this.region,
            accountId: this.accountId,
        };
    }
}
