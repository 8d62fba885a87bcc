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

import {
    ChangeSet,
    DesiredStack,
    OutputState,
    StackState,
    TemplateModel,
    attributeLookup,
    buildDesiredStack,
    computeChangeSet,
    computeDestroyChangeSet,
    evaluateOutputs,
    hasChanges,
    info,
    isEmptyState,
    noEchoValues,
} from '@stackplan/core';
import { ExecutionReport, Executor, FailurePolicy } from './executor/executor';
import { RetryOptions } from './executor/retry';
import { AdapterRegistry } from './providers/adapter';
import { StateLease, StateStore, withStackState } from './state/state-store';

export interface StackOrchestratorOptions {
    store: StateStore;
    registry: AdapterRegistry;
    region: string;
    accountId: string;
    concurrency?: number;
    failurePolicy?: FailurePolicy;
    retry?: RetryOptions;
}

export interface StackRequest {
    stackName: string;
    model: TemplateModel;
    parameters?: { [name: string]: string };
}

export interface PlanResult {
    desired: DesiredStack;
    changeSet: ChangeSet;

    /**
     * The state the plan was computed against.
     */
    state: StackState;
}

export interface ApplyResult extends PlanResult {
    report: ExecutionReport;

    /**
     * Outputs evaluated after a successful apply.
     */
    outputs?: { [name: string]: OutputState };
}

/**
 * Ties template resolution, diffing, execution and state together for one stack at a time. Every operation that
 * reads state for a decision holds the stack's lock until it is done.
 */
export class StackOrchestrator {
    private readonly store: StateStore;
    private readonly registry: AdapterRegistry;
    private readonly region: string;
    private readonly accountId: string;
    private readonly concurrency?: number;
    private readonly failurePolicy?: FailurePolicy;
    private readonly retry?: RetryOptions;

    constructor(options: StackOrchestratorOptions) {
        this.store = options.store;
        this.registry = options.registry;
        this.region = options.region;
        this.accountId = options.accountId;
        this.concurrency = options.concurrency;
        this.failurePolicy = options.failurePolicy;
        this.retry = options.retry;
    }

    async plan(request: StackRequest): Promise<PlanResult> {
        return withStackState(this.store, request.stackName, 'plan', async (lease) => this.computePlan(request, lease));
    }

    async apply(request: StackRequest, signal?: AbortSignal): Promise<ApplyResult> {
        return withStackState(this.store, request.stackName, 'apply', async (lease) => {
            const plan = this.computePlan(request, lease);
            info(`applying ${plan.changeSet.changes.length} change(s) to stack ${request.stackName}`);

            const report = await this.executor(lease, signal).execute(plan.changeSet);
            this.syncUnchanged(plan.desired, plan.changeSet, lease.state);
            orderResources(plan.desired, lease.state);

            let outputs: { [name: string]: OutputState } | undefined;
            if (report.status === 'succeeded') {
                outputs = evaluateOutputs(
                    plan.desired.outputs,
                    attributeLookup(lease.state),
                    noEchoValues(plan.desired),
                );
                lease.state.outputs = outputs;
            }
            return { ...plan, report, outputs };
        });
    }

    /**
     * Deletes every resource recorded for the stack, dependents first. The state record is removed once nothing
     * remains in it. Returns undefined when the stack has no state.
     */
    async destroy(stackName: string, signal?: AbortSignal): Promise<ExecutionReport | undefined> {
        return withStackState(this.store, stackName, 'destroy', async (lease) => {
            if (!lease.existed) {
                return undefined;
            }
            const changeSet = computeDestroyChangeSet(lease.state);
            info(`destroying ${changeSet.changes.length} resource(s) of stack ${stackName}`);

            const report = await this.executor(lease, signal).execute(changeSet);
            if (isEmptyState(lease.state)) {
                await lease.remove();
            }
            return report;
        });
    }

    /**
     * Outputs recorded by the last successful apply. Undefined when the stack has no state.
     */
    async outputs(stackName: string): Promise<{ [name: string]: OutputState } | undefined> {
        const state = await this.store.read(stackName);
        return state === undefined ? undefined : state.outputs ?? {};
    }

    private computePlan(request: StackRequest, lease: StateLease): PlanResult {
        const desired = buildDesiredStack(request.model, {
            stackName: request.stackName,
            region: this.region,
            accountId: this.accountId,
            parameters: request.parameters,
        });
        const changeSet = computeChangeSet(desired, lease.state);
        info(
            hasChanges(changeSet)
                ? `stack ${request.stackName}: ${changeSet.changes.length} change(s), ${changeSet.unchanged.length} unchanged`
                : `stack ${request.stackName}: no changes`,
        );
        return { desired, changeSet, state: structuredClone(lease.state) };
    }

    private executor(lease: StateLease, signal?: AbortSignal): Executor {
        return new Executor({
            registry: this.registry,
            lease,
            region: this.region,
            accountId: this.accountId,
            concurrency: this.concurrency,
            failurePolicy: this.failurePolicy,
            retry: this.retry,
            signal,
        });
    }

    // Unchanged resources need no control-plane call, but their recorded dependencies and deletion policy follow
    // the template so that later deletes are ordered correctly.
    private syncUnchanged(desired: DesiredStack, changeSet: ChangeSet, state: StackState): void {
        for (const logicalId of changeSet.unchanged) {
            const resource = desired.resources.get(logicalId);
            const recorded = state.resources[logicalId];
            if (resource !== undefined && recorded !== undefined) {
                recorded.dependencies = resource.dependencies;
                recorded.deletionPolicy = resource.deletionPolicy;
            }
        }
    }
}

/**
 * Lists recorded resources in the template's dependency order, followed by those the template no longer has.
 * Changes settle in whatever order the control plane answers, so this keeps the record stable between runs.
 */
function orderResources(desired: DesiredStack, state: StackState): void {
    const ordered: StackState['resources'] = {};
    for (const logicalId of desired.resources.keys()) {
        const recorded = state.resources[logicalId];
        if (recorded !== undefined) {
            ordered[logicalId] = recorded;
        }
    }
    for (const [logicalId, recorded] of Object.entries(state.resources)) {
        if (!(logicalId in ordered)) {
            ordered[logicalId] = recorded;
        }
    }
    state.resources = ordered;
}
