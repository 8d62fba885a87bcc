import equal from 'fast-deep-equal';
import { DesiredResource, DesiredStack } from './desired';
import { DependencyGraph } from './graph';
import { ConcreteValue, PlannedMap, PlannedValue } from './ir';
import { debug } from './logging';
import { isConcrete, isFullyKnown, materialize } from './materialize';
import { ResourceState, StackState, attributeLookup } from './state';

/**
 * `replace` deletes the existing resource and creates a new one, because its type changed.
 */
export type ChangeAction = 'create' | 'update' | 'replace' | 'delete';

export interface PropertyChange {
    /**
     * Top-level property name.
     */
    path: string;
    before?: ConcreteValue;
    after?: PlannedValue;
}

export interface ResourceChange {
    logicalId: string;
    action: ChangeAction;
    type: string;

    /**
     * The resource as the template wants it. Absent for deletes.
     */
    desired?: DesiredResource;

    /**
     * The resource as recorded in state. Absent for creates.
     */
    previous?: ResourceState;

    /**
     * Properties as far as they are known before apply.
     */
    planned?: PlannedMap;
    propertyChanges: PropertyChange[];

    /**
     * Logical names of the other changes in the set that must finish first.
     */
    dependsOn: string[];

    /**
     * Delete from state only, leaving the physical resource in place.
     */
    retain: boolean;
}

export interface ChangeSet {
    stackName: string;

    /**
     * Creates, updates and replaces in dependency order, then deletes in reverse dependency order.
     */
    changes: ResourceChange[];
    unchanged: string[];
}

/**
 * Compares the desired stack against the recorded state.
 *
 * Attributes of resources that this change set creates, replaces or updates are unknown until apply, since an
 * update may give a resource a new identifier. Every resource that references them becomes an update, which the
 * executor skips when the attributes turn out unchanged.
 */
export function computeChangeSet(desired: DesiredStack, state: StackState): ChangeSet {
    const stored = attributeLookup(state);
    const pending = new Set<string>();
    const lookup = (logicalId: string, attributeName: string) =>
        pending.has(logicalId) ? undefined : stored(logicalId, attributeName);

    const changes: ResourceChange[] = [];
    const unchanged: string[] = [];
    const changed = new Set<string>();

    for (const resource of desired.resources.values()) {
        const previous = state.resources[resource.logicalId];
        const planned = materializeProperties(resource, lookup);
        const dependsOn = () => resource.dependencies.filter((id) => changed.has(id));

        let change: ResourceChange | undefined;
        if (previous === undefined) {
            change = {
                logicalId: resource.logicalId,
                action: 'create',
                type: resource.type,
                desired: resource,
                planned,
                propertyChanges: propertyChanges({}, planned),
                dependsOn: dependsOn(),
                retain: false,
            };
            pending.add(resource.logicalId);
        } else if (previous.type !== resource.type) {
            change = {
                logicalId: resource.logicalId,
                action: 'replace',
                type: resource.type,
                desired: resource,
                previous,
                planned,
                propertyChanges: propertyChanges(previous.properties, planned),
                dependsOn: dependsOn(),
                retain: false,
            };
            pending.add(resource.logicalId);
        } else if (!isFullyKnown(planned) || !equal(planned, previous.properties)) {
            change = {
                logicalId: resource.logicalId,
                action: 'update',
                type: resource.type,
                desired: resource,
                previous,
                planned,
                propertyChanges: propertyChanges(previous.properties, planned),
                dependsOn: dependsOn(),
                retain: false,
            };
            pending.add(resource.logicalId);
        }

        if (change) {
            debug(`${resource.logicalId}: ${change.action}`);
            changed.add(resource.logicalId);
            changes.push(change);
        } else {
            unchanged.push(resource.logicalId);
        }
    }

    changes.push(...computeDeletes(desired, state, changes));

    return {
        stackName: desired.stackName,
        changes,
        unchanged,
    };
}

/**
 * A change set that deletes every resource recorded in `state`.
 */
export function computeDestroyChangeSet(state: StackState): ChangeSet {
    return {
        stackName: state.stackName,
        changes: computeDeletes(undefined, state, []),
        unchanged: [],
    };
}

export function hasChanges(changeSet: ChangeSet): boolean {
    return changeSet.changes.length > 0;
}

export function countChanges(changeSet: ChangeSet): Record<ChangeAction, number> {
    const counts: Record<ChangeAction, number> = { create: 0, update: 0, replace: 0, delete: 0 };
    for (const change of changeSet.changes) {
        counts[change.action]++;
    }
    return counts;
}

/**
 * The dependency graph of the resources recorded in state. Dependencies on resources that are no longer recorded
 * are ignored.
 */
export function stateGraph(state: StackState): DependencyGraph {
    const ids = new Set(Object.keys(state.resources));
    return DependencyGraph.build(
        Object.entries(state.resources).map(([logicalId, resource]) => ({
            logicalId,
            dependencies: resource.dependencies.filter((id) => ids.has(id)),
        })),
    );
}

function computeDeletes(desired: DesiredStack | undefined, state: StackState, changes: ResourceChange[]): ResourceChange[] {
    const graph = stateGraph(state);
    const removed = graph
        .topologicalOrder()
        .reverse()
        .filter((id) => desired === undefined || !desired.resources.has(id));
    const removedSet = new Set(removed);

    const deletes: ResourceChange[] = [];
    for (const logicalId of removed) {
        const previous = state.resources[logicalId];

        // A resource can only go once nothing uses it any more: dependents being deleted, and changed resources
        // that used to reference it.
        const dependsOn = graph.dependentsOf(logicalId).filter((id) => removedSet.has(id));
        for (const change of changes) {
            if (change.previous?.dependencies.includes(logicalId) && !dependsOn.includes(change.logicalId)) {
                dependsOn.push(change.logicalId);
            }
        }

        deletes.push({
            logicalId,
            action: 'delete',
            type: previous.type,
            previous,
            propertyChanges: propertyChanges(previous.properties, {}),
            dependsOn,
            retain: previous.deletionPolicy === 'Retain',
        });
    }
    return deletes;
}

function materializeProperties(
    resource: DesiredResource,
    lookup: (logicalId: string, attributeName: string) => ConcreteValue | undefined,
): PlannedMap {
    const planned: PlannedMap = {};
    for (const [key, value] of Object.entries(resource.properties)) {
        planned[key] = materialize(value, lookup);
    }
    return planned;
}

function propertyChanges(before: { [key: string]: ConcreteValue }, after: PlannedMap): PropertyChange[] {
    const keys = [...new Set([...Object.keys(before), ...Object.keys(after)])];
    const result: PropertyChange[] = [];
    for (const path of keys) {
        const oldValue = path in before ? before[path] : undefined;
        const newValue = path in after ? after[path] : undefined;
        if (newValue !== undefined && oldValue !== undefined && isConcrete(newValue) && equal(oldValue, newValue)) {
            continue;
        }
        result.push({ path, before: oldValue, after: newValue });
    }
    return result;
}
