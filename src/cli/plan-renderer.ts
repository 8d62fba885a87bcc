import { stringify } from 'yaml';
import {
    ChangeAction,
    MASKED_VALUE,
    ParameterValue,
    PlannedValue,
    PropertyChange,
    ResourceChange,
    UnknownValue,
    containsSecret,
    countChanges,
    maskPlannedValue,
    noEchoValues,
} from '@stackplan/core';
import { PlanResult } from '../orchestrator';

export { MASKED_VALUE };

const ACTION_SYMBOLS: Record<ChangeAction, string> = {
    create: '+',
    update: '~',
    replace: '-/+',
    delete: '-',
};

interface PlanDocument {
    stack: string;
    parameters: { [name: string]: ParameterValue };
    summary: Record<ChangeAction, number>;
    changes: PlanDocumentChange[];
    unchanged: string[];
}

interface PlanDocumentChange {
    logicalId: string;
    action: ChangeAction;
    type: string;
    dependsOn?: string[];
    retain?: boolean;
    properties?: { [name: string]: unknown };
    changedProperties?: string[];
}

/**
 * Human-readable plan, one line per entry. NoEcho parameter values are masked.
 */
export function renderPlan(plan: PlanResult): string[] {
    const { changeSet } = plan;
    const secrets = noEchoValues(plan.desired);
    const counts = countChanges(changeSet);
    const lines = [
        `Stack ${changeSet.stackName}: ${counts.create} to create, ${counts.update} to update, ` +
            `${counts.replace} to replace, ${counts.delete} to delete, ${changeSet.unchanged.length} unchanged`,
    ];
    if (changeSet.changes.length === 0) {
        lines.push('No changes.');
        return lines;
    }

    for (const change of changeSet.changes) {
        lines.push(`  ${ACTION_SYMBOLS[change.action]} ${change.logicalId} (${change.type})${describeChange(change)}`);
        for (const property of change.action === 'delete' ? [] : change.propertyChanges) {
            lines.push(`      ${renderPropertyChange(change, property, secrets)}`);
        }
    }
    return lines;
}

/**
 * The plan as YAML, for `--out`. NoEcho parameter values are masked.
 */
export function serializePlan(plan: PlanResult): string {
    const { desired, changeSet } = plan;
    const secrets = noEchoValues(desired);
    const parameters: { [name: string]: ParameterValue } = {};
    for (const [name, value] of desired.parameters) {
        parameters[name] = desired.noEchoParameters.has(name) ? MASKED_VALUE : value;
    }

    const document: PlanDocument = {
        stack: changeSet.stackName,
        parameters,
        summary: countChanges(changeSet),
        changes: changeSet.changes.map((change) => {
            const entry: PlanDocumentChange = {
                logicalId: change.logicalId,
                action: change.action,
                type: change.type,
            };
            if (change.dependsOn.length > 0) {
                entry.dependsOn = change.dependsOn;
            }
            if (change.action === 'delete') {
                entry.retain = change.retain;
            } else {
                entry.properties = serializePlannedMap(maskPlannedMap(change.planned ?? {}, secrets));
                if (change.action !== 'create') {
                    entry.changedProperties = change.propertyChanges.map((property) => property.path);
                }
            }
            return entry;
        }),
        unchanged: changeSet.unchanged,
    };

    return stringify(document, { lineWidth: 0 });
}

export function serializePlannedValue(value: PlannedValue): unknown {
    if (value instanceof UnknownValue) {
        return value.toString();
    }
    if (Array.isArray(value)) {
        return value.map((item) => serializePlannedValue(item));
    }
    if (typeof value === 'object' && value !== null) {
        return serializePlannedMap(value);
    }
    return value;
}

function serializePlannedMap(value: { [key: string]: PlannedValue }): { [key: string]: unknown } {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, serializePlannedValue(item)]));
}

function describeChange(change: ResourceChange): string {
    if (change.action === 'delete' && change.retain) {
        return ' [retain: removed from state only]';
    }
    if (change.action === 'replace' && change.previous) {
        return ` [type changes from ${change.previous.type}]`;
    }
    return '';
}

// The old value of a property that now includes a secret is masked whole.
function renderPropertyChange(change: ResourceChange, property: PropertyChange, secrets: string[]): string {
    const secret = property.after !== undefined && containsSecret(property.after, secrets);
    const after = property.after === undefined ? '(removed)' : renderValue(maskPlannedValue(property.after, secrets));
    if (change.action === 'create' || property.before === undefined) {
        return `${property.path}: ${after}`;
    }
    const before = renderValue(secret ? MASKED_VALUE : maskPlannedValue(property.before, secrets));
    return `${property.path}: ${before} => ${after}`;
}

function maskPlannedMap(value: { [key: string]: PlannedValue }, secrets: string[]): { [key: string]: PlannedValue } {
    const masked: { [key: string]: PlannedValue } = {};
    for (const [key, item] of Object.entries(value)) {
        masked[key] = maskPlannedValue(item, secrets);
    }
    return masked;
}

function renderValue(value: PlannedValue): string {
    if (value instanceof UnknownValue) {
        return value.toString();
    }
    return JSON.stringify(serializePlannedValue(value));
}
