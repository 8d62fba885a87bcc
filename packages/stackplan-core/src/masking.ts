import { DesiredStack } from './desired';
import { PlannedMap, PlannedValue, UnknownValue } from './ir';

export const MASKED_VALUE = '****';

/**
 * Values of the stack's NoEcho parameters, longest first so that a value containing another is masked whole.
 */
export function noEchoValues(desired: DesiredStack): string[] {
    const values = new Set<string>();
    for (const name of desired.noEchoParameters) {
        const value = desired.parameters.get(name);
        for (const item of Array.isArray(value) ? value : [value]) {
            if (item) {
                values.add(item);
            }
        }
    }
    return [...values].sort((a, b) => b.length - a.length);
}

/**
 * Replaces every occurrence of a secret in the strings of `value` with `MASKED_VALUE`.
 */
export function maskPlannedValue(value: PlannedValue, secrets: string[]): PlannedValue {
    if (typeof value === 'string') {
        return maskText(value, secrets);
    }
    if (value instanceof UnknownValue) {
        return value;
    }
    if (Array.isArray(value)) {
        return value.map((item) => maskPlannedValue(item, secrets));
    }
    if (typeof value === 'object' && value !== null) {
        const masked: PlannedMap = {};
        for (const [key, item] of Object.entries(value)) {
            masked[key] = maskPlannedValue(item, secrets);
        }
        return masked;
    }
    return value;
}

export function containsSecret(value: PlannedValue, secrets: string[]): boolean {
    if (typeof value === 'string') {
        const text = value;
        return secrets.some((secret) => text.includes(secret));
    }
    if (value instanceof UnknownValue) {
        return false;
    }
    if (Array.isArray(value)) {
        return value.some((item) => containsSecret(item, secrets));
    }
    if (typeof value === 'object' && value !== null) {
        return Object.values(value).some((item) => containsSecret(item, secrets));
    }
    return false;
}

function maskText(text: string, secrets: string[]): string {
    return secrets.reduce((masked, secret) => masked.split(secret).join(MASKED_VALUE), text);
}
