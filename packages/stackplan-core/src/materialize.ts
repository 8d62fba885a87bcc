import { StackplanError } from './errors';
import {
    ConcreteMap,
    ConcreteValue,
    DeferredIntrinsic,
    PlannedMap,
    PlannedValue,
    PropertyMap,
    PropertyValue,
    UnknownValue,
    isReferenceValue,
} from './ir';

/**
 * Returns the current value of a resource attribute, or undefined while it is unknown.
 */
export type AttributeLookup = (logicalId: string, attributeName: string) => ConcreteValue | undefined;

/**
 * Substitutes every resource reference in `value` using `lookup`. References that cannot be looked up yet become
 * `UnknownValue`s, and so does any concatenation or deferred function over them.
 */
export function materialize(value: PropertyValue, lookup: AttributeLookup): PlannedValue {
    if (value === null || typeof value !== 'object') {
        return value;
    }

    if (Array.isArray(value)) {
        return value.map((item) => materialize(item, lookup));
    }

    if (!isReferenceValue(value)) {
        const result: PlannedMap = {};
        for (const [key, item] of Object.entries(value)) {
            result[key] = materialize(item, lookup);
        }
        return result;
    }

    switch (value.kind) {
        case 'resourceAttribute': {
            const resolved = lookup(value.logicalId, value.attributeName);
            if (resolved === undefined) {
                return new UnknownValue([`${value.logicalId}.${value.attributeName}`]);
            }
            return resolved;
        }
        case 'concat': {
            const parts = value.values.map((item) => materialize(item, lookup));
            const unknown = collectUnknown(parts);
            if (unknown) {
                return unknown;
            }
            return parts.map((part) => concatPart(part)).join(value.delimiter);
        }
        case 'deferred': {
            const args = value.args.map((item) => materialize(item, lookup));
            const unknown = collectUnknown(args);
            if (unknown) {
                return unknown;
            }
            return evaluateDeferred(value, args);
        }
    }
}

/**
 * Like `materialize`, but every reference must be resolvable.
 *
 * @throws StackplanError naming the first attribute that is still unknown
 */
export function materializeKnown(value: PropertyMap, lookup: AttributeLookup): ConcreteMap {
    const planned = materialize(value, lookup);
    const unknown = findUnknown(planned);
    if (unknown) {
        throw new StackplanError(`Value of ${unknown.sources.join(', ')} is not available`);
    }
    if (!isConcreteMap(planned)) {
        throw new StackplanError('Expected a property map');
    }
    return planned;
}

export function isFullyKnown(value: PlannedValue): boolean {
    return findUnknown(value) === undefined;
}

/**
 * Narrows a planned value that contains no `UnknownValue`.
 */
export function isConcrete(value: PlannedValue): value is ConcreteValue {
    return isFullyKnown(value);
}

function isConcreteMap(value: PlannedValue): value is ConcreteMap {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof UnknownValue) && isConcrete(value);
}

function findUnknown(value: PlannedValue): UnknownValue | undefined {
    if (value instanceof UnknownValue) {
        return value;
    }
    if (Array.isArray(value)) {
        for (const item of value) {
            const unknown = findUnknown(item);
            if (unknown) {
                return unknown;
            }
        }
        return undefined;
    }
    if (typeof value === 'object' && value !== null) {
        for (const item of Object.values(value)) {
            const unknown = findUnknown(item);
            if (unknown) {
                return unknown;
            }
        }
    }
    return undefined;
}

/**
 * Merges the unknown sources of the direct arguments of a function, if any.
 */
function collectUnknown(values: PlannedValue[]): UnknownValue | undefined {
    const sources: string[] = [];
    for (const value of values) {
        const unknown = findUnknown(value);
        if (unknown) {
            sources.push(...unknown.sources.filter((s) => !sources.includes(s)));
        }
    }
    return sources.length > 0 ? new UnknownValue(sources) : undefined;
}

function concatPart(part: PlannedValue): string {
    if (typeof part === 'string') {
        return part;
    }
    if (typeof part === 'number' || typeof part === 'boolean') {
        return String(part);
    }
    throw new StackplanError(`Cannot join non-scalar value ${JSON.stringify(part)}`);
}

function evaluateDeferred(fn: DeferredIntrinsic, args: PlannedValue[]): PlannedValue {
    switch (fn.name) {
        case 'Fn::Split': {
            const [delimiter, source] = args;
            if (typeof delimiter !== 'string' || typeof source !== 'string') {
                throw new StackplanError('Fn::Split expects a delimiter and a string');
            }
            return source.split(delimiter);
        }
        case 'Fn::Select': {
            const [index, list] = args;
            const i = typeof index === 'string' ? Number(index) : index;
            if (typeof i !== 'number' || !Number.isInteger(i) || !Array.isArray(list)) {
                throw new StackplanError('Fn::Select expects an integer index and a list');
            }
            if (i < 0 || i >= list.length) {
                throw new StackplanError(`Fn::Select index ${i} is out of range`);
            }
            return list[i];
        }
        case 'Fn::Join': {
            const [delimiter, list] = args;
            if (typeof delimiter !== 'string' || !Array.isArray(list)) {
                throw new StackplanError('Fn::Join expects a delimiter and a list');
            }
            return list.map((item) => concatPart(item)).join(delimiter);
        }
        case 'Fn::Base64': {
            const [text] = args;
            if (typeof text !== 'string') {
                throw new StackplanError('Fn::Base64 expects a string');
            }
            return Buffer.from(text).toString('base64');
        }
    }
}
