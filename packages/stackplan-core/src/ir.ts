/**
 * Resolved property values.
 *
 * Resolution removes parameters, conditions and pure string functions from a template value. What is left are
 * plain values plus references to attributes that only exist once a resource has been created.
 */

export interface PropertyMap {
    [key: string]: PropertyValue;
}

export type PropertyValue = PrimitiveValue | PropertyMap | PropertyValue[] | ResourceAttributeReference | ConcatValue | DeferredIntrinsic;

export type PrimitiveValue = string | number | boolean | null;

/**
 * A reference to an attribute of another resource in the same stack. The attribute name `Ref` denotes the physical
 * identifier.
 */
export interface ResourceAttributeReference {
    kind: 'resourceAttribute';
    logicalId: string;
    attributeName: string;
}

/**
 * String concatenation over values that may not be known yet (`Fn::Join`, `Fn::Sub`).
 */
export interface ConcatValue {
    kind: 'concat';
    delimiter: string;
    values: PropertyValue[];
}

/**
 * An intrinsic function whose argument is not known until apply time. `Fn::Join` and `Fn::Select` are deferred when
 * their list is a list-valued resource attribute.
 */
export interface DeferredIntrinsic {
    kind: 'deferred';
    name: 'Fn::Split' | 'Fn::Select' | 'Fn::Join' | 'Fn::Base64';
    args: PropertyValue[];
}

export type ReferenceValue = ResourceAttributeReference | ConcatValue | DeferredIntrinsic;

/**
 * A value with every reference substituted, as sent to the control plane and stored in state.
 */
export type ConcreteValue = PrimitiveValue | ConcreteValue[] | ConcreteMap;

export interface ConcreteMap {
    [key: string]: ConcreteValue;
}

/**
 * Placeholder for a value that depends on a resource that does not exist yet.
 */
export class UnknownValue {
    constructor(readonly sources: string[]) {}

    toString(): string {
        return '(known after apply)';
    }
}

/**
 * A partially materialized value, as shown by a plan.
 */
export type PlannedValue = PrimitiveValue | PlannedValue[] | PlannedMap | UnknownValue;

export interface PlannedMap {
    [key: string]: PlannedValue;
}

const REFERENCE_KINDS = new Set(['resourceAttribute', 'concat', 'deferred']);

export function isReferenceValue(value: PropertyValue): value is ReferenceValue {
    return (
        typeof value === 'object' &&
        value !== null &&
        !Array.isArray(value) &&
        typeof value.kind === 'string' &&
        REFERENCE_KINDS.has(value.kind)
    );
}

export function isPropertyMap(value: PropertyValue): value is PropertyMap {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !isReferenceValue(value);
}

/**
 * Returns the logical names of every resource a resolved value refers to, in first-seen order.
 */
export function referencedResources(value: PropertyValue, into: string[] = []): string[] {
    if (Array.isArray(value)) {
        value.forEach((item) => referencedResources(item, into));
    } else if (isReferenceValue(value)) {
        switch (value.kind) {
            case 'resourceAttribute':
                if (!into.includes(value.logicalId)) {
                    into.push(value.logicalId);
                }
                break;
            case 'concat':
                value.values.forEach((item) => referencedResources(item, into));
                break;
            case 'deferred':
                value.args.forEach((item) => referencedResources(item, into));
                break;
        }
    } else if (isPropertyMap(value)) {
        Object.values(value).forEach((item) => referencedResources(item, into));
    }
    return into;
}
