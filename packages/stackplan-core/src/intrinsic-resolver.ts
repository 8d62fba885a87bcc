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
import { ParseError, ReferenceError } from './errors';
import {
    ConcatValue,
    DeferredIntrinsic,
    PropertyMap,
    PropertyValue,
    ResourceAttributeReference,
    isReferenceValue,
    referencedResources,
} from './ir';
import { TemplateModel } from './model';
import { NO_VALUE, TemplateObject, TemplateValue, intrinsicName, isNoValue, isTemplateObject } from './template';
import { ParameterValue, PseudoParameterValues, pseudoParameterValue } from './parameters';
import { parseSub } from './sub';

export interface IntrinsicResolverProps {
    model: TemplateModel;
    parameters: Map<string, ParameterValue>;
    pseudo: PseudoParameterValues;

    /**
     * Returns the value of a named condition.
     */
    conditionValue: (name: string) => boolean;

    /**
     * Whether a resource is part of the desired stack. References to excluded resources are errors.
     */
    isIncluded?: (logicalId: string) => boolean;
}

/**
 * Evaluates intrinsic functions in template values.
 *
 * Parameters, pseudo parameters, mappings and conditions are substituted right away. References to resources become
 * `ResourceAttributeReference`s, and functions over them are kept as `ConcatValue` or `DeferredIntrinsic`.
 */
export class IntrinsicResolver {
    private readonly model: TemplateModel;
    private readonly parameters: Map<string, ParameterValue>;
    private readonly pseudo: PseudoParameterValues;
    private readonly conditionValue: (name: string) => boolean;
    private readonly isIncluded: (logicalId: string) => boolean;

    constructor(props: IntrinsicResolverProps) {
        this.model = props.model;
        this.parameters = props.parameters;
        this.pseudo = props.pseudo;
        this.conditionValue = props.conditionValue;
        this.isIncluded = props.isIncluded ?? (() => true);
    }

    resolvePropertyMap(props: TemplateObject, location: string): PropertyMap {
        const result: PropertyMap = {};
        for (const [key, value] of Object.entries(props)) {
            const resolved = this.resolveValue(value, `${location}.${key}`);
            if (resolved !== undefined) {
                result[key] = resolved;
            }
        }
        return result;
    }

    /**
     * Resolves a template value. Returns undefined for `AWS::NoValue`.
     */
    resolveValue(value: TemplateValue, location: string): PropertyValue | undefined {
        if (value === null || typeof value !== 'object') {
            return value;
        }

        if (Array.isArray(value)) {
            return value
                .filter((item) => !isNoValue(item))
                .map((item, i) => this.resolveValue(item, `${location}[${i}]`))
                .filter((item): item is PropertyValue => item !== undefined);
        }

        const fn = intrinsicName(value);
        if (fn === undefined) {
            return this.resolvePropertyMap(value, location);
        }

        const params = value[fn];
        const at = `${location}.${fn}`;
        switch (fn) {
            case 'Ref':
                return this.resolveRef(params, at);
            case 'Fn::GetAtt':
                return this.resolveGetAtt(params, at);
            case 'Fn::Join':
                return this.resolveJoin(params, at);
            case 'Fn::Split':
                return this.resolveSplit(params, at);
            case 'Fn::Select':
                return this.resolveSelect(params, at);
            case 'Fn::Sub':
                return this.resolveSub(params, at);
            case 'Fn::If':
                return this.resolveIf(params, at);
            case 'Fn::FindInMap':
                return this.resolveFindInMap(params, at);
            case 'Fn::Base64':
                return this.resolveBase64(params, at);
            case 'Fn::Equals':
            case 'Fn::And':
            case 'Fn::Or':
            case 'Fn::Not':
                return this.evaluateCondition(value, at);
            case 'Fn::GetAZs':
            case 'Fn::ImportValue':
            case 'Fn::Cidr':
            case 'Fn::GetStackOutput':
                throw new ParseError(`${fn} is not supported`, location);
            default:
                throw new ParseError(`Unknown intrinsic function ${fn}`, location);
        }
    }

    /**
     * Evaluates a condition expression (`Fn::Equals`, `Fn::And`, `Fn::Or`, `Fn::Not`, `{ Condition: name }`).
     */
    evaluateCondition(expr: TemplateValue, location: string): boolean {
        if (typeof expr === 'boolean') {
            return expr;
        }
        if (expr === 'true' || expr === 'false') {
            return expr === 'true';
        }

        if (isTemplateObject(expr)) {
            const keys = Object.keys(expr);
            if (keys.length === 1 && keys[0] === 'Condition' && typeof expr.Condition === 'string') {
                return this.conditionValue(expr.Condition);
            }

            const fn = intrinsicName(expr);
            const params = fn === undefined ? undefined : expr[fn];
            switch (fn) {
                case 'Fn::Equals':
                    return this.evaluateEquals(params, `${location}.Fn::Equals`);
                case 'Fn::And':
                    return this.conditionList(params, 'Fn::And', location).every((e, i) =>
                        this.evaluateCondition(e, `${location}.Fn::And[${i}]`),
                    );
                case 'Fn::Or':
                    return this.conditionList(params, 'Fn::Or', location).some((e, i) =>
                        this.evaluateCondition(e, `${location}.Fn::Or[${i}]`),
                    );
                case 'Fn::Not': {
                    if (!Array.isArray(params) || params.length !== 1) {
                        throw new ParseError('Fn::Not requires exactly 1 argument', location);
                    }
                    return !this.evaluateCondition(params[0], `${location}.Fn::Not[0]`);
                }
                case 'Fn::If': {
                    const resolved = this.resolveValue(expr, location);
                    if (typeof resolved === 'boolean') {
                        return resolved;
                    }
                    break;
                }
            }
        }

        throw new ParseError('Expected a condition expression', location);
    }

    private conditionList(params: TemplateValue | undefined, fn: string, location: string): TemplateValue[] {
        if (!Array.isArray(params) || params.length < 2 || params.length > 10) {
            throw new ParseError(`${fn} requires between 2 and 10 arguments`, location);
        }
        return params;
    }

    private evaluateEquals(params: TemplateValue | undefined, location: string): boolean {
        if (!Array.isArray(params) || params.length !== 2) {
            throw new ParseError('Fn::Equals requires exactly 2 arguments', location);
        }
        const left = this.resolveValue(params[0], `${location}[0]`);
        const right = this.resolveValue(params[1], `${location}[1]`);
        if (containsReference(left) || containsReference(right)) {
            throw new ParseError('Fn::Equals cannot compare resource attributes', location);
        }
        return equal(normalizeScalars(left), normalizeScalars(right));
    }

    private resolveRef(params: TemplateValue, location: string): PropertyValue | undefined {
        if (typeof params !== 'string') {
            throw new ParseError('Ref expects a logical name', location);
        }
        if (params === NO_VALUE) {
            return undefined;
        }

        const parameter = this.parameters.get(params);
        if (parameter !== undefined) {
            return parameter;
        }

        const pseudo = pseudoParameterValue(params, this.pseudo);
        if (pseudo !== undefined) {
            return pseudo;
        }

        return this.attributeReference(params, 'Ref', location);
    }

    private resolveGetAtt(params: TemplateValue, location: string): PropertyValue {
        let logicalId: TemplateValue;
        let attribute: TemplateValue | undefined;
        if (typeof params === 'string') {
            const dot = params.indexOf('.');
            [logicalId, attribute] = dot === -1 ? [params, undefined] : [params.slice(0, dot), params.slice(dot + 1)];
        } else if (Array.isArray(params) && params.length === 2) {
            logicalId = params[0];
            const resolvedAttribute = this.resolveValue(params[1], `${location}[1]`);
            attribute = typeof resolvedAttribute === 'string' ? resolvedAttribute : undefined;
        } else {
            throw new ParseError('Fn::GetAtt expects [LogicalName, Attribute]', location);
        }

        if (typeof logicalId !== 'string' || typeof attribute !== 'string' || attribute.length === 0) {
            throw new ParseError('Fn::GetAtt expects [LogicalName, Attribute]', location);
        }
        return this.attributeReference(logicalId, attribute, location);
    }

    private attributeReference(logicalId: string, attributeName: string, location: string): ResourceAttributeReference {
        if (!this.model.resources.has(logicalId)) {
            throw new ReferenceError(location, logicalId);
        }
        if (!this.isIncluded(logicalId)) {
            throw new ReferenceError(location, logicalId, 'resource is excluded by its condition');
        }
        return {
            kind: 'resourceAttribute',
            logicalId,
            attributeName,
        };
    }

    private resolveJoin(params: TemplateValue, location: string): PropertyValue {
        if (!Array.isArray(params) || params.length !== 2 || typeof params[0] !== 'string') {
            throw new ParseError('Fn::Join expects [delimiter, list]', location);
        }
        const delimiter = params[0];
        const items = this.resolveList(params[1], `${location}[1]`);
        if (!Array.isArray(items)) {
            return deferred('Fn::Join', [delimiter, items]);
        }
        return concat(delimiter, items);
    }

    private resolveSplit(params: TemplateValue, location: string): PropertyValue {
        if (!Array.isArray(params) || params.length !== 2 || typeof params[0] !== 'string') {
            throw new ParseError('Fn::Split expects [delimiter, string]', location);
        }
        const delimiter = params[0];
        const source = this.resolveValue(params[1], `${location}[1]`);
        if (typeof source === 'string') {
            return source.split(delimiter);
        }
        if (source !== undefined && isReferenceValue(source)) {
            return deferred('Fn::Split', [delimiter, source]);
        }
        throw new ParseError('Fn::Split expects a string', location);
    }

    private resolveSelect(params: TemplateValue, location: string): PropertyValue {
        if (!Array.isArray(params) || params.length !== 2) {
            throw new ParseError('Fn::Select expects [index, list]', location);
        }
        const index = this.resolveValue(params[0], `${location}[0]`);
        const i = typeof index === 'string' ? Number(index) : index;
        if (typeof i !== 'number' || !Number.isInteger(i)) {
            throw new ParseError('Fn::Select index must be an integer', location);
        }
        const list = this.resolveList(params[1], `${location}[1]`);
        if (Array.isArray(list)) {
            if (i < 0 || i >= list.length) {
                throw new ParseError(`Fn::Select index ${i} is out of range`, location);
            }
            return list[i];
        }
        return deferred('Fn::Select', [i, list]);
    }

    /**
     * Resolves the list argument of `Fn::Join` or `Fn::Select`. A resource attribute or a deferred function stands
     * for a list that is only known after apply.
     */
    private resolveList(
        value: TemplateValue,
        location: string,
    ): PropertyValue[] | ResourceAttributeReference | DeferredIntrinsic {
        const resolved = this.resolveValue(value, location);
        if (Array.isArray(resolved)) {
            return resolved;
        }
        if (resolved !== undefined && isReferenceValue(resolved) && resolved.kind !== 'concat') {
            return resolved;
        }
        throw new ParseError('Expected a list', location);
    }

    private resolveSub(params: TemplateValue, location: string): PropertyValue {
        let template: string;
        const locals = new Map<string, PropertyValue>();
        if (typeof params === 'string') {
            template = params;
        } else if (Array.isArray(params) && params.length === 2 && typeof params[0] === 'string' && isTemplateObject(params[1])) {
            template = params[0];
            for (const [name, raw] of Object.entries(params[1])) {
                const resolved = this.resolveValue(raw, `${location}[1].${name}`);
                if (resolved !== undefined) {
                    locals.set(name, resolved);
                }
            }
        } else {
            throw new ParseError('Fn::Sub expects a string or [string, variables]', location);
        }

        const values: PropertyValue[] = [];
        for (const part of parseSub(template)) {
            if (part.str.length > 0) {
                values.push(part.str);
            }
            if (part.ref === undefined) {
                continue;
            }
            const { id, attr } = part.ref;
            const local = attr === undefined ? locals.get(id) : undefined;
            if (local !== undefined) {
                values.push(local);
            } else if (attr !== undefined) {
                values.push(this.attributeReference(id, attr, location));
            } else {
                const resolved = this.resolveRef(id, location);
                if (Array.isArray(resolved)) {
                    throw new ParseError(`Fn::Sub cannot substitute list value '${id}'`, location);
                }
                values.push(resolved ?? '');
            }
        }
        return concat('', values);
    }

    private resolveIf(params: TemplateValue, location: string): PropertyValue | undefined {
        if (!Array.isArray(params) || params.length !== 3 || typeof params[0] !== 'string') {
            throw new ParseError('Fn::If expects [condition, valueIfTrue, valueIfFalse]', location);
        }
        const branch = this.conditionValue(params[0]) ? 1 : 2;
        return this.resolveValue(params[branch], `${location}[${branch}]`);
    }

    private resolveFindInMap(params: TemplateValue, location: string): PropertyValue {
        if (!Array.isArray(params) || params.length !== 3) {
            throw new ParseError('Fn::FindInMap expects [MapName, TopLevelKey, SecondLevelKey]', location);
        }
        const [mapName, topKey, secondKey] = params.map((p, i) => {
            const resolved = this.resolveValue(p, `${location}[${i}]`);
            if (typeof resolved !== 'string' && typeof resolved !== 'number') {
                throw new ParseError('Fn::FindInMap keys must resolve to strings', location);
            }
            return String(resolved);
        });

        const mapping = this.model.mappings[mapName];
        if (mapping === undefined) {
            throw new ReferenceError(location, mapName, 'no such mapping');
        }
        const value = mapping[topKey]?.[secondKey];
        if (value === undefined) {
            throw new ParseError(`Mapping ${mapName} has no entry [${topKey}][${secondKey}]`, location);
        }
        const resolved = this.resolveValue(value, location);
        if (resolved === undefined) {
            throw new ParseError(`Mapping ${mapName} entry [${topKey}][${secondKey}] is empty`, location);
        }
        return resolved;
    }

    private resolveBase64(params: TemplateValue, location: string): PropertyValue {
        const source = this.resolveValue(params, location);
        if (typeof source === 'string') {
            return Buffer.from(source).toString('base64');
        }
        if (source !== undefined && isReferenceValue(source)) {
            return deferred('Fn::Base64', [source]);
        }
        throw new ParseError('Fn::Base64 expects a string', location);
    }
}

/**
 * Joins values into a string when they are all known, otherwise keeps a `ConcatValue`.
 */
function concat(delimiter: string, items: PropertyValue[]): PropertyValue {
    if (items.every((item): item is string | number | boolean => isScalar(item))) {
        return items.map((item) => String(item)).join(delimiter);
    }
    const value: ConcatValue = {
        kind: 'concat',
        delimiter,
        values: items,
    };
    return value;
}

function deferred(name: DeferredIntrinsic['name'], args: PropertyValue[]): DeferredIntrinsic {
    return { kind: 'deferred', name, args };
}

function isScalar(value: PropertyValue): value is string | number | boolean {
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function containsReference(value: PropertyValue | undefined): boolean {
    return value !== undefined && referencedResources(value).length > 0;
}

/**
 * Condition comparisons treat numbers and booleans like their string forms.
 */
function normalizeScalars(value: PropertyValue | undefined): PropertyValue | undefined {
    if (typeof value === 'number' || typeof value === 'boolean') {
        return String(value);
    }
    if (Array.isArray(value)) {
        return value.map((item) => normalizeScalars(item) ?? null);
    }
    return value;
}
