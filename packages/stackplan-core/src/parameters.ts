import { createHash } from 'crypto';
import { ParameterError } from './errors';
import { ParameterDefinition } from './model';

export type ParameterValue = string | string[];

export const PSEUDO_PARAMETERS = new Set([
    'AWS::AccountId',
    'AWS::NotificationARNs',
    'AWS::NoValue',
    'AWS::Partition',
    'AWS::Region',
    'AWS::StackId',
    'AWS::StackName',
    'AWS::URLSuffix',
]);

const PLAIN_TYPES = new Set(['String', 'Number', 'List<Number>', 'CommaDelimitedList']);

export function isSupportedParameterType(type: string): boolean {
    if (PLAIN_TYPES.has(type)) {
        return true;
    }
    // Provider-typed parameters such as AWS::Route53::HostedZone::Id are validated as strings. SSM-backed types need
    // a lookup and are not supported.
    if (type.startsWith('AWS::SSM::')) {
        return false;
    }
    return /^AWS::[A-Za-z0-9:]+$/.test(type) || /^List<AWS::[A-Za-z0-9:]+>$/.test(type);
}

export function isListType(type: string): boolean {
    return type === 'CommaDelimitedList' || type.startsWith('List<');
}

/**
 * Resolves every declared parameter from user input, falling back to its default, and enforces its constraints.
 *
 * @param inputs - Raw `NAME=value` input, already split
 * @throws ParameterError for undeclared, missing or invalid values
 */
export function resolveParameters(
    definitions: Map<string, ParameterDefinition>,
    inputs: { [name: string]: string },
): Map<string, ParameterValue> {
    for (const name of Object.keys(inputs)) {
        if (!definitions.has(name)) {
            throw new ParameterError(name, 'is not declared by the template');
        }
    }

    const values = new Map<string, ParameterValue>();
    for (const [name, definition] of definitions) {
        const raw = inputs[name] ?? definition.default;
        if (raw === undefined) {
            throw new ParameterError(name, 'no value supplied and no default declared');
        }
        values.set(name, validateParameter(definition, raw));
    }
    return values;
}

function validateParameter(definition: ParameterDefinition, raw: string): ParameterValue {
    const fail = (message: string): never => {
        throw new ParameterError(definition.name, definition.constraintDescription ?? message);
    };

    if (definition.allowedValues && !definition.allowedValues.includes(raw)) {
        fail(`value '${raw}' is not one of ${definition.allowedValues.join(', ')}`);
    }

    if (isListType(definition.type)) {
        const items = raw === '' ? [] : raw.split(',').map((item) => item.trim());
        if (definition.type === 'List<Number>') {
            items.forEach((item) => checkNumber(definition, item, fail));
        }
        return items;
    }

    if (definition.type === 'Number') {
        checkNumber(definition, raw, fail);
        return raw;
    }

    if (definition.minLength !== undefined && raw.length < definition.minLength) {
        fail(`value must be at least ${definition.minLength} characters long`);
    }
    if (definition.maxLength !== undefined && raw.length > definition.maxLength) {
        fail(`value must be at most ${definition.maxLength} characters long`);
    }
    if (definition.allowedPattern !== undefined) {
        let pattern: RegExp;
        try {
            pattern = new RegExp(`^(?:${definition.allowedPattern})$`);
        } catch (e) {
            throw new ParameterError(definition.name, `invalid AllowedPattern: ${e}`);
        }
        if (!pattern.test(raw)) {
            fail(`value '${raw}' does not match pattern ${definition.allowedPattern}`);
        }
    }
    return raw;
}

function checkNumber(definition: ParameterDefinition, raw: string, fail: (message: string) => never): void {
    const n = Number(raw);
    if (raw.trim() === '' || Number.isNaN(n)) {
        fail(`value '${raw}' is not a number`);
    }
    if (definition.minValue !== undefined && n < definition.minValue) {
        fail(`value ${raw} is below the minimum ${definition.minValue}`);
    }
    if (definition.maxValue !== undefined && n > definition.maxValue) {
        fail(`value ${raw} is above the maximum ${definition.maxValue}`);
    }
}

/**
 * Parses `KEY=VALUE` pairs as given on the command line. Only the first `=` separates key and value.
 */
export function parseParameterAssignments(assignments: string[]): { [name: string]: string } {
    const result: { [name: string]: string } = {};
    for (const assignment of assignments) {
        const eq = assignment.indexOf('=');
        if (eq <= 0) {
            throw new ParameterError(assignment, "expected the form 'Name=Value'");
        }
        result[assignment.slice(0, eq)] = assignment.slice(eq + 1);
    }
    return result;
}

export interface PseudoParameterOptions {
    stackName: string;
    region: string;
    accountId: string;
}

export interface PseudoParameterValues extends PseudoParameterOptions {
    stackId: string;
    partition: string;
    urlSuffix: string;
}

export function pseudoParameterValues(options: PseudoParameterOptions): PseudoParameterValues {
    const { stackName, region, accountId } = options;
    const partition = region.startsWith('cn-') ? 'aws-cn' : region.startsWith('us-gov-') ? 'aws-us-gov' : 'aws';
    const urlSuffix = partition === 'aws-cn' ? 'amazonaws.com.cn' : 'amazonaws.com';

    // Derived from the stack coordinates so that it stays stable across plans.
    const digest = createHash('sha256').update(`${accountId}/${region}/${stackName}`).digest('hex');
    const uuid = [
        digest.slice(0, 8),
        digest.slice(8, 12),
        digest.slice(12, 16),
        digest.slice(16, 20),
        digest.slice(20, 32),
    ].join('-');

    return {
        stackName,
        region,
        accountId,
        partition,
        urlSuffix,
        stackId: `arn:${partition}:cloudformation:${region}:${accountId}:stack/${stackName}/${uuid}`,
    };
}

export function pseudoParameterValue(name: string, values: PseudoParameterValues): ParameterValue | undefined {
    switch (name) {
        case 'AWS::AccountId':
            return values.accountId;
        case 'AWS::NotificationARNs':
            return [];
        case 'AWS::Partition':
            return values.partition;
        case 'AWS::Region':
            return values.region;
        case 'AWS::StackId':
            return values.stackId;
        case 'AWS::StackName':
            return values.stackName;
        case 'AWS::URLSuffix':
            return values.urlSuffix;
        default:
            return undefined;
    }
}
