import * as fs from 'fs-extra';
import { parse } from 'yaml';
import { LogLevel, StackplanError, errorMessage, isLogLevel, isTemplateObject } from '@stackplan/core';
import { DEFAULT_CONCURRENCY, FAILURE_POLICIES, FailurePolicy } from './executor/executor';
import { DEFAULT_RETRY_OPTIONS } from './executor/retry';
import { parameterValues } from './template-loader';

export interface StackplanConfig {
    stack: string;
    stateDir: string;

    /**
     * Where the local control plane keeps its resources.
     */
    cloudDir: string;
    region: string;
    accountId: string;
    concurrency: number;
    failurePolicy: FailurePolicy;
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    parameters: { [name: string]: string };
    adapterModules: string[];
    logLevel: LogLevel;
}

export type ConfigOverrides = Partial<StackplanConfig>;

export const DEFAULT_CONFIG: StackplanConfig = {
    stack: 'default',
    stateDir: '.stackplan/state',
    cloudDir: '.stackplan/cloud',
    region: 'us-east-1',
    accountId: '123456789012',
    concurrency: DEFAULT_CONCURRENCY,
    failurePolicy: 'continue',
    maxAttempts: DEFAULT_RETRY_OPTIONS.maxAttempts,
    baseDelayMs: DEFAULT_RETRY_OPTIONS.baseDelayMs,
    maxDelayMs: DEFAULT_RETRY_OPTIONS.maxDelayMs,
    parameters: {},
    adapterModules: [],
    logLevel: 'info',
};

const STACK_NAME_PATTERN = /^[A-Za-z][-A-Za-z0-9]*$/;

/**
 * Merges configuration layers, lowest precedence first. Parameters and adapter modules accumulate; every other
 * setting is taken from the last layer that sets it.
 */
export function resolveConfig(...layers: ConfigOverrides[]): StackplanConfig {
    const config: StackplanConfig = { ...DEFAULT_CONFIG, parameters: {}, adapterModules: [] };
    for (const layer of layers) {
        const { parameters, adapterModules, ...rest } = layer;
        for (const [name, value] of Object.entries(rest)) {
            if (value !== undefined) {
                Object.assign(config, { [name]: value });
            }
        }
        Object.assign(config.parameters, parameters);
        config.adapterModules.push(...(adapterModules ?? []));
    }
    validateConfig(config);
    return config;
}

/**
 * Settings taken from `STACKPLAN_*` environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    if (env.STACKPLAN_STACK) {
        overrides.stack = env.STACKPLAN_STACK;
    }
    if (env.STACKPLAN_STATE_DIR) {
        overrides.stateDir = env.STACKPLAN_STATE_DIR;
    }
    if (env.STACKPLAN_CLOUD_DIR) {
        overrides.cloudDir = env.STACKPLAN_CLOUD_DIR;
    }
    if (env.STACKPLAN_REGION) {
        overrides.region = env.STACKPLAN_REGION;
    }
    if (env.STACKPLAN_ACCOUNT_ID) {
        overrides.accountId = env.STACKPLAN_ACCOUNT_ID;
    }
    if (env.STACKPLAN_LOG_LEVEL) {
        const level = env.STACKPLAN_LOG_LEVEL.toLowerCase();
        if (!isLogLevel(level)) {
            throw new StackplanError(`STACKPLAN_LOG_LEVEL must be one of debug, info, warn, error (got '${level}')`);
        }
        overrides.logLevel = level;
    }
    return overrides;
}

/**
 * Reads a JSON or YAML configuration file.
 */
export async function loadConfigFile(configPath: string): Promise<ConfigOverrides> {
    let document: unknown;
    try {
        document = parse(await fs.readFile(configPath, 'utf8'));
    } catch (e) {
        throw new StackplanError(`Unable to read configuration file ${configPath}: ${errorMessage(e)}`, { cause: e });
    }
    return configFromDocument(document, configPath);
}

export function configFromDocument(document: unknown, source: string): ConfigOverrides {
    if (document === null || document === undefined) {
        return {};
    }
    if (!isTemplateObject(document)) {
        throw new StackplanError(`${source}: configuration must be a mapping`);
    }

    const overrides: ConfigOverrides = {};
    for (const [key, value] of Object.entries(document)) {
        switch (key) {
            case 'stack':
            case 'stateDir':
            case 'cloudDir':
            case 'region':
            case 'accountId':
                overrides[key] = expectString(value, key, source);
                break;
            case 'concurrency':
            case 'maxAttempts':
            case 'baseDelayMs':
            case 'maxDelayMs':
                overrides[key] = expectNumber(value, key, source);
                break;
            case 'failurePolicy':
                overrides.failurePolicy = parseFailurePolicy(expectString(value, key, source));
                break;
            case 'logLevel': {
                const level = expectString(value, key, source);
                if (!isLogLevel(level)) {
                    throw new StackplanError(`${source}: logLevel must be one of debug, info, warn, error`);
                }
                overrides.logLevel = level;
                break;
            }
            case 'parameters':
                overrides.parameters = parameterValues(value, source);
                break;
            case 'adapterModules':
                if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
                    throw new StackplanError(`${source}: adapterModules must be a list of paths`);
                }
                overrides.adapterModules = value;
                break;
            default:
                throw new StackplanError(`${source}: unknown setting '${key}'`);
        }
    }
    return overrides;
}

export function parseFailurePolicy(value: string): FailurePolicy {
    const policy = FAILURE_POLICIES.find((p) => p === value);
    if (policy === undefined) {
        throw new StackplanError(`failure policy must be one of ${FAILURE_POLICIES.join(', ')} (got '${value}')`);
    }
    return policy;
}

function validateConfig(config: StackplanConfig): void {
    if (!STACK_NAME_PATTERN.test(config.stack)) {
        throw new StackplanError(`Invalid stack name '${config.stack}': use letters, digits and hyphens`);
    }
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
        throw new StackplanError(`concurrency must be a positive integer (got ${config.concurrency})`);
    }
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
        throw new StackplanError(`maxAttempts must be a positive integer (got ${config.maxAttempts})`);
    }
    if (config.baseDelayMs < 0 || config.maxDelayMs < config.baseDelayMs) {
        throw new StackplanError('retry delays must satisfy 0 <= baseDelayMs <= maxDelayMs');
    }
}

function expectString(value: unknown, key: string, source: string): string {
    if (typeof value !== 'string' || value.length === 0) {
        throw new StackplanError(`${source}: ${key} must be a non-empty string`);
    }
    return value;
}

function expectNumber(value: unknown, key: string, source: string): number {
    if (typeof value !== 'number' || Number.isNaN(value)) {
        throw new StackplanError(`${source}: ${key} must be a number`);
    }
    return value;
}
