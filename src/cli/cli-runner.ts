#!/usr/bin/env node
import * as fs from 'fs-extra';
import * as path from 'path';
import {
    Logger,
    errorMessage,
    getLogger,
    parseParameterAssignments,
    setLogger,
    withLevel,
} from '@stackplan/core';
import {
    ConfigOverrides,
    StackplanConfig,
    configFromEnv,
    loadConfigFile,
    parseFailurePolicy,
    resolveConfig,
} from '../config';
import { StackOrchestrator } from '../orchestrator';
import { loadAdapterModules } from '../providers/load-adapters';
import { LocalControlPlane } from '../providers/local-control-plane';
import { FileStateStore } from '../state/file-state-store';
import { loadParameterFile, loadTemplateFile } from '../template-loader';
import { renderOutputs, renderReport } from './apply-report';
import { renderPlan, serializePlan } from './plan-renderer';

export const COMMANDS = ['plan', 'apply', 'destroy', 'outputs', 'unlock'] as const;

export type Command = (typeof COMMANDS)[number];

/**
 * Exit code of `plan` when changes are pending.
 */
export const EXIT_CHANGES_PENDING = 2;

export interface CliOptions {
    command: Command;
    template?: string;

    /**
     * `NAME=value` assignments from `--param`, in order.
     */
    parameters: string[];
    parameterFiles: string[];
    outFile?: string;
    configFile?: string;
    verbose: boolean;

    /**
     * Settings given as flags. They take precedence over the configuration file and the environment.
     */
    overrides: ConfigOverrides;
}

export type CliLogger = Pick<Console, 'log' | 'error'>;

class CliError extends Error {}

export function parseArguments(argv: string[]): CliOptions {
    const [command, ...rest] = argv;
    if (command === undefined || command === '--help' || command === '-h') {
        throw new CliError(usage());
    }
    const known = COMMANDS.find((c) => c === command);
    if (known === undefined) {
        throw new CliError(`Unknown command: ${command}\n${usage()}`);
    }

    const options: CliOptions = {
        command: known,
        parameters: [],
        parameterFiles: [],
        verbose: false,
        overrides: {},
    };
    const adapterModules: string[] = [];

    for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        switch (arg) {
            case '--template':
                options.template = requireValue(arg, rest[++i]);
                break;
            case '--param':
                options.parameters.push(requireValue(arg, rest[++i]));
                break;
            case '--param-file':
                options.parameterFiles.push(requireValue(arg, rest[++i]));
                break;
            case '--out':
                options.outFile = requireValue(arg, rest[++i]);
                break;
            case '--config':
                options.configFile = requireValue(arg, rest[++i]);
                break;
            case '--stack':
                options.overrides.stack = requireValue(arg, rest[++i]);
                break;
            case '--state-dir':
                options.overrides.stateDir = requireValue(arg, rest[++i]);
                break;
            case '--cloud-dir':
                options.overrides.cloudDir = requireValue(arg, rest[++i]);
                break;
            case '--region':
                options.overrides.region = requireValue(arg, rest[++i]);
                break;
            case '--account-id':
                options.overrides.accountId = requireValue(arg, rest[++i]);
                break;
            case '--concurrency':
                options.overrides.concurrency = requireInteger(arg, rest[++i]);
                break;
            case '--max-attempts':
                options.overrides.maxAttempts = requireInteger(arg, rest[++i]);
                break;
            case '--failure-policy':
                options.overrides.failurePolicy = parseFailurePolicy(requireValue(arg, rest[++i]));
                break;
            case '--adapter-module':
                adapterModules.push(requireValue(arg, rest[++i]));
                break;
            case '--verbose':
            case '-v':
                options.verbose = true;
                break;
            case '--help':
            case '-h':
                throw new CliError(usage());
            default:
                throw new CliError(`Unknown argument: ${arg}\n${usage()}`);
        }
    }

    if (adapterModules.length > 0) {
        options.overrides.adapterModules = adapterModules;
    }
    if ((options.command === 'plan' || options.command === 'apply') && !options.template) {
        throw new CliError(`Missing required option --template\n${usage()}`);
    }
    if (options.outFile && options.command !== 'plan') {
        throw new CliError('--out is only supported by plan');
    }

    return options;
}

/**
 * Merges flags, the configuration file, the environment and the defaults.
 */
export async function resolveCliConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): Promise<StackplanConfig> {
    const fileConfig = options.configFile ? await loadConfigFile(options.configFile) : {};

    const parameters: { [name: string]: string } = {};
    for (const parameterFile of options.parameterFiles) {
        Object.assign(parameters, await loadParameterFile(parameterFile));
    }
    Object.assign(parameters, parseParameterAssignments(options.parameters));

    const config = resolveConfig(configFromEnv(env), fileConfig, { ...options.overrides, parameters });
    if (options.verbose) {
        config.logLevel = 'debug';
    }
    return config;
}

export async function runCliWithOptions(
    options: CliOptions,
    config: StackplanConfig,
    logger: CliLogger,
    signal?: AbortSignal,
): Promise<number> {
    const store = new FileStateStore(path.resolve(config.stateDir));

    if (options.command === 'unlock') {
        const removed = await store.forceUnlock(config.stack);
        logger.log(removed ? `Removed lock of stack ${config.stack}` : `Stack ${config.stack} is not locked`);
        return 0;
    }

    const registry = await loadAdapterModules(
        LocalControlPlane.fromDirectory(path.resolve(config.cloudDir)).registry(),
        config.adapterModules,
    );
    const orchestrator = new StackOrchestrator({
        store,
        registry,
        region: config.region,
        accountId: config.accountId,
        concurrency: config.concurrency,
        failurePolicy: config.failurePolicy,
        retry: {
            maxAttempts: config.maxAttempts,
            baseDelayMs: config.baseDelayMs,
            maxDelayMs: config.maxDelayMs,
        },
    });

    switch (options.command) {
        case 'plan': {
            const model = await loadTemplateFile(requireTemplate(options));
            const plan = await orchestrator.plan({ stackName: config.stack, model, parameters: config.parameters });
            renderPlan(plan).forEach((line) => logger.log(line));
            if (options.outFile) {
                const outFile = path.resolve(options.outFile);
                await fs.ensureDir(path.dirname(outFile));
                await fs.writeFile(outFile, serializePlan(plan));
                logger.log(`Wrote plan to ${outFile}`);
            }
            return plan.changeSet.changes.length > 0 ? EXIT_CHANGES_PENDING : 0;
        }
        case 'apply': {
            const model = await loadTemplateFile(requireTemplate(options));
            const result = await orchestrator.apply(
                { stackName: config.stack, model, parameters: config.parameters },
                signal,
            );
            renderReport(result.report).forEach((line) => logger.log(line));
            if (result.outputs) {
                renderOutputs(result.outputs).forEach((line) => logger.log(line));
            }
            return result.report.status === 'succeeded' ? 0 : 1;
        }
        case 'destroy': {
            const report = await orchestrator.destroy(config.stack, signal);
            if (report === undefined) {
                logger.log(`Stack ${config.stack} has no state, nothing to destroy`);
                return 0;
            }
            renderReport(report).forEach((line) => logger.log(line));
            return report.status === 'succeeded' ? 0 : 1;
        }
        case 'outputs': {
            const outputs = await orchestrator.outputs(config.stack);
            if (outputs === undefined) {
                logger.error(`Stack ${config.stack} has no state`);
                return 1;
            }
            renderOutputs(outputs).forEach((line) => logger.log(line));
            return 0;
        }
    }
}

export async function runCli(
    argv: string[],
    logger: CliLogger = console,
    env: NodeJS.ProcessEnv = process.env,
    signal?: AbortSignal,
): Promise<number> {
    const previousLogger = getLogger();
    try {
        const options = parseArguments(argv);
        const config = await resolveCliConfig(options, env);
        setLogger(withLevel(diagnostics(logger), config.logLevel));
        return await runCliWithOptions(options, config, logger, signal);
    } catch (err) {
        logger.error(errorMessage(err));
        return 1;
    } finally {
        setLogger(previousLogger);
    }
}

export async function main(argv = process.argv.slice(2)) {
    const controller = new AbortController();
    const onInterrupt = () => {
        console.error('Interrupted, waiting for running changes to finish');
        controller.abort();
    };
    process.once('SIGINT', onInterrupt);
    try {
        process.exitCode = await runCli(argv, console, process.env, controller.signal);
    } finally {
        process.removeListener('SIGINT', onInterrupt);
    }
}

// Diagnostics go to stderr so that stdout carries only results.
function diagnostics(logger: CliLogger): Logger {
    return {
        debug: (message, ...args) => logger.error(message, ...args),
        info: (message, ...args) => logger.error(message, ...args),
        warn: (message, ...args) => logger.error(message, ...args),
        error: (message, ...args) => logger.error(message, ...args),
    };
}

function requireTemplate(options: CliOptions): string {
    if (!options.template) {
        throw new CliError('Missing required option --template');
    }
    return path.resolve(options.template);
}

function requireValue(flag: string, value: string | undefined): string {
    if (!value) {
        throw new CliError(`Missing value for ${flag}`);
    }
    return value;
}

function requireInteger(flag: string, value: string | undefined): number {
    const raw = requireValue(flag, value);
    const parsed = Number(raw);
    if (!Number.isInteger(parsed)) {
        throw new CliError(`${flag} expects an integer, got '${raw}'`);
    }
    return parsed;
}

function usage(): string {
    return [
        'Usage: stackplan <command> [options]',
        '',
        'Commands:',
        '  plan      show the changes an apply would make (exit 2 when changes are pending)',
        '  apply     make the stack match the template',
        '  destroy   delete every resource of the stack',
        '  outputs   print the outputs of the last apply',
        '  unlock    remove a stale state lock',
        '',
        'Options:',
        '  --template <path>            template file (plan, apply)',
        '  --param <Name=Value>         parameter value, repeatable',
        '  --param-file <path>          JSON or YAML parameter values, repeatable',
        '  --out <path>                 write the plan as YAML (plan)',
        '  --stack <name>               stack name (default: default)',
        '  --state-dir <dir>            state directory (default: .stackplan/state)',
        '  --cloud-dir <dir>            local control plane directory (default: .stackplan/cloud)',
        '  --region <region>            region (default: us-east-1)',
        '  --account-id <id>            account id (default: 123456789012)',
        '  --concurrency <n>            parallel changes (default: 4)',
        '  --failure-policy <policy>    continue or rollback (default: continue)',
        '  --max-attempts <n>           attempts per control-plane call (default: 3)',
        '  --adapter-module <path>      load extra resource adapters, repeatable',
        '  --config <path>              JSON or YAML configuration file',
        '  --verbose, -v                debug logging',
    ].join('\n');
}

if (require.main === module) {
    main().catch((err: unknown) => {
        console.error(errorMessage(err));
        process.exitCode = 1;
    });
}
