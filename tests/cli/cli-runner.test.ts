import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { EXIT_CHANGES_PENDING, parseArguments, resolveCliConfig, runCli } from '../../src/cli/cli-runner';
import { SITE_TEMPLATE } from '../utils';

function fakeLogger() {
    return { log: jest.fn(), error: jest.fn() };
}

describe('parseArguments', () => {
    test('collects options', () => {
        expect(
            parseArguments([
                'plan',
                '--template',
                'site.yaml',
                '--param',
                'DomainName=example.com',
                '--param',
                'Env=dev',
                '--stack',
                'prod',
                '--concurrency',
                '2',
                '--failure-policy',
                'rollback',
                '-v',
            ]),
        ).toEqual({
            command: 'plan',
            template: 'site.yaml',
            parameters: ['DomainName=example.com', 'Env=dev'],
            parameterFiles: [],
            verbose: true,
            overrides: { stack: 'prod', concurrency: 2, failurePolicy: 'rollback' },
        });
    });

    test('collects adapter modules', () => {
        expect(parseArguments(['destroy', '--adapter-module', 'a.js', '--adapter-module', 'b.js']).overrides).toEqual({
            adapterModules: ['a.js', 'b.js'],
        });
    });

    test.each([
        [[], /^Usage: stackplan <command> \[options\]/],
        [['deploy'], /^Unknown command: deploy\n/],
        [['plan'], /^Missing required option --template\n/],
        [['plan', '--template'], /^Missing value for --template$/],
        [['plan', '--template', 'site.yaml', '--foo'], /^Unknown argument: --foo\n/],
        [['plan', '--template', 'site.yaml', '--concurrency', 'two'], /^--concurrency expects an integer, got 'two'$/],
        [['apply', '--template', 'site.yaml', '--out', 'plan.yaml'], /^--out is only supported by plan$/],
        [['apply', '--template', 'site.yaml', '--failure-policy', 'abort'], /^failure policy must be one of/],
    ])('rejects %p', (argv, message) => {
        expect(() => parseArguments(argv)).toThrow(message);
    });
});

describe('resolveCliConfig', () => {
    test('flags override the environment', async () => {
        const options = parseArguments(['plan', '--template', 'site.yaml', '--stack', 'cli', '--param', 'Env=dev']);
        const config = await resolveCliConfig(options, { STACKPLAN_STACK: 'env', STACKPLAN_REGION: 'eu-west-1' });
        expect(config.stack).toBe('cli');
        expect(config.region).toBe('eu-west-1');
        expect(config.parameters).toEqual({ Env: 'dev' });
        expect(config.logLevel).toBe('info');
    });

    test('--param wins over parameter files', async () => {
        const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stackplan-cli-'));
        try {
            const paramFile = path.join(tmpDir, 'params.yaml');
            fs.writeFileSync(paramFile, 'Env: staging\nDomainName: example.com\n');
            const options = parseArguments([
                'plan',
                '--template',
                'site.yaml',
                '--param-file',
                paramFile,
                '--param',
                'Env=dev',
                '--verbose',
            ]);
            const config = await resolveCliConfig(options, {});
            expect(config.parameters).toEqual({ Env: 'dev', DomainName: 'example.com' });
            expect(config.logLevel).toBe('debug');
        } finally {
            fs.removeSync(tmpDir);
        }
    });
});

describe('runCli', () => {
    let tmpDir: string;
    let templateFile: string;
    let dirs: string[];

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stackplan-cli-'));
        templateFile = path.join(tmpDir, 'site.yaml');
        fs.writeFileSync(templateFile, SITE_TEMPLATE);
        dirs = ['--state-dir', path.join(tmpDir, 'state'), '--cloud-dir', path.join(tmpDir, 'cloud')];
    });

    afterEach(() => {
        fs.removeSync(tmpDir);
    });

    test('plan, apply, outputs and destroy', async () => {
        const logger = fakeLogger();
        const outFile = path.join(tmpDir, 'plans', 'site.yaml');
        expect(await runCli(['plan', '--template', templateFile, '--out', outFile, ...dirs], logger, {})).toBe(
            EXIT_CHANGES_PENDING,
        );
        expect(logger.log).toHaveBeenCalledWith(
            'Stack default: 3 to create, 0 to update, 0 to replace, 0 to delete, 0 unchanged',
        );
        expect(fs.readFileSync(outFile, 'utf8').startsWith('stack: default\n')).toBe(true);
        expect(fs.existsSync(path.join(tmpDir, 'state', 'default.json'))).toBe(false);

        logger.log.mockClear();
        expect(await runCli(['apply', '--template', templateFile, ...dirs], logger, {})).toBe(0);
        expect(logger.log).toHaveBeenCalledWith('SiteUrl = https://www.example.com');
        expect(fs.readJsonSync(path.join(tmpDir, 'cloud', 'resources.json')).resources).toHaveLength(3);

        logger.log.mockClear();
        expect(await runCli(['plan', '--template', templateFile, ...dirs], logger, {})).toBe(0);
        expect(logger.log.mock.calls).toEqual([
            ['Stack default: 0 to create, 0 to update, 0 to replace, 0 to delete, 3 unchanged'],
            ['No changes.'],
        ]);

        logger.log.mockClear();
        expect(await runCli(['outputs', ...dirs], logger, {})).toBe(0);
        expect(logger.log.mock.calls).toEqual([['SiteUrl = https://www.example.com']]);

        expect(await runCli(['destroy', ...dirs], logger, {})).toBe(0);
        expect(fs.existsSync(path.join(tmpDir, 'state', 'default.json'))).toBe(false);

        expect(await runCli(['outputs', ...dirs], logger, {})).toBe(1);
        expect(logger.error).toHaveBeenCalledWith('Stack default has no state');

        logger.log.mockClear();
        expect(await runCli(['destroy', ...dirs], logger, {})).toBe(0);
        expect(logger.log.mock.calls).toEqual([['Stack default has no state, nothing to destroy']]);
    });

    test('sends diagnostics to stderr', async () => {
        const logger = fakeLogger();
        await runCli(['plan', '--template', templateFile, ...dirs], logger, {});
        expect(logger.error).toHaveBeenCalledWith('stack default: 3 change(s), 0 unchanged');
        expect(logger.log).not.toHaveBeenCalledWith('stack default: 3 change(s), 0 unchanged');
    });

    test('reports errors and exits with 1', async () => {
        const logger = fakeLogger();
        expect(await runCli(['plan', '--template', path.join(tmpDir, 'missing.yaml'), ...dirs], logger, {})).toBe(1);
        expect(logger.error).toHaveBeenLastCalledWith(
            expect.stringMatching(/missing\.yaml: Unable to read template: ENOENT/),
        );

        expect(await runCli(['deploy'], logger, {})).toBe(1);
        expect(logger.log).not.toHaveBeenCalled();
    });

    test('unlock removes a stale lock', async () => {
        const logger = fakeLogger();
        fs.outputFileSync(path.join(tmpDir, 'state', 'default.lock'), '{}');

        expect(await runCli(['apply', '--template', templateFile, ...dirs], logger, {})).toBe(1);
        expect(logger.error).toHaveBeenLastCalledWith("State of stack 'default' is locked by another operation");

        expect(await runCli(['unlock', ...dirs], logger, {})).toBe(0);
        expect(await runCli(['unlock', ...dirs], logger, {})).toBe(0);
        expect(logger.log.mock.calls).toEqual([['Removed lock of stack default'], ['Stack default is not locked']]);
    });
});
