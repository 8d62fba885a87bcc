import {
    IntrinsicResolver,
    PropertyValue,
    TemplateModel,
    evaluateConditions,
    loadTemplateDocument,
    pseudoParameterValues,
    resolveParameters,
} from '@stackplan/core';
import { TEST_ACCOUNT, TEST_REGION, parseYaml } from '../utils';

const TEMPLATE = `
Parameters:
  DomainName: {Type: String, Default: www.example.com}
  Zones: {Type: CommaDelimitedList, Default: 'a,b'}
  Mode: {Type: String, Default: Disabled}
  Port: {Type: Number, Default: 443}
Mappings:
  RegionMap:
    us-east-1: {Zone: Z2FDTNDATAQYW2}
Conditions:
  IsEnabled: !Equals [!Ref Mode, Enabled]
  IsHttps: !Equals [!Ref Port, 443]
Resources:
  Bucket:
    Type: AWS::S3::Bucket
  Extra:
    Type: AWS::S3::Bucket
    Condition: IsEnabled
`;

function resolverFor(model: TemplateModel, inputs: { [name: string]: string } = {}): IntrinsicResolver {
    const pseudo = pseudoParameterValues({ stackName: 'test-stack', region: TEST_REGION, accountId: TEST_ACCOUNT });
    const parameters = resolveParameters(model.parameters, inputs);
    const conditions = evaluateConditions(model, parameters, pseudo);
    const conditionValue = (name: string) => conditions.get(name) ?? false;
    return new IntrinsicResolver({
        model,
        parameters,
        pseudo,
        conditionValue,
        isIncluded: (id) => {
            const condition = model.resources.get(id)?.condition;
            return condition === undefined || conditionValue(condition);
        },
    });
}

describe('IntrinsicResolver', () => {
    const resolver = resolverFor(parseYaml(TEMPLATE));
    const resolve = (text: string): PropertyValue | undefined => resolver.resolveValue(loadTemplateDocument(text), 'Test');
    const bucketAttribute = (attributeName: string) => ({ kind: 'resourceAttribute', logicalId: 'Bucket', attributeName });

    test.each([
        ['!Ref DomainName', 'www.example.com'],
        ['!Ref Zones', ['a', 'b']],
        ['!Ref AWS::Region', 'us-east-1'],
        ['!Ref AWS::StackName', 'test-stack'],
        ['!Ref AWS::URLSuffix', 'amazonaws.com'],
        ["!Join ['-', !Split ['.', !Ref DomainName]]", 'www-example-com'],
        ["!Join ['', [a, 1, true]]", 'a1true'],
        ["!Select [1, !Split ['.', !Ref DomainName]]", 'example'],
        ["!Select ['0', !Ref Zones]", 'a'],
        ["!Sub '${AWS::StackName}.${DomainName}:${Port}'", 'test-stack.www.example.com:443'],
        ["!Sub ['${Name}-${!Literal}', {Name: site}]", 'site-${Literal}'],
        ['!Base64 hello', 'aGVsbG8='],
        ['!If [IsEnabled, on, off]', 'off'],
        ['!If [IsHttps, on, off]', 'on'],
        ['!FindInMap [RegionMap, !Ref AWS::Region, Zone]', 'Z2FDTNDATAQYW2'],
        ['{A: 1, B: !If [IsEnabled, 2, !Ref AWS::NoValue]}', { A: 1 }],
        ['[a, !Ref AWS::NoValue, !If [IsEnabled, b, !Ref AWS::NoValue]]', ['a']],
    ])('%s', (text, expected) => {
        expect(resolve(text)).toEqual(expected);
    });

    test('AWS::NoValue resolves to nothing', () => {
        expect(resolve('!Ref AWS::NoValue')).toBeUndefined();
    });

    test('resource references stay symbolic', () => {
        expect(resolve('!Ref Bucket')).toEqual(bucketAttribute('Ref'));
        expect(resolve('!GetAtt Bucket.Arn')).toEqual(bucketAttribute('Arn'));
        expect(resolve("!Join ['', ['https://', !GetAtt Bucket.DomainName]]")).toEqual({
            kind: 'concat',
            delimiter: '',
            values: ['https://', bucketAttribute('DomainName')],
        });
        expect(resolve("!Sub ['${Prefix}/${Bucket.Arn}', {Prefix: logs}]")).toEqual({
            kind: 'concat',
            delimiter: '',
            values: ['logs', '/', bucketAttribute('Arn')],
        });
    });

    test('functions over resource attributes are deferred', () => {
        expect(resolve("{'Fn::Base64': {Ref: Bucket}}")).toEqual({
            kind: 'deferred',
            name: 'Fn::Base64',
            args: [bucketAttribute('Ref')],
        });
        expect(resolve("!Select [0, !Split [',', !GetAtt Bucket.Arn]]")).toEqual({
            kind: 'deferred',
            name: 'Fn::Select',
            args: [0, { kind: 'deferred', name: 'Fn::Split', args: [',', bucketAttribute('Arn')] }],
        });
    });

    test('list-valued attributes are deferred', () => {
        expect(resolve('!Select [1, !GetAtt Bucket.SecurityGroups]')).toEqual({
            kind: 'deferred',
            name: 'Fn::Select',
            args: [1, bucketAttribute('SecurityGroups')],
        });
        expect(resolve("!Join [',', !GetAtt Bucket.SecurityGroups]")).toEqual({
            kind: 'deferred',
            name: 'Fn::Join',
            args: [',', bucketAttribute('SecurityGroups')],
        });
    });

    test.each([
        ['!Select [5, !Ref Zones]', 'Test.Fn::Select: Fn::Select index 5 is out of range'],
        ["!Sub '${Zones}'", "Test.Fn::Sub: Fn::Sub cannot substitute list value 'Zones'"],
        ['!FindInMap [Nope, a, b]', "Test.Fn::FindInMap references undefined name 'Nope' (no such mapping)"],
        ['!FindInMap [RegionMap, eu-west-9, Zone]', 'Test.Fn::FindInMap: Mapping RegionMap has no entry [eu-west-9][Zone]'],
        ["!GetAZs ''", 'Test: Fn::GetAZs is not supported'],
        ["{'Fn::Bogus': 1}", 'Test: Unknown intrinsic function Fn::Bogus'],
        ['!Ref Extra', "Test.Ref references undefined name 'Extra' (resource is excluded by its condition)"],
        ["!Join ['-', a]", 'Test.Fn::Join[1]: Expected a list'],
        ["!Join ['-', !Sub 'arn:${Bucket}']", 'Test.Fn::Join[1]: Expected a list'],
    ])('%s fails', (text, message) => {
        expect(() => resolve(text)).toThrow(message);
    });

    test('parameter values change the outcome', () => {
        const enabled = resolverFor(parseYaml(TEMPLATE), { Mode: 'Enabled' });
        expect(enabled.resolveValue(loadTemplateDocument('!If [IsEnabled, on, off]'), 'Test')).toBe('on');
        expect(enabled.resolveValue(loadTemplateDocument('!Ref Extra'), 'Test')).toEqual({
            kind: 'resourceAttribute',
            logicalId: 'Extra',
            attributeName: 'Ref',
        });
    });
});

describe('evaluateConditions', () => {
    const CONDITIONS = `
Parameters:
  Mode: {Type: String, Default: Disabled}
  Env: {Type: String, Default: prod}
Conditions:
  IsEnabled: !Equals [!Ref Mode, Enabled]
  IsProd: !Equals [prod, !Ref Env]
  Both: !And [!Condition IsEnabled, !Condition IsProd]
  Either: !Or [!Condition IsEnabled, !Condition IsProd]
  NotProd: !Not [!Condition IsProd]
Resources:
  Bucket:
    Type: AWS::S3::Bucket
`;

    function evaluate(text: string, inputs: { [name: string]: string } = {}): Map<string, boolean> {
        const model = parseYaml(text);
        const pseudo = pseudoParameterValues({ stackName: 'test-stack', region: TEST_REGION, accountId: TEST_ACCOUNT });
        return evaluateConditions(model, resolveParameters(model.parameters, inputs), pseudo);
    }

    test('evaluates every condition once', () => {
        expect(evaluate(CONDITIONS)).toEqual(
            new Map([
                ['IsEnabled', false],
                ['IsProd', true],
                ['Both', false],
                ['Either', true],
                ['NotProd', false],
            ]),
        );
        expect(evaluate(CONDITIONS, { Mode: 'Enabled', Env: 'dev' })).toEqual(
            new Map([
                ['IsEnabled', true],
                ['IsProd', false],
                ['Both', false],
                ['Either', true],
                ['NotProd', true],
            ]),
        );
    });

    test('rejects circular conditions', () => {
        const text = `
Conditions:
  A: !Condition B
  B: !Condition A
Resources:
  Bucket:
    Type: AWS::S3::Bucket
`;
        expect(() => evaluate(text)).toThrow('Conditions: Circular condition reference through A -> B -> A');
    });

    test('rejects malformed expressions', () => {
        const text = `
Conditions:
  Bad: !And [true]
Resources:
  Bucket:
    Type: AWS::S3::Bucket
`;
        expect(() => evaluate(text)).toThrow('Conditions.Bad: Fn::And requires between 2 and 10 arguments');
    });
});
