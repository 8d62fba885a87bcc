import {
    DesiredStack,
    Logger,
    TemplateModel,
    buildDesiredStack,
    loadTemplateDocument,
    parseTemplate,
    setLogger,
} from '@stackplan/core';

export const TEST_REGION = 'us-east-1';
export const TEST_ACCOUNT = '123456789012';

export function parseYaml(text: string): TemplateModel {
    return parseTemplate(loadTemplateDocument(text));
}

export function desiredFromYaml(
    text: string,
    parameters: { [name: string]: string } = {},
    stackName = 'test-stack',
): DesiredStack {
    return buildDesiredStack(parseYaml(text), {
        stackName,
        region: TEST_REGION,
        accountId: TEST_ACCOUNT,
        parameters,
    });
}

/**
 * Replaces the global logger with mocks for the duration of a test file.
 */
export function mockLogger(): Logger {
    const logger: Logger = {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    };
    setLogger(logger);
    return logger;
}

/**
 * Bucket, Distribution and DNSRecord, each depending on the one before.
 */
export const SITE_TEMPLATE = `
Resources:
  Bucket:
    Type: AWS::S3::Bucket
    Properties:
      BucketName: site-assets
  Distribution:
    Type: AWS::CloudFront::Distribution
    Properties:
      DistributionConfig:
        Enabled: true
        Origins:
          - Id: assets
            DomainName: !GetAtt Bucket.RegionalDomainName
  DNSRecord:
    Type: AWS::Route53::RecordSet
    Properties:
      HostedZoneId: Z0000TEST
      Name: www.example.com
      Type: A
      AliasTarget:
        DNSName: !GetAtt Distribution.DomainName
        HostedZoneId: Z2FDTNDATAQYW2
Outputs:
  SiteUrl:
    Value: !Sub https://\${DNSRecord}
`;
