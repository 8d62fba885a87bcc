import { randomBytes, randomUUID } from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import {
    ConcreteMap,
    ConcreteValue,
    PermanentAPIError,
    StateError,
    debug,
    errorMessage,
    isTemplateObject,
} from '@stackplan/core';
import {
    AdapterRegistry,
    CreateRequest,
    DeleteRequest,
    DescribeRequest,
    ResourceAdapter,
    ResourceContext,
    ResourceResult,
    UpdateRequest,
} from './adapter';

/**
 * A resource held by the local control plane.
 */
export interface SimulatedResource {
    type: string;
    physicalId: string;
    stackName: string;
    logicalId: string;
    properties: ConcreteMap;
    attributes: ConcreteMap;
    createdAt: string;
    updatedAt: string;
}

interface ControlPlaneRecord {
    version: 1;
    resources: SimulatedResource[];
}

/**
 * How the control plane treats one resource type.
 */
interface ResourceTypeHandler {
    required: string[];

    /**
     * Properties that name the resource. Changing one of them recreates it under a new identifier.
     */
    identity: string[];
    physicalId(properties: ConcreteMap, context: ResourceContext): string;
    attributes(physicalId: string, properties: ConcreteMap, context: ResourceContext): ConcreteMap;

    /**
     * Checks that the resources this one points at exist.
     */
    validate?(properties: ConcreteMap, plane: LocalControlPlane): void;
}

export const STATIC_SITE_RESOURCE_TYPES = [
    'AWS::S3::Bucket',
    'AWS::S3::BucketPolicy',
    'AWS::Route53::RecordSet',
    'AWS::CertificateManager::Certificate',
    'AWS::CloudFront::Function',
    'AWS::CloudFront::Distribution',
    'AWS::CloudFront::CloudFrontOriginAccessIdentity',
    'AWS::IAM::User',
    'AWS::IAM::AccessKey',
] as const;

export type StaticSiteResourceType = (typeof STATIC_SITE_RESOURCE_TYPES)[number];

const HANDLERS: Record<StaticSiteResourceType, ResourceTypeHandler> = {
    'AWS::S3::Bucket': {
        required: [],
        identity: ['BucketName'],
        physicalId: (props, ctx) => stringProp(props, 'BucketName') ?? generatedName(ctx, 63).toLowerCase(),
        attributes: (name, _props, ctx) => ({
            Arn: `arn:aws:s3:::${name}`,
            DomainName: `${name}.s3.amazonaws.com`,
            RegionalDomainName: `${name}.s3.${ctx.region}.amazonaws.com`,
            WebsiteURL: `http://${name}.s3-website-${ctx.region}.amazonaws.com`,
        }),
    },
    'AWS::S3::BucketPolicy': {
        required: ['Bucket', 'PolicyDocument'],
        identity: ['Bucket'],
        physicalId: () => `policy-${randomId(12).toLowerCase()}`,
        attributes: () => ({}),
        validate: (props, plane) => plane.assertExists('AWS::S3::Bucket', props.Bucket, 'Bucket'),
    },
    'AWS::Route53::RecordSet': {
        required: ['HostedZoneId', 'Name', 'Type'],
        identity: ['HostedZoneId', 'Name', 'Type'],
        physicalId: (props) => String(props.Name),
        attributes: () => ({}),
    },
    'AWS::CertificateManager::Certificate': {
        required: ['DomainName'],
        identity: ['DomainName', 'ValidationMethod'],
        physicalId: (_props, ctx) => `arn:aws:acm:${ctx.region}:${ctx.accountId}:certificate/${randomUUID()}`,
        attributes: () => ({}),
    },
    'AWS::CloudFront::Function': {
        required: ['Name', 'FunctionCode', 'FunctionConfig'],
        identity: ['Name'],
        physicalId: (props, ctx) => `arn:aws:cloudfront::${ctx.accountId}:function/${String(props.Name)}`,
        attributes: (arn, props) => ({
            FunctionARN: arn,
            Stage: props.AutoPublish === true ? 'LIVE' : 'DEVELOPMENT',
        }),
    },
    'AWS::CloudFront::Distribution': {
        required: ['DistributionConfig'],
        identity: [],
        physicalId: () => `E${randomId(13)}`,
        attributes: (id) => ({
            Id: id,
            DomainName: `d${randomId(13).toLowerCase()}.cloudfront.net`,
        }),
    },
    'AWS::CloudFront::CloudFrontOriginAccessIdentity': {
        required: ['CloudFrontOriginAccessIdentityConfig'],
        identity: [],
        physicalId: () => `E${randomId(13)}`,
        attributes: (id) => ({
            Id: id,
            S3CanonicalUserId: randomBytes(48).toString('hex'),
        }),
    },
    'AWS::IAM::User': {
        required: [],
        identity: ['UserName'],
        physicalId: (props, ctx) => stringProp(props, 'UserName') ?? generatedName(ctx, 64),
        attributes: (name, _props, ctx) => ({
            Arn: `arn:aws:iam::${ctx.accountId}:user/${name}`,
        }),
    },
    'AWS::IAM::AccessKey': {
        required: ['UserName'],
        identity: ['UserName', 'Serial'],
        physicalId: () => `AKIA${randomId(16)}`,
        attributes: () => ({
            SecretAccessKey: randomBytes(30).toString('base64'),
        }),
        validate: (props, plane) => plane.assertExists('AWS::IAM::User', props.UserName, 'UserName'),
    },
};

export interface LocalControlPlaneOptions {
    /**
     * JSON file the simulated resources are kept in. Without it they live in memory only.
     */
    file?: string;
}

/**
 * A control plane that runs in process and simulates the resource types of a static website: identifiers and
 * attributes are assigned the way the real services assign them, and required properties are enforced.
 */
export class LocalControlPlane {
    private readonly file?: string;
    private resources?: Map<string, SimulatedResource>;
    private writes: Promise<void> = Promise.resolve();

    constructor(options: LocalControlPlaneOptions = {}) {
        this.file = options.file;
    }

    static fromDirectory(dir: string): LocalControlPlane {
        return new LocalControlPlane({ file: path.join(dir, 'resources.json') });
    }

    async load(): Promise<void> {
        if (this.resources) {
            return;
        }
        const resources = new Map<string, SimulatedResource>();
        if (this.file && (await fs.pathExists(this.file))) {
            for (const resource of parseRecord(await fs.readFile(this.file, 'utf8'), this.file)) {
                resources.set(key(resource.type, resource.physicalId), resource);
            }
        }
        this.resources = resources;
    }

    /**
     * Every simulated resource, in creation order.
     */
    async list(): Promise<SimulatedResource[]> {
        return [...(await this.store()).values()];
    }

    async get(type: string, physicalId: string): Promise<SimulatedResource | undefined> {
        return (await this.store()).get(key(type, physicalId));
    }

    /**
     * @throws PermanentAPIError if no resource of `type` is named by `value`
     */
    assertExists(type: string, value: ConcreteValue | undefined, property: string): void {
        const found =
            typeof value === 'string' &&
            [...(this.resources?.values() ?? [])].some(
                (resource) => resource.type === type && resource.physicalId === value,
            );
        if (!found) {
            throw new PermanentAPIError(`${property} ${JSON.stringify(value)} does not name an existing ${type}`, 'NotFound');
        }
    }

    adapter(type: StaticSiteResourceType): ResourceAdapter {
        return new SimulatedResourceAdapter(this, HANDLERS[type]);
    }

    /**
     * Adapters for every resource type the control plane simulates.
     */
    adapters(): { [type: string]: ResourceAdapter } {
        const adapters: { [type: string]: ResourceAdapter } = {};
        for (const type of STATIC_SITE_RESOURCE_TYPES) {
            adapters[type] = this.adapter(type);
        }
        return adapters;
    }

    registry(): AdapterRegistry {
        return new AdapterRegistry(this.adapters());
    }

    async put(resource: SimulatedResource): Promise<void> {
        (await this.store()).set(key(resource.type, resource.physicalId), resource);
        await this.persist();
    }

    async remove(type: string, physicalId: string): Promise<boolean> {
        const removed = (await this.store()).delete(key(type, physicalId));
        await this.persist();
        return removed;
    }

    private async store(): Promise<Map<string, SimulatedResource>> {
        await this.load();
        if (!this.resources) {
            throw new StateError('Local control plane failed to load');
        }
        return this.resources;
    }

    // Writes run one at a time, each one saving the latest contents.
    private persist(): Promise<void> {
        const file = this.file;
        if (file === undefined) {
            return Promise.resolve();
        }
        const run = this.writes.then(async () => {
            const record: ControlPlaneRecord = { version: 1, resources: [...(this.resources?.values() ?? [])] };
            const tempPath = `${file}.${process.pid}.tmp`;
            await fs.outputFile(tempPath, JSON.stringify(record, undefined, 2) + '\n');
            await fs.rename(tempPath, file);
        });
        this.writes = run.catch(() => undefined);
        return run;
    }
}

class SimulatedResourceAdapter implements ResourceAdapter {
    constructor(
        private readonly plane: LocalControlPlane,
        private readonly handler: ResourceTypeHandler,
    ) {}

    async create(request: CreateRequest): Promise<ResourceResult> {
        await this.plane.load();
        this.validate(request.type, request.properties);

        const physicalId = this.handler.physicalId(request.properties, request.context);
        if (await this.plane.get(request.type, physicalId)) {
            throw new PermanentAPIError(`${request.type} ${physicalId} already exists`, 'AlreadyExists');
        }

        const now = new Date().toISOString();
        const resource: SimulatedResource = {
            type: request.type,
            physicalId,
            stackName: request.context.stackName,
            logicalId: request.context.logicalId,
            properties: request.properties,
            attributes: this.handler.attributes(physicalId, request.properties, request.context),
            createdAt: now,
            updatedAt: now,
        };
        await this.plane.put(resource);
        debug(`local control plane created ${request.type} ${physicalId}`);
        return { physicalId, attributes: resource.attributes };
    }

    async update(request: UpdateRequest): Promise<ResourceResult> {
        const existing = await this.plane.get(request.type, request.physicalId);
        if (existing === undefined) {
            throw new PermanentAPIError(`${request.type} ${request.physicalId} does not exist`, 'NotFound');
        }
        this.validate(request.type, request.properties);

        const renamed = this.handler.identity.some(
            (name) => JSON.stringify(request.properties[name]) !== JSON.stringify(existing.properties[name]),
        );
        if (renamed) {
            debug(`local control plane recreating ${request.type} ${request.physicalId}`);
            const created = await this.create(request);
            await this.plane.remove(request.type, request.physicalId);
            return created;
        }

        const updated: SimulatedResource = {
            ...existing,
            properties: request.properties,
            updatedAt: new Date().toISOString(),
        };
        await this.plane.put(updated);
        return { physicalId: updated.physicalId, attributes: updated.attributes };
    }

    async delete(request: DeleteRequest): Promise<void> {
        if (!(await this.plane.remove(request.type, request.physicalId))) {
            throw new PermanentAPIError(`${request.type} ${request.physicalId} does not exist`, 'NotFound');
        }
        debug(`local control plane deleted ${request.type} ${request.physicalId}`);
    }

    async describe(request: DescribeRequest): Promise<ResourceResult | undefined> {
        const existing = await this.plane.get(request.type, request.physicalId);
        return existing && { physicalId: existing.physicalId, attributes: existing.attributes };
    }

    private validate(type: string, properties: ConcreteMap): void {
        for (const name of this.handler.required) {
            if (properties[name] === undefined || properties[name] === null) {
                throw new PermanentAPIError(`${type} is missing required property ${name}`, 'ValidationError');
            }
        }
        this.handler.validate?.(properties, this.plane);
    }
}

function key(type: string, physicalId: string): string {
    return `${type}|${physicalId}`;
}

function stringProp(properties: ConcreteMap, name: string): string | undefined {
    const value = properties[name];
    return typeof value === 'string' ? value : undefined;
}

const ID_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

function randomId(length: number): string {
    const bytes = randomBytes(length);
    let id = '';
    for (const byte of bytes) {
        id += ID_ALPHABET[byte % ID_ALPHABET.length];
    }
    return id;
}

function generatedName(context: ResourceContext, maxLength: number): string {
    const suffix = randomId(12);
    const prefix = `${context.stackName}-${context.logicalId}`.slice(0, maxLength - suffix.length - 1);
    return `${prefix}-${suffix}`;
}

function parseRecord(text: string, file: string): SimulatedResource[] {
    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch (e) {
        throw new StateError(`Unable to parse ${file}: ${errorMessage(e)}`, { cause: e });
    }
    if (!isTemplateObject(value) || value.version !== 1 || !Array.isArray(value.resources)) {
        throw new StateError(`${file} is not a local control plane record`);
    }
    return value.resources.map((resource, i) => {
        if (
            !isTemplateObject(resource) ||
            typeof resource.type !== 'string' ||
            typeof resource.physicalId !== 'string' ||
            typeof resource.stackName !== 'string' ||
            typeof resource.logicalId !== 'string' ||
            !isTemplateObject(resource.properties) ||
            !isTemplateObject(resource.attributes) ||
            typeof resource.createdAt !== 'string' ||
            typeof resource.updatedAt !== 'string'
        ) {
            throw new StateError(`${file}: resource ${i} is malformed`);
        }
        return {
            type: resource.type,
            physicalId: resource.physicalId,
            stackName: resource.stackName,
            logicalId: resource.logicalId,
            properties: resource.properties,
            attributes: resource.attributes,
            createdAt: resource.createdAt,
            updatedAt: resource.updatedAt,
        };
    });
}
