import { ParseError, ReferenceError } from './errors';
import { debug } from './logging';
import {
    DeletionPolicy,
    OutputDefinition,
    ParameterDefinition,
    ResourceDefinition,
    TemplateModel,
} from './model';
import { isSupportedParameterType, PSEUDO_PARAMETERS } from './parameters';
import { collectReferences } from './references';
import { TemplateMappings, TemplateObject, TemplateValue, isTemplateObject } from './template';

const TOP_LEVEL_SECTIONS = new Set([
    'AWSTemplateFormatVersion',
    'Description',
    'Metadata',
    'Parameters',
    'Mappings',
    'Conditions',
    'Resources',
    'Outputs',
]);

const RESOURCE_ATTRIBUTES = new Set([
    'Type',
    'Properties',
    'Condition',
    'DependsOn',
    'DeletionPolicy',
    'UpdateReplacePolicy',
    'Metadata',
    'CreationPolicy',
    'UpdatePolicy',
]);

const SUPPORTED_FORMAT_VERSION = '2010-09-09';
const LOGICAL_ID_PATTERN = /^[A-Za-z0-9]+$/;
const RESOURCE_TYPE_PATTERN = /^(?:[A-Za-z0-9]+::[A-Za-z0-9]+::[A-Za-z0-9]+|Custom::[A-Za-z0-9_@-]+)$/;

/**
 * Validates a template document and builds its in-memory model.
 *
 * @throws ParseError when the document structure is malformed
 * @throws ReferenceError when a resource, output or condition refers to a name the template does not define
 */
export function parseTemplate(document: TemplateValue): TemplateModel {
    if (!isTemplateObject(document)) {
        throw new ParseError('Template must be a mapping');
    }

    for (const key of Object.keys(document)) {
        if (key === 'Transform') {
            throw new ParseError('Template transforms are not supported', 'Transform');
        }
        if (!TOP_LEVEL_SECTIONS.has(key)) {
            throw new ParseError(`Unknown template section '${key}'`);
        }
    }

    const version = document.AWSTemplateFormatVersion;
    if (version !== undefined && version !== SUPPORTED_FORMAT_VERSION) {
        throw new ParseError(`Unsupported format version '${String(version)}'`, 'AWSTemplateFormatVersion');
    }

    const description = optionalString(document.Description, 'Description');
    const parameters = parseParameters(optionalSection(document, 'Parameters'));
    const mappings = parseMappings(optionalSection(document, 'Mappings'));
    const conditions = new Map(Object.entries(optionalSection(document, 'Conditions')));

    const resourcesSection = document.Resources;
    if (!isTemplateObject(resourcesSection) || Object.keys(resourcesSection).length === 0) {
        throw new ParseError('Template must declare at least one resource', 'Resources');
    }
    const resourceIds = new Set(Object.keys(resourcesSection));

    const model: TemplateModel = {
        description,
        parameters,
        mappings,
        conditions,
        resources: new Map(),
        outputs: new Map(),
    };

    for (const [name, expr] of conditions) {
        validateConditionReferences(model, `Conditions.${name}`, expr);
    }

    let index = 0;
    for (const [logicalId, raw] of Object.entries(resourcesSection)) {
        const resource = parseResource(logicalId, raw, index++, model, resourceIds);
        model.resources.set(logicalId, resource);
    }

    for (const [name, raw] of Object.entries(optionalSection(document, 'Outputs'))) {
        model.outputs.set(name, parseOutput(name, raw, model, resourceIds));
    }

    debug(`parsed template with ${model.resources.size} resources, ${model.parameters.size} parameters`);
    return model;
}

function optionalSection(document: TemplateObject, name: string): TemplateObject {
    const section = document[name];
    if (section === undefined || section === null) {
        return {};
    }
    if (!isTemplateObject(section)) {
        throw new ParseError('Section must be a mapping', name);
    }
    return section;
}

function optionalString(value: TemplateValue | undefined, location: string): string | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'string') {
        throw new ParseError('Expected a string', location);
    }
    return value;
}

function optionalNumber(value: TemplateValue | undefined, location: string): number | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    const n = typeof value === 'string' ? Number(value) : value;
    if (typeof n !== 'number' || Number.isNaN(n)) {
        throw new ParseError('Expected a number', location);
    }
    return n;
}

function scalarToString(value: TemplateValue, location: string): string {
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return String(value);
    }
    throw new ParseError('Expected a scalar value', location);
}

function parseParameters(section: TemplateObject): Map<string, ParameterDefinition> {
    const parameters = new Map<string, ParameterDefinition>();
    for (const [name, raw] of Object.entries(section)) {
        const location = `Parameters.${name}`;
        if (!LOGICAL_ID_PATTERN.test(name)) {
            throw new ParseError('Parameter names must be alphanumeric', location);
        }
        if (!isTemplateObject(raw)) {
            throw new ParseError('Parameter declaration must be a mapping', location);
        }
        const type = raw.Type;
        if (typeof type !== 'string') {
            throw new ParseError('Parameter Type is required', location);
        }
        if (!isSupportedParameterType(type)) {
            throw new ParseError(`Unsupported parameter type '${type}'`, `${location}.Type`);
        }

        const allowedValues = raw.AllowedValues;
        if (allowedValues !== undefined && !Array.isArray(allowedValues)) {
            throw new ParseError('AllowedValues must be a list', `${location}.AllowedValues`);
        }

        const noEcho = raw.NoEcho;
        parameters.set(name, {
            name,
            type,
            default:
                raw.Default === undefined || raw.Default === null
                    ? undefined
                    : scalarToString(raw.Default, `${location}.Default`),
            description: optionalString(raw.Description, `${location}.Description`),
            noEcho: noEcho === true || noEcho === 'true',
            allowedValues: allowedValues?.map((v, i) => scalarToString(v, `${location}.AllowedValues[${i}]`)),
            allowedPattern: optionalString(raw.AllowedPattern, `${location}.AllowedPattern`),
            minLength: optionalNumber(raw.MinLength, `${location}.MinLength`),
            maxLength: optionalNumber(raw.MaxLength, `${location}.MaxLength`),
            minValue: optionalNumber(raw.MinValue, `${location}.MinValue`),
            maxValue: optionalNumber(raw.MaxValue, `${location}.MaxValue`),
            constraintDescription: optionalString(raw.ConstraintDescription, `${location}.ConstraintDescription`),
        });
    }
    return parameters;
}

function parseMappings(section: TemplateObject): TemplateMappings {
    const mappings: TemplateMappings = {};
    for (const [name, topLevel] of Object.entries(section)) {
        if (!isTemplateObject(topLevel)) {
            throw new ParseError('Mapping must be a mapping of keys', `Mappings.${name}`);
        }
        mappings[name] = {};
        for (const [key, secondLevel] of Object.entries(topLevel)) {
            if (!isTemplateObject(secondLevel)) {
                throw new ParseError('Mapping entries must be mappings', `Mappings.${name}.${key}`);
            }
            mappings[name][key] = { ...secondLevel };
        }
    }
    return mappings;
}

/**
 * Conditions may only refer to parameters, pseudo parameters and other conditions.
 */
function validateConditionReferences(model: TemplateModel, location: string, expr: TemplateValue): void {
    const refs = collectReferences(expr);
    for (const name of [...refs.refs, ...refs.getAtts]) {
        if (!model.parameters.has(name) && !PSEUDO_PARAMETERS.has(name)) {
            throw new ReferenceError(location, name, 'conditions may only reference parameters');
        }
    }
    for (const name of refs.conditions) {
        if (!model.conditions.has(name)) {
            throw new ReferenceError(location, name, 'no such condition');
        }
    }
}

/**
 * Checks every name used by a resource property or output value and returns the resources among them.
 */
function resolveResourceReferences(
    model: TemplateModel,
    location: string,
    value: TemplateValue,
    resourceIds: Set<string>,
): string[] {
    const refs = collectReferences(value);
    const resources: string[] = [];

    for (const name of refs.refs) {
        debug(`${location}: ref to ${name}`);
        if (resourceIds.has(name)) {
            resources.push(name);
        } else if (!model.parameters.has(name) && !PSEUDO_PARAMETERS.has(name)) {
            throw new ReferenceError(location, name);
        }
    }

    for (const name of refs.getAtts) {
        debug(`${location}: attribute of ${name}`);
        if (!resourceIds.has(name)) {
            throw new ReferenceError(location, name, 'Fn::GetAtt requires a resource');
        }
        if (!resources.includes(name)) {
            resources.push(name);
        }
    }

    for (const name of refs.conditions) {
        if (!model.conditions.has(name)) {
            throw new ReferenceError(location, name, 'no such condition');
        }
    }

    return resources;
}

function parseResource(
    logicalId: string,
    raw: TemplateValue,
    index: number,
    model: TemplateModel,
    resourceIds: Set<string>,
): ResourceDefinition {
    const location = `Resources.${logicalId}`;
    if (!LOGICAL_ID_PATTERN.test(logicalId)) {
        throw new ParseError('Logical names must be alphanumeric', location);
    }
    if (model.parameters.has(logicalId)) {
        throw new ParseError('Logical name is already used by a parameter', location);
    }
    if (!isTemplateObject(raw)) {
        throw new ParseError('Resource declaration must be a mapping', location);
    }

    for (const key of Object.keys(raw)) {
        if (!RESOURCE_ATTRIBUTES.has(key)) {
            throw new ParseError(`Unknown resource attribute '${key}'`, location);
        }
    }

    const type = raw.Type;
    if (typeof type !== 'string' || !RESOURCE_TYPE_PATTERN.test(type)) {
        throw new ParseError(`Invalid resource type '${String(type)}'`, `${location}.Type`);
    }

    const rawProperties = raw.Properties ?? {};
    if (!isTemplateObject(rawProperties)) {
        throw new ParseError('Properties must be a mapping', `${location}.Properties`);
    }

    const condition = optionalString(raw.Condition, `${location}.Condition`);
    if (condition !== undefined && !model.conditions.has(condition)) {
        throw new ReferenceError(location, condition, 'no such condition');
    }

    const dependsOn = parseDependsOn(raw.DependsOn, location);
    for (const target of dependsOn) {
        if (!resourceIds.has(target)) {
            throw new ReferenceError(location, target, 'DependsOn requires a resource');
        }
    }

    const references = resolveResourceReferences(model, `${location}.Properties`, rawProperties, resourceIds);
    for (const target of dependsOn) {
        if (!references.includes(target)) {
            references.push(target);
        }
    }

    return {
        logicalId,
        index,
        type,
        properties: rawProperties,
        condition,
        dependsOn,
        deletionPolicy: parseDeletionPolicy(raw.DeletionPolicy, location),
        references,
    };
}

function parseDependsOn(value: TemplateValue | undefined, location: string): string[] {
    if (value === undefined || value === null) {
        return [];
    }
    if (typeof value === 'string') {
        return [value];
    }
    if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
        return value;
    }
    throw new ParseError('DependsOn must be a string or a list of strings', `${location}.DependsOn`);
}

function parseDeletionPolicy(value: TemplateValue | undefined, location: string): DeletionPolicy {
    if (value === undefined || value === null || value === 'Delete') {
        return 'Delete';
    }
    if (value === 'Retain') {
        return 'Retain';
    }
    throw new ParseError(`Unsupported DeletionPolicy '${String(value)}'`, `${location}.DeletionPolicy`);
}

function parseOutput(
    name: string,
    raw: TemplateValue,
    model: TemplateModel,
    resourceIds: Set<string>,
): OutputDefinition {
    const location = `Outputs.${name}`;
    if (!isTemplateObject(raw) || raw.Value === undefined) {
        throw new ParseError('Output must declare a Value', location);
    }

    const condition = optionalString(raw.Condition, `${location}.Condition`);
    if (condition !== undefined && !model.conditions.has(condition)) {
        throw new ReferenceError(location, condition, 'no such condition');
    }

    resolveResourceReferences(model, `${location}.Value`, raw.Value, resourceIds);

    let exportName: TemplateValue | undefined;
    if (raw.Export !== undefined) {
        if (!isTemplateObject(raw.Export) || raw.Export.Name === undefined) {
            throw new ParseError('Export must declare a Name', `${location}.Export`);
        }
        exportName = raw.Export.Name;
        resolveResourceReferences(model, `${location}.Export`, exportName, resourceIds);
    }

    return {
        name,
        value: raw.Value,
        description: optionalString(raw.Description, `${location}.Description`),
        condition,
        exportName,
    };
}
