/**
 * A value in a parsed template document: the JSON data model after YAML short-form tags have been
 * expanded to their long `Fn::` forms.
 */
export type TemplateValue = null | boolean | number | string | TemplateValue[] | TemplateObject;

export interface TemplateObject {
    [key: string]: TemplateValue;
}

/**
 * Represents a parameter declaration from the Parameters template section.
 *
 * See https://docs.aws.amazon.com/AWSCloudFormation/latest/UserGuide/parameters-section-structure.html
 */
export interface TemplateParameter {
    readonly Type: string;
    readonly Default?: string | number;
    readonly Description?: string;
    readonly NoEcho?: boolean | string;
    readonly AllowedValues?: (string | number)[];
    readonly AllowedPattern?: string;
    readonly MinLength?: number;
    readonly MaxLength?: number;
    readonly MinValue?: number;
    readonly MaxValue?: number;
    readonly ConstraintDescription?: string;
}

export interface TemplateResource {
    readonly Type: string;
    readonly Properties?: TemplateObject;
    readonly Condition?: string;
    readonly DeletionPolicy?: 'Delete' | 'Retain';
    readonly DependsOn?: string | string[];
    readonly Metadata?: TemplateObject;
}

export interface TemplateOutput {
    readonly Value: TemplateValue;
    readonly Description?: string;
    readonly Condition?: string;
    readonly Export?: { Name: TemplateValue };
}

export type TemplateMappings = { [mappingName: string]: { [topLevelKey: string]: { [secondLevelKey: string]: TemplateValue } } };

/**
 * The sections of a template document this tool understands.
 */
export interface TemplateDocument {
    readonly AWSTemplateFormatVersion?: string;
    readonly Description?: string;
    readonly Metadata?: TemplateObject;
    readonly Parameters?: { [id: string]: TemplateParameter };
    readonly Mappings?: TemplateMappings;
    readonly Conditions?: { [id: string]: TemplateValue };
    readonly Resources: { [id: string]: TemplateResource };
    readonly Outputs?: { [id: string]: TemplateOutput };
}

export const PSEUDO_PARAMETER_PREFIX = 'AWS::';

export const NO_VALUE = 'AWS::NoValue';

export function isTemplateObject(value: unknown): value is TemplateObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPseudoParameter(name: string): boolean {
    return name.startsWith(PSEUDO_PARAMETER_PREFIX);
}

/**
 * Returns the intrinsic function name when `value` is a single-key intrinsic call such as `{ "Ref": "X" }` or
 * `{ "Fn::Join": [...] }`.
 */
export function intrinsicName(value: TemplateValue): string | undefined {
    if (!isTemplateObject(value)) {
        return undefined;
    }
    const keys = Object.keys(value);
    if (keys.length !== 1) {
        return undefined;
    }
    const key = keys[0];
    if (key === 'Ref' || key.startsWith('Fn::')) {
        return key;
    }
    return undefined;
}

export function isNoValue(value: TemplateValue): boolean {
    return isTemplateObject(value) && intrinsicName(value) === 'Ref' && value.Ref === NO_VALUE;
}

export function getDependsOn(resource: TemplateResource): string[] {
    if (resource.DependsOn === undefined) {
        return [];
    }
    return typeof resource.DependsOn === 'string' ? [resource.DependsOn] : resource.DependsOn;
}
