import { TemplateMappings, TemplateObject, TemplateValue } from './template';

export type DeletionPolicy = 'Delete' | 'Retain';

export interface ParameterDefinition {
    name: string;
    type: string;
    default?: string;
    description?: string;
    noEcho: boolean;
    allowedValues?: string[];
    allowedPattern?: string;
    minLength?: number;
    maxLength?: number;
    minValue?: number;
    maxValue?: number;
    constraintDescription?: string;
}

export interface ResourceDefinition {
    /**
     * The logical name of the resource, unique within the template.
     */
    logicalId: string;

    /**
     * Position in the Resources section. Used to break ordering ties deterministically.
     */
    index: number;

    /**
     * The resource type tag, e.g. `AWS::S3::Bucket`.
     */
    type: string;

    /**
     * The unresolved property bag, intrinsic functions included.
     */
    properties: TemplateObject;

    condition?: string;

    /**
     * Explicit `DependsOn` targets.
     */
    dependsOn: string[];

    deletionPolicy: DeletionPolicy;

    /**
     * Every resource this resource refers to, explicitly or through intrinsic functions, in first-seen order.
     */
    references: string[];
}

export interface OutputDefinition {
    name: string;
    value: TemplateValue;
    description?: string;
    condition?: string;
    exportName?: TemplateValue;
}

/**
 * Validated in-memory model of a template. Every map preserves declaration order.
 */
export interface TemplateModel {
    description?: string;
    parameters: Map<string, ParameterDefinition>;
    mappings: TemplateMappings;
    conditions: Map<string, TemplateValue>;
    resources: Map<string, ResourceDefinition>;
    outputs: Map<string, OutputDefinition>;
}
