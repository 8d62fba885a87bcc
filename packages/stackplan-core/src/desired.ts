import { ReferenceError } from './errors';
import { evaluateConditions } from './conditions';
import { DependencyGraph } from './graph';
import { IntrinsicResolver } from './intrinsic-resolver';
import { PropertyMap, PropertyValue, referencedResources } from './ir';
import { debug } from './logging';
import { DeletionPolicy, ResourceDefinition, TemplateModel } from './model';
import {
    ParameterValue,
    PseudoParameterOptions,
    PseudoParameterValues,
    pseudoParameterValues,
    resolveParameters,
} from './parameters';

export interface DesiredStackInputs extends PseudoParameterOptions {
    /**
     * Raw parameter values keyed by parameter name.
     */
    parameters?: { [name: string]: string };
}

export interface DesiredResource {
    logicalId: string;
    type: string;
    properties: PropertyMap;

    /**
     * Resources this one must wait for: everything its resolved properties reference, plus `DependsOn`.
     */
    dependencies: string[];
    deletionPolicy: DeletionPolicy;
    index: number;
}

export interface DesiredOutput {
    name: string;
    value: PropertyValue;
    description?: string;
    exportName?: PropertyValue;
}

/**
 * The resources and outputs a template asks for, given a set of parameter values.
 */
export interface DesiredStack {
    stackName: string;
    pseudo: PseudoParameterValues;
    parameters: Map<string, ParameterValue>;

    /**
     * Names of parameters whose values must not be displayed.
     */
    noEchoParameters: Set<string>;
    conditions: Map<string, boolean>;

    /**
     * Included resources, in dependency order.
     */
    resources: Map<string, DesiredResource>;
    outputs: DesiredOutput[];
}

/**
 * Resolves parameters and conditions, drops excluded resources and evaluates every intrinsic function that does
 * not need a resource to exist.
 *
 * @throws ParameterError, ReferenceError, ParseError or CycleError. Nothing is mutated on failure.
 */
export function buildDesiredStack(model: TemplateModel, inputs: DesiredStackInputs): DesiredStack {
    const pseudo = pseudoParameterValues(inputs);
    const parameters = resolveParameters(model.parameters, inputs.parameters ?? {});
    const conditions = evaluateConditions(model, parameters, pseudo);

    const conditionValue = (name: string): boolean => {
        const value = conditions.get(name);
        if (value === undefined) {
            throw new ReferenceError('Conditions', name);
        }
        return value;
    };
    const isIncluded = (logicalId: string): boolean => {
        const resource = model.resources.get(logicalId);
        return resource !== undefined && (resource.condition === undefined || conditionValue(resource.condition));
    };

    const resolver = new IntrinsicResolver({ model, parameters, pseudo, conditionValue, isIncluded });

    const unordered: DesiredResource[] = [];
    for (const resource of model.resources.values()) {
        if (!isIncluded(resource.logicalId)) {
            debug(`${resource.logicalId} is excluded by condition ${resource.condition}`);
            continue;
        }
        unordered.push(resolveResource(resource, resolver, isIncluded));
    }

    const graph = DependencyGraph.build(
        unordered.map((resource) => ({
            logicalId: resource.logicalId,
            index: resource.index,
            dependencies: resource.dependencies,
        })),
    );
    const byId = new Map(unordered.map((resource) => [resource.logicalId, resource]));
    const resources = new Map<string, DesiredResource>();
    for (const logicalId of graph.topologicalOrder()) {
        const resource = byId.get(logicalId);
        if (resource !== undefined) {
            resources.set(logicalId, resource);
        }
    }

    const outputs: DesiredOutput[] = [];
    for (const output of model.outputs.values()) {
        if (output.condition !== undefined && !conditionValue(output.condition)) {
            continue;
        }
        const location = `Outputs.${output.name}`;
        const value = resolver.resolveValue(output.value, `${location}.Value`);
        if (value === undefined) {
            continue;
        }
        outputs.push({
            name: output.name,
            value,
            description: output.description,
            exportName:
                output.exportName === undefined
                    ? undefined
                    : resolver.resolveValue(output.exportName, `${location}.Export.Name`),
        });
    }

    const noEchoParameters = new Set(
        [...model.parameters.values()].filter((param) => param.noEcho).map((param) => param.name),
    );

    return {
        stackName: inputs.stackName,
        pseudo,
        parameters,
        noEchoParameters,
        conditions,
        resources,
        outputs,
    };
}

function resolveResource(
    resource: ResourceDefinition,
    resolver: IntrinsicResolver,
    isIncluded: (logicalId: string) => boolean,
): DesiredResource {
    const location = `Resources.${resource.logicalId}.Properties`;
    const properties = resolver.resolvePropertyMap(resource.properties, location);

    const dependencies = referencedResources(properties);
    for (const target of resource.dependsOn) {
        if (!isIncluded(target)) {
            throw new ReferenceError(resource.logicalId, target, 'resource is excluded by its condition');
        }
        if (!dependencies.includes(target)) {
            dependencies.push(target);
        }
    }

    return {
        logicalId: resource.logicalId,
        type: resource.type,
        properties,
        dependencies,
        deletionPolicy: resource.deletionPolicy,
        index: resource.index,
    };
}
