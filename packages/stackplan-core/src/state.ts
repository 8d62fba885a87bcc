import { ConcreteMap, ConcreteValue } from './ir';
import { AttributeLookup } from './materialize';
import { DeletionPolicy } from './model';

export const STATE_VERSION = 1;

/**
 * What stackplan knows about a resource it has created.
 */
export interface ResourceState {
    type: string;

    /**
     * The properties last sent to the control plane, with every reference substituted.
     */
    properties: ConcreteMap;
    physicalId: string;

    /**
     * Attributes reported by the control plane, readable through `Fn::GetAtt`.
     */
    attributes: ConcreteMap;

    /**
     * Logical names this resource depended on when it was last applied. Deletes are ordered by them.
     */
    dependencies: string[];
    deletionPolicy?: DeletionPolicy;
}

export interface OutputState {
    value: ConcreteValue;
    description?: string;
    exportName?: string;

    /**
     * The value includes a NoEcho parameter value and is masked when printed.
     */
    noEcho?: boolean;
}

/**
 * The persisted record of a stack's last applied state.
 */
export interface StackState {
    version: typeof STATE_VERSION;
    stackName: string;

    /**
     * Incremented on every save.
     */
    serial: number;
    updatedAt?: string;
    resources: { [logicalId: string]: ResourceState };
    outputs?: { [name: string]: OutputState };
}

export function emptyState(stackName: string): StackState {
    return {
        version: STATE_VERSION,
        stackName,
        serial: 0,
        resources: {},
    };
}

export function isEmptyState(state: StackState): boolean {
    return Object.keys(state.resources).length === 0;
}

/**
 * Looks up attributes of the resources recorded in `state`. `Ref` resolves to the physical identifier.
 */
export function attributeLookup(state: StackState): AttributeLookup {
    return (logicalId, attributeName) => {
        const resource = state.resources[logicalId];
        if (resource === undefined) {
            return undefined;
        }
        if (attributeName === 'Ref') {
            return resource.physicalId;
        }
        return resource.attributes[attributeName];
    };
}
