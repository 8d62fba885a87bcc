// Copyright 2016-2024, Pulumi Corporation.
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import { CycleError, ReferenceError } from './errors';
import { debug } from './logging';

export interface GraphNode {
    /**
     * Resources that depend on this one.
     */
    incomingEdges: Set<GraphNode>;

    /**
     * Resources this one depends on.
     */
    outgoingEdges: Set<GraphNode>;

    logicalId: string;

    /**
     * Declaration position, used to break ties.
     */
    index: number;
}

export interface GraphInput {
    logicalId: string;
    index?: number;
    dependencies: string[];
}

/**
 * Directed graph of resources, with an edge from each resource to every resource it references. Nodes live in an
 * arena keyed by logical name.
 */
export class DependencyGraph {
    readonly nodes = new Map<string, GraphNode>();

    /**
     * @throws ReferenceError when a dependency names a resource that is not part of the input
     */
    public static build(resources: Iterable<GraphInput>): DependencyGraph {
        const graph = new DependencyGraph();
        const inputs = [...resources];

        inputs.forEach((input, i) => {
            graph.nodes.set(input.logicalId, {
                logicalId: input.logicalId,
                index: input.index ?? i,
                incomingEdges: new Set(),
                outgoingEdges: new Set(),
            });
        });

        for (const input of inputs) {
            const source = graph.node(input.logicalId);
            for (const dependency of input.dependencies) {
                const target = graph.nodes.get(dependency);
                if (target === undefined) {
                    throw new ReferenceError(input.logicalId, dependency);
                }
                source.outgoingEdges.add(target);
                target.incomingEdges.add(source);
            }
        }

        return graph;
    }

    /**
     * Orders resources so that each comes after everything it depends on. Among resources that are ready at the
     * same time, the one declared first goes first.
     *
     * @throws CycleError naming every resource on a cycle
     */
    topologicalOrder(): string[] {
        const remaining = new Map<GraphNode, number>();
        const ready: GraphNode[] = [];
        for (const node of this.nodes.values()) {
            remaining.set(node, node.outgoingEdges.size);
            if (node.outgoingEdges.size === 0) {
                ready.push(node);
            }
        }
        ready.sort(byIndex);

        const sorted: string[] = [];
        while (ready.length > 0) {
            const node = ready.shift();
            if (node === undefined) {
                break;
            }
            sorted.push(node.logicalId);
            for (const dependent of node.incomingEdges) {
                const count = (remaining.get(dependent) ?? 0) - 1;
                remaining.set(dependent, count);
                if (count === 0) {
                    insertSorted(ready, dependent);
                }
            }
        }

        if (sorted.length !== this.nodes.size) {
            throw new CycleError(this.findCycleMembers());
        }

        debug(`resource order: ${sorted.join(', ')}`);
        return sorted;
    }

    /**
     * Returns every resource that lies on at least one cycle, in declaration order.
     */
    findCycleMembers(): string[] {
        const members: GraphNode[] = [];
        for (const component of this.stronglyConnectedComponents()) {
            if (component.length > 1) {
                members.push(...component);
            } else if (component[0].outgoingEdges.has(component[0])) {
                members.push(component[0]);
            }
        }
        return members.sort(byIndex).map((node) => node.logicalId);
    }

    dependenciesOf(logicalId: string): string[] {
        return [...this.node(logicalId).outgoingEdges].sort(byIndex).map((node) => node.logicalId);
    }

    dependentsOf(logicalId: string): string[] {
        return [...this.node(logicalId).incomingEdges].sort(byIndex).map((node) => node.logicalId);
    }

    /**
     * Every resource that depends on `logicalId`, directly or transitively.
     */
    descendantsOf(logicalId: string): Set<string> {
        const seen = new Set<string>();
        const stack = [this.node(logicalId)];
        while (stack.length > 0) {
            const node = stack.pop();
            if (node === undefined) {
                break;
            }
            for (const dependent of node.incomingEdges) {
                if (!seen.has(dependent.logicalId)) {
                    seen.add(dependent.logicalId);
                    stack.push(dependent);
                }
            }
        }
        return seen;
    }

    private node(logicalId: string): GraphNode {
        const node = this.nodes.get(logicalId);
        if (node === undefined) {
            throw new Error(`Unknown graph node ${logicalId}`);
        }
        return node;
    }

    // Tarjan's algorithm.
    private stronglyConnectedComponents(): GraphNode[][] {
        let counter = 0;
        const index = new Map<GraphNode, number>();
        const lowLink = new Map<GraphNode, number>();
        const onStack = new Set<GraphNode>();
        const stack: GraphNode[] = [];
        const components: GraphNode[][] = [];

        const visit = (node: GraphNode) => {
            index.set(node, counter);
            lowLink.set(node, counter);
            counter++;
            stack.push(node);
            onStack.add(node);

            for (const target of node.outgoingEdges) {
                if (!index.has(target)) {
                    visit(target);
                    lowLink.set(node, Math.min(lowLink.get(node) ?? 0, lowLink.get(target) ?? 0));
                } else if (onStack.has(target)) {
                    lowLink.set(node, Math.min(lowLink.get(node) ?? 0, index.get(target) ?? 0));
                }
            }

            if (lowLink.get(node) === index.get(node)) {
                const component: GraphNode[] = [];
                let member: GraphNode | undefined;
                do {
                    member = stack.pop();
                    if (member === undefined) {
                        break;
                    }
                    onStack.delete(member);
                    component.push(member);
                } while (member !== node);
                components.push(component);
            }
        };

        for (const node of this.nodes.values()) {
            if (!index.has(node)) {
                visit(node);
            }
        }
        return components;
    }
}

function byIndex(a: GraphNode, b: GraphNode): number {
    return a.index - b.index;
}

function insertSorted(nodes: GraphNode[], node: GraphNode): void {
    let i = nodes.length;
    while (i > 0 && nodes[i - 1].index > node.index) {
        i--;
    }
    nodes.splice(i, 0, node);
}
