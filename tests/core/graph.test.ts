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

import { CycleError, DependencyGraph, GraphInput, ReferenceError } from '@stackplan/core';

function graphOf(deps: { [id: string]: string[] }): DependencyGraph {
    return DependencyGraph.build(Object.entries(deps).map(([logicalId, dependencies]) => ({ logicalId, dependencies })));
}

describe('DependencyGraph', () => {
    test('orders dependencies first and breaks ties by declaration order', () => {
        const graph = graphOf({
            A: [],
            B: ['C'],
            C: [],
            D: ['A'],
        });
        expect(graph.topologicalOrder()).toEqual(['A', 'C', 'B', 'D']);
    });

    test('the order is the same for repeated calls', () => {
        const graph = graphOf({
            Bucket: [],
            Policy: ['Bucket', 'Identity'],
            Identity: [],
            Distribution: ['Bucket', 'Identity'],
            Record: ['Distribution'],
        });
        const first = graph.topologicalOrder();
        expect(first).toEqual(['Bucket', 'Identity', 'Policy', 'Distribution', 'Record']);
        expect(graph.topologicalOrder()).toEqual(first);
    });

    test('every resource comes after the resources it depends on', () => {
        // Deterministic pseudo-random DAG: each node depends on a few nodes declared later.
        let seed = 7;
        const random = () => {
            seed = (seed * 1103515245 + 12345) % 2147483648;
            return seed / 2147483648;
        };
        const count = 40;
        const inputs: GraphInput[] = [];
        for (let i = 0; i < count; i++) {
            const dependencies = new Set<string>();
            for (let j = i + 1; j < count; j++) {
                if (random() < 0.15) {
                    dependencies.add(`R${j}`);
                }
            }
            inputs.push({ logicalId: `R${i}`, dependencies: [...dependencies] });
        }

        const order = DependencyGraph.build(inputs).topologicalOrder();
        expect(order).toHaveLength(count);
        const position = new Map(order.map((id, i) => [id, i]));
        for (const input of inputs) {
            for (const dependency of input.dependencies) {
                expect(position.get(dependency)).toBeLessThan(position.get(input.logicalId) ?? -1);
            }
        }
    });

    test('reports every resource on a cycle', () => {
        const graph = graphOf({
            A: ['B'],
            B: ['C'],
            C: ['A'],
            D: ['A'],
            E: ['E'],
        });
        expect(() => graph.topologicalOrder()).toThrow(CycleError);
        expect(() => graph.topologicalOrder()).toThrow('Circular dependency between resources: A, B, C, E');
        expect(graph.findCycleMembers()).toEqual(['A', 'B', 'C', 'E']);
    });

    test('two separate cycles', () => {
        const graph = graphOf({
            A: ['B'],
            B: ['A'],
            C: [],
            D: ['F'],
            E: ['D'],
            F: ['E', 'C'],
        });
        expect(graph.findCycleMembers()).toEqual(['A', 'B', 'D', 'E', 'F']);
    });

    test('rejects unknown dependencies', () => {
        expect(() => graphOf({ A: ['Z'] })).toThrow(new ReferenceError('A', 'Z'));
        expect(() => graphOf({ A: ['Z'] })).toThrow("A references undefined name 'Z'");
    });

    test('neighbours and descendants', () => {
        const graph = graphOf({
            Bucket: [],
            Identity: [],
            Distribution: ['Identity', 'Bucket'],
            Record: ['Distribution'],
            Policy: ['Bucket'],
        });
        expect(graph.dependenciesOf('Distribution')).toEqual(['Bucket', 'Identity']);
        expect(graph.dependentsOf('Bucket')).toEqual(['Distribution', 'Policy']);
        expect(graph.descendantsOf('Bucket')).toEqual(new Set(['Distribution', 'Record', 'Policy']));
        expect(graph.descendantsOf('Record')).toEqual(new Set());
    });
});
