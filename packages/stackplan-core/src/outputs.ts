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

import { DesiredOutput } from './desired';
import { StackplanError } from './errors';
import { ConcreteValue } from './ir';
import { containsSecret } from './masking';
import { AttributeLookup, isConcrete, materialize } from './materialize';
import { OutputState } from './state';

/**
 * Evaluates stack outputs once every resource they refer to exists. Outputs that include one of `secrets` are
 * marked `noEcho`.
 *
 * @throws StackplanError if an output refers to an attribute that is still unknown
 */
export function evaluateOutputs(
    outputs: DesiredOutput[],
    lookup: AttributeLookup,
    secrets: string[] = [],
): { [name: string]: OutputState } {
    const result: { [name: string]: OutputState } = {};
    for (const output of outputs) {
        const value = materialize(output.value, lookup);
        if (!isConcrete(value)) {
            throw new StackplanError(`Output ${output.name} refers to a value that is not available`);
        }
        const exportName = output.exportName === undefined ? undefined : materialize(output.exportName, lookup);

        result[output.name] = {
            value,
            description: output.description,
            exportName: typeof exportName === 'string' ? exportName : undefined,
            noEcho: containsSecret(value, secrets) || undefined,
        };
    }
    return result;
}

export function formatOutputValue(value: ConcreteValue): string {
    if (typeof value === 'string') {
        return value;
    }
    return JSON.stringify(value);
}
