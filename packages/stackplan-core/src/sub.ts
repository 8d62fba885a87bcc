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

export type SubPart = {
    str: string;
    ref?: {
        id: string;
        attr?: string;
    };
};

// `${!Literal}` escapes a placeholder and is emitted as `${Literal}`.
const subRegex = /\$\{(!)?([^}]*)\}/g;

/**
 * Splits an `Fn::Sub` template string into literal text followed by the placeholder that ends it.
 */
export function parseSub(template: string): SubPart[] {
    const parts: SubPart[] = [];
    let str = '';
    let endIndex = 0;
    for (const m of template.matchAll(subRegex)) {
        const startIndex = m.index ?? 0;
        str += template.slice(endIndex, startIndex);
        endIndex = startIndex + m[0].length;

        if (m[1] === '!') {
            str += '${' + m[2] + '}';
            continue;
        }

        const body = m[2].trim();
        const dot = body.indexOf('.');
        const id = dot === -1 ? body : body.slice(0, dot);
        const attr = dot === -1 ? undefined : body.slice(dot + 1);
        parts.push({ str, ref: { id, attr } });
        str = '';
    }

    str += template.slice(endIndex);
    if (str.length > 0) {
        parts.push({ str });
    }

    return parts;
}
