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

import { ConcreteMap, PermanentAPIError } from '@stackplan/core';

export interface ResourceContext {
    stackName: string;
    logicalId: string;
    region: string;
    accountId: string;
}

export interface ResourceResult {
    physicalId: string;

    /**
     * Attributes other resources can read with `Fn::GetAtt`.
     */
    attributes: ConcreteMap;
}

export interface CreateRequest {
    context: ResourceContext;
    type: string;
    properties: ConcreteMap;
}

export interface UpdateRequest extends CreateRequest {
    physicalId: string;
    previousProperties: ConcreteMap;
}

export interface DeleteRequest {
    context: ResourceContext;
    type: string;
    physicalId: string;
    properties: ConcreteMap;
}

export interface DescribeRequest {
    context: ResourceContext;
    type: string;
    physicalId: string;
}

/**
 * Talks to the control plane for one resource type.
 *
 * Methods throw `TransientAPIError` for failures worth retrying and `PermanentAPIError` for everything else.
 */
export interface ResourceAdapter {
    create(request: CreateRequest): Promise<ResourceResult>;
    update(request: UpdateRequest): Promise<ResourceResult>;
    delete(request: DeleteRequest): Promise<void>;

    /**
     * Returns the resource's current identity, or undefined if it no longer exists. When present, deletes of
     * resources that are already gone succeed without a call to `delete`.
     */
    describe?(request: DescribeRequest): Promise<ResourceResult | undefined>;
}

export class AdapterRegistry {
    private readonly adapters = new Map<string, ResourceAdapter>();

    constructor(adapters: { [type: string]: ResourceAdapter } = {}) {
        this.registerAll(adapters);
    }

    register(type: string, adapter: ResourceAdapter): this {
        this.adapters.set(type, adapter);
        return this;
    }

    registerAll(adapters: { [type: string]: ResourceAdapter }): this {
        for (const [type, adapter] of Object.entries(adapters)) {
            this.register(type, adapter);
        }
        return this;
    }

    has(type: string): boolean {
        return this.adapters.has(type);
    }

    /**
     * @throws PermanentAPIError if no adapter handles `type`
     */
    get(type: string): ResourceAdapter {
        const adapter = this.adapters.get(type);
        if (adapter === undefined) {
            throw new PermanentAPIError(`No adapter registered for resource type ${type}`, 'UnsupportedResourceType');
        }
        return adapter;
    }

    types(): string[] {
        return [...this.adapters.keys()].sort();
    }
}
