import * as path from 'path';
import { StackplanError, debug, errorMessage } from '@stackplan/core';
import { AdapterRegistry, ResourceAdapter } from './adapter';

/**
 * Loads adapter modules and adds their adapters to `registry`. Each module exports `adapters`, an object mapping
 * resource types to adapters; later modules override earlier ones.
 */
export async function loadAdapterModules(registry: AdapterRegistry, modulePaths: string[]): Promise<AdapterRegistry> {
    for (const modulePath of modulePaths) {
        const resolved = path.resolve(modulePath);
        let loaded: unknown;
        try {
            loaded = await import(resolved);
        } catch (e) {
            throw new StackplanError(`Unable to load adapter module ${modulePath}: ${errorMessage(e)}`, { cause: e });
        }

        const adapters = adaptersOf(loaded);
        if (adapters === undefined) {
            throw new StackplanError(`Adapter module ${modulePath} does not export 'adapters'`);
        }
        for (const [type, adapter] of Object.entries(adapters)) {
            if (!isResourceAdapter(adapter)) {
                throw new StackplanError(`Adapter for ${type} in ${modulePath} must implement create, update and delete`);
            }
            debug(`adapter for ${type} loaded from ${modulePath}`);
            registry.register(type, adapter);
        }
    }
    return registry;
}

function adaptersOf(loaded: unknown): { [type: string]: unknown } | undefined {
    if (typeof loaded !== 'object' || loaded === null || !('adapters' in loaded)) {
        return undefined;
    }
    const adapters = loaded.adapters;
    if (typeof adapters !== 'object' || adapters === null) {
        return undefined;
    }
    return Object.fromEntries(Object.entries(adapters));
}

export function isResourceAdapter(value: unknown): value is ResourceAdapter {
    return (
        typeof value === 'object' &&
        value !== null &&
        'create' in value &&
        typeof value.create === 'function' &&
        'update' in value &&
        typeof value.update === 'function' &&
        'delete' in value &&
        typeof value.delete === 'function' &&
        (!('describe' in value) || value.describe === undefined || typeof value.describe === 'function')
    );
}
