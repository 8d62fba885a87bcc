/**
 * Base class for every error raised by stackplan.
 */
export class StackplanError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The template document is malformed.
 */
export class ParseError extends StackplanError {
    /**
     * Location of the problem, e.g. `Resources.SiteBucket.Type` or a file name.
     */
    readonly location?: string;

    constructor(message: string, location?: string, options?: { cause?: unknown }) {
        super(location ? `${location}: ${message}` : message, options);
        this.location = location;
    }
}

/**
 * A resource, output or condition refers to a logical name that the template does not define.
 *
 * Shadows the global `ReferenceError` for modules that import it.
 */
export class ReferenceError extends StackplanError {
    constructor(
        readonly source: string,
        readonly target: string,
        detail?: string,
    ) {
        super(`${source} references undefined name '${target}'${detail ? ` (${detail})` : ''}`);
    }
}

/**
 * The resource reference graph is not acyclic.
 */
export class CycleError extends StackplanError {
    constructor(readonly resources: string[]) {
        super(`Circular dependency between resources: ${resources.join(', ')}`);
    }
}

/**
 * A parameter value is missing or violates its constraints.
 */
export class ParameterError extends StackplanError {
    constructor(
        readonly parameter: string,
        message: string,
    ) {
        super(`Parameter '${parameter}': ${message}`);
    }
}

/**
 * A control-plane call failed in a way that may succeed when retried (throttling, transient network errors).
 */
export class TransientAPIError extends StackplanError {
    constructor(
        message: string,
        readonly code?: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }
}

/**
 * A control-plane call failed and retrying will not help (invalid properties, unsupported type).
 */
export class PermanentAPIError extends StackplanError {
    constructor(
        message: string,
        readonly code?: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }
}

export interface LockInfo {
    pid: number;
    hostname: string;
    operation: string;
    acquiredAt: string;
}

/**
 * The stack state is locked by another operation.
 */
export class ConflictError extends StackplanError {
    constructor(
        readonly stackName: string,
        readonly holder?: LockInfo,
    ) {
        super(
            holder
                ? `State of stack '${stackName}' is locked by ${holder.operation} (pid ${holder.pid} on ${holder.hostname}) since ${holder.acquiredAt}`
                : `State of stack '${stackName}' is locked by another operation`,
        );
    }
}

/**
 * The persisted stack state cannot be read or written.
 */
export class StateError extends StackplanError {}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) {
        return err.message;
    }
    return String(err);
}
