/**
 * Pool error types.
 *
 * Each class carries a stable `code` so callers can tell a timeout from a
 * creation failure or a bad configuration without parsing messages.
 */

import type { PoolKey } from './pool-key.js';

export class PoolConfigurationError extends Error {
    readonly code = 'POOL_CONFIGURATION';

    constructor(message: string) {
        super(message);
        this.name = 'PoolConfigurationError';
    }
}

export class AcquireTimeoutError extends Error {
    readonly code = 'POOL_ACQUIRE_TIMEOUT';
    readonly maxPoolSize: number;
    readonly timeoutMillis: number;

    constructor(key: PoolKey, timeoutMillis: number) {
        super(
            `The connector pool for ${key} has been exhausted, either raise maxPoolSize ` +
            `(currently ${key.maxPoolSize}) or the acquire timeout (currently ${timeoutMillis} ms)`
        );
        this.name = 'AcquireTimeoutError';
        this.maxPoolSize = key.maxPoolSize;
        this.timeoutMillis = timeoutMillis;
    }
}

export class AcquireAbortedError extends Error {
    readonly code = 'POOL_ACQUIRE_ABORTED';

    constructor(key: PoolKey, reason?: unknown) {
        super(`Acquire on the connector pool for ${key} was aborted`, { cause: reason });
        this.name = 'AcquireAbortedError';
    }
}

export class ConnectorOpenError extends Error {
    readonly code = 'CONNECTOR_OPEN_FAILED';

    constructor(key: PoolKey, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to open a connector for ${key}: ${detail}`, { cause });
        this.name = 'ConnectorOpenError';
    }
}

/** Bookkeeping went wrong or the pool was misused. Never recoverable. */
export class PoolInvariantError extends Error {
    readonly code = 'POOL_INVARIANT';

    constructor(message: string) {
        super(message);
        this.name = 'PoolInvariantError';
    }
}

export type PoolError =
    | PoolConfigurationError
    | AcquireTimeoutError
    | AcquireAbortedError
    | ConnectorOpenError
    | PoolInvariantError;

export function isPoolError(err: unknown): err is PoolError {
    return (
        err instanceof PoolConfigurationError ||
        err instanceof AcquireTimeoutError ||
        err instanceof AcquireAbortedError ||
        err instanceof ConnectorOpenError ||
        err instanceof PoolInvariantError
    );
}
