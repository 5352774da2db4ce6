import type { Connector, ConnectorCredentials } from '../connectors/connector.js';
import type { Logger } from '../logging/logger.js';
import type { PoolKey } from './pool-key.js';

/** Builds an unopened connector for a pool's key. */
export type ConnectorFactory<TConnector extends Connector> = (key: PoolKey) => TConnector;

export type ConnectorPoolOptions = {
    logger?: Logger;
};

export type AcquireOptions = {
    /**
     * How long to wait when the pool is exhausted. Defaults to the key's
     * acquireTimeoutMillis. `Infinity` waits forever; 0 fails at once.
     */
    timeoutMillis?: number;
    /** Handed to `Connector.open` for any connector this call creates. */
    credentials?: ConnectorCredentials;
    /** Recorded as the connector's owner while it is checked out. */
    owner?: unknown;
    /** Cancels this caller's wait; other waiters are unaffected. */
    signal?: AbortSignal;
};

/** Read-only snapshot of a pool's bookkeeping. */
export interface PoolStatus {
    busy: number;
    idle: number;
    waiting: number;
}
