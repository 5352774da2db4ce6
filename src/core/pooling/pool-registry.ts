/**
 * Pool Registry
 *
 * Maps pool configurations to pool instances. Pools are created on first
 * reference and live as long as the registry; there is no removal.
 * The registry is a plain value owned by the application, so separate
 * registries (for example one per test) never share pools.
 */

import type { Connector } from '../connectors/connector.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { ConnectorPool } from './connector-pool.js';
import { PoolInvariantError } from './pool-errors.js';
import { PoolKey, type PoolKeyInit } from './pool-key.js';
import type { AcquireOptions, ConnectorFactory, PoolStatus } from './pool-types.js';

export type PoolRegistryOptions<TConnector extends Connector> = {
    createConnector: ConnectorFactory<TConnector>;
    logger?: Logger;
};

export interface PoolStatusEntry extends PoolStatus {
    key: PoolKey;
}

export class PoolRegistry<TConnector extends Connector = Connector> {
    private readonly pools = new Map<string, ConnectorPool<TConnector>>();
    private readonly createConnector: ConnectorFactory<TConnector>;
    private readonly logger: Logger;

    constructor(options: PoolRegistryOptions<TConnector>) {
        this.createConnector = options.createConnector;
        this.logger = options.logger ?? createLogger();
    }

    /**
     * The pool for `key`, created on first use. Equal keys always get the
     * same instance. Throws PoolConfigurationError (and registers nothing)
     * when the key's sizes are out of bounds.
     */
    getOrCreate(key: PoolKey | PoolKeyInit): ConnectorPool<TConnector> {
        const poolKey = PoolKey.from(key);
        const existing = this.pools.get(poolKey.id);
        if (existing) return existing;

        const pool = new ConnectorPool(poolKey, this.createConnector, { logger: this.logger });
        this.pools.set(poolKey.id, pool);
        this.logger.debug({ component: 'PoolRegistry', pool: poolKey.toString() }, 'Created pool');
        return pool;
    }

    get(key: PoolKey | PoolKeyInit): ConnectorPool<TConnector> | undefined {
        return this.pools.get(PoolKey.from(key).id);
    }

    has(key: PoolKey | PoolKeyInit): boolean {
        return this.pools.has(PoolKey.from(key).id);
    }

    get size(): number {
        return this.pools.size;
    }

    keys(): PoolKey[] {
        return Array.from(this.pools.values(), pool => pool.key);
    }

    acquire(key: PoolKey | PoolKeyInit, options?: AcquireOptions): Promise<TConnector> {
        return this.getOrCreate(key).acquire(options);
    }

    /** Routes the connector back to the pool of its own key. */
    async release(connector: TConnector): Promise<void> {
        const pool = this.pools.get(connector.key.id);
        if (!pool) {
            throw new PoolInvariantError(`No pool is registered for ${connector.key}`);
        }
        await pool.release(connector);
    }

    statuses(): PoolStatusEntry[] {
        return Array.from(this.pools.values(), pool => ({ key: pool.key, ...pool.status() }));
    }
}
