export type PoolKeyOptionValue = string | number | boolean;

/** Plain description of a pool's configuration. */
export interface PoolKeyInit {
    host: string;
    port?: number;
    database?: string;
    /** Identity of the credentials (the user name), never the secret itself. */
    user?: string;

    /** Connectors kept warm; filled on acquire. Defaults to 0. */
    minPoolSize?: number;
    /** Upper bound on idle + busy connectors. Defaults to 100. */
    maxPoolSize?: number;
    /** How long acquire() waits on an exhausted pool. Defaults to 15s. */
    acquireTimeoutMillis?: number;
    /** Hard ceiling for maxPoolSize. Defaults to 1024. */
    poolSizeLimit?: number;

    /** Driver settings that also distinguish one pool from another. */
    options?: Readonly<Record<string, PoolKeyOptionValue>>;
}

export const POOL_SIZE_LIMIT = 1024;
export const DEFAULT_MIN_POOL_SIZE = 0;
export const DEFAULT_MAX_POOL_SIZE = 100;
export const DEFAULT_ACQUIRE_TIMEOUT_MILLIS = 15_000;

/**
 * Immutable identity of a pool configuration.
 *
 * Two keys built from equal inits share an `id`, whatever the property
 * order of their `options`, so they resolve to the same pool in a registry.
 * Bounds are not checked here: a ConnectorPool rejects bad sizes when it is
 * constructed.
 */
export class PoolKey {
    readonly host: string;
    readonly port: number | undefined;
    readonly database: string | undefined;
    readonly user: string | undefined;
    readonly minPoolSize: number;
    readonly maxPoolSize: number;
    readonly acquireTimeoutMillis: number;
    readonly poolSizeLimit: number;
    readonly options: Readonly<Record<string, PoolKeyOptionValue>>;
    readonly id: string;

    constructor(init: PoolKeyInit) {
        this.host = init.host;
        this.port = init.port;
        this.database = init.database;
        this.user = init.user;
        this.minPoolSize = init.minPoolSize ?? DEFAULT_MIN_POOL_SIZE;
        this.maxPoolSize = init.maxPoolSize ?? DEFAULT_MAX_POOL_SIZE;
        this.acquireTimeoutMillis = init.acquireTimeoutMillis ?? DEFAULT_ACQUIRE_TIMEOUT_MILLIS;
        this.poolSizeLimit = init.poolSizeLimit ?? POOL_SIZE_LIMIT;

        const entries = Object.entries(init.options ?? {}).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        this.options = Object.freeze(Object.fromEntries(entries));

        this.id = JSON.stringify([
            this.host,
            this.port === undefined ? '' : String(this.port),
            this.database ?? '',
            this.user ?? '',
            String(this.minPoolSize),
            String(this.maxPoolSize),
            String(this.acquireTimeoutMillis),
            String(this.poolSizeLimit),
            entries.map(([name, value]) => `${name}=${typeof value}:${String(value)}`),
        ]);

        Object.freeze(this);
    }

    static from(key: PoolKey | PoolKeyInit): PoolKey {
        return key instanceof PoolKey ? key : new PoolKey(key);
    }

    equals(other: PoolKey): boolean {
        return this.id === other.id;
    }

    /** `user@host:port/database`, with the absent parts left out. */
    toString(): string {
        const user = this.user ? `${this.user}@` : '';
        const port = this.port === undefined ? '' : `:${this.port}`;
        const database = this.database ? `/${this.database}` : '';
        return `${user}${this.host}${port}${database}`;
    }
}
