/**
 * connector-pool exports.
 * Pools of database session connectors keyed by configuration, plus the
 * Postgres and SQLite connectors and a pooled SQL executor.
 */
export * from './core/pooling/pool-key.js';
export * from './core/pooling/pool-errors.js';
export * from './core/pooling/pool-types.js';
export * from './core/pooling/waiting-ticket.js';
export * from './core/pooling/connector-pool.js';
export * from './core/pooling/pool-registry.js';
export {
    Connector,
    ConnectorBrokenError,
    type ConnectorCredentials,
    type ConnectorState,
} from './core/connectors/connector.js';
export * from './core/connectors/sql-connector.js';
export * from './core/connectors/postgres-connector.js';
export * from './core/connectors/sqlite-connector.js';
export * from './core/execution/db-executor.js';
export * from './core/execution/pooled-executor.js';
export * from './core/logging/logger.js';
