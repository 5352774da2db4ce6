import type { SqlConnector } from '../connectors/sql-connector.js';
import type { ConnectorPool } from '../pooling/connector-pool.js';
import type { AcquireOptions } from '../pooling/pool-types.js';
import { rowsToQueryResult, type DbExecutor, type QueryResult } from './db-executor.js';

export type PooledExecutorMode = 'session' | 'sticky';

export type PooledExecutorOptions = {
  /**
   * `session` (default) checks a connector out per statement and holds one
   * only for the span of a transaction; `sticky` keeps the first connector
   * until dispose().
   */
  mode?: PooledExecutorMode;
  acquire?: AcquireOptions;
};

/**
 * Creates a DbExecutor backed by a ConnectorPool.
 *
 * - Connectors are always released in `finally`.
 * - One connector per transaction, from begin to commit/rollback.
 */
export function createPooledExecutor<TConnector extends SqlConnector>(
  pool: ConnectorPool<TConnector>,
  options: PooledExecutorOptions = {}
): DbExecutor {
  const mode = options.mode ?? 'session';
  let held: TConnector | null = null;
  // Shared by concurrent callers so only one acquire is ever in flight.
  let holding: Promise<TConnector> | null = null;

  const hold = async (): Promise<TConnector> => {
    if (held) return held;
    if (!holding) {
      holding = pool.acquire(options.acquire);
    }
    const pending = holding;
    try {
      held = await pending;
      return held;
    } finally {
      if (holding === pending) holding = null;
    }
  };

  const letGo = async (): Promise<void> => {
    if (holding) {
      // Wait for an in-flight acquire so its connector is released too.
      await Promise.allSettled([holding]);
    }
    if (!held) return;
    const connector = held;
    held = null;
    await pool.release(connector);
  };

  const run = async (connector: TConnector, sql: string, params?: unknown[]): Promise<QueryResult[]> => {
    const rows = await connector.query(sql, params);
    return [rowsToQueryResult(rows)];
  };

  return {
    async executeSql(sql, params) {
      if (mode === 'sticky' || held) {
        return run(await hold(), sql, params);
      }
      return pool.use(connector => run(connector, sql, params), options.acquire);
    },

    async beginTransaction() {
      const connector = await hold();
      try {
        await connector.beginTransaction();
      } catch (err) {
        if (mode === 'session') await letGo();
        throw err;
      }
    },

    async commitTransaction() {
      if (!held || !held.inTransaction) {
        throw new Error('commitTransaction called without an active transaction');
      }
      try {
        await held.commitTransaction();
      } finally {
        if (mode === 'session') await letGo();
      }
    },

    async rollbackTransaction() {
      if (!held || !held.inTransaction) {
        // Nothing to roll back; keep idempotent semantics.
        return;
      }
      try {
        await held.rollbackTransaction();
      } finally {
        if (mode === 'session') await letGo();
      }
    },

    async dispose() {
      await letGo();
    },
  };
}
