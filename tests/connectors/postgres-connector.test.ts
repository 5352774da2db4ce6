import type pg from 'pg';
import { describe, expect, it } from 'vitest';

import {
  PostgresConnector,
  isPgConnectionFailure,
  type PgSessionClient,
} from '../../src/core/connectors/postgres-connector.js';
import type { Row } from '../../src/core/connectors/sql-connector.js';
import { createLogger } from '../../src/core/logging/logger.js';
import { ConnectorPool } from '../../src/core/pooling/connector-pool.js';
import { ConnectorOpenError } from '../../src/core/pooling/pool-errors.js';
import { PoolKey } from '../../src/core/pooling/pool-key.js';

/** In-process stand-in for pg.Client. */
class FakePgClient implements PgSessionClient {
  readonly queries: string[] = [];
  endCalls = 0;
  connectError: Error | null = null;
  readonly failures = new Map<string, Error>();
  private errorListener: ((err: Error) => void) | null = null;
  private endListener: (() => void) | null = null;

  constructor(readonly config: pg.ClientConfig) {}

  async connect(): Promise<void> {
    if (this.connectError) throw this.connectError;
  }

  async query(text: string): Promise<Row[]> {
    this.queries.push(text);
    const failure = this.failures.get(text);
    if (failure) throw failure;
    return [{ '?column?': 1 }];
  }

  async end(): Promise<void> {
    this.endCalls++;
  }

  onError(listener: (err: Error) => void): void {
    this.errorListener = listener;
  }

  onEnd(listener: () => void): void {
    this.endListener = listener;
  }

  emitError(err: Error): void {
    this.errorListener?.(err);
  }

  emitEnd(): void {
    this.endListener?.();
  }
}

const key = new PoolKey({ host: 'db.test', port: 5432, database: 'app', user: 'svc', maxPoolSize: 2 });

const withCode = (message: string, code: string) => Object.assign(new Error(message), { code });

const setup = () => {
  const clients: FakePgClient[] = [];
  const pool = new ConnectorPool(
    key,
    k =>
      new PostgresConnector(k, {
        createClient: config => {
          const client = new FakePgClient(config);
          clients.push(client);
          return client;
        },
      }),
    { logger: createLogger('silent') }
  );
  return { pool, clients };
};

describe('PostgresConnector', () => {
  it('connects with the key and the caller credentials', async () => {
    const { pool, clients } = setup();

    await pool.acquire({ credentials: { password: 'test-secret' } });

    expect(clients[0].config).toEqual({
      host: 'db.test',
      port: 5432,
      database: 'app',
      user: 'svc',
      password: 'test-secret',
    });
  });

  it('discards session state on release', async () => {
    const { pool, clients } = setup();

    const connector = await pool.acquire();
    await connector.query('SET search_path = pg_temp');
    await pool.release(connector);

    expect(clients[0].queries).toEqual(['SET search_path = pg_temp', 'DISCARD ALL']);
    expect(pool.status()).toEqual({ busy: 0, idle: 1, waiting: 0 });
  });

  it('rolls back before discarding when a transaction is open', async () => {
    const { pool, clients } = setup();

    const connector = await pool.acquire();
    await connector.beginTransaction();
    await pool.release(connector);

    expect(clients[0].queries).toEqual(['BEGIN', 'ROLLBACK', 'DISCARD ALL']);
  });

  it('is discarded on release after the client reports an error', async () => {
    const { pool, clients } = setup();

    const connector = await pool.acquire();
    clients[0].emitError(new Error('Connection terminated unexpectedly'));
    expect(connector.isBroken).toBe(true);

    await pool.release(connector);

    expect(connector.state).toBe('discarded');
    expect(clients[0].queries).toEqual([]);
    expect(clients[0].endCalls).toBe(1);
    expect(pool.status()).toEqual({ busy: 0, idle: 0, waiting: 0 });
  });

  it('does not end a client the server already closed', async () => {
    const { pool, clients } = setup();

    const connector = await pool.acquire();
    clients[0].emitEnd();
    await pool.release(connector);

    expect(connector.brokenReason?.message).toBe('Connection ended');
    expect(clients[0].endCalls).toBe(0);
  });

  it('stays usable after a statement error but breaks on a connection error', async () => {
    const { pool, clients } = setup();
    const connector = await pool.acquire();
    clients[0].failures.set('SELEC 1', withCode('syntax error at or near "SELEC"', '42601'));
    clients[0].failures.set('SELECT pg_sleep(10)', withCode('terminating connection due to administrator command', '57P01'));

    await expect(connector.query('SELEC 1')).rejects.toThrow('syntax error');
    expect(connector.isBroken).toBe(false);

    await expect(connector.query('SELECT pg_sleep(10)')).rejects.toThrow('terminating connection');
    expect(connector.isBroken).toBe(true);
  });

  it('surfaces a refused connection as ConnectorOpenError', async () => {
    const clients: FakePgClient[] = [];
    const pool = new ConnectorPool(
      key,
      k =>
        new PostgresConnector(k, {
          createClient: config => {
            const client = new FakePgClient(config);
            client.connectError = withCode('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED');
            clients.push(client);
            return client;
          },
        }),
      { logger: createLogger('silent') }
    );

    const failure = await pool.acquire().catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(ConnectorOpenError);
    expect(failure).toMatchObject({
      message: 'Failed to open a connector for svc@db.test:5432/app: connect ECONNREFUSED 127.0.0.1:5432',
    });
    expect(pool.status()).toEqual({ busy: 0, idle: 0, waiting: 0 });
  });
});

describe('isPgConnectionFailure', () => {
  it('treats connection-class and shutdown SQLSTATEs as fatal', () => {
    expect(isPgConnectionFailure(withCode('x', '08006'))).toBe(true);
    expect(isPgConnectionFailure(withCode('x', '57P01'))).toBe(true);
    expect(isPgConnectionFailure(withCode('x', '57P03'))).toBe(true);
  });

  it('treats errors without a SQLSTATE as transport failures', () => {
    expect(isPgConnectionFailure(new Error('Connection terminated'))).toBe(true);
  });

  it('leaves ordinary server errors alone', () => {
    expect(isPgConnectionFailure(withCode('x', '23505'))).toBe(false);
    expect(isPgConnectionFailure(withCode('x', '57014'))).toBe(false);
  });
});
