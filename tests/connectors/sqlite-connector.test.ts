import { afterEach, describe, expect, it } from 'vitest';

import { SqliteConnector, isSqliteConnectionFailure } from '../../src/core/connectors/sqlite-connector.js';
import { createLogger } from '../../src/core/logging/logger.js';
import { ConnectorPool } from '../../src/core/pooling/connector-pool.js';
import { PoolKey } from '../../src/core/pooling/pool-key.js';

const key = new PoolKey({ host: 'localhost', database: ':memory:', maxPoolSize: 2 });

describe('SqliteConnector', () => {
  const opened: SqliteConnector[] = [];

  const makePool = () =>
    new ConnectorPool(
      key,
      k => {
        const connector = new SqliteConnector(k);
        opened.push(connector);
        return connector;
      },
      { logger: createLogger('silent') }
    );

  afterEach(async () => {
    for (const connector of opened.splice(0)) {
      await connector.close();
    }
  });

  it('hands back the same session after a release', async () => {
    const pool = makePool();

    const first = await pool.acquire();
    await first.query('CREATE TABLE notes (id INTEGER PRIMARY KEY, body TEXT)');
    await first.query('INSERT INTO notes (id, body) VALUES (?, ?)', [1, 'kept']);
    await pool.release(first);

    const second = await pool.acquire();
    expect(second).toBe(first);
    expect(await second.query('SELECT id, body FROM notes')).toEqual([{ id: 1, body: 'kept' }]);
  });

  it('rolls back an open transaction when released', async () => {
    const pool = makePool();

    const connector = await pool.acquire();
    await connector.query('CREATE TABLE notes (id INTEGER PRIMARY KEY)');
    await connector.query('INSERT INTO notes (id) VALUES (1)');
    await connector.beginTransaction();
    await connector.query('INSERT INTO notes (id) VALUES (2)');
    expect(connector.inTransaction).toBe(true);

    await pool.release(connector);
    expect(connector.inTransaction).toBe(false);

    const again = await pool.acquire();
    expect(await again.query('SELECT id FROM notes ORDER BY id')).toEqual([{ id: 1 }]);
  });

  it('keeps the session usable after a statement error', async () => {
    const pool = makePool();
    const connector = await pool.acquire();

    await expect(connector.query('SELEC 1')).rejects.toThrow();
    expect(connector.isBroken).toBe(false);

    await pool.release(connector);
    expect(pool.status()).toEqual({ busy: 0, idle: 1, waiting: 0 });
  });

  it('refuses queries once closed', async () => {
    const connector = new SqliteConnector(key);
    await connector.open();
    await connector.close();

    await expect(connector.query('SELECT 1')).rejects.toThrow(`Connector ${connector.id} is not open`);
  });
});

describe('isSqliteConnectionFailure', () => {
  const withCode = (code: string) => Object.assign(new Error(code), { code });

  it('flags I/O-class result codes', () => {
    expect(isSqliteConnectionFailure(withCode('SQLITE_IOERR'))).toBe(true);
    expect(isSqliteConnectionFailure(withCode('SQLITE_CORRUPT'))).toBe(true);
    expect(isSqliteConnectionFailure(withCode('SQLITE_MISUSE'))).toBe(true);
  });

  it('leaves statement errors alone', () => {
    expect(isSqliteConnectionFailure(withCode('SQLITE_ERROR'))).toBe(false);
    expect(isSqliteConnectionFailure(withCode('SQLITE_CONSTRAINT'))).toBe(false);
    expect(isSqliteConnectionFailure('SQLITE_IOERR')).toBe(false);
  });
});
