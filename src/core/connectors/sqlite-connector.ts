import sqlite3 from 'sqlite3';

import type { ConnectorCredentials } from './connector.js';
import { SqlConnector, type Row } from './sql-connector.js';

const BROKEN_CODES = new Set([
  'SQLITE_IOERR',
  'SQLITE_CORRUPT',
  'SQLITE_NOTADB',
  'SQLITE_CANTOPEN',
  'SQLITE_MISUSE',
]);

export function isSqliteConnectionFailure(err: unknown): boolean {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && BROKEN_CODES.has(err.code);
}

const isRow = (value: unknown): value is Row => typeof value === 'object' && value !== null;

/**
 * SQLite session over the sqlite3 driver. The key's `database` is the file
 * name; `:memory:` gives every connector its own private database.
 */
export class SqliteConnector extends SqlConnector {
  private db: sqlite3.Database | null = null;

  protected connect(_credentials: ConnectorCredentials): Promise<void> {
    return new Promise((resolve, reject) => {
      const db = new sqlite3.Database(this.key.database ?? ':memory:', err => {
        if (err) {
          reject(err);
          return;
        }
        this.db = db;
        resolve();
      });
      db.on('error', (err: Error) => this.markBroken(err));
    });
  }

  protected runQuery(sql: string, params: unknown[]): Promise<Row[]> {
    const db = this.requireDb();
    return new Promise((resolve, reject) => {
      db.all(sql, params, (err: Error | null, rows: unknown[]) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(rows.filter(isRow));
      });
    });
  }

  protected isConnectionFailure(err: unknown): boolean {
    return isSqliteConnectionFailure(err);
  }

  protected async resetSessionState(): Promise<void> {
    // SQLite keeps no session settings beyond the open transaction.
  }

  protected disconnect(): Promise<void> {
    const db = this.db;
    this.db = null;
    if (!db) return Promise.resolve();
    return new Promise((resolve, reject) => {
      db.close(err => (err ? reject(err) : resolve()));
    });
  }

  private requireDb(): sqlite3.Database {
    if (!this.db) {
      throw new Error(`Connector ${this.id} is not open`);
    }
    return this.db;
  }
}
