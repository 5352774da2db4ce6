import { Connector } from './connector.js';

export type Row = Record<string, unknown>;

/**
 * Connector that runs SQL. Tracks whether a transaction is open so that a
 * reset can roll it back before the session goes back to the pool.
 */
export abstract class SqlConnector extends Connector {
  private transactionOpen = false;

  get inTransaction(): boolean {
    return this.transactionOpen;
  }

  async query(sql: string, params: unknown[] = []): Promise<Row[]> {
    this.assertUsable();
    try {
      return await this.runQuery(sql, params);
    } catch (err) {
      if (this.isConnectionFailure(err)) {
        this.markBroken(err);
      }
      throw err;
    }
  }

  async beginTransaction(): Promise<void> {
    await this.query('BEGIN');
    this.transactionOpen = true;
  }

  async commitTransaction(): Promise<void> {
    await this.query('COMMIT');
    this.transactionOpen = false;
  }

  async rollbackTransaction(): Promise<void> {
    try {
      await this.query('ROLLBACK');
    } finally {
      this.transactionOpen = false;
    }
  }

  protected async resetSession(): Promise<void> {
    if (this.transactionOpen) {
      await this.rollbackTransaction();
    }
    await this.resetSessionState();
  }

  protected abstract runQuery(sql: string, params: unknown[]): Promise<Row[]>;

  /** True when `err` means the transport itself is gone. */
  protected abstract isConnectionFailure(err: unknown): boolean;

  /** Clears session-scoped settings once no transaction is open. */
  protected abstract resetSessionState(): Promise<void>;
}
