import pg from 'pg';

import type { PoolKey } from '../pooling/pool-key.js';
import type { ConnectorCredentials } from './connector.js';
import { SqlConnector, type Row } from './sql-connector.js';

/** The slice of `pg.Client` a PostgresConnector drives. */
export interface PgSessionClient {
  connect(): Promise<void>;
  query(text: string, values: unknown[]): Promise<Row[]>;
  end(): Promise<void>;
  onError(listener: (err: Error) => void): void;
  onEnd(listener: () => void): void;
}

export type PgClientFactory = (config: pg.ClientConfig) => PgSessionClient;

export const createPgClient: PgClientFactory = config => {
  const client = new pg.Client(config);
  return {
    connect: () => client.connect(),
    async query(text, values) {
      const result = await client.query(text, values);
      return result.rows;
    },
    end: () => client.end(),
    onError(listener) {
      client.on('error', listener);
    },
    onEnd(listener) {
      client.on('end', listener);
    },
  };
};

// admin_shutdown, crash_shutdown, cannot_connect_now
const TERMINATING_SQLSTATES = new Set(['57P01', '57P02', '57P03']);

/**
 * Server errors carry a SQLSTATE; class 08 and the shutdown codes mean the
 * session is gone. Errors without one come from the client's socket.
 */
export function isPgConnectionFailure(err: unknown): boolean {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code.startsWith('08') || TERMINATING_SQLSTATES.has(err.code);
  }
  return true;
}

export type PostgresConnectorOptions = {
  createClient?: PgClientFactory;
};

export class PostgresConnector extends SqlConnector {
  private readonly createClient: PgClientFactory;
  private client: PgSessionClient | null = null;
  private ended = false;

  constructor(key: PoolKey, options: PostgresConnectorOptions = {}) {
    super(key);
    this.createClient = options.createClient ?? createPgClient;
  }

  protected async connect(credentials: ConnectorCredentials): Promise<void> {
    const client = this.createClient({
      host: this.key.host,
      port: this.key.port,
      database: this.key.database,
      user: this.key.user,
      password: credentials.password,
    });
    client.onError(err => this.markBroken(err));
    client.onEnd(() => {
      this.ended = true;
      this.markBroken(new Error('Connection ended'));
    });

    await client.connect();
    this.client = client;
  }

  protected runQuery(sql: string, params: unknown[]): Promise<Row[]> {
    return this.requireClient().query(sql, params);
  }

  protected isConnectionFailure(err: unknown): boolean {
    return isPgConnectionFailure(err);
  }

  protected async resetSessionState(): Promise<void> {
    await this.requireClient().query('DISCARD ALL', []);
  }

  protected async disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client && !this.ended) {
      await client.end();
    }
  }

  private requireClient(): PgSessionClient {
    if (!this.client) {
      throw new Error(`Connector ${this.id} is not open`);
    }
    return this.client;
  }
}
