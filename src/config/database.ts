import { Client, ClientConfig, QueryResult, QueryResultRow, types } from 'pg';
import { logger } from '../utils/logger';
import { LoadError } from '../utils/errors/app-error';

/**
 * Connection parameters for the ingestion database
 */
export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  /** Create the raw tables on connect when they are missing */
  ensureSchema: boolean;
}

/**
 * The part of a connection repositories run statements through
 */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

export type ClientFactory = (config: ClientConfig) => Client;

const PG_DATE_OID = 1082;

/**
 * Builds a `pg` client whose DATE columns come back as YYYY-MM-DD strings instead of local-midnight Dates.
 */
export const createPgClient: ClientFactory = (config) => {
  types.setTypeParser(PG_DATE_OID, (value: string) => value);
  return new Client(config);
};

/**
 * Owns the single connection a run uses. Statements issued through `query` share it,
 * so everything inside `transaction` runs in that transaction.
 */
export class DatabaseService implements Queryable {
  private client: Client | null = null;
  private connectionError: Error | null = null;

  constructor(
    private readonly config: DatabaseConfig,
    private readonly clientFactory: ClientFactory = createPgClient
  ) {}

  public get isConnected(): boolean {
    return this.client !== null;
  }

  public async connect(): Promise<void> {
    if (this.client) {
      return;
    }

    const { host, port, database, user, password, ssl } = this.config;
    this.connectionError = null;
    const client = this.clientFactory({
      host,
      port,
      database,
      user,
      password,
      ssl: ssl ? { rejectUnauthorized: false } : undefined,
      application_name: 'market-weather-ingestion'
    });

    // emitted when the server drops the connection; later statements fail through `query`
    client.on('error', (error: Error) => {
      this.connectionError = error;
      logger.error('database_connection_error', { host, port, database, error });
    });

    try {
      await client.connect();
    } catch (error) {
      throw new LoadError(`Failed to connect to database at ${host}:${port}/${database}`, undefined, error);
    }

    this.client = client;
    logger.info('database_connected', { host, port, database });
  }

  /**
   * Execute a SQL statement on the run's connection. Driver errors propagate unchanged;
   * once the connection has reported an error every statement fails with a LoadError.
   */
  public async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = []
  ): Promise<QueryResult<T>> {
    if (!this.client) {
      throw new LoadError('Database connection is not open');
    }
    if (this.connectionError) {
      throw new LoadError('Database connection lost', undefined, this.connectionError);
    }

    const start = Date.now();
    const res = await this.client.query<T>(text, params);
    logger.debug('query_executed', { text, duration: Date.now() - start, rows: res.rowCount });
    return res;
  }

  /**
   * Runs the callback between BEGIN and COMMIT. Any failure rolls the transaction back
   * and surfaces as a LoadError naming `table`.
   */
  public async transaction<T>(table: string, callback: (tx: Queryable) => Promise<T>): Promise<T> {
    try {
      await this.query('BEGIN');
    } catch (error) {
      throw new LoadError(`Could not start transaction for ${table}`, table, error);
    }

    try {
      const result = await callback(this);
      await this.query('COMMIT');
      return result;
    } catch (error) {
      await this.rollback(table);
      throw error instanceof LoadError ? error : new LoadError(`Failed to load ${table}`, table, error);
    }
  }

  private async rollback(table: string): Promise<void> {
    try {
      await this.query('ROLLBACK');
      logger.warn('transaction_rolled_back', { table });
    } catch (error) {
      logger.error('transaction_rollback_failed', { table, error });
    }
  }

  /**
   * Release the connection. Safe to call when nothing is open.
   */
  public async close(): Promise<void> {
    if (!this.client) {
      return;
    }

    const client = this.client;
    this.client = null;
    try {
      await client.end();
      logger.info('database_connection_closed');
    } catch (error) {
      logger.error('database_close_failed', { error });
    }
  }
}
