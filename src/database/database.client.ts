import { readFile } from 'fs/promises';
import { join } from 'path';
import { Pool, PoolClient, PoolConfig, QueryConfig, QueryResult, QueryResultRow } from 'pg';

export const SCHEMA_PATH = join(__dirname, '..', '..', 'db', 'schema.sql');

/** The part of the client the stores and repositories query through. */
export type DatabaseExecutor = Pick<DatabaseClient, 'query' | 'transaction'>;

export class DatabaseClient {
  private static instance: DatabaseClient | undefined;
  private readonly pool: Pool;

  private constructor(config: PoolConfig) {
    this.pool = new Pool(config);
  }

  static async initialize(config: PoolConfig): Promise<DatabaseClient> {
    if (!DatabaseClient.instance) {
      const client = new DatabaseClient(config);
      await client.verifyConnection();
      DatabaseClient.instance = client;
    }

    return DatabaseClient.instance;
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    queryText: string,
    values?: ReadonlyArray<unknown>,
  ): Promise<QueryResult<T>>;
  async query<T extends QueryResultRow = QueryResultRow>(
    queryConfig: QueryConfig,
  ): Promise<QueryResult<T>>;
  async query<T extends QueryResultRow = QueryResultRow>(
    queryTextOrConfig: string | QueryConfig,
    values?: ReadonlyArray<unknown>,
  ): Promise<QueryResult<T>> {
    if (typeof queryTextOrConfig === 'string') {
      const bindings = values ? [...values] : undefined;
      return this.pool.query<T>(queryTextOrConfig, bindings);
    }

    return this.pool.query<T>(queryTextOrConfig);
  }

  async transaction<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      const result = await callback(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  /** Creates missing tables and indexes; safe to run on every start. */
  async applySchema(schemaPath: string = SCHEMA_PATH): Promise<void> {
    const ddl = await readFile(schemaPath, 'utf8');
    await this.pool.query(ddl);
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    DatabaseClient.instance = undefined;
  }

  private async verifyConnection(): Promise<void> {
    const client = await this.pool.connect();

    try {
      await client.query('SELECT 1');
    } finally {
      client.release();
    }
  }
}
