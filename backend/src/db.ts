import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import type { DatabaseConfig } from './config.js';

export type Database = {
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
    client?: PoolClient
  ): Promise<QueryResult<T>>;
  withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;
  close(): Promise<void>;
};

export function createPool(config: DatabaseConfig): Pool {
  return new Pool(config);
}

export function createDatabase(pool: Pool): Database {
  async function query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
    client?: PoolClient
  ): Promise<QueryResult<T>> {
    if (client) {
      return client.query<T>(text, params);
    }
    return pool.query<T>(text, params);
  }

  async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
      await client.query('begin');
      const result = await fn(client);
      await client.query('commit');
      return result;
    } catch (error) {
      await client.query('rollback');
      throw error;
    } finally {
      client.release();
    }
  }

  return {
    query,
    withTransaction,
    close: () => pool.end(),
  };
}
