import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import type { DatabaseSettings } from './config.js';

export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

export interface Database extends Queryable {
  close(): Promise<void>;
}

export function createDatabase(settings: DatabaseSettings): Database {
  const pool = new Pool(settings);

  return {
    async query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) {
      return pool.query<T>(text, params);
    },
    async close() {
      await pool.end();
    },
  };
}
