import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import type { AppConfig } from './config.js';

/** Anything `pg` can run a statement on: the pool or a checked-out client. */
export interface Queryable {
  query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

/** A checked-out connection that goes back to its pool. */
export interface PooledClient extends Queryable {
  release(): void;
}

/** The part of `pg.Pool` a transaction needs. */
export interface ClientPool {
  connect(): Promise<PooledClient>;
}

export function createPool(config: AppConfig['postgres']): Pool {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
  });
  pool.on('error', (error) => {
    console.error('[db] idle client error', error);
  });
  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  db: Queryable,
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return db.query<T>(text, params);
}

export async function withTransaction<T>(
  pool: ClientPool,
  fn: (client: PooledClient) => Promise<T>
): Promise<T> {
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
