import { Pool, types, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';

// BIGINT columns hold unix-second timestamps, well inside the safe integer range.
types.setTypeParser(20, (value) => Number.parseInt(value, 10));

export type Queryable = {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
};

export type Database = Queryable & {
  withTransaction<T>(handler: (client: Queryable) => Promise<T>): Promise<T>;
};

let pool: Pool | null = null;

export function getPool(): Pool {
  if (pool) return pool;
  if (!process.env.DATABASE_URL) {
    throw new Error('DATABASE_URL must be set before using the Postgres stores');
  }
  pool = new Pool({
    connectionString: process.env.DATABASE_URL
  });
  pool.on('error', (err) => {
    console.error('Unexpected DB pool error', err);
  });
  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return getPool().query<T>(text, params);
}

function asQueryable(client: PoolClient): Queryable {
  return {
    query: <T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) =>
      client.query<T>(text, params)
  };
}

export async function withTransaction<T>(handler: (client: Queryable) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await handler(asQueryable(client));
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}

export const database: Database = { query, withTransaction };
