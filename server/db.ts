import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
const { Pool } = pg;

export type Database = NodePgDatabase;

function resolveSsl(connectionString: string): pg.ClientConfig['ssl'] | undefined {
  try {
    const u = new URL(connectionString);
    const sslmode = u.searchParams.get('sslmode');
    const sslParam = u.searchParams.get('ssl');
    if ((sslmode && sslmode.toLowerCase() === 'require') || (sslParam && sslParam.toLowerCase() === 'true')) {
      return { rejectUnauthorized: false };
    }
  } catch {
    // not a URL (e.g. a libpq keyword string); let pg decide
  }
  return undefined;
}

export function createDatabase(connectionString: string): { pool: pg.Pool; db: Database } {
  const pool = new Pool({ connectionString, ssl: resolveSsl(connectionString) });
  return { pool, db: drizzle(pool) };
}

export async function assertDbConnection(pool: pg.Pool) {
  const client = await pool.connect();
  try {
    await client.query('select 1');
  } finally {
    client.release();
  }
}
