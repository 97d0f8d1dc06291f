import { Pool } from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from '../db/schema';

export type Database = NodePgDatabase<typeof schema>;

export function createDatabase(connectionString: string): { pool: Pool; db: Database } {
  const pool = new Pool({ connectionString, max: 10 });
  pool.on('error', (err) => {
    console.error('[Database] Idle client error:', err.message);
  });
  return { pool, db: drizzle(pool, { schema }) };
}
