// =====================================================
// Postgres Client
// =====================================================

import { Pool } from 'pg';
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from '../db/schema';
import { logger } from '../utils/logger';

export type Database = NodePgDatabase<typeof schema>;

let pool: Pool | null = null;

export function createDatabase(connectionString: string): Database {
  if (!pool) {
    pool = new Pool({ connectionString, max: 10 });
    pool.on('error', (error) => {
      logger.error('Postgres pool error:', error);
    });
  }
  return drizzle(pool, { schema });
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('Postgres pool closed');
  }
}
