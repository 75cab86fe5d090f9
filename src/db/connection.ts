import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { getDatabaseConfig } from '@/config/database.js';
import * as schema from './schema/index.js';

export type Database = NodePgDatabase<typeof schema>;

let pool: Pool | null = null;
let db: Database | null = null;

export function getDatabase(): Database {
  if (!db) {
    const config = getDatabaseConfig();

    pool = new Pool({
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      database: config.database,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });

    db = drizzle(pool, { schema });
  }

  return db;
}

export async function closeDatabaseConnection(): Promise<void> {
  if (pool) {
    const closing = pool;
    pool = null;
    db = null;
    await closing.end();
  }
}

export { schema };
