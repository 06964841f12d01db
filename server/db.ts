import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import * as schema from "../shared/schema";
import { getEnvironmentConfig } from "../src/config/environment";
import { createLogger } from "../src/services/structuredLogger";

const dbLogger = createLogger('DB');

export type PipelineDatabase = NodePgDatabase<typeof schema>;

let pool: pg.Pool | null = null;
let db: PipelineDatabase | null = null;

function initializeDatabase(): { pool: pg.Pool; db: PipelineDatabase } {
  const config = getEnvironmentConfig();
  const databaseUrl = config.database.url;

  if (!databaseUrl) {
    throw new Error('[DB FATAL] DATABASE_URL is not set; use MemStorage for local runs without a database');
  }

  const poolConfig: pg.PoolConfig = {
    connectionString: databaseUrl,
    max: config.isProduction ? 10 : 5,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 15000,
  };

  const newPool = new pg.Pool(poolConfig);

  newPool.on('error', (err) => {
    dbLogger.error('Unexpected error on idle client', { error: err.message });
  });

  dbLogger.info('Pool created', { max: poolConfig.max, env: config.env });

  return { pool: newPool, db: drizzle(newPool, { schema }) };
}

export function getDb(): PipelineDatabase {
  if (!db) {
    const initialized = initializeDatabase();
    pool = initialized.pool;
    db = initialized.db;
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    dbLogger.info('Pool closed');
  }
  pool = null;
  db = null;
}
