import pg from 'pg';
import { logger } from '../utils/logger.js';

export type DatabasePool = pg.Pool;

export function createPool(connectionString: string): DatabasePool {
  const pool = new pg.Pool({ connectionString, max: 10 });
  pool.on('error', (error) => {
    logger.error({ error }, 'Idle database client error');
  });
  return pool;
}

// Create the tables the document store reads and writes
async function ensureSchema(pool: DatabasePool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS documents (
      id SERIAL PRIMARY KEY,
      title TEXT NOT NULL,
      content TEXT NOT NULL,
      file_type TEXT NOT NULL,
      file_path TEXT,
      file_size INTEGER,
      source TEXT,
      tags JSONB,
      summary TEXT,
      embedding JSONB,
      embedding_provider TEXT,
      created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW(),
      updated_at TIMESTAMP WITH TIME ZONE
    )
  `);
  await pool.query(`
    CREATE TABLE IF NOT EXISTS search_queries (
      id SERIAL PRIMARY KEY,
      query TEXT NOT NULL,
      mode TEXT NOT NULL,
      results_count INTEGER NOT NULL,
      created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
    )
  `);
  await pool.query('CREATE INDEX IF NOT EXISTS idx_documents_created_at ON documents(created_at)');
  await pool.query('CREATE INDEX IF NOT EXISTS idx_documents_file_type ON documents(file_type)');
}

export async function connectDatabase(pool: DatabasePool): Promise<void> {
  try {
    await pool.query('SELECT 1 AS health_check');
    await ensureSchema(pool);
    logger.info('Database connected');
  } catch (error) {
    logger.error({ error }, 'Database connection failed');
    throw error;
  }
}

export async function disconnectDatabase(pool: DatabasePool): Promise<void> {
  try {
    await pool.end();
    logger.info('Database disconnected');
  } catch (error) {
    logger.error({ error }, 'Error disconnecting from database');
  }
}
