import { Pool } from 'pg';
import { logger } from '../utils/logger';

export interface DatabaseOptions {
  url: string;
  poolMax: number;
}

let pool: Pool | null = null;

export const connectDatabase = async (options: DatabaseOptions): Promise<Pool> => {
  if (pool) {
    return pool;
  }

  const candidate = new Pool({
    connectionString: options.url,
    max: options.poolMax,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  candidate.on('error', (err) => {
    logger.error('Idle database client error', { error: err.message });
  });

  try {
    // Test the connection
    await candidate.query('SELECT 1');
  } catch (error) {
    logger.error('Failed to connect to database', {
      error: error instanceof Error ? error.message : String(error),
    });
    await candidate.end();
    throw error;
  }

  pool = candidate;
  logger.info('Database connected successfully', { poolMax: options.poolMax });
  return pool;
};

export const disconnectDatabase = async (): Promise<void> => {
  if (pool) {
    const closing = pool;
    pool = null;
    await closing.end();
    logger.info('Database disconnected');
  }
};

// Health check function
export const checkDatabaseHealth = async (): Promise<boolean> => {
  try {
    if (!pool) {
      return false;
    }
    await pool.query('SELECT 1');
    return true;
  } catch (error) {
    logger.error('Database health check failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
};
