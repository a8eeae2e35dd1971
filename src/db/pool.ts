import { Pool } from 'pg';
import { getDatabaseConfig } from '../config/database.config';
import { logger } from '../config/logger.config';

/**
 * Create a connection pool for the game state store.
 * The caller owns the pool and must call `closePool()` on shutdown.
 */
export function createPool(): Pool {
  const pool = new Pool(getDatabaseConfig());

  pool.on('error', (err) => {
    logger.error('Unexpected database error', { error: err.message });
  });

  return pool;
}

// Health check function
export async function checkDatabaseHealth(pool: Pool): Promise<boolean> {
  try {
    const result = await pool.query<{ health_check: number }>('SELECT 1 as health_check');
    return result.rows[0]?.health_check === 1;
  } catch (error) {
    logger.error('Database health check failed', { error: String(error) });
    return false;
  }
}

// Graceful shutdown
export async function closePool(pool: Pool): Promise<void> {
  pool.removeAllListeners();
  await pool.end();
  logger.info('Database pool closed');
}
