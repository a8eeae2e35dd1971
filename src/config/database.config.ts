import { PoolConfig } from 'pg';
import { env } from './env.config';
import { logger } from './logger.config';

export function getDatabaseConfig(): PoolConfig {
  const config: PoolConfig = {
    connectionString: env.DATABASE_URL,
    max: env.DB_POOL_SIZE || 5,
    idleTimeoutMillis: 30000, // Close idle connections after 30s
    connectionTimeoutMillis: 5000, // 5s to acquire connection from pool
    statement_timeout: 10000, // game state writes are single-row upserts
  };

  if (env.NODE_ENV === 'production') {
    const rejectUnauthorized = process.env.DATABASE_SSL_REJECT_UNAUTHORIZED !== 'false';
    config.ssl = { rejectUnauthorized };

    if (!rejectUnauthorized) {
      logger.warn('[SECURITY] Database SSL certificate validation is disabled.');
    }
  }

  return config;
}
