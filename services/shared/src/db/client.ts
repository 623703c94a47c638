import { Pool, PoolClient, PoolConfig } from 'pg';
import { DatabaseConfig } from '../utils/config';
import { logger } from '../utils/logger';

export function createPool(config: DatabaseConfig): Pool {
     const poolConfig: PoolConfig = {
          connectionString: config.connectionString,
          min: config.poolMin,
          max: config.poolMax,
          idleTimeoutMillis: config.idleTimeoutMs,
          connectionTimeoutMillis: config.connectionTimeoutMs,
     };
     const pool = new Pool(poolConfig);

     // Log pool errors
     pool.on('error', (err) => {
          logger.error({ err }, 'Unexpected PostgreSQL pool error');
     });

     return pool;
}

// Connection health check
export async function checkConnection(pool: Pool): Promise<boolean> {
     try {
          await withConnection(pool, (client) => client.query('SELECT 1'));
          return true;
     } catch (error) {
          logger.error({ err: error }, 'Database connection check failed');
          return false;
     }
}

// Transaction helper
export async function withTransaction<T>(
     pool: Pool,
     fn: (client: PoolClient) => Promise<T>
): Promise<T> {
     const client = await pool.connect();
     try {
          await client.query('BEGIN');
          const result = await fn(client);
          await client.query('COMMIT');
          return result;
     } catch (err) {
          await client.query('ROLLBACK');
          throw err;
     } finally {
          client.release();
     }
}

// Connection helper for non-transactional queries
export async function withConnection<T>(
     pool: Pool,
     fn: (client: PoolClient) => Promise<T>
): Promise<T> {
     const client = await pool.connect();
     try {
          return await fn(client);
     } finally {
          client.release();
     }
}

// Graceful shutdown
export async function closePool(pool: Pool): Promise<void> {
     await pool.end();
     logger.info('Database pool closed');
}
