import { InvalidInputError } from './errors';

export interface DatabaseConfig {
     connectionString?: string;
     poolMin: number;
     poolMax: number;
     idleTimeoutMs: number;
     connectionTimeoutMs: number;
}

export interface AppConfig {
     nodeEnv: string;
     database: DatabaseConfig;
     /** Upper bound on waiting for a contended product before failing with BUSY */
     reservationTimeoutMs: number;
     orderLockTimeoutMs: number;
     /** 0 disables expiry of stale PENDING orders */
     pendingOrderTtlMs: number;
     sweepIntervalMs: number;
     ordersApi: { host: string; port: number };
     adminApi: { host: string; port: number };
}

type Env = Record<string, string | undefined>;

function intFrom(env: Env, name: string, fallback: number): number {
     const raw = env[name];
     if (raw === undefined || raw === '') {
          return fallback;
     }

     const value = Number(raw);
     if (!Number.isInteger(value) || value < 0) {
          throw new InvalidInputError(`${name} must be a non-negative integer, got "${raw}"`);
     }
     return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
     const nodeEnv = env.NODE_ENV || 'production';
     const isTest = nodeEnv === 'test';

     return {
          nodeEnv,
          database: {
               connectionString: env.DATABASE_URL,
               // In test mode, use minimal connections and short timeouts
               poolMin: isTest ? 0 : intFrom(env, 'DB_POOL_MIN', 2),
               poolMax: isTest ? 2 : intFrom(env, 'DB_POOL_MAX', 10),
               idleTimeoutMs: isTest ? 100 : intFrom(env, 'DB_IDLE_TIMEOUT_MS', 10000),
               connectionTimeoutMs: intFrom(env, 'DB_CONNECTION_TIMEOUT_MS', 5000),
          },
          reservationTimeoutMs: intFrom(env, 'RESERVATION_TIMEOUT_MS', 2000),
          orderLockTimeoutMs: intFrom(env, 'ORDER_LOCK_TIMEOUT_MS', 5000),
          pendingOrderTtlMs: intFrom(env, 'PENDING_ORDER_TTL_MS', 0),
          sweepIntervalMs: intFrom(env, 'SWEEP_INTERVAL_MS', 60000),
          ordersApi: {
               host: env.ORDERS_API_HOST || '0.0.0.0',
               port: intFrom(env, 'ORDERS_API_PORT', 3000),
          },
          adminApi: {
               host: env.ADMIN_API_HOST || '0.0.0.0',
               port: intFrom(env, 'ADMIN_API_PORT', 3001),
          },
     };
}
