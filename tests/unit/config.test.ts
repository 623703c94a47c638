import { loadConfig } from '@storefront/shared/src/utils/config';
import { InvalidInputError } from '@storefront/shared/src/utils/errors';

describe('loadConfig', () => {
     it('should apply defaults for an empty environment', () => {
          const config = loadConfig({});

          expect(config.nodeEnv).toBe('production');
          expect(config.reservationTimeoutMs).toBe(2000);
          expect(config.orderLockTimeoutMs).toBe(5000);
          expect(config.pendingOrderTtlMs).toBe(0);
          expect(config.sweepIntervalMs).toBe(60000);
          expect(config.database).toEqual({
               connectionString: undefined,
               poolMin: 2,
               poolMax: 10,
               idleTimeoutMs: 10000,
               connectionTimeoutMs: 5000,
          });
          expect(config.ordersApi).toEqual({ host: '0.0.0.0', port: 3000 });
          expect(config.adminApi).toEqual({ host: '0.0.0.0', port: 3001 });
     });

     it('should read values from the environment', () => {
          const config = loadConfig({
               DATABASE_URL: 'postgresql://localhost:5432/storefront',
               RESERVATION_TIMEOUT_MS: '250',
               PENDING_ORDER_TTL_MS: '900000',
               ORDERS_API_PORT: '8080',
               DB_POOL_MAX: '20',
          });

          expect(config.database.connectionString).toBe('postgresql://localhost:5432/storefront');
          expect(config.database.poolMax).toBe(20);
          expect(config.reservationTimeoutMs).toBe(250);
          expect(config.pendingOrderTtlMs).toBe(900000);
          expect(config.ordersApi.port).toBe(8080);
     });

     it('should use a minimal pool in test mode', () => {
          const config = loadConfig({ NODE_ENV: 'test', DB_POOL_MAX: '20' });

          expect(config.database.poolMin).toBe(0);
          expect(config.database.poolMax).toBe(2);
          expect(config.database.idleTimeoutMs).toBe(100);
     });

     it('should reject malformed numbers', () => {
          expect(() => loadConfig({ RESERVATION_TIMEOUT_MS: 'soon' })).toThrow(InvalidInputError);
          expect(() => loadConfig({ SWEEP_INTERVAL_MS: '-5' })).toThrow(
               'SWEEP_INTERVAL_MS must be a non-negative integer, got "-5"'
          );
     });
});
