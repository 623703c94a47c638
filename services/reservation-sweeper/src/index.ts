import dotenv from 'dotenv';
import { closePool, createPool } from '@storefront/shared/src/db/client';
import { createPgServices } from '@storefront/shared/src/services/factory';
import { loadConfig } from '@storefront/shared/src/utils/config';
import { logger } from '@storefront/shared/src/utils/logger';
import { ReservationSweeper } from './sweeper';

dotenv.config();

async function main() {
     const config = loadConfig();
     const pool = createPool(config.database);
     const { coordinator } = createPgServices(pool, config);
     const sweeper = new ReservationSweeper(coordinator, {
          pendingOrderTtlMs: config.pendingOrderTtlMs,
          sweepIntervalMs: config.sweepIntervalMs,
     });

     const shutdown = () => {
          logger.info('Shutting down gracefully...');
          sweeper
               .stop()
               .then(() => closePool(pool))
               .then(
                    () => process.exit(0),
                    (err: unknown) => {
                         logger.error({ err }, 'Shutdown failed');
                         process.exit(1);
                    }
               );
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);

     if (!sweeper.start()) {
          await closePool(pool);
     }
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in reservation sweeper');
     process.exit(1);
});
