import { Pool } from 'pg';
import { PgOrderStore } from '../repositories/pg-order-store';
import { PgProductCatalog } from '../repositories/product-catalog';
import { AppConfig } from '../utils/config';
import { OrderCoordinator } from './order-coordinator';
import { PgInventoryLedger } from './pg-inventory-ledger';

export interface PgServices {
     ledger: PgInventoryLedger;
     catalog: PgProductCatalog;
     coordinator: OrderCoordinator;
}

// Wires the PostgreSQL-backed collaborators used by the deployed services
export function createPgServices(pool: Pool, config: AppConfig): PgServices {
     const ledger = new PgInventoryLedger(pool, config.reservationTimeoutMs);
     const catalog = new PgProductCatalog(pool);
     const coordinator = new OrderCoordinator({
          ledger,
          store: new PgOrderStore(pool),
          catalog,
          orderLockTimeoutMs: config.orderLockTimeoutMs,
     });
     return { ledger, catalog, coordinator };
}
