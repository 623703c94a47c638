// Database
export * from './db/client';

// Services
export * from './services/inventory-ledger';
export * from './services/pg-inventory-ledger';
export * from './services/order-coordinator';
export * from './services/factory';

// Repositories
export * from './repositories/order-store';
export * from './repositories/pg-order-store';
export * from './repositories/product-catalog';

// Types
export * from './types/order.types';

// Utils
export * from './utils/config';
export * from './utils/keyed-mutex';
export * from './utils/logger';
export * from './utils/errors';
