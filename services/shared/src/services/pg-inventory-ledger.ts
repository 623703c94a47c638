import { randomUUID } from 'node:crypto';
import { Pool, PoolClient } from 'pg';
import { withTransaction } from '../db/client';
import { InventoryRecord, PENDING_ORDER, ReservationToken } from '../types/order.types';
import {
     BusyError,
     ConsumedOutcome,
     DomainError,
     InsufficientStockError,
     InvalidInputError,
     InvalidTokenError,
     NotFoundError,
     StorageError,
} from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { InventoryLedger, assertPositiveQuantity, assertStockLevel } from './inventory-ledger';

// lock_not_available, raised when lock_timeout elapses
const LOCK_NOT_AVAILABLE = '55P03';

type LedgerEntryType = 'RESERVE' | 'RELEASE' | 'COMMIT';

type TokenRow = {
     product_id: string;
     quantity: number | string;
     status: string;
};

type InventoryRow = {
     product_id: string;
     total_stock: number | string;
     reserved: number | string;
};

function toRecord(row: InventoryRow): InventoryRecord {
     // integer columns may come back as strings depending on the driver's type parsers
     return {
          productId: row.product_id,
          totalStock: parseInt(String(row.total_stock), 10),
          reserved: parseInt(String(row.reserved), 10),
     };
}

function isLockTimeout(error: unknown): boolean {
     return (
          typeof error === 'object' &&
          error !== null &&
          'code' in error &&
          error.code === LOCK_NOT_AVAILABLE
     );
}

/**
 * InventoryLedger backed by PostgreSQL. Per-product serialization comes from the
 * inventory_record row lock; lock waits are bounded by lock_timeout.
 */
export class PgInventoryLedger implements InventoryLedger {
     private readonly log = createChildLogger({ component: 'pg-inventory-ledger' });

     constructor(
          private readonly pool: Pool,
          private readonly reservationTimeoutMs: number = 2000
     ) {}

     async tryReserve(
          productId: string,
          quantity: number,
          issuedFor: string = PENDING_ORDER
     ): Promise<ReservationToken> {
          assertPositiveQuantity(quantity, `product ${productId}`);

          return this.run(`inventory_record:${productId}`, async (client) => {
               const { rows } = await client.query<InventoryRow>(
                    `
      SELECT product_id, total_stock, reserved
      FROM inventory_record
      WHERE product_id = $1
      FOR UPDATE
    `,
                    [productId]
               );

               if (rows.length === 0) {
                    throw new NotFoundError('Product', productId);
               }

               const record = toRecord(rows[0]);
               const available = record.totalStock - record.reserved;
               if (available < quantity) {
                    throw new InsufficientStockError(productId, quantity, available);
               }

               const token: ReservationToken = Object.freeze({
                    id: randomUUID(),
                    productId,
                    quantity,
                    issuedFor,
               });

               await client.query(
                    `
      UPDATE inventory_record
      SET reserved = reserved + $1,
          updated_at = NOW()
      WHERE product_id = $2
    `,
                    [quantity, productId]
               );

               await client.query(
                    `
      INSERT INTO reservation_token (id, product_id, quantity, issued_for, status)
      VALUES ($1, $2, $3, $4, 'HELD')
    `,
                    [token.id, productId, quantity, issuedFor]
               );

               await this.appendLedgerEntry(client, 'RESERVE', productId, -quantity, token.id);

               this.log.debug({ productId, quantity, tokenId: token.id }, 'Stock reserved');
               return token;
          });
     }

     async release(token: ReservationToken): Promise<void> {
          await this.consume(token, 'RELEASED', 'RELEASE', 'SET reserved = reserved - $1');
     }

     async commit(token: ReservationToken): Promise<void> {
          await this.consume(
               token,
               'COMMITTED',
               'COMMIT',
               'SET reserved = reserved - $1, total_stock = total_stock - $1'
          );
     }

     async provision(productId: string, totalStock: number): Promise<InventoryRecord> {
          assertStockLevel(totalStock, productId);

          return this.run(`inventory_record:${productId}`, async (client) => {
               const product = await client.query('SELECT 1 FROM product WHERE id = $1', [productId]);
               if (product.rows.length === 0) {
                    throw new NotFoundError('Product', productId);
               }

               const { rows } = await client.query<InventoryRow>(
                    `
      INSERT INTO inventory_record (product_id, total_stock, reserved)
      VALUES ($1, $2, 0)
      ON CONFLICT (product_id) DO UPDATE
      SET total_stock = EXCLUDED.total_stock,
          updated_at = NOW()
      WHERE inventory_record.reserved <= EXCLUDED.total_stock
      RETURNING product_id, total_stock, reserved
    `,
                    [productId, totalStock]
               );

               if (rows.length === 0) {
                    throw new InvalidInputError(
                         `Total stock ${totalStock} for product ${productId} is below reserved quantity`
                    );
               }
               return toRecord(rows[0]);
          });
     }

     async getRecord(productId: string): Promise<InventoryRecord> {
          let rows: InventoryRow[];
          try {
               ({ rows } = await this.pool.query<InventoryRow>(
                    'SELECT product_id, total_stock, reserved FROM inventory_record WHERE product_id = $1',
                    [productId]
               ));
          } catch (error) {
               throw new StorageError(error);
          }

          if (rows.length === 0) {
               throw new NotFoundError('InventoryRecord', productId);
          }
          return toRecord(rows[0]);
     }

     private async consume(
          token: ReservationToken,
          status: ConsumedOutcome,
          entryType: LedgerEntryType,
          setClause: string
     ): Promise<void> {
          await this.run(`inventory_record:${token.productId}`, async (client) => {
               const { rows } = await client.query<TokenRow>(
                    `
      SELECT product_id, quantity, status
      FROM reservation_token
      WHERE id = $1
      FOR UPDATE
    `,
                    [token.id]
               );

               const held = rows[0];
               if (held && (held.status === 'RELEASED' || held.status === 'COMMITTED')) {
                    throw new InvalidTokenError(token.id, held.status);
               }
               if (
                    !held ||
                    held.status !== 'HELD' ||
                    held.product_id !== token.productId ||
                    parseInt(String(held.quantity), 10) !== token.quantity
               ) {
                    throw new InvalidTokenError(token.id);
               }

               await client.query(
                    `UPDATE inventory_record ${setClause}, updated_at = NOW() WHERE product_id = $2`,
                    [token.quantity, token.productId]
               );

               await client.query(
                    `
      UPDATE reservation_token
      SET status = $2,
          consumed_at = NOW()
      WHERE id = $1
    `,
                    [token.id, status]
               );

               const delta = entryType === 'COMMIT' ? 0 : token.quantity;
               await this.appendLedgerEntry(client, entryType, token.productId, delta, token.id);

               this.log.debug({ productId: token.productId, tokenId: token.id, status }, 'Token consumed');
          });
     }

     private async appendLedgerEntry(
          client: PoolClient,
          type: LedgerEntryType,
          productId: string,
          availableDelta: number,
          tokenId: string
     ): Promise<void> {
          await client.query(
               `
      INSERT INTO inventory_ledger (product_id, type, available_delta, token_id)
      VALUES ($1, $2, $3, $4)
    `,
               [productId, type, availableDelta, tokenId]
          );
     }

     private async run<T>(resource: string, fn: (client: PoolClient) => Promise<T>): Promise<T> {
          try {
               return await withTransaction(this.pool, async (client) => {
                    await client.query(`SELECT set_config('lock_timeout', $1, true)`, [
                         `${this.reservationTimeoutMs}ms`,
                    ]);
                    return fn(client);
               });
          } catch (error) {
               if (error instanceof DomainError) throw error;
               if (isLockTimeout(error)) {
                    throw new BusyError(resource, this.reservationTimeoutMs);
               }
               throw new StorageError(error);
          }
     }
}
