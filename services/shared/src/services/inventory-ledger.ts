import { randomUUID } from 'node:crypto';
import {
     InventoryRecord,
     PENDING_ORDER,
     ReservationToken,
     availableStock,
} from '../types/order.types';
import {
     ConsumedOutcome,
     InsufficientStockError,
     InvalidInputError,
     InvalidTokenError,
     NotFoundError,
} from '../utils/errors';
import { KeyedMutex } from '../utils/keyed-mutex';
import { createChildLogger } from '../utils/logger';

/**
 * Authoritative per-product stock counters. Every read-check-modify cycle on a
 * product is serialized; operations on different products never block each other.
 */
export interface InventoryLedger {
     /**
      * Reserve `quantity` units of a product. Rejects with NotFoundError,
      * InsufficientStockError, InvalidInputError or BusyError.
      */
     tryReserve(productId: string, quantity: number, issuedFor?: string): Promise<ReservationToken>;

     /**
      * Return a token's quantity to available stock. A token can be consumed
      * (released or committed) exactly once; afterwards it fails with InvalidTokenError
      * carrying the outcome of the first consumption.
      */
     release(token: ReservationToken): Promise<void>;

     /**
      * Consume a token as fulfilled: the units leave both reserved and total stock.
      */
     commit(token: ReservationToken): Promise<void>;

     provision(productId: string, totalStock: number): Promise<InventoryRecord>;

     getRecord(productId: string): Promise<InventoryRecord>;
}

export function assertPositiveQuantity(quantity: number, context: string): void {
     if (!Number.isInteger(quantity) || quantity <= 0) {
          throw new InvalidInputError(`Quantity must be a positive integer for ${context}`);
     }
}

export function assertStockLevel(totalStock: number, productId: string): void {
     if (!Number.isInteger(totalStock) || totalStock < 0) {
          throw new InvalidInputError(
               `Total stock must be a non-negative integer for product ${productId}`
          );
     }
}

export interface InMemoryInventoryLedgerOptions {
     reservationTimeoutMs?: number;
     mutex?: KeyedMutex;
}

const DEFAULT_RESERVATION_TIMEOUT_MS = 2000;

export class InMemoryInventoryLedger implements InventoryLedger {
     private readonly records = new Map<string, InventoryRecord>();
     private readonly outstanding = new Map<string, ReservationToken>();
     private readonly consumed = new Map<string, ConsumedOutcome>();
     private readonly mutex: KeyedMutex;
     private readonly timeoutMs: number;
     private readonly log = createChildLogger({ component: 'inventory-ledger' });

     constructor(options: InMemoryInventoryLedgerOptions = {}) {
          this.mutex = options.mutex ?? new KeyedMutex('inventory');
          this.timeoutMs = options.reservationTimeoutMs ?? DEFAULT_RESERVATION_TIMEOUT_MS;
     }

     async tryReserve(
          productId: string,
          quantity: number,
          issuedFor: string = PENDING_ORDER
     ): Promise<ReservationToken> {
          assertPositiveQuantity(quantity, `product ${productId}`);

          return this.mutex.runExclusive(productId, this.timeoutMs, () => {
               const record = this.records.get(productId);
               if (!record) {
                    throw new NotFoundError('Product', productId);
               }

               const available = availableStock(record);
               if (available < quantity) {
                    throw new InsufficientStockError(productId, quantity, available);
               }

               record.reserved += quantity;

               const token: ReservationToken = Object.freeze({
                    id: randomUUID(),
                    productId,
                    quantity,
                    issuedFor,
               });
               this.outstanding.set(token.id, token);

               this.log.debug(
                    { productId, quantity, tokenId: token.id, reserved: record.reserved },
                    'Stock reserved'
               );
               return token;
          });
     }

     async release(token: ReservationToken): Promise<void> {
          await this.consume(token, 'RELEASED', (record) => {
               record.reserved -= token.quantity;
          });
          this.log.debug({ productId: token.productId, tokenId: token.id }, 'Reservation released');
     }

     async commit(token: ReservationToken): Promise<void> {
          await this.consume(token, 'COMMITTED', (record) => {
               record.reserved -= token.quantity;
               record.totalStock -= token.quantity;
          });
          this.log.debug({ productId: token.productId, tokenId: token.id }, 'Reservation committed');
     }

     async provision(productId: string, totalStock: number): Promise<InventoryRecord> {
          assertStockLevel(totalStock, productId);

          return this.mutex.runExclusive(productId, this.timeoutMs, () => {
               const record = this.records.get(productId);
               if (!record) {
                    const created = { productId, totalStock, reserved: 0 };
                    this.records.set(productId, created);
                    return { ...created };
               }

               if (totalStock < record.reserved) {
                    throw new InvalidInputError(
                         `Total stock ${totalStock} for product ${productId} is below reserved ${record.reserved}`
                    );
               }
               record.totalStock = totalStock;
               return { ...record };
          });
     }

     async getRecord(productId: string): Promise<InventoryRecord> {
          const record = this.records.get(productId);
          if (!record) {
               throw new NotFoundError('InventoryRecord', productId);
          }
          return { ...record };
     }

     private consume(
          token: ReservationToken,
          outcome: ConsumedOutcome,
          apply: (record: InventoryRecord) => void
     ): Promise<void> {
          return this.mutex.runExclusive(token.productId, this.timeoutMs, () => {
               const previous = this.consumed.get(token.id);
               if (previous) {
                    throw new InvalidTokenError(token.id, previous);
               }

               const held = this.outstanding.get(token.id);
               if (
                    !held ||
                    held.productId !== token.productId ||
                    held.quantity !== token.quantity
               ) {
                    throw new InvalidTokenError(token.id);
               }

               const record = this.records.get(held.productId);
               if (!record) {
                    throw new InvalidTokenError(token.id);
               }

               this.outstanding.delete(held.id);
               this.consumed.set(held.id, outcome);
               apply(record);
          });
     }
}
