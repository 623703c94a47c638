import { randomUUID } from 'node:crypto';
import { OrderStore } from '../repositories/order-store';
import { ProductCatalog } from '../repositories/product-catalog';
import {
     CancelReason,
     CreateOrderOptions,
     Order,
     OrderLine,
     OrderLineRequest,
     ReservationToken,
     orderTotal,
} from '../types/order.types';
import {
     BusyError,
     ConsumedOutcome,
     DomainError,
     InvalidInputError,
     InvalidStateError,
     InvalidTokenError,
     NotFoundError,
     StorageError,
} from '../utils/errors';
import { KeyedMutex } from '../utils/keyed-mutex';
import { createChildLogger } from '../utils/logger';
import { InventoryLedger, assertPositiveQuantity } from './inventory-ledger';

export interface OrderCoordinatorDeps {
     ledger: InventoryLedger;
     store: OrderStore;
     catalog: ProductCatalog;
     clock?: () => Date;
     generateId?: () => string;
     /** Upper bound on waiting for another mutation of the same order */
     orderLockTimeoutMs?: number;
}

const DEFAULT_ORDER_LOCK_TIMEOUT_MS = 5000;

function compareByProductId(a: OrderLine, b: OrderLine): number {
     if (a.productId < b.productId) return -1;
     if (a.productId > b.productId) return 1;
     return 0;
}

/**
 * Drives the all-or-nothing reservation protocol for multi-line orders and the
 * order state machine: PENDING -> CANCELLED | COMPLETED, both terminal.
 */
export class OrderCoordinator {
     private readonly ledger: InventoryLedger;
     private readonly store: OrderStore;
     private readonly catalog: ProductCatalog;
     private readonly clock: () => Date;
     private readonly generateId: () => string;
     private readonly lockTimeoutMs: number;
     private readonly orderLocks = new KeyedMutex('order');
     private readonly idempotencyLocks = new KeyedMutex('idempotency-key');
     private readonly log = createChildLogger({ component: 'order-coordinator' });

     constructor(deps: OrderCoordinatorDeps) {
          this.ledger = deps.ledger;
          this.store = deps.store;
          this.catalog = deps.catalog;
          this.clock = deps.clock ?? (() => new Date());
          this.generateId = deps.generateId ?? randomUUID;
          this.lockTimeoutMs = deps.orderLockTimeoutMs ?? DEFAULT_ORDER_LOCK_TIMEOUT_MS;
     }

     /**
      * Reserve stock for every line and persist a PENDING order. On any failure the
      * reservations taken so far are released before the error is rethrown.
      */
     async createOrder(
          userId: string,
          lines: OrderLineRequest[],
          options: CreateOrderOptions = {}
     ): Promise<Order> {
          if (!userId) {
               throw new InvalidInputError('User id is required');
          }
          if (!lines || lines.length === 0) {
               throw new InvalidInputError('Order must contain at least one line');
          }
          for (const line of lines) {
               assertPositiveQuantity(line.quantity, `product ${line.productId}`);
          }

          const { idempotencyKey } = options;
          if (!idempotencyKey) {
               return this.placeOrder(userId, lines);
          }

          // Keys are scoped to the user that sent them
          const lockKey = `${userId}:${idempotencyKey}`;
          return this.idempotencyLocks.runExclusive(lockKey, this.lockTimeoutMs, async () => {
               const existing = await this.storage(() =>
                    this.store.findByIdempotencyKey(userId, idempotencyKey)
               );
               if (existing) {
                    this.log.info(
                         { orderId: existing.id, idempotencyKey },
                         'Idempotency key already used, returning existing order'
                    );
                    return existing;
               }
               return this.placeOrder(userId, lines, idempotencyKey);
          });
     }

     async cancelOrder(
          orderId: string,
          requestingUserId: string,
          reason: CancelReason = 'CUSTOMER_CANCELLED'
     ): Promise<Order> {
          return this.orderLocks.runExclusive(orderId, this.lockTimeoutMs, async () => {
               const order = await this.getOrder(orderId);
               if (order.status !== 'PENDING') {
                    this.log.warn({ orderId, status: order.status }, 'Cannot cancel order');
                    throw new InvalidStateError(orderId, order.status);
               }

               await this.consumeAll(order, 'RELEASED', (token) => this.ledger.release(token));

               const cancelled: Order = {
                    ...order,
                    status: 'CANCELLED',
                    reservations: [],
                    cancelReason: reason,
                    updatedAt: this.clock(),
               };
               const saved = await this.storage(() => this.store.update(cancelled));

               this.log.info({ orderId, requestingUserId, reason }, 'Order cancelled');
               return saved;
          });
     }

     /**
      * Fulfillment trigger: the held stock leaves the warehouse.
      */
     async completeOrder(orderId: string): Promise<Order> {
          return this.orderLocks.runExclusive(orderId, this.lockTimeoutMs, async () => {
               const order = await this.getOrder(orderId);
               if (order.status !== 'PENDING') {
                    throw new InvalidStateError(orderId, order.status);
               }

               await this.consumeAll(order, 'COMMITTED', (token) => this.ledger.commit(token));

               const completed: Order = {
                    ...order,
                    status: 'COMPLETED',
                    reservations: [],
                    updatedAt: this.clock(),
               };
               const saved = await this.storage(() => this.store.update(completed));

               this.log.info({ orderId }, 'Order completed');
               return saved;
          });
     }

     /**
      * Cancel every PENDING order created more than `maxAgeMs` ago.
      */
     async expireStaleOrders(maxAgeMs: number): Promise<Order[]> {
          const cutoff = new Date(this.clock().getTime() - maxAgeMs);
          const stale = await this.storage(() => this.store.listPendingCreatedBefore(cutoff));
          const expired: Order[] = [];

          for (const order of stale) {
               try {
                    expired.push(await this.cancelOrder(order.id, 'system', 'EXPIRED'));
               } catch (error) {
                    if (error instanceof InvalidStateError) {
                         // completed or cancelled since the listing
                         continue;
                    }
                    this.log.error({ err: error, orderId: order.id }, 'Failed to expire order');
               }
          }

          if (stale.length > 0) {
               this.log.info(
                    { candidates: stale.length, expired: expired.length, cutoff },
                    'Stale order sweep finished'
               );
          }
          return expired;
     }

     async getOrder(orderId: string): Promise<Order> {
          const order = await this.storage(() => this.store.get(orderId));
          if (!order) {
               throw new NotFoundError('Order', orderId);
          }
          return order;
     }

     async getUserOrders(userId: string): Promise<Order[]> {
          return this.storage(() => this.store.listByUser(userId));
     }

     private async placeOrder(
          userId: string,
          requested: OrderLineRequest[],
          idempotencyKey?: string
     ): Promise<Order> {
          const orderId = this.generateId();
          const lines = await this.priceLines(requested);

          this.log.info({ orderId, userId, lineCount: lines.length }, 'Creating order');

          // Fixed global acquisition order across products
          const reservationOrder = [...lines].sort(compareByProductId);
          const reserved: ReservationToken[] = [];

          try {
               for (const line of reservationOrder) {
                    reserved.push(
                         await this.ledger.tryReserve(line.productId, line.quantity, orderId)
                    );
               }
          } catch (error) {
               await this.rollback(orderId, reserved);
               throw error;
          }

          const now = this.clock();
          const order: Order = {
               id: orderId,
               userId,
               lines,
               total: orderTotal(lines),
               status: 'PENDING',
               reservations: reserved,
               idempotencyKey,
               createdAt: now,
               updatedAt: now,
          };

          let saved: Order;
          try {
               saved = await this.store.create(order);
          } catch (error) {
               this.log.error({ err: error, orderId }, 'Failed to persist order');
               await this.rollback(orderId, reserved);
               throw error instanceof StorageError ? error : new StorageError(error);
          }

          this.log.info({ orderId, total: saved.total }, 'Order created successfully');
          return saved;
     }

     private async priceLines(requested: OrderLineRequest[]): Promise<OrderLine[]> {
          const lines: OrderLine[] = [];
          for (const { productId, quantity } of requested) {
               const exists = await this.storage(() => this.catalog.exists(productId));
               if (!exists) {
                    throw new NotFoundError('Product', productId);
               }
               const unitPrice = await this.storage(() => this.catalog.unitPrice(productId));
               lines.push({ productId, quantity, unitPrice });
          }
          return lines;
     }

     /**
      * Compensating release of the tokens taken by a failed createOrder call. Every
      * token is attempted; the first release that could not be made is rethrown.
      */
     private async rollback(orderId: string, tokens: ReservationToken[]): Promise<void> {
          let failure: unknown;

          for (const token of [...tokens].reverse()) {
               try {
                    await this.releaseWhenFree(orderId, token);
               } catch (error) {
                    this.log.error(
                         { err: error, orderId, tokenId: token.id, productId: token.productId },
                         'Failed to release reservation during rollback'
                    );
                    if (failure === undefined) failure = error;
               }
          }

          if (tokens.length > 0) {
               this.log.warn({ orderId, released: tokens.length }, 'Order reservations rolled back');
          }
          if (failure !== undefined) {
               throw failure instanceof DomainError ? failure : new StorageError(failure);
          }
     }

     /**
      * A contended product delays a compensating release but never cancels it.
      */
     private async releaseWhenFree(orderId: string, token: ReservationToken): Promise<void> {
          for (;;) {
               try {
                    await this.ledger.release(token);
                    return;
               } catch (error) {
                    if (!(error instanceof BusyError)) throw error;
                    this.log.warn(
                         { orderId, tokenId: token.id, productId: token.productId },
                         'Product busy during rollback, retrying release'
                    );
               }
          }
     }

     /**
      * Consume every token an order holds. A token the ledger reports as consumed with
      * the same outcome was handled by an earlier attempt that failed before the order
      * was saved; any other outcome means the order cannot take this transition.
      */
     private async consumeAll(
          order: Order,
          outcome: ConsumedOutcome,
          consume: (token: ReservationToken) => Promise<void>
     ): Promise<void> {
          for (const token of order.reservations) {
               try {
                    await consume(token);
               } catch (error) {
                    if (!(error instanceof InvalidTokenError)) {
                         throw error;
                    }
                    if (error.consumedAs !== outcome) {
                         throw new InvalidStateError(
                              order.id,
                              order.status,
                              error.consumedAs
                                   ? `reservation ${token.id} was already ${error.consumedAs.toLowerCase()}`
                                   : `reservation ${token.id} is unknown to the ledger`
                         );
                    }
                    this.log.warn(
                         { orderId: order.id, tokenId: token.id, outcome },
                         'Reservation already consumed'
                    );
               }
          }
     }

     private async storage<T>(fn: () => Promise<T>): Promise<T> {
          try {
               return await fn();
          } catch (error) {
               if (error instanceof DomainError) throw error;
               throw new StorageError(error);
          }
     }
}
