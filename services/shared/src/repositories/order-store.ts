import { Order } from '../types/order.types';
import { NotFoundError, StorageError } from '../utils/errors';

/**
 * Durable CRUD for orders. Implementations are expected to serialize writes per order id.
 */
export interface OrderStore {
     create(order: Order): Promise<Order>;
     get(orderId: string): Promise<Order | undefined>;
     update(order: Order): Promise<Order>;
     listByUser(userId: string): Promise<Order[]>;
     /** Idempotency keys are unique per user */
     findByIdempotencyKey(userId: string, key: string): Promise<Order | undefined>;
     listPendingCreatedBefore(cutoff: Date): Promise<Order[]>;
}

function byCreatedAt(a: Order, b: Order): number {
     return a.createdAt.getTime() - b.createdAt.getTime();
}

export class InMemoryOrderStore implements OrderStore {
     private readonly orders = new Map<string, Order>();

     async create(order: Order): Promise<Order> {
          if (this.orders.has(order.id)) {
               throw new StorageError(new Error(`Order ${order.id} already exists`));
          }
          if (
               order.idempotencyKey &&
               (await this.findByIdempotencyKey(order.userId, order.idempotencyKey))
          ) {
               throw new StorageError(
                    new Error(`Idempotency key ${order.idempotencyKey} already used`)
               );
          }

          this.orders.set(order.id, structuredClone(order));
          return structuredClone(order);
     }

     async get(orderId: string): Promise<Order | undefined> {
          const order = this.orders.get(orderId);
          return order ? structuredClone(order) : undefined;
     }

     async update(order: Order): Promise<Order> {
          if (!this.orders.has(order.id)) {
               throw new NotFoundError('Order', order.id);
          }
          this.orders.set(order.id, structuredClone(order));
          return structuredClone(order);
     }

     async listByUser(userId: string): Promise<Order[]> {
          return [...this.orders.values()]
               .filter((order) => order.userId === userId)
               .sort(byCreatedAt)
               .map((order) => structuredClone(order));
     }

     async findByIdempotencyKey(userId: string, key: string): Promise<Order | undefined> {
          for (const order of this.orders.values()) {
               if (order.userId === userId && order.idempotencyKey === key) {
                    return structuredClone(order);
               }
          }
          return undefined;
     }

     async listPendingCreatedBefore(cutoff: Date): Promise<Order[]> {
          return [...this.orders.values()]
               .filter(
                    (order) =>
                         order.status === 'PENDING' && order.createdAt.getTime() < cutoff.getTime()
               )
               .sort(byCreatedAt)
               .map((order) => structuredClone(order));
     }
}
