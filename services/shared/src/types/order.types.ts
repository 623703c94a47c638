// Type definitions for domain models

export type OrderStatus = 'PENDING' | 'CANCELLED' | 'COMPLETED';

export const ORDER_STATUSES: readonly OrderStatus[] = ['PENDING', 'CANCELLED', 'COMPLETED'];

/**
 * issuedFor marker on tokens granted before the order that owns them is persisted
 */
export const PENDING_ORDER = 'PENDING_ORDER';

export interface OrderLineRequest {
     productId: string;
     quantity: number;
}

/**
 * unitPrice is in minor currency units (cents)
 */
export interface OrderLine {
     productId: string;
     quantity: number;
     unitPrice: number;
}

export interface ReservationToken {
     readonly id: string;
     readonly productId: string;
     readonly quantity: number;
     readonly issuedFor: string;
}

export interface Order {
     id: string;
     userId: string;
     lines: OrderLine[];
     total: number;
     status: OrderStatus;
     reservations: ReservationToken[];
     idempotencyKey?: string;
     cancelReason?: string;
     createdAt: Date;
     updatedAt: Date;
}

/**
 * unitPrice is in minor currency units (cents)
 */
export interface Product {
     productId: string;
     name: string;
     unitPrice: number;
}

export interface InventoryRecord {
     productId: string;
     totalStock: number;
     reserved: number;
}

export interface CreateOrderOptions {
     idempotencyKey?: string;
}

export type CancelReason = 'CUSTOMER_CANCELLED' | 'EXPIRED' | (string & {});

export function availableStock(record: InventoryRecord): number {
     return record.totalStock - record.reserved;
}

export function orderTotal(lines: OrderLine[]): number {
     return lines.reduce((sum, line) => sum + line.unitPrice * line.quantity, 0);
}

/**
 * Wire shape of an order. Reservation tokens stay inside the service.
 */
export interface OrderView {
     id: string;
     userId: string;
     lines: OrderLine[];
     total: number;
     status: OrderStatus;
     cancelReason?: string;
     createdAt: string;
     updatedAt: string;
}

export function toOrderView(order: Order): OrderView {
     return {
          id: order.id,
          userId: order.userId,
          lines: order.lines.map((line) => ({ ...line })),
          total: order.total,
          status: order.status,
          cancelReason: order.cancelReason,
          createdAt: order.createdAt.toISOString(),
          updatedAt: order.updatedAt.toISOString(),
     };
}
