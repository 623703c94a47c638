import { Pool } from 'pg';
import {
     ORDER_STATUSES,
     Order,
     OrderLine,
     OrderStatus,
     ReservationToken,
} from '../types/order.types';
import { NotFoundError, StorageError } from '../utils/errors';
import { OrderStore } from './order-store';

type OrderRow = {
     id: string;
     user_id: string;
     lines: unknown;
     reservations: unknown;
     total: number | string;
     status: string;
     idempotency_key: string | null;
     cancel_reason: string | null;
     created_at: Date;
     updated_at: Date;
};

const ORDER_COLUMNS = `
  id, user_id, lines, reservations, total, status,
  idempotency_key, cancel_reason, created_at, updated_at
`;

// invalid_text_representation, e.g. a malformed UUID literal
const INVALID_TEXT_REPRESENTATION = '22P02';

function isRecord(value: unknown): value is Record<string, unknown> {
     return typeof value === 'object' && value !== null;
}

function hasCode(error: unknown, code: string): boolean {
     return isRecord(error) && error.code === code;
}

function parseLines(value: unknown, orderId: string): OrderLine[] {
     if (!Array.isArray(value)) {
          throw new StorageError(new Error(`Order ${orderId} has malformed lines`));
     }
     return value.map((line: unknown) => {
          if (
               !isRecord(line) ||
               typeof line.productId !== 'string' ||
               typeof line.quantity !== 'number' ||
               typeof line.unitPrice !== 'number'
          ) {
               throw new StorageError(new Error(`Order ${orderId} has a malformed line`));
          }
          return { productId: line.productId, quantity: line.quantity, unitPrice: line.unitPrice };
     });
}

function parseReservations(value: unknown, orderId: string): ReservationToken[] {
     if (!Array.isArray(value)) {
          throw new StorageError(new Error(`Order ${orderId} has malformed reservations`));
     }
     return value.map((token: unknown) => {
          if (
               !isRecord(token) ||
               typeof token.id !== 'string' ||
               typeof token.productId !== 'string' ||
               typeof token.quantity !== 'number' ||
               typeof token.issuedFor !== 'string'
          ) {
               throw new StorageError(new Error(`Order ${orderId} has a malformed reservation`));
          }
          return {
               id: token.id,
               productId: token.productId,
               quantity: token.quantity,
               issuedFor: token.issuedFor,
          };
     });
}

function parseStatus(value: string, orderId: string): OrderStatus {
     const status = ORDER_STATUSES.find((candidate) => candidate === value);
     if (!status) {
          throw new StorageError(new Error(`Order ${orderId} has unknown status ${value}`));
     }
     return status;
}

function toOrder(row: OrderRow): Order {
     return {
          id: row.id,
          userId: row.user_id,
          lines: parseLines(row.lines, row.id),
          reservations: parseReservations(row.reservations, row.id),
          total: parseInt(String(row.total), 10),
          status: parseStatus(row.status, row.id),
          idempotencyKey: row.idempotency_key ?? undefined,
          cancelReason: row.cancel_reason ?? undefined,
          createdAt: row.created_at,
          updatedAt: row.updated_at,
     };
}

/**
 * OrderStore on the orders table. Every driver failure surfaces as StorageError.
 */
export class PgOrderStore implements OrderStore {
     constructor(private readonly pool: Pool) {}

     async create(order: Order): Promise<Order> {
          const rows = await this.query(
               `
      INSERT INTO orders (
        id, user_id, lines, reservations, total, status,
        idempotency_key, cancel_reason, created_at, updated_at
      ) VALUES ($1, $2, $3::jsonb, $4::jsonb, $5, $6, $7, $8, $9, $10)
      RETURNING ${ORDER_COLUMNS}
    `,
               [
                    order.id,
                    order.userId,
                    JSON.stringify(order.lines),
                    JSON.stringify(order.reservations),
                    order.total,
                    order.status,
                    order.idempotencyKey ?? null,
                    order.cancelReason ?? null,
                    order.createdAt,
                    order.updatedAt,
               ]
          );
          return toOrder(rows[0]);
     }

     async get(orderId: string): Promise<Order | undefined> {
          let rows: OrderRow[];
          try {
               ({ rows } = await this.pool.query<OrderRow>(
                    `SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1`,
                    [orderId]
               ));
          } catch (error) {
               // An id that is not a UUID cannot name any order
               if (hasCode(error, INVALID_TEXT_REPRESENTATION)) return undefined;
               throw new StorageError(error);
          }
          return rows.length > 0 ? toOrder(rows[0]) : undefined;
     }

     async update(order: Order): Promise<Order> {
          const rows = await this.query(
               `
      UPDATE orders
      SET status = $2,
          reservations = $3::jsonb,
          cancel_reason = $4,
          updated_at = $5
      WHERE id = $1
      RETURNING ${ORDER_COLUMNS}
    `,
               [
                    order.id,
                    order.status,
                    JSON.stringify(order.reservations),
                    order.cancelReason ?? null,
                    order.updatedAt,
               ]
          );

          if (rows.length === 0) {
               throw new NotFoundError('Order', order.id);
          }
          return toOrder(rows[0]);
     }

     async listByUser(userId: string): Promise<Order[]> {
          const rows = await this.query(
               `SELECT ${ORDER_COLUMNS} FROM orders WHERE user_id = $1 ORDER BY created_at ASC`,
               [userId]
          );
          return rows.map(toOrder);
     }

     async findByIdempotencyKey(userId: string, key: string): Promise<Order | undefined> {
          const rows = await this.query(
               `SELECT ${ORDER_COLUMNS} FROM orders WHERE user_id = $1 AND idempotency_key = $2`,
               [userId, key]
          );
          return rows.length > 0 ? toOrder(rows[0]) : undefined;
     }

     async listPendingCreatedBefore(cutoff: Date): Promise<Order[]> {
          const rows = await this.query(
               `
      SELECT ${ORDER_COLUMNS}
      FROM orders
      WHERE status = 'PENDING' AND created_at < $1
      ORDER BY created_at ASC
    `,
               [cutoff]
          );
          return rows.map(toOrder);
     }

     private async query(text: string, values: unknown[]): Promise<OrderRow[]> {
          try {
               const { rows } = await this.pool.query<OrderRow>(text, values);
               return rows;
          } catch (error) {
               throw new StorageError(error);
          }
     }
}
