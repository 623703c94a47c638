// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export type ResourceKind = 'Product' | 'Order' | 'InventoryRecord';

export class NotFoundError extends DomainError {
     constructor(
          public readonly kind: ResourceKind,
          public readonly id: string
     ) {
          super(`${kind} ${id} not found`, 'NOT_FOUND', 404);
     }
}

export class InsufficientStockError extends DomainError {
     constructor(
          public readonly productId: string,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(
               `Insufficient stock for product ${productId}: requested ${requested}, available ${available}`,
               'INSUFFICIENT_STOCK',
               409
          );
     }
}

export class InvalidStateError extends DomainError {
     constructor(
          public readonly orderId: string,
          public readonly currentStatus: string,
          detail?: string
     ) {
          super(
               detail
                    ? `Order ${orderId} is ${currentStatus}: ${detail}`
                    : `Order ${orderId} is ${currentStatus}`,
               'INVALID_STATE',
               409
          );
     }
}

export type ConsumedOutcome = 'RELEASED' | 'COMMITTED';

export class InvalidTokenError extends DomainError {
     /**
      * @param consumedAs - how the token was consumed, when the ledger still knows it
      */
     constructor(
          public readonly tokenId: string,
          public readonly consumedAs?: ConsumedOutcome
     ) {
          super(
               consumedAs
                    ? `Reservation token ${tokenId} was already ${consumedAs.toLowerCase()}`
                    : `Reservation token ${tokenId} is unknown or already consumed`,
               'INVALID_TOKEN',
               409
          );
     }
}

export class InvalidInputError extends DomainError {
     constructor(public readonly reason: string) {
          super(reason, 'INVALID_INPUT', 400);
     }
}

export class BusyError extends DomainError {
     constructor(
          public readonly resource: string,
          public readonly timeoutMs: number
     ) {
          super(`${resource} is busy: no progress within ${timeoutMs}ms`, 'BUSY', 503);
     }
}

export class StorageError extends DomainError {
     constructor(public readonly cause: unknown) {
          super(
               `Storage failure: ${cause instanceof Error ? cause.message : String(cause)}`,
               'STORAGE_ERROR',
               500
          );
     }
}
