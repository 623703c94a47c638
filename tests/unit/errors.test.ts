import {
     BusyError,
     DomainError,
     InsufficientStockError,
     InvalidInputError,
     InvalidStateError,
     InvalidTokenError,
     NotFoundError,
     StorageError,
} from '@storefront/shared/src/utils/errors';

describe('Error Classes', () => {
     describe('DomainError', () => {
          it('should create a domain error with message and code', () => {
               const error = new DomainError('Test error', 'TEST_CODE');
               expect(error.message).toBe('Test error');
               expect(error.code).toBe('TEST_CODE');
               expect(error.statusCode).toBe(400);
               expect(error.name).toBe('DomainError');
               expect(error instanceof Error).toBe(true);
          });

          it('should accept custom status code', () => {
               const error = new DomainError('Test error', 'TEST_CODE', 500);
               expect(error.statusCode).toBe(500);
          });
     });

     describe('NotFoundError', () => {
          it('should name the kind and id', () => {
               const error = new NotFoundError('Order', 'order-7');
               expect(error.message).toBe('Order order-7 not found');
               expect(error.code).toBe('NOT_FOUND');
               expect(error.statusCode).toBe(404);
               expect(error.kind).toBe('Order');
               expect(error.id).toBe('order-7');
          });
     });

     describe('InsufficientStockError', () => {
          it('should carry product, requested and available quantities', () => {
               const error = new InsufficientStockError('P1', 3, 2);
               expect(error.message).toBe('Insufficient stock for product P1: requested 3, available 2');
               expect(error.code).toBe('INSUFFICIENT_STOCK');
               expect(error.statusCode).toBe(409);
               expect(error.productId).toBe('P1');
               expect(error.requested).toBe(3);
               expect(error.available).toBe(2);
               expect(error.name).toBe('InsufficientStockError');
          });
     });

     describe('InvalidStateError', () => {
          it('should name the order and its current status', () => {
               const error = new InvalidStateError('order-1', 'CANCELLED');
               expect(error.message).toBe('Order order-1 is CANCELLED');
               expect(error.code).toBe('INVALID_STATE');
               expect(error.statusCode).toBe(409);
               expect(error.currentStatus).toBe('CANCELLED');
          });

          it('should append a detail when given', () => {
               const error = new InvalidStateError('order-1', 'PENDING', 'reservation tok-1 was already released');
               expect(error.message).toBe('Order order-1 is PENDING: reservation tok-1 was already released');
          });
     });

     describe('InvalidTokenError', () => {
          it('should name the token', () => {
               const error = new InvalidTokenError('tok-1');
               expect(error.message).toContain('tok-1');
               expect(error.code).toBe('INVALID_TOKEN');
               expect(error.tokenId).toBe('tok-1');
               expect(error.consumedAs).toBeUndefined();
          });

          it('should report how a consumed token was used', () => {
               const error = new InvalidTokenError('tok-1', 'COMMITTED');
               expect(error.message).toBe('Reservation token tok-1 was already committed');
               expect(error.consumedAs).toBe('COMMITTED');
          });
     });

     describe('InvalidInputError', () => {
          it('should use the reason as message', () => {
               const error = new InvalidInputError('Order must contain at least one line');
               expect(error.message).toBe('Order must contain at least one line');
               expect(error.reason).toBe('Order must contain at least one line');
               expect(error.code).toBe('INVALID_INPUT');
               expect(error.statusCode).toBe(400);
          });
     });

     describe('BusyError', () => {
          it('should name the resource and timeout', () => {
               const error = new BusyError('inventory:P1', 250);
               expect(error.message).toBe('inventory:P1 is busy: no progress within 250ms');
               expect(error.code).toBe('BUSY');
               expect(error.statusCode).toBe(503);
               expect(error.resource).toBe('inventory:P1');
               expect(error.timeoutMs).toBe(250);
          });
     });

     describe('StorageError', () => {
          it('should wrap the underlying cause', () => {
               const cause = new Error('connection reset');
               const error = new StorageError(cause);
               expect(error.message).toBe('Storage failure: connection reset');
               expect(error.code).toBe('STORAGE_ERROR');
               expect(error.statusCode).toBe(500);
               expect(error.cause).toBe(cause);
          });

          it('should stringify non-error causes', () => {
               expect(new StorageError('disk full').message).toBe('Storage failure: disk full');
          });
     });

     describe('Error inheritance', () => {
          it('should maintain error stack traces', () => {
               const error = new DomainError('Test', 'TEST');
               expect(error.stack).toBeDefined();
               expect(error.stack).toContain('DomainError');
          });

          it('should be catchable as Error', () => {
               try {
                    throw new InsufficientStockError('P1', 10, 5);
               } catch (error) {
                    expect(error instanceof Error).toBe(true);
                    expect(error instanceof DomainError).toBe(true);
               }
          });
     });
});
