import { checkConnection, closePool, withConnection, withTransaction } from '@storefront/shared/src/db/client';
import { createMockPool } from '../helpers/testUtils';

describe('Database Client', () => {
     describe('checkConnection', () => {
          it('should return true when the database answers', async () => {
               const { pool, client } = createMockPool();
               client.query.mockResolvedValue({ rows: [{ '?column?': 1 }] });

               await expect(checkConnection(pool)).resolves.toBe(true);
               expect(client.query).toHaveBeenCalledWith('SELECT 1');
               expect(client.release).toHaveBeenCalledTimes(1);
          });

          it('should return false when a connection cannot be acquired', async () => {
               const { pool, connect } = createMockPool();
               connect.mockRejectedValueOnce(new Error('Connection failed'));

               await expect(checkConnection(pool)).resolves.toBe(false);
          });

          it('should return false and release the client when the query fails', async () => {
               const { pool, client } = createMockPool();
               client.query.mockRejectedValueOnce(new Error('terminating connection'));

               await expect(checkConnection(pool)).resolves.toBe(false);
               expect(client.release).toHaveBeenCalledTimes(1);
          });
     });

     describe('withTransaction', () => {
          it('should run the callback between BEGIN and COMMIT', async () => {
               const { pool, client } = createMockPool();
               client.query.mockResolvedValue({ rows: [] });
               const fn = jest.fn().mockResolvedValue('success');

               const result = await withTransaction(pool, fn);

               expect(result).toBe('success');
               expect(fn).toHaveBeenCalledWith(client);
               expect(client.query.mock.calls).toEqual([['BEGIN'], ['COMMIT']]);
               expect(client.release).toHaveBeenCalledTimes(1);
          });

          it('should roll back and rethrow when the callback fails', async () => {
               const { pool, client } = createMockPool();
               client.query.mockResolvedValue({ rows: [] });
               const error = new Error('Transaction failed');

               await expect(withTransaction(pool, jest.fn().mockRejectedValue(error))).rejects.toBe(
                    error
               );
               expect(client.query.mock.calls).toEqual([['BEGIN'], ['ROLLBACK']]);
               expect(client.release).toHaveBeenCalledTimes(1);
          });
     });

     describe('withConnection', () => {
          it('should release the client after the callback resolves', async () => {
               const { pool, client } = createMockPool();

               await expect(withConnection(pool, async () => 42)).resolves.toBe(42);
               expect(client.release).toHaveBeenCalledTimes(1);
          });
     });

     describe('closePool', () => {
          it('should end the pool', async () => {
               const { pool, end } = createMockPool();

               await closePool(pool);
               expect(end).toHaveBeenCalledTimes(1);
          });
     });
});
