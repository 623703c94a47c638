import { KeyedMutex } from '@storefront/shared/src/utils/keyed-mutex';
import { BusyError } from '@storefront/shared/src/utils/errors';

describe('KeyedMutex', () => {
     it('should grant the lock immediately when free', async () => {
          const mutex = new KeyedMutex();
          const release = await mutex.acquire('P1', 100);

          expect(mutex.isLocked('P1')).toBe(true);
          release();
          expect(mutex.isLocked('P1')).toBe(false);
     });

     it('should hand the lock to waiters in FIFO order', async () => {
          const mutex = new KeyedMutex();
          const order: string[] = [];

          const first = await mutex.acquire('P1', 1000);
          const second = mutex.acquire('P1', 1000).then((release) => {
               order.push('second');
               release();
          });
          const third = mutex.acquire('P1', 1000).then((release) => {
               order.push('third');
               release();
          });

          order.push('first');
          first();
          await Promise.all([second, third]);

          expect(order).toEqual(['first', 'second', 'third']);
          expect(mutex.isLocked('P1')).toBe(false);
     });

     it('should not block different keys', async () => {
          const mutex = new KeyedMutex();
          const releaseP1 = await mutex.acquire('P1', 100);
          const releaseP2 = await mutex.acquire('P2', 100);

          expect(mutex.isLocked('P1')).toBe(true);
          expect(mutex.isLocked('P2')).toBe(true);
          releaseP1();
          releaseP2();
     });

     it('should reject with BusyError when the wait times out', async () => {
          const mutex = new KeyedMutex('inventory');
          const release = await mutex.acquire('P1', 1000);

          await expect(mutex.acquire('P1', 20)).rejects.toThrow(BusyError);
          await expect(mutex.acquire('P1', 20)).rejects.toThrow(
               'inventory:P1 is busy: no progress within 20ms'
          );

          // timed-out waiters never receive the lock
          release();
          expect(mutex.isLocked('P1')).toBe(false);
     });

     it('should ignore a second release call', async () => {
          const mutex = new KeyedMutex();
          const release = await mutex.acquire('P1', 100);
          const waiter = mutex.acquire('P1', 1000);

          release();
          release();

          const next = await waiter;
          expect(mutex.isLocked('P1')).toBe(true);
          next();
          expect(mutex.isLocked('P1')).toBe(false);
     });

     describe('runExclusive', () => {
          it('should release the lock when the callback throws', async () => {
               const mutex = new KeyedMutex();

               await expect(
                    mutex.runExclusive('P1', 100, () => {
                         throw new Error('boom');
                    })
               ).rejects.toThrow('boom');
               expect(mutex.isLocked('P1')).toBe(false);
          });

          it('should serialize async critical sections on the same key', async () => {
               const mutex = new KeyedMutex();
               let inside = 0;
               let maxInside = 0;

               await Promise.all(
                    Array.from({ length: 5 }, () =>
                         mutex.runExclusive('P1', 1000, async () => {
                              inside++;
                              maxInside = Math.max(maxInside, inside);
                              await new Promise<void>((resolve) => setTimeout(resolve, 5));
                              inside--;
                         })
                    )
               );

               expect(maxInside).toBe(1);
          });
     });
});
