import { BusyError } from './errors';

type Release = () => void;

interface Waiter {
     grant: (release: Release) => void;
     timer: NodeJS.Timeout;
}

/**
 * Per-key FIFO async lock. Holders of different keys never wait on each other.
 * A waiter that is not granted the lock within `timeoutMs` is rejected with BusyError.
 */
export class KeyedMutex {
     // Presence of a key means the lock is held; the array holds the queued waiters.
     private readonly queues = new Map<string, Waiter[]>();

     constructor(private readonly resourcePrefix: string = 'lock') {}

     isLocked(key: string): boolean {
          return this.queues.has(key);
     }

     acquire(key: string, timeoutMs: number): Promise<Release> {
          const queue = this.queues.get(key);

          if (!queue) {
               this.queues.set(key, []);
               return Promise.resolve(this.releaserFor(key));
          }

          return new Promise<Release>((resolve, reject) => {
               const waiter: Waiter = {
                    grant: resolve,
                    timer: setTimeout(() => {
                         const index = queue.indexOf(waiter);
                         if (index !== -1) {
                              queue.splice(index, 1);
                         }
                         reject(new BusyError(`${this.resourcePrefix}:${key}`, timeoutMs));
                    }, timeoutMs),
               };
               queue.push(waiter);
          });
     }

     async runExclusive<T>(key: string, timeoutMs: number, fn: () => Promise<T> | T): Promise<T> {
          const release = await this.acquire(key, timeoutMs);
          try {
               return await fn();
          } finally {
               release();
          }
     }

     private releaserFor(key: string): Release {
          let released = false;

          return () => {
               if (released) return;
               released = true;

               const queue = this.queues.get(key);
               const next = queue?.shift();
               if (next) {
                    clearTimeout(next.timer);
                    next.grant(this.releaserFor(key));
               } else {
                    this.queues.delete(key);
               }
          };
     }
}
