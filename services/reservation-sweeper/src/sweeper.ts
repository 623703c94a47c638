import { Logger } from 'pino';
import { OrderCoordinator } from '@storefront/shared/src/services/order-coordinator';
import { createChildLogger } from '@storefront/shared/src/utils/logger';

export interface ReservationSweeperOptions {
     /** Age after which a PENDING order is expired; 0 disables the sweeper */
     pendingOrderTtlMs: number;
     sweepIntervalMs: number;
}

/**
 * Periodically cancels PENDING orders that were never completed so their
 * reservations return to available stock.
 */
export class ReservationSweeper {
     private timer: NodeJS.Timeout | null = null;
     private running: Promise<void> | null = null;
     private readonly log: Logger = createChildLogger({ component: 'reservation-sweeper' });

     constructor(
          private readonly coordinator: OrderCoordinator,
          private readonly options: ReservationSweeperOptions
     ) {}

     get enabled(): boolean {
          return this.options.pendingOrderTtlMs > 0;
     }

     start(): boolean {
          if (!this.enabled) {
               this.log.warn('PENDING_ORDER_TTL_MS is 0, stale order expiry disabled');
               return false;
          }
          if (this.timer) return true;

          this.log.info(
               {
                    pendingOrderTtlMs: this.options.pendingOrderTtlMs,
                    sweepIntervalMs: this.options.sweepIntervalMs,
               },
               'Starting reservation sweeper'
          );
          this.timer = setInterval(() => this.tick(), this.options.sweepIntervalMs);
          return true;
     }

     async stop(): Promise<void> {
          if (this.timer) {
               clearInterval(this.timer);
               this.timer = null;
          }
          if (this.running) {
               await this.running;
          }
          this.log.info('Reservation sweeper stopped');
     }

     async runOnce(): Promise<string[]> {
          const expired = await this.coordinator.expireStaleOrders(this.options.pendingOrderTtlMs);
          return expired.map((order) => order.id);
     }

     private tick(): void {
          // A slow sweep is never overlapped by the next one
          if (this.running) return;

          this.running = this.runOnce()
               .then((ids) => {
                    if (ids.length > 0) {
                         this.log.info({ expired: ids }, 'Expired stale orders');
                    }
               })
               .catch((err: unknown) => {
                    this.log.error({ err }, 'Stale order sweep failed');
               })
               .finally(() => {
                    this.running = null;
               });
     }
}
