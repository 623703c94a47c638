import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { InventoryLedger } from '@storefront/shared/src/services/inventory-ledger';
import { ProductCatalog } from '@storefront/shared/src/repositories/product-catalog';
import { OrderCoordinator } from '@storefront/shared/src/services/order-coordinator';
import { DomainError } from '@storefront/shared/src/utils/errors';
import { InventoryRecord, availableStock, toOrderView } from '@storefront/shared/src/types/order.types';
import {
     completeOrderSchema,
     expireOrdersSchema,
     getInventorySchema,
     getOrderSchema,
     provisionInventorySchema,
     upsertProductSchema,
} from '../schemas/admin.schemas';

export interface AdminRoutesOptions {
     ledger: InventoryLedger;
     catalog: ProductCatalog;
     coordinator: OrderCoordinator;
}

function toInventoryView(record: InventoryRecord) {
     return { ...record, available: availableStock(record) };
}

function sendError(request: FastifyRequest, reply: FastifyReply, error: unknown, action: string) {
     if (error instanceof DomainError) {
          return reply.code(error.statusCode).send({
               error: error.code,
               message: error.message,
          });
     }

     request.log.error({ err: error }, `Failed to ${action}`);
     return reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
     });
}

export async function registerAdminRoutes(app: FastifyInstance, opts: AdminRoutesOptions) {
     const { ledger, catalog, coordinator } = opts;

     // Create or reprice a product; stock is provisioned separately
     app.put<{ Params: { productId: string }; Body: { name: string; unitPrice: number } }>(
          '/products/:productId',
          { schema: upsertProductSchema },
          async (request, reply) => {
               try {
                    const product = await catalog.upsert({
                         productId: request.params.productId,
                         name: request.body.name,
                         unitPrice: request.body.unitPrice,
                    });
                    request.log.info(
                         { productId: product.productId, unitPrice: product.unitPrice },
                         'Product upserted'
                    );
                    return reply.send(product);
               } catch (error) {
                    return sendError(request, reply, error, 'upsert product');
               }
          }
     );

     // Provision or restock a product
     app.put<{ Params: { productId: string }; Body: { totalStock: number } }>(
          '/inventory/:productId',
          { schema: provisionInventorySchema },
          async (request, reply) => {
               try {
                    const record = await ledger.provision(
                         request.params.productId,
                         request.body.totalStock
                    );
                    request.log.info(
                         { productId: record.productId, totalStock: record.totalStock },
                         'Inventory provisioned'
                    );
                    return reply.send(toInventoryView(record));
               } catch (error) {
                    return sendError(request, reply, error, 'provision inventory');
               }
          }
     );

     app.get<{ Params: { productId: string } }>(
          '/inventory/:productId',
          { schema: getInventorySchema },
          async (request, reply) => {
               try {
                    const record = await ledger.getRecord(request.params.productId);
                    return reply.send(toInventoryView(record));
               } catch (error) {
                    return sendError(request, reply, error, 'get inventory');
               }
          }
     );

     // Any user's order, reservations excluded
     app.get<{ Params: { id: string } }>(
          '/orders/:id',
          { schema: getOrderSchema },
          async (request, reply) => {
               try {
                    const order = await coordinator.getOrder(request.params.id);
                    return reply.send(toOrderView(order));
               } catch (error) {
                    return sendError(request, reply, error, 'get order');
               }
          }
     );

     // Fulfillment trigger
     app.post<{ Params: { id: string } }>(
          '/orders/:id/complete',
          { schema: completeOrderSchema },
          async (request, reply) => {
               try {
                    const order = await coordinator.completeOrder(request.params.id);
                    return reply.send(toOrderView(order));
               } catch (error) {
                    return sendError(request, reply, error, 'complete order');
               }
          }
     );

     // Manual stale order sweep
     app.post<{ Body: { maxAgeMs: number } }>(
          '/orders/expire',
          { schema: expireOrdersSchema },
          async (request, reply) => {
               try {
                    const expired = await coordinator.expireStaleOrders(request.body.maxAgeMs);
                    return reply.send({ expired: expired.map((order) => order.id) });
               } catch (error) {
                    return sendError(request, reply, error, 'expire orders');
               }
          }
     );
}
