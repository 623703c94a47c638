import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { OrderCoordinator } from '@storefront/shared/src/services/order-coordinator';
import { DomainError } from '@storefront/shared/src/utils/errors';
import { OrderLineRequest, toOrderView } from '@storefront/shared/src/types/order.types';
import {
     cancelOrderSchema,
     createOrderSchema,
     getOrderSchema,
     listOrdersSchema,
} from '../schemas/orders.schemas';

export interface OrderRoutesOptions {
     coordinator: OrderCoordinator;
}

interface OrderParams {
     id: string;
}

interface CreateOrderBody {
     lines: OrderLineRequest[];
     idempotencyKey?: string;
}

function callerId(request: FastifyRequest): string | undefined {
     const header = request.headers['x-user-id'];
     const value = Array.isArray(header) ? header[0] : header;
     return value && value.trim() !== '' ? value.trim() : undefined;
}

function sendError(request: FastifyRequest, reply: FastifyReply, error: unknown, action: string) {
     if (error instanceof DomainError) {
          if (error.statusCode >= 500) {
               request.log.error({ err: error }, `Failed to ${action}`);
          }
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

function unauthenticated(reply: FastifyReply) {
     return reply.code(401).send({
          error: 'UNAUTHENTICATED',
          message: 'x-user-id header is required',
     });
}

function forbidden(reply: FastifyReply) {
     return reply.code(403).send({
          error: 'FORBIDDEN',
          message: 'Order is owned by another user',
     });
}

export async function registerOrderRoutes(app: FastifyInstance, opts: OrderRoutesOptions) {
     const { coordinator } = opts;

     // Create an order for the caller
     app.post<{ Body: CreateOrderBody }>(
          '/',
          { schema: createOrderSchema },
          async (request, reply) => {
               const userId = callerId(request);
               if (!userId) return unauthenticated(reply);

               try {
                    const order = await coordinator.createOrder(userId, request.body.lines, {
                         idempotencyKey: request.body.idempotencyKey,
                    });
                    return reply.code(201).send(toOrderView(order));
               } catch (error) {
                    return sendError(request, reply, error, 'create order');
               }
          }
     );

     // List the caller's orders
     app.get('/', { schema: listOrdersSchema }, async (request, reply) => {
          const userId = callerId(request);
          if (!userId) return unauthenticated(reply);

          try {
               const orders = await coordinator.getUserOrders(userId);
               return reply.send(orders.map(toOrderView));
          } catch (error) {
               return sendError(request, reply, error, 'list orders');
          }
     });

     // Get a single order owned by the caller
     app.get<{ Params: OrderParams }>(
          '/:id',
          { schema: getOrderSchema },
          async (request, reply) => {
               const userId = callerId(request);
               if (!userId) return unauthenticated(reply);

               try {
                    const order = await coordinator.getOrder(request.params.id);
                    if (order.userId !== userId) return forbidden(reply);
                    return reply.send(toOrderView(order));
               } catch (error) {
                    return sendError(request, reply, error, 'get order');
               }
          }
     );

     // Cancel a pending order owned by the caller
     app.delete<{ Params: OrderParams }>(
          '/:id',
          { schema: cancelOrderSchema },
          async (request, reply) => {
               const userId = callerId(request);
               if (!userId) return unauthenticated(reply);

               try {
                    const order = await coordinator.getOrder(request.params.id);
                    if (order.userId !== userId) return forbidden(reply);

                    const cancelled = await coordinator.cancelOrder(order.id, userId);
                    return reply.send(toOrderView(cancelled));
               } catch (error) {
                    return sendError(request, reply, error, 'cancel order');
               }
          }
     );
}
