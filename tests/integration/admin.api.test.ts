import { FastifyInstance } from 'fastify';
import { registerAdminRoutes } from '../../services/admin-api/src/routes/admin';
import { TestServices, createClock, createTestFastify, createTestServices } from '../helpers/testUtils';

describe('Admin API - Integration Tests', () => {
     let app: FastifyInstance;
     let services: TestServices;
     let clock: ReturnType<typeof createClock>;

     beforeEach(async () => {
          clock = createClock();
          services = await createTestServices({ P1: { stock: 5, price: 1500 } }, { clock: clock.now });

          app = createTestFastify();
          await app.register(registerAdminRoutes, {
               prefix: '/admin',
               ledger: services.ledger,
               catalog: services.catalog,
               coordinator: services.coordinator,
          });
          await app.ready();
     });

     afterEach(async () => {
          await app.close();
     });

     describe('PUT /admin/products/:productId', () => {
          it('should create a product that can then be stocked and ordered', async () => {
               const created = await app.inject({
                    method: 'PUT',
                    url: '/admin/products/P7',
                    payload: { name: 'Enamel mug', unitPrice: 850 },
               });
               await app.inject({ method: 'PUT', url: '/admin/inventory/P7', payload: { totalStock: 4 } });

               expect(created.statusCode).toBe(200);
               expect(JSON.parse(created.body)).toEqual({ productId: 'P7', name: 'Enamel mug', unitPrice: 850 });
               const order = await services.coordinator.createOrder('user-1', [{ productId: 'P7', quantity: 2 }]);
               expect(order.total).toBe(1700);
          });

          it('should reject a negative price', async () => {
               const response = await app.inject({
                    method: 'PUT',
                    url: '/admin/products/P7',
                    payload: { name: 'Enamel mug', unitPrice: -1 },
               });

               expect(response.statusCode).toBe(400);
               await expect(services.catalog.exists('P7')).resolves.toBe(false);
          });
     });

     describe('GET /admin/orders/:id', () => {
          it("should return any user's order without its reservation tokens", async () => {
               await services.coordinator.createOrder('user-1', [{ productId: 'P1', quantity: 2 }]);

               const response = await app.inject({ method: 'GET', url: '/admin/orders/order-1' });

               expect(response.statusCode).toBe(200);
               const body = JSON.parse(response.body);
               expect(body).toMatchObject({ id: 'order-1', userId: 'user-1', status: 'PENDING', total: 3000 });
               expect(body).not.toHaveProperty('reservations');
          });

          it('should answer 404 for unknown orders', async () => {
               const response = await app.inject({ method: 'GET', url: '/admin/orders/missing' });

               expect(response.statusCode).toBe(404);
               expect(JSON.parse(response.body).message).toBe('Order missing not found');
          });
     });

     describe('PUT /admin/inventory/:productId', () => {
          it('should create an inventory record', async () => {
               const response = await app.inject({
                    method: 'PUT',
                    url: '/admin/inventory/P9',
                    payload: { totalStock: 7 },
               });

               expect(response.statusCode).toBe(200);
               expect(JSON.parse(response.body)).toEqual({
                    productId: 'P9',
                    totalStock: 7,
                    reserved: 0,
                    available: 7,
               });
          });

          it('should refuse to drop stock below what is reserved', async () => {
               await services.coordinator.createOrder('user-1', [{ productId: 'P1', quantity: 2 }]);

               const response = await app.inject({
                    method: 'PUT',
                    url: '/admin/inventory/P1',
                    payload: { totalStock: 1 },
               });

               expect(response.statusCode).toBe(400);
               expect(JSON.parse(response.body)).toEqual({
                    error: 'INVALID_INPUT',
                    message: 'Total stock 1 for product P1 is below reserved 2',
               });
          });

          it('should reject negative stock levels', async () => {
               const response = await app.inject({
                    method: 'PUT',
                    url: '/admin/inventory/P1',
                    payload: { totalStock: -3 },
               });

               expect(response.statusCode).toBe(400);
          });
     });

     describe('GET /admin/inventory/:productId', () => {
          it('should report reserved and available stock', async () => {
               await services.coordinator.createOrder('user-1', [{ productId: 'P1', quantity: 2 }]);

               const response = await app.inject({ method: 'GET', url: '/admin/inventory/P1' });

               expect(JSON.parse(response.body)).toEqual({
                    productId: 'P1',
                    totalStock: 5,
                    reserved: 2,
                    available: 3,
               });
          });

          it('should answer 404 for products without a record', async () => {
               const response = await app.inject({ method: 'GET', url: '/admin/inventory/P404' });

               expect(response.statusCode).toBe(404);
               expect(JSON.parse(response.body).message).toBe('InventoryRecord P404 not found');
          });
     });

     describe('POST /admin/orders/:id/complete', () => {
          it('should commit the order and remove its units from stock', async () => {
               await services.coordinator.createOrder('user-1', [{ productId: 'P1', quantity: 2 }]);

               const response = await app.inject({ method: 'POST', url: '/admin/orders/order-1/complete' });

               expect(response.statusCode).toBe(200);
               expect(JSON.parse(response.body).status).toBe('COMPLETED');
               expect(await services.ledger.getRecord('P1')).toEqual({
                    productId: 'P1',
                    totalStock: 3,
                    reserved: 0,
               });
          });

          it('should answer 409 for an order that is already completed', async () => {
               await services.coordinator.createOrder('user-1', [{ productId: 'P1', quantity: 2 }]);
               await services.coordinator.completeOrder('order-1');

               const response = await app.inject({ method: 'POST', url: '/admin/orders/order-1/complete' });

               expect(response.statusCode).toBe(409);
               expect(JSON.parse(response.body).message).toBe('Order order-1 is COMPLETED');
          });
     });

     describe('POST /admin/orders/expire', () => {
          it('should expire pending orders older than maxAgeMs', async () => {
               await services.coordinator.createOrder('user-1', [{ productId: 'P1', quantity: 2 }]);
               clock.advance(120_000);
               await services.coordinator.createOrder('user-2', [{ productId: 'P1', quantity: 1 }]);

               const response = await app.inject({
                    method: 'POST',
                    url: '/admin/orders/expire',
                    payload: { maxAgeMs: 60_000 },
               });

               expect(response.statusCode).toBe(200);
               expect(JSON.parse(response.body)).toEqual({ expired: ['order-1'] });
               expect((await services.ledger.getRecord('P1')).reserved).toBe(1);
          });
     });
});
