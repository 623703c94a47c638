import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import * as dotenv from 'dotenv';
import { registerOrderRoutes } from './routes/orders';
import { checkConnection, closePool, createPool } from '@storefront/shared/src/db/client';
import { createPgServices } from '@storefront/shared/src/services/factory';
import { loadConfig } from '@storefront/shared/src/utils/config';
import { logger } from '@storefront/shared/src/utils/logger';

// Load environment variables
dotenv.config();

async function main() {
     const config = loadConfig();
     const pool = createPool(config.database);
     const { coordinator } = createPgServices(pool, config);
     const { host, port } = config.ordersApi;

     const app = Fastify({
          logger: { level: process.env.LOG_LEVEL || 'info' },
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => {
               const header = req.headers['x-correlation-id'];
               return (Array.isArray(header) ? header[0] : header) || `req-${Date.now()}`;
          },
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     // CORS
     await app.register(cors, {
          origin: true,
     });

     // OpenAPI/Swagger
     await app.register(swagger, {
          openapi: {
               info: {
                    title: 'Storefront Orders API',
                    description: 'Order placement and cancellation with all-or-nothing stock reservation',
                    version: '1.0.0',
               },
               servers: [{ url: `http://localhost:${port}`, description: 'Development' }],
               tags: [
                    { name: 'orders', description: 'Order lifecycle operations' },
                    { name: 'health', description: 'Health and readiness checks' },
               ],
          },
     });

     await app.register(swaggerUi, {
          routePrefix: '/docs',
          uiConfig: {
               docExpansion: 'list',
               deepLinking: true,
          },
     });

     // Health checks
     app.get(
          '/health',
          {
               schema: {
                    tags: ['health'],
                    description: 'Basic health check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ok' },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          async () => {
               return {
                    status: 'ok',
                    timestamp: new Date().toISOString(),
               };
          }
     );

     app.get(
          '/health/ready',
          { schema: { tags: ['health'], description: 'Readiness check with dependency validation' } },
          async (_request, reply) => {
               const dbHealthy = await checkConnection(pool);
               if (!dbHealthy) {
                    reply.code(503);
                    return { status: 'not_ready', error: 'Database connection failed' };
               }
               return { status: 'ready', dependencies: { database: 'ok' } };
          }
     );

     await app.register(registerOrderRoutes, { prefix: '/orders', coordinator });

     // Graceful shutdown
     const shutdown = () => {
          logger.info('Shutting down gracefully...');
          app.close()
               .then(() => closePool(pool))
               .then(
                    () => process.exit(0),
                    (err: unknown) => {
                         logger.error({ err }, 'Shutdown failed');
                         process.exit(1);
                    }
               );
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);

     await app.listen({ port, host });
     logger.info(`Orders API listening on ${host}:${port}`);
     logger.info(`OpenAPI docs available at http://${host}:${port}/docs`);
}

main().catch((err) => {
     logger.error({ err }, 'Failed to start orders API');
     process.exit(1);
});
