const errorResponse = (description: string, code: string, message: string) => ({
     description,
     type: 'object',
     properties: {
          error: { type: 'string', example: code },
          message: { type: 'string', example: message },
     },
});

const orderLineResponse = {
     type: 'object',
     properties: {
          productId: { type: 'string', example: 'SKU-TEE-001' },
          quantity: { type: 'integer', example: 2 },
          unitPrice: { type: 'integer', description: 'Minor currency units', example: 1999 },
     },
};

export const orderResponse = {
     type: 'object',
     properties: {
          id: { type: 'string', format: 'uuid' },
          userId: { type: 'string', example: 'user-42' },
          lines: { type: 'array', items: orderLineResponse },
          total: { type: 'integer', description: 'Minor currency units', example: 3998 },
          status: { type: 'string', enum: ['PENDING', 'CANCELLED', 'COMPLETED'] },
          cancelReason: { type: 'string', example: 'CUSTOMER_CANCELLED' },
          createdAt: { type: 'string', format: 'date-time' },
          updatedAt: { type: 'string', format: 'date-time' },
     },
};

const callerHeaders = {
     type: 'object',
     properties: {
          'x-user-id': {
               type: 'string',
               description: 'Caller resolved by the upstream gateway',
          },
     },
};

const orderIdParams = {
     type: 'object',
     required: ['id'],
     properties: {
          id: { type: 'string', description: 'Order ID' },
     },
};

const unauthenticated = errorResponse('Missing caller identity', 'UNAUTHENTICATED', 'x-user-id header is required');
const forbidden = errorResponse('Order belongs to another user', 'FORBIDDEN', 'Order is owned by another user');
const notFound = errorResponse('Order or product not found', 'NOT_FOUND', 'Order 1f0c… not found');
const internal = errorResponse('Internal server error', 'INTERNAL_ERROR', 'An unexpected error occurred');
const busy = errorResponse('Inventory contended, retry later', 'BUSY', 'inventory:SKU-TEE-001 is busy');

export const createOrderSchema = {
     tags: ['orders'],
     summary: 'Create an order',
     description:
          'Reserves stock for every line and persists a PENDING order. Either every line is reserved or none is.',
     headers: callerHeaders,
     body: {
          type: 'object',
          required: ['lines'],
          properties: {
               idempotencyKey: {
                    type: 'string',
                    minLength: 1,
                    description: 'Retries with the same key return the original order',
                    example: 'checkout-7f3a',
               },
               lines: {
                    type: 'array',
                    minItems: 1,
                    items: {
                         type: 'object',
                         required: ['productId', 'quantity'],
                         properties: {
                              productId: { type: 'string', minLength: 1, example: 'SKU-TEE-001' },
                              quantity: { type: 'integer', minimum: 1, example: 2 },
                         },
                    },
               },
          },
     },
     response: {
          201: { description: 'Order created', ...orderResponse },
          400: errorResponse('Invalid request', 'INVALID_INPUT', 'Order must contain at least one line'),
          401: unauthenticated,
          404: notFound,
          409: errorResponse(
               'Insufficient stock',
               'INSUFFICIENT_STOCK',
               'Insufficient stock for product SKU-TEE-001: requested 3, available 2'
          ),
          500: internal,
          503: busy,
     },
};

export const listOrdersSchema = {
     tags: ['orders'],
     summary: "List the caller's orders",
     headers: callerHeaders,
     response: {
          200: { type: 'array', items: orderResponse },
          401: unauthenticated,
          500: internal,
     },
};

export const getOrderSchema = {
     tags: ['orders'],
     summary: 'Get an order',
     headers: callerHeaders,
     params: orderIdParams,
     response: {
          200: orderResponse,
          401: unauthenticated,
          403: forbidden,
          404: notFound,
          500: internal,
     },
};

export const cancelOrderSchema = {
     tags: ['orders'],
     summary: 'Cancel a pending order',
     description: 'Releases every reservation the order holds. Only PENDING orders can be cancelled.',
     headers: callerHeaders,
     params: orderIdParams,
     response: {
          200: orderResponse,
          401: unauthenticated,
          403: forbidden,
          404: notFound,
          409: errorResponse('Order is not pending', 'INVALID_STATE', 'Order 1f0c… is CANCELLED'),
          500: internal,
          503: busy,
     },
};
