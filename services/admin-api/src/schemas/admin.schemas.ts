const errorResponse = (description: string, code: string, message: string) => ({
     description,
     type: 'object',
     properties: {
          error: { type: 'string', example: code },
          message: { type: 'string', example: message },
     },
});

const internal = errorResponse('Internal server error', 'INTERNAL_ERROR', 'An unexpected error occurred');

const inventoryRecordResponse = {
     type: 'object',
     properties: {
          productId: { type: 'string', example: 'SKU-TEE-001' },
          totalStock: { type: 'integer', example: 120 },
          reserved: { type: 'integer', example: 15 },
          available: { type: 'integer', example: 105 },
     },
};

const productIdParams = {
     type: 'object',
     required: ['productId'],
     properties: {
          productId: { type: 'string', description: 'Product ID' },
     },
};

export const provisionInventorySchema = {
     tags: ['inventory-admin'],
     summary: 'Provision stock for a product',
     description:
          'Creates the inventory record or sets its total stock. Total stock may not drop below the reserved quantity.',
     params: productIdParams,
     body: {
          type: 'object',
          required: ['totalStock'],
          properties: {
               totalStock: { type: 'integer', minimum: 0, example: 120 },
          },
     },
     response: {
          200: inventoryRecordResponse,
          404: errorResponse('Unknown product', 'NOT_FOUND', 'Product SKU-TEE-001 not found'),
          400: errorResponse('Invalid stock level', 'INVALID_INPUT', 'Total stock 5 for product SKU-TEE-001 is below reserved 8'),
          503: errorResponse('Inventory contended, retry later', 'BUSY', 'inventory:SKU-TEE-001 is busy'),
          500: internal,
     },
};

export const getInventorySchema = {
     tags: ['inventory-admin'],
     summary: 'Get the inventory record of a product',
     params: productIdParams,
     response: {
          200: inventoryRecordResponse,
          404: errorResponse('No inventory record', 'NOT_FOUND', 'InventoryRecord SKU-TEE-001 not found'),
          500: internal,
     },
};

const orderIdParams = {
     type: 'object',
     required: ['id'],
     properties: {
          id: { type: 'string', description: 'Order ID' },
     },
};

const orderResponse = {
     type: 'object',
     properties: {
          id: { type: 'string' },
          userId: { type: 'string', example: 'user-42' },
          lines: {
               type: 'array',
               items: {
                    type: 'object',
                    properties: {
                         productId: { type: 'string', example: 'SKU-TEE-001' },
                         quantity: { type: 'integer', example: 2 },
                         unitPrice: { type: 'integer', example: 1999 },
                    },
               },
          },
          total: { type: 'integer', example: 3998 },
          status: { type: 'string', enum: ['PENDING', 'CANCELLED', 'COMPLETED'] },
          cancelReason: { type: 'string', example: 'EXPIRED' },
          createdAt: { type: 'string', format: 'date-time' },
          updatedAt: { type: 'string', format: 'date-time' },
     },
};

export const upsertProductSchema = {
     tags: ['inventory-admin'],
     summary: 'Create or reprice a product',
     description: 'Products must exist before stock can be provisioned for them.',
     params: productIdParams,
     body: {
          type: 'object',
          required: ['name', 'unitPrice'],
          properties: {
               name: { type: 'string', minLength: 1, example: 'Heavyweight tee' },
               unitPrice: {
                    type: 'integer',
                    minimum: 0,
                    description: 'Minor currency units',
                    example: 1999,
               },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    productId: { type: 'string', example: 'SKU-TEE-001' },
                    name: { type: 'string', example: 'Heavyweight tee' },
                    unitPrice: { type: 'integer', example: 1999 },
               },
          },
          400: errorResponse('Invalid product', 'INVALID_INPUT', 'Product SKU-TEE-001 needs a name'),
          500: internal,
     },
};

export const getOrderSchema = {
     tags: ['orders-admin'],
     summary: 'Get any order',
     params: orderIdParams,
     response: {
          200: orderResponse,
          404: errorResponse('Order not found', 'NOT_FOUND', 'Order 1f0c… not found'),
          500: internal,
     },
};

export const completeOrderSchema = {
     tags: ['orders-admin'],
     summary: 'Mark a pending order as fulfilled',
     description: 'Commits every reservation the order holds: the units leave total stock.',
     params: orderIdParams,
     response: {
          200: orderResponse,
          404: errorResponse('Order not found', 'NOT_FOUND', 'Order 1f0c… not found'),
          409: errorResponse('Order is not pending', 'INVALID_STATE', 'Order 1f0c… is CANCELLED'),
          500: internal,
     },
};

export const expireOrdersSchema = {
     tags: ['orders-admin'],
     summary: 'Expire stale pending orders',
     description: 'Cancels every PENDING order older than maxAgeMs and returns their stock.',
     body: {
          type: 'object',
          required: ['maxAgeMs'],
          properties: {
               maxAgeMs: { type: 'integer', minimum: 0, example: 900000 },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    expired: { type: 'array', items: { type: 'string' } },
               },
          },
          500: internal,
     },
};
