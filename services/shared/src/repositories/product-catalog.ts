import { Pool } from 'pg';
import { Product } from '../types/order.types';
import { InvalidInputError, NotFoundError, StorageError } from '../utils/errors';

/**
 * Product lookup for order pricing. Prices are in minor currency units.
 */
export interface ProductCatalog {
     exists(productId: string): Promise<boolean>;
     /** Rejects with NotFoundError for an unknown product */
     unitPrice(productId: string): Promise<number>;
     /** Creates the product or replaces its name and price */
     upsert(product: Product): Promise<Product>;
}

export function assertProduct(product: Product): void {
     if (!product.name.trim()) {
          throw new InvalidInputError(`Product ${product.productId} needs a name`);
     }
     if (!Number.isInteger(product.unitPrice) || product.unitPrice < 0) {
          throw new InvalidInputError(
               `Unit price must be a non-negative integer for product ${product.productId}`
          );
     }
}

export class InMemoryProductCatalog implements ProductCatalog {
     private readonly products = new Map<string, Product>();

     constructor(prices: Record<string, number> = {}) {
          for (const [productId, unitPrice] of Object.entries(prices)) {
               this.setPrice(productId, unitPrice);
          }
     }

     setPrice(productId: string, unitPrice: number): void {
          const name = this.products.get(productId)?.name ?? productId;
          this.products.set(productId, { productId, name, unitPrice });
     }

     async exists(productId: string): Promise<boolean> {
          return this.products.has(productId);
     }

     async unitPrice(productId: string): Promise<number> {
          const product = this.products.get(productId);
          if (!product) {
               throw new NotFoundError('Product', productId);
          }
          return product.unitPrice;
     }

     async upsert(product: Product): Promise<Product> {
          assertProduct(product);
          this.products.set(product.productId, { ...product });
          return { ...product };
     }
}

type ProductRow = {
     id: string;
     name: string;
     unit_price: number | string;
};

export class PgProductCatalog implements ProductCatalog {
     constructor(private readonly pool: Pool) {}

     async exists(productId: string): Promise<boolean> {
          const rows = await this.lookup(productId);
          return rows.length > 0;
     }

     async unitPrice(productId: string): Promise<number> {
          const rows = await this.lookup(productId);
          if (rows.length === 0) {
               throw new NotFoundError('Product', productId);
          }
          return parseInt(String(rows[0].unit_price), 10);
     }

     async upsert(product: Product): Promise<Product> {
          assertProduct(product);

          let rows: ProductRow[];
          try {
               ({ rows } = await this.pool.query<ProductRow>(
                    `
      INSERT INTO product (id, name, unit_price)
      VALUES ($1, $2, $3)
      ON CONFLICT (id) DO UPDATE
      SET name = EXCLUDED.name,
          unit_price = EXCLUDED.unit_price
      RETURNING id, name, unit_price
    `,
                    [product.productId, product.name, product.unitPrice]
               ));
          } catch (error) {
               throw new StorageError(error);
          }

          const [row] = rows;
          return {
               productId: row.id,
               name: row.name,
               unitPrice: parseInt(String(row.unit_price), 10),
          };
     }

     private async lookup(productId: string): Promise<Array<{ unit_price: number | string }>> {
          try {
               const { rows } = await this.pool.query<{ unit_price: number | string }>(
                    'SELECT unit_price FROM product WHERE id = $1',
                    [productId]
               );
               return rows;
          } catch (error) {
               throw new StorageError(error);
          }
     }
}
