import { InsufficientStockError, ProductNotFoundError, ValidationError } from '../shared/errors';
import type { Product } from '../shared/types';

export interface Reservation {
  productId: string;
  reservedQuantity: number;
  remainingStock: number;
}

/**
 * Owns the product table. Callers only ever see copies; `reserve` is the one
 * path that changes stock.
 */
export class InventoryStore {
  private readonly products = new Map<string, Product>();

  constructor(catalog: readonly Product[]) {
    for (const product of catalog) {
      if (this.products.has(product.id)) {
        throw new Error(`Duplicate product id in catalog: ${product.id}`);
      }
      if (!Number.isInteger(product.stock) || product.stock < 0) {
        throw new Error(`Invalid stock for ${product.id}: ${product.stock}`);
      }
      this.products.set(product.id, { ...product });
    }
  }

  list(): Product[] {
    return [...this.products.values()].map((product) => ({ ...product }));
  }

  read(productId: string): Product {
    const product = this.products.get(productId);
    if (!product) throw new ProductNotFoundError(productId);
    return { ...product };
  }

  /**
   * Checks and decrements stock in one synchronous step. Nothing here awaits,
   * so two reservations for the same product can never interleave between the
   * check and the write.
   */
  reserve(productId: string, quantity: number): Reservation {
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new ValidationError(`Quantity must be a positive integer, got ${quantity}`);
    }
    const product = this.products.get(productId);
    if (!product) throw new ProductNotFoundError(productId);
    if (product.stock < quantity) {
      throw new InsufficientStockError(productId, product.stock, quantity);
    }
    product.stock -= quantity;
    return { productId, reservedQuantity: quantity, remainingStock: product.stock };
  }
}
