import type { Express } from 'express';
import { SERVICE_VERSION, createServiceApp, parseInput } from '../shared/http';
import type { Logger } from '../shared/logger';
import { ReserveQuerySchema } from '../shared/schemas';
import type { Product, ProductView, ReservationResult } from '../shared/types';
import type { InventoryStore } from './store';

export interface InventoryAppDeps {
  serviceName: string;
  store: InventoryStore;
  logger: Logger;
}

export function toProductView(product: Product): ProductView {
  return {
    product_id: product.id,
    name: product.name,
    stock: product.stock,
    price: product.unitPrice,
    available: product.stock > 0,
  };
}

export function createInventoryApp({ serviceName, store, logger }: InventoryAppDeps): Express {
  return createServiceApp(serviceName, logger, (app) => {
    app.get('/', (req, res) => {
      res.json({
        service: serviceName,
        version: SERVICE_VERSION,
        status: 'running',
        endpoints: ['/health', '/api/inventory', '/api/inventory/{product_id}', '/api/inventory/{product_id}/reserve'],
      });
    });

    app.get('/api/inventory', (req, res) => {
      const products = store.list();
      const items = Object.fromEntries(
        products.map((product) => [product.id, { name: product.name, stock: product.stock, price: product.unitPrice }]),
      );
      logger.info(`Retrieved all inventory items: ${products.length} items`);
      res.json({ items, total_items: products.length });
    });

    app.get('/api/inventory/:productId', (req, res) => {
      const product = store.read(req.params.productId);
      logger.info(`Retrieved inventory for ${product.id}: ${product.stock} units`);
      res.json(toProductView(product));
    });

    app.post('/api/inventory/:productId/reserve', (req, res) => {
      const { quantity } = parseInput(ReserveQuerySchema, req.query);
      const reservation = store.reserve(req.params.productId, quantity);
      logger.info(`Reserved ${quantity} units of ${reservation.productId}. Remaining stock: ${reservation.remainingStock}`);
      const body: ReservationResult = {
        success: true,
        product_id: reservation.productId,
        reserved_quantity: reservation.reservedQuantity,
        remaining_stock: reservation.remainingStock,
      };
      res.json(body);
    });
  });
}
