import type { Express } from 'express';
import { SERVICE_VERSION, asyncHandler, createServiceApp, parseInput, requestContext } from '../shared/http';
import type { Logger } from '../shared/logger';
import { CreateOrderRequestSchema, OrderIdParamsSchema } from '../shared/schemas';
import type { OrderList } from '../shared/types';
import type { OrderOrchestrator } from './orchestrator';

export interface OrdersAppDeps {
  serviceName: string;
  orchestrator: OrderOrchestrator;
  inventoryApiUrl: string;
  logger: Logger;
}

export function createOrdersApp({ serviceName, orchestrator, inventoryApiUrl, logger }: OrdersAppDeps): Express {
  return createServiceApp(serviceName, logger, (app) => {
    app.get('/', (req, res) => {
      res.json({
        service: serviceName,
        version: SERVICE_VERSION,
        status: 'running',
        endpoints: ['/health', '/api/orders', '/api/orders/{order_id}'],
        inventory_api: inventoryApiUrl,
      });
    });

    app.get('/api/orders', (req, res) => {
      const orders = orchestrator.listOrders();
      logger.info(`Retrieved all orders: ${orders.length} orders`);
      const body: OrderList = { orders, total: orders.length };
      res.json(body);
    });

    app.get('/api/orders/:id', (req, res) => {
      const { id } = parseInput(OrderIdParamsSchema, req.params);
      res.json(orchestrator.getOrder(id));
    });

    app.post(
      '/api/orders',
      asyncHandler(async (req, res) => {
        const request = parseInput(CreateOrderRequestSchema, req.body);
        const order = await orchestrator.createOrder(request, requestContext(res));
        res.json(order);
      }),
    );
  });
}
