import type { Express } from 'express';
import { SERVICE_VERSION, asyncHandler, createServiceApp, requestContext } from '../shared/http';
import type { Logger } from '../shared/logger';
import type { HttpOrdersClient } from './orders-client';

export interface GatewayAppDeps {
  serviceName: string;
  orders: HttpOrdersClient;
  logger: Logger;
}

export function createGatewayApp({ serviceName, orders, logger }: GatewayAppDeps): Express {
  return createServiceApp(serviceName, logger, (app) => {
    app.get('/', (req, res) => {
      res.json({
        service: serviceName,
        version: SERVICE_VERSION,
        status: 'running',
        endpoints: ['/health', '/api/orders', '/api/orders/{order_id}'],
        orders_api: orders.baseUrl,
      });
    });

    app.get(
      '/api/orders',
      asyncHandler(async (req, res) => {
        const { status, body, raw } = await orders.listOrders(requestContext(res));
        logger.info(`Fetched ${body.total} orders`);
        res.status(status).type('application/json').send(raw);
      }),
    );

    app.get(
      '/api/orders/:id',
      asyncHandler(async (req, res) => {
        const { status, body, raw } = await orders.getOrder(req.params.id, requestContext(res));
        logger.info(`Fetched order ${body.order_id}`);
        res.status(status).type('application/json').send(raw);
      }),
    );

    app.post(
      '/api/orders',
      asyncHandler(async (req, res) => {
        const { status, body, raw } = await orders.createOrder(req.body, requestContext(res));
        logger.info(`Order created successfully: ${body.order_id}`);
        res.status(status).type('application/json').send(raw);
      }),
    );
  });
}
