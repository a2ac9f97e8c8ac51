import { loadOrdersConfig } from '../shared/config';
import { runService } from '../shared/http';
import { createLogger, errorMessage } from '../shared/logger';
import { createOrdersApp } from './app';
import { HttpInventoryClient } from './inventory-client';
import { OrderOrchestrator } from './orchestrator';
import { OrderStore } from './order-store';

const config = loadOrdersConfig();
const logger = createLogger(config.serviceName, config.logLevel);

const orchestrator = new OrderOrchestrator({
  inventory: new HttpInventoryClient({ baseUrl: config.inventoryApiUrl, timeoutMs: config.inventoryTimeoutMs }),
  orders: new OrderStore(config.orderIdStart),
  logger,
});

const app = createOrdersApp({
  serviceName: config.serviceName,
  orchestrator,
  inventoryApiUrl: config.inventoryApiUrl,
  logger,
});

runService(app, config.port, logger).catch((err: unknown) => {
  logger.error('Orders service failed to start', { error: errorMessage(err) });
  process.exitCode = 1;
});
