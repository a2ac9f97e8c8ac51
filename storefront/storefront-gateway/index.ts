import { loadGatewayConfig } from '../shared/config';
import { runService } from '../shared/http';
import { createLogger, errorMessage } from '../shared/logger';
import { createGatewayApp } from './app';
import { HttpOrdersClient } from './orders-client';

const config = loadGatewayConfig();
const logger = createLogger(config.serviceName, config.logLevel);

const orders = new HttpOrdersClient({
  baseUrl: config.ordersApiUrl,
  readTimeoutMs: config.readTimeoutMs,
  createTimeoutMs: config.createTimeoutMs,
});

runService(createGatewayApp({ serviceName: config.serviceName, orders, logger }), config.port, logger).catch((err: unknown) => {
  logger.error('Storefront gateway failed to start', { error: errorMessage(err) });
  process.exitCode = 1;
});
