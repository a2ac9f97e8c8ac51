import { loadInventoryConfig } from '../shared/config';
import { runService } from '../shared/http';
import { createLogger, errorMessage } from '../shared/logger';
import { createInventoryApp } from './app';
import { DEFAULT_CATALOG } from './catalog';
import { InventoryStore } from './store';

const config = loadInventoryConfig();
const logger = createLogger(config.serviceName, config.logLevel);
const store = new InventoryStore(DEFAULT_CATALOG);

runService(createInventoryApp({ serviceName: config.serviceName, store, logger }), config.port, logger).catch((err: unknown) => {
  logger.error('Inventory service failed to start', { error: errorMessage(err) });
  process.exitCode = 1;
});
