import { z } from 'zod';
import { ConfigError } from './errors';
import { LOG_LEVELS, type LogLevel } from './logger';
import { describeIssues } from './schemas';

type Env = Record<string, string | undefined>;

const port = (fallback: number) => z.coerce.number().int().min(0).max(65535).default(fallback);
const timeoutMs = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const CommonEnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

const InventoryEnvSchema = CommonEnvSchema.extend({
  PORT: port(8000),
});

const OrdersEnvSchema = CommonEnvSchema.extend({
  PORT: port(8001),
  INVENTORY_API_URL: z.string().url().default('http://localhost:8000'),
  INVENTORY_TIMEOUT_MS: timeoutMs(10_000),
  ORDER_ID_START: z.coerce.number().int().nonnegative().default(1000),
});

const GatewayEnvSchema = CommonEnvSchema.extend({
  PORT: port(8080),
  ORDERS_API_URL: z.string().url().default('http://localhost:8001'),
  ORDERS_READ_TIMEOUT_MS: timeoutMs(10_000),
  ORDERS_CREATE_TIMEOUT_MS: timeoutMs(30_000),
});

export interface ServiceConfig {
  serviceName: string;
  port: number;
  logLevel: LogLevel;
}

export type InventoryConfig = ServiceConfig;

export interface OrdersConfig extends ServiceConfig {
  inventoryApiUrl: string;
  inventoryTimeoutMs: number;
  orderIdStart: number;
}

export interface GatewayConfig extends ServiceConfig {
  ordersApiUrl: string;
  readTimeoutMs: number;
  createTimeoutMs: number;
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env, serviceName: string): z.output<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Invalid ${serviceName} configuration: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function loadInventoryConfig(env: Env = process.env): InventoryConfig {
  const serviceName = 'inventory-service';
  const parsed = parseEnv(InventoryEnvSchema, env, serviceName);
  return { serviceName, port: parsed.PORT, logLevel: parsed.LOG_LEVEL };
}

export function loadOrdersConfig(env: Env = process.env): OrdersConfig {
  const serviceName = 'orders-service';
  const parsed = parseEnv(OrdersEnvSchema, env, serviceName);
  return {
    serviceName,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    inventoryApiUrl: parsed.INVENTORY_API_URL,
    inventoryTimeoutMs: parsed.INVENTORY_TIMEOUT_MS,
    orderIdStart: parsed.ORDER_ID_START,
  };
}

export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  const serviceName = 'storefront-gateway';
  const parsed = parseEnv(GatewayEnvSchema, env, serviceName);
  return {
    serviceName,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    ordersApiUrl: parsed.ORDERS_API_URL,
    readTimeoutMs: parsed.ORDERS_READ_TIMEOUT_MS,
    createTimeoutMs: parsed.ORDERS_CREATE_TIMEOUT_MS,
  };
}
