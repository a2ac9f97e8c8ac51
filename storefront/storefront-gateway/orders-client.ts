import type { z } from 'zod';
import { OrderListSchema, OrderSchema } from '../shared/schemas';
import type { CallContext, Order, OrderList } from '../shared/types';
import { Upstream, isSuccess, type UpstreamResponse } from '../shared/upstream';

export interface Relayed<T> {
  status: number;
  /** Decoded body, checked against the expected shape. */
  body: T;
  /** The body exactly as the orders service sent it. */
  raw: string;
}

export interface OrdersClientOptions {
  baseUrl: string;
  readTimeoutMs: number;
  createTimeoutMs: number;
}

/**
 * Relays calls to the orders service. A 2xx answer comes back with its status
 * and body once the body has the expected shape; any other status is thrown as
 * an `UpstreamError` carrying the orders service's own status and error body.
 */
export class HttpOrdersClient {
  private readonly upstream: Upstream;
  private readonly createTimeoutMs: number;

  constructor({ baseUrl, readTimeoutMs, createTimeoutMs }: OrdersClientOptions) {
    this.upstream = new Upstream({ service: 'orders-service', baseUrl, timeoutMs: readTimeoutMs });
    this.createTimeoutMs = createTimeoutMs;
  }

  get baseUrl(): string {
    return this.upstream.baseUrl;
  }

  async listOrders(context?: CallContext): Promise<Relayed<OrderList>> {
    const response = await this.upstream.send({ method: 'GET', url: '/api/orders' }, context);
    return this.relay(response, OrderListSchema);
  }

  async getOrder(orderId: string, context?: CallContext): Promise<Relayed<Order>> {
    const response = await this.upstream.send({ method: 'GET', url: `/api/orders/${encodeURIComponent(orderId)}` }, context);
    return this.relay(response, OrderSchema);
  }

  async createOrder(body: unknown, context?: CallContext): Promise<Relayed<Order>> {
    const response = await this.upstream.send(
      { method: 'POST', url: '/api/orders', data: body, timeout: this.createTimeoutMs },
      context,
    );
    return this.relay(response, OrderSchema);
  }

  private relay<T extends z.ZodTypeAny>(response: UpstreamResponse, schema: T): Relayed<z.output<T>> {
    if (!isSuccess(response.status)) {
      throw this.upstream.relayError(response);
    }
    return { status: response.status, body: this.upstream.decode(response, schema), raw: response.body };
  }
}
