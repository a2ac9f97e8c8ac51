import {
  MalformedUpstreamResponseError,
  ProductNotFoundError,
  ReservationFailedError,
  UpstreamUnavailableError,
} from '../shared/errors';
import { ProductViewSchema, ReservationResultSchema } from '../shared/schemas';
import type { CallContext, ProductView, ReservationResult } from '../shared/types';
import { Upstream, isSuccess } from '../shared/upstream';

/** What the order workflow needs from the inventory service. */
export interface InventoryGateway {
  getProduct(productId: string, context?: CallContext): Promise<ProductView>;
  reserve(productId: string, quantity: number, context?: CallContext): Promise<ReservationResult>;
}

export interface InventoryClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

export class HttpInventoryClient implements InventoryGateway {
  private readonly upstream: Upstream;

  constructor({ baseUrl, timeoutMs }: InventoryClientOptions) {
    this.upstream = new Upstream({ service: 'inventory-service', baseUrl, timeoutMs });
  }

  async getProduct(productId: string, context?: CallContext): Promise<ProductView> {
    const response = await this.upstream.send(
      { method: 'GET', url: `/api/inventory/${encodeURIComponent(productId)}` },
      context,
    );
    if (response.status === 404) {
      throw new ProductNotFoundError(productId, 'inventory');
    }
    if (response.status >= 500) {
      throw new UpstreamUnavailableError(this.upstream.service, `HTTP ${response.status} reading ${productId}`);
    }
    if (!isSuccess(response.status)) {
      throw new MalformedUpstreamResponseError(this.upstream.service, `unexpected HTTP ${response.status} reading ${productId}`);
    }
    return this.upstream.decode(response, ProductViewSchema);
  }

  async reserve(productId: string, quantity: number, context?: CallContext): Promise<ReservationResult> {
    const response = await this.upstream.send(
      { method: 'POST', url: `/api/inventory/${encodeURIComponent(productId)}/reserve`, params: { quantity } },
      context,
    );
    if (!isSuccess(response.status)) {
      throw new ReservationFailedError(productId, this.upstream.errorBody(response).detail);
    }
    return this.upstream.decode(response, ReservationResultSchema);
  }
}
