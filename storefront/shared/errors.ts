export const ERROR_CODES = [
  'NOT_FOUND',
  'BAD_REQUEST',
  'VALIDATION_FAILED',
  'INSUFFICIENT_STOCK',
  'RESERVATION_FAILED',
  'UPSTREAM_UNAVAILABLE',
  'MALFORMED_UPSTREAM_RESPONSE',
  'UPSTREAM_ERROR',
  'INTERNAL',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export interface ErrorBody {
  error: ErrorCode;
  detail: string;
  available?: number;
  requested?: number;
}

/**
 * Base class for every failure a service reports to its caller. The error
 * middleware renders `toBody()` with `status`.
 */
export abstract class ServiceError extends Error {
  abstract readonly status: number;
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  toBody(): ErrorBody {
    return { error: this.code, detail: this.message };
  }
}

export class ProductNotFoundError extends ServiceError {
  readonly status = 404;
  readonly code = 'NOT_FOUND';

  constructor(readonly productId: string, location?: string) {
    super(location ? `Product ${productId} not found in ${location}` : `Product ${productId} not found`);
  }
}

export class OrderNotFoundError extends ServiceError {
  readonly status = 404;
  readonly code = 'NOT_FOUND';

  constructor(readonly orderId: number) {
    super(`Order ${orderId} not found`);
  }
}

export class InsufficientStockError extends ServiceError {
  readonly status = 400;
  readonly code = 'INSUFFICIENT_STOCK';

  constructor(readonly productId: string, readonly available: number, readonly requested: number) {
    super(`Insufficient stock for ${productId}. Available: ${available}, Requested: ${requested}`);
  }

  override toBody(): ErrorBody {
    return { ...super.toBody(), available: this.available, requested: this.requested };
  }
}

/** The reserve call was refused after the availability check had passed. */
export class ReservationFailedError extends ServiceError {
  readonly status = 500;
  readonly code = 'RESERVATION_FAILED';

  constructor(readonly productId: string, reason: string) {
    super(`Failed to reserve inventory for ${productId}: ${reason}`);
  }
}

export class UpstreamUnavailableError extends ServiceError {
  readonly status = 503;
  readonly code = 'UPSTREAM_UNAVAILABLE';

  constructor(readonly service: string, reason: string) {
    super(`Unable to reach ${service}: ${reason}`);
  }
}

export class MalformedUpstreamResponseError extends ServiceError {
  readonly status = 502;
  readonly code = 'MALFORMED_UPSTREAM_RESPONSE';

  constructor(readonly service: string, reason: string) {
    super(`Invalid response from ${service}: ${reason}`);
  }
}

export class ValidationError extends ServiceError {
  readonly status = 422;
  readonly code = 'VALIDATION_FAILED';
}

export class BadRequestError extends ServiceError {
  readonly status = 400;
  readonly code = 'BAD_REQUEST';
}

export class RouteNotFoundError extends ServiceError {
  readonly status = 404;
  readonly code = 'NOT_FOUND';

  constructor(method: string, path: string) {
    super(`Route ${method} ${path} not found`);
  }
}

/** An upstream's own error response, relayed with its status and body. */
export class UpstreamError extends ServiceError {
  readonly code: ErrorCode;

  constructor(readonly status: number, private readonly body: ErrorBody) {
    super(body.detail);
    this.code = body.error;
  }

  override toBody(): ErrorBody {
    return { ...this.body };
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
