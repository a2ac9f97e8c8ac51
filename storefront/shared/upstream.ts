import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type { z } from 'zod';
import { MalformedUpstreamResponseError, UpstreamError, UpstreamUnavailableError, type ErrorBody } from './errors';
import { REQUEST_ID_HEADER } from './http';
import { ErrorBodySchema, describeIssues } from './schemas';
import type { CallContext } from './types';

export interface UpstreamOptions {
  /** Name used in error details, e.g. `inventory-service`. */
  service: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface UpstreamResponse {
  status: number;
  /** Raw, undecoded body. */
  body: string;
}

/**
 * One upstream dependency. Every HTTP status is returned to the caller, which
 * decides what it means; only transport failures and timeouts throw.
 */
export class Upstream {
  readonly service: string;
  readonly baseUrl: string;
  private readonly http: AxiosInstance;

  constructor(options: UpstreamOptions) {
    this.service = options.service;
    this.baseUrl = options.baseUrl;
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  }

  async send(config: AxiosRequestConfig, context: CallContext = {}): Promise<UpstreamResponse> {
    const headers: Record<string, string> = {};
    if (context.requestId) headers[REQUEST_ID_HEADER] = context.requestId;

    try {
      const response = await this.http.request<unknown>({ ...config, headers });
      return { status: response.status, body: typeof response.data === 'string' ? response.data : '' };
    } catch (err) {
      if (axios.isAxiosError(err)) {
        throw new UpstreamUnavailableError(this.service, `${config.method ?? 'GET'} ${this.baseUrl}${config.url ?? ''}: ${err.message}`);
      }
      throw err;
    }
  }

  /** Parses a JSON body and checks it against `schema`. */
  decode<T extends z.ZodTypeAny>(response: UpstreamResponse, schema: T): z.output<T> {
    const json = parseJson(response.body);
    if (!json.ok) {
      throw new MalformedUpstreamResponseError(this.service, `body is not JSON: ${preview(response.body)}`);
    }
    const result = schema.safeParse(json.value);
    if (!result.success) {
      throw new MalformedUpstreamResponseError(this.service, describeIssues(result.error));
    }
    return result.data;
  }

  /** Reads the `detail` of an error response, falling back to its text. */
  errorBody(response: UpstreamResponse): ErrorBody {
    const json = parseJson(response.body);
    if (json.ok) {
      const result = ErrorBodySchema.safeParse(json.value);
      if (result.success) return result.data;
    }
    return { error: 'UPSTREAM_ERROR', detail: response.body.trim() || `HTTP ${response.status}` };
  }

  /** An error that relays the upstream's status and body as they were. */
  relayError(response: UpstreamResponse): UpstreamError {
    return new UpstreamError(response.status, this.errorBody(response));
  }
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function preview(body: string): string {
  const text = body.trim();
  if (text === '') return '(empty)';
  return text.length > 100 ? `${text.slice(0, 100)}...` : text;
}
