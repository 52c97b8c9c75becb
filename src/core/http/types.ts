// src/core/http/types.ts

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Fully specified, not yet sent API operation. Built by the endpoint modules
 * (see `endpoints/settings/requests.ts` and `endpoints/user/requests.ts`) and
 * frozen once built.
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  readonly path: string; // Relative to the API base, or an absolute URL
  readonly query?: string; // Already built, without the leading '?'
  readonly body?: unknown;
  readonly contentType: string;
}

export interface TransportRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

/**
 * One HTTP exchange. Resolves for every status code; rejects only when no
 * response was received.
 */
export interface Transport {
  send<T = unknown>(request: TransportRequest): Promise<HttpResponse<T>>;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

export interface TransportConfig {
  timeout?: number; // milliseconds
  userAgent?: string;
  keepAlive?: boolean;
}

export interface DispatchLimits {
  concurrency?: number; // Max requests in flight
  qps?: number; // Max requests started per second
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number; // milliseconds
  maxDelay: number;
}

/**
 * What endpoint modules need from the dispatch layer.
 */
export interface Dispatcher {
  dispatch<T = unknown>(descriptor: RequestDescriptor, opts?: DispatchOptions): Promise<HttpResponse<T>>;
}
