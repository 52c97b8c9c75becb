// src/core/http/RequestDispatcher.ts

import PQueue from 'p-queue';
import type {
  DispatchLimits,
  DispatchOptions,
  HttpResponse,
  RequestDescriptor,
  Transport,
} from './types';
import type { SessionGate } from '../session/ConnectionManager';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import {
  SDKError,
  ApiClientError,
  ApiServerError,
  AuthenticationError,
  RequestCancelledError,
} from '../../utils/errors';
import { throwIfAborted } from '../../utils/abort';
import { generateCorrelationId, withHttpSpan } from '../../observability/tracing';

export interface DispatcherOptions extends DispatchLimits {
  apiUrl: string;
}

/**
 * Turns a request descriptor into a classified outcome: session gate, send
 * with bearer credential, classify by status. Never retries.
 */
export class RequestDispatcher {
  private queue?: PQueue;
  private readonly apiUrl: string;

  constructor(
    private session: SessionGate,
    private transport: Transport,
    options: DispatcherOptions,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {
    this.apiUrl = options.apiUrl;
    this.queue = this.createQueue(options);
  }

  async dispatch<T = unknown>(
    descriptor: RequestDescriptor,
    opts: DispatchOptions = {}
  ): Promise<HttpResponse<T>> {
    const { signal } = opts;
    throwIfAborted(signal);

    const url = this.buildUrl(descriptor);

    // Gate and credential are resolved when the request leaves the queue
    return this.runThroughQueue(() =>
      withHttpSpan(descriptor.method, url, async () => {
        throwIfAborted(signal);

        try {
          await this.session.ensureValid(signal);
        } catch (error: unknown) {
          throw this.toGateError(error);
        }

        const requestId = generateCorrelationId();
        const headers: Record<string, string> = {
          Authorization: `Bearer ${this.session.getAccessToken()}`,
          Accept: 'application/json',
          'Content-Type': descriptor.contentType,
          'X-Request-ID': requestId,
        };

        this.logger.debug('HTTP request', {
          requestId,
          method: descriptor.method,
          url,
          headers,
        });

        const startTime = Date.now();

        let response: HttpResponse<T>;
        try {
          response = await this.transport.send<T>({
            url,
            method: descriptor.method,
            headers,
            body: descriptor.body,
            signal,
          });
        } catch (error: unknown) {
          this.metrics.incrementCounter('http_requests_total', {
            method: descriptor.method,
            status: 'error',
          });
          this.metrics.incrementCounter('http_errors', {
            kind: error instanceof SDKError ? error.code : 'unknown',
          });
          throw error;
        }

        this.metrics.incrementCounter('http_requests_total', {
          method: descriptor.method,
          status: response.status,
        });
        this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
          method: descriptor.method,
          status: response.status,
        });

        return this.classify(response, descriptor, url, requestId);
      })
    );
  }

  private classify<T>(
    response: HttpResponse<T>,
    descriptor: RequestDescriptor,
    url: string,
    requestId: string
  ): HttpResponse<T> {
    const { status } = response;

    if (status >= 200 && status < 300) {
      return response;
    }

    this.logger.debug('HTTP error response', {
      requestId,
      method: descriptor.method,
      url,
      status,
      data: response.data,
    });

    let error: SDKError;
    if (status === 401) {
      // The gate passed but the server rejected the token (e.g. revoked meanwhile)
      error = new AuthenticationError('Request rejected as unauthorized', {
        status,
        url,
        body: response.data,
      });
    } else if (status >= 500) {
      error = new ApiServerError(`Server error: ${status}`, status, response.data, { url });
    } else {
      error = new ApiClientError(`Client error: ${status}`, status, response.data, { url });
    }

    this.metrics.incrementCounter('http_errors', { kind: error.code });
    throw error;
  }

  private toGateError(error: unknown): Error {
    if (error instanceof AuthenticationError || error instanceof RequestCancelledError) {
      return error;
    }

    this.logger.warn('Session could not be validated, request not sent', {
      error: error instanceof Error ? error.message : String(error),
    });

    return new AuthenticationError('Session could not be validated', {
      cause: error instanceof SDKError ? error.code : 'unknown',
      causeMessage: error instanceof Error ? error.message : String(error),
    });
  }

  private buildUrl(descriptor: RequestDescriptor): string {
    const base = /^https?:\/\//i.test(descriptor.path)
      ? descriptor.path
      : `${this.apiUrl}${descriptor.path.startsWith('/') ? '' : '/'}${descriptor.path}`;

    return descriptor.query ? `${base}?${descriptor.query}` : base;
  }

  private async runThroughQueue<T>(task: () => Promise<T>): Promise<T> {
    const queue = this.queue;
    if (!queue) {
      return task();
    }

    this.metrics.recordGauge('dispatch_queue_size', queue.size + 1);

    try {
      return await queue.add(task);
    } finally {
      this.metrics.recordGauge('dispatch_queue_size', queue.size);
    }
  }

  private createQueue(limits: DispatchLimits): PQueue | undefined {
    if (limits.concurrency === undefined && limits.qps === undefined) {
      return undefined;
    }

    const concurrency = limits.concurrency ?? Infinity;

    if (limits.qps === undefined) {
      return new PQueue({ concurrency });
    }

    // Fractional QPS: one request per longer interval
    const intervalCap = limits.qps >= 1 ? Math.floor(limits.qps) : 1;
    const interval = limits.qps >= 1 ? 1000 : Math.floor(1000 / limits.qps);

    this.logger.debug('Dispatch rate limiter initialized', {
      qps: limits.qps,
      intervalCap,
      interval,
      concurrency,
    });

    return new PQueue({ concurrency, intervalCap, interval });
  }
}
