// src/core/http/HttpTransport.ts

import axios, { AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type { HttpResponse, Transport, TransportConfig, TransportRequest } from './types';
import type { Logger } from '../../observability/Logger';
import { NetworkTimeoutError, RequestCancelledError, TransportError } from '../../utils/errors';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Sends one request over axios with keep-alive agents. Every status code
 * resolves; classifying it is the dispatcher's job.
 */
export class HttpTransport implements Transport {
  private axiosInstance: AxiosInstance;
  private logger: Logger;

  constructor(config: TransportConfig, logger: Logger) {
    this.logger = logger;
    const keepAlive = config.keepAlive ?? true;

    this.axiosInstance = axios.create({
      timeout: config.timeout ?? 30000,
      httpAgent: new http.Agent({ keepAlive }),
      httpsAgent: new https.Agent({ keepAlive }),
      headers: {
        'User-Agent': config.userAgent ?? 'dracoon-session-client/1.0',
      },
      validateStatus: () => true,
    });
  }

  async send<T = unknown>(request: TransportRequest): Promise<HttpResponse<T>> {
    try {
      const response = await this.axiosInstance.request<T>({
        url: request.url,
        method: request.method,
        headers: request.headers,
        data: request.body,
        signal: request.signal,
      });

      return {
        data: response.data,
        status: response.status,
        headers: this.toHeaderRecord(response.headers),
      };
    } catch (error: unknown) {
      throw this.transformError(error, request);
    }
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, request: TransportRequest): Error {
    if (axios.isCancel(error) || request.signal?.aborted) {
      return new RequestCancelledError('Request cancelled', { url: request.url });
    }

    if (axios.isAxiosError(error)) {
      this.logger.debug('HTTP transport failure', {
        url: request.url,
        method: request.method,
        errorCode: error.code,
        error: error.message,
      });

      if (error.code && TIMEOUT_CODES.has(error.code)) {
        return new NetworkTimeoutError(request.url, { method: request.method });
      }

      return new TransportError(`Connection to ${request.url} failed`, request.url, {
        method: request.method,
        errorCode: error.code,
        cause: error.message,
      });
    }

    return new TransportError(`Connection to ${request.url} failed`, request.url, {
      method: request.method,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}
