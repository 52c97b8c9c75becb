// src/core/http/RetryHandler.ts

import type { RetryConfig } from './types';
import type { Logger } from '../../observability/Logger';
import { SDKError } from '../../utils/errors';

/**
 * Opt-in retries for callers. The dispatcher never retries on its own; wrap
 * an operation here to retry it when it fails with a retryable error
 * (5xx, transport failure).
 */
export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger
  ) {}

  async execute<T>(task: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await task();
      } catch (error: unknown) {
        if (!(error instanceof SDKError) || !error.retryable || attempt >= this.config.maxRetries) {
          throw error;
        }

        // Exponential backoff with jitter
        const delay = Math.min(
          this.config.baseDelay * Math.pow(2, attempt) + Math.random() * this.config.baseDelay,
          this.config.maxDelay
        );

        this.logger.warn('Retrying request', {
          attempt: attempt + 1,
          delay,
          errorCode: error.code,
        });

        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }
}
