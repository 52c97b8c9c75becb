// tests/helpers.ts

import { vi } from 'vitest';
import { Logger } from '../src/observability/Logger';
import { MetricsCollector } from '../src/observability/MetricsCollector';
import { HttpTransport } from '../src/core/http/HttpTransport';
import { RequestDispatcher } from '../src/core/http/RequestDispatcher';
import type { SessionGate } from '../src/core/session/ConnectionManager';
import type { EndpointDeps } from '../src/endpoints/types';
import { createTokenState } from '../src/core/token/types';
import type { TokenState } from '../src/core/token/types';
import type { Grant } from '../src/core/auth/types';

export const BASE_URL = 'https://dracoon.test';
export const API_URL = `${BASE_URL}/api/v4`;

/**
 * Logger whose output is swallowed; assert on the spies instead.
 */
export function createTestLogger(): Logger {
  const logger = new Logger({ level: 'error' });
  vi.spyOn(logger, 'debug').mockImplementation(() => undefined);
  vi.spyOn(logger, 'info').mockImplementation(() => undefined);
  vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
  vi.spyOn(logger, 'error').mockImplementation(() => undefined);
  return logger;
}

export function tokens(accessToken: string, refreshToken?: string, expiresInMs?: number): TokenState {
  return createTokenState({
    accessToken,
    refreshToken,
    expiresAt: expiresInMs !== undefined ? new Date(Date.now() + expiresInMs) : undefined,
    tokenType: 'Bearer',
  });
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * In-memory grant exchanger; each test scripts `exchange`.
 */
export function createFakeGrants() {
  return {
    exchange: vi.fn(async (grant: Grant): Promise<TokenState> => {
      throw new Error(`No exchange scripted for ${grant.type}`);
    }),
    revokeToken: vi.fn(
      async (_token: string, _hint?: 'access_token' | 'refresh_token'): Promise<void> => undefined
    ),
  };
}

/**
 * Let pending promise callbacks run.
 */
export async function flushPromises(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}

/**
 * Endpoint dependencies over a real dispatcher whose session is always
 * valid; pair with nock for the API.
 */
export function createEndpointDeps(): EndpointDeps {
  const logger = createTestLogger();
  const session: SessionGate = {
    ensureValid: async () => undefined,
    getAccessToken: () => 'access-1',
  };
  const dispatcher = new RequestDispatcher(
    session,
    new HttpTransport({ timeout: 1000 }, logger),
    { apiUrl: API_URL },
    new MetricsCollector(),
    logger
  );
  return { dispatcher, logger };
}
