/**
 * Client Integration Tests
 *
 * Full flows through DracoonClient: identity endpoint and API are nock
 * stand-ins, everything else is real.
 *
 * Run with: npm test
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import nock from 'nock';
import { ZodError } from 'zod';
import { DracoonClient } from '../../src/client';
import type { ClientConfig } from '../../src/config/ConfigValidator';
import { getAccountRequest } from '../../src/endpoints/user/requests';
import {
  ApiServerError,
  AuthenticationError,
  NotConnectedError,
  ValidationError,
} from '../../src/utils/errors';
import { BASE_URL } from '../helpers';
import webhookFixture from '../fixtures/webhook.json';

const ACCOUNT = {
  id: 2,
  userName: 'admin',
  firstName: 'Ada',
  lastName: 'Admin',
  isLocked: false,
  hasManageableRooms: true,
  language: 'de-DE',
};

const testConfig: ClientConfig = {
  baseUrl: BASE_URL,
  oauth: {
    clientId: 'dracoon-test',
    clientSecret: 'test-secret',
    redirectUri: 'http://localhost:3000/callback',
  },
  http: { timeout: 1000 },
  logging: { level: 'error' },
};

function mockPasswordGrant(expiresIn: number): nock.Scope {
  return nock(BASE_URL)
    .post('/oauth/token', { grant_type: 'password', username: 'admin', password: 'test-password' })
    .reply(200, {
      access_token: 'access-1',
      refresh_token: 'refresh-1',
      token_type: 'bearer',
      expires_in: expiresIn,
    });
}

describe('DracoonClient', () => {
  let client: DracoonClient;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    client = DracoonClient.create(testConfig);
  });

  afterEach(() => {
    nock.cleanAll();
    vi.restoreAllMocks();
  });

  it('should reject an invalid config', () => {
    expect(() => DracoonClient.create({ ...testConfig, baseUrl: 'dracoon' })).toThrow(ZodError);
  });

  it('should establish a valid session with a password grant', async () => {
    mockPasswordGrant(3600);
    const connected = vi.fn();
    client.on('connected', connected);

    const state = await client.connect({ type: 'password', username: 'admin', password: 'test-password' });

    expect(state.accessToken).toBe('access-1');
    expect(client.getConnectionState()).toBe('connected');
    await expect(client.isSessionValid()).resolves.toBe(true);
    expect(connected).toHaveBeenCalledTimes(1);
    expect(await client.getMetrics()).toContain('dracoon_session_established_total{grant="password"} 1');
  });

  it('should refresh an expired session once before concurrent requests are sent', async () => {
    // Expires inside the default 30 second pre-refresh margin
    mockPasswordGrant(10);
    await client.connect({ type: 'password', username: 'admin', password: 'test-password' });

    const events: string[] = [];
    nock(BASE_URL)
      .post('/oauth/token', { grant_type: 'refresh_token', refresh_token: 'refresh-1' })
      .reply(() => {
        events.push('refresh');
        return [
          200,
          { access_token: 'access-2', refresh_token: 'refresh-2', token_type: 'bearer', expires_in: 3600 },
        ];
      });
    nock(BASE_URL)
      .get('/api/v4/user/account')
      .matchHeader('authorization', 'Bearer access-2')
      .times(3)
      .reply(() => {
        events.push('request');
        return [200, ACCOUNT];
      });
    const refreshed = vi.fn();
    client.on('refreshed', refreshed);

    const accounts = await Promise.all([
      client.user.getAccount(),
      client.user.getAccount(),
      client.user.getAccount(),
    ]);

    expect(accounts.map((account) => account.userName)).toEqual(['admin', 'admin', 'admin']);
    expect(events).toEqual(['refresh', 'request', 'request', 'request']);
    expect(refreshed).toHaveBeenCalledTimes(1);
    expect(client.getTokenState()?.refreshToken).toBe('refresh-2');
  });

  it('should keep the session when the refresh is rejected', async () => {
    mockPasswordGrant(10);
    await client.connect({ type: 'password', username: 'admin', password: 'test-password' });
    nock(BASE_URL).post('/oauth/token').reply(400, { error: 'invalid_grant' });

    await expect(client.user.getAccount()).rejects.toBeInstanceOf(AuthenticationError);

    expect(client.getTokenState()?.accessToken).toBe('access-1');
    expect(client.getConnectionState()).toBe('connected');
  });

  it('should accept a capped page of webhooks', async () => {
    mockPasswordGrant(3600);
    await client.connect({ type: 'password', username: 'admin', password: 'test-password' });
    const items = Array.from({ length: 500 }, (_, index) => ({ ...webhookFixture, id: index + 1 }));
    nock(BASE_URL)
      .get('/api/v4/settings/webhooks')
      .query({ offset: '0', limit: '500' })
      .reply(200, { range: { offset: 0, limit: 500, total: 1200 }, items });

    const page = await client.webhooks.listWebhooks({ offset: 0, limit: 500 });

    expect(page.range.total).toBe(1200);
    expect(page.items).toHaveLength(500);
  });

  it('should reject a home room deactivation without any request', async () => {
    mockPasswordGrant(3600);
    await client.connect({ type: 'password', username: 'admin', password: 'test-password' });

    expect(() => client.settings.makeSettingsUpdate({ homeRoomsActive: false })).toThrow(ValidationError);
    await expect(client.settings.updateSettings({ homeRoomsActive: false })).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(nock.pendingMocks()).toEqual([]);
  });

  it('should surface a 401 after the gate as AuthenticationError', async () => {
    mockPasswordGrant(3600);
    await client.connect({ type: 'password', username: 'admin', password: 'test-password' });
    nock(BASE_URL).get('/api/v4/user/account').reply(401, { code: 401, message: 'Unauthorized' });

    const error = await client.user.getAccount().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({ message: 'Request rejected as unauthorized' });
    expect(client.getTokenState()?.accessToken).toBe('access-1');
  });

  it('should dispatch a raw descriptor', async () => {
    mockPasswordGrant(3600);
    await client.connect({ type: 'password', username: 'admin', password: 'test-password' });
    nock(BASE_URL).get('/api/v4/user/account').reply(200, ACCOUNT, { 'X-Trace': 'abc' });

    const response = await client.request(getAccountRequest());

    expect(response.status).toBe(200);
    expect(response.data).toEqual(ACCOUNT);
    expect(response.headers['x-trace']).toBe('abc');
  });

  it('should revoke the tokens on disconnect and refuse further requests', async () => {
    mockPasswordGrant(3600);
    await client.connect({ type: 'password', username: 'admin', password: 'test-password' });
    const revoke = nock(BASE_URL)
      .post('/oauth/revoke', { token: 'access-1', token_type_hint: 'access_token' })
      .reply(200)
      .post('/oauth/revoke', { token: 'refresh-1', token_type_hint: 'refresh_token' })
      .reply(200);

    await client.disconnect();

    expect(revoke.isDone()).toBe(true);
    expect(client.getConnectionState()).toBe('disconnected');
    await expect(client.user.getAccount()).rejects.toBeInstanceOf(NotConnectedError);
  });

  it('should send a queued request with the token committed while it waited', async () => {
    client = DracoonClient.create({ ...testConfig, http: { timeout: 1000, concurrency: 1 } });
    mockPasswordGrant(3600);
    await client.connect({ type: 'password', username: 'admin', password: 'test-password' });
    nock(BASE_URL)
      .post('/oauth/token', { grant_type: 'refresh_token', refresh_token: 'refresh-1' })
      .reply(200, { access_token: 'access-2', refresh_token: 'refresh-2', token_type: 'bearer', expires_in: 3600 });
    const api = nock(BASE_URL)
      .get('/api/v4/user/account')
      .delay(100)
      .reply(200, ACCOUNT)
      .get('/api/v4/user/account')
      .matchHeader('authorization', 'Bearer access-2')
      .reply(200, { ...ACCOUNT, id: 3 });

    const first = client.user.getAccount();
    const second = client.user.getAccount();
    await client.refresh();

    const accounts = await Promise.all([first, second]);

    expect(accounts.map((account) => account.id)).toEqual([2, 3]);
    expect(api.isDone()).toBe(true);
  });

  it('should retry a server error through the client retry helper', async () => {
    mockPasswordGrant(3600);
    await client.connect({ type: 'password', username: 'admin', password: 'test-password' });
    const api = nock(BASE_URL)
      .get('/api/v4/user/account')
      .reply(503, 'Service Unavailable')
      .get('/api/v4/user/account')
      .reply(200, ACCOUNT);

    const retry = client.createRetryHandler({ maxRetries: 2, baseDelay: 1, maxDelay: 5 });
    const account = await retry.execute(() => client.user.getAccount());

    expect(account).toMatchObject({ id: 2, userName: 'admin' });
    expect(api.isDone()).toBe(true);
  });

  it('should give up after the configured retries', async () => {
    mockPasswordGrant(3600);
    await client.connect({ type: 'password', username: 'admin', password: 'test-password' });
    nock(BASE_URL).get('/api/v4/user/account').times(2).reply(502);

    const retry = client.createRetryHandler({ maxRetries: 1, baseDelay: 1, maxDelay: 5 });

    await expect(retry.execute(() => client.user.getAccount())).rejects.toBeInstanceOf(ApiServerError);
    expect(nock.pendingMocks()).toEqual([]);
  });

  it('should expose the metrics content type', () => {
    expect(client.getMetricsContentType()).toBe('text/plain; version=0.0.4; charset=utf-8');
  });

  it('should build the authorization URL', () => {
    const { url, state } = client.getAuthorizationUrl({ state: 'state-123' });

    expect(url.startsWith(`${BASE_URL}/oauth/authorize?`)).toBe(true);
    expect(new URL(url).searchParams.get('state')).toBe(state);
  });
});
