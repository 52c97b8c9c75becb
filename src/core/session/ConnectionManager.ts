// src/core/session/ConnectionManager.ts

import { EventEmitter } from 'events';
import type { Grant } from '../auth/types';
import type { GrantExchanger } from '../auth/AuthCore';
import type { TokenState } from '../token/types';
import type { Transport } from '../http/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { AuthenticationError, NotConnectedError, SDKError, TransportError } from '../../utils/errors';
import { abortable, throwIfAborted } from '../../utils/abort';
import { addSpanEvent } from '../../observability/tracing';

export type ConnectionState = 'disconnected' | 'connected';

export interface ConnectionOptions {
  apiUrl: string;
  probePath?: string;
  preRefreshMarginMs?: number;
}

/**
 * What the dispatcher needs from a session: a gate to pass before sending,
 * and the token to send.
 */
export interface SessionGate {
  ensureValid(signal?: AbortSignal): Promise<void>;
  getAccessToken(): string;
}

/**
 * Owns the token state of one connection.
 *
 * Emits `connected`, `refreshed`, `refreshFailed` and `disconnected`.
 * At most one refresh exchange runs at a time; callers that find the session
 * invalid while it runs wait for its result instead of starting another.
 */
export class ConnectionManager extends EventEmitter implements SessionGate {
  private state: ConnectionState = 'disconnected';
  private tokenState?: TokenState;
  // Bumped on every replacement of tokenState
  private generation = 0;
  private refreshInFlight?: Promise<TokenState>;
  private readonly probeUrl: string;
  private readonly preRefreshMarginMs: number;

  constructor(
    private grants: GrantExchanger,
    private transport: Transport,
    options: ConnectionOptions,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {
    super();
    this.probeUrl = `${options.apiUrl}${options.probePath ?? '/user/account'}`;
    this.preRefreshMarginMs = options.preRefreshMarginMs ?? 0;
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected';
  }

  getTokenState(): TokenState | undefined {
    return this.tokenState;
  }

  getAccessToken(): string {
    if (this.state !== 'connected' || !this.tokenState) {
      throw new NotConnectedError();
    }
    return this.tokenState.accessToken;
  }

  /**
   * Exchange a grant and replace the session with the result. On failure the
   * previous session, if any, stays as it was.
   */
  async establish(grant: Grant): Promise<TokenState> {
    const tokenState = await this.grants.exchange(grant);
    this.commit(tokenState);

    this.metrics.incrementCounter('session_established', { grant: grant.type });
    this.logger.info('Session established', {
      grantType: grant.type,
      hasRefreshToken: tokenState.refreshToken !== undefined,
      expiresAt: tokenState.expiresAt?.toISOString(),
    });
    this.emit('connected', { grantType: grant.type, expiresAt: tokenState.expiresAt });

    return tokenState;
  }

  /**
   * Whether the current access token is still usable. A known expiry is
   * checked locally; an unknown one costs a probe request. Never changes the
   * token state.
   */
  async isSessionValid(): Promise<boolean> {
    const tokenState = this.tokenState;
    if (this.state !== 'connected' || !tokenState) {
      return false;
    }

    if (tokenState.expiresAt) {
      return tokenState.expiresAt.getTime() - this.preRefreshMarginMs > Date.now();
    }

    return this.probe(tokenState.accessToken);
  }

  /**
   * Exchange the stored refresh token for a new token state.
   *
   * @throws {NotConnectedError} No session
   * @throws {AuthenticationError} No refresh token, or the identity endpoint rejected it
   * @throws {TransportError} No response from the identity endpoint
   */
  async refresh(): Promise<TokenState> {
    if (this.refreshInFlight) {
      this.metrics.incrementCounter('token_refresh_dedup');
      this.logger.debug('Refresh already in progress, waiting');
      addSpanEvent('session.refresh.joined');
      return this.refreshInFlight;
    }

    const current = this.tokenState;
    if (this.state !== 'connected' || !current) {
      throw new NotConnectedError('Cannot refresh without an established session');
    }
    if (!current.refreshToken) {
      throw new AuthenticationError('Session has no refresh token, establish a new session');
    }

    const refreshPromise = this.executeRefresh(current.refreshToken);
    this.refreshInFlight = refreshPromise;

    try {
      return await refreshPromise;
    } finally {
      if (this.refreshInFlight === refreshPromise) {
        this.refreshInFlight = undefined;
      }
    }
  }

  /**
   * Gate for every dispatch: refresh when the session is no longer valid.
   * Cancelling through `signal` ends this caller's wait only.
   */
  async ensureValid(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);

    if (this.refreshInFlight) {
      await abortable(this.refresh(), signal);
      return;
    }

    if (this.state !== 'connected') {
      throw new NotConnectedError();
    }

    const observed = this.generation;
    const valid = await abortable(this.isSessionValid(), signal);
    if (valid) return;

    // Another caller replaced the tokens while this one was checking
    if (this.generation !== observed) return;

    this.logger.info('Session no longer valid, refreshing', {
      expiresAt: this.tokenState?.expiresAt?.toISOString(),
    });
    await abortable(this.refresh(), signal);
  }

  /**
   * Revoke the tokens (best effort) and drop the session.
   */
  async disconnect(): Promise<void> {
    const current = this.tokenState;
    this.tokenState = undefined;
    this.state = 'disconnected';
    this.generation++;

    if (current) {
      await this.grants.revokeToken(current.accessToken, 'access_token');
      if (current.refreshToken) {
        await this.grants.revokeToken(current.refreshToken, 'refresh_token');
      }
    }

    this.logger.info('Disconnected');
    this.emit('disconnected');
  }

  private commit(tokenState: TokenState): void {
    this.tokenState = tokenState;
    this.state = 'connected';
    this.generation++;
  }

  private async probe(accessToken: string): Promise<boolean> {
    try {
      const response = await this.transport.send({
        url: this.probeUrl,
        method: 'GET',
        headers: {
          Authorization: `Bearer ${accessToken}`,
          Accept: 'application/json',
        },
      });

      const valid = response.status !== 401;
      this.metrics.incrementCounter('session_probe', { result: valid ? 'valid' : 'rejected' });
      this.logger.debug('Session probe', { status: response.status, valid });
      return valid;
    } catch (error: unknown) {
      if (error instanceof TransportError) {
        // Only a rejection counts as invalid; the request itself will surface the outage
        this.metrics.incrementCounter('session_probe', { result: 'unreachable' });
        this.logger.warn('Session probe failed, assuming session is valid', {
          url: error.url,
          error: error.message,
        });
        return true;
      }
      throw error;
    }
  }

  private async executeRefresh(refreshToken: string): Promise<TokenState> {
    const startGeneration = this.generation;
    const startTime = Date.now();

    try {
      const next = await this.grants.exchange({ type: 'refresh_token', refreshToken });

      if (this.generation !== startGeneration) {
        const current = this.tokenState;
        if (!current) {
          throw new NotConnectedError('Session was closed while refreshing');
        }
        this.logger.warn('Discarding refresh result, session was replaced meanwhile');
        return current;
      }

      this.commit(next);

      this.metrics.recordLatency('token_refresh_duration', Date.now() - startTime, {
        status: 'success',
      });
      this.metrics.incrementCounter('token_refresh_total', { status: 'success' });
      this.logger.info('Token refreshed', {
        hasRefreshToken: next.refreshToken !== undefined,
        expiresAt: next.expiresAt?.toISOString(),
      });
      this.emit('refreshed', { expiresAt: next.expiresAt });

      return next;
    } catch (error: unknown) {
      const errorCode = error instanceof SDKError ? error.code : 'unknown';

      this.metrics.recordLatency('token_refresh_duration', Date.now() - startTime, {
        status: 'failed',
      });
      this.metrics.incrementCounter('token_refresh_total', { status: 'failed' });
      this.logger.error('Token refresh failed', {
        errorCode,
        error: error instanceof Error ? error.message : String(error),
      });
      this.emit('refreshFailed', { errorCode });

      throw error;
    }
  }
}
