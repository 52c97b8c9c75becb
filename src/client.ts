// src/client.ts

import type { Grant, AuthUrlOptions } from './core/auth/types';
import type { TokenState } from './core/token/types';
import type { DispatchOptions, HttpResponse, RequestDescriptor, RetryConfig } from './core/http/types';
import type { ConnectionState } from './core/session/ConnectionManager';
import { AuthCore } from './core/auth/AuthCore';
import { HttpTransport } from './core/http/HttpTransport';
import { RequestDispatcher } from './core/http/RequestDispatcher';
import { RetryHandler } from './core/http/RetryHandler';
import { ConnectionManager } from './core/session/ConnectionManager';
import { SettingsEndpoint } from './endpoints/settings/SettingsEndpoint';
import { WebhooksEndpoint } from './endpoints/settings/WebhooksEndpoint';
import { UserEndpoint } from './endpoints/user/UserEndpoint';
import type { EndpointDeps } from './endpoints/types';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { validateConfig } from './config/ConfigValidator';
import type { ClientConfig, ResolvedClientConfig } from './config/ConfigValidator';

/**
 * Client for one DRACOON tenant and one session.
 *
 * @example
 * ```typescript
 * const client = DracoonClient.create({
 *   baseUrl: 'https://dracoon.example.com',
 *   oauth: { clientId: 'my-app', clientSecret: process.env.DRACOON_CLIENT_SECRET ?? '' },
 * });
 *
 * await client.connect({ type: 'password', username: 'admin', password: 'changeit' });
 * const hooks = await client.webhooks.listWebhooks({ limit: 100, sort: 'name:asc' });
 * ```
 */
export class DracoonClient {
  readonly settings: SettingsEndpoint;
  readonly webhooks: WebhooksEndpoint;
  readonly user: UserEndpoint;

  private readonly config: ResolvedClientConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly auth: AuthCore;
  private readonly connection: ConnectionManager;
  private readonly dispatcher: RequestDispatcher;

  private constructor(config: ResolvedClientConfig) {
    // Build all dependencies first, leaves before the components using them
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics);
    const apiUrl = `${config.baseUrl}${config.apiBasePath}`;

    const transport = new HttpTransport(
      {
        timeout: config.http.timeout,
        userAgent: config.http.userAgent,
        keepAlive: config.http.keepAlive,
      },
      logger
    );
    const auth = new AuthCore({ baseUrl: config.baseUrl, ...config.oauth }, logger);
    const connection = new ConnectionManager(
      auth,
      transport,
      {
        apiUrl,
        probePath: config.session.probePath,
        preRefreshMarginMs: config.session.preRefreshMarginSeconds * 1000,
      },
      metrics,
      logger
    );
    const dispatcher = new RequestDispatcher(
      connection,
      transport,
      { apiUrl, concurrency: config.http.concurrency, qps: config.http.qps },
      metrics,
      logger
    );

    this.config = config;
    this.logger = logger;
    this.metrics = metrics;
    this.auth = auth;
    this.connection = connection;
    this.dispatcher = dispatcher;

    const deps: EndpointDeps = { dispatcher, logger };
    this.settings = new SettingsEndpoint(deps);
    this.webhooks = new WebhooksEndpoint(deps);
    this.user = new UserEndpoint(deps);
  }

  /**
   * Create a client. No request is made until `connect()`.
   *
   * @throws {z.ZodError} If the configuration is invalid
   */
  static create(config: ClientConfig): DracoonClient {
    const client = new DracoonClient(validateConfig(config));
    client.logger.info('Client created', {
      baseUrl: client.config.baseUrl,
      apiBasePath: client.config.apiBasePath,
    });
    return client;
  }

  /**
   * Establish the session with a password, authorization code or refresh
   * token grant.
   *
   * @throws {AuthenticationError} If the identity endpoint rejects the grant
   * @throws {TransportError} If the identity endpoint cannot be reached
   */
  async connect(grant: Grant): Promise<TokenState> {
    return this.connection.establish(grant);
  }

  /**
   * Authorization URL for the authorization code flow; pass the code the
   * user comes back with to `connect({ type: 'authorization_code', code })`.
   */
  getAuthorizationUrl(opts?: AuthUrlOptions): { url: string; state: string } {
    return this.auth.createAuthUrl(opts);
  }

  getConnectionState(): ConnectionState {
    return this.connection.getState();
  }

  getTokenState(): TokenState | undefined {
    return this.connection.getTokenState();
  }

  async isSessionValid(): Promise<boolean> {
    return this.connection.isSessionValid();
  }

  async refresh(): Promise<TokenState> {
    return this.connection.refresh();
  }

  /**
   * Revoke the tokens and drop the session.
   */
  async disconnect(): Promise<void> {
    await this.connection.disconnect();
  }

  /**
   * Send any request descriptor through the session, e.g. one built with
   * the request functions exported next to each endpoint.
   */
  async request<T = unknown>(
    descriptor: RequestDescriptor,
    opts?: DispatchOptions
  ): Promise<HttpResponse<T>> {
    return this.dispatcher.dispatch<T>(descriptor, opts);
  }

  /**
   * Subscribe to session events: `connected`, `refreshed`, `refreshFailed`,
   * `disconnected`.
   */
  on(event: 'connected' | 'refreshed' | 'refreshFailed' | 'disconnected', listener: (payload?: Record<string, unknown>) => void): this {
    this.connection.on(event, listener);
    return this;
  }

  /**
   * Prometheus exposition text for this client's metrics.
   */
  async getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }

  /** `Content-Type` header to serve {@link getMetrics} output with. */
  getMetricsContentType(): string {
    return this.metrics.contentType;
  }

  /**
   * Retry helper that logs through this client's logger.
   *
   * @example
   * ```typescript
   * const retry = client.createRetryHandler({ maxRetries: 3, baseDelay: 200, maxDelay: 2000 });
   * const account = await retry.execute(() => client.user.getAccount());
   * ```
   */
  createRetryHandler(config: RetryConfig): RetryHandler {
    return new RetryHandler(config, this.logger);
  }
}
