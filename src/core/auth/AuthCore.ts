// src/core/auth/AuthCore.ts

import { Issuer, Client, TokenSet, errors, generators } from 'openid-client';
import { z } from 'zod';
import type { AuthUrlOptions, Grant, GrantType, OAuth2Config } from './types';
import type { TokenState } from '../token/types';
import { createTokenState } from '../token/types';
import type { Logger } from '../../observability/Logger';
import {
  SDKError,
  AuthenticationError,
  NetworkTimeoutError,
  TransportError,
  ValidationError,
} from '../../utils/errors';
import { withGrantSpan } from '../../observability/tracing';

const GrantSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('password'),
    username: z.string().min(1, 'username is required'),
    password: z.string().min(1, 'password is required'),
  }),
  z.object({
    type: z.literal('authorization_code'),
    code: z.string().min(1, 'authorization code is required'),
    redirectUri: z.string().url().optional(),
  }),
  z.object({
    type: z.literal('refresh_token'),
    refreshToken: z.string().min(1, 'refresh token is required'),
  }),
]);

/**
 * Exchanges grants at the identity endpoint. The Connection Manager depends
 * on this shape only, so tests can swap in a fake.
 */
export interface GrantExchanger {
  exchange(grant: Grant): Promise<TokenState>;
  revokeToken(token: string, hint?: 'access_token' | 'refresh_token'): Promise<void>;
}

export class AuthCore implements GrantExchanger {
  private client: Client;
  private readonly tokenEndpoint: string;
  private logger: Logger;

  constructor(
    private config: OAuth2Config,
    logger: Logger
  ) {
    this.logger = logger;
    this.tokenEndpoint = `${config.baseUrl}/oauth/token`;

    const issuer = new Issuer({
      issuer: config.baseUrl,
      authorization_endpoint: `${config.baseUrl}/oauth/authorize`,
      token_endpoint: this.tokenEndpoint,
      revocation_endpoint: `${config.baseUrl}/oauth/revoke`,
      token_endpoint_auth_methods_supported: ['client_secret_basic', 'client_secret_post'],
    });

    this.client = new issuer.Client({
      client_id: config.clientId,
      client_secret: config.clientSecret,
      redirect_uris: config.redirectUri ? [config.redirectUri] : undefined,
      response_types: ['code'],
      token_endpoint_auth_method: 'client_secret_basic',
    });
  }

  /**
   * Authorization URL for the authorization code flow. The returned state
   * must be compared with the one the user agent comes back with.
   */
  createAuthUrl(opts: AuthUrlOptions = {}): { url: string; state: string } {
    const redirectUri = opts.redirectUri ?? this.config.redirectUri;
    if (!redirectUri) {
      throw new ValidationError('A redirect URI is required for the authorization code flow');
    }

    const state = opts.state ?? generators.state();
    const url = this.client.authorizationUrl({
      redirect_uri: redirectUri,
      state,
      ...(this.config.scopes?.length ? { scope: this.config.scopes.join(' ') } : {}),
      ...opts.extraParams,
    });

    this.logger.debug('Created auth URL', { state });
    return { url, state };
  }

  /**
   * Exchange a grant for a token state. Nothing is stored here; the caller
   * decides what to do with the result.
   *
   * @throws {ValidationError} Grant is missing credential material
   * @throws {AuthenticationError} Identity endpoint rejected the grant
   * @throws {TransportError} No response from the identity endpoint
   */
  async exchange(grant: Grant): Promise<TokenState> {
    const parsed = GrantSchema.safeParse(grant);
    if (!parsed.success) {
      throw new ValidationError('Invalid grant', {
        grantType: grant.type,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    return withGrantSpan(grant.type, async () => {
      try {
        const tokenSet = await this.request(grant);
        const previousRefreshToken = grant.type === 'refresh_token' ? grant.refreshToken : undefined;
        const tokenState = this.toTokenState(tokenSet, previousRefreshToken);

        this.logger.debug('Token exchange successful', {
          grantType: grant.type,
          hasRefreshToken: tokenState.refreshToken !== undefined,
          tokenType: tokenState.tokenType,
          expiresAt: tokenState.expiresAt?.toISOString(),
        });

        return tokenState;
      } catch (error: unknown) {
        const classified = this.classifyError(error, grant.type);
        this.logger.error('Token exchange failed', {
          grantType: grant.type,
          errorCode: classified.code,
          error: classified.message,
        });
        throw classified;
      }
    });
  }

  /**
   * Revoke a token. Best effort: a failed revocation is logged, not thrown,
   * because the local session is dropped either way.
   */
  async revokeToken(token: string, hint?: 'access_token' | 'refresh_token'): Promise<void> {
    try {
      await this.client.revoke(token, hint);
      this.logger.info('Token revoked', { hint });
    } catch (error: unknown) {
      this.logger.warn('Token revocation failed', {
        hint,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async request(grant: Grant): Promise<TokenSet> {
    switch (grant.type) {
      case 'password':
        return this.client.grant({
          grant_type: 'password',
          username: grant.username,
          password: grant.password,
        });
      case 'authorization_code': {
        const redirectUri = grant.redirectUri ?? this.config.redirectUri;
        if (!redirectUri) {
          throw new ValidationError('A redirect URI is required to exchange an authorization code');
        }
        return this.client.grant({
          grant_type: 'authorization_code',
          code: grant.code,
          redirect_uri: redirectUri,
        });
      }
      case 'refresh_token':
        return this.client.refresh(grant.refreshToken);
    }
  }

  private toTokenState(tokenSet: TokenSet, previousRefreshToken?: string): TokenState {
    if (!tokenSet.access_token) {
      throw new AuthenticationError('Identity endpoint returned no access token');
    }

    return createTokenState({
      accessToken: tokenSet.access_token,
      // Some grants rotate the refresh token, others keep it
      refreshToken: tokenSet.refresh_token ?? previousRefreshToken,
      expiresAt: tokenSet.expires_at !== undefined ? new Date(tokenSet.expires_at * 1000) : undefined,
      tokenType: tokenSet.token_type,
      scope: tokenSet.scope,
    });
  }

  private classifyError(error: unknown, grantType: GrantType): SDKError {
    if (error instanceof SDKError) {
      return error;
    }

    if (error instanceof errors.OPError) {
      return new AuthenticationError(`Identity endpoint rejected the ${grantType} grant`, {
        grantType,
        error: error.error,
        errorDescription: error.error_description,
        status: error.response?.statusCode,
      });
    }

    const message = error instanceof Error ? error.message : String(error);

    if (error instanceof errors.RPError) {
      if (message.includes('timed out')) {
        return new NetworkTimeoutError(this.tokenEndpoint, { grantType });
      }
      return new AuthenticationError('Invalid response from identity endpoint', {
        grantType,
        cause: message,
      });
    }

    return new TransportError(
      `Connection to identity endpoint failed: ${this.tokenEndpoint}`,
      this.tokenEndpoint,
      { grantType, cause: message }
    );
  }
}
