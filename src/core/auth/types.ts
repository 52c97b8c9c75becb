// src/core/auth/types.ts

export interface OAuth2Config {
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  redirectUri?: string;
  scopes?: string[];
}

export type GrantType = 'password' | 'authorization_code' | 'refresh_token';

export interface PasswordGrant {
  type: 'password';
  username: string;
  password: string;
}

export interface AuthorizationCodeGrant {
  type: 'authorization_code';
  code: string;
  redirectUri?: string; // Falls back to the configured redirect URI
}

export interface RefreshTokenGrant {
  type: 'refresh_token';
  refreshToken: string;
}

export type Grant = PasswordGrant | AuthorizationCodeGrant | RefreshTokenGrant;

export interface AuthUrlOptions {
  state?: string;
  redirectUri?: string;
  extraParams?: Record<string, string>;
}
