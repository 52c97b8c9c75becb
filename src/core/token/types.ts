// src/core/token/types.ts

export interface TokenFields {
  accessToken: string;
  refreshToken?: string;
  expiresAt?: Date;
  tokenType?: string;
  scope?: string;
}

/**
 * Snapshot of the current credentials. Instances are frozen; a refresh
 * replaces the whole snapshot instead of editing it.
 */
export class TokenState {
  readonly accessToken: string;
  readonly refreshToken?: string;
  readonly tokenType?: string;
  readonly scope?: string;
  private readonly expiresAtMs?: number;

  constructor(fields: TokenFields) {
    this.accessToken = fields.accessToken;
    this.refreshToken = fields.refreshToken;
    this.tokenType = fields.tokenType;
    this.scope = fields.scope;
    this.expiresAtMs = fields.expiresAt?.getTime();
    Object.freeze(this);
  }

  /** A new `Date` on every read; changing it does not move the expiry. */
  get expiresAt(): Date | undefined {
    return this.expiresAtMs === undefined ? undefined : new Date(this.expiresAtMs);
  }
}

export function createTokenState(fields: TokenFields): TokenState {
  return new TokenState(fields);
}
