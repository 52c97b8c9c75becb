// tests/unit/Logger.test.ts

import { describe, it, expect } from 'vitest';
import { Logger } from '../../src/observability/Logger';

describe('Logger', () => {
  const logger = new Logger({ level: 'debug', format: 'json' });

  it('should redact credentials in metadata', () => {
    const redacted = logger['redactSensitive']({
      hookId: 12,
      accessToken: 'test-access',
      refreshToken: 'test-refresh',
      password: 'test-password',
      clientSecret: 'test-secret',
      secret: 'hook-secret',
    });

    expect(redacted).toEqual({
      hookId: 12,
      accessToken: '[REDACTED]',
      refreshToken: '[REDACTED]',
      password: '[REDACTED]',
      clientSecret: '[REDACTED]',
      secret: '[REDACTED]',
    });
  });

  it('should redact nested tokenState fields', () => {
    const expiresAt = new Date('2030-01-01');
    const redacted = logger['redactSensitive']({
      tokenState: { accessToken: 'test-access', refreshToken: 'test-refresh', expiresAt },
    });

    expect(redacted.tokenState).toEqual({
      accessToken: '[REDACTED]',
      refreshToken: '[REDACTED]',
      expiresAt,
    });
  });

  it('should redact the Authorization request header', () => {
    const redacted = logger['redactSensitive']({
      url: 'https://dracoon.test/api/v4/user/account',
      headers: { Authorization: 'Bearer test-access', Accept: 'application/json' },
    });

    expect(redacted).toEqual({
      url: 'https://dracoon.test/api/v4/user/account',
      headers: { Authorization: '[REDACTED]', Accept: 'application/json' },
    });
  });

  it('should preserve non-sensitive data', () => {
    const data = { method: 'GET', status: 200, duration: 245 };

    expect(logger['redactSensitive'](data)).toEqual(data);
  });

  it('should not throw when logging', () => {
    const quiet = new Logger({ level: 'error', format: 'pretty' });
    expect(() => {
      quiet.debug('Debug message', { key: 'value' });
      quiet.info('Info message');
      quiet.warn('Warn message', { key: 'value' });
    }).not.toThrow();
  });
});
