// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const REDACTED = '[REDACTED]';

// Credential material that must never reach a log line
const SENSITIVE_KEYS = [
  'accessToken',
  'refreshToken',
  'password',
  'clientSecret',
  'secret',
  'authorization',
  'Authorization',
];

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(meta: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = { ...meta };

    for (const key of SENSITIVE_KEYS) {
      if (key in redacted && redacted[key] !== undefined) redacted[key] = REDACTED;
    }

    // Nested token snapshot and request headers
    for (const nestedKey of ['tokenState', 'headers']) {
      const nested = redacted[nestedKey];
      if (nested && typeof nested === 'object' && !Array.isArray(nested)) {
        redacted[nestedKey] = this.redactSensitive(Object.fromEntries(Object.entries(nested)));
      }
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta ? this.redactSensitive(meta) : {});
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta ? this.redactSensitive(meta) : {});
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta ? this.redactSensitive(meta) : {});
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta ? this.redactSensitive(meta) : {});
  }
}
