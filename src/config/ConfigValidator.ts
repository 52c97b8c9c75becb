// src/config/ConfigValidator.ts

import { z } from 'zod';

const OAuthConfigSchema = z.object({
  clientId: z.string().min(1, 'oauth.clientId is required'),
  clientSecret: z.string().min(1, 'oauth.clientSecret is required'),
  redirectUri: z.string().url().optional(),
  scopes: z.array(z.string().min(1)).optional(),
});

const HttpConfigSchema = z
  .object({
    timeout: z.number().int().positive().default(30000),
    concurrency: z.number().int().positive().optional(),
    qps: z.number().positive().optional(),
    userAgent: z.string().min(1).optional(),
    keepAlive: z.boolean().optional(),
  })
  .default({});

const SessionConfigSchema = z
  .object({
    // Treat the access token as expired this long before its expiry
    preRefreshMarginSeconds: z.number().int().min(0).max(3600).default(30),
    probePath: z.string().startsWith('/').default('/user/account'),
  })
  .default({});

const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    prefix: z
      .string()
      .regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/, 'metrics.prefix must be a valid metric name prefix')
      .optional(),
  })
  .optional();

export const ClientConfigSchema = z.object({
  baseUrl: z
    .string()
    .url('baseUrl must be an absolute URL')
    .transform((url) => url.replace(/\/+$/, '')),
  apiBasePath: z
    .string()
    .startsWith('/', 'apiBasePath must start with /')
    .transform((path) => path.replace(/\/+$/, ''))
    .default('/api/v4'),
  oauth: OAuthConfigSchema,
  http: HttpConfigSchema,
  session: SessionConfigSchema,
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
});

/** Configuration as passed by the caller; defaults are filled in by validation. */
export type ClientConfig = z.input<typeof ClientConfigSchema>;

/** Configuration after validation, with defaults applied. */
export type ResolvedClientConfig = z.output<typeof ClientConfigSchema>;

/**
 * Validate client configuration
 *
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): ResolvedClientConfig {
  return ClientConfigSchema.parse(config);
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: ResolvedClientConfig } | { success: false; errors: string[] } {
  const result = ClientConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
