// src/index.ts

export { DracoonClient } from './client';
export type { ClientConfig, ResolvedClientConfig } from './config/ConfigValidator';
export { validateConfig, validateConfigSafe } from './config/ConfigValidator';

export type { TokenState, TokenFields } from './core/token/types';
export type {
  Grant,
  GrantType,
  PasswordGrant,
  AuthorizationCodeGrant,
  RefreshTokenGrant,
  AuthUrlOptions,
} from './core/auth/types';
export type { ConnectionState } from './core/session/ConnectionManager';
export type {
  HttpMethod,
  HttpResponse,
  RequestDescriptor,
  DispatchOptions,
  RetryConfig,
} from './core/http/types';
export { RetryHandler } from './core/http/RetryHandler';
export { Logger } from './observability/Logger';
export type { LoggerConfig } from './observability/Logger';
export { buildQuery } from './core/query/QueryBuilder';
export type { ListParams } from './core/query/QueryBuilder';

export type { Paginated, Range } from './endpoints/types';
export type { SettingsUpdateOptions } from './endpoints/settings/SettingsEndpoint';
export type { WebhookOptions, WebhookUpdateOptions } from './endpoints/settings/WebhooksEndpoint';
export type {
  CustomerSettings,
  SettingsUpdate,
  Webhook,
  WebhookList,
  EventType,
  EventTypeList,
  CreateWebhook,
  UpdateWebhook,
} from './endpoints/settings/types';
export type {
  UserAccount,
  UserInfo,
  UserGroup,
  UserType,
  AccountUpdate,
} from './endpoints/user/types';

// Request descriptors for use with client.request()
export {
  getSettingsRequest,
  updateSettingsRequest,
  listWebhooksRequest,
  createWebhookRequest,
  getWebhookRequest,
  updateWebhookRequest,
  deleteWebhookRequest,
  listEventTypesRequest,
} from './endpoints/settings/requests';
export { getAccountRequest, updateAccountRequest } from './endpoints/user/requests';

// Export error classes for error handling
export {
  SDKError,
  ValidationError,
  AuthenticationError,
  NotConnectedError,
  TransportError,
  NetworkTimeoutError,
  RequestCancelledError,
  ApiError,
  ApiClientError,
  ApiServerError,
  ResponseDecodeError,
} from './utils/errors';
export type { ServerErrorBody } from './utils/errors';
