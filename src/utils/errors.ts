// src/utils/errors.ts

export class SDKError extends Error {
  public readonly retryable: boolean;

  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>,
    retryable = false
  ) {
    super(message);
    this.name = this.constructor.name;
    this.retryable = retryable;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Local validation errors (never reach the network)
export class ValidationError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

// Session errors
export class AuthenticationError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTHENTICATION_ERROR', details);
  }
}

export class NotConnectedError extends AuthenticationError {
  constructor(message: string = 'Client is not connected', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NOT_CONNECTED';
  }
}

// Transport errors (no response received)
export class TransportError extends SDKError {
  constructor(
    message: string,
    public url: string,
    details?: Record<string, unknown>
  ) {
    super(message, 'TRANSPORT_ERROR', { ...details, url }, true);
  }
}

export class NetworkTimeoutError extends TransportError {
  constructor(url: string, details?: Record<string, unknown>) {
    super('Request timeout', url, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

export class RequestCancelledError extends SDKError {
  constructor(message: string = 'Request cancelled', details?: Record<string, unknown>) {
    super(message, 'REQUEST_CANCELLED', details);
  }
}

// API errors (a response was received)

/** Error body returned by the API, e.g. `{ code: 404, message: 'Not found', errorCode: -41000 }`. */
export interface ServerErrorBody {
  code?: number;
  message?: string;
  debugInfo?: string;
  errorCode?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ApiError extends SDKError {
  constructor(
    message: string,
    public status: number,
    public body?: unknown,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status }, status >= 500);
  }

  get serverError(): ServerErrorBody | undefined {
    const raw = this.body;
    if (!isRecord(raw)) return undefined;
    return {
      code: typeof raw.code === 'number' ? raw.code : undefined,
      message: typeof raw.message === 'string' ? raw.message : undefined,
      debugInfo: typeof raw.debugInfo === 'string' ? raw.debugInfo : undefined,
      errorCode: typeof raw.errorCode === 'number' ? raw.errorCode : undefined,
    };
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number, body?: unknown, details?: Record<string, unknown>) {
    super(message, status, body, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number, body?: unknown, details?: Record<string, unknown>) {
    super(message, status, body, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class ResponseDecodeError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RESPONSE_DECODE_ERROR', details);
  }
}
