/**
 * Error classes for the datasources client
 *
 * Every error raised by the client extends ServerClientError, so callers can
 * branch on the class or on the stable `code` string.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base error class for all client errors
 * Includes error code and contextual information
 */
export class ServerClientError extends Error {
  /** Unique error code */
  code: string;

  /** HTTP status code (if applicable) */
  status?: number;

  /** Additional contextual information about the error */
  context?: ErrorContext;

  constructor(
    message: string,
    code: string = 'SERVER_CLIENT_ERROR',
    status?: number,
    context?: ErrorContext
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.status = status;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Converts the error to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      status: this.status,
      context: this.context,
      stack: this.stack
    };
  }
}

/**
 * Error thrown when an argument fails validation before any request is sent
 */
export class ValidationError extends ServerClientError {
  constructor(
    message: string,
    propertyName?: string,
    expectedType?: string,
    receivedValue?: unknown,
    context?: ErrorContext
  ) {
    super(
      message,
      'VALIDATION_ERROR',
      undefined,
      {
        ...context,
        propertyName,
        expectedType,
        // Objects may carry credentials
        receivedValue: typeof receivedValue === 'object' && receivedValue !== null
          ? 'object'
          : receivedValue
      }
    );
  }
}

/**
 * Error thrown when client configuration is missing or invalid
 */
export class InvalidConfigError extends ValidationError {
  constructor(
    message: string,
    propertyName?: string,
    expectedType?: string,
    receivedValue?: unknown,
    context?: ErrorContext
  ) {
    super(message, propertyName, expectedType, receivedValue, context);
    this.code = 'INVALID_CONFIG_ERROR';
  }
}

/**
 * Error thrown when an item lacks a field the server needs, usually its ID
 */
export class MissingRequiredFieldError extends ServerClientError {
  constructor(message: string, fieldName?: string) {
    super(message, 'MISSING_REQUIRED_FIELD_ERROR', undefined, { fieldName });
  }
}

/**
 * Error thrown when a local file to publish does not exist
 */
export class FileNotFoundError extends ServerClientError {
  constructor(message: string, filePath?: string) {
    super(message, 'FILE_NOT_FOUND_ERROR', undefined, { filePath });
  }
}

/**
 * Error thrown when reading a lazily populated property before it was fetched
 */
export class UnpopulatedPropertyError extends ServerClientError {
  constructor(message: string, propertyName?: string) {
    super(message, 'UNPOPULATED_PROPERTY_ERROR', undefined, { propertyName });
  }
}

/**
 * Error thrown when a server response cannot be parsed
 */
export class ResponseParseError extends ServerClientError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'RESPONSE_PARSE_ERROR', undefined, context);
  }
}

/**
 * Strips query parameters, which may carry session ids
 */
function redactUrl(url?: string): string | undefined {
  if (!url) return undefined;
  try {
    const parsed = new URL(url);
    return parsed.origin + parsed.pathname;
  } catch {
    return undefined;
  }
}

/**
 * Error thrown for network-related failures
 */
export class NetworkError extends ServerClientError {
  constructor(
    message: string,
    url?: string,
    method?: string,
    status?: number,
    context?: ErrorContext
  ) {
    super(
      message,
      'NETWORK_ERROR',
      status,
      {
        ...context,
        url: redactUrl(url),
        method
      }
    );
  }
}

/**
 * Error thrown when a timeout occurs
 */
export class TimeoutError extends NetworkError {
  constructor(
    message: string,
    url?: string,
    method?: string,
    timeoutMs?: number,
    context?: ErrorContext
  ) {
    super(message, url, method, 408, { ...context, timeoutMs });
    this.code = 'TIMEOUT_ERROR';
  }
}

/**
 * Error details the server returns in a `<error>` element
 */
export interface ServerErrorDetails {
  /** Server-specific error code, e.g. `404004` */
  code?: string;
  summary?: string;
  detail?: string;
}

/**
 * Error thrown for non-2xx server responses that have no more specific class
 */
export class ServerResponseError extends ServerClientError {
  readonly serverCode?: string;
  readonly summary?: string;
  readonly detail?: string;

  constructor(
    message: string,
    status: number,
    details: ServerErrorDetails = {},
    context?: ErrorContext
  ) {
    super(message, 'SERVER_RESPONSE_ERROR', status, { ...context, ...details });
    this.serverCode = details.code;
    this.summary = details.summary;
    this.detail = details.detail;
  }
}

/**
 * Error thrown for authentication failures (401, 403)
 */
export class AuthenticationError extends ServerClientError {
  constructor(
    message: string,
    authType?: string,
    status?: number,
    context?: ErrorContext
  ) {
    super(message, 'AUTHENTICATION_ERROR', status, { ...context, authType });
  }
}

/**
 * Error thrown when a resource is not found
 */
export class NotFoundError extends ServerClientError {
  constructor(
    message: string,
    resourceType?: string,
    resourceId?: string,
    status?: number,
    context?: ErrorContext
  ) {
    super(
      message,
      'NOT_FOUND_ERROR',
      status || 404,
      { ...context, resourceType, resourceId }
    );
  }
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

/**
 * Determines if an error carries a specific HTTP status code
 */
export function isHttpError(error: unknown, statusCode: number): boolean {
  return readStatus(error) === statusCode;
}

/**
 * Determines if an error is likely a network/connection error
 */
export function isNetworkError(error: unknown): boolean {
  if (error instanceof NetworkError) return true;
  if (typeof error !== 'object' || error === null) return false;

  const code = 'code' in error ? error.code : undefined;
  if (code === 'ECONNRESET' || code === 'ECONNREFUSED' || code === 'ENOTFOUND') {
    return true;
  }

  const message = error instanceof Error ? error.message : '';
  return message.includes('fetch failed') || message.includes('Network request failed');
}

/**
 * Determines if an error is a server error (5xx status)
 */
export function isServerError(error: unknown): boolean {
  const status = readStatus(error);
  return status !== undefined && status >= 500 && status < 600;
}

/**
 * Determines if an error is likely to be transient and retryable
 */
export function isRetryableError(error: unknown): boolean {
  return isNetworkError(error) ||
         isServerError(error) ||
         isHttpError(error, 429) ||
         error instanceof TimeoutError;
}
