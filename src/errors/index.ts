/**
 * Webhook error types and handling.
 *
 * Two disjoint families share the {@link WebhookError} base: message
 * validation errors raised before anything is sent, and transport errors
 * raised by the HTTP exchange.
 */

import { z } from 'zod';
import type { Interval } from '../validation/interval.js';

/**
 * Error codes for webhook errors.
 */
export enum WebhookErrorCode {
  // Message validation
  LengthExceeded = 'LENGTH_EXCEEDED',
  LimitExceeded = 'LIMIT_EXCEEDED',
  DuplicateIdentifier = 'DUPLICATE_IDENTIFIER',
  MissingRequiredField = 'MISSING_REQUIRED_FIELD',
  EmptyComposite = 'EMPTY_COMPOSITE',
  InvalidInput = 'INVALID_INPUT',

  // Request errors
  BadRequest = 'BAD_REQUEST',
  Unauthorized = 'UNAUTHORIZED',
  Forbidden = 'FORBIDDEN',
  NotFound = 'NOT_FOUND',
  RateLimited = 'RATE_LIMITED',

  // Server errors
  ServerError = 'SERVER_ERROR',
  NetworkError = 'NETWORK_ERROR',
  ResponseParseError = 'RESPONSE_PARSE_ERROR',

  // Configuration errors
  ConfigurationError = 'CONFIGURATION_ERROR',
}

/**
 * Error body returned by the webhook API.
 */
export const ApiErrorResponseSchema = z.object({
  /** Platform error code */
  code: z.number().optional(),
  /** Error message */
  message: z.string().optional(),
  /** Detailed errors per field */
  errors: z.record(z.unknown()).optional(),
  /** Retry-After value in seconds (present on 429) */
  retry_after: z.number().optional(),
  /** Whether this is a global rate limit */
  global: z.boolean().optional(),
});

export type ApiErrorResponse = z.infer<typeof ApiErrorResponseSchema>;

/**
 * Base webhook error class.
 */
export class WebhookError extends Error {
  /** Error code */
  readonly code: WebhookErrorCode;
  /** HTTP status code (if applicable) */
  readonly statusCode?: number;
  /** Whether repeating the same request could succeed */
  readonly retryable: boolean;
  /** Platform error code */
  readonly apiCode?: number;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: WebhookErrorCode;
    message: string;
    statusCode?: number;
    retryable?: boolean;
    apiCode?: number;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super(options.message, { cause: options.cause });
    this.name = 'WebhookError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
    this.apiCode = options.apiCode;
    this.details = options.details;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      apiCode: this.apiCode,
      details: this.details,
    };
  }
}

// ============================================================================
// Message Validation Errors (Non-Retryable)
// ============================================================================

/**
 * Base class for violations found by the message checker.
 */
export class MessageValidationError extends WebhookError {
  /** Human-readable name of the offending field */
  readonly field: string;

  constructor(options: {
    code: WebhookErrorCode;
    message: string;
    field: string;
    details?: Record<string, unknown>;
  }) {
    super({
      code: options.code,
      message: options.message,
      retryable: false,
      details: { field: options.field, ...options.details },
    });
    this.name = 'MessageValidationError';
    this.field = options.field;
  }
}

/**
 * A string field is outside its length range.
 */
export class LengthExceededError extends MessageValidationError {
  readonly bound: Interval;
  readonly actual: number;

  constructor(field: string, bound: Interval, actual: number) {
    super({
      code: WebhookErrorCode.LengthExceeded,
      message: `Length of ${field} (${actual}) is outside the allowed range ${bound}`,
      field,
      details: { min: bound.min, max: bound.max, actual },
    });
    this.name = 'LengthExceededError';
    this.bound = bound;
    this.actual = actual;
  }
}

/**
 * A count is outside its range.
 */
export class LimitExceededError extends MessageValidationError {
  readonly bound: Interval;
  readonly actual: number;

  constructor(field: string, bound: Interval, actual: number) {
    super({
      code: WebhookErrorCode.LimitExceeded,
      message: `Number of ${field} (${actual}) exceeds the allowed range ${bound}`,
      field,
      details: { min: bound.min, max: bound.max, actual },
    });
    this.name = 'LimitExceededError';
    this.bound = bound;
    this.actual = actual;
  }
}

/**
 * A custom id was registered twice within one message.
 */
export class DuplicateIdentifierError extends MessageValidationError {
  readonly identifier: string;

  constructor(identifier: string) {
    super({
      code: WebhookErrorCode.DuplicateIdentifier,
      message: `Custom id "${identifier}" cannot be used twice in the same message`,
      field: 'custom id',
      details: { identifier },
    });
    this.name = 'DuplicateIdentifierError';
    this.identifier = identifier;
  }
}

/**
 * A field required by the component variant is absent.
 */
export class MissingRequiredFieldError extends MessageValidationError {
  constructor(field: string) {
    super({
      code: WebhookErrorCode.MissingRequiredField,
      message: `Missing required field: ${field}`,
      field,
    });
    this.name = 'MissingRequiredFieldError';
  }
}

/**
 * A container that must hold at least one child is empty.
 */
export class EmptyCompositeError extends MessageValidationError {
  constructor(composite: string) {
    super({
      code: WebhookErrorCode.EmptyComposite,
      message: `An ${composite} must contain at least one component`,
      field: composite,
    });
    this.name = 'EmptyCompositeError';
  }
}

/**
 * Raised by the client when a message fails validation. The validation error
 * is kept as the cause and its message is reused unchanged.
 */
export class InvalidInputError extends WebhookError {
  constructor(cause: MessageValidationError) {
    super({
      code: WebhookErrorCode.InvalidInput,
      message: cause.message,
      retryable: false,
      details: { validationCode: cause.code, field: cause.field },
      cause,
    });
    this.name = 'InvalidInputError';
  }
}

// ============================================================================
// Request Errors (Non-Retryable)
// ============================================================================

/**
 * Bad request (payload rejected by the API).
 */
export class BadRequestError extends WebhookError {
  constructor(message: string, apiCode?: number, errors?: Record<string, unknown>) {
    super({
      code: WebhookErrorCode.BadRequest,
      message,
      statusCode: 400,
      retryable: false,
      apiCode,
      details: errors ? { errors } : undefined,
    });
    this.name = 'BadRequestError';
  }
}

/**
 * Invalid webhook token.
 */
export class UnauthorizedError extends WebhookError {
  constructor(message: string = 'Invalid webhook token') {
    super({
      code: WebhookErrorCode.Unauthorized,
      message,
      statusCode: 401,
      retryable: false,
    });
    this.name = 'UnauthorizedError';
  }
}

/**
 * Missing permissions for the operation.
 */
export class ForbiddenError extends WebhookError {
  constructor(message: string = 'Missing permissions for this operation') {
    super({
      code: WebhookErrorCode.Forbidden,
      message,
      statusCode: 403,
      retryable: false,
    });
    this.name = 'ForbiddenError';
  }
}

/**
 * Webhook (or referenced resource) not found.
 */
export class NotFoundError extends WebhookError {
  constructor(resource: string) {
    super({
      code: WebhookErrorCode.NotFound,
      message: `Resource not found: ${resource}`,
      statusCode: 404,
      retryable: false,
      details: { resource },
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Rejected by the API's rate limiter. Reported only; the client does not wait.
 */
export class RateLimitedError extends WebhookError {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number, isGlobal: boolean = false) {
    super({
      code: WebhookErrorCode.RateLimited,
      message: `Rate limited${isGlobal ? ' (global)' : ''}, retry after ${retryAfterMs}ms`,
      statusCode: 429,
      retryable: true,
      details: { isGlobal, retryAfterMs },
    });
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

// ============================================================================
// Server Errors (Retryable)
// ============================================================================

/**
 * Webhook API server error.
 */
export class ServerError extends WebhookError {
  constructor(statusCode: number, message: string = 'Webhook server error') {
    super({
      code: WebhookErrorCode.ServerError,
      message,
      statusCode,
      retryable: true,
    });
    this.name = 'ServerError';
  }
}

/**
 * Network error (connection failure or timeout).
 */
export class NetworkError extends WebhookError {
  constructor(message: string, cause?: Error) {
    super({
      code: WebhookErrorCode.NetworkError,
      message: `Network error: ${message}`,
      retryable: true,
      cause,
    });
    this.name = 'NetworkError';
  }
}

/**
 * Response body did not match the expected shape.
 */
export class ResponseParseError extends WebhookError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: WebhookErrorCode.ResponseParseError,
      message: `Malformed response: ${message}`,
      retryable: false,
      details,
    });
    this.name = 'ResponseParseError';
  }
}

// ============================================================================
// Configuration Errors (Non-Retryable)
// ============================================================================

/**
 * Configuration error.
 */
export class ConfigurationError extends WebhookError {
  constructor(message: string) {
    super({
      code: WebhookErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
      retryable: false,
    });
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Error Parsing Utilities
// ============================================================================

/**
 * Parses a failed API response into the appropriate error type.
 */
export function parseApiError(
  statusCode: number,
  body: ApiErrorResponse | null,
  retryAfterHeader?: string
): WebhookError {
  const message = body?.message ?? `HTTP ${statusCode}`;
  const apiCode = body?.code;
  const errors = body?.errors;

  switch (statusCode) {
    case 400:
      return new BadRequestError(message, apiCode, errors);

    case 401:
      return new UnauthorizedError(message);

    case 403:
      return new ForbiddenError(message);

    case 404:
      return new NotFoundError(message);

    case 429: {
      let retryAfterMs = 1000;
      if (body?.retry_after) {
        retryAfterMs = body.retry_after * 1000;
      } else if (retryAfterHeader) {
        retryAfterMs = parseFloat(retryAfterHeader) * 1000;
      }
      return new RateLimitedError(retryAfterMs, body?.global ?? false);
    }

    default:
      if (statusCode >= 500) {
        return new ServerError(statusCode, message);
      }
      return new BadRequestError(message, apiCode, errors);
  }
}

/**
 * Checks if an error is a webhook error.
 */
export function isWebhookError(error: unknown): error is WebhookError {
  return error instanceof WebhookError;
}

/**
 * Checks if an error came from message validation.
 */
export function isMessageValidationError(error: unknown): error is MessageValidationError {
  return error instanceof MessageValidationError;
}

/**
 * Checks if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
  if (isWebhookError(error)) {
    return error.retryable;
  }
  if (error instanceof TypeError && error.message.includes('fetch')) {
    return true;
  }
  return false;
}
