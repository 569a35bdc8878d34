/**
 * Custom error classes for the application
 * These errors provide safe, non-PII error messages for API responses
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for API response (no sensitive info)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Validation error for invalid input
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Missing or expired widget session
 */
export class AuthenticationError extends AppError {
  constructor(message = 'Authentication required') {
    super(message, 'AUTHENTICATION_ERROR', 401);
    this.name = 'AuthenticationError';
  }
}

/**
 * Caller is identified but not allowed to act on the resource
 */
export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden', code = 'FORBIDDEN') {
    super(message, code, 403);
    this.name = 'ForbiddenError';
  }
}

/**
 * Request origin is not on the inbox's domain allowlist
 */
export class OriginNotAllowedError extends ForbiddenError {
  constructor() {
    super('Widget domain is not allowed', 'ORIGIN_NOT_ALLOWED');
    this.name = 'OriginNotAllowedError';
  }
}

/**
 * Not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Optimistic concurrency conflict
 */
export class ConcurrencyError extends AppError {
  constructor(message = 'Concurrent modification detected') {
    super(message, 'CONCURRENCY_ERROR', 409);
    this.name = 'ConcurrencyError';
  }
}

/**
 * Rate limit error; the message stays generic so visitors only learn to retry later
 */
export class RateLimitError extends AppError {
  public readonly retryAfter: number;

  constructor(retryAfter = 60) {
    super('Too many requests, please try again later', 'RATE_LIMIT_ERROR', 429);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

/**
 * A captcha challenge blocks the request until it is solved
 */
export class CaptchaRequiredError extends AppError {
  public readonly captchaToken: string;
  public readonly captchaQuestion: string;

  constructor(captchaToken: string, captchaQuestion: string) {
    super('Captcha verification required', 'CAPTCHA_REQUIRED', 400);
    this.name = 'CaptchaRequiredError';
    this.captchaToken = captchaToken;
    this.captchaQuestion = captchaQuestion;
  }
}

/**
 * Shared store (Redis) unreachable or returned an unusable value
 */
export class SharedStoreError extends AppError {
  public readonly operation: string;
  public readonly originalError: Error | undefined;

  constructor(operation: string, message: string, originalError?: Error) {
    super(`Shared store ${operation} failed: ${message}`, 'SHARED_STORE_ERROR', 503);
    this.name = 'SharedStoreError';
    this.operation = operation;
    this.originalError = originalError;
  }
}

/**
 * Database operation error (query failed, constraint violation, etc.)
 */
export class DatabaseOperationError extends AppError {
  public readonly operation: string;
  public readonly originalError: Error | undefined;

  constructor(operation: string, message: string, originalError?: Error) {
    super(`Database ${operation} failed: ${message}`, 'DATABASE_OPERATION_ERROR', 500);
    this.name = 'DatabaseOperationError';
    this.operation = operation;
    this.originalError = originalError;
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Convert unknown error to safe error response
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
