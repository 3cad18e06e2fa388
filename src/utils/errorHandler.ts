import type { ErrorResponseBody } from '../types';

/**
 * Base class for every failure that should reach the HTTP caller with a
 * specific status code and a `detail` message.
 */
export class ApiError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class UnauthenticatedError extends ApiError {
  constructor(message = 'Authentication failed', options?: { cause?: unknown }) {
    super(401, message, options);
  }
}

export class InvalidInputError extends ApiError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(400, message, options);
  }
}

export class NotFoundError extends ApiError {
  constructor(message = 'Problem not found or access denied') {
    super(404, message);
  }
}

/**
 * The identity provider, the AI model or the document database failed, or
 * returned something that could not be used.
 */
export class UpstreamFailureError extends ApiError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(500, message, options);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isRateLimitError(error: unknown): boolean {
  if (typeof error === 'object' && error !== null && 'status' in error && error.status === 429) {
    return true;
  }

  const message = errorMessage(error);
  return (
    message.includes('429') ||
    message.includes('RATELIMIT_EXCEEDED') ||
    message.toLowerCase().includes('quota') ||
    message.toLowerCase().includes('rate limit')
  );
}

export function toErrorResponse(error: unknown): { statusCode: number; body: ErrorResponseBody } {
  if (error instanceof ApiError) {
    return { statusCode: error.statusCode, body: { detail: error.message } };
  }
  return { statusCode: 500, body: { detail: 'Internal server error' } };
}
