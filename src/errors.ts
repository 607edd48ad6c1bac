import type { ApiErrorBody } from "./types.js";

/**
 * Base error class for all rentahuman SDK errors.
 * Every error the client throws extends this class, so a single
 * `catch (err) { if (err instanceof RentAHumanError) ... }` covers them all.
 */
export class RentAHumanError extends Error {
  /** HTTP status code from the API response, if applicable. */
  public readonly statusCode: number | undefined;

  /** Parsed error body from the API, if one was returned. */
  public readonly body: ApiErrorBody | undefined;

  constructor(
    message: string,
    options?: {
      statusCode?: number;
      body?: ApiErrorBody;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = "RentAHumanError";
    this.statusCode = options?.statusCode;
    this.body = options?.body;
  }
}

/**
 * Thrown before any network call when a caller-supplied value is unusable,
 * e.g. a path parameter containing `/`, `\` or `..`, or tool arguments that
 * do not match their schema.
 */
export class ValidationError extends RentAHumanError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ValidationError";
  }
}

/**
 * Thrown when the API keeps answering HTTP 429 after all retries.
 */
export class RateLimitError extends RentAHumanError {
  /** The last Retry-After value received, in seconds. */
  public readonly retryAfter: number;

  constructor(retryAfter: number, options?: { body?: ApiErrorBody }) {
    super(`Rate limited. Retry after ${retryAfter}s`, {
      statusCode: 429,
      body: options?.body,
    });
    this.name = "RateLimitError";
    this.retryAfter = retryAfter;
  }
}

/**
 * Thrown when the API answers with HTTP >= 400 (other than an exhausted 429).
 * Status-specific subclasses below let callers branch with `instanceof`.
 */
export class ApiError extends RentAHumanError {
  constructor(
    message: string,
    options: { statusCode: number; body?: ApiErrorBody },
  ) {
    super(message, options);
    this.name = "ApiError";
  }
}

/** HTTP 401: the API key is missing, invalid, or revoked. */
export class AuthenticationError extends ApiError {
  constructor(message: string, options: { statusCode: number; body?: ApiErrorBody }) {
    super(message, options);
    this.name = "AuthenticationError";
  }
}

/** HTTP 403: the key is valid but may not perform this operation. */
export class AuthorizationError extends ApiError {
  constructor(message: string, options: { statusCode: number; body?: ApiErrorBody }) {
    super(message, options);
    this.name = "AuthorizationError";
  }
}

/** HTTP 404: the human, booking, bounty or conversation does not exist. */
export class NotFoundError extends ApiError {
  constructor(message: string, options: { statusCode: number; body?: ApiErrorBody }) {
    super(message, options);
    this.name = "NotFoundError";
  }
}

/** HTTP 409, e.g. accepting an application on a bounty that is already filled. */
export class ConflictError extends ApiError {
  constructor(message: string, options: { statusCode: number; body?: ApiErrorBody }) {
    super(message, options);
    this.name = "ConflictError";
  }
}

/** HTTP 5xx. Not retried: only 429 and transport failures are. */
export class ServerError extends ApiError {
  constructor(message: string, options: { statusCode: number; body?: ApiErrorBody }) {
    super(message, options);
    this.name = "ServerError";
  }
}

/**
 * Thrown when the request never produced a usable HTTP response:
 * connection failures, or a body that could not be parsed.
 */
export class TransportError extends RentAHumanError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

/**
 * Thrown when a single attempt exceeds the configured request timeout
 * and no retries remain.
 */
export class TimeoutError extends TransportError {
  /** The per-attempt timeout in milliseconds that was exceeded. */
  public readonly timeoutMs: number;

  constructor(message: string, options: { timeoutMs: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "TimeoutError";
    this.timeoutMs = options.timeoutMs;
  }
}

/**
 * Maps a non-429 error response to the matching error class.
 *
 * The message comes from the body's `error` field, then the HTTP reason
 * phrase, then `HTTP {status}`.
 */
export function buildApiError(
  statusCode: number,
  body: ApiErrorBody | undefined,
  statusText?: string,
): ApiError {
  const message =
    typeof body?.error === "string" && body.error !== ""
      ? body.error
      : statusText || `HTTP ${statusCode}`;
  const opts = { statusCode, body };

  switch (statusCode) {
    case 401:
      return new AuthenticationError(message, opts);
    case 403:
      return new AuthorizationError(message, opts);
    case 404:
      return new NotFoundError(message, opts);
    case 409:
      return new ConflictError(message, opts);
    default:
      if (statusCode >= 500) {
        return new ServerError(message, opts);
      }
      return new ApiError(message, opts);
  }
}
