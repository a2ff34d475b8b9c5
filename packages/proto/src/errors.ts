/**
 * Error Classification System
 *
 * Typed error classes that classify failures by their root cause.
 * The classification decides what the caller does next:
 *
 * - AuthError → user must re-authorize (/auth)
 * - PermissionError → user must grant access; surfaced verbatim
 * - NetworkError → retried by the caller of dispatch (bounded, with backoff)
 * - LogicError → bad request to a remote API (not found, conflict, malformed)
 * - InternalError → bug or misconfiguration on our side
 *
 * AuthFlowError is separate: it reports a failed OAuth redirect flow and always
 * carries the same user-facing message, whatever the internal reason.
 */

import { AUTH_FLOW_FAILED_MESSAGE } from './messages';

/** Error type enum for classification */
export type ErrorType =
  | 'auth'
  | 'permission'
  | 'network'
  | 'logic'
  | 'internal';

export interface ClassifiedErrorOptions {
  cause?: Error;
  source?: string;
  statusCode?: number;
}

/** Base class for classified errors */
export abstract class ClassifiedError extends Error {
  abstract readonly type: ErrorType;

  /** Original error that caused this classified error */
  readonly cause?: Error;

  /** Tool or component that produced this error */
  readonly source?: string;

  /** HTTP status code of the remote response, if there was one */
  readonly statusCode?: number;

  constructor(message: string, options?: ClassifiedErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;
    this.source = options?.source;
    this.statusCode = options?.statusCode;

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Convert to a plain object for serialization */
  toJSON() {
    return {
      type: this.type,
      name: this.name,
      message: this.message,
      source: this.source,
      statusCode: this.statusCode,
      stack: this.stack,
    };
  }
}

/**
 * Authentication error - refresh token revoked, access token rejected, etc.
 *
 * Routed to: User (must run /auth again)
 * Auto-retry: No
 *
 * HTTP triggers: 401, OAuth `invalid_grant`
 */
export class AuthError extends ClassifiedError {
  readonly type = 'auth' as const;

  /** OAuth error code if available (e.g., 'invalid_grant') */
  readonly errorCode?: string;

  constructor(
    message: string,
    options?: ClassifiedErrorOptions & { errorCode?: string }
  ) {
    super(message, options);
    this.errorCode = options?.errorCode;
  }

  toJSON() {
    return {
      ...super.toJSON(),
      errorCode: this.errorCode,
    };
  }
}

/**
 * Permission error - access denied, insufficient scope.
 *
 * Auto-retry: No
 * HTTP triggers: 403
 */
export class PermissionError extends ClassifiedError {
  readonly type = 'permission' as const;
}

/**
 * Network error - connection failed, timeout, rate limit, service unavailable.
 *
 * Auto-retry: by the caller of dispatch only, a bounded number of times
 * HTTP triggers: 5xx, 408, 429, timeout, connection refused/reset
 */
export class NetworkError extends ClassifiedError {
  readonly type = 'network' as const;

  /** Backoff hint from the remote service (Retry-After), in milliseconds */
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    options?: ClassifiedErrorOptions & { retryAfterMs?: number }
  ) {
    super(message, options);
    this.retryAfterMs = options?.retryAfterMs;
  }

  /** True when the request ran out of time rather than being refused */
  get timedOut(): boolean {
    return this.statusCode === 408;
  }

  toJSON() {
    return {
      ...super.toJSON(),
      retryAfterMs: this.retryAfterMs,
    };
  }
}

/**
 * Logic error - the remote API rejected the request itself: not found,
 * conflict, malformed parameters.
 *
 * Auto-retry: No
 * HTTP triggers: 4xx (except 401, 403, 408, 429)
 */
export class LogicError extends ClassifiedError {
  readonly type = 'logic' as const;
}

/**
 * Internal error - bugs in our code, missing configuration, unexpected data.
 *
 * Auto-retry: No
 */
export class InternalError extends ClassifiedError {
  readonly type = 'internal' as const;
}

/**
 * Check if an error is a ClassifiedError
 */
export function isClassifiedError(error: unknown): error is ClassifiedError {
  return error instanceof ClassifiedError;
}

/**
 * Classify an HTTP response error into typed error
 *
 * @param statusCode HTTP status code
 * @param message Error message
 * @param options Additional error options
 */
export function classifyHttpError(
  statusCode: number,
  message: string,
  options?: { cause?: Error; source?: string; retryAfterMs?: number }
): ClassifiedError {
  if (statusCode === 401) {
    return new AuthError(message, { ...options, statusCode });
  }

  if (statusCode === 403) {
    return new PermissionError(message, { ...options, statusCode });
  }

  if (statusCode >= 500 || statusCode === 408 || statusCode === 429) {
    // 5xx server errors, 408 timeout, 429 rate limit: infrastructure
    return new NetworkError(message, { ...options, statusCode });
  }

  // Remaining 4xx: the request itself was wrong
  return new LogicError(message, { ...options, statusCode });
}

/**
 * Classify a low-level transport failure (thrown by fetch or an HTTP client
 * before any response arrived).
 */
export function classifyTransportError(
  err: unknown,
  source?: string
): ClassifiedError {
  if (isClassifiedError(err)) {
    return err;
  }

  const cause = err instanceof Error ? err : undefined;
  const message = cause?.message || String(err);
  const name = cause?.name;
  const code = errorCode(err);

  if (
    name === 'TimeoutError' ||
    name === 'AbortError' ||
    code === 'ETIMEDOUT' ||
    code === 'ECONNABORTED'
  ) {
    return new NetworkError(`Request timed out: ${message}`, {
      cause,
      source,
      statusCode: 408,
    });
  }

  if (
    code === 'ECONNREFUSED' ||
    code === 'ECONNRESET' ||
    code === 'ENOTFOUND' ||
    code === 'EAI_AGAIN' ||
    code === 'EPIPE' ||
    (err instanceof TypeError && message === 'fetch failed')
  ) {
    return new NetworkError(`Network error: ${message}`, { cause, source });
  }

  const where = source ? ` in ${source}` : '';
  return new InternalError(`Unclassified error${where}: ${message}`, {
    cause,
    source,
  });
}

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const direct = 'code' in err ? err.code : undefined;
  if (typeof direct === 'string') return direct;
  // undici wraps socket errors: TypeError('fetch failed', { cause })
  const cause = 'cause' in err ? err.cause : undefined;
  if (
    typeof cause === 'object' &&
    cause !== null &&
    'code' in cause &&
    typeof cause.code === 'string'
  ) {
    return cause.code;
  }
  return undefined;
}

/** Why an OAuth redirect flow failed. Internal only; never shown to users. */
export type AuthFlowFailure = 'invalid_state' | 'denied' | 'exchange_failed';

/**
 * Failed authorization flow (InvalidOrExpiredState / AuthorizationDenied /
 * ExchangeFailed). The message is uniform so callers cannot tell whether a
 * state token existed, expired or was forged.
 */
export class AuthFlowError extends Error {
  readonly reason: AuthFlowFailure;
  readonly cause?: Error;

  constructor(reason: AuthFlowFailure, options?: { cause?: Error }) {
    super(AUTH_FLOW_FAILED_MESSAGE);
    this.name = 'AuthFlowError';
    this.reason = reason;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export function isAuthFlowError(error: unknown): error is AuthFlowError {
  return error instanceof AuthFlowError;
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(
  value: string | null | undefined,
  now: number = Date.now()
): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}
