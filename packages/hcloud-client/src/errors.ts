import type { Action } from './schemas/action';
import { errorPayloadSchema, validationDetailsSchema } from './schemas/common';
import type { FieldError, RateLimitInfo } from './types';

export class HcloudError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HcloudError';
  }
}

export type HcloudApiErrorOptions = {
  statusCode: number;
  code?: string | null;
  details?: unknown;
  method: string;
  path: string;
  rateLimit?: RateLimitInfo | null;
};

/** A response with a non-2xx status. */
export class HcloudApiError extends HcloudError {
  readonly statusCode: number;
  readonly code: string | null;
  readonly details: unknown;
  readonly method: string;
  readonly path: string;
  readonly rateLimit: RateLimitInfo | null;

  constructor(message: string, options: HcloudApiErrorOptions) {
    super(message);
    this.name = 'HcloudApiError';
    this.statusCode = options.statusCode;
    this.code = options.code ?? null;
    this.details = options.details;
    this.method = options.method;
    this.path = options.path;
    this.rateLimit = options.rateLimit ?? null;
  }
}

export class AuthenticationError extends HcloudApiError {
  constructor(message: string, options: HcloudApiErrorOptions) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

export class PermissionDeniedError extends HcloudApiError {
  constructor(message: string, options: HcloudApiErrorOptions) {
    super(message, options);
    this.name = 'PermissionDeniedError';
  }
}

export class NotFoundError extends HcloudApiError {
  constructor(message: string, options: HcloudApiErrorOptions) {
    super(message, options);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends HcloudApiError {
  readonly fields: FieldError[];

  constructor(message: string, options: HcloudApiErrorOptions & { fields?: FieldError[] }) {
    super(message, options);
    this.name = 'ValidationError';
    this.fields = options.fields ?? [];
  }

  /** Raised before any request is sent, when a parameter can never be accepted. */
  static local(method: string, path: string, fields: FieldError[]): ValidationError {
    const summary = fields.map((field) => `${field.name} ${field.messages.join(', ')}`).join('; ');
    return new ValidationError(`invalid input: ${summary}`, {
      statusCode: 0,
      code: 'invalid_input',
      details: { fields },
      method,
      path,
      fields
    });
  }
}

export class RateLimitError extends HcloudApiError {
  constructor(message: string, options: HcloudApiErrorOptions) {
    super(message, options);
    this.name = 'RateLimitError';
  }
}

export class ServerUnavailableError extends HcloudApiError {
  constructor(message: string, options: HcloudApiErrorOptions) {
    super(message, options);
    this.name = 'ServerUnavailableError';
  }
}

export type TransportFailureReason = 'timeout' | 'aborted' | 'network';

/**
 * No complete HTTP response was received. `statusCode` is set when the status
 * line arrived but the body was cut off; it is `null` when nothing arrived.
 */
export class TransportError extends HcloudError {
  readonly reason: TransportFailureReason;
  readonly method: string;
  readonly path: string;
  readonly statusCode: number | null;

  constructor(
    message: string,
    options: { reason: TransportFailureReason; method: string; path: string; statusCode?: number | null; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.reason = options.reason;
    this.method = options.method;
    this.path = options.path;
    this.statusCode = options.statusCode ?? null;
  }
}

export class ResponseDecodeError extends HcloudError {
  readonly method: string;
  readonly path: string;
  readonly issues: string[];

  constructor(message: string, options: { method: string; path: string; issues: string[]; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'ResponseDecodeError';
    this.method = options.method;
    this.path = options.path;
    this.issues = options.issues;
  }
}

export class ActionPollTimeoutError extends HcloudError {
  readonly action: Action;
  readonly timeoutMs: number;

  constructor(action: Action, timeoutMs: number) {
    super(`action ${action.id} (${action.command}) still running after ${timeoutMs}ms`);
    this.name = 'ActionPollTimeoutError';
    this.action = action;
    this.timeoutMs = timeoutMs;
  }
}

export class ActionFailedError extends HcloudError {
  readonly action: Action;

  constructor(action: Action) {
    const reason = action.error ? `${action.error.code}: ${action.error.message}` : 'unknown error';
    super(`action ${action.id} (${action.command}) failed with ${reason}`);
    this.name = 'ActionFailedError';
    this.action = action;
  }
}

const VALIDATION_CODES = new Set(['invalid_input', 'json_error']);

function extractFields(details: unknown): FieldError[] {
  const parsed = validationDetailsSchema.safeParse(details);
  return parsed.success ? parsed.data.fields : [];
}

/**
 * Maps a failed response to the matching error class. The payload is the
 * decoded body (or its raw text when it was not JSON).
 */
export function classifyErrorResponse(
  response: { status: number; statusText?: string; method: string; path: string; rateLimit?: RateLimitInfo | null },
  payload: unknown
): HcloudApiError {
  const parsed = errorPayloadSchema.safeParse(payload);
  const apiError = parsed.success ? parsed.data.error : null;
  const message =
    apiError?.message ?? (response.statusText ? response.statusText : `request failed with status ${response.status}`);
  const options: HcloudApiErrorOptions = {
    statusCode: response.status,
    code: apiError?.code ?? null,
    details: apiError ? apiError.details : payload,
    method: response.method,
    path: response.path,
    rateLimit: response.rateLimit
  };

  const { status } = response;
  if (status === 401) {
    return new AuthenticationError(message, options);
  }
  if (status === 403) {
    return new PermissionDeniedError(message, options);
  }
  if (status === 404) {
    return new NotFoundError(message, options);
  }
  if (status === 422 || (status === 400 && apiError !== null && VALIDATION_CODES.has(apiError.code))) {
    return new ValidationError(message, { ...options, fields: extractFields(options.details) });
  }
  if (status === 429) {
    return new RateLimitError(message, options);
  }
  if (status >= 500) {
    return new ServerUnavailableError(message, options);
  }
  return new HcloudApiError(message, options);
}

/** Errors a caller may retry after backing off. The client itself never retries. */
export function isRetryableError(error: unknown): boolean {
  return (
    error instanceof RateLimitError ||
    error instanceof ServerUnavailableError ||
    (error instanceof TransportError && error.reason !== 'aborted')
  );
}
