/**
 * Enum for HTTP error categories
 */
export enum HttpErrorCategory {
  /** Authentication errors (401, 403) */
  AUTHENTICATION = 'AUTHENTICATION',
  /** Not found errors (404) */
  NOT_FOUND = 'NOT_FOUND',
  /** Conflict errors (409) */
  CONFLICT = 'CONFLICT',
  /** Rate limit errors (429) */
  RATE_LIMIT = 'RATE_LIMIT',
  /** Validation errors (400, 422) */
  VALIDATION = 'VALIDATION',
  /** Other client errors (4xx) */
  CLIENT_ERROR = 'CLIENT_ERROR',
  /** Server errors (5xx) */
  SERVER_ERROR = 'SERVER_ERROR',
}

/**
 * Tag shared by every classified error. Category checks compare this tag
 * rather than the identity of a shared error value.
 */
export type ErrorKind = 'internal' | 'infrastructure' | 'api';

/**
 * Diagnostic metadata attached to every classified error
 */
export interface ErrorMetadata {
  /** The request that failed, when it got far enough to have a method and URL */
  request?: {
    method: string;
    url: string;
  };
  /** Name of the HttpClient instance that made the request */
  clientName: string;
  /** ISO timestamp of when the error was created */
  timestamp: string;
}

/** Number of body characters an ApiError message carries before it is cut */
const MESSAGE_BODY_PREVIEW = 512;

/**
 * Base class for all HTTP client errors
 */
export abstract class HttpClientError extends Error {
  /** Which tier of the taxonomy this error belongs to */
  abstract readonly kind: ErrorKind;
  /** Error code for programmatic handling */
  readonly code: string;
  /** Whether retrying the same call could succeed. The client itself never retries. */
  readonly isRetriable: boolean;
  /** Diagnostic metadata about the request and error */
  readonly metadata: ErrorMetadata;

  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param metadata - Diagnostic metadata
   * @param isRetriable - Retry hint for callers
   * @param cause - The lower-level error, reachable through `cause`
   */
  constructor(
    message: string,
    code: string,
    metadata: ErrorMetadata,
    isRetriable: boolean,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.metadata = metadata;
    this.isRetriable = isRetriable;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Internal error - the request could not be built, its payload could not be
 * encoded, or a successful response could not be decoded. Never raised after
 * the transport failed or the server rejected the call.
 */
export class InternalError extends HttpClientError {
  readonly kind = 'internal' as const;
  /** The step that failed, e.g. "marshal payload" or "decode response" */
  readonly op: string;

  constructor(op: string, cause?: unknown, metadata: ErrorMetadata = buildErrorMetadata()) {
    super(
      cause === undefined ? op : `${op}: ${describeError(cause)}`,
      'INTERNAL_ERROR',
      metadata,
      false,
      cause
    );
    this.op = op;
  }
}

/**
 * Infrastructure error - the transport could not complete the exchange.
 * Examples: DNS lookup failure, connection refused, TLS failure, abort before a response
 */
export class InfrastructureError extends HttpClientError {
  readonly kind = 'infrastructure' as const;
  /** URL the request was sent to */
  readonly url: string;
  /** Error code from the network layer (e.g., ECONNREFUSED), when one is present */
  readonly networkCode?: string;
  /** Classification of the underlying failure */
  readonly type: string;

  constructor(url: string, cause: unknown, metadata: ErrorMetadata = buildErrorMetadata()) {
    super(
      `infrastructure error contacting ${url}: ${describeError(cause)}`,
      'INFRASTRUCTURE_ERROR',
      metadata,
      true,
      cause
    );
    this.url = url;
    this.networkCode = findNetworkCode(cause);
    this.type = classifyNetworkErrorType(cause);
  }
}

/**
 * Reason an {@link ApiError} body could not be parsed
 */
export type ErrorBodyFailure = 'empty_body' | 'malformed_json';

/**
 * Thrown by {@link ApiError.parseError} when the error body cannot be read as JSON
 */
export class ErrorBodyError extends Error {
  readonly reason: ErrorBodyFailure;

  constructor(reason: ErrorBodyFailure, cause?: unknown) {
    super(
      reason === 'empty_body'
        ? 'empty error body'
        : `failed to unmarshal error body: ${describeError(cause)}`,
      cause === undefined ? undefined : { cause }
    );
    this.name = 'ErrorBodyError';
    this.reason = reason;
  }
}

/**
 * API error - the server responded with a status code of 400 or above
 */
export class ApiError extends HttpClientError {
  readonly kind = 'api' as const;
  /** HTTP status code */
  readonly status: number;
  /** URL of the request */
  readonly url: string;
  /** Raw response body, capped at the first MiB */
  readonly body: Uint8Array;

  constructor(
    status: number,
    url: string,
    body: Uint8Array,
    metadata: ErrorMetadata = buildErrorMetadata()
  ) {
    super(
      `API error ${status} from ${url}: ${previewBody(decodeText(body))}`,
      'API_ERROR',
      metadata,
      determineHttpErrorRetriability(status, classifyHttpError(status))
    );
    this.status = status;
    this.url = url;
    this.body = body;
  }

  /** Error category derived from the status code */
  get category(): HttpErrorCategory {
    return classifyHttpError(this.status);
  }

  /** Raw error response body */
  rawBody(): Uint8Array {
    return this.body;
  }

  /** Error response body decoded as UTF-8 */
  text(): string {
    return decodeText(this.body);
  }

  /**
   * Parses the error body as JSON
   * @throws ErrorBodyError with reason `empty_body` for a zero-length body, or
   * `malformed_json` when the body is not valid JSON
   */
  parseError<T = unknown>(): T {
    if (this.body.length === 0) {
      throw new ErrorBodyError('empty_body');
    }
    try {
      const parsed: T = JSON.parse(this.text());
      return parsed;
    } catch (error) {
      throw new ErrorBodyError('malformed_json', error);
    }
  }

  /** true iff the status code is in [400, 500) */
  isClientError(): boolean {
    return this.status >= 400 && this.status < 500;
  }

  /** true iff the status code is in [500, 600) */
  isServerError(): boolean {
    return this.status >= 500 && this.status < 600;
  }
}

/**
 * Union of the three error tiers
 */
export type ClassifiedError = InternalError | InfrastructureError | ApiError;

/**
 * Classifies an HTTP status code into a category
 * @param status - HTTP status code
 * @returns The appropriate HttpErrorCategory
 */
export function classifyHttpError(status: number): HttpErrorCategory {
  if (status === 401 || status === 403) {
    return HttpErrorCategory.AUTHENTICATION;
  }

  if (status === 404) {
    return HttpErrorCategory.NOT_FOUND;
  }

  if (status === 409) {
    return HttpErrorCategory.CONFLICT;
  }

  if (status === 429) {
    return HttpErrorCategory.RATE_LIMIT;
  }

  if (status === 400 || status === 422) {
    return HttpErrorCategory.VALIDATION;
  }

  if (status >= 400 && status < 500) {
    return HttpErrorCategory.CLIENT_ERROR;
  }

  if (status >= 500 && status < 600) {
    return HttpErrorCategory.SERVER_ERROR;
  }

  // Fallback for unexpected status codes
  return HttpErrorCategory.CLIENT_ERROR;
}

/**
 * Determines if an HTTP error should be retriable based on status and category
 * @returns true if the error should be retriable by default
 */
export function determineHttpErrorRetriability(
  status: number,
  category: HttpErrorCategory
): boolean {
  if (category === HttpErrorCategory.SERVER_ERROR) {
    return true;
  }

  if (category === HttpErrorCategory.RATE_LIMIT) {
    return true;
  }

  // 408 Request Timeout
  return status === 408;
}

/**
 * Checks if an error is a timeout based on its name, code or message
 */
export function isTimeoutError(error: unknown): boolean {
  if (!isObject(error)) {
    return false;
  }

  if (error.name === 'TimeoutError') {
    return true;
  }

  if (error.code === 'ETIMEDOUT' || error.code === 'ESOCKETTIMEDOUT' || error.code === 'UND_ERR_CONNECT_TIMEOUT') {
    return true;
  }

  const message = typeof error.message === 'string' ? error.message.toLowerCase() : '';
  return message.includes('timeout') || message.includes('timed out') || message.includes('time out');
}

/**
 * Classifies the type of a transport failure for metadata
 * @param error - The error the transport rejected with
 * @returns A string describing the error type
 */
export function classifyNetworkErrorType(error: unknown): string {
  if (isObject(error) && error.name === 'AbortError') {
    return 'aborted';
  }

  const code = findNetworkCode(error);

  if (code === 'ECONNREFUSED') {
    return 'connection_refused';
  }

  if (code === 'ENOTFOUND' || code === 'EAI_AGAIN') {
    return 'dns_lookup_failed';
  }

  if (code === 'ECONNRESET') {
    return 'connection_reset';
  }

  if (code === 'ECONNABORTED') {
    return 'connection_aborted';
  }

  if (code === 'ENETUNREACH') {
    return 'network_unreachable';
  }

  if (code === 'EHOSTUNREACH') {
    return 'host_unreachable';
  }

  if (isTimeoutError(error) || (isObject(error) && isTimeoutError(error.cause))) {
    return 'request_timeout';
  }

  return 'network_error';
}

/**
 * Builds error metadata from client info and, when known, the failing request
 */
export function buildErrorMetadata(
  clientName: string = 'HttpClient',
  request?: { method: string; url: string }
): ErrorMetadata {
  return {
    ...(request !== undefined && { request }),
    clientName,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Walks an error's `cause` chain (and the members of an AggregateError) and
 * returns the first error matching `predicate`
 */
export function findError<E>(
  error: unknown,
  predicate: (candidate: unknown) => candidate is E
): E | undefined {
  const seen = new Set<unknown>();
  const pending: unknown[] = [error];

  while (pending.length > 0) {
    const current = pending.shift();
    if (current === undefined || current === null || seen.has(current)) {
      continue;
    }
    seen.add(current);

    if (predicate(current)) {
      return current;
    }
    if (current instanceof AggregateError) {
      pending.push(...current.errors);
    }
    if (isObject(current) && 'cause' in current) {
      pending.push(current.cause);
    }
  }

  return undefined;
}

function hasKind<K extends ErrorKind>(kind: K) {
  return (candidate: unknown): candidate is Extract<ClassifiedError, { kind: K }> =>
    candidate instanceof HttpClientError && candidate.kind === kind;
}

const isInternal = hasKind('internal');
const isInfrastructure = hasKind('infrastructure');
const isApi = hasKind('api');

/** Checks if the error chain holds an internal library error */
export function isInternalError(error: unknown): boolean {
  return findError(error, isInternal) !== undefined;
}

/** Checks if the error chain holds a network infrastructure error */
export function isInfrastructureError(error: unknown): boolean {
  return findError(error, isInfrastructure) !== undefined;
}

/** Checks if the error chain holds an API error with a response body */
export function isApiError(error: unknown): boolean {
  return findError(error, isApi) !== undefined;
}

/** Extracts the ApiError from an error chain, if there is one */
export function asApiError(error: unknown): ApiError | undefined {
  return findError(error, isApi);
}

/** Reports whether the error chain holds a 4xx ApiError */
export function isClientError(error: unknown): boolean {
  return asApiError(error)?.isClientError() ?? false;
}

/** Reports whether the error chain holds a 5xx ApiError */
export function isServerError(error: unknown): boolean {
  return asApiError(error)?.isServerError() ?? false;
}

/**
 * Renders an error for a message. A nested cause message (as in undici's
 * "fetch failed") is appended in parentheses.
 */
export function describeError(error: unknown): string {
  if (!isObject(error)) {
    return String(error);
  }
  const message = typeof error.message === 'string' ? error.message : String(error);
  const cause = error.cause;
  if (isObject(cause) && typeof cause.message === 'string' && cause.message !== '') {
    return `${message} (${cause.message})`;
  }
  return message;
}

function findNetworkCode(error: unknown): string | undefined {
  const coded = findError(
    error,
    (candidate): candidate is { code: string } => isObject(candidate) && typeof candidate.code === 'string'
  );
  return coded?.code;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function decodeText(body: Uint8Array): string {
  return new TextDecoder().decode(body);
}

function previewBody(text: string): string {
  return text.length > MESSAGE_BODY_PREVIEW ? `${text.slice(0, MESSAGE_BODY_PREVIEW)}...` : text;
}
