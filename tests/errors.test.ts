import {
  ApiError,
  ErrorBodyError,
  HttpErrorCategory,
  InfrastructureError,
  InternalError,
  asApiError,
  buildErrorMetadata,
  classifyHttpError,
  classifyNetworkErrorType,
  describeError,
  determineHttpErrorRetriability,
  findError,
  isApiError,
  isClientError,
  isInfrastructureError,
  isInternalError,
  isServerError,
  isTimeoutError,
} from '../src/errors';
import { decode, encode, thrown } from './helpers';

describe('errors', () => {
  describe('classifyHttpError', () => {
    test('classifies 401 and 403 as AUTHENTICATION', () => {
      expect(classifyHttpError(401)).toBe(HttpErrorCategory.AUTHENTICATION);
      expect(classifyHttpError(403)).toBe(HttpErrorCategory.AUTHENTICATION);
    });

    test('classifies 404 as NOT_FOUND', () => {
      expect(classifyHttpError(404)).toBe(HttpErrorCategory.NOT_FOUND);
    });

    test('classifies 409 as CONFLICT', () => {
      expect(classifyHttpError(409)).toBe(HttpErrorCategory.CONFLICT);
    });

    test('classifies 429 as RATE_LIMIT', () => {
      expect(classifyHttpError(429)).toBe(HttpErrorCategory.RATE_LIMIT);
    });

    test('classifies 400 and 422 as VALIDATION', () => {
      expect(classifyHttpError(400)).toBe(HttpErrorCategory.VALIDATION);
      expect(classifyHttpError(422)).toBe(HttpErrorCategory.VALIDATION);
    });

    test('classifies 418 as CLIENT_ERROR', () => {
      expect(classifyHttpError(418)).toBe(HttpErrorCategory.CLIENT_ERROR);
    });

    test('classifies 500 and 503 as SERVER_ERROR', () => {
      expect(classifyHttpError(500)).toBe(HttpErrorCategory.SERVER_ERROR);
      expect(classifyHttpError(503)).toBe(HttpErrorCategory.SERVER_ERROR);
    });

    test('classifies 300 as CLIENT_ERROR (fallback)', () => {
      expect(classifyHttpError(300)).toBe(HttpErrorCategory.CLIENT_ERROR);
    });
  });

  describe('determineHttpErrorRetriability', () => {
    test('returns true for SERVER_ERROR category', () => {
      expect(determineHttpErrorRetriability(500, HttpErrorCategory.SERVER_ERROR)).toBe(true);
    });

    test('returns true for RATE_LIMIT category', () => {
      expect(determineHttpErrorRetriability(429, HttpErrorCategory.RATE_LIMIT)).toBe(true);
    });

    test('returns true for 408 Request Timeout', () => {
      expect(determineHttpErrorRetriability(408, HttpErrorCategory.CLIENT_ERROR)).toBe(true);
    });

    test('returns false for other errors', () => {
      expect(determineHttpErrorRetriability(400, HttpErrorCategory.VALIDATION)).toBe(false);
      expect(determineHttpErrorRetriability(404, HttpErrorCategory.NOT_FOUND)).toBe(false);
      expect(determineHttpErrorRetriability(409, HttpErrorCategory.CONFLICT)).toBe(false);
    });
  });

  describe('isTimeoutError', () => {
    test('detects TimeoutError by name', () => {
      expect(isTimeoutError({ name: 'TimeoutError' })).toBe(true);
    });

    test('detects ETIMEDOUT and undici connect timeout codes', () => {
      expect(isTimeoutError({ code: 'ETIMEDOUT' })).toBe(true);
      expect(isTimeoutError({ code: 'UND_ERR_CONNECT_TIMEOUT' })).toBe(true);
    });

    test('detects "timed out" in message', () => {
      expect(isTimeoutError(new Error('request timed out'))).toBe(true);
    });

    test('returns false for non-timeout errors', () => {
      expect(isTimeoutError({ code: 'ECONNREFUSED', message: 'Connection refused' })).toBe(false);
      expect(isTimeoutError('timeout')).toBe(false);
    });
  });

  describe('classifyNetworkErrorType', () => {
    test('classifies aborts', () => {
      expect(classifyNetworkErrorType({ name: 'AbortError', message: 'aborted' })).toBe('aborted');
    });

    test('reads the code from a nested cause', () => {
      const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:1'), {
        code: 'ECONNREFUSED',
      });
      expect(classifyNetworkErrorType(new TypeError('fetch failed', { cause: refused }))).toBe(
        'connection_refused'
      );
    });

    test('classifies DNS failures', () => {
      expect(classifyNetworkErrorType({ code: 'ENOTFOUND' })).toBe('dns_lookup_failed');
      expect(classifyNetworkErrorType({ code: 'EAI_AGAIN' })).toBe('dns_lookup_failed');
    });

    test('classifies a timeout nested in the cause', () => {
      const cause = Object.assign(new Error('Connect Timeout Error'), {
        name: 'ConnectTimeoutError',
      });
      expect(classifyNetworkErrorType(new TypeError('fetch failed', { cause }))).toBe(
        'request_timeout'
      );
    });

    test('falls back to network_error', () => {
      expect(classifyNetworkErrorType(new Error('socket hang up'))).toBe('network_error');
    });
  });

  describe('buildErrorMetadata', () => {
    test('includes the request when given', () => {
      expect(
        buildErrorMetadata('BillingClient', { method: 'GET', url: 'https://api.example.com/a' })
      ).toEqual({
        request: { method: 'GET', url: 'https://api.example.com/a' },
        clientName: 'BillingClient',
        timestamp: expect.any(String),
      });
    });

    test('defaults the client name and omits the request', () => {
      expect(buildErrorMetadata()).toEqual({
        clientName: 'HttpClient',
        timestamp: expect.any(String),
      });
    });
  });

  describe('InternalError', () => {
    test('wraps the cause and names the operation', () => {
      const wrapped = new Error('original error');
      const error = new InternalError('test operation', wrapped);

      expect(error.message).toBe('test operation: original error');
      expect(error.op).toBe('test operation');
      expect(error.cause).toBe(wrapped);
      expect(error.kind).toBe('internal');
      expect(error.code).toBe('INTERNAL_ERROR');
      expect(error.name).toBe('InternalError');
      expect(error.isRetriable).toBe(false);
      expect(error).toBeInstanceOf(Error);
    });

    test('uses the operation alone when there is no cause', () => {
      expect(new InternalError('empty method').message).toBe('empty method');
    });
  });

  describe('InfrastructureError', () => {
    test('wraps the cause and names the URL', () => {
      const wrapped = new Error('connection failed');
      const error = new InfrastructureError('http://example.com', wrapped);

      expect(error.message).toBe(
        'infrastructure error contacting http://example.com: connection failed'
      );
      expect(error.url).toBe('http://example.com');
      expect(error.cause).toBe(wrapped);
      expect(error.kind).toBe('infrastructure');
      expect(error.code).toBe('INFRASTRUCTURE_ERROR');
      expect(error.type).toBe('network_error');
      expect(error.networkCode).toBeUndefined();
      expect(error.isRetriable).toBe(true);
    });

    test('carries the nested network code and message', () => {
      const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:1'), {
        code: 'ECONNREFUSED',
      });
      const error = new InfrastructureError(
        'http://127.0.0.1:1/',
        new TypeError('fetch failed', { cause: refused })
      );

      expect(error.message).toBe(
        'infrastructure error contacting http://127.0.0.1:1/: fetch failed (connect ECONNREFUSED 127.0.0.1:1)'
      );
      expect(error.networkCode).toBe('ECONNREFUSED');
      expect(error.type).toBe('connection_refused');
    });
  });

  describe('ApiError', () => {
    const body = encode('{"error": "not found", "code": "404"}');

    test('exposes status, URL and body', () => {
      const error = new ApiError(404, 'http://example.com/api', body);

      expect(error.message).toBe(
        'API error 404 from http://example.com/api: {"error": "not found", "code": "404"}'
      );
      expect(error.status).toBe(404);
      expect(error.url).toBe('http://example.com/api');
      expect(error.rawBody()).toBe(body);
      expect(error.text()).toBe('{"error": "not found", "code": "404"}');
      expect(error.kind).toBe('api');
      expect(error.code).toBe('API_ERROR');
      expect(error.category).toBe(HttpErrorCategory.NOT_FOUND);
      expect(error.isRetriable).toBe(false);
    });

    test('parseError decodes the body into the target shape', () => {
      const error = new ApiError(404, 'http://example.com/api', body);

      expect(error.parseError<{ error: string; code: string }>()).toEqual({
        error: 'not found',
        code: '404',
      });
    });

    test('parseError round-trips a minimal body', () => {
      const error = new ApiError(404, 'http://example.com/api', encode('{"code":"404"}'));

      expect(error.parseError<{ code: string }>()).toEqual({ code: '404' });
    });

    test('parseError reports an empty body as empty_body', () => {
      const error = new ApiError(400, 'http://example.com/api', new Uint8Array(0));

      const failure = thrown(() => error.parseError(), ErrorBodyError);
      expect(failure.reason).toBe('empty_body');
      expect(failure.message).toBe('empty error body');
      expect(failure.cause).toBeUndefined();
    });

    test('parseError reports invalid JSON as malformed_json with the parser error', () => {
      const error = new ApiError(400, 'http://example.com/api', encode('bad request'));

      const failure = thrown(() => error.parseError(), ErrorBodyError);
      expect(failure.reason).toBe('malformed_json');
      expect(failure.message.startsWith('failed to unmarshal error body: ')).toBe(true);
      expect(failure.cause).toBeInstanceOf(SyntaxError);
    });

    test('cuts long bodies in the message but keeps them whole on the error', () => {
      const text = 'x'.repeat(600);
      const error = new ApiError(500, 'http://example.com/api', encode(text));

      expect(error.message).toBe(`API error 500 from http://example.com/api: ${'x'.repeat(512)}...`);
      expect(decode(error.rawBody())).toBe(text);
    });

    test.each([400, 404, 418, 499])('status %i is a client error only', status => {
      const error = new ApiError(status, 'http://example.com', new Uint8Array(0));

      expect(error.isClientError()).toBe(true);
      expect(error.isServerError()).toBe(false);
      expect(isClientError(error)).toBe(true);
      expect(isServerError(error)).toBe(false);
    });

    test.each([500, 502, 503, 599])('status %i is a server error only', status => {
      const error = new ApiError(status, 'http://example.com', new Uint8Array(0));

      expect(error.isServerError()).toBe(true);
      expect(error.isClientError()).toBe(false);
      expect(isServerError(error)).toBe(true);
      expect(isClientError(error)).toBe(false);
      expect(error.isRetriable).toBe(true);
    });
  });

  describe('predicates', () => {
    const internal = new InternalError('test', new Error('test'));
    const infrastructure = new InfrastructureError('http://example.com', new Error('test'));
    const api = new ApiError(400, 'http://example.com', encode('error'));

    test('each predicate matches only its own tier', () => {
      expect([isInternalError(internal), isInfrastructureError(internal), isApiError(internal)]).toEqual([
        true,
        false,
        false,
      ]);
      expect([
        isInternalError(infrastructure),
        isInfrastructureError(infrastructure),
        isApiError(infrastructure),
      ]).toEqual([false, true, false]);
      expect([isInternalError(api), isInfrastructureError(api), isApiError(api)]).toEqual([
        false,
        false,
        true,
      ]);
    });

    test('predicates see through wrapping errors', () => {
      const wrapped = new Error('outer', { cause: new Error('middle', { cause: infrastructure }) });

      expect(isInfrastructureError(wrapped)).toBe(true);
      expect(isInternalError(wrapped)).toBe(false);
    });

    test('predicates reject plain errors and non-errors', () => {
      expect(isInternalError(new Error('not internal'))).toBe(false);
      expect(isInfrastructureError(undefined)).toBe(false);
      expect(isApiError('API error 400')).toBe(false);
      expect(isClientError(new Error('400'))).toBe(false);
      expect(isServerError(null)).toBe(false);
    });

    test('asApiError extracts the error from itself and from a wrapper', () => {
      expect(asApiError(api)).toBe(api);
      expect(asApiError(new Error('wrapper', { cause: api }))).toBe(api);
      expect(asApiError(new Error('not an API error'))).toBeUndefined();
    });

    test('asApiError looks inside AggregateError', () => {
      expect(asApiError(new AggregateError([new Error('first'), api]))).toBe(api);
    });

    test('findError terminates on cyclic cause chains', () => {
      const first = new Error('first');
      const second = new Error('second', { cause: first });
      first.cause = second;

      expect(isApiError(first)).toBe(false);
      expect(
        findError(first, (candidate): candidate is Error => candidate === second)
      ).toBe(second);
    });
  });

  describe('describeError', () => {
    test('renders strings and objects without a message', () => {
      expect(describeError('boom')).toBe('boom');
      expect(describeError(42)).toBe('42');
    });

    test('ignores a cause without a message', () => {
      expect(describeError(new Error('outer', { cause: 'inner' }))).toBe('outer');
    });
  });
});
