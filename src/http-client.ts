import { logData, logError, logWarning } from './logger.js';
import {
  ApiError,
  HttpClientError,
  InfrastructureError,
  InternalError,
  buildErrorMetadata,
  describeError,
} from './errors.js';
import type { ErrorMetadata } from './errors.js';
import {
  buildHeaders,
  marshalJson,
  parseAbsoluteURL,
  resolveURL,
  substitutePathParams,
} from './request.js';
import { MAX_ERROR_BODY_BYTES, discardBody, readBody } from './response.js';

export enum RequestType {
  GET = 'GET',
  POST = 'POST',
  PUT = 'PUT',
  PATCH = 'PATCH',
  DELETE = 'DELETE',
  HEAD = 'HEAD',
  OPTIONS = 'OPTIONS',
}

/**
 * Sends one request and resolves with the response, or rejects when no
 * response could be obtained. Must be safe to call concurrently; a single
 * transport may be shared by many clients.
 */
export type Transport = (request: Request) => Promise<Response>;

/** Request body accepted by {@link HttpClient.executeRaw} */
export type RawBody = RequestInit['body'];

const defaultTransport: Transport = request => fetch(request);

export interface HttpClientOptions {
  /**
   * Transport used to send requests. Defaults to the global `fetch`
   */
  transport?: Transport;
  /**
   * Base URL for the API. When empty, every request path must be absolute
   */
  baseURL?: string;
  /**
   * Headers sent with every request. Per-request headers take precedence
   */
  headers?: Record<string, string>;
  /**
   * Whether to log request and response details
   */
  debug?: boolean;
  /**
   * Debug level. 'normal' will log the request payload. 'verbose' will
   * also log request headers and decoded response data
   */
  debugLevel?: 'normal' | 'verbose';
  /**
   * Name of the client. Used for logging and error metadata
   */
  name?: string;
}

export interface HttpClientRequestConfig {
  /**
   * Headers for this request. Names are case-insensitive
   */
  headers?: Record<string, string>;
  /**
   * Cancels the request. An abort before the response arrives surfaces as
   * an InfrastructureError
   */
  signal?: AbortSignal;
  /**
   * Decode the response body as JSON. When false the body is drained and
   * the call resolves with undefined
   * @default true
   */
  decode?: boolean;
  /**
   * Path parameters to substitute in the URL
   * URLs can contain path parameters in the format `:paramName`
   * Example: `/users/:userId/posts/:postId` with `pathParams: { userId: '123', postId: '456' }`
   * Results in: `/users/123/posts/456`
   */
  pathParams?: Record<string, string | number>;
}

export interface JsonRequestConfig extends HttpClientRequestConfig {
  /**
   * Value serialized as the JSON request body. `undefined` and `null` send no body
   */
  payload?: unknown;
}

export interface RawRequestConfig extends HttpClientRequestConfig {
  /**
   * Request body, sent unmodified
   */
  body?: RawBody;
}

export class HttpClient {
  readonly transport: Transport;
  readonly baseURL: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly debug: boolean;
  readonly debugLevel: 'normal' | 'verbose';
  readonly name: string;

  /**
   * @throws InternalError when `baseURL` is set but is not an absolute URL
   */
  constructor(config: HttpClientOptions = {}) {
    this.transport = config.transport ?? defaultTransport;
    this.baseURL = config.baseURL ?? '';
    this.headers = Object.freeze({ ...config.headers });
    this.debug = config.debug ?? false;
    this.debugLevel = config.debugLevel ?? 'normal';
    this.name = config.name ?? 'HttpClient';

    if (this.baseURL !== '' && !parseAbsoluteURL(this.baseURL)) {
      throw new InternalError(
        'invalid config',
        new TypeError(`base URL "${this.baseURL}" is not an absolute URL`),
        buildErrorMetadata(this.name)
      );
    }
  }

  /**
   * Sends a request with an optional JSON payload and decodes the JSON response
   * @param method - HTTP method; must not be empty
   * @param path - Absolute URL, or a path resolved against the base URL
   * @returns the decoded body, or undefined for 204 responses and when `decode` is false
   * @throws InternalError, InfrastructureError or ApiError
   */
  async execute<T = unknown>(
    method: string,
    path: string,
    config: JsonRequestConfig = {}
  ): Promise<T | undefined> {
    const { payload, ...requestConfig } = config;
    const url = this.resolve(method, path, requestConfig.pathParams);

    let body: string | undefined;
    if (payload !== undefined && payload !== null) {
      body = this.marshal(method, url, payload);
    }

    return this.dispatch<T>(method, url, requestConfig, body, body !== undefined, payload);
  }

  /**
   * Like {@link execute}, but sends a caller-built body unmodified. No
   * Content-Type is added.
   */
  async executeRaw<T = unknown>(
    method: string,
    path: string,
    config: RawRequestConfig = {}
  ): Promise<T | undefined> {
    const { body, ...requestConfig } = config;
    const url = this.resolve(method, path, requestConfig.pathParams);

    return this.dispatch<T>(method, url, requestConfig, body, false, undefined);
  }

  /**
   * Performs a GET request to the specified URL
   */
  async get<T = unknown>(url: string, config: HttpClientRequestConfig = {}): Promise<T | undefined> {
    return this.execute<T>(RequestType.GET, url, config);
  }

  /**
   * Performs a POST request with `payload` as the JSON body
   */
  async post<T = unknown>(
    url: string,
    payload?: unknown,
    config: HttpClientRequestConfig = {}
  ): Promise<T | undefined> {
    return this.execute<T>(RequestType.POST, url, { ...config, payload });
  }

  /**
   * Performs a PUT request with `payload` as the JSON body
   */
  async put<T = unknown>(
    url: string,
    payload?: unknown,
    config: HttpClientRequestConfig = {}
  ): Promise<T | undefined> {
    return this.execute<T>(RequestType.PUT, url, { ...config, payload });
  }

  /**
   * Performs a PATCH request with `payload` as the JSON body
   */
  async patch<T = unknown>(
    url: string,
    payload?: unknown,
    config: HttpClientRequestConfig = {}
  ): Promise<T | undefined> {
    return this.execute<T>(RequestType.PATCH, url, { ...config, payload });
  }

  /**
   * Performs a DELETE request to the specified URL
   */
  async delete<T = unknown>(
    url: string,
    config: HttpClientRequestConfig = {}
  ): Promise<T | undefined> {
    return this.execute<T>(RequestType.DELETE, url, config);
  }

  /**
   * Performs a HEAD request. The response has no body, so nothing is decoded
   */
  async head(url: string, config: HttpClientRequestConfig = {}): Promise<void> {
    await this.execute(RequestType.HEAD, url, { decode: false, ...config });
  }

  /**
   * Performs an OPTIONS request. Nothing is decoded unless `decode` is set
   */
  async options<T = unknown>(
    url: string,
    config: HttpClientRequestConfig = {}
  ): Promise<T | undefined> {
    return this.execute<T>(RequestType.OPTIONS, url, { decode: false, ...config });
  }

  /**
   * Override this method in your extending class to inspect the request
   * before it is sent. Errors thrown here are reported as an InternalError.
   *
   * @param request - The request about to be handed to the transport
   * @param payload - The value the JSON body was encoded from, if any
   */
  protected async beforeRequest(request: Request, payload: unknown): Promise<void> {
    if (!this.debug) {
      return;
    }
    if (this.debugLevel === 'verbose') {
      logData(`[${this.name}] ${request.method} ${request.url}`, {
        payload,
        headers: Object.fromEntries(request.headers),
      });
    } else {
      logData(`[${this.name}] ${request.method} ${request.url}`, { payload });
    }
  }

  /**
   * Override this method in your extending class to act on successful
   * responses. Errors thrown here are reported as an InternalError.
   *
   * @param method - The request method
   * @param url - The resolved request URL
   * @param response - The response; its body has already been read or drained
   * @param data - The decoded body, or undefined when nothing was decoded
   */
  protected async afterResponse(
    method: string,
    url: string,
    response: Response,
    data: unknown
  ): Promise<void> {
    if (this.debug && this.debugLevel === 'verbose') {
      logData(`[${this.name}] ${method} ${url} : ${response.status}`, data);
    }
  }

  /**
   * Every classified error passes through here before it reaches the
   * caller. Override this method for custom error handling, such as
   * metrics or mapping errors to API-specific types; the override must throw.
   *
   * @param error - The classified error
   * @param method - The request method
   * @param url - The request URL (or the unresolved path, when resolution failed)
   */
  protected errorHandler(error: HttpClientError, method: string, url: string): never {
    if (this.debug) {
      logError(error, `[${this.name}] ${method} ${url}`);
    }
    throw error;
  }

  private metadata(method: string, url: string): ErrorMetadata {
    return buildErrorMetadata(this.name, { method, url });
  }

  private resolve(
    method: string,
    path: string,
    pathParams: Record<string, string | number> | undefined
  ): string {
    if (method === '') {
      return this.errorHandler(
        new InternalError('empty method', new TypeError('method must not be empty'), this.metadata(method, path)),
        method,
        path
      );
    }

    try {
      return resolveURL(this.baseURL, substitutePathParams(path, pathParams));
    } catch (error) {
      return this.errorHandler(
        new InternalError('resolve url', error, this.metadata(method, path)),
        method,
        path
      );
    }
  }

  private marshal(method: string, url: string, payload: unknown): string {
    try {
      return marshalJson(payload);
    } catch (error) {
      return this.errorHandler(
        new InternalError('marshal payload', error, this.metadata(method, url)),
        method,
        url
      );
    }
  }

  private buildRequest(
    method: string,
    url: string,
    config: HttpClientRequestConfig,
    body: RawBody | undefined,
    jsonBody: boolean
  ): Request {
    try {
      const hasBody = body !== undefined && body !== null;
      return new Request(url, {
        method,
        headers: buildHeaders(this.headers, config.headers, jsonBody),
        body: hasBody ? body : undefined,
        signal: config.signal,
        // Required by undici for stream bodies
        ...(hasBody && { duplex: 'half' as const }),
      });
    } catch (error) {
      return this.errorHandler(
        new InternalError('create request', error, this.metadata(method, url)),
        method,
        url
      );
    }
  }

  private async dispatch<T>(
    method: string,
    url: string,
    config: HttpClientRequestConfig,
    body: RawBody | undefined,
    jsonBody: boolean,
    payload: unknown
  ): Promise<T | undefined> {
    const request = this.buildRequest(method, url, config, body, jsonBody);

    try {
      await this.beforeRequest(request, payload);
    } catch (error) {
      return this.errorHandler(
        new InternalError('before request', error, this.metadata(method, url)),
        method,
        url
      );
    }

    let response: Response;
    try {
      response = await this.transport(request);
    } catch (error) {
      return this.errorHandler(
        new InfrastructureError(url, error, this.metadata(method, url)),
        method,
        url
      );
    }

    try {
      return await this.handleResponse<T>(method, url, response, config.decode ?? true);
    } finally {
      await this.releaseBody(response, url);
    }
  }

  private async handleResponse<T>(
    method: string,
    url: string,
    response: Response,
    decode: boolean
  ): Promise<T | undefined> {
    if (response.status >= 400) {
      const errorBody = await this.read(method, url, response, MAX_ERROR_BODY_BYTES);
      return this.errorHandler(
        new ApiError(response.status, url, errorBody, this.metadata(method, url)),
        method,
        url
      );
    }

    if (response.status === 204 || !decode) {
      await this.releaseBody(response, url);
      await this.notify(method, url, response, undefined);
      return undefined;
    }

    const text = new TextDecoder().decode(await this.read(method, url, response));
    let data: T;
    try {
      data = JSON.parse(text);
    } catch (error) {
      return this.errorHandler(
        new InternalError('decode response', error, this.metadata(method, url)),
        method,
        url
      );
    }

    await this.notify(method, url, response, data);
    return data;
  }

  private async read(
    method: string,
    url: string,
    response: Response,
    limit?: number
  ): Promise<Uint8Array> {
    try {
      return await readBody(response, limit);
    } catch (error) {
      return this.errorHandler(
        new InfrastructureError(url, error, this.metadata(method, url)),
        method,
        url
      );
    }
  }

  private async notify(method: string, url: string, response: Response, data: unknown): Promise<void> {
    try {
      await this.afterResponse(method, url, response, data);
    } catch (error) {
      this.errorHandler(
        new InternalError('after response', error, this.metadata(method, url)),
        method,
        url
      );
    }
  }

  // Runs on every exit path so the connection is never left holding an unread body
  private async releaseBody(response: Response, url: string): Promise<void> {
    try {
      await discardBody(response);
    } catch (error) {
      logWarning(`[${this.name}] failed to drain response body from ${url}: ${describeError(error)}`);
    }
  }
}
