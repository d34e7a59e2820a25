export { HttpClient, RequestType } from './http-client.js';
export type {
  HttpClientOptions,
  HttpClientRequestConfig,
  JsonRequestConfig,
  RawRequestConfig,
  RawBody,
  Transport,
} from './http-client.js';

export {
  HttpClientError,
  InternalError,
  InfrastructureError,
  ApiError,
  ErrorBodyError,
  HttpErrorCategory,
  classifyHttpError,
  determineHttpErrorRetriability,
  isTimeoutError,
  classifyNetworkErrorType,
  buildErrorMetadata,
  findError,
  isInternalError,
  isInfrastructureError,
  isApiError,
  asApiError,
  isClientError,
  isServerError,
} from './errors.js';
export type { ClassifiedError, ErrorBodyFailure, ErrorKind, ErrorMetadata } from './errors.js';

export { MAX_ERROR_BODY_BYTES } from './response.js';
export { resolveURL, marshalJson } from './request.js';
export { logData, logError, logInfo, logWarning } from './logger.js';
