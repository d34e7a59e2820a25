export const JSON_CONTENT_TYPE = 'application/json';

// A `:name` counts only at the start of a path segment
const PATH_PARAM_PATTERN = /(^|\/):([a-zA-Z_][a-zA-Z0-9_]*)/g;
const URL_AUTHORITY_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\/[^/?#]*/;

/**
 * Parses `value` as an absolute URL
 * @returns the parsed URL, or undefined when `value` is relative or malformed
 */
export function parseAbsoluteURL(value: string): URL | undefined {
  try {
    return new URL(value);
  } catch {
    return undefined;
  }
}

/**
 * Substitutes path parameters in a URL with values from the pathParams object.
 * Path parameters are defined using the :paramName format at the start of a
 * path segment and every substituted value is URL-encoded. The scheme,
 * authority, query and fragment are left untouched.
 * @throws Error if a parameter in the URL has no value in pathParams
 */
export function substitutePathParams(
  url: string,
  pathParams: Record<string, string | number> = {}
): string {
  const authority = URL_AUTHORITY_PATTERN.exec(url)?.[0] ?? '';
  const suffixStart = url.slice(authority.length).search(/[?#]/);
  const pathEnd = suffixStart === -1 ? url.length : authority.length + suffixStart;
  const path = url.slice(authority.length, pathEnd);
  const missing: string[] = [];

  const substituted = path.replace(
    PATH_PARAM_PATTERN,
    (match, prefix: string, paramName: string) => {
      if (!Object.prototype.hasOwnProperty.call(pathParams, paramName)) {
        missing.push(paramName);
        return match;
      }
      return `${prefix}${encodeURIComponent(String(pathParams[paramName]))}`;
    }
  );

  if (missing.length > 0) {
    throw new Error(
      `Missing required path parameters: ${missing.join(', ')}. Provide values via pathParams.`
    );
  }

  return `${authority}${substituted}${url.slice(pathEnd)}`;
}

/**
 * Resolves `path` against `baseURL`.
 *
 * An absolute `path` is returned as-is (normalized). Otherwise the base is
 * treated as a directory, so `/v1/users?x=1` against `http://host/api` gives
 * `http://host/api/v1/users?x=1`: no base segment is dropped and the query
 * survives. Resolution goes through the WHATWG URL parser, which
 * percent-encodes the result.
 *
 * @throws TypeError when `path` is relative and there is no base URL
 */
export function resolveURL(baseURL: string, path: string): string {
  const absolute = parseAbsoluteURL(path);
  if (absolute) {
    return absolute.href;
  }

  if (!baseURL) {
    throw new TypeError(`relative path "${path}" needs a base URL`);
  }

  const base = new URL(baseURL);
  if (path === '') {
    return base.href;
  }
  if (!base.pathname.endsWith('/')) {
    base.pathname = `${base.pathname}/`;
  }
  // `./` keeps a colon in the first segment from reading as a scheme
  return new URL(`./${path.replace(/^\/+/, '')}`, base).href;
}

/**
 * Serializes a payload as JSON.
 * @throws TypeError for non-finite numbers and values with no JSON form;
 * JSON.stringify's own TypeError for BigInt and circular structures
 */
export function marshalJson(payload: unknown): string {
  const encoded: string | undefined = JSON.stringify(payload, rejectNonFinite);
  if (encoded === undefined) {
    throw new TypeError(`cannot encode a value of type ${typeof payload}`);
  }
  return encoded;
}

function rejectNonFinite(key: string, value: unknown): unknown {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    const location = key === '' ? '' : ` at "${key}"`;
    throw new TypeError(`cannot encode non-finite number ${value}${location}`);
  }
  return value;
}

/**
 * Merges client defaults and caller headers case-insensitively, then fills
 * in the JSON defaults the caller did not set
 * @param jsonBody - whether the request carries a JSON-encoded body
 */
export function buildHeaders(
  defaults: Readonly<Record<string, string>>,
  headers: Readonly<Record<string, string>> | undefined,
  jsonBody: boolean
): Headers {
  const merged = new Headers(defaults);
  for (const [name, value] of Object.entries(headers ?? {})) {
    merged.set(name, value);
  }

  if (!merged.has('accept')) {
    merged.set('accept', JSON_CONTENT_TYPE);
  }
  if (jsonBody && !merged.has('content-type')) {
    merged.set('content-type', JSON_CONTENT_TYPE);
  }

  return merged;
}
