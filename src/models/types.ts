/**
 * HTTP methods supported by the client
 */
export enum HttpMethod {
  GET = 'GET',
  POST = 'POST',
  PUT = 'PUT',
  DELETE = 'DELETE',
  PATCH = 'PATCH',
  HEAD = 'HEAD',
  OPTIONS = 'OPTIONS',
}

/**
 * Authentication strategy variants
 */
export enum AuthType {
  NONE = 'none',
  BASIC = 'basic',
  BEARER = 'bearer',
  CUSTOM = 'custom',
  DYNAMIC = 'dynamic',
  RULE_BASED = 'ruleBased',
}

/**
 * Verbosity of the transport's traffic log
 */
export enum HttpLogLevel {
  NONE = 'none',
  INFO = 'info',
  HEADERS = 'headers',
  BODY = 'body',
  ALL = 'all',
}

/**
 * Plain header map. Keys are compared case-insensitively when merged.
 */
export type HttpHeaders = Record<string, string>;

/**
 * Query string values appended to the request URL
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * A decoded response as returned by the client
 */
export interface HttpResponse<T> {
  status: number;
  statusText: string;
  headers: HttpHeaders;
  data: T;
  url: string;
  attempts: number;
}

/**
 * Check whether a string names a supported HTTP method
 */
export function isHttpMethod(value: string): value is HttpMethod {
  return Object.values(HttpMethod).some((method) => method === value);
}
