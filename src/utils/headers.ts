import type { HttpHeaders } from '@/models/types';

export const REDACTED = '██';

export const DEFAULT_SENSITIVE_HEADERS = [
  'Authorization',
  'Proxy-Authorization',
  'Cookie',
  'Set-Cookie',
  'X-API-Key',
];

/**
 * Merge header layers from lowest to highest precedence.
 *
 * Names are compared case-insensitively: a later layer replaces any earlier
 * entry with the same name and its own spelling of the name is kept.
 */
export function mergeHeaders(...layers: Array<HttpHeaders | undefined>): HttpHeaders {
  const merged = new Map<string, [string, string]>();

  for (const layer of layers) {
    if (!layer) continue;
    for (const [name, value] of Object.entries(layer)) {
      merged.set(name.toLowerCase(), [name, value]);
    }
  }

  const result: HttpHeaders = {};
  for (const [name, value] of merged.values()) {
    result[name] = value;
  }
  return result;
}

/**
 * Case-insensitive header lookup
 */
export function getHeader(headers: HttpHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

/**
 * Copy of the headers with sensitive values masked
 */
export function redactHeaders(headers: HttpHeaders, sensitive: readonly string[] = DEFAULT_SENSITIVE_HEADERS): HttpHeaders {
  const names = new Set(sensitive.map((name) => name.toLowerCase()));
  const result: HttpHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    result[name] = names.has(name.toLowerCase()) ? REDACTED : value;
  }
  return result;
}
