/**
 * Response headers with lower-cased names and string values
 */
export type HttpHeaders = Record<string, string>;

export function normalizeHeaders(
  headers: Record<string, string | number | string[] | undefined> | undefined,
): HttpHeaders {
  const normalized: HttpHeaders = {};
  if (!headers) {
    return normalized;
  }
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    normalized[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return normalized;
}

export function getHeader(headers: HttpHeaders | undefined, name: string): string | undefined {
  if (!headers) {
    return undefined;
  }
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

/**
 * Integer header value, or undefined when absent or unparseable
 */
export function getIntegerHeader(headers: HttpHeaders | undefined, name: string): number | undefined {
  const raw = getHeader(headers, name);
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? undefined : parsed;
}
