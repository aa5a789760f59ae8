const INDEX_SEGMENT = /^\d+(\.|$)/;

/** Paths below `prefix`, with the prefix stripped. */
function descend(paths: string[], prefix: string): string[] {
  const head = `${prefix}.`;
  return paths
    .filter((path) => path.startsWith(head))
    .map((path) => path.slice(head.length));
}

/** Paths that apply to every element of an array (no leading index). */
function elementPaths(paths: string[]): string[] {
  return paths.filter((path) => !INDEX_SEGMENT.test(path));
}

/**
 * Replace the values at the given dot-notation paths with a placeholder.
 *
 * Paths address object keys (`tokens.refreshToken`) and array indices
 * (`redirect_uris.0`). A path segment that meets an array without an index
 * applies to every element, so `endpoints.token` redacts `token` in each
 * endpoint object. The input is never mutated; primitives, null and
 * undefined come back unchanged.
 *
 * @example
 * ```typescript
 * redact({ client_id: 'app', client_secret: 's3' }, ['client_secret']);
 * // { client_id: 'app', client_secret: '[redacted]' }
 * ```
 */
export function redact<T>(
  obj: T,
  paths: string[],
  redaction = '[redacted]'
): T {
  if (obj === null || typeof obj !== 'object' || paths.length === 0) {
    return obj;
  }

  const direct = new Set(paths);

  if (Array.isArray(obj)) {
    const shared = elementPaths(paths);
    const items: unknown[] = obj.map((item: unknown, index) => {
      const key = String(index);
      if (direct.has(key)) {
        return redaction;
      }
      return redact(item, [...descend(paths, key), ...shared], redaction);
    });
    return items as T;
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = direct.has(key)
      ? redaction
      : redact(value, descend(paths, key), redaction);
  }
  return result as T;
}

/**
 * Redact query parameters of a URL string, e.g. the `code` and `state` of an
 * authorization callback, so the URL can be logged. Unparseable input is
 * returned as-is.
 */
export function redactQueryParams(
  url: string,
  names: string[],
  redaction = '[redacted]'
): string {
  let parsed: URL;
  try {
    parsed = new URL(url, 'http://localhost');
  } catch {
    return url;
  }

  for (const name of names) {
    if (parsed.searchParams.has(name)) {
      parsed.searchParams.set(name, redaction);
    }
  }

  return url.startsWith('/')
    ? `${parsed.pathname}${parsed.search}`
    : parsed.toString();
}
