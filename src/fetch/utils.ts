import type { HeaderOptions } from '../types/request.js';

/**
 * Filters out values that cannot be sent as a header and stringifies the rest.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into one iterable of entries.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers.map(([key, value]): [string, unknown] => [key, value]);
  }

  return Object.entries(headers);
}

/**
 * Merge header layers into a single `Headers` instance, later layers winning.
 * A `null`/`undefined` value in a later layer removes the header.
 */
export function mergeHeaderOptions(...layers: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const layer of layers) {
    for (const [key, value] of toEntries(layer)) {
      if (value == null) {
        merged.delete(key);
        continue;
      }

      const clean = sanitize(value);
      if (clean !== null) {
        merged.set(key, clean);
      }
    }
  }

  return merged;
}
