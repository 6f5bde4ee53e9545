import { ConstructURLError } from '../error/constructUrlError.js';
import type { SafeWrap } from './wrap.js';

/** Values substituted into `{param}` segments; a list is encoded per item and comma-joined. */
export type PathParams = Record<string, string | readonly string[]>;

/** Query values; `null` and `undefined` are left out. */
export type SearchParams = Record<string, string | number | boolean | null | undefined>;

/**
 * Builds a relative URL from a path template such as `player/{tag}`.
 *
 * - Replaces every `{param}` with its URI-encoded value.
 * - Appends the non-empty search params as a query string.
 * - Strips a leading slash so the result joins cleanly onto a base URL.
 */
export function constructUrl(template: string, path: PathParams = {}, search: SearchParams = {}): SafeWrap<Error, string> {
  let result = template.replace(/^\//, '');

  for (const [key, value] of Object.entries(path)) {
    const encoded =
      typeof value === 'string' ? encodeURIComponent(value) : value.map((item) => encodeURIComponent(item)).join(',');
    result = result.replaceAll(`{${key}}`, encoded);
  }

  if (result.includes('{') || result.includes('}')) {
    return [new ConstructURLError(`error constructing URL, path still contains {} ${result}`, result), null];
  }

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(search)) {
    if (value === undefined || value === null) {
      continue;
    }

    searchParams.set(key, String(value));
  }

  const query = searchParams.toString();
  return [null, query ? `${result}?${query}` : result];
}
