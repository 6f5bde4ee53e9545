import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads and decodes a response body into a tuple-style result.
 *
 * - 204/205 resolve to `null`, as does an empty body.
 * - A JSON content type (`application/json` or `+json`) is parsed with `JSON.parse`.
 * - Anything else resolves to the body text (the API serves its version as plain text).
 *
 * The value is not checked against `ReturnValue`; validate it with the endpoint schema.
 */
export async function getResponseData<ReturnValue>(response: Response): SafeWrapAsync<Error, ReturnValue> {
  if (response.status === 204 || response.status === 205) {
    return [null, null as ReturnValue];
  }

  // text first: a body can only be consumed once
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseData', { cause: errText }), null];
  }

  if (!text) {
    return [null, null as ReturnValue];
  }

  const contentType = response.headers?.get('Content-Type')?.toLowerCase();
  if (!contentType?.includes('application/json') && !contentType?.includes('+json')) {
    return [null, text as ReturnValue];
  }

  const [errJson, json] = safeWrap(() => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing json response body in getResponseData', { cause: errJson }), null];
  }

  return [null, json];
}
