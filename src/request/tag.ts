import { InvalidArgumentError } from '../error/invalidArgumentError.js';
import { requireNonEmptyString } from '../utils/assert.js';

/**
 * Puts a player, clan or tournament tag in the form the API expects: one leading `#`
 * dropped, upper-cased (`#2ppq` becomes `2PPQ`).
 */
export function normalizeTag(tag: string): string {
  return tag.replace(/^#/, '').toUpperCase();
}

/**
 * Asserts that a tag argument is present and still names something once normalized.
 *
 * @throws TypeError when the tag is missing or not a string.
 * @throws InvalidArgumentError when the tag is empty, or is nothing but `#`.
 */
export function requireTag(value: unknown, name: string): string {
  const tag = requireNonEmptyString(value, name);
  if (normalizeTag(tag) === '') {
    throw new InvalidArgumentError(`${name} must not be empty after its leading '#'`, name);
  }

  return tag;
}
