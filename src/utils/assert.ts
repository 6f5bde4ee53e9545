import { InvalidArgumentError } from '../error/invalidArgumentError.js';

/**
 * Asserts that a required string argument is present and non-empty.
 *
 * @throws TypeError when the value is missing or not a string (a programmer error).
 * @throws InvalidArgumentError when the string is empty.
 */
export function requireNonEmptyString(value: unknown, name: string): string {
  if (value === null || value === undefined) {
    throw new TypeError(`${name} must not be ${value}`);
  }

  if (typeof value !== 'string') {
    throw new TypeError(`${name} must be a string, got ${typeof value}`);
  }

  if (value.length === 0) {
    throw new InvalidArgumentError(`${name} must not be empty`, name);
  }

  return value;
}

/**
 * Asserts that a required list of strings is present, non-empty and holds no empty item.
 *
 * @throws TypeError when the list is missing, not an array, or holds a non-string.
 * @throws InvalidArgumentError when the list or one of its items is empty.
 */
export function requireNonEmptyList(value: unknown, name: string): string[] {
  if (value === null || value === undefined) {
    throw new TypeError(`${name} must not be ${value}`);
  }

  if (!Array.isArray(value)) {
    throw new TypeError(`${name} must be an array, got ${typeof value}`);
  }

  if (value.length === 0) {
    throw new InvalidArgumentError(`${name} must not be empty`, name);
  }

  return value.map((item: unknown, index) => requireNonEmptyString(item, `${name}[${index}]`));
}

/**
 * Asserts that an optional list, when given, only holds strings. Missing means empty.
 */
export function optionalStringList(value: unknown, name: string): string[] {
  if (value === null || value === undefined) {
    return [];
  }

  if (!Array.isArray(value)) {
    throw new TypeError(`${name} must be an array, got ${typeof value}`);
  }

  return value.map((item: unknown, index) => {
    if (typeof item !== 'string') {
      throw new TypeError(`${name}[${index}] must be a string, got ${typeof item}`);
    }

    return item;
  });
}
