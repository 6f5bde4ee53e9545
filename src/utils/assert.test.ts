import { describe, expect, test } from 'vitest';
import { InvalidArgumentError, isInvalidArgumentError } from '../error/invalidArgumentError.js';
import { optionalStringList, requireNonEmptyList, requireNonEmptyString } from './assert.js';

describe('requireNonEmptyString', () => {
  test('returns the value', () => {
    expect(requireNonEmptyString('abc', 'tag')).toBe('abc');
  });

  test('throws a TypeError on null, undefined and non-strings', () => {
    expect(() => requireNonEmptyString(null, 'tag')).toThrow(new TypeError('tag must not be null'));
    expect(() => requireNonEmptyString(undefined, 'tag')).toThrow(new TypeError('tag must not be undefined'));
    expect(() => requireNonEmptyString(12, 'tag')).toThrow(new TypeError('tag must be a string, got number'));
  });

  test('throws InvalidArgumentError naming the argument on an empty string', () => {
    let thrown: unknown;
    try {
      requireNonEmptyString('', 'baseUrl');
    } catch (error) {
      thrown = error;
    }

    expect(isInvalidArgumentError(thrown)).toBe(true);
    expect(thrown).toBeInstanceOf(InvalidArgumentError);
    if (thrown instanceof InvalidArgumentError) {
      expect(thrown.argument).toBe('baseUrl');
      expect(thrown.message).toBe('baseUrl must not be empty');
    }
  });
});

describe('requireNonEmptyList', () => {
  test('returns a copy of the list', () => {
    const tags = ['a', 'b'];
    const result = requireNonEmptyList(tags, 'tags');

    expect(result).toStrictEqual(['a', 'b']);
    expect(result).not.toBe(tags);
  });

  test('throws a TypeError on a missing list or a non-array', () => {
    expect(() => requireNonEmptyList(undefined, 'tags')).toThrow(TypeError);
    expect(() => requireNonEmptyList('a,b', 'tags')).toThrow(new TypeError('tags must be an array, got string'));
  });

  test('throws InvalidArgumentError on an empty list or item', () => {
    expect(() => requireNonEmptyList([], 'tags')).toThrow(InvalidArgumentError);
    expect(() => requireNonEmptyList(['a', ''], 'tags')).toThrow(new InvalidArgumentError('tags[1] must not be empty', 'tags[1]'));
  });

  test('throws a TypeError on a missing item', () => {
    expect(() => requireNonEmptyList(['a', null], 'tags')).toThrow(new TypeError('tags[1] must not be null'));
  });
});

describe('optionalStringList', () => {
  test('treats a missing list as empty', () => {
    expect(optionalStringList(undefined, 'keys')).toStrictEqual([]);
    expect(optionalStringList(null, 'keys')).toStrictEqual([]);
  });

  test('throws a TypeError on non-string items', () => {
    expect(() => optionalStringList(['name', 3], 'keys')).toThrow(new TypeError('keys[1] must be a string, got number'));
  });
});
