import { describe, expect, test } from 'vitest';
import { ApiError, getApiError, isApiError } from './apiError.js';
import { InvalidArgumentError, isInvalidArgumentError } from './invalidArgumentError.js';
import { getUnknownTransportError, isUnknownTransportError, UnknownTransportError } from './unknownTransportError.js';

describe('ApiError', () => {
  test('exposes the code and the operation', () => {
    const err = new ApiError('error in getClan: 404', 404, 'getClan');

    expect(err.code).toBe(404);
    expect(err.operation).toBe('getClan');
    expect(err.message).toBe('error in getClan: 404');
  });

  test('is found through a cause chain', () => {
    const inner = new ApiError('error in getClan: 500', 500, 'getClan');
    const outer = new Error('wrapper', { cause: inner });

    expect(isApiError(outer)).toBe(true);
    expect(getApiError(outer)).toBe(inner);
  });

  test('returns false for other errors', () => {
    expect(isApiError(new Error('boom'))).toBe(false);
    expect(getApiError(new UnknownTransportError('boom', 'getClan'))).toBeNull();
  });
});

describe('UnknownTransportError', () => {
  test('exposes the operation and keeps the cause', () => {
    const cause = new Error('socket hang up');
    const err = new UnknownTransportError('error in getVersion', 'getVersion', { cause });

    expect(err.operation).toBe('getVersion');
    expect(err.cause).toBe(cause);
    expect(isUnknownTransportError(err)).toBe(true);
    expect(getUnknownTransportError(new Error('wrapper', { cause: err }))).toBe(err);
  });
});

describe('InvalidArgumentError', () => {
  test('names the rejected argument', () => {
    const err = new InvalidArgumentError('tag must not be empty', 'tag');

    expect(err.argument).toBe('tag');
    expect(isInvalidArgumentError(err)).toBe(true);
  });

  test('only matches the error itself, not a wrapper', () => {
    const wrapped = new Error('wrapper', { cause: new InvalidArgumentError('tag must not be empty', 'tag') });

    expect(isInvalidArgumentError(wrapped)).toBe(false);
  });
});
