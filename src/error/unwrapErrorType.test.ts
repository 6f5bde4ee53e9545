import { describe, expect, test } from 'vitest';
import { unwrapErrorType } from './unwrapErrorType.js';

class TargetError extends Error {}

class OtherError extends Error {}

abstract class BaseError extends Error {}

class ConcreteError extends BaseError {}

describe('unwrapErrorType', () => {
  test('returns null for non-errors', () => {
    expect(unwrapErrorType(TargetError, { message: 'not an error' })).toBeNull();
    expect(unwrapErrorType(TargetError, null)).toBeNull();
  });

  test('matches the outermost error', () => {
    const err = new TargetError('target');

    expect(unwrapErrorType(TargetError, err)).toBe(err);
  });

  test('follows the cause chain', () => {
    const target = new TargetError('target');
    const wrapped = new Error('outer', { cause: new OtherError('middle', { cause: target }) });

    expect(unwrapErrorType(TargetError, wrapped)).toBe(target);
  });

  test('returns the outermost match', () => {
    const inner = new TargetError('inner');
    const outer = new TargetError('outer', { cause: inner });

    expect(unwrapErrorType(TargetError, new Error('wrap', { cause: outer }))).toBe(outer);
  });

  test('stops at a non-error cause', () => {
    expect(unwrapErrorType(TargetError, new Error('outer', { cause: 'text' }))).toBeNull();
  });

  test('matches subclasses of an abstract class', () => {
    const err = new ConcreteError('concrete');

    expect(unwrapErrorType(BaseError, new Error('outer', { cause: err }))).toBe(err);
  });

  test('terminates on a cyclic cause chain', () => {
    const a = new Error('a');
    const b = new Error('b', { cause: a });
    a.cause = b;

    expect(unwrapErrorType(TargetError, a)).toBeNull();
  });
});
