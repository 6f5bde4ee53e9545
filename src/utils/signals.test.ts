import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { createTimeoutSignal, mergeSignals } from './signals.js';

describe('createTimeoutSignal', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('returns null when the timeout is disabled', () => {
    expect(createTimeoutSignal(false)).toBeNull();
    expect(createTimeoutSignal(0)).toBeNull();
    expect(createTimeoutSignal()).toBeNull();
  });

  test('aborts with a TimeoutError once the time is up', () => {
    const timeout = createTimeoutSignal(500);

    vi.advanceTimersByTime(499);
    expect(timeout?.signal.aborted).toBe(false);

    vi.advanceTimersByTime(1);
    expect(timeout?.signal.aborted).toBe(true);
    expect(timeout?.signal.reason).toBeInstanceOf(TimeoutError);
    expect(timeout?.signal.reason.message).toBe('error request timed out after 500ms');
  });

  test('release clears the timer', () => {
    const timeout = createTimeoutSignal(500);
    timeout?.release();

    vi.advanceTimersByTime(1_000);
    expect(timeout?.signal.aborted).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('mergeSignals', () => {
  test('returns null without signals', () => {
    expect(mergeSignals([null, undefined])).toBeNull();
  });

  test('returns a single signal as is', () => {
    const controller = new AbortController();

    expect(mergeSignals([controller.signal, null])?.signal).toBe(controller.signal);
  });

  test('aborts with the reason of the first source to abort', () => {
    const first = new AbortController();
    const second = new AbortController();
    const merged = mergeSignals([first.signal, second.signal]);
    const reason = new Error('second');

    second.abort(reason);
    first.abort(new Error('first'));

    expect(merged?.signal.aborted).toBe(true);
    expect(merged?.signal.reason).toBe(reason);
  });

  test('is aborted right away when a source already is', () => {
    const reason = new AbortError('gone');
    const merged = mergeSignals([AbortSignal.abort(reason), new AbortController().signal]);

    expect(merged?.signal.aborted).toBe(true);
    expect(merged?.signal.reason).toBe(reason);
  });

  test('release detaches from the sources', () => {
    const source = new AbortController();
    const merged = mergeSignals([source.signal, new AbortController().signal]);

    merged?.release();
    source.abort();

    expect(merged?.signal.aborted).toBe(false);
  });
});
