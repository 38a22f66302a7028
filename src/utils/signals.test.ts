import { afterEach, describe, expect, it, vi } from 'vitest';
import { TimeoutError } from '../error/timeoutError.js';
import { createTimeoutSignal, mergeSignals } from './signals.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('createTimeoutSignal', () => {
  it('returns null when disabled', () => {
    expect(createTimeoutSignal()).toBeNull();
    expect(createTimeoutSignal(0)).toBeNull();
    expect(createTimeoutSignal(false)).toBeNull();
  });

  it('aborts after the configured timeout with a TimeoutError', async () => {
    vi.useFakeTimers();
    const scoped = createTimeoutSignal(50);

    expect(scoped?.signal.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(50);

    expect(scoped?.signal.aborted).toBe(true);
    const reason: unknown = scoped?.signal.reason;
    expect(reason).toBeInstanceOf(TimeoutError);
    expect(reason instanceof Error && reason.message).toBe('error request timed out after 50ms');
  });

  it('never aborts once released', async () => {
    vi.useFakeTimers();
    const scoped = createTimeoutSignal(50);

    scoped?.release();
    await vi.advanceTimersByTimeAsync(100);

    expect(scoped?.signal.aborted).toBe(false);
  });

  it('creates independent signals for separate invocations', () => {
    vi.useFakeTimers();

    const first = createTimeoutSignal(10);
    const second = createTimeoutSignal(20);

    vi.advanceTimersByTime(15);

    expect(first?.signal.aborted).toBe(true);
    expect(second?.signal.aborted).toBe(false);
  });
});

describe('mergeSignals', () => {
  it('returns null when no signals are provided', () => {
    expect(mergeSignals([])).toBeNull();
    expect(mergeSignals([null, undefined])).toBeNull();
  });

  it('returns the single active signal when only one is provided', () => {
    const controller = new AbortController();

    expect(mergeSignals([null, controller.signal])?.signal).toBe(controller.signal);
  });

  it('aborts with the reason of the first source to abort', () => {
    const first = new AbortController();
    const second = new AbortController();
    const merged = mergeSignals([first.signal, second.signal]);
    const reason = new TimeoutError('slow');

    second.abort(reason);

    expect(merged?.signal.aborted).toBe(true);
    expect(merged?.signal.reason).toBe(reason);
  });

  it('is aborted immediately when a source already is', () => {
    const first = new AbortController();
    const second = new AbortController();
    first.abort('gone');

    const merged = mergeSignals([first.signal, second.signal]);

    expect(merged?.signal.aborted).toBe(true);
    expect(merged?.signal.reason).toBe('gone');
  });

  it('stops following the sources once released', () => {
    const first = new AbortController();
    const second = new AbortController();
    const merged = mergeSignals([first.signal, second.signal]);

    merged?.release();
    first.abort('late');

    expect(merged?.signal.aborted).toBe(false);
  });
});
