import { describe, expect, it, vi } from 'vitest';
import { StepTimeout } from '../src/errors.js';
import { sleep, withTimeout } from '../src/utils/pacing.js';
import { firstMatch, hit, miss, type Strategy } from '../src/utils/strategies.js';

function strategy<T>(name: string, attempt: Strategy<T>['attempt']): Strategy<T> {
  return { name, attempt };
}

describe('firstMatch', () => {
  it('returns the first hit and skips the rest', async () => {
    const later = vi.fn(async () => hit('c'));

    const result = await firstMatch([
      strategy('a', async () => miss('not here')),
      strategy('b', async () => hit('b')),
      strategy('c', later),
    ]);

    expect(result).toEqual({ ok: true, value: 'b', strategy: 'b' });
    expect(later).not.toHaveBeenCalled();
  });

  it('treats a thrown error as a miss and keeps going', async () => {
    const onMiss = vi.fn();

    const result = await firstMatch(
      [
        strategy<string>('broken', async () => {
          throw new Error('detached frame');
        }),
        strategy('fallback', async () => hit('ok')),
      ],
      { onMiss }
    );

    expect(result).toEqual({ ok: true, value: 'ok', strategy: 'fallback' });
    expect(onMiss).toHaveBeenCalledTimes(1);
    expect(onMiss.mock.calls[0]?.[0]).toBe('broken');
    expect(onMiss.mock.calls[0]?.[1]).toBe('detached frame');
  });

  it('lists every miss when nothing matches', async () => {
    const result = await firstMatch([
      strategy('history', async () => miss('restricted')),
      strategy('listing', async () => miss('no applied row')),
    ]);

    expect(result).toEqual({
      ok: false,
      misses: [
        { strategy: 'history', reason: 'restricted' },
        { strategy: 'listing', reason: 'no applied row' },
      ],
    });
  });

  it('misses on an empty list', async () => {
    expect(await firstMatch([])).toEqual({ ok: false, misses: [] });
  });
});

describe('withTimeout', () => {
  it('passes through work that finishes in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 100, 'search')).resolves.toBe(42);
  });

  it('rejects with StepTimeout naming the step', async () => {
    const hanging = new Promise<never>(() => undefined);

    const error = await withTimeout(hanging, 20, 'submit').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StepTimeout);
    expect(error).toMatchObject({ step: 'submit', timeoutMs: 20, message: 'Step "submit" timed out after 20ms' });
  });

  it('propagates the work’s own rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('net::ERR_ABORTED')), 100, 'open-job')).rejects.toThrow(
      'net::ERR_ABORTED'
    );
  });
});

describe('sleep', () => {
  it('wakes early when its signal aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);
    const startedAt = Date.now();

    await sleep(30_000, controller.signal);

    expect(Date.now() - startedAt).toBeLessThan(1000);
  });

  it('returns at once for an already aborted signal', async () => {
    await expect(sleep(30_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});
