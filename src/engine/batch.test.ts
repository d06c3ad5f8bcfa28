import { describe, expect, it, vi } from 'vitest';
import * as fc from 'fast-check';
import { partition, processSymbol, runBatches, summarizeBatch } from '@/engine/batch.ts';
import { NetworkError, RunCancelledError } from '@/utils/errors.ts';
import { createFakeSource, makeSeries, noSleep } from '@/test/fakes.ts';
import type { Sleep } from '@/utils/sleep.ts';

const CLOSES = [10, 12, 11, 13, 14, 12, 11, 13, 15, 14];
const OPTIONS = { batchSize: 20, delayMs: 500, maxRetries: 3, retryDelayMs: 2000, period: 5 };

const healthy = (symbol: string) => () => makeSeries(CLOSES, symbol);
const alwaysDown = () => new NetworkError('ECONNRESET');

describe('partition', () => {
  it('splits into ceil(N / B) contiguous batches covering the input', () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(fc.string({ minLength: 1, maxLength: 8 }), { maxLength: 120 }),
        fc.integer({ min: 1, max: 30 }),
        (symbols, size) => {
          const batches = partition(symbols, size);
          expect(batches).toHaveLength(Math.ceil(symbols.length / size));
          expect(batches.flat()).toEqual(symbols);
          batches.slice(0, -1).forEach((b) => expect(b).toHaveLength(size));
        },
      ),
    );
  });

  it('rejects a batch size below one', () => {
    expect(() => partition(['A'], 0)).toThrow(RangeError);
  });
});

describe('processSymbol', () => {
  it('appends the market suffix exactly once', async () => {
    const { source, calls } = createFakeSource({ 'RELIANCE.NS': healthy('RELIANCE.NS') });

    const plain = await processSymbol('reliance', 'daily', { source, sleep: noSleep }, OPTIONS);
    const suffixed = await processSymbol('RELIANCE.NS', 'daily', { source, sleep: noSleep }, OPTIONS);

    expect(calls).toEqual(['RELIANCE.NS', 'RELIANCE.NS']);
    expect(plain.symbol).toBe('RELIANCE');
    expect(suffixed.symbol).toBe('RELIANCE');
    expect(plain.ok && suffixed.ok).toBe(true);
  });

  it('attempts exactly maxRetries fetches before recording a network failure', async () => {
    const { source, calls } = createFakeSource({ 'DOWN.NS': alwaysDown });

    const outcome = await processSymbol('DOWN', 'daily', { source, sleep: noSleep }, OPTIONS);

    expect(calls).toEqual(['DOWN.NS', 'DOWN.NS', 'DOWN.NS']);
    expect(outcome).toEqual({
      ok: false,
      symbol: 'DOWN',
      error: { kind: 'network', message: 'ECONNRESET' },
      attempts: 3,
    });
  });

  it('succeeds when a retry recovers within the attempt budget', async () => {
    const { source } = createFakeSource({
      'FLAKY.NS': (attempt) => (attempt < 3 ? new NetworkError('503') : makeSeries(CLOSES, 'FLAKY.NS')),
    });

    const outcome = await processSymbol('FLAKY', 'daily', { source, sleep: noSleep }, OPTIONS);

    expect(outcome.ok).toBe(true);
    expect(outcome.attempts).toBe(3);
  });

  it('does not retry insufficient data', async () => {
    const { source, calls } = createFakeSource({ 'NEW.NS': () => makeSeries([10, 11], 'NEW.NS') });

    const outcome = await processSymbol('NEW', 'daily', { source, sleep: noSleep }, OPTIONS);

    expect(calls).toHaveLength(1);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.kind).toBe('insufficient-data');
  });

  it('does not retry unknown errors', async () => {
    const { source, calls } = createFakeSource({ 'ODD.NS': () => new TypeError('bad shape') });

    const outcome = await processSymbol('ODD', 'daily', { source, sleep: noSleep }, OPTIONS);

    expect(calls).toHaveLength(1);
    expect(outcome).toMatchObject({ ok: false, error: { kind: 'unknown', message: 'bad shape' } });
  });

  it('records an empty result after retrying it', async () => {
    const { source, calls } = createFakeSource({});

    const outcome = await processSymbol('GONE', 'hourly', { source, sleep: noSleep }, OPTIONS);

    expect(calls).toHaveLength(3);
    expect(outcome).toMatchObject({ ok: false, error: { kind: 'empty-result' } });
  });
});

describe('runBatches', () => {
  it('keeps going past a failing symbol and preserves input order', async () => {
    const { source, calls } = createFakeSource({
      'A.NS': healthy('A.NS'),
      'B.NS': alwaysDown,
      'C.NS': healthy('C.NS'),
    });

    const result = await runBatches(['A', 'B', 'C'], 'daily', { source, sleep: noSleep }, {
      ...OPTIONS,
      batchSize: 2,
    });

    expect(result.batches).toEqual([['A', 'B'], ['C']]);
    expect(result.outcomes.map((o) => [o.symbol, o.ok])).toEqual([
      ['A', true],
      ['B', false],
      ['C', true],
    ]);
    expect(calls).toEqual(['A.NS', 'B.NS', 'B.NS', 'B.NS', 'C.NS']);
  });

  it('throttles between symbols and waits the retry delay between attempts', async () => {
    const sleep = vi.fn<Sleep>(async () => {});
    const { source } = createFakeSource({
      'A.NS': healthy('A.NS'),
      'B.NS': alwaysDown,
      'C.NS': healthy('C.NS'),
    });

    await runBatches(['A', 'B', 'C'], 'daily', { source, sleep }, OPTIONS);

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 2000, 2000, 500]);
  });

  it('returns the same results when run twice on frozen data', async () => {
    const { source, reset } = createFakeSource({ 'A.NS': healthy('A.NS'), 'B.NS': healthy('B.NS') });

    const first = await runBatches(['A', 'B'], 'daily', { source, sleep: noSleep }, OPTIONS);
    reset();
    const second = await runBatches(['A', 'B'], 'daily', { source, sleep: noSleep }, OPTIONS);

    expect(second).toEqual(first);
  });

  it('stops between symbols once the signal is aborted', async () => {
    const controller = new AbortController();
    const { source, calls } = createFakeSource({
      'A.NS': healthy('A.NS'),
      'B.NS': () => {
        controller.abort();
        return makeSeries(CLOSES, 'B.NS');
      },
      'C.NS': healthy('C.NS'),
    });

    await expect(
      runBatches(['A', 'B', 'C'], 'daily', { source, sleep: noSleep, signal: controller.signal }, OPTIONS),
    ).rejects.toBeInstanceOf(RunCancelledError);
    expect(calls).toEqual(['A.NS', 'B.NS']);
  });

  it('handles an empty symbol list', async () => {
    const { source } = createFakeSource({});
    const result = await runBatches([], 'hourly', { source, sleep: noSleep }, OPTIONS);
    expect(result).toEqual({ timeframe: 'hourly', batches: [], outcomes: [] });
  });
});

describe('summarizeBatch', () => {
  it('counts successes and failures by kind', async () => {
    const { source } = createFakeSource({
      'A.NS': healthy('A.NS'),
      'B.NS': alwaysDown,
      'C.NS': () => makeSeries([1], 'C.NS'),
    });

    const result = await runBatches(['A', 'B', 'C', 'D'], 'daily', { source, sleep: noSleep }, OPTIONS);

    expect(summarizeBatch(result)).toEqual({
      total: 4,
      succeeded: 1,
      failed: 3,
      failuresByKind: { network: 1, 'insufficient-data': 1, 'empty-result': 1 },
    });
  });
});
