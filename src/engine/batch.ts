import { BANDS, BATCH } from '@/utils/config.ts';
import { createLogger } from '@/utils/logger.ts';
import { RunCancelledError, errorMessage, symbolErrorKind } from '@/utils/errors.ts';
import { sleep as defaultSleep } from '@/utils/sleep.ts';
import { withRetry } from '@/engine/retry.ts';
import { computeBands } from '@/strategy/indicators.ts';
import { toDisplaySymbol, toYahooSymbol } from '@/market-data/symbol-map.ts';
import type { Timeframe } from '@/utils/config.ts';
import type { Logger } from '@/utils/logger.ts';
import type { SymbolErrorKind } from '@/utils/errors.ts';
import type { Sleep } from '@/utils/sleep.ts';
import type { MarketDataSource } from '@/market-data/types.ts';
import type { BandResult } from '@/strategy/indicators.ts';

export type SymbolFailure = {
  kind: SymbolErrorKind;
  message: string;
};

export type SymbolOutcome =
  | { ok: true; symbol: string; result: BandResult; attempts: number }
  | { ok: false; symbol: string; error: SymbolFailure; attempts: number };

export type BatchResult = {
  timeframe: Timeframe;
  batches: string[][];
  outcomes: SymbolOutcome[];
};

export type BatchOptions = {
  batchSize?: number;
  delayMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  period?: number;
  numStd?: number;
};

export type BatchDeps = {
  source: MarketDataSource;
  sleep?: Sleep;
  signal?: AbortSignal;
  logger?: Logger;
};

export type BatchSummary = {
  total: number;
  succeeded: number;
  failed: number;
  failuresByKind: Partial<Record<SymbolErrorKind, number>>;
};

const defaultLog = createLogger('batch');

export const partition = <T>(items: readonly T[], size: number): T[][] => {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`batch size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
};

const resolveOptions = (options: BatchOptions): Required<BatchOptions> => ({
  batchSize: options.batchSize ?? BATCH.batchSize,
  delayMs: options.delayMs ?? BATCH.delayMs,
  maxRetries: options.maxRetries ?? BATCH.maxRetries,
  retryDelayMs: options.retryDelayMs ?? BATCH.retryDelayMs,
  period: options.period ?? BANDS.period,
  numStd: options.numStd ?? BANDS.numStd,
});

export const processSymbol = async (
  symbol: string,
  timeframe: Timeframe,
  deps: BatchDeps,
  options: BatchOptions = {},
): Promise<SymbolOutcome> => {
  const opts = resolveOptions(options);
  const log = deps.logger ?? defaultLog;
  const querySymbol = toYahooSymbol(symbol);
  const display = toDisplaySymbol(querySymbol);

  const fetched = await withRetry((attempt) => {
    log.debug(`Fetching ${timeframe} ${querySymbol} (attempt ${attempt}/${opts.maxRetries})`);
    return deps.source.fetchSeries(querySymbol, timeframe);
  }, {
    maxAttempts: opts.maxRetries,
    delayMs: opts.retryDelayMs,
    sleep: deps.sleep,
    signal: deps.signal,
    onRetry: (attempt, err) =>
      log.warn(`Fetch failed for ${querySymbol}, retrying (${attempt}/${opts.maxRetries})`, {
        error: errorMessage(err),
      }),
  });

  if (!fetched.ok) {
    const failure = { kind: symbolErrorKind(fetched.error), message: errorMessage(fetched.error) };
    log.error(`Giving up on ${querySymbol} after ${fetched.attempts} attempt(s)`, failure);
    return { ok: false, symbol: display, error: failure, attempts: fetched.attempts };
  }

  try {
    const result = computeBands(fetched.value, { period: opts.period, numStd: opts.numStd });
    return { ok: true, symbol: display, result, attempts: fetched.attempts };
  } catch (err) {
    const failure = { kind: symbolErrorKind(err), message: errorMessage(err) };
    log.warn(`${querySymbol}: ${failure.message}`);
    return { ok: false, symbol: display, error: failure, attempts: fetched.attempts };
  }
};

/**
 * Fetches and evaluates every symbol in order, one at a time, pausing
 * `delayMs` between requests. Per-symbol failures are recorded in the result.
 */
export const runBatches = async (
  symbols: readonly string[],
  timeframe: Timeframe,
  deps: BatchDeps,
  options: BatchOptions = {},
): Promise<BatchResult> => {
  const opts = resolveOptions(options);
  const log = deps.logger ?? defaultLog;
  const sleep = deps.sleep ?? defaultSleep;
  const { signal } = deps;

  const batches = partition(symbols, opts.batchSize);
  const outcomes: SymbolOutcome[] = [];

  try {
    for (const [index, batch] of batches.entries()) {
      log.info(`Batch ${index + 1}/${batches.length} (${batch.length} symbols, ${timeframe})`);

      for (const symbol of batch) {
        if (signal?.aborted) throw new RunCancelledError();
        if (outcomes.length > 0) await sleep(opts.delayMs, signal);

        log.info(`Processing ${timeframe} ${symbol} (${outcomes.length + 1}/${symbols.length})`);
        outcomes.push(await processSymbol(symbol, timeframe, { ...deps, sleep, logger: log }, opts));
      }
    }
  } catch (err) {
    if (signal?.aborted) throw new RunCancelledError();
    throw err;
  }

  return { timeframe, batches, outcomes };
};

export const summarizeBatch = (result: BatchResult): BatchSummary => {
  const failuresByKind: Partial<Record<SymbolErrorKind, number>> = {};
  let succeeded = 0;

  for (const outcome of result.outcomes) {
    if (outcome.ok) {
      succeeded++;
    } else {
      failuresByKind[outcome.error.kind] = (failuresByKind[outcome.error.kind] ?? 0) + 1;
    }
  }

  return {
    total: result.outcomes.length,
    succeeded,
    failed: result.outcomes.length - succeeded,
    failuresByKind,
  };
};
