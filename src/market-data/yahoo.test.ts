import { describe, expect, it, vi } from 'vitest';
import { buildChartUrl, createYahooSource } from '@/market-data/yahoo.ts';
import { toDisplaySymbol, toYahooSymbol, cleanSymbolList } from '@/market-data/symbol-map.ts';
import { EmptyResultError, NetworkError } from '@/utils/errors.ts';

const NOW = Date.UTC(2026, 9, 18, 10, 0, 0);

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const chart = (timestamps: number[], closes: Array<number | null>, volumes: Array<number | null>) => ({
  chart: {
    result: [
      {
        meta: { symbol: 'TCS.NS', currency: 'INR' },
        timestamp: timestamps,
        indicators: {
          quote: [
            {
              open: closes.map((c) => (c === null ? null : c - 1)),
              high: closes.map((c) => (c === null ? null : c + 2)),
              low: closes.map((c) => (c === null ? null : c - 2)),
              close: closes,
              volume: volumes,
            },
          ],
        },
      },
    ],
    error: null,
  },
});

const sourceWith = (response: Response | Error) => {
  const fetchFn = vi.fn<typeof fetch>(async () => {
    if (response instanceof Error) throw response;
    return response;
  });
  return { fetchFn, source: createYahooSource({ fetchFn, now: () => NOW }) };
};

describe('symbol-map', () => {
  it('normalizes and strips the exchange suffix', () => {
    expect(toYahooSymbol(' tcs ')).toBe('TCS.NS');
    expect(toYahooSymbol('TCS.NS')).toBe('TCS.NS');
    expect(toDisplaySymbol('TCS.NS')).toBe('TCS');
    expect(toDisplaySymbol('TCS')).toBe('TCS');
  });

  it('cleans raw symbol cells', () => {
    expect(cleanSymbolList([' reliance ', '', '  ', 'hdfcbank'])).toEqual(['RELIANCE', 'HDFCBANK']);
  });
});

describe('buildChartUrl', () => {
  it('covers the lookback window for the timeframe', () => {
    const period2 = NOW / 1000;
    expect(buildChartUrl('TCS.NS', 'daily', NOW)).toBe(
      'https://query1.finance.yahoo.com/v8/finance/chart/TCS.NS' +
        `?period1=${period2 - 400 * 86400}&period2=${period2}&interval=1d&includePrePost=false&events=div%2Csplits`,
    );
    expect(buildChartUrl('M&M.NS', 'hourly', NOW, 'http://localhost')).toBe(
      'http://localhost/M%26M.NS' +
        `?period1=${period2 - 60 * 86400}&period2=${period2}&interval=1h&includePrePost=false&events=div%2Csplits`,
    );
  });
});

describe('createYahooSource', () => {
  it('maps chart rows to ascending bars and drops rows without a close', async () => {
    const { source, fetchFn } = sourceWith(
      json(chart([1_700_000_200, 1_700_000_000, 1_700_000_100], [12, 10, null], [500, null, 700])),
    );

    const series = await source.fetchSeries('TCS.NS', 'daily');

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(series).toEqual({
      symbol: 'TCS.NS',
      timeframe: 'daily',
      bars: [
        { t: 1_700_000_000_000, o: 9, h: 12, l: 8, c: 10, v: 0 },
        { t: 1_700_000_200_000, o: 11, h: 14, l: 10, c: 12, v: 500 },
      ],
    });
  });

  it('treats a 404 as an empty result', async () => {
    const { source } = sourceWith(
      json({ chart: { result: null, error: { code: 'Not Found', description: 'No data found, symbol may be delisted' } } }, 404),
    );

    await expect(source.fetchSeries('NOPE.NS', 'daily')).rejects.toThrow(
      new EmptyResultError('Yahoo 404 for NOPE.NS: No data found, symbol may be delisted'),
    );
  });

  it.each([429, 500, 503])('treats HTTP %s as a network error', async (status) => {
    const { source } = sourceWith(new Response('busy', { status }));

    const error = await source.fetchSeries('TCS.NS', 'hourly').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ status, retryable: true });
  });

  it('wraps transport failures as network errors', async () => {
    const { source } = sourceWith(new TypeError('fetch failed'));

    await expect(source.fetchSeries('TCS.NS', 'daily')).rejects.toThrow(
      new NetworkError('Request for TCS.NS failed: fetch failed'),
    );
  });

  it('rejects a payload without bars', async () => {
    const { source } = sourceWith(json(chart([], [], [])));
    await expect(source.fetchSeries('TCS.NS', 'daily')).rejects.toBeInstanceOf(EmptyResultError);
  });

  it('rejects a malformed payload', async () => {
    const { source } = sourceWith(json({ unexpected: true }));
    await expect(source.fetchSeries('TCS.NS', 'daily')).rejects.toThrow(
      new EmptyResultError('Unexpected chart payload for TCS.NS'),
    );
  });
});
