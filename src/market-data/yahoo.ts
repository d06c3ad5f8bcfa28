import { z } from 'zod';
import { MARKET } from '@/utils/config.ts';
import { createLogger } from '@/utils/logger.ts';
import { EmptyResultError, NetworkError, errorMessage } from '@/utils/errors.ts';
import type { Timeframe } from '@/utils/config.ts';
import type { MarketDataSource, PriceBar, PriceSeries } from '@/market-data/types.ts';

const log = createLogger('yahoo');

const DAY_MS = 24 * 60 * 60 * 1000;

const nullableNumbers = z.array(z.number().nullable());

const chartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z
              .array(
                z.object({
                  open: nullableNumbers.optional(),
                  high: nullableNumbers.optional(),
                  low: nullableNumbers.optional(),
                  close: nullableNumbers.optional(),
                  volume: nullableNumbers.optional(),
                }),
              )
              .min(1),
          }),
        }),
      )
      .nullable(),
    error: z.object({ code: z.string(), description: z.string() }).nullable().optional(),
  }),
});

export type ChartResponse = z.infer<typeof chartSchema>;

export type YahooSourceOptions = {
  fetchFn?: typeof fetch;
  now?: () => number;
  baseUrl?: string;
};

export const buildChartUrl = (
  symbol: string,
  timeframe: Timeframe,
  nowMs: number,
  baseUrl: string = MARKET.chartApiUrl,
): string => {
  const period2 = Math.floor(nowMs / 1000);
  const period1 = Math.floor((nowMs - MARKET.lookbackDays[timeframe] * DAY_MS) / 1000);
  const params = new URLSearchParams({
    period1: String(period1),
    period2: String(period2),
    interval: MARKET.interval[timeframe],
    includePrePost: 'false',
    events: 'div,splits',
  });
  return `${baseUrl}/${encodeURIComponent(symbol)}?${params.toString()}`;
};

export const toBars = (response: ChartResponse): PriceBar[] => {
  const result = response.chart.result?.[0];
  if (!result?.timestamp) return [];

  const quote = result.indicators.quote[0];
  const bars: PriceBar[] = [];

  result.timestamp.forEach((ts, i) => {
    const close = quote.close?.[i];
    if (close === null || close === undefined) return;
    bars.push({
      t: ts * 1000,
      o: quote.open?.[i] ?? close,
      h: quote.high?.[i] ?? close,
      l: quote.low?.[i] ?? close,
      c: close,
      v: quote.volume?.[i] ?? 0,
    });
  });

  return bars.sort((a, b) => a.t - b.t);
};

const readErrorBody = async (res: Response): Promise<string> => {
  const text = await res.text().catch(() => '');
  try {
    const parsed = chartSchema.safeParse(JSON.parse(text));
    if (parsed.success && parsed.data.chart.error) return parsed.data.chart.error.description;
  } catch {
    // non-JSON error page
    return text.slice(0, 200);
  }
  return text.slice(0, 200);
};

export const createYahooSource = (options: YahooSourceOptions = {}): MarketDataSource => {
  const fetchFn = options.fetchFn ?? fetch;
  const now = options.now ?? Date.now;
  const baseUrl = options.baseUrl ?? MARKET.chartApiUrl;

  const fetchSeries = async (symbol: string, timeframe: Timeframe): Promise<PriceSeries> => {
    const url = buildChartUrl(symbol, timeframe, now(), baseUrl);
    log.debug(`GET ${symbol} ${MARKET.interval[timeframe]}`);

    let res: Response;
    try {
      res = await fetchFn(url, { headers: { 'User-Agent': MARKET.userAgent } });
    } catch (err) {
      throw new NetworkError(`Request for ${symbol} failed: ${errorMessage(err)}`, null, {
        cause: err,
      });
    }

    if (!res.ok) {
      const detail = await readErrorBody(res);
      if (res.status === 429 || res.status >= 500) {
        throw new NetworkError(`Yahoo ${res.status} for ${symbol}: ${detail}`, res.status);
      }
      throw new EmptyResultError(`Yahoo ${res.status} for ${symbol}: ${detail}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new NetworkError(`Unreadable response for ${symbol}: ${errorMessage(err)}`, res.status, {
        cause: err,
      });
    }

    const parsed = chartSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmptyResultError(`Unexpected chart payload for ${symbol}`);
    }
    if (parsed.data.chart.error) {
      throw new EmptyResultError(`${symbol}: ${parsed.data.chart.error.description}`);
    }

    const bars = toBars(parsed.data);
    if (bars.length === 0) {
      throw new EmptyResultError(`No ${timeframe} data for ${symbol}`);
    }

    return { symbol, timeframe, bars };
  };

  return { fetchSeries };
};
