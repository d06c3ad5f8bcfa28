import { z } from 'zod';

const envSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  DATA_DIR: z.string().min(1).default('./data'),
  GOOGLE_CREDENTIALS_FILE: z.string().min(1).default('credentials.json'),
  SPREADSHEET_ID: z.string().optional(),
  SPREADSHEET_NAME: z.string().min(1).default('F&O New Addition'),
  TRACKER_INTERVAL_MINUTES: z.coerce.number().positive().optional(),
});

const env = envSchema.parse(process.env);

export const config = {
  logLevel: env.LOG_LEVEL,
  dataDir: env.DATA_DIR,
  google: {
    credentialsFile: env.GOOGLE_CREDENTIALS_FILE,
    spreadsheetId: env.SPREADSHEET_ID || null,
    spreadsheetName: env.SPREADSHEET_NAME,
  },
  intervalMinutes: env.TRACKER_INTERVAL_MINUTES ?? null,
} as const;

export const CATEGORIES = ['Nifty50', 'Smallcap100', 'Midcap100'] as const;
export type Category = (typeof CATEGORIES)[number];

export const TIMEFRAMES = ['daily', 'hourly'] as const;
export type Timeframe = (typeof TIMEFRAMES)[number];

export const BANDS = {
  period: 200,
  numStd: 2,
} as const;

export const BATCH = {
  batchSize: 20,
  delayMs: 500,
  maxRetries: 3,
  retryDelayMs: 2000,
} as const;

export const MARKET = {
  symbolSuffix: '.NS',
  chartApiUrl: 'https://query1.finance.yahoo.com/v8/finance/chart',
  lookbackDays: {
    daily: 400,
    // provider caps 1h bars at 60 days
    hourly: 60,
  } satisfies Record<Timeframe, number>,
  interval: {
    daily: '1d',
    hourly: '1h',
  } satisfies Record<Timeframe, string>,
  userAgent: 'Mozilla/5.0 (compatible; nse-bollinger-tracker/1.0)',
} as const;

export const SHEETS = {
  scopes: [
    'https://www.googleapis.com/auth/spreadsheets',
    'https://www.googleapis.com/auth/drive.readonly',
  ],
  newSheetRows: 1000,
  newSheetCols: 20,
  headerRowIndex: 3,
  headerBackground: { red: 0.26, green: 0.52, blue: 0.96 },
  symbolListTtlMs: 60 * 60 * 1000,
  istOffsetMinutes: 5 * 60 + 30,
} as const;

export default config;
