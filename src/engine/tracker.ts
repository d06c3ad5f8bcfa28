import { BANDS, CATEGORIES, TIMEFRAMES } from '@/utils/config.ts';
import { createLogger } from '@/utils/logger.ts';
import { DataSourceUnavailableError, SymbolSourceError, errorMessage } from '@/utils/errors.ts';
import { runBatches, summarizeBatch } from '@/engine/batch.ts';
import { assembleTable, formatWorksheetName } from '@/output/rows.ts';
import { writeBackup } from '@/output/backup.ts';
import type { Category, Timeframe } from '@/utils/config.ts';
import type { Sleep } from '@/utils/sleep.ts';
import type { BatchOptions, BatchSummary } from '@/engine/batch.ts';
import type { MarketDataSource } from '@/market-data/types.ts';
import type { SheetTable } from '@/output/rows.ts';
import type { SheetWriter } from '@/sheets/writer.ts';
import type { SymbolSource } from '@/sheets/symbol-source.ts';

const log = createLogger('tracker');

export type TrackerDeps = {
  symbols: SymbolSource;
  source: MarketDataSource;
  writer: SheetWriter;
  backup?: (sheetName: string, table: SheetTable) => Promise<string>;
  sleep?: Sleep;
  signal?: AbortSignal;
};

export type TrackerOptions = {
  categories?: readonly Category[];
  timeframes?: readonly Timeframe[];
  batch?: BatchOptions;
};

export type SheetReport = {
  sheetName: string;
  category: Category;
  timeframe: Timeframe;
  summary: BatchSummary;
  destination: 'sheet' | 'backup';
  backupPath: string | null;
};

export type RunReport = {
  startedAt: string;
  finishedAt: string;
  sheets: SheetReport[];
};

export const loadSymbolLists = async (
  source: SymbolSource,
  categories: readonly Category[],
): Promise<Map<Category, string[]>> => {
  const lists = new Map<Category, string[]>();
  const failures: string[] = [];

  for (const category of categories) {
    try {
      lists.set(category, await source.listSymbols(category));
    } catch (err) {
      log.warn(`Could not read symbols for ${category}`, { error: errorMessage(err) });
      failures.push(category);
    }
  }

  if (categories.length > 0 && failures.length === categories.length) {
    throw new SymbolSourceError(`No symbol list could be read (${failures.join(', ')})`);
  }
  return lists;
};

/**
 * Writes the table to its worksheet, or to a local CSV when the sheet write
 * fails. A failed backup propagates.
 */
export const publishTable = async (
  writer: SheetWriter,
  backup: (sheetName: string, table: SheetTable) => Promise<string>,
  sheetName: string,
  table: SheetTable,
): Promise<{ destination: 'sheet' | 'backup'; backupPath: string | null }> => {
  try {
    await writer.replaceWorksheet(sheetName, table);
    return { destination: 'sheet', backupPath: null };
  } catch (err) {
    log.error(`Error updating sheet ${sheetName}`, { error: errorMessage(err) });
    const backupPath = await backup(sheetName, table);
    log.warn(`Rows for ${sheetName} saved to ${backupPath}`);
    return { destination: 'backup', backupPath };
  }
};

const dataSourceUnreachable = (sheets: readonly SheetReport[]): boolean => {
  const total = sheets.reduce((n, s) => n + s.summary.total, 0);
  const network = sheets.reduce((n, s) => n + (s.summary.failuresByKind.network ?? 0), 0);
  return total > 0 && network === total;
};

/** One full pass: every timeframe, every category, one worksheet each. */
export const runUpdate = async (
  deps: TrackerDeps,
  options: TrackerOptions = {},
): Promise<RunReport> => {
  const startedAt = new Date().toISOString();
  const categories = options.categories ?? CATEGORIES;
  const timeframes = options.timeframes ?? TIMEFRAMES;
  const period = options.batch?.period ?? BANDS.period;
  const backup = deps.backup ?? ((name: string, table: SheetTable) => writeBackup(name, table));

  log.info(`Processing sheets: ${categories.join(', ')}`);
  const lists = await loadSymbolLists(deps.symbols, categories);

  const total = [...lists.values()].reduce((n, list) => n + list.length, 0);
  if (total === 0) {
    log.error(`No stocks found in any sheet! Expected symbols in: ${categories.join(', ')}`);
    return { startedAt, finishedAt: new Date().toISOString(), sheets: [] };
  }

  const sheets: SheetReport[] = [];

  for (const timeframe of timeframes) {
    log.info(`Starting ${timeframe} Bollinger Bands update`);

    for (const category of categories) {
      const symbols = lists.get(category) ?? [];
      if (symbols.length === 0) {
        log.warn(`No stocks found in ${category}, skipping`);
        continue;
      }

      const sheetName = formatWorksheetName(category, timeframe);
      log.info(`Processing ${category} with ${symbols.length} stocks -> ${sheetName}`);

      const result = await runBatches(
        symbols,
        timeframe,
        { source: deps.source, sleep: deps.sleep, signal: deps.signal },
        options.batch,
      );
      const summary = summarizeBatch(result);
      const published = await publishTable(deps.writer, backup, sheetName, assembleTable(result, period));

      log.info(`${sheetName}: ${summary.succeeded} succeeded, ${summary.failed} failed`, {
        ...summary.failuresByKind,
        ...(published.backupPath ? { backup: published.backupPath } : {}),
      });
      sheets.push({ sheetName, category, timeframe, summary, ...published });
    }
  }

  if (dataSourceUnreachable(sheets)) {
    throw new DataSourceUnavailableError('Every symbol failed with a network error');
  }

  log.info('All updates complete');
  return { startedAt, finishedAt: new Date().toISOString(), sheets };
};
