import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { config } from '@/utils/config.ts';
import { createLogger } from '@/utils/logger.ts';
import { BackupWriteError, errorMessage } from '@/utils/errors.ts';
import type { Cell, Row, SheetTable } from '@/output/rows.ts';

const log = createLogger('backup');

const csvRecords = z.array(z.array(z.string()));

const NUMERIC_HEADERS = /^(Current Price|Upper Band|Lower Band|SMA\(\d+\))$/;
const NUMBER_TEXT = /^-?\d+(\.\d+)?(e[+-]?\d+)?$/i;

const pad = (n: number): string => String(n).padStart(2, '0');

/** `YYYYMMDD_HHMMSS` in local time. */
export const backupTimestamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

export const backupFileName = (sheetName: string, date: Date): string =>
  `${sheetName.replace(/\s+/g, '_')}_${backupTimestamp(date)}.csv`;

export const toCsv = (table: SheetTable): string => stringify([table.headers, ...table.rows]);

const parseCell = (raw: string, numeric: boolean): Cell =>
  numeric && NUMBER_TEXT.test(raw) ? Number(raw) : raw;

export const parseCsv = (text: string): SheetTable => {
  const records = csvRecords.parse(parse(text, { bom: true, relax_column_count: true }));
  const [headers = [], ...body] = records;
  const numeric = headers.map((h) => NUMERIC_HEADERS.test(h));

  const rows: Row[] = body.map((record) => record.map((raw, i) => parseCell(raw, numeric[i] ?? false)));
  return { headers, rows };
};

export type BackupOptions = {
  dir?: string;
  now?: Date;
};

export const writeBackup = async (
  sheetName: string,
  table: SheetTable,
  options: BackupOptions = {},
): Promise<string> => {
  const dir = options.dir ?? config.dataDir;
  const filePath = path.join(dir, backupFileName(sheetName, options.now ?? new Date()));

  try {
    await mkdir(dir, { recursive: true });
    await writeFile(filePath, toCsv(table), 'utf-8');
  } catch (err) {
    throw new BackupWriteError(`Could not write backup ${filePath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  log.info(`Saved backup to ${filePath}`, { rows: table.rows.length });
  return filePath;
};

export const readBackup = async (filePath: string): Promise<SheetTable> =>
  parseCsv(await readFile(filePath, 'utf-8'));
