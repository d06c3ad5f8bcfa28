import { SHEETS } from '@/utils/config.ts';
import { createLogger } from '@/utils/logger.ts';
import { SheetWriteError } from '@/utils/errors.ts';
import { a1Range } from '@/sheets/client.ts';
import type { SpreadsheetGateway } from '@/sheets/client.ts';
import type { Cell, SheetTable } from '@/output/rows.ts';

const log = createLogger('sheets');

const WHITE = { red: 1, green: 1, blue: 1 };

export interface SheetWriter {
  /** Drops the named worksheet if it exists and writes `table` into a fresh one. */
  replaceWorksheet(name: string, table: SheetTable): Promise<void>;
}

const pad = (n: number): string => String(n).padStart(2, '0');

/** `YYYY-MM-DD HH:mm:ss IST` for an instant, independent of the host zone. */
export const formatIstTimestamp = (date: Date): string => {
  const ist = new Date(date.getTime() + SHEETS.istOffsetMinutes * 60 * 1000);
  return (
    `${ist.getUTCFullYear()}-${pad(ist.getUTCMonth() + 1)}-${pad(ist.getUTCDate())} ` +
    `${pad(ist.getUTCHours())}:${pad(ist.getUTCMinutes())}:${pad(ist.getUTCSeconds())} IST`
  );
};

/** Title, last-updated line, blank spacer, header row, then data. */
export const buildSheetValues = (name: string, table: SheetTable, now: Date): Cell[][] => [
  [`📊 ${name}`],
  [`Last Updated: ${formatIstTimestamp(now)}`],
  [],
  table.headers,
  ...table.rows,
];

export const createSheetWriter = (
  gateway: SpreadsheetGateway,
  now: () => Date = () => new Date(),
): SheetWriter => ({
  replaceWorksheet: async (name, table) => {
    try {
      const existing = (await gateway.listWorksheets()).find((w) => w.title === name);
      if (existing) {
        await gateway.deleteWorksheet(existing.sheetId);
        log.info(`Deleted existing sheet: ${name}`);
      }

      const values = buildSheetValues(name, table, now());
      const sheetId = await gateway.addWorksheet(
        name,
        Math.max(SHEETS.newSheetRows, values.length),
        Math.max(SHEETS.newSheetCols, table.headers.length),
      );

      await gateway.updateValues(a1Range(name, 'A1'), values);
      await gateway.formatRow(sheetId, SHEETS.headerRowIndex, table.headers.length, {
        background: SHEETS.headerBackground,
        foreground: WHITE,
        bold: true,
      });
    } catch (err) {
      throw new SheetWriteError(name, { cause: err });
    }

    log.info(`Created and updated ${name} with ${table.rows.length} rows`);
  },
});
