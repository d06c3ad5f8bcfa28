import { google } from 'googleapis';
import { config, SHEETS } from '@/utils/config.ts';
import { createLogger } from '@/utils/logger.ts';
import { SymbolSourceError, errorMessage } from '@/utils/errors.ts';
import type { sheets_v4 } from 'googleapis';
import type { Cell } from '@/output/rows.ts';

const log = createLogger('sheets');

export type WorksheetInfo = {
  sheetId: number;
  title: string;
};

export type RowFormat = {
  background: { red: number; green: number; blue: number };
  bold: boolean;
  foreground: { red: number; green: number; blue: number };
};

/** The slice of the Sheets API the tracker needs, bound to one spreadsheet. */
export interface SpreadsheetGateway {
  listWorksheets(): Promise<WorksheetInfo[]>;
  getValues(range: string): Promise<string[][]>;
  addWorksheet(title: string, rowCount: number, columnCount: number): Promise<number>;
  deleteWorksheet(sheetId: number): Promise<void>;
  updateValues(range: string, values: Cell[][]): Promise<void>;
  formatRow(sheetId: number, rowIndex: number, columnCount: number, format: RowFormat): Promise<void>;
}

/** `'Sheet name'!A1` with embedded quotes doubled. */
export const a1Range = (title: string, cells: string): string =>
  `'${title.replace(/'/g, "''")}'!${cells}`;

export const createGoogleGateway = (
  sheets: sheets_v4.Sheets,
  spreadsheetId: string,
): SpreadsheetGateway => {
  const batchUpdate = async (requests: sheets_v4.Schema$Request[]) => {
    const res = await sheets.spreadsheets.batchUpdate({ spreadsheetId, requestBody: { requests } });
    return res.data.replies ?? [];
  };

  return {
    listWorksheets: async () => {
      const res = await sheets.spreadsheets.get({
        spreadsheetId,
        fields: 'sheets.properties(sheetId,title)',
      });
      const worksheets: WorksheetInfo[] = [];
      for (const sheet of res.data.sheets ?? []) {
        const sheetId = sheet.properties?.sheetId;
        const title = sheet.properties?.title;
        if (typeof sheetId === 'number' && typeof title === 'string') {
          worksheets.push({ sheetId, title });
        }
      }
      return worksheets;
    },

    getValues: async (range) => {
      const res = await sheets.spreadsheets.values.get({ spreadsheetId, range });
      const values: unknown[][] = res.data.values ?? [];
      return values.map((row) => row.map((cell) => (cell === null || cell === undefined ? '' : String(cell))));
    },

    addWorksheet: async (title, rowCount, columnCount) => {
      const replies = await batchUpdate([
        { addSheet: { properties: { title, gridProperties: { rowCount, columnCount } } } },
      ]);
      const sheetId = replies[0]?.addSheet?.properties?.sheetId;
      if (typeof sheetId !== 'number') {
        throw new Error(`addSheet for "${title}" returned no sheet id`);
      }
      return sheetId;
    },

    deleteWorksheet: async (sheetId) => {
      await batchUpdate([{ deleteSheet: { sheetId } }]);
    },

    updateValues: async (range, values) => {
      await sheets.spreadsheets.values.update({
        spreadsheetId,
        range,
        valueInputOption: 'RAW',
        requestBody: { values },
      });
    },

    formatRow: async (sheetId, rowIndex, columnCount, format) => {
      await batchUpdate([
        {
          repeatCell: {
            range: {
              sheetId,
              startRowIndex: rowIndex,
              endRowIndex: rowIndex + 1,
              startColumnIndex: 0,
              endColumnIndex: columnCount,
            },
            cell: {
              userEnteredFormat: {
                backgroundColor: format.background,
                textFormat: { foregroundColor: format.foreground, bold: format.bold },
              },
            },
            fields: 'userEnteredFormat(backgroundColor,textFormat)',
          },
        },
      ]);
    },
  };
};

const escapeDriveQuery = (value: string): string => value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");

/**
 * Authenticates with the service-account key and binds a gateway to the
 * configured spreadsheet, looking it up by name when no id is set.
 */
export const connectSpreadsheet = async (): Promise<SpreadsheetGateway> => {
  const auth = new google.auth.GoogleAuth({
    keyFile: config.google.credentialsFile,
    scopes: [...SHEETS.scopes],
  });
  const sheets = google.sheets({ version: 'v4', auth });

  let spreadsheetId = config.google.spreadsheetId;
  if (!spreadsheetId) {
    const name = config.google.spreadsheetName;
    try {
      const drive = google.drive({ version: 'v3', auth });
      const res = await drive.files.list({
        q: `name = '${escapeDriveQuery(name)}' and mimeType = 'application/vnd.google-apps.spreadsheet' and trashed = false`,
        fields: 'files(id,name)',
        pageSize: 1,
        supportsAllDrives: true,
        includeItemsFromAllDrives: true,
      });
      spreadsheetId = res.data.files?.[0]?.id ?? null;
    } catch (err) {
      throw new SymbolSourceError(`Could not look up spreadsheet "${name}": ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (!spreadsheetId) {
      throw new SymbolSourceError(
        `Spreadsheet "${name}" not found or not shared with the service account`,
      );
    }
  }

  log.info(`Connected to spreadsheet ${spreadsheetId}`);
  return createGoogleGateway(sheets, spreadsheetId);
};
