import { SHEETS } from '@/utils/config.ts';
import { createLogger } from '@/utils/logger.ts';
import { SymbolSourceError, errorMessage } from '@/utils/errors.ts';
import { TtlCache } from '@/cache/ttl-cache.ts';
import { cleanSymbolList } from '@/market-data/symbol-map.ts';
import { a1Range } from '@/sheets/client.ts';
import type { Category } from '@/utils/config.ts';
import type { SpreadsheetGateway } from '@/sheets/client.ts';

const log = createLogger('symbols');

export interface SymbolSource {
  listSymbols(category: Category): Promise<string[]>;
}

/** Reads column A (below its header) of the worksheet named after each category. */
export const createSheetSymbolSource = (
  gateway: SpreadsheetGateway,
  cache: TtlCache<string[]> = new TtlCache<string[]>(SHEETS.symbolListTtlMs),
): SymbolSource => ({
  listSymbols: (category) =>
    cache.getOrLoad(category, async () => {
      let values: string[][];
      try {
        values = await gateway.getValues(a1Range(category, 'A2:A'));
      } catch (err) {
        throw new SymbolSourceError(`Could not read sheet ${category}: ${errorMessage(err)}`, {
          cause: err,
        });
      }

      const symbols = cleanSymbolList(values.map((row) => row[0] ?? ''));
      log.info(`Found ${symbols.length} stocks in ${category}`);
      return symbols;
    }),
});
