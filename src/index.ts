#!/usr/bin/env tsx
import { parseCliArgs, USAGE } from '@/cli.ts';
import { runOnce, startLoop } from '@/engine/loop.ts';
import { createYahooSource } from '@/market-data/yahoo.ts';
import { connectSpreadsheet } from '@/sheets/client.ts';
import { createSheetSymbolSource } from '@/sheets/symbol-source.ts';
import { createSheetWriter } from '@/sheets/writer.ts';
import { logger } from '@/utils/logger.ts';
import { errorMessage } from '@/utils/errors.ts';
import config from '@/utils/config.ts';

const main = async () => {
  const cli = parseCliArgs(process.argv.slice(2), config.intervalMinutes);
  if (cli.help) {
    console.log(USAGE);
    return;
  }

  logger.info('Bollinger tracker starting up', {
    timeframes: cli.timeframes,
    categories: cli.categories,
    intervalMinutes: cli.intervalMinutes,
  });

  const controller = new AbortController();
  const stop = () => {
    logger.warn('Shutdown requested, stopping after the current symbol');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  const gateway = await connectSpreadsheet();
  const deps = {
    symbols: createSheetSymbolSource(gateway),
    source: createYahooSource(),
    writer: createSheetWriter(gateway),
    signal: controller.signal,
  };
  const options = { categories: cli.categories, timeframes: cli.timeframes };

  if (cli.intervalMinutes !== null) {
    await startLoop(deps, options, cli.intervalMinutes * 60 * 1000);
  } else {
    await runOnce(deps, options);
  }

  process.off('SIGINT', stop);
  process.off('SIGTERM', stop);
};

main().catch((err: unknown) => {
  logger.error('Fatal error', {
    error: errorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
