import { parseArgs } from 'node:util';
import { z } from 'zod';
import { CATEGORIES, TIMEFRAMES } from '@/utils/config.ts';
import type { Category, Timeframe } from '@/utils/config.ts';

export const USAGE = `Usage: bollinger-tracker [options]

  --timeframe <daily|hourly|all>  Which bands to compute (default: all)
  --category <name>               Limit to a category; repeatable (${CATEGORIES.join(', ')})
  --interval <minutes>            Repeat the update on this interval until interrupted
  -h, --help                      Show this message`;

export type CliOptions = {
  timeframes: Timeframe[];
  categories: Category[];
  intervalMinutes: number | null;
  help: boolean;
};

const cliSchema = z.object({
  timeframe: z.enum(['daily', 'hourly', 'all']).default('all'),
  category: z.array(z.enum(CATEGORIES)).optional(),
  interval: z.coerce.number().positive().optional(),
  help: z.boolean().default(false),
});

export const parseCliArgs = (
  argv: readonly string[],
  defaultIntervalMinutes: number | null = null,
): CliOptions => {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      timeframe: { type: 'string', short: 't' },
      category: { type: 'string', short: 'c', multiple: true },
      interval: { type: 'string', short: 'i' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
  });

  const parsed = cliSchema.parse(values);

  return {
    timeframes: parsed.timeframe === 'all' ? [...TIMEFRAMES] : [parsed.timeframe],
    categories: parsed.category ? [...new Set(parsed.category)] : [...CATEGORIES],
    intervalMinutes: parsed.interval ?? defaultIntervalMinutes,
    help: parsed.help,
  };
};
