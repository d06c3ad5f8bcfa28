import { logger } from '@/utils/logger.ts';
import { RunCancelledError, errorMessage } from '@/utils/errors.ts';
import { sleep as defaultSleep } from '@/utils/sleep.ts';
import { runUpdate } from '@/engine/tracker.ts';
import type { RunReport, TrackerDeps, TrackerOptions } from '@/engine/tracker.ts';

export const logReport = (report: RunReport): void => {
  const succeeded = report.sheets.reduce((n, s) => n + s.summary.succeeded, 0);
  const failed = report.sheets.reduce((n, s) => n + s.summary.failed, 0);
  const backups = report.sheets.flatMap((s) => (s.backupPath ? [s.backupPath] : []));

  logger.info(`Run finished: ${succeeded} symbols succeeded, ${failed} failed`, {
    sheets: report.sheets.length,
  });
  for (const path of backups) {
    logger.warn(`Sheet write failed, backup saved at ${path}`);
  }
};

/** A single pass. Fatal run errors reject. */
export const runOnce = async (deps: TrackerDeps, options: TrackerOptions = {}): Promise<RunReport> => {
  logger.info('--- Bollinger update ---');
  const report = await runUpdate(deps, options);
  logReport(report);
  return report;
};

/**
 * Repeats `runOnce` every `intervalMs` until the signal aborts. A failed
 * pass is logged and the next one still runs.
 */
export const startLoop = async (
  deps: TrackerDeps & { signal: AbortSignal },
  options: TrackerOptions,
  intervalMs: number,
): Promise<void> => {
  const sleep = deps.sleep ?? defaultSleep;
  logger.info(`Starting update loop (interval: ${intervalMs / 1000}s)`);

  while (!deps.signal.aborted) {
    try {
      await runOnce(deps, options);
    } catch (err) {
      if (err instanceof RunCancelledError) break;
      logger.error('Update failed', { error: errorMessage(err) });
    }

    try {
      await sleep(intervalMs, deps.signal);
    } catch (err) {
      if (deps.signal.aborted) break;
      throw err;
    }
  }

  logger.info('Update loop stopped');
};
