export type SymbolErrorKind = 'network' | 'insufficient-data' | 'empty-result' | 'unknown';

export type TrackerErrorKind =
  | Exclude<SymbolErrorKind, 'unknown'>
  | 'sheet-write'
  | 'backup-write'
  | 'symbol-source'
  | 'data-source-unavailable'
  | 'cancelled';

export abstract class TrackerError extends Error {
  abstract readonly kind: TrackerErrorKind;
  /** Whether a fetch that failed with this error may be attempted again. */
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transport failure, throttling or a 5xx from the market-data provider. */
export class NetworkError extends TrackerError {
  readonly kind = 'network';
  override readonly retryable = true;

  constructor(
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Provider answered but had no usable bars for the symbol. */
export class EmptyResultError extends TrackerError {
  readonly kind = 'empty-result';
  override readonly retryable = true;
}

export class InsufficientDataError extends TrackerError {
  readonly kind = 'insufficient-data';

  constructor(
    readonly available: number,
    readonly required: number,
  ) {
    super(`Insufficient data: got ${available} bars, need ${required}`);
  }
}

export class SheetWriteError extends TrackerError {
  readonly kind = 'sheet-write';

  constructor(
    readonly sheetName: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to write worksheet "${sheetName}": ${errorMessage(options?.cause)}`, options);
  }
}

export class BackupWriteError extends TrackerError {
  readonly kind = 'backup-write';
}

export class SymbolSourceError extends TrackerError {
  readonly kind = 'symbol-source';
}

export class DataSourceUnavailableError extends TrackerError {
  readonly kind = 'data-source-unavailable';
}

export class RunCancelledError extends TrackerError {
  readonly kind = 'cancelled';

  constructor() {
    super('Run cancelled');
  }
}

export const errorMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
};

export const symbolErrorKind = (err: unknown): SymbolErrorKind => {
  if (err instanceof NetworkError) return 'network';
  if (err instanceof EmptyResultError) return 'empty-result';
  if (err instanceof InsufficientDataError) return 'insufficient-data';
  return 'unknown';
};

export const isRetryable = (err: unknown): boolean =>
  err instanceof TrackerError && err.retryable;
