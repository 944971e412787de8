/**
 * Error taxonomy for ingestion, resolution and forecasting.
 *
 * Every error carries a stable `code` so the CLI and callers can branch
 * without string matching on messages.
 */

export type PlannerErrorCode =
  | 'SCHEMA'
  | 'RESOLUTION_AMBIGUITY'
  | 'SIGNAL_UNAVAILABLE'
  | 'PERSISTENCE'
  | 'HISTORY_NOT_READY'
  | 'INVALID_INPUT'
  | 'RUN_ABORTED';

export class PlannerError extends Error {
  readonly code: PlannerErrorCode;

  constructor(code: PlannerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlannerError';
    this.code = code;
  }
}

/**
 * The export's mandatory columns (date, item, quantity) could not be resolved.
 * Ingestion of the whole file is aborted.
 */
export class SchemaError extends PlannerError {
  readonly missing: string[];
  readonly headers: string[];

  constructor(message: string, missing: string[] = [], headers: string[] = []) {
    super('SCHEMA', message);
    this.name = 'SchemaError';
    this.missing = missing;
    this.headers = headers;
  }
}

/**
 * A raw item name matched two or more existing items equally well.
 */
export class ResolutionAmbiguityError extends PlannerError {
  readonly rawName: string;
  readonly candidates: Array<{ itemId: number; canonicalName: string }>;

  constructor(rawName: string, candidates: Array<{ itemId: number; canonicalName: string }>) {
    super(
      'RESOLUTION_AMBIGUITY',
      `"${rawName}" matches ${candidates.map((c) => `"${c.canonicalName}"`).join(' and ')} equally well`,
    );
    this.name = 'ResolutionAmbiguityError';
    this.rawName = rawName;
    this.candidates = candidates;
  }
}

/**
 * Weather or holiday data is missing, stale or its feed failed.
 * Never fatal: the Adjustment Engine falls back to a neutral multiplier.
 */
export class SignalUnavailableError extends PlannerError {
  readonly date: string;
  readonly feed: 'weather' | 'holiday';

  constructor(feed: 'weather' | 'holiday', date: string, reason: string, options?: { cause?: unknown }) {
    super('SIGNAL_UNAVAILABLE', `${feed} signal unavailable for ${date}: ${reason}`, options);
    this.name = 'SignalUnavailableError';
    this.feed = feed;
    this.date = date;
  }
}

/**
 * A store could not be read or written. The enclosing transaction is rolled back.
 */
export class PersistenceFailure extends PlannerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE', message, options);
    this.name = 'PersistenceFailure';
  }
}

/**
 * Canonical history has not been committed far enough to forecast the week.
 */
export class HistoryNotReadyError extends PlannerError {
  readonly requiredThrough: string;
  readonly latestCommitted: string | null;

  constructor(requiredThrough: string, latestCommitted: string | null) {
    super(
      'HISTORY_NOT_READY',
      latestCommitted
        ? `Sales history is committed through ${latestCommitted}; forecasting needs ${requiredThrough}`
        : `No sales history has been ingested; forecasting needs history through ${requiredThrough}`,
    );
    this.name = 'HistoryNotReadyError';
    this.requiredThrough = requiredThrough;
    this.latestCommitted = latestCommitted;
  }
}

export class InvalidInputError extends PlannerError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
    this.name = 'InvalidInputError';
  }
}

export class RunAbortedError extends PlannerError {
  constructor(weekStart: string) {
    super('RUN_ABORTED', `Forecast run for week ${weekStart} was aborted before it was recorded`);
    this.name = 'RunAbortedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
