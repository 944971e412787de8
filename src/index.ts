/**
 * bakeplan - weekly bakery production forecasting
 */

export { createPlanner } from './planner/index';
export type { Planner, PlannerOptions, ForecastOptions, SignalImportResult } from './planner/index';

export { openDatabase, createDatabase } from './db/index';
export type { Database } from './db/index';
export type { WeatherFeed, HolidayFeed } from './db/signal-store';

export { loadConfig, resolveConfig } from './utils/config';
export type { PlannerConfig, PlannerConfigInput, ItemSettings, WeatherResponse } from './utils/config';

export { parseCsvTable } from './import/csv-parser';
export { normalizeExport } from './import/normalizer';
export type { IngestResult, TidyRow, NormalizeResult, RejectedRow, FuzzyMatch } from './import/types';
export type { RawExport } from './import/ingest';

export { estimateBaselines } from './forecast/baseline';
export { blendItem, roundToUnit } from './forecast/blender';
export type { ForecastRequest } from './forecast/engine';

export { toForecastTable, forecastTableToCsv, forecastTableToExcelXml } from './export/forecast-table';
export type { ForecastTable, ForecastTableRow } from './export/types';

export {
  PlannerError,
  SchemaError,
  ResolutionAmbiguityError,
  SignalUnavailableError,
  PersistenceFailure,
  HistoryNotReadyError,
  InvalidInputError,
  RunAbortedError,
} from './infra/errors';
export type { PlannerErrorCode } from './infra/errors';

export * from './types';
