/**
 * Shared domain records for the ingestion → forecast pipeline.
 */

import type { Weekday } from './utils/dates';

export type { Weekday } from './utils/dates';

// =============================================================================
// SALES
// =============================================================================

export interface CanonicalSaleRecord {
  /** ISO date (YYYY-MM-DD) */
  date: string;
  itemId: number;
  /** Signed; negative totals are net refunds */
  quantity: number;
  /** `<batch>:<row>,<row>` pointing back into the export */
  sourceRowRef: string;
}

export interface DateRange {
  /** inclusive */
  from: string;
  /** inclusive */
  to: string;
}

export interface IngestionBatch {
  id: number;
  contentHash: string;
  sourceName: string | null;
  accepted: number;
  rejected: number;
  minDate: string | null;
  maxDate: string | null;
  committedAt: Date;
}

// =============================================================================
// CATALOG
// =============================================================================

export interface Item {
  itemId: number;
  canonicalName: string;
  aliases: string[];
  active: boolean;
  createdAt: Date;
}

// =============================================================================
// SIGNALS
// =============================================================================

export interface WeatherReading {
  date: string;
  location: string;
  maxTemp: number | null;
  precipitation: number | null;
  source: string | null;
  recordedAt: Date;
}

export type SignalKind = 'weather' | 'holiday' | 'event';

export interface AdjustmentSignal {
  date: string;
  kind: SignalKind;
  name: string;
  multiplier: number;
  /** 0..1 confidence; a signal contributes 1 + (multiplier - 1) * weight */
  weight: number;
}

// =============================================================================
// MODELS
// =============================================================================

export interface RidgeParameters {
  intercept: number;
  coefficients: number[];
  featureMeans: number[];
  featureStds: number[];
  imputeMedians: number[];
  alpha: number;
}

export interface ItemModel {
  itemId: number;
  algorithmTag: 'ridge';
  version: number;
  parameters: RidgeParameters;
  featureSchema: string[];
  nTrainingSamples: number;
  /** Rolling-origin MAPE (%), null when no fold could be evaluated */
  crossValError: number | null;
  lowConfidence: boolean;
  trainedAt: Date;
}

// =============================================================================
// FORECAST RUNS
// =============================================================================

export type AlertReason = 'deviates from history' | 'no history' | 'model unavailable';

export interface ForecastAlert {
  itemId: number;
  /** null for item-level alerts */
  day: Weekday | null;
  reason: AlertReason;
  detail: string;
}

export interface ForecastDayDetail {
  weekday: Weekday;
  date: string;
  baseline: number;
  modelPrediction: number | null;
  /** α actually applied (0 when the model term was omitted) */
  alphaApplied: number;
  multiplier: number;
  /** After blend, adjustment and floor; before rounding */
  unrounded: number;
  quantity: number;
}

export interface ForecastLine {
  itemId: number;
  itemName: string;
  coldStart: boolean;
  modelVersion: number | null;
  quantities: Record<Weekday, number>;
  days: ForecastDayDetail[];
  weeklyTotal: number;
  note: string;
}

export interface ForecastRunParameters {
  alpha: number;
  useModel: boolean;
  config: Record<string, unknown>;
}

export interface ForecastRunDraft {
  weekStartDate: string;
  lines: ForecastLine[];
  alerts: ForecastAlert[];
  parameters: ForecastRunParameters;
}

export interface ForecastRun extends ForecastRunDraft {
  runId: number;
  createdAt: Date;
}

export interface ForecastRunSummary {
  runId: number;
  weekStartDate: string;
  createdAt: Date;
  itemCount: number;
  alertCount: number;
}
