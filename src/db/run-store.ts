/**
 * Forecast Run Recorder - append-only history of forecast runs.
 *
 * A run is written complete (header, lines, alerts) in one transaction or not
 * at all. There is no update or delete; the tables refuse both.
 */

import { z } from 'zod';
import type { Database, SqlRow } from './index';
import { rowNumber, rowOptionalNumber, rowOptionalString, rowString } from './index';
import type {
  AlertReason,
  ForecastAlert,
  ForecastLine,
  ForecastRun,
  ForecastRunDraft,
  ForecastRunParameters,
  ForecastRunSummary,
} from '../types';
import { WEEKDAYS, type Weekday } from '../utils/dates';
import { PersistenceFailure, errorMessage } from '../infra/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('run-store');

export interface RunStore {
  record(draft: ForecastRunDraft): ForecastRun;
  getRun(runId: number): ForecastRun | null;
  /** Runs for one week, newest first. */
  listRuns(weekStartDate: string): ForecastRunSummary[];
  /** All runs, newest first. */
  listAllRuns(limit?: number): ForecastRunSummary[];
  /** Most recent run for a week, or the most recent run overall. */
  latestRun(weekStartDate?: string): ForecastRun | null;
}

const weekdaySchema = z.enum(WEEKDAYS);

const dayDetailSchema = z.object({
  weekday: weekdaySchema,
  date: z.string(),
  baseline: z.number(),
  modelPrediction: z.number().nullable(),
  alphaApplied: z.number(),
  multiplier: z.number(),
  unrounded: z.number(),
  quantity: z.number(),
});

const parametersSchema = z.object({
  alpha: z.number(),
  useModel: z.boolean(),
  config: z.record(z.string(), z.unknown()),
});

function parseStored<T>(schema: z.ZodType<T>, text: string, what: string): T {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new PersistenceFailure(`Stored ${what} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new PersistenceFailure(`Stored ${what} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return parsed.data;
}

function toWeekday(value: string | null): Weekday | null {
  const parsed = weekdaySchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function toReason(value: string): AlertReason {
  return value === 'no history' || value === 'model unavailable' ? value : 'deviates from history';
}

function toLine(row: SqlRow): ForecastLine {
  return {
    itemId: rowNumber(row, 'item_id'),
    itemName: rowString(row, 'item_name'),
    coldStart: rowNumber(row, 'cold_start') === 1,
    modelVersion: rowOptionalNumber(row, 'model_version'),
    quantities: {
      mon: rowNumber(row, 'mon'),
      tue: rowNumber(row, 'tue'),
      wed: rowNumber(row, 'wed'),
      thu: rowNumber(row, 'thu'),
      fri: rowNumber(row, 'fri'),
      sat: rowNumber(row, 'sat'),
    },
    days: parseStored(z.array(dayDetailSchema), rowString(row, 'days'), 'run line'),
    weeklyTotal: rowNumber(row, 'weekly_total'),
    note: rowString(row, 'note'),
  };
}

function toAlert(row: SqlRow): ForecastAlert {
  return {
    itemId: rowNumber(row, 'item_id'),
    day: toWeekday(rowOptionalString(row, 'day')),
    reason: toReason(rowString(row, 'reason')),
    detail: rowString(row, 'detail'),
  };
}

export function createRunStore(db: Database): RunStore {
  function loadRun(row: SqlRow): ForecastRun {
    const runId = rowNumber(row, 'id');
    const parameters: ForecastRunParameters = parseStored(
      parametersSchema,
      rowString(row, 'parameters'),
      'run parameters',
    );
    return {
      runId,
      weekStartDate: rowString(row, 'week_start_date'),
      createdAt: new Date(rowNumber(row, 'created_at')),
      parameters,
      lines: db
        .query('SELECT * FROM forecast_run_lines WHERE run_id = ? ORDER BY position', [runId])
        .map(toLine),
      alerts: db
        .query('SELECT * FROM forecast_run_alerts WHERE run_id = ? ORDER BY id', [runId])
        .map(toAlert),
    };
  }

  const SUMMARY_SQL = `
    SELECT r.id, r.week_start_date, r.created_at,
      (SELECT COUNT(*) FROM forecast_run_lines l WHERE l.run_id = r.id) AS item_count,
      (SELECT COUNT(*) FROM forecast_run_alerts a WHERE a.run_id = r.id) AS alert_count
    FROM forecast_runs r`;

  function toSummary(row: SqlRow): ForecastRunSummary {
    return {
      runId: rowNumber(row, 'id'),
      weekStartDate: rowString(row, 'week_start_date'),
      createdAt: new Date(rowNumber(row, 'created_at')),
      itemCount: rowNumber(row, 'item_count'),
      alertCount: rowNumber(row, 'alert_count'),
    };
  }

  return {
    record(draft) {
      const createdAt = new Date();
      const runId = db.transaction(() => {
        db.run('INSERT INTO forecast_runs (week_start_date, created_at, parameters) VALUES (?, ?, ?)', [
          draft.weekStartDate,
          createdAt.getTime(),
          JSON.stringify(draft.parameters),
        ]);
        const id = db.lastInsertId();

        draft.lines.forEach((line, position) => {
          db.run(
            `INSERT INTO forecast_run_lines
               (run_id, position, item_id, item_name, mon, tue, wed, thu, fri, sat,
                weekly_total, cold_start, model_version, note, days)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
              id,
              position,
              line.itemId,
              line.itemName,
              ...WEEKDAYS.map((day) => line.quantities[day]),
              line.weeklyTotal,
              line.coldStart ? 1 : 0,
              line.modelVersion,
              line.note,
              JSON.stringify(line.days),
            ],
          );
        });

        for (const alert of draft.alerts) {
          db.run(
            'INSERT INTO forecast_run_alerts (run_id, item_id, day, reason, detail) VALUES (?, ?, ?, ?, ?)',
            [id, alert.itemId, alert.day, alert.reason, alert.detail],
          );
        }
        return id;
      });

      logger.info(
        { runId, week: draft.weekStartDate, items: draft.lines.length, alerts: draft.alerts.length },
        'Forecast run recorded',
      );
      return { ...draft, runId, createdAt };
    },

    getRun(runId) {
      const rows = db.query('SELECT * FROM forecast_runs WHERE id = ?', [runId]);
      return rows.length > 0 ? loadRun(rows[0]) : null;
    },

    listRuns(weekStartDate) {
      return db
        .query(`${SUMMARY_SQL} WHERE r.week_start_date = ? ORDER BY r.id DESC`, [weekStartDate])
        .map(toSummary);
    },

    listAllRuns(limit = 50) {
      return db.query(`${SUMMARY_SQL} ORDER BY r.id DESC LIMIT ?`, [limit]).map(toSummary);
    },

    latestRun(weekStartDate) {
      const rows = weekStartDate
        ? db.query('SELECT * FROM forecast_runs WHERE week_start_date = ? ORDER BY id DESC LIMIT 1', [
            weekStartDate,
          ])
        : db.query('SELECT * FROM forecast_runs ORDER BY id DESC LIMIT 1');
      return rows.length > 0 ? loadRun(rows[0]) : null;
    },
  };
}
