/**
 * Weather and holiday/event feeds backed by the local database.
 *
 * The forecast core only sees the read-side interfaces (`WeatherFeed`,
 * `HolidayFeed`); any other source can stand in for them.
 */

import type { Database, SqlRow } from './index';
import { rowNumber, rowOptionalNumber, rowOptionalString, rowString } from './index';
import type { AdjustmentSignal, SignalKind, WeatherReading } from '../types';

export interface WeatherFeed {
  get(date: string, location: string): Promise<WeatherReading | null>;
}

export interface HolidayFeed {
  get(date: string): Promise<AdjustmentSignal[]>;
}

export interface SignalStore {
  weather: WeatherFeed;
  holidays: HolidayFeed;
  upsertWeather(readings: WeatherReading[]): number;
  /** Insert or replace events by (date, name). */
  upsertEvents(signals: AdjustmentSignal[]): number;
}

function toKind(value: string): SignalKind {
  return value === 'weather' || value === 'event' ? value : 'holiday';
}

function toSignal(row: SqlRow): AdjustmentSignal {
  return {
    date: rowString(row, 'date'),
    kind: toKind(rowString(row, 'kind')),
    name: rowString(row, 'name'),
    multiplier: rowNumber(row, 'multiplier'),
    weight: rowNumber(row, 'weight'),
  };
}

export function createSignalStore(db: Database): SignalStore {
  return {
    weather: {
      async get(date, location) {
        const rows = db.query('SELECT * FROM weather WHERE date = ? AND location = ?', [date, location]);
        if (rows.length === 0) return null;
        const row = rows[0];
        return {
          date: rowString(row, 'date'),
          location: rowString(row, 'location'),
          maxTemp: rowOptionalNumber(row, 'max_temp'),
          precipitation: rowOptionalNumber(row, 'rain_mm'),
          source: rowOptionalString(row, 'source'),
          recordedAt: new Date(rowNumber(row, 'recorded_at')),
        };
      },
    },

    holidays: {
      async get(date) {
        return db.query('SELECT * FROM events WHERE date = ? ORDER BY id', [date]).map(toSignal);
      },
    },

    upsertWeather(readings) {
      db.transaction(() => {
        for (const r of readings) {
          db.run(
            `INSERT INTO weather (date, location, max_temp, rain_mm, source, recorded_at)
             VALUES (?, ?, ?, ?, ?, ?)
             ON CONFLICT(date, location) DO UPDATE SET
               max_temp = excluded.max_temp,
               rain_mm = excluded.rain_mm,
               source = excluded.source,
               recorded_at = excluded.recorded_at`,
            [r.date, r.location, r.maxTemp, r.precipitation, r.source, r.recordedAt.getTime()],
          );
        }
      });
      return readings.length;
    },

    upsertEvents(signals) {
      db.transaction(() => {
        for (const s of signals) {
          db.run('DELETE FROM events WHERE date = ? AND name = ?', [s.date, s.name]);
          db.run(
            'INSERT INTO events (date, name, kind, multiplier, weight) VALUES (?, ?, ?, ?, ?)',
            [s.date, s.name, s.kind, s.multiplier, s.weight],
          );
        }
      });
      return signals.length;
    },
  };
}
