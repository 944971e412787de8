#!/usr/bin/env node
/**
 * bakeplan CLI
 *
 * Commands:
 * - bakeplan ingest <file>          Ingest a sales export (CSV)
 * - bakeplan batches                List ingested exports
 * - bakeplan forecast               Generate and record a forecast run
 * - bakeplan train [itemId]         Train per-item models
 * - bakeplan history                List recorded runs
 * - bakeplan show <runId>           Show one run
 * - bakeplan items                  List items and aliases
 * - bakeplan alias <alias> <id>     Map an alias to an item
 * - bakeplan deactivate <id>        Exclude an item from forecasts
 * - bakeplan signals:weather|signals:events <file>
 */

import { readFileSync, writeFileSync } from 'fs';
import { basename } from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { createDatabase } from '../db/index';
import { createPlanner, type Planner } from '../planner/index';
import { formatForPath, renderForecastTable, toForecastTable } from '../export/forecast-table';
import { PlannerError, errorMessage } from '../infra/errors';
import type { Delimiter } from '../import/types';
import type { ForecastRun, ItemModel } from '../types';
import { loadConfig } from '../utils/config';
import { WEEKDAYS, WEEKDAY_LABELS } from '../utils/dates';
import { logger } from '../utils/logger';

const program = new Command();

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

program
  .name('bakeplan')
  .description('Weekly bakery production forecasts from sales exports')
  .version('0.1.0');

// ============================================================================
// Helpers
// ============================================================================

function parseId(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('Expected a positive integer id.');
  return n;
}

function parseAlpha(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0 || n > 1) throw new InvalidArgumentError('Expected a number between 0 and 1.');
  return n;
}

function parseDelimiter(value: string): Delimiter {
  if (value === 'auto' || value === 'comma' || value === 'tab' || value === 'pipe') return value;
  throw new InvalidArgumentError('Expected one of: auto, comma, tab, pipe.');
}

function readInput(file: string): string {
  try {
    return readFileSync(file, 'utf-8');
  } catch (error) {
    throw new PlannerError('INVALID_INPUT', `Cannot read ${file}: ${errorMessage(error)}`);
  }
}

/**
 * Open the database, run `fn` with a planner, always close. Planner errors
 * print as one line and set a non-zero exit code.
 */
async function withPlanner(fn: (planner: Planner) => Promise<void> | void): Promise<void> {
  try {
    const db = await createDatabase();
    try {
      await fn(createPlanner({ db, config: loadConfig() }));
    } finally {
      db.close();
    }
  } catch (error) {
    if (error instanceof PlannerError) {
      console.error(`\n  \x1b[31m${error.name}\x1b[0m ${error.message}\n`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

function printRun(run: ForecastRun): void {
  const table = toForecastTable(run);
  const nameWidth = Math.max(9, ...table.rows.map((r) => r.item.length));

  console.log(`\n\x1b[1mRun #${run.runId}\x1b[0m  week of ${run.weekStartDate}  (${run.createdAt.toISOString()})`);
  console.log(`  α=${run.parameters.alpha}  model=${run.parameters.useModel ? 'on' : 'off'}\n`);
  console.log(
    '  ' +
      'Item'.padEnd(nameWidth) +
      WEEKDAYS.map((d) => WEEKDAY_LABELS[d].padStart(6)).join('') +
      'Total'.padStart(8) +
      '  Notes',
  );
  for (const row of table.rows) {
    console.log(
      '  ' +
        row.item.padEnd(nameWidth) +
        WEEKDAYS.map((d) => String(row[d]).padStart(6)).join('') +
        String(row.weeklyTotal).padStart(8) +
        `  ${row.note}`,
    );
  }

  if (run.alerts.length > 0) {
    console.log('\n  \x1b[33mAlerts:\x1b[0m');
    for (const row of table.rows.filter((r) => r.alerts)) {
      console.log(`  - ${row.item}: ${row.alerts}`);
    }
  }
  console.log('');
}

function describeModel(model: ItemModel): string {
  const cv = model.crossValError === null ? 'n/a' : `${model.crossValError.toFixed(1)}%`;
  return `item ${model.itemId} v${model.version}: n=${model.nTrainingSamples}, CV MAPE ${cv}${model.lowConfidence ? ' (low confidence)' : ''}`;
}

// ============================================================================
// ingest
// ============================================================================
program
  .command('ingest <file>')
  .description('Ingest a sales export (CSV; long or wide date-column layout)')
  .option('-d, --delimiter <kind>', 'Field separator: auto, comma, tab or pipe', parseDelimiter)
  .action(async (file: string, options: { delimiter?: Delimiter }) => {
    await withPlanner((planner) => {
      const result = planner.ingest({
        content: readInput(file),
        sourceName: basename(file),
        delimiter: options.delimiter,
      });

      console.log(`\n  Batch #${result.batchId}: ${result.accepted} record(s) accepted, ${result.rejectedRows.length} row(s) rejected`);
      if (result.dateRange) console.log(`  Dates: ${result.dateRange.from} → ${result.dateRange.to}`);
      if (result.duplicateOfBatch !== null) {
        console.log(`  \x1b[33mSame file as batch #${result.duplicateOfBatch}\x1b[0m (records replaced, not added)`);
      }
      for (const item of result.itemsCreated) console.log(`  + new item ${item.itemId}: ${item.canonicalName}`);
      for (const m of result.fuzzyMatches) {
        console.log(`  ~ "${m.rawName}" matched "${m.canonicalName}" (${m.score.toFixed(2)}); confirm with: bakeplan alias "${m.rawName}" ${m.itemId}`);
      }
      for (const r of result.rejectedRows) {
        console.log(`  ! row ${r.row}: ${r.reason}${r.value !== undefined ? ` (${r.value})` : ''}`);
      }
      console.log('');
    });
  });

program
  .command('batches')
  .description('List ingested exports, newest first')
  .action(async () => {
    await withPlanner((planner) => {
      const batches = planner.listBatches();
      if (batches.length === 0) {
        console.log('\n  Nothing ingested yet.\n');
        return;
      }
      console.log('');
      for (const b of batches) {
        const range = b.minDate && b.maxDate ? `${b.minDate} → ${b.maxDate}` : 'no dates';
        console.log(
          `  #${b.id}  ${b.committedAt.toISOString()}  ${b.sourceName ?? '(unnamed)'}  ${range}  ${b.accepted} accepted, ${b.rejected} rejected`,
        );
      }
      console.log('');
    });
  });

// ============================================================================
// forecast
// ============================================================================
program
  .command('forecast')
  .description('Generate and record a forecast for one week')
  .option('-w, --week <date>', 'Monday of the week (default: next Monday)')
  .option('-a, --alpha <n>', 'AI emphasis between 0 and 1', parseAlpha)
  .option('--no-model', 'Use the baseline only')
  .option('-f, --force', 'Forecast even if sales history is not up to date')
  .option('-o, --out <file>', 'Also write the table (.csv or .xml)')
  .action(async (options: { week?: string; alpha?: number; model: boolean; force?: boolean; out?: string }) => {
    const controller = new AbortController();
    const onSigint = () => controller.abort();
    process.once('SIGINT', onSigint);

    try {
      await withPlanner(async (planner) => {
        const run = await planner.forecast({
          weekStart: options.week,
          alpha: options.alpha,
          useModel: options.model,
          skipReadinessCheck: options.force,
          signal: controller.signal,
        });
        printRun(run);
        if (options.out) {
          writeFileSync(options.out, renderForecastTable(toForecastTable(run), formatForPath(options.out)));
          console.log(`  Wrote ${options.out}\n`);
        }
      });
    } finally {
      process.removeListener('SIGINT', onSigint);
    }
  });

// ============================================================================
// train
// ============================================================================
program
  .command('train [itemId]')
  .description('Train the per-item model for one item, or all active items')
  .action(async (itemId?: string) => {
    await withPlanner(async (planner) => {
      if (itemId) {
        const model = await planner.train(parseId(itemId));
        console.log(model ? `\n  ${describeModel(model)}\n` : '\n  Not enough history for a model yet.\n');
        return;
      }
      const trained = await planner.train('all');
      console.log(`\n  Trained ${trained.length} model(s)`);
      for (const model of trained) console.log(`  - ${describeModel(model)}`);
      console.log('');
    });
  });

// ============================================================================
// history / show
// ============================================================================
program
  .command('history')
  .description('List recorded forecast runs, newest first')
  .option('-w, --week <date>', 'Only runs for this week')
  .action(async (options: { week?: string }) => {
    await withPlanner((planner) => {
      const runs = planner.listRuns(options.week);
      if (runs.length === 0) {
        console.log('\n  No forecast runs recorded.\n');
        return;
      }
      console.log('');
      for (const run of runs) {
        console.log(
          `  #${run.runId}  ${run.weekStartDate}  ${run.createdAt.toISOString()}  ${run.itemCount} item(s), ${run.alertCount} alert(s)`,
        );
      }
      console.log('');
    });
  });

program
  .command('show [runId]')
  .description('Show a run (default: the most recent)')
  .action(async (runId?: string) => {
    await withPlanner((planner) => {
      const run = runId ? planner.getRun(parseId(runId)) : planner.latestRun();
      if (!run) {
        console.log('\n  No such run.\n');
        process.exitCode = 1;
        return;
      }
      printRun(run);
    });
  });

// ============================================================================
// items / alias / deactivate
// ============================================================================
program
  .command('items')
  .description('List items with their aliases')
  .action(async () => {
    await withPlanner((planner) => {
      console.log('');
      for (const item of planner.listItems()) {
        const aliases = item.aliases.length > 0 ? `  (aka ${item.aliases.join(', ')})` : '';
        console.log(`  ${String(item.itemId).padStart(4)}  ${item.canonicalName}${item.active ? '' : ' [inactive]'}${aliases}`);
      }
      console.log('');
    });
  });

program
  .command('alias <alias> <itemId>')
  .description('Map a raw name to an existing item')
  .action(async (alias: string, itemId: string) => {
    await withPlanner((planner) => {
      const item = planner.addAlias(alias, parseId(itemId));
      console.log(`\n  "${alias}" → ${item.canonicalName} (#${item.itemId})\n`);
    });
  });

program
  .command('deactivate <itemId>')
  .description('Stop forecasting an item (history is kept)')
  .option('--undo', 'Re-activate the item')
  .action(async (itemId: string, options: { undo?: boolean }) => {
    await withPlanner((planner) => {
      const item = planner.setItemActive(parseId(itemId), Boolean(options.undo));
      console.log(`\n  ${item.canonicalName} is now ${item.active ? 'active' : 'inactive'}\n`);
    });
  });

// ============================================================================
// signals
// ============================================================================
program
  .command('signals:weather <file>')
  .description('Import weather readings (date, max_temp, rain_mm)')
  .action(async (file: string) => {
    await withPlanner((planner) => {
      const result = planner.importWeather(readInput(file), basename(file));
      console.log(`\n  Imported ${result.imported} reading(s), rejected ${result.rejected.length}\n`);
    });
  });

program
  .command('signals:events <file>')
  .description('Import holidays/events (date, event_name, event_type, uplift_pct[, weight])')
  .action(async (file: string) => {
    await withPlanner((planner) => {
      const result = planner.importEvents(readInput(file));
      console.log(`\n  Imported ${result.imported} event(s), rejected ${result.rejected.length}\n`);
    });
  });

program.parseAsync().catch((error: unknown) => {
  logger.error({ err: error }, 'Command failed');
  process.exitCode = 1;
});
