/**
 * Configuration loading and management for bakeplan
 *
 * Loads config from ~/.bakeplan/.env and ~/.bakeplan/bakeplan.json.
 * Every tunable (alert thresholds, floors, decay, clamps) is a named
 * parameter here with a documented default, never a constant in code.
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { createLogger } from './logger';

const logger = createLogger('config');

// Load .env file from ~/.bakeplan/.env first, then CWD fallback
dotenvConfig({ path: join(homedir(), '.bakeplan', '.env') });
dotenvConfig(); // CWD fallback (won't override existing vars)

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env = process.env): string {
  const override = env.BAKEPLAN_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.bakeplan');
}

export function resolveConfigPath(env = process.env): string {
  const override = env.BAKEPLAN_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), 'bakeplan.json');
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const weatherResponseSchema = z.object({
  temp: z.number(),
  rain: z.number(),
});

const itemSettingsSchema = z.object({
  minBatch: z.number().min(0).optional(),
  roundingUnit: z.number().positive().optional(),
  weatherResponse: weatherResponseSchema.optional(),
});

const configSchema = z.object({
  location: z.string().min(1).default('default'),

  baseline: z
    .object({
      windowWeeks: z.number().int().positive().default(8),
      decay: z.number().gt(0).max(1).default(0.9),
      lookbackWeeks: z.number().int().positive().default(26),
    })
    .default({}),

  adjustments: z
    .object({
      minMultiplier: z.number().positive().default(0.5),
      maxMultiplier: z.number().positive().default(1.5),
      neutralTemp: z.number().default(20),
      neutralRain: z.number().default(1),
      defaultWeatherResponse: weatherResponseSchema.nullable().default(null),
      staleAfterDays: z.number().int().positive().default(10),
      defaultHolidayUpliftPct: z.number().gt(-100).default(15),
    })
    .default({})
    .refine((a) => a.minMultiplier <= a.maxMultiplier, {
      message: 'adjustments.minMultiplier must not exceed adjustments.maxMultiplier',
    }),

  models: z
    .object({
      minTrainingSamples: z.number().int().positive().default(20),
      ridgeAlpha: z.number().positive().default(1),
      cvErrorCeiling: z.number().positive().default(40),
      cvFractions: z.array(z.number().gt(0).lt(1)).min(1).default([0.6, 0.75, 0.9]),
      minFoldTrainRows: z.number().int().positive().default(10),
    })
    .default({}),

  blend: z
    .object({
      alpha: z.number().min(0).max(1).default(0.5),
    })
    .default({}),

  floors: z
    .object({
      defaultMinBatch: z.number().min(0).default(0),
    })
    .default({}),

  rounding: z
    .object({
      defaultUnit: z.number().positive().default(1),
    })
    .default({}),

  alerts: z
    .object({
      stdDevMultiple: z.number().positive().default(1.5),
      minInstances: z.number().int().min(2).default(2),
    })
    .default({}),

  readiness: z
    .object({
      graceDays: z.number().int().min(0).default(1),
    })
    .default({}),

  resolver: z
    .object({
      similarityThreshold: z.number().gt(0).max(1).default(0.75),
      rules: z
        .array(z.object({ pattern: z.string().min(1), canonical: z.string().min(1) }))
        .default([]),
    })
    .default({}),

  import: z
    .object({
      dayFirst: z.boolean().default(true),
      wideMinDateColumns: z.number().int().positive().default(5),
      refundVocabulary: z.array(z.string().min(1)).default(['refund', 'return']),
      headerSynonyms: z
        .object({
          date: z.array(z.string()).default([]),
          item: z.array(z.string()).default([]),
          quantity: z.array(z.string()).default([]),
          variation: z.array(z.string()).default([]),
          eventType: z.array(z.string()).default([]),
        })
        .default({}),
    })
    .default({}),

  items: z.record(z.string(), itemSettingsSchema).default({}),
});

export type PlannerConfig = z.infer<typeof configSchema>;
export type PlannerConfigInput = z.input<typeof configSchema>;
export type ItemSettings = z.infer<typeof itemSettingsSchema>;
export type WeatherResponse = z.infer<typeof weatherResponseSchema>;

/**
 * Validate a (partial) configuration object and fill in every default.
 */
export function resolveConfig(input: PlannerConfigInput = {}): PlannerConfig {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

/**
 * Load configuration from the JSON file (if any), with environment overrides.
 */
export function loadConfig(env = process.env): PlannerConfig {
  const configPath = resolveConfigPath(env);
  let fileConfig: unknown = {};

  if (existsSync(configPath)) {
    try {
      fileConfig = JSON.parse(readFileSync(configPath, 'utf-8'));
      logger.info({ path: configPath }, 'Loaded config file');
    } catch (error) {
      throw new Error(`Could not read config file ${configPath}: ${String(error)}`);
    }
  } else {
    logger.debug({ path: configPath }, 'No config file, using defaults');
  }

  const base = configSchema.safeParse(fileConfig);
  if (!base.success) {
    const issues = base.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration in ${configPath}: ${issues}`);
  }

  const config = base.data;
  if (env.BAKEPLAN_LOCATION?.trim()) {
    config.location = env.BAKEPLAN_LOCATION.trim();
  }
  if (env.BAKEPLAN_ALPHA?.trim()) {
    const alpha = Number(env.BAKEPLAN_ALPHA);
    if (Number.isFinite(alpha) && alpha >= 0 && alpha <= 1) {
      config.blend.alpha = alpha;
    } else {
      logger.warn({ value: env.BAKEPLAN_ALPHA }, 'Ignoring BAKEPLAN_ALPHA outside [0, 1]');
    }
  }
  return config;
}

/**
 * Per-item settings are keyed by canonical name, compared case-insensitively.
 */
export function itemSettingsFor(config: PlannerConfig, canonicalName: string): ItemSettings {
  const wanted = canonicalName.trim().toLowerCase();
  for (const [name, settings] of Object.entries(config.items)) {
    if (name.trim().toLowerCase() === wanted) return settings;
  }
  return {};
}
