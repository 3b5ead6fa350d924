/**
 * Season Features - Configuration
 */

import { z } from 'zod';

// ─── Rolling window ───

/** Trailing window size (matches before the current one) */
export const ROLLING_WINDOW = 5;

/** Minimum non-missing values in the window to emit a statistic */
export const ROLLING_MIN_PERIODS = 1;

export const ROLLING_STATS = [
  'form_last_5',
  'avg_goals_last_5',
  'avg_goals_conceded_last_5',
  'avg_xg_last_5',
  'avg_xg_conceded_last_5',
  'avg_poss_last_5',
  'avg_shots_last_5',
  'avg_shots_on_target_last_5',
] as const;

export const COMPARISON_FEATURES = [
  'form_difference',
  'goals_difference',
  'xg_difference',
  'poss_difference',
  'defensive_difference',
] as const;

// ─── Table layout ───

/** Fixture columns, in the order season files and feature tables carry them */
export const FIXTURE_COLUMNS = [
  'date', 'time', 'round', 'home_team', 'away_team', 'venue', 'result',
  'home_goals', 'away_goals', 'home_poss', 'away_poss', 'home_xg', 'away_xg',
  'home_sh', 'away_sh', 'home_shot_on_target', 'away_shot_on_target', 'season',
] as const;

/** Columns removed from the feature table before it is saved */
export const DEFAULT_DROP_COLUMNS = ['season', 'home_formation', 'away_formation'];

export const ENGINEERED_SUFFIX = '_engineered';

/**
 * Season label from the season end year.
 * e.g. 2021 -> "2020-2021"
 */
export function getSeasonLabel(endYear: number): string {
  return `${endYear - 1}-${endYear}`;
}

// ─── Script configuration ───

export const DEFAULT_PATHS = {
  rawMatches: 'data/01_raw/final_matches.csv',
  preprocessedDir: 'data/02_preprocessed',
  engineeredDir: 'data/03_feature_engineered',
} as const;

const preprocessSchema = z.object({
  input: z.string().min(1),
  outputDir: z.string().min(1),
  debug: z.boolean(),
});

const featuresSchema = z.object({
  inputDir: z.string().min(1),
  outputDir: z.string().min(1),
  debug: z.boolean(),
});

export type PreprocessConfig = z.infer<typeof preprocessSchema>;
export type FeaturesConfig = z.infer<typeof featuresSchema>;

type CliRaw = Record<string, string | boolean>;

export function buildPreprocessConfig(argv: string[]): PreprocessConfig {
  const args = parseCliArgs(argv);
  return preprocessSchema.parse({
    input: readString(args, 'input', DEFAULT_PATHS.rawMatches),
    outputDir: readString(args, 'output-dir', DEFAULT_PATHS.preprocessedDir),
    debug: readBool(args, 'debug', false),
  });
}

export function buildFeaturesConfig(argv: string[]): FeaturesConfig {
  const args = parseCliArgs(argv);
  return featuresSchema.parse({
    inputDir: readString(args, 'input-dir', DEFAULT_PATHS.preprocessedDir),
    outputDir: readString(args, 'output-dir', DEFAULT_PATHS.engineeredDir),
    debug: readBool(args, 'debug', false),
  });
}

function parseCliArgs(argv: string[]): CliRaw {
  const out: CliRaw = {};
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith('--')) {
      continue;
    }
    const eq = token.indexOf('=');
    if (eq > 2) {
      out[token.slice(2, eq)] = token.slice(eq + 1);
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      out[key] = next;
      i += 1;
    } else {
      out[key] = true;
    }
  }
  return out;
}

function readString(args: CliRaw, key: string, fallback: string): string | boolean {
  const value = args[key];
  return value === undefined ? fallback : value;
}

function readBool(args: CliRaw, key: string, fallback: boolean): boolean | string {
  const value = args[key];
  if (value === undefined) return fallback;
  if (typeof value === 'boolean') return value;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return value;
}
