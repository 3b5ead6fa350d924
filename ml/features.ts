/**
 * Feature Engineering
 *
 * Builds the model-ready feature table for one season using ONLY past data
 * (no look-ahead bias). Every rolling feature of a fixture on date D comes
 * from the teams' matches before D.
 *
 * Stages:
 * 1. Normalize raw season rows
 * 2. Team histories (home + away merged, per team)
 * 3. Rolling form over the last 5 matches
 * 4. Join back onto fixtures as home_* / away_*
 * 5. Differentials (home - away)
 * 6. One-hot team encoding
 * 7. Flatten + drop non-model columns
 */

import { COMPARISON_FEATURES, DEFAULT_DROP_COLUMNS, FIXTURE_COLUMNS, ROLLING_STATS } from '../src/config.js';
import { ColumnCollisionError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import type { Logger } from '../src/logger.js';
import { createComparisonFeatures } from './comparison.js';
import { buildTeamVocabulary, encodeTeams, indicatorColumns } from './encoding.js';
import { buildRollingIndex, joinRollingFeatures } from './join.js';
import { formatMatchDate, normalizeFixtures } from './normalize.js';
import { computeAllRollingStats } from './rolling.js';
import { buildTeamHistories } from './team-history.js';
import type {
  FeatureFixture,
  FeatureTable,
  Fixture,
  CsvRow,
  TableRecord,
  TableSummary,
} from '../src/types/index.js';

export interface FeatureOptions {
  logger?: Logger;
  /** Team names to encode. Defaults to the teams of the season. */
  vocabulary?: readonly string[];
  /** Columns to remove from the final table */
  dropColumns?: readonly string[];
}

export interface SeasonResult {
  table: FeatureTable;
  summary: TableSummary;
}

/**
 * Run stages 2-6 on normalized fixtures.
 * The output keeps the input order, one row per fixture.
 */
export function buildFeatureFixtures(
  fixtures: readonly Fixture[],
  options: Pick<FeatureOptions, 'logger' | 'vocabulary'> = {},
): FeatureFixture[] {
  const logger = options.logger ?? silentLogger;

  logger.debug('Building team histories...');
  const histories = buildTeamHistories(fixtures);
  logger.debug(`Team histories: ${histories.size} teams`);

  logger.debug('Creating rolling features...');
  const rolling = computeAllRollingStats(histories);
  const index = buildRollingIndex(rolling.values());
  const enriched = joinRollingFeatures(fixtures, index);

  logger.debug('Creating comparison features...');
  const compared = createComparisonFeatures(enriched);

  logger.debug('Encoding teams...');
  return encodeTeams(compared, { vocabulary: options.vocabulary, logger });
}

/**
 * Ordered list of column names (for model input consistency)
 */
export function getFeatureNames(vocabulary: readonly string[]): string[] {
  return [
    ...FIXTURE_COLUMNS,
    ...ROLLING_STATS.map(name => `home_${name}`),
    ...ROLLING_STATS.map(name => `away_${name}`),
    ...indicatorColumns(vocabulary),
    ...COMPARISON_FEATURES,
  ];
}

/**
 * Team names whose indicator columns would overwrite a fixture, rolling or
 * comparison column (a team called "team" gives `home_team`).
 */
export function findColumnCollisions(vocabulary: readonly string[]): string[] {
  const reserved = new Set<string>([
    ...FIXTURE_COLUMNS,
    ...ROLLING_STATS.map(name => `home_${name}`),
    ...ROLLING_STATS.map(name => `away_${name}`),
    ...COMPARISON_FEATURES,
  ]);
  return indicatorColumns(vocabulary).filter(col => reserved.has(col));
}

/** Throws ColumnCollisionError when the vocabulary has colliding team names */
export function toFeatureTable(rows: readonly FeatureFixture[], vocabulary: readonly string[]): FeatureTable {
  const collisions = findColumnCollisions(vocabulary);
  if (collisions.length > 0) {
    throw new ColumnCollisionError(collisions);
  }

  const columns = getFeatureNames(vocabulary);
  const records = rows.map((row): TableRecord => ({
    date: formatMatchDate(row.date),
    time: row.time,
    round: row.round,
    home_team: row.homeTeam,
    away_team: row.awayTeam,
    venue: row.venue,
    result: row.result,
    home_goals: row.homeGoals,
    away_goals: row.awayGoals,
    home_poss: row.homePoss,
    away_poss: row.awayPoss,
    home_xg: row.homeXG,
    away_xg: row.awayXG,
    home_sh: row.homeShots,
    away_sh: row.awayShots,
    home_shot_on_target: row.homeShotsOnTarget,
    away_shot_on_target: row.awayShotsOnTarget,
    season: row.season,
    ...row.rolling,
    ...row.indicators,
    ...row.comparison,
  }));
  return { columns, records };
}

/**
 * Drop columns not meant for modelling. Columns that are not present are ignored.
 */
export function cleanTable(
  table: FeatureTable,
  dropColumns: readonly string[] = DEFAULT_DROP_COLUMNS,
): FeatureTable {
  const drop = new Set(dropColumns.filter(col => table.columns.includes(col)));
  if (drop.size === 0) return table;

  const columns = table.columns.filter(col => !drop.has(col));
  const records = table.records.map(record =>
    Object.fromEntries(columns.map(col => [col, record[col] ?? null])),
  );
  return { columns, records };
}

export function summarizeTable(table: FeatureTable): TableSummary {
  let missingValues = 0;
  for (const record of table.records) {
    for (const col of table.columns) {
      const v = record[col];
      if (v === null || v === undefined) missingValues++;
    }
  }
  return { rows: table.records.length, columns: table.columns.length, missingValues };
}

/**
 * Complete feature engineering pipeline for a single season
 */
export function processSeason(rows: readonly CsvRow[], options: FeatureOptions = {}): SeasonResult {
  const logger = options.logger ?? silentLogger;

  logger.debug('Loading and preparing data...');
  const fixtures = normalizeFixtures(rows);

  const vocabulary = options.vocabulary ?? buildTeamVocabulary(fixtures);
  const featureRows = buildFeatureFixtures(fixtures, { logger, vocabulary });

  logger.debug('Cleaning data...');
  const table = cleanTable(toFeatureTable(featureRows, vocabulary), options.dropColumns);
  const summary = summarizeTable(table);

  logger.info(`Feature engineering complete! Dataset shape: (${summary.rows}, ${summary.columns})`);
  return { table, summary };
}
