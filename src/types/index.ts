/**
 * Season Features - Core Types
 */

import type { z } from 'zod';
import type { ROLLING_STATS, COMPARISON_FEATURES } from '../config.js';
import type { rawFixtureRowSchema, rawMatchLogRowSchema } from '../schemas.js';

// ─── Raw CSV Rows (all cells are text) ───

/** One row per team per match (raw match log) */
export type RawMatchLogRow = z.infer<typeof rawMatchLogRowSchema>;

/** One row per match (season files) */
export type RawFixtureRow = z.infer<typeof rawFixtureRowSchema>;

/** A CSV record before validation */
export type CsvRow = Record<string, unknown>;

// ─── Normalized Fixture ───

/** +1 win, 0 draw, -1 loss */
export type SignedOutcome = 1 | 0 | -1;

export interface Fixture {
  date: Date;          // Calendar date at UTC midnight
  time: string;
  round: string;
  homeTeam: string;
  awayTeam: string;
  venue: string;
  result: SignedOutcome; // Home team's perspective
  homeGoals: number;
  awayGoals: number;
  homePoss: number | null;
  awayPoss: number | null;
  homeXG: number | null;
  awayXG: number | null;
  homeShots: number | null;
  awayShots: number | null;
  homeShotsOnTarget: number | null;
  awayShotsOnTarget: number | null;
  season: string;
}

// ─── Team History ───

export interface TeamMatchRecord {
  team: string;
  opponent: string;
  date: Date;
  isHome: boolean;
  fixtureIndex: number;  // Position of the source fixture in the input
  outcome: SignedOutcome; // Team's own perspective
  goals: number;
  goalsConceded: number;
  xg: number | null;
  xgConceded: number | null;
  poss: number | null;
  shots: number | null;
  shotsOnTarget: number | null;
}

export type RollingStatName = typeof ROLLING_STATS[number];

export type RollingStats = Record<RollingStatName, number | null>;

export interface RollingTeamRecord extends TeamMatchRecord {
  stats: RollingStats;
}

// ─── Fixture Features ───

export type Side = 'home' | 'away';

export type SideRollingStats<S extends Side> = {
  [K in RollingStatName as `${S}_${K}`]: number | null;
};

export type FixtureRollingFeatures = SideRollingStats<'home'> & SideRollingStats<'away'>;

export interface EnrichedFixture extends Fixture {
  rolling: FixtureRollingFeatures;
}

export type ComparisonFeatureName = typeof COMPARISON_FEATURES[number];

export type ComparisonFeatures = Record<ComparisonFeatureName, number | null>;

export interface ComparedFixture extends EnrichedFixture {
  comparison: ComparisonFeatures;
}

export interface TeamIdentity {
  homeTeam: string;
  awayTeam: string;
}

/** One-hot team columns, keyed `home_<team>` / `away_<team>` */
export type TeamIndicators = Record<string, 0 | 1>;

export type Encoded<T extends TeamIdentity> = T & { indicators: TeamIndicators };

export type FeatureFixture = Encoded<ComparedFixture>;

// ─── Feature Table ───

export type CellValue = string | number | null;

export type TableRecord = Record<string, CellValue>;

export interface FeatureTable {
  columns: string[];
  records: TableRecord[];
}

export interface TableSummary {
  rows: number;
  columns: number;
  missingValues: number;
}

// ─── Seasons ───

export interface SeasonSplit {
  label: string;       // e.g. "2020-2021"
  fixtures: RawFixtureRow[];
}
