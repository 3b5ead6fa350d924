/**
 * Row schemas for the CSV inputs.
 * Every cell arrives as text; typing happens in the normalizer.
 */

import { z } from 'zod';

const cell = z.string();

/** One row per team per match, as in the raw match log */
export const rawMatchLogRowSchema = z.object({
  date: cell.min(1),
  time: cell,
  round: cell,
  team: cell.min(1),
  opponent: cell.min(1),
  venue: cell,
  gf: cell,
  ga: cell,
  result: cell,
  formation: cell.optional(),
  'opp formation': cell.optional(),
  poss: cell,
  xg: cell,
  xga: cell,
  sh: cell,
  sot: cell,
  dist: cell.optional(),
  season: cell,
});

/** One row per match, as stored in the season files */
export const rawFixtureRowSchema = z.object({
  date: cell,
  time: cell,
  round: cell,
  home_team: cell.min(1),
  away_team: cell.min(1),
  venue: cell,
  result: cell,
  home_goals: cell,
  away_goals: cell,
  home_poss: cell,
  away_poss: cell,
  home_xg: cell,
  away_xg: cell,
  home_sh: cell,
  away_sh: cell,
  home_shot_on_target: cell,
  away_shot_on_target: cell,
  season: cell,
});

/** Any parsed CSV record, keyed by header */
export const csvRecordsSchema = z.array(z.record(z.string()));
