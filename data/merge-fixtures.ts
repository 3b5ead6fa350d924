/**
 * Merge Team Rows into Fixtures
 *
 * The raw match log carries every match twice, once from each team's side.
 * This folds the pair into a single home/away fixture row and splits the
 * result by season.
 */

import { getSeasonLabel } from '../src/config.js';
import { TeamNameMismatchError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import type { Logger } from '../src/logger.js';
import type { RawFixtureRow, RawMatchLogRow, SeasonSplit } from '../src/types/index.js';

/**
 * Rewrite `team` values to the spelling used in the `opponent` column.
 *
 * The two columns come from different sources and spell some clubs
 * differently; sorted, the distinct names line up one-to-one.
 */
export function standardizeTeamNames(rows: readonly RawMatchLogRow[]): RawMatchLogRow[] {
  const teams = [...new Set(rows.map(r => r.team))].sort();
  const opponents = [...new Set(rows.map(r => r.opponent))].sort();
  if (teams.length !== opponents.length) {
    throw new TeamNameMismatchError(teams.length, opponents.length);
  }

  const names = new Map(teams.map((team, i): [string, string] => [team, opponents[i]]));
  return rows.map(r => ({ ...r, team: names.get(r.team) ?? r.team }));
}

/**
 * Join each home row with the away row of the same match.
 * Matches without an away row are dropped.
 */
export function mergeHomeAway(rows: readonly RawMatchLogRow[]): RawFixtureRow[] {
  const home = sortByKickoff(rows.filter(r => r.venue === 'Home'));
  const away = sortByKickoff(rows.filter(r => r.venue === 'Away'));

  // Away rows keyed by (date, home team, away team)
  const awayMap = new Map<string, RawMatchLogRow>();
  for (const r of away) {
    const key = fixtureKey(r.date, r.opponent, r.team);
    if (!awayMap.has(key)) awayMap.set(key, r);
  }

  const fixtures: RawFixtureRow[] = [];
  for (const h of home) {
    const a = awayMap.get(fixtureKey(h.date, h.team, h.opponent));
    if (!a) continue;

    fixtures.push({
      date: h.date,
      time: h.time,
      round: h.round,
      home_team: h.team,
      away_team: h.opponent,
      venue: h.venue,
      result: h.result,
      home_goals: h.gf,
      away_goals: h.ga,
      home_poss: h.poss,
      away_poss: a.poss,
      home_xg: h.xg,
      away_xg: h.xga,
      home_sh: h.sh,
      away_sh: a.sh,
      home_shot_on_target: h.sot,
      away_shot_on_target: a.sot,
      season: h.season,
    });
  }
  return fixtures;
}

/**
 * Group fixtures by season, labelled "<start>-<end>" from the season end year.
 */
export function splitBySeason(fixtures: readonly RawFixtureRow[]): SeasonSplit[] {
  const bySeason = new Map<string, RawFixtureRow[]>();
  for (const f of fixtures) {
    const arr = bySeason.get(f.season) || [];
    arr.push(f);
    bySeason.set(f.season, arr);
  }

  return [...bySeason.entries()]
    .map(([season, seasonFixtures]) => ({ label: seasonLabel(season), fixtures: seasonFixtures }))
    .sort((a, b) => (a.label < b.label ? -1 : a.label > b.label ? 1 : 0));
}

/**
 * Match log -> fixtures per season.
 */
export function preprocessMatchLog(
  rows: readonly RawMatchLogRow[],
  logger: Logger = silentLogger,
): SeasonSplit[] {
  const standardized = standardizeTeamNames(rows);
  const fixtures = mergeHomeAway(standardized);
  const homeRows = standardized.filter(r => r.venue === 'Home').length;

  logger.info(`Merge: ${rows.length} team rows -> ${fixtures.length} fixtures`);
  if (fixtures.length < homeRows) {
    logger.warn(`  Home rows without an away row: ${homeRows - fixtures.length}`);
  }

  const seasons = splitBySeason(fixtures);
  for (const s of seasons) {
    logger.debug(`  ${s.label}: ${s.fixtures.length} fixtures`);
  }
  return seasons;
}

// ─── Helpers ───

function fixtureKey(date: string, homeTeam: string, awayTeam: string): string {
  return JSON.stringify([date, homeTeam, awayTeam]);
}

function sortByKickoff(rows: RawMatchLogRow[]): RawMatchLogRow[] {
  return rows.sort((a, b) => {
    if (a.date !== b.date) return a.date < b.date ? -1 : 1;
    if (a.time !== b.time) return a.time < b.time ? -1 : 1;
    return 0;
  });
}

function seasonLabel(season: string): string {
  const year = Number(season);
  return Number.isInteger(year) && season.trim() !== '' ? getSeasonLabel(year) : season;
}
