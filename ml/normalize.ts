/**
 * Fixture Normalizer
 *
 * Turns season CSV rows (all text) into typed fixtures: outcome labels become
 * signed values from the home side, dates become calendar dates, numeric
 * columns become numbers. Nothing else is touched.
 */

import { InvalidFixtureRowError, MalformedDateError, UnrecognizedOutcomeError } from '../src/errors.js';
import { rawFixtureRowSchema } from '../src/schemas.js';
import type { CsvRow, Fixture, SignedOutcome } from '../src/types/index.js';

// Cells that stand for a missing value (compared trimmed, lower case)
const MISSING_TOKENS = new Set(['', 'n/a', 'na', 'nan', 'null']);

const OUTCOMES: Record<string, SignedOutcome> = {
  w: 1, win: 1,
  d: 0, draw: 0,
  l: -1, loss: -1,
};

/**
 * Map an outcome label to +1 / 0 / -1.
 * Accepts W/D/L and win/draw/loss in any case.
 */
export function parseOutcome(label: string, rowIndex?: number): SignedOutcome {
  const outcome = OUTCOMES[label.trim().toLowerCase()];
  if (outcome === undefined) {
    throw new UnrecognizedOutcomeError(label, rowIndex);
  }
  return outcome;
}

/**
 * Parse a calendar date (YYYY-MM-DD with an optional time part, or
 * DD/MM/YYYY, DD/MM/YY). Returns UTC midnight of that day.
 */
export function parseMatchDate(value: string, rowIndex?: number): Date {
  const text = value.trim();

  const iso = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T].*)?$/.exec(text);
  if (iso) {
    return calendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]), value, rowIndex);
  }

  const dmy = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/.exec(text);
  if (dmy) {
    let year = Number(dmy[3]);
    if (dmy[3].length === 2) {
      year += year > 50 ? 1900 : 2000;
    }
    return calendarDate(year, Number(dmy[2]), Number(dmy[1]), value, rowIndex);
  }

  throw new MalformedDateError(value, rowIndex);
}

/** YYYY-MM-DD of a calendar date */
export function formatMatchDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function normalizeFixture(row: CsvRow, rowIndex?: number): Fixture {
  const parsed = rawFixtureRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new InvalidFixtureRowError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      rowIndex,
    );
  }
  const r = parsed.data;

  return {
    date: parseMatchDate(r.date, rowIndex),
    time: r.time,
    round: r.round,
    homeTeam: r.home_team,
    awayTeam: r.away_team,
    venue: r.venue,
    result: parseOutcome(r.result, rowIndex),
    homeGoals: requiredNum(r.home_goals, 'home_goals', rowIndex),
    awayGoals: requiredNum(r.away_goals, 'away_goals', rowIndex),
    homePoss: optNum(r.home_poss, 'home_poss', rowIndex),
    awayPoss: optNum(r.away_poss, 'away_poss', rowIndex),
    homeXG: optNum(r.home_xg, 'home_xg', rowIndex),
    awayXG: optNum(r.away_xg, 'away_xg', rowIndex),
    homeShots: optNum(r.home_sh, 'home_sh', rowIndex),
    awayShots: optNum(r.away_sh, 'away_sh', rowIndex),
    homeShotsOnTarget: optNum(r.home_shot_on_target, 'home_shot_on_target', rowIndex),
    awayShotsOnTarget: optNum(r.away_shot_on_target, 'away_shot_on_target', rowIndex),
    season: r.season,
  };
}

export function normalizeFixtures(rows: readonly CsvRow[]): Fixture[] {
  return rows.map((row, i) => normalizeFixture(row, i));
}

// ─── Helpers ───

function calendarDate(year: number, month: number, day: number, raw: string, rowIndex?: number): Date {
  const d = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC rolls 2023-02-30 over into March
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    throw new MalformedDateError(raw, rowIndex);
  }
  return d;
}

/** Missing-value tokens become null; any other non-numeric text is an error */
function optNum(v: string, column: string, rowIndex?: number): number | null {
  if (MISSING_TOKENS.has(v.trim().toLowerCase())) return null;
  const n = Number(v);
  if (!Number.isFinite(n)) {
    throw notANumber(v, column, rowIndex);
  }
  return n;
}

function requiredNum(v: string, column: string, rowIndex?: number): number {
  const n = optNum(v, column, rowIndex);
  if (n === null) {
    throw notANumber(v, column, rowIndex);
  }
  return n;
}

function notANumber(v: string, column: string, rowIndex?: number): InvalidFixtureRowError {
  return new InvalidFixtureRowError([`${column}: expected a number, got "${v}"`], rowIndex);
}
