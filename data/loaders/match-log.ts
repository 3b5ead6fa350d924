/**
 * Raw Match Log Loader
 *
 * Parses the scraped match log: one row per team per match, stats from that
 * team's side.
 *
 * Columns:
 *   date, time, round, team, opponent, venue, gf, ga, result, formation,
 *   opp formation, poss, xg, xga, sh, sot, dist, season
 *
 * Extra columns (e.g. an unnamed index) are dropped.
 */

import { readFile } from 'fs/promises';
import { InvalidFixtureRowError } from '../../src/errors.js';
import { rawMatchLogRowSchema } from '../../src/schemas.js';
import type { RawMatchLogRow } from '../../src/types/index.js';
import { parseCSVRecords } from './season-csv.js';

export function parseMatchLog(csvContent: string): RawMatchLogRow[] {
  return parseCSVRecords(csvContent).map((record, i) => {
    const parsed = rawMatchLogRowSchema.safeParse(record);
    if (!parsed.success) {
      throw new InvalidFixtureRowError(
        parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        i,
      );
    }
    return parsed.data;
  });
}

export async function loadMatchLog(filepath: string): Promise<RawMatchLogRow[]> {
  const content = await readFile(filepath, 'utf-8');
  return parseMatchLog(content);
}
