/**
 * Categorical Encoder
 *
 * One-hot indicators for team identity, one set for the home role and one for
 * the away role, over a vocabulary fixed before encoding.
 *
 * A team outside the vocabulary gets an all-zero set for that role and a
 * warning; encoding never fails on it.
 */

import { silentLogger } from '../src/logger.js';
import type { Logger } from '../src/logger.js';
import type { Encoded, TeamIdentity, TeamIndicators } from '../src/types/index.js';

export interface EncodeOptions {
  /** Known team names. Defaults to every team seen in the rows. */
  vocabulary?: readonly string[];
  logger?: Logger;
}

/** Sorted union of home and away team names */
export function buildTeamVocabulary(rows: readonly TeamIdentity[]): string[] {
  const teams = new Set<string>();
  for (const row of rows) {
    teams.add(row.homeTeam);
    teams.add(row.awayTeam);
  }
  return [...teams].sort();
}

export function indicatorColumns(vocabulary: readonly string[]): string[] {
  return [
    ...vocabulary.map(team => `home_${team}`),
    ...vocabulary.map(team => `away_${team}`),
  ];
}

export function encodeTeams<T extends TeamIdentity>(
  rows: readonly T[],
  options: EncodeOptions = {},
): Encoded<T>[] {
  const vocabulary = options.vocabulary ?? buildTeamVocabulary(rows);
  const logger = options.logger ?? silentLogger;
  const known = new Set(vocabulary);
  const unseen = new Set<string>();

  const encoded = rows.map(row => {
    const indicators: TeamIndicators = {};
    for (const team of vocabulary) {
      indicators[`home_${team}`] = row.homeTeam === team ? 1 : 0;
    }
    for (const team of vocabulary) {
      indicators[`away_${team}`] = row.awayTeam === team ? 1 : 0;
    }
    if (!known.has(row.homeTeam)) unseen.add(row.homeTeam);
    if (!known.has(row.awayTeam)) unseen.add(row.awayTeam);
    return { ...row, indicators };
  });

  for (const team of unseen) {
    logger.warn(`Team "${team}" is not in the encoding vocabulary; its indicators are all zero`);
  }

  return encoded;
}
