/**
 * Rolling Form Calculator
 *
 * Trailing averages over a team's previous matches. The value for match i
 * is built from matches [i - window, i - 1]; match i itself never takes part,
 * so a team's first match has no statistics at all.
 */

import { ROLLING_MIN_PERIODS, ROLLING_STATS, ROLLING_WINDOW } from '../src/config.js';
import type { RollingStatName, RollingStats, RollingTeamRecord, TeamMatchRecord } from '../src/types/index.js';

const STAT_SOURCES: Record<RollingStatName, (r: TeamMatchRecord) => number | null> = {
  form_last_5: r => r.outcome,
  avg_goals_last_5: r => r.goals,
  avg_goals_conceded_last_5: r => r.goalsConceded,
  avg_xg_last_5: r => r.xg,
  avg_xg_conceded_last_5: r => r.xgConceded,
  avg_poss_last_5: r => r.poss,
  avg_shots_last_5: r => r.shots,
  avg_shots_on_target_last_5: r => r.shotsOnTarget,
};

export interface RollingOptions {
  window?: number;
  minPeriods?: number;
}

/**
 * Mean of the non-missing values in the `window` entries before `index`.
 * Null when fewer than `minPeriods` values are available.
 */
export function trailingMean(
  values: readonly (number | null)[],
  index: number,
  window: number = ROLLING_WINDOW,
  minPeriods: number = ROLLING_MIN_PERIODS,
): number | null {
  let sum = 0;
  let count = 0;
  for (let j = Math.max(0, index - window); j < index; j++) {
    const v = values[j];
    if (v !== null && v !== undefined) {
      sum += v;
      count++;
    }
  }
  return count >= minPeriods && count > 0 ? sum / count : null;
}

/**
 * Attach rolling statistics to every record of one team's history.
 * The records must already be ordered by date.
 */
export function computeRollingStats(
  records: readonly TeamMatchRecord[],
  options: RollingOptions = {},
): RollingTeamRecord[] {
  const window = options.window ?? ROLLING_WINDOW;
  const minPeriods = options.minPeriods ?? ROLLING_MIN_PERIODS;

  const series = new Map<RollingStatName, (number | null)[]>(
    ROLLING_STATS.map((name): [RollingStatName, (number | null)[]] => [name, records.map(STAT_SOURCES[name])]),
  );

  return records.map((record, i) => {
    const stats = emptyRollingStats();
    for (const name of ROLLING_STATS) {
      stats[name] = trailingMean(series.get(name) ?? [], i, window, minPeriods);
    }
    return { ...record, stats };
  });
}

export function emptyRollingStats(): RollingStats {
  return {
    form_last_5: null,
    avg_goals_last_5: null,
    avg_goals_conceded_last_5: null,
    avg_xg_last_5: null,
    avg_xg_conceded_last_5: null,
    avg_poss_last_5: null,
    avg_shots_last_5: null,
    avg_shots_on_target_last_5: null,
  };
}

/**
 * Rolling statistics for every team. Teams are independent of each other,
 * so each history is processed on its own.
 */
export function computeAllRollingStats(
  histories: ReadonlyMap<string, readonly TeamMatchRecord[]>,
  options: RollingOptions = {},
): Map<string, RollingTeamRecord[]> {
  const out = new Map<string, RollingTeamRecord[]>();
  for (const [team, records] of histories) {
    out.set(team, computeRollingStats(records, options));
  }
  return out;
}
