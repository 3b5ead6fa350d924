/**
 * Fixture Feature Joiner
 *
 * Keyed join from the team-centric view back to the fixture table: one index
 * from (team, date) to rolling statistics, then two lookups per fixture.
 */

import { AmbiguousMatchError } from '../src/errors.js';
import { formatMatchDate } from './normalize.js';
import { emptyRollingStats } from './rolling.js';
import type {
  EnrichedFixture,
  Fixture,
  RollingStats,
  RollingTeamRecord,
  SideRollingStats,
  TeamMatchRecord,
} from '../src/types/index.js';

/** team -> YYYY-MM-DD -> records of that team on that date */
export type RollingIndex = Map<string, Map<string, RollingTeamRecord[]>>;

export function buildRollingIndex(histories: Iterable<readonly RollingTeamRecord[]>): RollingIndex {
  const index: RollingIndex = new Map();
  for (const records of histories) {
    for (const record of records) {
      let byDate = index.get(record.team);
      if (!byDate) {
        byDate = new Map();
        index.set(record.team, byDate);
      }
      const dateKey = formatMatchDate(record.date);
      const arr = byDate.get(dateKey);
      if (arr) {
        arr.push(record);
      } else {
        byDate.set(dateKey, [record]);
      }
    }
  }
  return index;
}

/**
 * Rolling statistics of `team` going into its match on `date`.
 * All-null when the team has no record on that date. Several records are
 * accepted only when they describe the same match (a repeated fixture row);
 * the first one's statistics are used.
 */
export function lookupRollingStats(index: RollingIndex, team: string, date: Date): RollingStats {
  const dateKey = formatMatchDate(date);
  const records = index.get(team)?.get(dateKey);
  if (!records || records.length === 0) {
    return emptyRollingStats();
  }

  const [first, ...rest] = records;
  if (rest.some(r => !sameMatch(r, first))) {
    throw new AmbiguousMatchError(team, dateKey, records.length);
  }
  return { ...first.stats };
}

export function joinRollingFeatures(fixtures: readonly Fixture[], index: RollingIndex): EnrichedFixture[] {
  return fixtures.map(fixture => ({
    ...fixture,
    rolling: {
      ...homeStats(lookupRollingStats(index, fixture.homeTeam, fixture.date)),
      ...awayStats(lookupRollingStats(index, fixture.awayTeam, fixture.date)),
    },
  }));
}

// ─── Helpers ───

// Rolling stats of same-date records always differ (the later window holds
// the earlier match), so duplicates are judged on the match data itself.
function sameMatch(a: TeamMatchRecord, b: TeamMatchRecord): boolean {
  return a.opponent === b.opponent
    && a.isHome === b.isHome
    && a.outcome === b.outcome
    && a.goals === b.goals
    && a.goalsConceded === b.goalsConceded
    && a.xg === b.xg
    && a.xgConceded === b.xgConceded
    && a.poss === b.poss
    && a.shots === b.shots
    && a.shotsOnTarget === b.shotsOnTarget;
}

function homeStats(s: RollingStats): SideRollingStats<'home'> {
  return {
    home_form_last_5: s.form_last_5,
    home_avg_goals_last_5: s.avg_goals_last_5,
    home_avg_goals_conceded_last_5: s.avg_goals_conceded_last_5,
    home_avg_xg_last_5: s.avg_xg_last_5,
    home_avg_xg_conceded_last_5: s.avg_xg_conceded_last_5,
    home_avg_poss_last_5: s.avg_poss_last_5,
    home_avg_shots_last_5: s.avg_shots_last_5,
    home_avg_shots_on_target_last_5: s.avg_shots_on_target_last_5,
  };
}

function awayStats(s: RollingStats): SideRollingStats<'away'> {
  return {
    away_form_last_5: s.form_last_5,
    away_avg_goals_last_5: s.avg_goals_last_5,
    away_avg_goals_conceded_last_5: s.avg_goals_conceded_last_5,
    away_avg_xg_last_5: s.avg_xg_last_5,
    away_avg_xg_conceded_last_5: s.avg_xg_conceded_last_5,
    away_avg_poss_last_5: s.avg_poss_last_5,
    away_avg_shots_last_5: s.avg_shots_last_5,
    away_avg_shots_on_target_last_5: s.avg_shots_on_target_last_5,
  };
}
