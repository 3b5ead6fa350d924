/**
 * Comparison features between the two sides of a fixture.
 * A missing operand gives a missing difference; nothing is imputed.
 */

import type { ComparisonFeatures, FixtureRollingFeatures } from '../src/types/index.js';

export function compareRolling(r: FixtureRollingFeatures): ComparisonFeatures {
  return {
    form_difference: diff(r.home_form_last_5, r.away_form_last_5),
    goals_difference: diff(r.home_avg_goals_last_5, r.away_avg_goals_last_5),
    xg_difference: diff(r.home_avg_xg_last_5, r.away_avg_xg_last_5),
    poss_difference: diff(r.home_avg_poss_last_5, r.away_avg_poss_last_5),
    // Positive = home side concedes less
    defensive_difference: diff(r.away_avg_goals_conceded_last_5, r.home_avg_goals_conceded_last_5),
  };
}

export function createComparisonFeatures<T extends { rolling: FixtureRollingFeatures }>(
  rows: readonly T[],
): (T & { comparison: ComparisonFeatures })[] {
  return rows.map(row => ({ ...row, comparison: compareRolling(row.rolling) }));
}

function diff(a: number | null, b: number | null): number | null {
  return a === null || b === null ? null : a - b;
}
