import test from 'node:test';
import assert from 'node:assert/strict';
import { computeAllRollingStats, computeRollingStats, trailingMean } from '../ml/rolling.js';
import { buildTeamHistories } from '../ml/team-history.js';
import { ROLLING_STATS } from '../src/config.js';
import { fixture } from './helpers.js';
import type { Fixture } from '../src/types/index.js';

function seasonFor(team: string, results: string[], goals: number[] = []): Fixture[] {
  return results.map((result, i) => fixture({
    date: `2023-09-${String(i + 1).padStart(2, '0')}`,
    home_team: team,
    away_team: `Opponent ${i + 1}`,
    result,
    home_goals: String(goals[i] ?? 1),
  }));
}

test('trailingMean excludes the current index', () => {
  const values = [1, 2, 3];
  assert.equal(trailingMean(values, 0), null);
  assert.equal(trailingMean(values, 1), 1);
  assert.equal(trailingMean(values, 2), 1.5);
  assert.equal(trailingMean(values, 3), 2);
});

test('trailingMean looks back at most five entries', () => {
  const values = [1, 1, -1, 0, 1, -1, 5];
  assert.equal(trailingMean(values, 5), 0.4);
  assert.equal(trailingMean(values, 6), 0);
});

test('trailingMean skips missing values and needs minPeriods of them', () => {
  assert.equal(trailingMean([null, 2, null], 3), 2);
  assert.equal(trailingMean([null], 1), null);
  assert.equal(trailingMean([4, null, 2], 3, 5, 2), 3);
  assert.equal(trailingMean([4, null, null], 3, 5, 2), null);
});

test('first match of a team has no rolling statistics', () => {
  const histories = buildTeamHistories(seasonFor('Arsenal', ['W', 'L', 'D']));
  const rolling = computeAllRollingStats(histories);

  for (const [, records] of rolling) {
    for (const name of ROLLING_STATS) {
      assert.equal(records[0].stats[name], null, name);
    }
  }
});

test('form before the sixth match averages the five before it', () => {
  const histories = buildTeamHistories(seasonFor('Arsenal', ['W', 'W', 'L', 'D', 'W', 'L']));
  const records = computeRollingStats(histories.get('Arsenal') ?? []);

  assert.equal(records.length, 6);
  assert.equal(records[1].stats.form_last_5, 1);
  assert.equal(records[3].stats.form_last_5, 1 / 3);
  assert.equal(records[5].stats.form_last_5, 0.4);
});

test('rolling value at i is the mean of matches max(0, i-5)..i-1', () => {
  const goals = [3, 0, 2, 1, 4, 2, 5, 0];
  const histories = buildTeamHistories(seasonFor('Arsenal', goals.map(() => 'D'), goals));
  const records = computeRollingStats(histories.get('Arsenal') ?? []);

  for (let i = 1; i < goals.length; i++) {
    const window = goals.slice(Math.max(0, i - 5), i);
    const expected = window.reduce((a, b) => a + b, 0) / window.length;
    assert.equal(records[i].stats.avg_goals_last_5, expected, `match ${i}`);
  }
});

test('a match\'s own statistics never reach its rolling value', () => {
  const base = computeRollingStats(
    buildTeamHistories(seasonFor('Arsenal', ['W', 'D', 'L'], [1, 2, 3])).get('Arsenal') ?? [],
  );
  const changed = computeRollingStats(
    buildTeamHistories(seasonFor('Arsenal', ['W', 'D', 'W'], [1, 2, 9])).get('Arsenal') ?? [],
  );
  assert.deepEqual(changed[2].stats, base[2].stats);
});

test('away matches feed the team\'s own side of the statistics', () => {
  const fixtures = [
    fixture({ date: '2023-08-12', home_team: 'Chelsea', away_team: 'Arsenal', result: 'L', home_goals: '0', away_goals: '3', away_poss: '62' }),
    fixture({ date: '2023-08-19', home_team: 'Arsenal', away_team: 'Fulham' }),
  ];
  const arsenal = computeRollingStats(buildTeamHistories(fixtures).get('Arsenal') ?? []);

  assert.equal(arsenal[1].stats.form_last_5, 1);
  assert.equal(arsenal[1].stats.avg_goals_last_5, 3);
  assert.equal(arsenal[1].stats.avg_goals_conceded_last_5, 0);
  assert.equal(arsenal[1].stats.avg_xg_last_5, 0.9);
  assert.equal(arsenal[1].stats.avg_xg_conceded_last_5, 1.8);
  assert.equal(arsenal[1].stats.avg_poss_last_5, 62);
  assert.equal(arsenal[1].stats.avg_shots_last_5, 8);
  assert.equal(arsenal[1].stats.avg_shots_on_target_last_5, 3);
});
