import test from 'node:test';
import assert from 'node:assert/strict';
import { buildTeamHistories, toTeamRecord } from '../ml/team-history.js';
import { fixture } from './helpers.js';

test('toTeamRecord keeps home-side values for the home team', () => {
  const f = fixture({ result: 'W' });
  const r = toTeamRecord(f, 0, true);

  assert.equal(r.team, 'Arsenal');
  assert.equal(r.opponent, 'Chelsea');
  assert.equal(r.isHome, true);
  assert.equal(r.outcome, 1);
  assert.equal(r.goals, 2);
  assert.equal(r.goalsConceded, 1);
  assert.equal(r.xg, 1.8);
  assert.equal(r.xgConceded, 0.9);
  assert.equal(r.poss, 55);
  assert.equal(r.shots, 14);
  assert.equal(r.shotsOnTarget, 6);
});

test('toTeamRecord flips the outcome and swaps sides for the away team', () => {
  const f = fixture({ result: 'W' });
  const r = toTeamRecord(f, 3, false);

  assert.equal(r.team, 'Chelsea');
  assert.equal(r.opponent, 'Arsenal');
  assert.equal(r.isHome, false);
  assert.equal(r.fixtureIndex, 3);
  assert.equal(r.outcome, -1);
  assert.equal(r.goals, 1);
  assert.equal(r.goalsConceded, 2);
  assert.equal(r.xg, 0.9);
  assert.equal(r.xgConceded, 1.8);
  assert.equal(r.poss, 45);
  assert.equal(r.shots, 8);
  assert.equal(r.shotsOnTarget, 3);

  assert.equal(toTeamRecord(fixture({ result: 'D' }), 0, false).outcome, 0);
  assert.equal(toTeamRecord(fixture({ result: 'L' }), 0, false).outcome, 1);
});

test('buildTeamHistories gives every team its home and away matches in date order', () => {
  const fixtures = [
    fixture({ date: '2023-08-26', home_team: 'Chelsea', away_team: 'Arsenal', result: 'W' }),
    fixture({ date: '2023-08-12', home_team: 'Arsenal', away_team: 'Chelsea', result: 'D' }),
    fixture({ date: '2023-08-19', home_team: 'Arsenal', away_team: 'Brentford', result: 'L' }),
  ];
  const histories = buildTeamHistories(fixtures);

  assert.deepEqual([...histories.keys()].sort(), ['Arsenal', 'Brentford', 'Chelsea']);

  const arsenal = histories.get('Arsenal') ?? [];
  assert.deepEqual(arsenal.map(r => r.fixtureIndex), [1, 2, 0]);
  assert.deepEqual(arsenal.map(r => r.isHome), [true, true, false]);
  assert.deepEqual(arsenal.map(r => r.outcome), [0, -1, -1]);

  // Brentford only ever plays away
  const brentford = histories.get('Brentford') ?? [];
  assert.equal(brentford.length, 1);
  assert.equal(brentford[0].outcome, 1);
});

test('home plus away record counts equal each team\'s fixture count', () => {
  const fixtures = [
    fixture({ date: '2023-08-12', home_team: 'Arsenal', away_team: 'Chelsea' }),
    fixture({ date: '2023-08-19', home_team: 'Brentford', away_team: 'Arsenal' }),
    fixture({ date: '2023-08-26', home_team: 'Chelsea', away_team: 'Brentford' }),
    fixture({ date: '2023-09-02', home_team: 'Arsenal', away_team: 'Brentford' }),
  ];
  const histories = buildTeamHistories(fixtures);

  for (const [team, records] of histories) {
    const homeCount = records.filter(r => r.isHome).length;
    const awayCount = records.filter(r => !r.isHome).length;
    const fixtureCount = fixtures.filter(f => f.homeTeam === team || f.awayTeam === team).length;
    assert.equal(homeCount + awayCount, fixtureCount, team);
  }
  assert.equal(histories.get('Arsenal')?.length, 3);
});

test('same-date records keep input order', () => {
  const fixtures = [
    fixture({ date: '2023-08-19', home_team: 'Arsenal', away_team: 'Chelsea' }),
    fixture({ date: '2023-08-12', home_team: 'Brentford', away_team: 'Arsenal' }),
    fixture({ date: '2023-08-12', home_team: 'Arsenal', away_team: 'Fulham' }),
  ];
  const arsenal = buildTeamHistories(fixtures).get('Arsenal') ?? [];
  assert.deepEqual(arsenal.map(r => r.fixtureIndex), [1, 2, 0]);
});
