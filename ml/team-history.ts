/**
 * Team History Builder
 *
 * Re-expresses every fixture from both participants' points of view and
 * groups the records by team in one pass over the fixture list. A team that
 * only ever appears away still gets a history.
 */

import type { Fixture, SignedOutcome, TeamMatchRecord } from '../src/types/index.js';

/**
 * Project a fixture onto one of its teams.
 * Away records take the away-side values as the team's own and negate the outcome.
 */
export function toTeamRecord(fixture: Fixture, fixtureIndex: number, isHome: boolean): TeamMatchRecord {
  if (isHome) {
    return {
      team: fixture.homeTeam,
      opponent: fixture.awayTeam,
      date: fixture.date,
      isHome: true,
      fixtureIndex,
      outcome: fixture.result,
      goals: fixture.homeGoals,
      goalsConceded: fixture.awayGoals,
      xg: fixture.homeXG,
      xgConceded: fixture.awayXG,
      poss: fixture.homePoss,
      shots: fixture.homeShots,
      shotsOnTarget: fixture.homeShotsOnTarget,
    };
  }

  return {
    team: fixture.awayTeam,
    opponent: fixture.homeTeam,
    date: fixture.date,
    isHome: false,
    fixtureIndex,
    outcome: flipOutcome(fixture.result),
    goals: fixture.awayGoals,
    goalsConceded: fixture.homeGoals,
    xg: fixture.awayXG,
    xgConceded: fixture.homeXG,
    poss: fixture.awayPoss,
    shots: fixture.awayShots,
    shotsOnTarget: fixture.awayShotsOnTarget,
  };
}

/**
 * Build each team's match sequence, ordered by date ascending.
 *
 * The sort is stable: records sharing a date stay in the order their
 * fixtures appear in the input.
 */
export function buildTeamHistories(fixtures: readonly Fixture[]): Map<string, TeamMatchRecord[]> {
  const histories = new Map<string, TeamMatchRecord[]>();

  fixtures.forEach((fixture, i) => {
    for (const isHome of [true, false]) {
      const record = toTeamRecord(fixture, i, isHome);
      let arr = histories.get(record.team);
      if (!arr) {
        arr = [];
        histories.set(record.team, arr);
      }
      arr.push(record);
    }
  });

  for (const records of histories.values()) {
    records.sort((a, b) => a.date.getTime() - b.date.getTime());
  }

  return histories;
}

function flipOutcome(outcome: SignedOutcome): SignedOutcome {
  return outcome === 1 ? -1 : outcome === -1 ? 1 : 0;
}
