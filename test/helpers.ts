import { normalizeFixture } from '../ml/normalize.js';
import type { Fixture, RawFixtureRow } from '../src/types/index.js';

export function fixtureRow(overrides: Partial<RawFixtureRow> = {}): RawFixtureRow {
  return {
    date: '2023-08-12',
    time: '15:00',
    round: 'Matchweek 1',
    home_team: 'Arsenal',
    away_team: 'Chelsea',
    venue: 'Home',
    result: 'W',
    home_goals: '2',
    away_goals: '1',
    home_poss: '55',
    away_poss: '45',
    home_xg: '1.8',
    away_xg: '0.9',
    home_sh: '14',
    away_sh: '8',
    home_shot_on_target: '6',
    away_shot_on_target: '3',
    season: '2024',
    ...overrides,
  };
}

export function fixture(overrides: Partial<RawFixtureRow> = {}): Fixture {
  return normalizeFixture(fixtureRow(overrides));
}
