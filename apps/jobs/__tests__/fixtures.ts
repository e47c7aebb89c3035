// Shared builders for the prop job tests

import { PlayerStatProfile } from '../adapters/DataSourceAdapter';
import { PropAnalysis } from '../src/props/types';
import { TrackedPick, pickIdentity } from '../src/tracking/pick-store';

export function makeStats(overrides: Partial<PlayerStatProfile> = {}): PlayerStatProfile {
  return {
    seasonAvg: 20,
    last10Avg: 20,
    minutes: 30,
    gamesPlayed: 10,
    fgPct: 0.4,
    fg3Pct: 0.3,
    ...overrides,
  };
}

export function makeProp(overrides: Partial<PropAnalysis> = {}): PropAnalysis {
  return {
    playerName: 'Test Player',
    team: 'Boston Celtics',
    opponent: 'New York Knicks',
    homeTeam: 'New York Knicks',
    awayTeam: 'Boston Celtics',
    gameTime: 'Wed, Oct 21 • 07:30 PM ET',
    gameDate: '2026-10-21',
    bookmaker: 'DraftKings',
    category: 'points',
    line: 20.5,
    odds: -110,
    side: 'Over',
    prediction: 22,
    edge: 1.5,
    score: 10,
    ev: 10,
    winProbability: 60,
    seasonAvg: 22,
    last10Avg: 22,
    gamesPlayed: 20,
    isValuePlay: true,
    insights: [],
    ...overrides,
  };
}

export function makePick(overrides: Partial<TrackedPick> = {}): TrackedPick {
  const base: TrackedPick = {
    pickId: '',
    playerName: 'Test Player',
    category: 'points',
    line: 20.5,
    side: 'Over',
    odds: -110,
    openingOdds: -110,
    isTop6: false,
    gameDate: '2026-10-18',
    startTime: 'Sun, Oct 18 • 07:30 PM ET',
    team: 'Boston Celtics',
    opponent: 'New York Knicks',
    bookmaker: 'DraftKings',
    score: 10,
    trackedAt: '2026-10-18T12:00:00.000Z',
    status: 'pending',
    result: null,
    actualStat: null,
    profitLoss: null,
    updatedAt: null,
    ...overrides,
  };
  return {
    ...base,
    pickId: base.pickId || pickIdentity(base.playerName, base.category, base.line, base.side, base.gameDate),
  };
}
