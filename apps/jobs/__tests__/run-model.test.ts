import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DefenseSource,
  Game,
  LEAGUE_AVERAGE_DEFENSE,
  LookupResult,
  OddsSource,
  PlayerStatProfile,
  PlayerStatsSource,
  PropLine,
  found,
  unavailable,
} from '../adapters/DataSourceAdapter';
import { teamAbbreviation } from '../config/team_abbreviations';
import { DEFAULT_RUN_SETTINGS, DEFAULT_SCORING_CONFIG } from '../src/config/scoring-config';
import { PipelinePaths, groupLines, runGrading, runPropModel } from '../src/pipeline/run-model';
import { loadPropsHistory } from '../src/props/props-history';
import { loadPerformanceDocument } from '../src/performance/performance';
import { emptyPickStore, loadPickStore, savePickStore } from '../src/tracking/pick-store';
import { makePick, makeStats } from './fixtures';

const game: Game = {
  id: 'evt-1',
  homeTeam: 'New York Knicks',
  awayTeam: 'Boston Celtics',
  startTimeUtc: '2026-10-21T23:30:00Z',
};

function line(playerName: string, side: 'Over' | 'Under', value: number, odds = -110): PropLine {
  return { gameId: game.id, playerName, category: 'points', line: value, side, oddsAmerican: odds, bookmaker: 'DraftKings' };
}

const LINES: PropLine[] = [
  line('Marcus Hale', 'Over', 26.5),
  line('Marcus Hale', 'Under', 26.5, -105),
  line('Nobody Special', 'Over', 10.5),
  line('Rookie Guard', 'Over', 8.5),
  line('Rookie Guard', 'Under', 8.5),
];

const PROFILES: Record<string, PlayerStatProfile> = {
  'Marcus Hale': makeStats({ seasonAvg: 28.5, last10Avg: 31.0, minutes: 34, gamesPlayed: 50, fgPct: 0.5, team: 'BOS' }),
  'Rookie Guard': makeStats({ seasonAvg: 15, last10Avg: 15, gamesPlayed: 2, team: 'BOS' }),
};

const odds: OddsSource = {
  listUpcomingGames: async () => [game],
  listPropsForGame: async () => LINES,
  getName: () => 'Fake Odds',
  isAvailable: async () => true,
};

const stats: PlayerStatsSource & DefenseSource = {
  getStatsProfile: async (playerName: string) => PROFILES[playerName] ?? null,
  getFinalStat: async (playerName: string, gameDate: string): Promise<LookupResult<number>> =>
    playerName === 'Marcus Hale' && gameDate === '2026-10-18' ? found(31) : unavailable(),
  getDefenseProfile: async () => ({ ...LEAGUE_AVERAGE_DEFENSE }),
};

const NOW = new Date('2026-10-19T15:00:00.000Z');
const RUN = { ...DEFAULT_RUN_SETTINGS, gradingDelayMs: 0 };

describe('runPropModel', () => {
  let dir: string;
  let paths: PipelinePaths;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'run-model-'));
    paths = {
      picksFile: path.join(dir, 'prop_tracking.json'),
      performanceFile: path.join(dir, 'performance.json'),
      historyFile: path.join(dir, 'props_history.json'),
      dashboardFile: path.join(dir, 'public', 'index.html'),
    };
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  function seedYesterdaysPick(): void {
    const store = emptyPickStore();
    store.picks.push(makePick({ playerName: 'Marcus Hale', line: 26.5, gameDate: '2026-10-18' }));
    savePickStore(paths.picksFile, store);
  }

  test('full run tracks, grades, aggregates and writes every output', async () => {
    seedYesterdaysPick();

    const summary = await runPropModel(
      { odds, stats, defense: stats },
      { scoring: DEFAULT_SCORING_CONFIG, run: RUN, paths, now: NOW }
    );

    expect(summary).toMatchObject({
      games: 1,
      props: 5,
      uniqueLines: 3,
      unresolvedPlayers: 1,
      analyzed: 2,
      valuePlays: 1,
      displayed: 2,
      tracked: 1,
      grade: { graded: 1, wins: 1, losses: 0, pushes: 0, skipped: 0, errors: 0 },
      backfilled: 0,
      persistenceErrors: [],
    });
    expect(summary.topPlays).toHaveLength(1);
    expect(summary.topPlays[0]).toMatchObject({
      playerName: 'Marcus Hale',
      side: 'Over',
      team: 'Boston Celtics',
      opponent: 'New York Knicks',
      gameDate: '2026-10-21',
      score: 10,
      prediction: 30,
      edge: 3.5,
      ev: 33.6,
      winProbability: 70,
      insights: ['Edge: +3.5', 'Model: 30.0'],
    });
    expect(summary.performance).toMatchObject({ wins: 1, losses: 0, units: 0.91, roi: 91, totalBets: 1 });

    const store = loadPickStore(paths.picksFile);
    expect(store.picks.map(p => [p.pickId, p.status, p.isTop6])).toEqual([
      ['marcus hale|points|26.5|Over|2026-10-18', 'win', false],
      ['marcus hale|points|26.5|Over|2026-10-21', 'pending', true],
    ]);

    expect(loadPerformanceDocument(paths.performanceFile).daily['2026-10-18']).toEqual({
      wins: 1,
      losses: 0,
      pushes: 0,
      units: 0.91,
      roi: 91,
    });

    const history = loadPropsHistory(paths.historyFile);
    expect(history.days['2026-10-19']).toMatchObject({ date: '2026-10-19', totalProps: 2, valuePlays: 1 });

    expect(fs.readFileSync(paths.dashboardFile, 'utf-8')).toContain('<div class="player">Marcus Hale</div>');
  });

  test('second run on the same day adds and grades nothing new', async () => {
    seedYesterdaysPick();
    const options = { scoring: DEFAULT_SCORING_CONFIG, run: RUN, paths, now: NOW };

    await runPropModel({ odds, stats, defense: stats }, options);
    const again = await runPropModel({ odds, stats, defense: stats }, options);

    expect(again.tracked).toBe(0);
    expect(again.grade?.graded).toBe(0);
    expect(again.performance.wins).toBe(1);
    expect(loadPickStore(paths.picksFile).picks).toHaveLength(2);
  });

  test('skipGrading leaves due picks pending', async () => {
    seedYesterdaysPick();

    const summary = await runPropModel(
      { odds, stats, defense: stats },
      { scoring: DEFAULT_SCORING_CONFIG, run: RUN, paths, now: NOW, skipGrading: true }
    );

    expect(summary.grade).toBeNull();
    expect(summary.performance.totalBets).toBe(0);
    expect(loadPickStore(paths.picksFile).picks[0].status).toBe('pending');
  });

  test('unreadable pick store is never overwritten and the run continues', async () => {
    fs.writeFileSync(paths.picksFile, '{ not json');

    const summary = await runPropModel(
      { odds, stats, defense: stats },
      { scoring: DEFAULT_SCORING_CONFIG, run: RUN, paths, now: NOW }
    );

    expect(summary.tracked).toBe(0);
    expect(summary.grade).toBeNull();
    expect(summary.persistenceErrors).toHaveLength(1);
    expect(summary.persistenceErrors[0]).toMatch(/^load pick store: Could not read JSON/);
    expect(fs.readFileSync(paths.picksFile, 'utf-8')).toBe('{ not json');
    expect(fs.existsSync(paths.dashboardFile)).toBe(true);
    expect(fs.existsSync(paths.historyFile)).toBe(true);
  });

  test('a failed dashboard write is reported and later steps still run', async () => {
    fs.writeFileSync(path.join(dir, 'public'), 'a file, not a directory');

    const summary = await runPropModel(
      { odds, stats, defense: stats },
      { scoring: DEFAULT_SCORING_CONFIG, run: RUN, paths, now: NOW }
    );

    expect(summary.persistenceErrors).toHaveLength(1);
    expect(summary.persistenceErrors[0]).toMatch(/^write dashboard: Could not write dashboard/);
    expect(fs.existsSync(paths.historyFile)).toBe(true);
    expect(loadPickStore(paths.picksFile).picks).toHaveLength(1);
  });

  test('a throwing stats or defense lookup drops one player, not the run', async () => {
    const flaky: PlayerStatsSource & DefenseSource = {
      ...stats,
      getStatsProfile: async (playerName: string) => {
        if (playerName === 'Nobody Special') throw new Error('timeout');
        return PROFILES[playerName] ?? null;
      },
      getDefenseProfile: async () => {
        throw new Error('defense feed down');
      },
    };

    const summary = await runPropModel(
      { odds, stats: flaky, defense: flaky },
      { scoring: DEFAULT_SCORING_CONFIG, run: RUN, paths, now: NOW }
    );

    expect(summary).toMatchObject({ unresolvedPlayers: 1, analyzed: 2, valuePlays: 1, tracked: 1 });
    // league-average defense leaves the score unchanged
    expect(summary.topPlays[0]).toMatchObject({ playerName: 'Marcus Hale', score: 10 });
    expect(loadPickStore(paths.picksFile).picks).toHaveLength(1);
    expect(console.warn).toHaveBeenCalledWith('[RUN_PROPS] Stats lookup failed for Nobody Special: timeout');
  });

  test('category filter is passed to the odds source', async () => {
    const listPropsForGame = jest.fn(async (): Promise<PropLine[]> => []);

    const summary = await runPropModel(
      { odds: { ...odds, listPropsForGame }, stats, defense: stats },
      { scoring: DEFAULT_SCORING_CONFIG, run: RUN, paths, now: NOW, categories: ['threes'] }
    );

    expect(listPropsForGame).toHaveBeenCalledWith(game, ['threes']);
    expect(summary.analyzed).toBe(0);
    expect(summary.topPlays).toEqual([]);
  });
});

describe('runGrading', () => {
  test('grades, backfills and rebuilds performance', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'run-grading-'));
    try {
      const picksFile = path.join(dir, 'prop_tracking.json');
      const performanceFile = path.join(dir, 'performance.json');
      const store = emptyPickStore();
      store.picks.push(
        makePick({ playerName: 'Marcus Hale', line: 26.5 }),
        makePick({ playerName: 'Theo Banks', status: 'loss', result: 'LOSS', actualStat: 3 })
      );
      savePickStore(picksFile, store);

      const result = await runGrading(stats, { paths: { picksFile, performanceFile }, now: NOW, delayMs: 0 });

      expect(result.grade.wins).toBe(1);
      expect(result.backfilled).toBe(1);
      // 91 − 100 = −9 cents over 2 bets
      expect(result.performance).toMatchObject({ wins: 1, losses: 1, units: -0.09, roi: -4.5 });
      expect(loadPerformanceDocument(performanceFile).totalBets).toBe(2);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('groupLines', () => {
  test('pairs sides per player, category, book and line', () => {
    const groups = groupLines([
      { game, line: line('Marcus Hale', 'Over', 26.5) },
      { game, line: line('Marcus Hale', 'Under', 26.5) },
      { game, line: line('Marcus Hale', 'Over', 26.5, -200) },
      { game, line: { ...line('Marcus Hale', 'Over', 26.5), bookmaker: 'FanDuel' } },
      { game, line: line('Marcus Hale', 'Over', 27.5) },
    ]);

    expect(groups).toHaveLength(3);
    expect(groups[0].over?.oddsAmerican).toBe(-110);
    expect(groups[0].under?.oddsAmerican).toBe(-110);
    expect(groups[2].under).toBeUndefined();
  });

  test('teamAbbreviation matches nicknames', () => {
    expect(teamAbbreviation('Portland Trail Blazers')).toBe('POR');
    expect(teamAbbreviation('Boston Celtics')).toBe('BOS');
    expect(teamAbbreviation('Seattle Supersonics')).toBe('SEA');
    expect(teamAbbreviation('')).toBe('');
  });
});
