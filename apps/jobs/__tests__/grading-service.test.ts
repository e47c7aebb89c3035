import { LookupResult, PlayerStatsSource, found, lookupError, unavailable } from '../adapters/DataSourceAdapter';
import {
  backfillProfitLoss,
  gradeOutcome,
  gradePendingPicks,
  profitLossCents,
} from '../src/grading/grading-service';
import { PickStore, emptyPickStore } from '../src/tracking/pick-store';
import { makePick } from './fixtures';

const options = {
  today: '2026-10-19',
  now: new Date('2026-10-19T15:00:00.000Z'),
  delayMs: 0,
};

/**
 * In-memory stats source keyed by player name
 */
function fakeStats(results: Record<string, LookupResult<number> | Error>) {
  const getFinalStat = jest.fn(async (playerName: string): Promise<LookupResult<number>> => {
    const result = results[playerName];
    if (result === undefined) return unavailable();
    if (result instanceof Error) throw result;
    return result;
  });
  const source: PlayerStatsSource = {
    getStatsProfile: async () => null,
    getFinalStat,
  };
  return { source, getFinalStat };
}

function storeOf(...picks: ReturnType<typeof makePick>[]): PickStore {
  const store = emptyPickStore();
  store.picks.push(...picks);
  return store;
}

describe('Grading', () => {
  test('profitLossCents', () => {
    // -110: 100/110 × 100 = 90.9 → 91
    expect(profitLossCents('win', -110)).toBe(91);
    expect(profitLossCents('win', 150)).toBe(150);
    expect(profitLossCents('win', -200)).toBe(50);
    expect(profitLossCents('loss', -110)).toBe(-100);
    expect(profitLossCents('loss', 150)).toBe(-100);
    expect(profitLossCents('push', -110)).toBe(0);
  });

  test('gradeOutcome', () => {
    expect(gradeOutcome('Over', 20.5, 25)).toBe('win');
    expect(gradeOutcome('Over', 20.5, 20)).toBe('loss');
    expect(gradeOutcome('Under', 20.5, 20)).toBe('win');
    expect(gradeOutcome('Under', 20, 20)).toBe('push');
  });

  test('grades finished games and records result, stat and P/L', async () => {
    const store = storeOf(
      makePick({ playerName: 'Winner', line: 20.5, side: 'Over' }),
      makePick({ playerName: 'Loser', line: 5.5, side: 'Under', category: 'assists', openingOdds: 150, odds: 150 }),
      makePick({ playerName: 'Pusher', line: 8, side: 'Over', category: 'rebounds' })
    );
    const { source } = fakeStats({
      Winner: found(27),
      Loser: found(9),
      Pusher: found(8),
    });

    const counts = await gradePendingPicks(store, source, options);

    expect(counts).toEqual({ graded: 3, wins: 1, losses: 1, pushes: 1, skipped: 0, errors: 0 });
    const [win, loss, push] = store.picks;
    expect(win).toMatchObject({ status: 'win', result: 'WIN', actualStat: 27, profitLoss: 91, updatedAt: '2026-10-19T15:00:00.000Z' });
    expect(loss).toMatchObject({ status: 'loss', result: 'LOSS', actualStat: 9, profitLoss: -100 });
    expect(push).toMatchObject({ status: 'push', result: 'PUSH', actualStat: 8, profitLoss: 0 });
  });

  test('P/L uses opening odds, not the latest price', async () => {
    const store = storeOf(makePick({ playerName: 'Mover', openingOdds: 120, odds: -130 }));
    const { source } = fakeStats({ Mover: found(30) });

    await gradePendingPicks(store, source, options);

    expect(store.picks[0].profitLoss).toBe(120);
  });

  test('unavailable, errored and thrown lookups leave picks pending', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    const store = storeOf(
      makePick({ playerName: 'No Box Score' }),
      makePick({ playerName: 'Bad Row' }),
      makePick({ playerName: 'Feed Down' })
    );
    const { source } = fakeStats({
      'Bad Row': lookupError<number>('PTS missing'),
      'Feed Down': new Error('socket hang up'),
    });

    const counts = await gradePendingPicks(store, source, options);

    expect(counts).toEqual({ graded: 0, wins: 0, losses: 0, pushes: 0, skipped: 1, errors: 2 });
    expect(store.picks.every(p => p.status === 'pending' && p.profitLoss === null)).toBe(true);
    expect(warn).toHaveBeenCalledTimes(2);
    warn.mockRestore();
  });

  test('only pending picks before today are looked up', async () => {
    const store = storeOf(
      makePick({ playerName: 'Tonight', gameDate: '2026-10-19' }),
      makePick({ playerName: 'Graded', status: 'loss', result: 'LOSS', actualStat: 10, profitLoss: -100 }),
      makePick({ playerName: 'Due' })
    );
    const { source, getFinalStat } = fakeStats({ Graded: found(40), Due: found(21) });

    const counts = await gradePendingPicks(store, source, options);

    expect(getFinalStat).toHaveBeenCalledTimes(1);
    expect(getFinalStat).toHaveBeenCalledWith('Due', '2026-10-18', 'points');
    expect(counts.graded).toBe(1);
    expect(store.picks[0].status).toBe('pending');
    expect(store.picks[1]).toMatchObject({ status: 'loss', actualStat: 10, profitLoss: -100 });
  });

  test('terminal status never changes on a second run', async () => {
    const store = storeOf(makePick({ playerName: 'Once' }));

    await gradePendingPicks(store, fakeStats({ Once: found(25) }).source, options);
    await gradePendingPicks(store, fakeStats({ Once: found(3) }).source, options);

    expect(store.picks[0]).toMatchObject({ status: 'win', actualStat: 25, profitLoss: 91 });
  });

  test('backfillProfitLoss fills win/loss picks missing P/L', () => {
    const store = storeOf(
      makePick({ playerName: 'A', status: 'win', result: 'WIN', openingOdds: 150, odds: 150 }),
      makePick({ playerName: 'B', status: 'loss', result: 'LOSS' }),
      makePick({ playerName: 'C', status: 'win', result: 'WIN', profitLoss: 91 }),
      makePick({ playerName: 'D', status: 'pending' })
    );

    expect(backfillProfitLoss(store)).toBe(2);
    expect(store.picks.map(p => p.profitLoss)).toEqual([150, -100, 91, null]);
    expect(backfillProfitLoss(store)).toBe(0);
  });
});
