import { highlightKey } from '../src/props/prop-selection';
import { emptyPickStore, pickIdentity } from '../src/tracking/pick-store';
import { trackNewPicks } from '../src/tracking/pick-tracker';
import { makePick, makeProp } from './fixtures';

const options = {
  today: '2026-10-19',
  now: new Date('2026-10-19T15:00:00.000Z'),
};

describe('trackNewPicks', () => {
  test('adds pending picks with opening odds and tracking time', () => {
    const store = emptyPickStore();
    const prop = makeProp({ playerName: 'Marcus Hale', line: 26.5, odds: -115, gameDate: '2026-10-21' });

    const added = trackNewPicks(store, [prop], new Set(), options);

    expect(added).toBe(1);
    expect(store.picks).toHaveLength(1);
    const pick = store.picks[0];
    expect(pick.pickId).toBe('marcus hale|points|26.5|Over|2026-10-21');
    expect(pick.status).toBe('pending');
    expect(pick.result).toBeNull();
    expect(pick.profitLoss).toBeNull();
    expect(pick.odds).toBe(-115);
    expect(pick.openingOdds).toBe(-115);
    expect(pick.trackedAt).toBe('2026-10-19T15:00:00.000Z');
    expect(pick.startTime).toBe('Wed, Oct 21 • 07:30 PM ET');
    expect(pick.isTop6).toBe(false);
  });

  test('is idempotent across runs', () => {
    const store = emptyPickStore();
    const props = [makeProp(), makeProp({ side: 'Under' })];

    expect(trackNewPicks(store, props, new Set(), options)).toBe(2);
    expect(trackNewPicks(store, props, new Set(), options)).toBe(0);
    expect(store.picks).toHaveLength(2);
  });

  test('duplicates within one batch are added once', () => {
    const store = emptyPickStore();
    const added = trackNewPicks(store, [makeProp({ bookmaker: 'FanDuel' }), makeProp({ bookmaker: 'BetMGM' })], new Set(), options);

    expect(added).toBe(1);
    expect(store.picks[0].bookmaker).toBe('FanDuel');
  });

  test('player name case and spacing do not create new picks', () => {
    const store = emptyPickStore();
    store.picks.push(makePick({ playerName: 'Marcus Hale', gameDate: '2026-10-21' }));

    const added = trackNewPicks(store, [makeProp({ playerName: '  marcus   HALE ' })], new Set(), options);

    expect(added).toBe(0);
  });

  test('never tracks games before today', () => {
    const store = emptyPickStore();
    const added = trackNewPicks(
      store,
      [makeProp({ gameDate: '2026-10-18' }), makeProp({ gameDate: '2026-10-19', line: 18.5 })],
      new Set(),
      options
    );

    expect(added).toBe(1);
    expect(store.picks[0].gameDate).toBe('2026-10-19');
  });

  test('missing game date falls back to today', () => {
    const store = emptyPickStore();
    trackNewPicks(store, [makeProp({ gameDate: '' })], new Set(), options);
    expect(store.picks[0].pickId).toBe(pickIdentity('Test Player', 'points', 20.5, 'Over', '2026-10-19'));
  });

  test('top-play flag is frozen at insertion', () => {
    const store = emptyPickStore();
    const prop = makeProp();

    trackNewPicks(store, [prop], new Set([highlightKey(prop)]), options);
    expect(store.picks[0].isTop6).toBe(true);

    // later run no longer highlights it
    trackNewPicks(store, [prop], new Set(), options);
    expect(store.picks[0].isTop6).toBe(true);
  });

  test('odds are truncated to integers, non-finite odds use the default', () => {
    const store = emptyPickStore();
    trackNewPicks(
      store,
      [makeProp({ odds: 150.7 }), makeProp({ line: 30.5, odds: Number.NaN })],
      new Set(),
      { ...options, defaultOdds: -120 }
    );

    expect(store.picks.map(p => p.odds)).toEqual([150, -120]);
  });
});
