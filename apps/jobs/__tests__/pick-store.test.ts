import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PersistenceError } from '../lib/errors';
import {
  PICK_STORE_SCHEMA_VERSION,
  emptyPickStore,
  loadPickStore,
  pickIdentity,
  savePickStore,
} from '../src/tracking/pick-store';
import { loadPerformanceDocument } from '../src/performance/performance';
import { makePick } from './fixtures';

describe('Pick store persistence', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pick-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('missing file loads as an empty store', () => {
    expect(loadPickStore(path.join(dir, 'prop_tracking.json'))).toEqual({
      schemaVersion: PICK_STORE_SCHEMA_VERSION,
      picks: [],
    });
  });

  test('saved store loads back unchanged', () => {
    const file = path.join(dir, 'nested', 'prop_tracking.json');
    const store = emptyPickStore();
    store.picks.push(makePick({ playerName: 'Marcus Hale', isTop6: true }));

    savePickStore(file, store);

    expect(loadPickStore(file)).toEqual(store);
    expect(fs.readFileSync(file, 'utf-8').endsWith('}\n')).toBe(true);
    expect(fs.existsSync(`${file}.tmp`)).toBe(false);
  });

  test('older records get defaults for optional fields', () => {
    const file = path.join(dir, 'prop_tracking.json');
    fs.writeFileSync(
      file,
      JSON.stringify({
        picks: [
          {
            pickId: 'x',
            playerName: 'Theo Banks',
            category: 'assists',
            line: 6.5,
            side: 'Under',
            odds: -105,
            openingOdds: -105,
            gameDate: '2026-10-10',
            trackedAt: '2026-10-10T12:00:00.000Z',
            status: 'pending',
            result: null,
            actualStat: null,
            profitLoss: null,
            updatedAt: null,
          },
        ],
      })
    );

    const store = loadPickStore(file);

    expect(store.schemaVersion).toBe(1);
    expect(store.picks[0]).toMatchObject({ isTop6: false, team: '', bookmaker: '', score: null });
  });

  test('corrupt JSON throws PersistenceError', () => {
    const file = path.join(dir, 'prop_tracking.json');
    fs.writeFileSync(file, '{ "picks": [');

    expect(() => loadPickStore(file)).toThrow(PersistenceError);
  });

  test('schema violations throw PersistenceError naming the field', () => {
    const file = path.join(dir, 'prop_tracking.json');
    fs.writeFileSync(file, JSON.stringify({ picks: [{ pickId: 'x', status: 'maybe' }] }));

    expect(() => loadPickStore(file)).toThrow(/Invalid document \(picks\.0\./);
  });

  test('performance document uses the same validation', () => {
    const file = path.join(dir, 'performance.json');
    fs.writeFileSync(file, JSON.stringify({ wins: -1 }));

    expect(() => loadPerformanceDocument(file)).toThrow(PersistenceError);
    expect(loadPerformanceDocument(path.join(dir, 'missing.json')).totalBets).toBe(0);
  });

  test('pickIdentity normalizes the player name only', () => {
    expect(pickIdentity('  Theo   BANKS ', 'rebounds', 7, 'Under', '2026-10-21')).toBe('theo banks|rebounds|7|Under|2026-10-21');
  });
});
