import { normalizeBookmakerName } from '../lib/bookmaker-normalizer';

describe('normalizeBookmakerName', () => {
  test.each([
    ['draftkings', 'DraftKings'],
    ['DraftKings', 'DraftKings'],
    ['williamhill_us', 'Caesars'],
    ['BetOnline.ag', 'BetOnline'],
    ['ESPN BET', 'ESPN BET'],
    ['Circa Sports', 'Circa'],
    ['the local sportsbook', 'The Local'],
    ['  unibet  ', 'Unibet'],
  ])('%s → %s', (raw, expected) => {
    expect(normalizeBookmakerName(raw)).toBe(expected);
  });

  test('empty input is Unknown', () => {
    expect(normalizeBookmakerName('')).toBe('Unknown');
    expect(normalizeBookmakerName(null)).toBe('Unknown');
    expect(normalizeBookmakerName(undefined)).toBe('Unknown');
  });
});
