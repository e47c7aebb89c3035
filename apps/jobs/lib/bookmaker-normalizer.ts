/**
 * Bookmaker Name Normalization
 *
 * The odds feed reports sportsbooks by key ("draftkings") or title
 * ("DraftKings"), and snapshot files written by hand are inconsistent again.
 * Everything is mapped to one display name before props are grouped by book.
 */

const BOOKMAKER_ALIASES: Record<string, string> = {
  'draftkings': 'DraftKings',
  'dk': 'DraftKings',
  'fanduel': 'FanDuel',
  'fd': 'FanDuel',
  'betmgm': 'BetMGM',
  'mgm': 'BetMGM',
  'caesars': 'Caesars',
  'williamhill_us': 'Caesars',
  'william hill': 'Caesars',
  'pointsbet': 'PointsBet',
  'pointsbetus': 'PointsBet',
  'pinnacle': 'Pinnacle',
  'betrivers': 'BetRivers',
  'espnbet': 'ESPN BET',
  'espn bet': 'ESPN BET',
  'fanatics': 'Fanatics',
  'bovada': 'Bovada',
  'betonlineag': 'BetOnline',
  'betonline': 'BetOnline',
  'lowvig': 'LowVig',
  'mybookieag': 'MyBookie',
  'mybookie': 'MyBookie',
  'hardrockbet': 'Hard Rock Bet',
  'ballybet': 'Bally Bet',
};

/**
 * Normalize a bookmaker key or title to a display name
 *
 * @example normalizeBookmakerName('williamhill_us') // 'Caesars'
 * @example normalizeBookmakerName('Circa Sports') // 'Circa'
 */
export function normalizeBookmakerName(rawName: string | null | undefined): string {
  if (!rawName) {
    return 'Unknown';
  }

  const normalized = rawName.trim().toLowerCase();
  const aliased = BOOKMAKER_ALIASES[normalized];
  if (aliased) {
    return aliased;
  }

  const cleaned = normalized
    .replace(/\.(ag|com|net|eu)$/i, '')
    .replace(/\s+sportsbook$/i, '')
    .replace(/\s+sports$/i, '');

  const aliasedCleaned = BOOKMAKER_ALIASES[cleaned] ?? BOOKMAKER_ALIASES[cleaned.replace(/[\s.]/g, '')];
  if (aliasedCleaned) {
    return aliasedCleaned;
  }

  const titleCased = cleaned
    .split(/\s+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');

  return titleCased || 'Unknown';
}
