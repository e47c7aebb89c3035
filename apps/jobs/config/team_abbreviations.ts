/**
 * NBA team nickname → abbreviation
 *
 * Odds feeds publish full names ("Los Angeles Lakers"); stats and defense
 * tables are keyed by abbreviation. Matching is by nickname substring.
 */

export const TEAM_ABBREVIATIONS: ReadonlyArray<readonly [nickname: string, abbrev: string]> = [
  ['trail blazers', 'POR'],
  ['76ers', 'PHI'],
  ['lakers', 'LAL'],
  ['celtics', 'BOS'],
  ['warriors', 'GSW'],
  ['heat', 'MIA'],
  ['nets', 'BKN'],
  ['bucks', 'MIL'],
  ['clippers', 'LAC'],
  ['suns', 'PHX'],
  ['knicks', 'NYK'],
  ['bulls', 'CHI'],
  ['nuggets', 'DEN'],
  ['mavericks', 'DAL'],
  ['grizzlies', 'MEM'],
  ['hawks', 'ATL'],
  ['jazz', 'UTA'],
  ['pelicans', 'NOP'],
  ['timberwolves', 'MIN'],
  ['pistons', 'DET'],
  ['kings', 'SAC'],
  ['pacers', 'IND'],
  ['magic', 'ORL'],
  ['raptors', 'TOR'],
  ['cavaliers', 'CLE'],
  ['hornets', 'CHA'],
  ['spurs', 'SAS'],
  ['rockets', 'HOU'],
  ['wizards', 'WAS'],
  ['thunder', 'OKC'],
];

/**
 * Abbreviation for a full team name; unknown names fall back to their first
 * three letters upper-cased
 */
export function teamAbbreviation(fullName: string): string {
  if (!fullName) return '';
  const lower = fullName.toLowerCase();
  for (const [nickname, abbrev] of TEAM_ABBREVIATIONS) {
    if (lower.includes(nickname)) return abbrev;
  }
  return fullName.slice(0, 3).toUpperCase();
}
