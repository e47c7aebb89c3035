/**
 * Prop categories
 *
 * Every prop flowing through the jobs is keyed by one of four categories.
 * Sportsbooks, box scores and older pick files spell them differently
 * ("3pt", "three_pointers", "player_threes", "3-Pointers"), so everything is
 * funnelled through normalizePropCategory before it is used as a key.
 */

export const PROP_CATEGORIES = ['points', 'assists', 'rebounds', 'threes'] as const;

export type PropCategory = (typeof PROP_CATEGORIES)[number];

export type Side = 'Over' | 'Under';

/** Box-score column used to grade each category */
export type StatKey = 'PTS' | 'AST' | 'REB' | 'FG3M';

interface CategoryMeta {
  label: string;
  market: string;
  statKey: StatKey;
}

const CATEGORY_META: Record<PropCategory, CategoryMeta> = {
  points: { label: 'Points', market: 'player_points', statKey: 'PTS' },
  assists: { label: 'Assists', market: 'player_assists', statKey: 'AST' },
  rebounds: { label: 'Rebounds', market: 'player_rebounds', statKey: 'REB' },
  threes: { label: '3-Pointers', market: 'player_threes', statKey: 'FG3M' },
};

/**
 * Normalize free-form prop type text to a PropCategory.
 *
 * Anything mentioning "3" or "three" is threes; otherwise the first category
 * name found as a substring wins, in PROP_CATEGORIES order. Defaults to points.
 */
export function normalizePropCategory(raw: string | null | undefined): PropCategory {
  const text = (raw ?? '').toLowerCase();
  if (text.includes('3') || text.includes('three')) {
    return 'threes';
  }
  for (const category of PROP_CATEGORIES) {
    if (text.includes(category)) {
      return category;
    }
  }
  return 'points';
}

export function isPropCategory(value: string): value is PropCategory {
  return (PROP_CATEGORIES as readonly string[]).includes(value);
}

export function categoryLabel(category: PropCategory): string {
  return CATEGORY_META[category].label;
}

export function categoryMarket(category: PropCategory): string {
  return CATEGORY_META[category].market;
}

export function categoryStatKey(category: PropCategory): StatKey {
  return CATEGORY_META[category].statKey;
}

/**
 * Map an odds-API market key (e.g. "player_rebounds") back to a category.
 * Returns null for markets we do not model.
 */
export function categoryFromMarket(market: string): PropCategory | null {
  for (const category of PROP_CATEGORIES) {
    if (CATEGORY_META[category].market === market) {
      return category;
    }
  }
  return null;
}

export function parseSide(raw: string | null | undefined): Side | null {
  const text = (raw ?? '').trim().toLowerCase();
  if (text === 'over') return 'Over';
  if (text === 'under') return 'Under';
  return null;
}
