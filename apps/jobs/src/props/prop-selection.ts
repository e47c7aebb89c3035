/**
 * Helpers for choosing which analysed props get shown and highlighted
 */

import { PROP_CATEGORIES, PropCategory } from './prop-category';
import { PropAnalysis } from './types';

export const byScoreDesc = (a: PropAnalysis, b: PropAnalysis): number => b.score - a.score;

/**
 * Key identifying a prop for top-play highlighting: player, category, line, side
 */
export function highlightKey(prop: Pick<PropAnalysis, 'playerName' | 'category' | 'line' | 'side'>): string {
  return `${prop.playerName}|${prop.category}|${prop.line}|${prop.side}`;
}

/**
 * Keep only the better-scoring side of each player/category/line combo.
 * Ties keep whichever side was seen first.
 */
export function dedupeBestSide(props: readonly PropAnalysis[]): PropAnalysis[] {
  const groups = new Map<string, PropAnalysis>();
  for (const prop of props) {
    const key = `${prop.playerName}|${prop.category}|${prop.line}`;
    const current = groups.get(key);
    if (!current || prop.score > current.score) {
      groups.set(key, prop);
    }
  }
  return Array.from(groups.values());
}

/**
 * Pick the top plays, trying to get one of each category before filling the
 * rest by score. Input is expected to be sorted by score already.
 */
export function selectDiverseTopPlays(sortedProps: readonly PropAnalysis[], count: number): PropAnalysis[] {
  if (sortedProps.length <= count) {
    return [...sortedProps];
  }

  const selected: PropAnalysis[] = [];
  const usedCategories = new Set<PropCategory>();

  for (const prop of sortedProps) {
    if (selected.length >= count) break;
    if (!usedCategories.has(prop.category)) {
      selected.push(prop);
      usedCategories.add(prop.category);
    }
  }

  for (const prop of sortedProps) {
    if (selected.length >= count) break;
    if (!selected.includes(prop)) {
      selected.push(prop);
    }
  }

  return selected.sort(byScoreDesc).slice(0, count);
}

/**
 * Build the dashboard list: value plays topped up to targetMin with the next
 * best analysed props, the best minPerType of each category first, then
 * anything else by score until targetMin is reached.
 */
export function selectDisplayProps(
  valueProps: readonly PropAnalysis[],
  analyzedProps: readonly PropAnalysis[],
  targetMin: number,
  minPerType: number
): PropAnalysis[] {
  const pool: PropAnalysis[] = [...valueProps];
  if (pool.length < targetMin) {
    const remaining = analyzedProps.filter(p => !pool.includes(p)).sort(byScoreDesc);
    for (const prop of remaining) {
      if (pool.length >= targetMin) break;
      pool.push(prop);
    }
  }
  if (pool.length === 0) {
    return [];
  }

  const seen = new Set<string>();
  const selected: PropAnalysis[] = [];
  const take = (prop: PropAnalysis): void => {
    const key = highlightKey(prop);
    if (seen.has(key)) return;
    seen.add(key);
    selected.push(prop);
  };

  for (const category of PROP_CATEGORIES) {
    pool
      .filter(p => p.category === category)
      .sort(byScoreDesc)
      .slice(0, minPerType)
      .forEach(take);
  }

  if (selected.length < targetMin) {
    for (const prop of [...pool].sort(byScoreDesc)) {
      if (selected.length >= targetMin) break;
      take(prop);
    }
  }

  return selected;
}
