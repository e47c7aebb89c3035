/**
 * Pick tracking
 *
 * Adds the day's value plays to the pick store as pending picks.
 * - Idempotent: a pick whose identity is already stored is skipped
 * - Never backfills: candidates for games before today are dropped
 * - The top-play flag is frozen at insertion time
 */

import { PropAnalysis } from '../props/types';
import { highlightKey } from '../props/prop-selection';
import { PickStore, TrackedPick, pickIdentity } from './pick-store';

export const DEFAULT_ODDS = -110;

function coerceOdds(odds: number, fallback: number): number {
  return Number.isFinite(odds) ? Math.trunc(odds) : fallback;
}

export interface TrackOptions {
  /** Today's ET date, YYYY-MM-DD */
  today: string;
  now: Date;
  defaultOdds?: number;
}

/**
 * Insert pending picks for new candidates; returns how many were added.
 * Mutates `store.picks` in place; persisting is the caller's job.
 */
export function trackNewPicks(
  store: PickStore,
  candidates: readonly PropAnalysis[],
  highlightKeys: ReadonlySet<string>,
  options: TrackOptions
): number {
  const existingIds = new Set(store.picks.map(p => p.pickId));
  const trackedAt = options.now.toISOString();
  let added = 0;

  for (const prop of candidates) {
    const gameDate = prop.gameDate || options.today;
    if (gameDate < options.today) {
      continue;
    }

    const pickId = pickIdentity(prop.playerName, prop.category, prop.line, prop.side, gameDate);
    if (existingIds.has(pickId)) {
      continue;
    }
    existingIds.add(pickId);

    const odds = coerceOdds(prop.odds, options.defaultOdds ?? DEFAULT_ODDS);
    const pick: TrackedPick = {
      pickId,
      playerName: prop.playerName,
      category: prop.category,
      line: prop.line,
      side: prop.side,
      odds,
      openingOdds: odds,
      isTop6: highlightKeys.has(highlightKey(prop)),
      gameDate,
      startTime: prop.gameTime,
      team: prop.team,
      opponent: prop.opponent,
      bookmaker: prop.bookmaker,
      score: prop.score,
      trackedAt,
      status: 'pending',
      result: null,
      actualStat: null,
      profitLoss: null,
      updatedAt: null,
    };
    store.picks.push(pick);
    added++;
  }

  return added;
}
