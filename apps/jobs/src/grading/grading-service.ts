/**
 * Grading Service
 *
 * Grades pending picks once their game date is in the past, using the final
 * box-score value from the stats source.
 * - Lookups that come back unavailable or errored leave the pick pending; the
 *   next run simply tries again
 * - Terminal picks are never touched again
 * - P/L is stored in cents (1 unit = 100) from the opening odds
 */

import { LookupResult, PlayerStatsSource, lookupError } from '../../adapters/DataSourceAdapter';
import { Side } from '../props/prop-category';
import { DEFAULT_ODDS } from '../tracking/pick-tracker';
import { PickResult, PickStore, TerminalStatus, TrackedPick } from '../tracking/pick-store';
import { errMsg } from '../../lib/errors';
import { sleep } from '../utils/dates';

export interface GradeCounts {
  graded: number;
  wins: number;
  losses: number;
  pushes: number;
  /** Still pending because the final stat was not available yet */
  skipped: number;
  /** Still pending because the lookup failed */
  errors: number;
}

export interface GradeOptions {
  /** Today's ET date; only picks strictly before it are graded */
  today: string;
  now: Date;
  /** Courtesy delay after each successful stat lookup */
  delayMs?: number;
  verbose?: boolean;
}

const RESULT_LABEL: Record<TerminalStatus, PickResult> = {
  win: 'WIN',
  loss: 'LOSS',
  push: 'PUSH',
};

/**
 * Outcome of a prop given the final stat
 */
export function gradeOutcome(side: Side, line: number, actual: number): TerminalStatus {
  const diff = side === 'Over' ? actual - line : line - actual;
  if (diff > 0) return 'win';
  if (diff < 0) return 'loss';
  return 'push';
}

/**
 * Profit/loss in cents for a one-unit stake at American odds.
 * +150 win → 150, -110 win → 91, loss → -100, push → 0
 */
export function profitLossCents(outcome: TerminalStatus, oddsAmerican: number): number {
  if (outcome === 'push') return 0;
  if (outcome === 'loss') return -100;
  if (oddsAmerican > 0) return Math.round(oddsAmerican);
  return Math.round((100 / Math.abs(oddsAmerican)) * 100);
}

function oddsForPick(pick: TrackedPick): number {
  if (pick.openingOdds) return pick.openingOdds;
  if (pick.odds) return pick.odds;
  return DEFAULT_ODDS;
}

function applyGrade(pick: TrackedPick, outcome: TerminalStatus, actual: number, now: Date): void {
  pick.status = outcome;
  pick.result = RESULT_LABEL[outcome];
  pick.actualStat = actual;
  pick.profitLoss = profitLossCents(outcome, oddsForPick(pick));
  pick.updatedAt = now.toISOString();
}

/**
 * Grade every pending pick whose game date is before today.
 * Mutates picks in place; persisting is the caller's job.
 */
export async function gradePendingPicks(
  store: PickStore,
  stats: PlayerStatsSource,
  options: GradeOptions
): Promise<GradeCounts> {
  const counts: GradeCounts = { graded: 0, wins: 0, losses: 0, pushes: 0, skipped: 0, errors: 0 };
  const due = store.picks.filter(p => p.status === 'pending' && p.gameDate < options.today);

  for (const pick of due) {
    let lookup: LookupResult<number>;
    try {
      lookup = await stats.getFinalStat(pick.playerName, pick.gameDate, pick.category);
    } catch (error) {
      lookup = lookupError(errMsg(error));
    }

    if (lookup.status === 'unavailable') {
      counts.skipped++;
      continue;
    }
    if (lookup.status === 'error') {
      console.warn(`[GRADE_PICKS] Lookup failed for ${pick.playerName} ${pick.gameDate}: ${lookup.reason} (will retry next run)`);
      counts.errors++;
      continue;
    }

    const outcome = gradeOutcome(pick.side, pick.line, lookup.value);
    applyGrade(pick, outcome, lookup.value, options.now);

    counts.graded++;
    if (outcome === 'win') counts.wins++;
    else if (outcome === 'loss') counts.losses++;
    else counts.pushes++;

    if (options.verbose) {
      console.log(`   Graded: ${pick.playerName} ${pick.side} ${pick.line} ${pick.category} → ${pick.result} (actual ${lookup.value})`);
    }

    await sleep(options.delayMs ?? 0);
  }

  return counts;
}

/**
 * Repair win/loss picks that reached a terminal state without a P/L value.
 * Returns how many picks were updated.
 */
export function backfillProfitLoss(store: PickStore): number {
  let updated = 0;
  for (const pick of store.picks) {
    if ((pick.status === 'win' || pick.status === 'loss') && pick.profitLoss === null) {
      pick.profitLoss = profitLossCents(pick.status, oddsForPick(pick));
      updated++;
    }
  }
  return updated;
}
