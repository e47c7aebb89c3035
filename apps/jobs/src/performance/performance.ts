/**
 * Performance rollups
 *
 * Rebuilt in full from the pick store on every run, never updated
 * incrementally. Only terminal picks count. Pushes show in the record but are
 * left out of the ROI denominator.
 */

import { z } from 'zod';
import { PROP_CATEGORIES, PropCategory } from '../props/prop-category';
import { PickStore, TrackedPick } from '../tracking/pick-store';
import { readJsonDocument, writeJsonDocument } from '../utils/json-file';

export const PERFORMANCE_SCHEMA_VERSION = 1;

export type RollupBucket = PropCategory | 'top6';

export const ROLLUP_BUCKETS: readonly RollupBucket[] = ['top6', ...PROP_CATEGORIES];

const rollupSchema = z.object({
  wins: z.number().int().nonnegative(),
  losses: z.number().int().nonnegative(),
  pushes: z.number().int().nonnegative(),
  units: z.number(),
  roi: z.number(),
});

export type DailyRollup = z.infer<typeof rollupSchema>;

export type DailyByTypeRollup = Record<RollupBucket, DailyRollup>;

export const performanceDocumentSchema = z.object({
  schemaVersion: z.literal(PERFORMANCE_SCHEMA_VERSION).default(PERFORMANCE_SCHEMA_VERSION),
  wins: z.number().int().nonnegative(),
  losses: z.number().int().nonnegative(),
  units: z.number(),
  roi: z.number(),
  totalBets: z.number().int().nonnegative(),
  updatedAt: z.string().nullable().default(null),
  daily: z.record(rollupSchema).default({}),
  dailyByType: z
    .record(
      z.object({
        top6: rollupSchema,
        points: rollupSchema,
        assists: rollupSchema,
        rebounds: rollupSchema,
        threes: rollupSchema,
      })
    )
    .default({}),
});

export type PerformanceDocument = z.infer<typeof performanceDocumentSchema>;

export const emptyPerformanceDocument = (): PerformanceDocument => ({
  schemaVersion: PERFORMANCE_SCHEMA_VERSION,
  wins: 0,
  losses: 0,
  units: 0,
  roi: 0,
  totalBets: 0,
  updatedAt: null,
  daily: {},
  dailyByType: {},
});

const round2 = (x: number): number => Math.round(x * 100) / 100;

/** Running totals kept in integer cents so sums stay exact */
interface Tally {
  wins: number;
  losses: number;
  pushes: number;
  cents: number;
}

const emptyTally = (): Tally => ({ wins: 0, losses: 0, pushes: 0, cents: 0 });

function addPick(tally: Tally, pick: TrackedPick): void {
  if (pick.status === 'win') tally.wins++;
  else if (pick.status === 'loss') tally.losses++;
  else if (pick.status === 'push') tally.pushes++;
  tally.cents += pick.profitLoss ?? 0;
}

/**
 * units ÷ settled bets × 100, or 0 with nothing settled
 */
export function computeRoi(units: number, settled: number): number {
  return settled > 0 ? round2((units / settled) * 100) : 0;
}

function toRollup(tally: Tally): DailyRollup {
  const units = round2(tally.cents / 100);
  return {
    wins: tally.wins,
    losses: tally.losses,
    pushes: tally.pushes,
    units,
    roi: computeRoi(tally.cents / 100, tally.wins + tally.losses),
  };
}

function toByTypeRollup(buckets: Record<RollupBucket, Tally>): DailyByTypeRollup {
  return {
    top6: toRollup(buckets.top6),
    points: toRollup(buckets.points),
    assists: toRollup(buckets.assists),
    rebounds: toRollup(buckets.rebounds),
    threes: toRollup(buckets.threes),
  };
}

function sortedEntries<T>(map: Map<string, T>): Array<[string, T]> {
  return Array.from(map.entries()).sort(([a], [b]) => a.localeCompare(b));
}

/**
 * Per-day and per-day-per-bucket rollups of all terminal picks.
 * Does not modify the store.
 */
export function aggregatePerformance(store: Readonly<PickStore>): {
  daily: Record<string, DailyRollup>;
  dailyByType: Record<string, DailyByTypeRollup>;
} {
  const daily = new Map<string, Tally>();
  const byType = new Map<string, Record<RollupBucket, Tally>>();

  for (const pick of store.picks) {
    if (pick.status === 'pending' || !pick.gameDate) continue;

    let day = daily.get(pick.gameDate);
    if (!day) {
      day = emptyTally();
      daily.set(pick.gameDate, day);
    }
    addPick(day, pick);

    let buckets = byType.get(pick.gameDate);
    if (!buckets) {
      buckets = {
        top6: emptyTally(),
        points: emptyTally(),
        assists: emptyTally(),
        rebounds: emptyTally(),
        threes: emptyTally(),
      };
      byType.set(pick.gameDate, buckets);
    }
    addPick(buckets[pick.category], pick);
    if (pick.isTop6) {
      addPick(buckets.top6, pick);
    }
  }

  return {
    daily: Object.fromEntries(sortedEntries(daily).map(([date, tally]) => [date, toRollup(tally)])),
    dailyByType: Object.fromEntries(
      sortedEntries(byType).map(([date, buckets]) => [date, toByTypeRollup(buckets)])
    ),
  };
}

/**
 * Full performance document: daily rollups plus overall win/loss totals
 */
export function buildPerformanceDocument(store: Readonly<PickStore>, now: Date): PerformanceDocument {
  const { daily, dailyByType } = aggregatePerformance(store);

  const overall = emptyTally();
  for (const pick of store.picks) {
    if (pick.status === 'win' || pick.status === 'loss') addPick(overall, pick);
  }
  const totals = toRollup(overall);

  return {
    schemaVersion: PERFORMANCE_SCHEMA_VERSION,
    wins: totals.wins,
    losses: totals.losses,
    units: totals.units,
    roi: totals.roi,
    totalBets: totals.wins + totals.losses,
    updatedAt: now.toISOString(),
    daily,
    dailyByType,
  };
}

export function loadPerformanceDocument(filePath: string): PerformanceDocument {
  return readJsonDocument(filePath, performanceDocumentSchema, emptyPerformanceDocument);
}

export function savePerformanceDocument(filePath: string, doc: PerformanceDocument): void {
  writeJsonDocument(filePath, doc);
}
