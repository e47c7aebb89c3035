/**
 * Pick store
 *
 * A pick is a value play we committed to on the day it was posted. Picks are
 * persisted as { schemaVersion, picks: [...] } and move through a one-way
 * lifecycle:
 *
 *   pending ──▶ win | loss | push   (terminal, never re-graded)
 *
 * Identity is (normalized player, category, line, side, game date); the store
 * never holds two picks with the same pickId.
 */

import { z } from 'zod';
import { PROP_CATEGORIES, PropCategory, Side } from '../props/prop-category';
import { readJsonDocument, writeJsonDocument } from '../utils/json-file';

export const PICK_STORE_SCHEMA_VERSION = 1;

export const PICK_STATUSES = ['pending', 'win', 'loss', 'push'] as const;
export type PickStatus = (typeof PICK_STATUSES)[number];
export type TerminalStatus = Exclude<PickStatus, 'pending'>;
export type PickResult = 'WIN' | 'LOSS' | 'PUSH';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const trackedPickSchema = z.object({
  pickId: z.string().min(1),
  playerName: z.string().min(1),
  category: z.enum(PROP_CATEGORIES),
  line: z.number(),
  side: z.enum(['Over', 'Under']),
  odds: z.number().int(),
  openingOdds: z.number().int(),
  isTop6: z.boolean().default(false),
  gameDate: isoDate,
  startTime: z.string().default(''),
  team: z.string().default(''),
  opponent: z.string().default(''),
  bookmaker: z.string().default(''),
  score: z.number().nullable().default(null),
  trackedAt: z.string(),
  status: z.enum(PICK_STATUSES),
  result: z.enum(['WIN', 'LOSS', 'PUSH']).nullable(),
  actualStat: z.number().nullable(),
  profitLoss: z.number().int().nullable(),
  updatedAt: z.string().nullable(),
});

export type TrackedPick = z.infer<typeof trackedPickSchema>;

export const pickStoreSchema = z.object({
  schemaVersion: z.literal(PICK_STORE_SCHEMA_VERSION).default(PICK_STORE_SCHEMA_VERSION),
  picks: z.array(trackedPickSchema).default([]),
});

export type PickStore = z.infer<typeof pickStoreSchema>;

export const emptyPickStore = (): PickStore => ({ schemaVersion: PICK_STORE_SCHEMA_VERSION, picks: [] });

export function normalizePlayerKey(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Stable identity for a pick: same player/category/line/side/date = same pick
 */
export function pickIdentity(
  playerName: string,
  category: PropCategory,
  line: number,
  side: Side,
  gameDate: string
): string {
  return [normalizePlayerKey(playerName), category, String(line), side, gameDate].join('|');
}

export function loadPickStore(filePath: string): PickStore {
  return readJsonDocument(filePath, pickStoreSchema, emptyPickStore);
}

export function savePickStore(filePath: string, store: PickStore): void {
  writeJsonDocument(filePath, store);
}
