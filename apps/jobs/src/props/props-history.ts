import { z } from 'zod';
import { PROP_CATEGORIES } from './prop-category';
import { PropAnalysis } from './types';
import { readJsonDocument, writeJsonDocument } from '../utils/json-file';

/**
 * Archive of every analysed prop, one entry per run date (re-runs on the
 * same date overwrite that day).
 */

const propAnalysisSchema = z.object({
  playerName: z.string(),
  team: z.string(),
  opponent: z.string(),
  homeTeam: z.string(),
  awayTeam: z.string(),
  gameTime: z.string(),
  gameDate: z.string(),
  bookmaker: z.string(),
  category: z.enum(PROP_CATEGORIES),
  line: z.number(),
  odds: z.number(),
  side: z.enum(['Over', 'Under']),
  prediction: z.number(),
  edge: z.number(),
  score: z.number(),
  ev: z.number(),
  winProbability: z.number(),
  seasonAvg: z.number(),
  last10Avg: z.number(),
  gamesPlayed: z.number(),
  isValuePlay: z.boolean(),
  insights: z.array(z.string()),
});

const historyDaySchema = z.object({
  date: z.string(),
  totalProps: z.number().int().nonnegative(),
  valuePlays: z.number().int().nonnegative(),
  props: z.array(propAnalysisSchema),
});

export const propsHistorySchema = z.object({
  schemaVersion: z.literal(1).default(1),
  days: z.record(historyDaySchema).default({}),
});

export type PropsHistory = z.infer<typeof propsHistorySchema>;

export const emptyPropsHistory = (): PropsHistory => ({ schemaVersion: 1, days: {} });

export function recordPropsForDate(history: PropsHistory, date: string, props: readonly PropAnalysis[]): void {
  history.days[date] = {
    date,
    totalProps: props.length,
    valuePlays: props.filter(p => p.isValuePlay).length,
    props: [...props],
  };
}

export function loadPropsHistory(filePath: string): PropsHistory {
  return readJsonDocument(filePath, propsHistorySchema, emptyPropsHistory);
}

export function savePropsHistory(filePath: string, history: PropsHistory): void {
  writeJsonDocument(filePath, history);
}
