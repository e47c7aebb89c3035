/**
 * Scoring Configuration Loader
 *
 * Loads and provides type-safe access to the prop model thresholds and run
 * settings from scoring.yml. Anything omitted from the YAML falls back to
 * DEFAULT_SCORING_CONFIG / DEFAULT_RUN_SETTINGS. The returned objects are
 * frozen; tests build their own configs with buildScoringConfig().
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { PROP_CATEGORIES, PropCategory } from '../props/prop-category';
import { ConfigError, errMsg } from '../../lib/errors';

/** Descending [threshold, bonus] pairs; the first threshold met wins */
export type Ladder = ReadonlyArray<readonly [number, number]>;

export interface SideEdge {
  over: number;
  under: number;
}

export interface ScoringConfig {
  minGamesPlayed: number;
  minMinutes: number;
  baseScore: number;
  /** Fraction of the minimum edge both edges must reach before scoring */
  edgeGateFraction: number;
  minEdge: Readonly<Record<PropCategory, SideEdge>>;
  seasonEdgeLadder: Readonly<Record<PropCategory, Ladder>>;
  recentFormLadder: Ladder;
  per36Ladder: Readonly<Record<PropCategory, Ladder>>;
  consistencyWeight: number;
  leagueDefRating: number;
  leaguePace: number;
  weakDefRating: number;
  toughDefRating: number;
  minScoreByCategory: Readonly<Partial<Record<PropCategory, number>>>;
  minScoreDefault: number;
}

export interface RunSettings {
  daysAhead: number;
  topPlaysCount: number;
  targetMinDisplay: number;
  minDisplayPerType: number;
  gradingDelayMs: number;
  requestDelayMs: number;
  defaultOdds: number;
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  minGamesPlayed: 3,
  minMinutes: 15,
  baseScore: 4.0,
  edgeGateFraction: 0.3,
  minEdge: {
    points: { over: 2.0, under: 1.5 },
    assists: { over: 1.5, under: 1.0 },
    rebounds: { over: 1.5, under: 1.0 },
    threes: { over: 1.0, under: 0.8 },
  },
  seasonEdgeLadder: {
    points: [[2.0, 3.5], [1.5, 2.5], [1.0, 1.5], [0.5, 0.5]],
    assists: [[1.5, 3.5], [1.0, 2.5], [0.5, 1.5], [0.3, 0.5]],
    rebounds: [[1.5, 3.5], [1.0, 2.5], [0.5, 1.5], [0.3, 0.5]],
    threes: [[1.0, 3.5], [0.8, 2.5], [0.5, 1.5], [0.3, 0.5]],
  },
  recentFormLadder: [[1.2, 2.5], [1.0, 1.5], [0.5, 0.8]],
  per36Ladder: {
    points: [[25.0, 1.5], [20.0, 1.0]],
    assists: [[8.0, 1.5], [6.0, 1.0]],
    rebounds: [[10.0, 1.5], [7.0, 1.0]],
    threes: [[3.5, 1.5], [2.5, 1.0]],
  },
  consistencyWeight: 0.8,
  leagueDefRating: 110.0,
  leaguePace: 100.0,
  weakDefRating: 114,
  toughDefRating: 106,
  minScoreByCategory: {
    points: 10.0,
    assists: 10.0,
    rebounds: 10.0,
    threes: 10.0,
  },
  minScoreDefault: 10.0,
};

export const DEFAULT_RUN_SETTINGS: RunSettings = {
  daysAhead: 3,
  topPlaysCount: 6,
  targetMinDisplay: 25,
  minDisplayPerType: 5,
  gradingDelayMs: 600,
  requestDelayMs: 300,
  defaultOdds: -110,
};

const ladderSchema = z.array(z.tuple([z.number(), z.number()]));
const perCategory = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({
    points: schema.optional(),
    assists: schema.optional(),
    rebounds: schema.optional(),
    threes: schema.optional(),
  });

const scoringYamlSchema = z.object({
  scoring: z
    .object({
      min_games_played: z.number().int().nonnegative().optional(),
      min_minutes: z.number().nonnegative().optional(),
      base_score: z.number().optional(),
      edge_gate_fraction: z.number().min(0).max(1).optional(),
      min_edge: perCategory(z.object({ over: z.number(), under: z.number() })).optional(),
      season_edge_ladder: perCategory(ladderSchema).optional(),
      recent_form_ladder: ladderSchema.optional(),
      per36_ladder: perCategory(ladderSchema).optional(),
      consistency_weight: z.number().optional(),
      league_def_rating: z.number().positive().optional(),
      league_pace: z.number().positive().optional(),
      weak_def_rating: z.number().optional(),
      tough_def_rating: z.number().optional(),
      min_score_by_category: perCategory(z.number().min(0).max(10)).optional(),
      min_score_default: z.number().min(0).max(10).optional(),
    })
    .optional(),
  run: z
    .object({
      days_ahead: z.number().int().nonnegative().optional(),
      top_plays_count: z.number().int().positive().optional(),
      target_min_display: z.number().int().nonnegative().optional(),
      min_display_per_type: z.number().int().nonnegative().optional(),
      grading_delay_ms: z.number().int().nonnegative().optional(),
      request_delay_ms: z.number().int().nonnegative().optional(),
      default_odds: z.number().int().optional(),
    })
    .optional(),
});

type ScoringYaml = z.infer<typeof scoringYamlSchema>;

function mergeCategories<T>(
  defaults: Readonly<Record<PropCategory, T>>,
  overrides: Partial<Record<PropCategory, T>> | undefined
): Record<PropCategory, T> {
  const merged = { ...defaults };
  for (const category of PROP_CATEGORIES) {
    const value = overrides?.[category];
    if (value !== undefined) merged[category] = value;
  }
  return merged;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

deepFreeze(DEFAULT_SCORING_CONFIG);
deepFreeze(DEFAULT_RUN_SETTINGS);

/**
 * Build a frozen scoring config from defaults plus overrides
 */
export function buildScoringConfig(overrides: Partial<ScoringConfig> = {}): ScoringConfig {
  return deepFreeze({ ...DEFAULT_SCORING_CONFIG, ...overrides });
}

function fromYaml(parsed: ScoringYaml): { scoring: ScoringConfig; run: RunSettings } {
  const s = parsed.scoring ?? {};
  const r = parsed.run ?? {};
  const d = DEFAULT_SCORING_CONFIG;

  const scoring = buildScoringConfig({
    minGamesPlayed: s.min_games_played ?? d.minGamesPlayed,
    minMinutes: s.min_minutes ?? d.minMinutes,
    baseScore: s.base_score ?? d.baseScore,
    edgeGateFraction: s.edge_gate_fraction ?? d.edgeGateFraction,
    minEdge: mergeCategories(d.minEdge, s.min_edge),
    seasonEdgeLadder: mergeCategories(d.seasonEdgeLadder, s.season_edge_ladder),
    recentFormLadder: s.recent_form_ladder ?? d.recentFormLadder,
    per36Ladder: mergeCategories(d.per36Ladder, s.per36_ladder),
    consistencyWeight: s.consistency_weight ?? d.consistencyWeight,
    leagueDefRating: s.league_def_rating ?? d.leagueDefRating,
    leaguePace: s.league_pace ?? d.leaguePace,
    weakDefRating: s.weak_def_rating ?? d.weakDefRating,
    toughDefRating: s.tough_def_rating ?? d.toughDefRating,
    minScoreByCategory: { ...d.minScoreByCategory, ...s.min_score_by_category },
    minScoreDefault: s.min_score_default ?? d.minScoreDefault,
  });

  const run = deepFreeze({
    daysAhead: r.days_ahead ?? DEFAULT_RUN_SETTINGS.daysAhead,
    topPlaysCount: r.top_plays_count ?? DEFAULT_RUN_SETTINGS.topPlaysCount,
    targetMinDisplay: r.target_min_display ?? DEFAULT_RUN_SETTINGS.targetMinDisplay,
    minDisplayPerType: r.min_display_per_type ?? DEFAULT_RUN_SETTINGS.minDisplayPerType,
    gradingDelayMs: r.grading_delay_ms ?? DEFAULT_RUN_SETTINGS.gradingDelayMs,
    requestDelayMs: r.request_delay_ms ?? DEFAULT_RUN_SETTINGS.requestDelayMs,
    defaultOdds: r.default_odds ?? DEFAULT_RUN_SETTINGS.defaultOdds,
  });

  return { scoring, run };
}

/**
 * Parse scoring.yml content. An empty document yields the defaults.
 */
export function parseScoringYaml(content: string): { scoring: ScoringConfig; run: RunSettings } {
  let raw: unknown;
  try {
    raw = yaml.load(content) ?? {};
  } catch (error) {
    throw new ConfigError(`scoring.yml is not valid YAML: ${errMsg(error)}`, { cause: error });
  }

  const result = scoringYamlSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid scoring.yml: ${issues}`);
  }
  return fromYaml(result.data);
}

/**
 * Load scoring.yml from the config directory
 */
export function loadScoringConfig(configDir: string): { scoring: ScoringConfig; run: RunSettings } {
  const configPath = path.join(configDir, 'scoring.yml');
  if (!fs.existsSync(configPath)) {
    console.warn(`[CONFIG] ${configPath} not found, using built-in scoring defaults`);
    return { scoring: DEFAULT_SCORING_CONFIG, run: DEFAULT_RUN_SETTINGS };
  }
  return parseScoringYaml(fs.readFileSync(configPath, 'utf-8'));
}

/**
 * Minimum score a prop of this category needs to count as a value play
 */
export function minScoreFor(config: ScoringConfig, category: PropCategory): number {
  return config.minScoreByCategory[category] ?? config.minScoreDefault;
}
