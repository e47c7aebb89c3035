/**
 * File Stats Adapter
 *
 * Player season/recent stats, per-game box scores and team defensive ratings
 * from JSON exports in a local stats directory:
 *
 *   player_stats.json  { players: { [name]: { PTS, L10_PTS, L5_PTS, GP, MIN, FG_PCT, FG3_PCT, TEAM, ... } } }
 *   game_logs.json     { players: { [name]: { [YYYY-MM-DD]: { PTS, AST, REB, FG3M } } } }
 *   team_defense.json  { teams: { [abbrev]: { DEF_RATING, PACE, PTS_ALLOWED } } }
 *
 * The exports are refreshed by a separate job; a player or date missing from
 * game_logs.json simply means the box score has not landed yet.
 */

import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  DefenseSource,
  LEAGUE_AVERAGE_DEFENSE,
  LookupResult,
  OpponentDefenseProfile,
  PlayerStatProfile,
  PlayerStatsSource,
  found,
  lookupError,
  unavailable,
} from './DataSourceAdapter';
import { PlayerResolver } from './PlayerResolver';
import { PropCategory, categoryStatKey } from '../src/props/prop-category';
import { ConfigError, errMsg } from '../lib/errors';

const optionalNumber = z.number().optional();

const seasonRowSchema = z.object({
  PTS: optionalNumber,
  AST: optionalNumber,
  REB: optionalNumber,
  FG3M: optionalNumber,
  L10_PTS: optionalNumber,
  L10_AST: optionalNumber,
  L10_REB: optionalNumber,
  L10_FG3M: optionalNumber,
  L5_PTS: optionalNumber,
  L5_AST: optionalNumber,
  L5_REB: optionalNumber,
  L5_FG3M: optionalNumber,
  GP: optionalNumber,
  MIN: optionalNumber,
  FG_PCT: optionalNumber,
  FG3_PCT: optionalNumber,
  TEAM: z.string().optional(),
});

const boxScoreSchema = z.object({
  PTS: optionalNumber,
  AST: optionalNumber,
  REB: optionalNumber,
  FG3M: optionalNumber,
});

const defenseRowSchema = z.object({
  DEF_RATING: optionalNumber,
  PACE: optionalNumber,
  PTS_ALLOWED: optionalNumber,
});

export const playerStatsFileSchema = z.object({ players: z.record(seasonRowSchema) });
export const gameLogsFileSchema = z.object({ players: z.record(z.record(boxScoreSchema)) });
export const teamDefenseFileSchema = z.object({ teams: z.record(defenseRowSchema) });

export type SeasonRow = z.infer<typeof seasonRowSchema>;
export type BoxScore = z.infer<typeof boxScoreSchema>;
export type DefenseRow = z.infer<typeof defenseRowSchema>;

export interface StatsTables {
  players: Record<string, SeasonRow>;
  gameLogs: Record<string, Record<string, BoxScore>> | null;
  defense: Record<string, DefenseRow>;
}

// Used when a row lacks the column entirely
const ROW_DEFAULTS = { GP: 50, MIN: 20.0, FG_PCT: 0.44, FG3_PCT: 0.35 };

const round = (value: number, places: number): number => {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
};

function readTable<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  if (!existsSync(filePath)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Could not parse ${filePath}: ${errMsg(error)}`, { cause: error });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid ${path.basename(filePath)}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue'}`);
  }
  return parsed.data;
}

export class FileStatsAdapter implements PlayerStatsSource, DefenseSource {
  private readonly seasonResolver: PlayerResolver<SeasonRow>;
  private readonly logResolver: PlayerResolver<Record<string, BoxScore>> | null;
  private readonly defense: Record<string, DefenseRow>;

  constructor(tables: StatsTables, aliases: Record<string, string> = {}) {
    this.seasonResolver = new PlayerResolver(Object.entries(tables.players), aliases);
    this.logResolver = tables.gameLogs ? new PlayerResolver(Object.entries(tables.gameLogs), aliases) : null;
    this.defense = tables.defense;
  }

  /**
   * Load the three exports from a directory. Missing player_stats.json or
   * team_defense.json leave those tables empty; missing game_logs.json makes
   * every final-stat lookup unavailable.
   */
  static fromDirectory(dataPath: string, aliases: Record<string, string> = {}): FileStatsAdapter {
    const players = readTable(path.join(dataPath, 'player_stats.json'), playerStatsFileSchema);
    const gameLogs = readTable(path.join(dataPath, 'game_logs.json'), gameLogsFileSchema);
    const defense = readTable(path.join(dataPath, 'team_defense.json'), teamDefenseFileSchema);

    if (!players) console.warn(`[STATS] player_stats.json not found in ${dataPath}`);
    if (!defense) console.warn(`[STATS] team_defense.json not found in ${dataPath}, using league averages`);

    const adapter = new FileStatsAdapter(
      {
        players: players?.players ?? {},
        gameLogs: gameLogs?.players ?? null,
        defense: defense?.teams ?? {},
      },
      aliases
    );
    console.log(
      `[STATS] Loaded ${adapter.seasonResolver.size} player season rows, ` +
      `${adapter.logResolver?.size ?? 0} players with game logs, ${Object.keys(adapter.defense).length} team defense rows`
    );
    return adapter;
  }

  async getStatsProfile(playerName: string, category: PropCategory): Promise<PlayerStatProfile | null> {
    const row = this.seasonResolver.resolve(playerName);
    if (!row) return null;

    const key = categoryStatKey(category);
    const seasonAvg = row[key] ?? 0;
    const last10Avg = row[`L10_${key}` as const] ?? seasonAvg;
    const last5Avg = row[`L5_${key}` as const];

    return {
      seasonAvg: round(seasonAvg, 1),
      last10Avg: round(last10Avg, 1),
      last5Avg: last5Avg === undefined ? undefined : round(last5Avg, 1),
      minutes: round(row.MIN ?? ROW_DEFAULTS.MIN, 1),
      gamesPlayed: Math.trunc(row.GP ?? ROW_DEFAULTS.GP),
      fgPct: round(row.FG_PCT ?? ROW_DEFAULTS.FG_PCT, 3),
      fg3Pct: round(row.FG3_PCT ?? ROW_DEFAULTS.FG3_PCT, 3),
      team: row.TEAM,
    };
  }

  async getFinalStat(playerName: string, gameDate: string, category: PropCategory): Promise<LookupResult<number>> {
    if (!this.logResolver) return unavailable();

    const log = this.logResolver.resolve(playerName);
    if (!log) return unavailable();

    const box = log[gameDate];
    if (!box) return unavailable();

    const value = box[categoryStatKey(category)];
    if (value === undefined || !Number.isFinite(value)) {
      return lookupError(`box score for ${playerName} on ${gameDate} has no ${categoryStatKey(category)}`);
    }
    return found(value);
  }

  async getDefenseProfile(teamAbbrev: string): Promise<OpponentDefenseProfile> {
    const row = this.defense[teamAbbrev.toUpperCase()];
    if (!row) return { ...LEAGUE_AVERAGE_DEFENSE };

    return {
      defRating: row.DEF_RATING ?? LEAGUE_AVERAGE_DEFENSE.defRating,
      pace: row.PACE ?? LEAGUE_AVERAGE_DEFENSE.pace,
      pointsAllowed: row.PTS_ALLOWED ?? LEAGUE_AVERAGE_DEFENSE.pointsAllowed,
    };
  }
}
