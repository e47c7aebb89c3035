/**
 * Data source contracts
 *
 * Defines what the prop jobs need from the outside world: upcoming games and
 * their player props, player stat profiles and final box-score stats, and
 * opponent defensive profiles. Concrete adapters live beside this file.
 */

import { PropCategory, Side } from '../src/props/prop-category';

export interface Game {
  id: string;
  homeTeam: string;
  awayTeam: string;
  /** ISO-8601 commence time as published by the sportsbook feed */
  startTimeUtc: string;
}

export interface PropLine {
  gameId: string;
  playerName: string;
  category: PropCategory;
  line: number;
  side: Side;
  oddsAmerican: number;
  bookmaker: string;
}

export interface PlayerStatProfile {
  seasonAvg: number;
  last10Avg: number;
  last5Avg?: number;
  minutes: number;
  gamesPlayed: number;
  fgPct: number;
  fg3Pct: number;
  /** Team abbreviation, when the stats source knows it */
  team?: string;
}

export interface OpponentDefenseProfile {
  defRating: number;
  pace: number;
  pointsAllowed: number;
}

export const LEAGUE_AVERAGE_DEFENSE: Readonly<OpponentDefenseProfile> = Object.freeze({
  defRating: 110.0,
  pace: 100.0,
  pointsAllowed: 110.0,
});

/**
 * Result of a lookup that may legitimately come back empty.
 * Every non-found outcome is treated as retryable by the grading job.
 */
export type LookupResult<T> =
  | { status: 'found'; value: T }
  | { status: 'unavailable' }
  | { status: 'error'; reason: string };

export const found = <T>(value: T): LookupResult<T> => ({ status: 'found', value });
export const unavailable = <T>(): LookupResult<T> => ({ status: 'unavailable' });
export const lookupError = <T>(reason: string): LookupResult<T> => ({ status: 'error', reason });

export interface OddsSource {
  /**
   * Games from yesterday through today + daysAhead that have lines posted
   */
  listUpcomingGames(daysAhead: number): Promise<Game[]>;

  /**
   * Player props (one entry per side per bookmaker) for a single game
   */
  listPropsForGame(game: Game, categories: readonly PropCategory[]): Promise<PropLine[]>;

  getName(): string;

  isAvailable(): Promise<boolean>;
}

export interface PlayerStatsSource {
  /**
   * Season/recent profile for the stat backing this category, or null when
   * the player cannot be resolved
   */
  getStatsProfile(playerName: string, category: PropCategory): Promise<PlayerStatProfile | null>;

  /**
   * Final box-score value for the player on a game date (YYYY-MM-DD, ET)
   */
  getFinalStat(playerName: string, gameDate: string, category: PropCategory): Promise<LookupResult<number>>;
}

export interface DefenseSource {
  /**
   * Defensive profile for a team abbreviation; league averages when unknown
   */
  getDefenseProfile(teamAbbrev: string): Promise<OpponentDefenseProfile>;
}

export interface AdapterConfig {
  provider: string;
  enabled: boolean;
  config: Record<string, unknown>;
}

export interface DataSourcesConfig {
  adapters: Record<string, AdapterConfig>;
  defaultOddsAdapter: string;
  statsAdapter: string;
}
