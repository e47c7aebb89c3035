/**
 * Mock Odds Adapter
 *
 * Reads games and props from games.json / props.json in a local snapshot
 * directory. Used for offline runs and testing without spending API quota.
 */

import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { Game, OddsSource, PropLine } from './DataSourceAdapter';
import { PropCategory, normalizePropCategory, parseSide } from '../src/props/prop-category';
import { normalizeBookmakerName } from '../lib/bookmaker-normalizer';
import { ConfigError, errMsg } from '../lib/errors';

export interface MockOddsConfig {
  dataPath: string;
  gamesFile: string;
  propsFile: string;
  defaultOdds: number;
}

const gamesFileSchema = z.object({
  games: z.array(
    z.object({
      id: z.string(),
      homeTeam: z.string(),
      awayTeam: z.string(),
      startTimeUtc: z.string(),
    })
  ),
});

const propsFileSchema = z.object({
  props: z.array(
    z.object({
      gameId: z.string(),
      playerName: z.string(),
      category: z.string(),
      line: z.number(),
      side: z.string(),
      oddsAmerican: z.number().optional(),
      bookmaker: z.string().optional(),
    })
  ),
});

export class MockOddsAdapter implements OddsSource {
  private readonly config: MockOddsConfig;

  constructor(config: Partial<MockOddsConfig> & { dataPath: string }) {
    this.config = {
      gamesFile: 'games.json',
      propsFile: 'props.json',
      defaultOdds: -110,
      ...config,
    };
  }

  getName(): string {
    return 'Mock Odds Snapshot';
  }

  async isAvailable(): Promise<boolean> {
    return existsSync(path.join(this.config.dataPath, this.config.gamesFile));
  }

  private readFile<T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
    const filePath = path.join(this.config.dataPath, fileName);
    if (!existsSync(filePath)) {
      console.warn(`[MockOddsAdapter] ${fileName} not found at ${filePath}`);
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Could not parse ${filePath}: ${errMsg(error)}`, { cause: error });
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid ${fileName}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return parsed.data;
  }

  /**
   * Every game in the snapshot; the snapshot itself defines the window
   */
  async listUpcomingGames(_daysAhead: number): Promise<Game[]> {
    return this.readFile(this.config.gamesFile, gamesFileSchema)?.games ?? [];
  }

  async listPropsForGame(game: Game, categories: readonly PropCategory[]): Promise<PropLine[]> {
    const data = this.readFile(this.config.propsFile, propsFileSchema);
    if (!data) return [];

    const wanted = new Set(categories);
    const lines: PropLine[] = [];

    for (const row of data.props) {
      if (row.gameId !== game.id) continue;

      const category = normalizePropCategory(row.category);
      const side = parseSide(row.side);
      if (!side || !wanted.has(category)) continue;

      lines.push({
        gameId: row.gameId,
        playerName: row.playerName,
        category,
        line: row.line,
        side,
        oddsAmerican: row.oddsAmerican ?? this.config.defaultOdds,
        bookmaker: normalizeBookmakerName(row.bookmaker),
      });
    }

    return lines;
  }
}
