/**
 * The Odds API Adapter
 *
 * Fetches NBA events and player prop markets from The Odds API (v4).
 * Requires ODDS_API_KEY environment variable.
 */

import { z } from 'zod';
import { Game, OddsSource, PropLine } from './DataSourceAdapter';
import { PropCategory, categoryFromMarket, categoryMarket, parseSide } from '../src/props/prop-category';
import { normalizeBookmakerName } from '../lib/bookmaker-normalizer';
import { errMsg } from '../lib/errors';
import { addDays, sleep, utcDate } from '../src/utils/dates';

/** The subset of a fetch Response the adapter reads */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText?: string;
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
}

export type FetchFn = (url: string) => Promise<HttpResponse>;

export interface OddsApiConfig {
  baseUrl: string;
  sportKey: string;
  regions: string;
  timeoutMs: number;
  requestDelayMs: number;
  defaultOdds: number;
}

export const DEFAULT_ODDS_API_CONFIG: OddsApiConfig = {
  baseUrl: 'https://api.the-odds-api.com/v4',
  sportKey: 'basketball_nba',
  regions: 'us',
  timeoutMs: 15000,
  requestDelayMs: 300,
  defaultOdds: -110,
};

const eventSchema = z.object({
  id: z.string(),
  commence_time: z.string(),
  home_team: z.string(),
  away_team: z.string(),
});

const outcomeSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  price: z.number().optional(),
  point: z.number().optional(),
});

const eventOddsSchema = z.object({
  id: z.string(),
  bookmakers: z
    .array(
      z.object({
        key: z.string(),
        title: z.string().optional(),
        markets: z.array(z.object({ key: z.string(), outcomes: z.array(outcomeSchema) })).default([]),
      })
    )
    .default([]),
});

type OddsApiEventOdds = z.infer<typeof eventOddsSchema>;

const defaultFetch = (timeoutMs: number): FetchFn => (url: string) =>
  fetch(url, {
    method: 'GET',
    headers: { 'Accept': 'application/json' },
    signal: AbortSignal.timeout(timeoutMs),
  });

export class OddsApiAdapter implements OddsSource {
  private readonly config: OddsApiConfig;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly now: () => Date;

  constructor(
    config: Partial<OddsApiConfig> = {},
    deps: { apiKey?: string; fetchFn?: FetchFn; now?: () => Date } = {}
  ) {
    this.config = { ...DEFAULT_ODDS_API_CONFIG, ...config };

    this.apiKey = deps.apiKey ?? process.env.ODDS_API_KEY ?? '';
    if (!this.apiKey) {
      throw new Error(
        'ODDS_API_KEY environment variable is required for Odds API adapter.\n' +
        'Get your API key from https://the-odds-api.com and add it to your .env file.'
      );
    }

    this.baseUrl = (process.env.ODDS_API_BASE_URL || this.config.baseUrl).replace(/\/+$/, '');
    this.fetchFn = deps.fetchFn ?? defaultFetch(this.config.timeoutMs);
    this.now = deps.now ?? (() => new Date());
  }

  getName(): string {
    return 'The Odds API';
  }

  async isAvailable(): Promise<boolean> {
    return this.apiKey.length > 0;
  }

  private hide(url: string): string {
    return url.replace(this.apiKey, 'HIDDEN');
  }

  private logQuota(response: HttpResponse): void {
    const remaining = response.headers.get('x-requests-remaining');
    const used = response.headers.get('x-requests-used');
    if (remaining !== null || used !== null) {
      console.log(`   [ODDS_API] Quota: ${remaining ?? '?'} remaining, ${used ?? '?'} used`);
    }
  }

  private async getJson(url: string): Promise<unknown | null> {
    const response = await this.fetchFn(url);
    if (!response.ok) {
      console.error(`   [ODDS_API] ERROR ${response.status} ${response.statusText ?? ''} for ${this.hide(url)}`.trimEnd());
      return null;
    }
    this.logQuota(response);
    return response.json();
  }

  /**
   * Events whose UTC date falls in [yesterday, today + daysAhead]
   */
  async listUpcomingGames(daysAhead: number): Promise<Game[]> {
    const url = `${this.baseUrl}/sports/${this.config.sportKey}/events?apiKey=${this.apiKey}&dateFormat=iso`;
    console.log(`   [ODDS_API] Fetching events: ${this.hide(url)}`);

    let body: unknown;
    try {
      body = await this.getJson(url);
    } catch (error) {
      console.error(`   [ODDS_API] Error fetching events: ${errMsg(error)}`);
      return [];
    }
    if (body === null) return [];

    const parsed = z.array(eventSchema).safeParse(body);
    if (!parsed.success) {
      console.error(`   [ODDS_API] Unexpected events payload: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
      return [];
    }

    const today = utcDate(this.now());
    const from = addDays(today, -1);
    const to = addDays(today, daysAhead);

    const games: Game[] = [];
    for (const event of parsed.data) {
      const start = new Date(event.commence_time);
      if (Number.isNaN(start.getTime())) {
        console.warn(`   [ODDS_API] Skipping event ${event.id}: bad commence_time "${event.commence_time}"`);
        continue;
      }
      const day = utcDate(start);
      if (day < from || day > to) continue;

      games.push({
        id: event.id,
        homeTeam: event.home_team,
        awayTeam: event.away_team,
        startTimeUtc: event.commence_time,
      });
    }

    console.log(`   [ODDS_API] ${parsed.data.length} events returned, ${games.length} between ${from} and ${to}`);
    return games;
  }

  async listPropsForGame(game: Game, categories: readonly PropCategory[]): Promise<PropLine[]> {
    const markets = categories.map(categoryMarket).join(',');
    const url =
      `${this.baseUrl}/sports/${this.config.sportKey}/events/${game.id}/odds` +
      `?apiKey=${this.apiKey}&regions=${this.config.regions}&markets=${markets}&oddsFormat=american&dateFormat=iso`;

    let body: unknown;
    try {
      body = await this.getJson(url);
    } catch (error) {
      console.error(`   [ODDS_API] Error fetching props for ${game.awayTeam} @ ${game.homeTeam}: ${errMsg(error)}`);
      return [];
    } finally {
      await sleep(this.config.requestDelayMs);
    }
    if (body === null) return [];

    const parsed = eventOddsSchema.safeParse(body);
    if (!parsed.success) {
      console.error(`   [ODDS_API] Unexpected odds payload for event ${game.id}: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
      return [];
    }

    return this.parseEventProps(parsed.data, categories);
  }

  private parseEventProps(event: OddsApiEventOdds, categories: readonly PropCategory[]): PropLine[] {
    const wanted = new Set(categories);
    const lines: PropLine[] = [];

    for (const bookmaker of event.bookmakers) {
      const bookName = normalizeBookmakerName(bookmaker.title || bookmaker.key);

      for (const market of bookmaker.markets) {
        const category = categoryFromMarket(market.key);
        if (!category || !wanted.has(category)) continue;

        for (const outcome of market.outcomes) {
          const side = parseSide(outcome.name);
          if (!outcome.description || !side) continue;
          if (outcome.point === undefined || !Number.isFinite(outcome.point)) {
            console.warn(`   [ODDS_API] Skipping ${market.key} outcome without a line: ${outcome.description} ${outcome.name}`);
            continue;
          }

          lines.push({
            gameId: event.id,
            playerName: outcome.description,
            category,
            line: outcome.point,
            side,
            oddsAmerican: outcome.price ?? this.config.defaultOdds,
            bookmaker: bookName,
          });
        }
      }
    }

    return lines;
  }
}
