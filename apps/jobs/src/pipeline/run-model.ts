/**
 * Daily prop model run
 *
 * games → props → score both sides of every unique line → value plays,
 * display set and top plays → track → grade → backfill → aggregate →
 * dashboard → props history.
 *
 * Sources and the clock are injected. Each persistence step is guarded on its
 * own: a failed write is logged and recorded in the summary and the run keeps
 * going with what it has in memory. A pick store that cannot be read is never
 * overwritten.
 */

import {
  DefenseSource,
  Game,
  LEAGUE_AVERAGE_DEFENSE,
  OddsSource,
  OpponentDefenseProfile,
  PlayerStatProfile,
  PlayerStatsSource,
  PropLine,
} from '../../adapters/DataSourceAdapter';
import { PROP_CATEGORIES, PropCategory } from '../props/prop-category';
import { PropScorer } from '../props/prop-scorer';
import { PropAnalysis, PropContext } from '../props/types';
import {
  byScoreDesc,
  dedupeBestSide,
  highlightKey,
  selectDisplayProps,
  selectDiverseTopPlays,
} from '../props/prop-selection';
import { loadPropsHistory, recordPropsForDate, savePropsHistory } from '../props/props-history';
import { RunSettings, ScoringConfig } from '../config/scoring-config';
import { loadPickStore, savePickStore } from '../tracking/pick-store';
import { trackNewPicks } from '../tracking/pick-tracker';
import { GradeCounts, backfillProfitLoss, gradePendingPicks } from '../grading/grading-service';
import {
  PerformanceDocument,
  buildPerformanceDocument,
  emptyPerformanceDocument,
  loadPerformanceDocument,
  savePerformanceDocument,
} from '../performance/performance';
import { renderDashboard, writeDashboard } from '../report/dashboard';
import { teamAbbreviation } from '../../config/team_abbreviations';
import { addDays, easternDate, easternDateOfIso, formatGameTime } from '../utils/dates';
import { PersistenceError, errMsg } from '../../lib/errors';

export interface PipelineSources {
  odds: OddsSource;
  stats: PlayerStatsSource;
  defense: DefenseSource;
}

export interface PipelinePaths {
  picksFile: string;
  performanceFile: string;
  historyFile: string;
  dashboardFile: string;
}

export interface PipelineOptions {
  scoring: ScoringConfig;
  run: RunSettings;
  paths: PipelinePaths;
  now: Date;
  categories?: readonly PropCategory[];
  /** Track only; leave pending picks for a separate grading run */
  skipGrading?: boolean;
  verbose?: boolean;
}

export interface RunSummary {
  games: number;
  props: number;
  uniqueLines: number;
  unresolvedPlayers: number;
  analyzed: number;
  valuePlays: number;
  displayed: number;
  topPlays: PropAnalysis[];
  tracked: number;
  grade: GradeCounts | null;
  backfilled: number;
  performance: PerformanceDocument;
  persistenceErrors: string[];
}

interface LineGroup {
  game: Game;
  playerName: string;
  category: PropCategory;
  bookmaker: string;
  line: number;
  over?: PropLine;
  under?: PropLine;
}

/**
 * One group per player/category/bookmaker/line carrying both sides' odds
 */
export function groupLines(entries: ReadonlyArray<{ game: Game; line: PropLine }>): LineGroup[] {
  const groups = new Map<string, LineGroup>();

  for (const { game, line } of entries) {
    const key = `${line.playerName}|${line.category}|${line.bookmaker}|${line.line}`;
    let group = groups.get(key);
    if (!group) {
      group = {
        game,
        playerName: line.playerName,
        category: line.category,
        bookmaker: line.bookmaker,
        line: line.line,
      };
      groups.set(key, group);
    }
    if (line.side === 'Over' && !group.over) group.over = line;
    if (line.side === 'Under' && !group.under) group.under = line;
  }

  return Array.from(groups.values());
}

/**
 * The game the player is actually in: the prop's own game when the player's
 * team plays in it, otherwise the first listed game featuring that team.
 */
function resolveGame(propGame: Game, teamAbbrev: string | undefined, games: readonly Game[]): Game {
  if (!teamAbbrev) return propGame;
  const playsIn = (g: Game) =>
    teamAbbreviation(g.homeTeam) === teamAbbrev || teamAbbreviation(g.awayTeam) === teamAbbrev;
  if (playsIn(propGame)) return propGame;
  return games.find(playsIn) ?? propGame;
}

function buildContext(group: LineGroup, game: Game, teamAbbrev: string | undefined, today: string): PropContext {
  const homeAbbrev = teamAbbreviation(game.homeTeam);
  const awayAbbrev = teamAbbreviation(game.awayTeam);

  let team = teamAbbrev ?? '';
  let opponent = game.awayTeam;
  if (teamAbbrev && teamAbbrev === homeAbbrev) {
    team = game.homeTeam;
    opponent = game.awayTeam;
  } else if (teamAbbrev && teamAbbrev === awayAbbrev) {
    team = game.awayTeam;
    opponent = game.homeTeam;
  }

  return {
    playerName: group.playerName,
    team,
    opponent,
    homeTeam: game.homeTeam,
    awayTeam: game.awayTeam,
    gameTime: formatGameTime(game.startTimeUtc),
    gameDate: easternDateOfIso(game.startTimeUtc) ?? today,
    bookmaker: group.bookmaker,
  };
}

async function fetchLines(
  odds: OddsSource,
  games: readonly Game[],
  categories: readonly PropCategory[],
  verbose: boolean
): Promise<Array<{ game: Game; line: PropLine }>> {
  const entries: Array<{ game: Game; line: PropLine }> = [];
  for (const [i, game] of games.entries()) {
    const lines = await odds.listPropsForGame(game, categories);
    if (verbose) {
      console.log(`   Game ${i + 1}/${games.length}: ${game.awayTeam} @ ${game.homeTeam} → ${lines.length} props`);
    }
    for (const line of lines) entries.push({ game, line });
  }
  return entries;
}

/**
 * Score both sides of each line group. Players the stats source cannot
 * resolve, or with too few games, are skipped. A failed defense lookup falls
 * back to league average.
 */
export async function analyzeLines(
  groups: readonly LineGroup[],
  games: readonly Game[],
  sources: Pick<PipelineSources, 'stats' | 'defense'>,
  scorer: PropScorer,
  options: { scoring: ScoringConfig; defaultOdds: number; today: string }
): Promise<{ analyzed: PropAnalysis[]; unresolvedPlayers: number }> {
  const analyzed: PropAnalysis[] = [];
  const unresolved = new Set<string>();

  for (const group of groups) {
    let stats: PlayerStatProfile | null;
    try {
      stats = await sources.stats.getStatsProfile(group.playerName, group.category);
    } catch (error) {
      console.warn(`[RUN_PROPS] Stats lookup failed for ${group.playerName}: ${errMsg(error)}`);
      stats = null;
    }
    if (!stats) {
      unresolved.add(group.playerName);
      continue;
    }
    if (stats.gamesPlayed < options.scoring.minGamesPlayed) continue;

    const game = resolveGame(group.game, stats.team, games);
    const context = buildContext(group, game, stats.team, options.today);
    let defense: OpponentDefenseProfile;
    try {
      defense = await sources.defense.getDefenseProfile(teamAbbreviation(context.opponent));
    } catch (error) {
      console.warn(`[RUN_PROPS] Defense lookup failed for ${context.opponent}: ${errMsg(error)}; using league average`);
      defense = { ...LEAGUE_AVERAGE_DEFENSE };
    }

    const overOdds = group.over?.oddsAmerican ?? options.defaultOdds;
    const underOdds = group.under?.oddsAmerican ?? options.defaultOdds;

    const over = scorer.analyze(context, stats, group.category, group.line, overOdds, 'Over', defense);
    if (over) analyzed.push(over);
    const under = scorer.analyze(context, stats, group.category, group.line, underOdds, 'Under', defense);
    if (under) analyzed.push(under);
  }

  return { analyzed, unresolvedPlayers: unresolved.size };
}

type Guarded<T> = { ok: true; value: T } | { ok: false };

function guard<T>(errors: string[], step: string, fn: () => T): Guarded<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    if (!(error instanceof PersistenceError)) throw error;
    console.error(`❌ [PERSIST] ${step} failed: ${error.message}`);
    errors.push(`${step}: ${errMsg(error)}`);
    return { ok: false };
  }
}

export async function runPropModel(sources: PipelineSources, options: PipelineOptions): Promise<RunSummary> {
  const { run, scoring, paths, now } = options;
  const verbose = options.verbose ?? false;
  const categories = options.categories ?? PROP_CATEGORIES;
  const today = easternDate(now);
  const persistenceErrors: string[] = [];

  console.log('📋 Step 1: Fetching games...');
  const games = await sources.odds.listUpcomingGames(run.daysAhead);
  console.log(`   Found ${games.length} game(s) from ${sources.odds.getName()}`);

  console.log('📋 Step 2: Fetching player props...');
  const entries = await fetchLines(sources.odds, games, categories, verbose);
  const groups = groupLines(entries);
  console.log(`   ${entries.length} prop lines, ${groups.length} unique player/prop/book/line combinations`);

  console.log('📋 Step 3: Analyzing props (Over + Under)...');
  const scorer = new PropScorer(scoring);
  const { analyzed, unresolvedPlayers } = await analyzeLines(groups, games, sources, scorer, {
    scoring,
    defaultOdds: run.defaultOdds,
    today,
  });
  if (unresolvedPlayers > 0) {
    console.warn(`   [STATS] ${unresolvedPlayers} player(s) not found in stats source, skipped`);
  }

  const valueProps = analyzed.filter(p => p.isValuePlay);
  const displayProps = selectDisplayProps(valueProps, analyzed, run.targetMinDisplay, run.minDisplayPerType);
  const topPlays = selectDiverseTopPlays(dedupeBestSide(displayProps).sort(byScoreDesc), run.topPlaysCount);
  const topKeys = new Set(topPlays.map(highlightKey));
  console.log(`   Analyzed ${analyzed.length}, ${valueProps.length} value plays, ${displayProps.length} displayed, ${topPlays.length} top plays`);

  console.log('📋 Step 4: Tracking & grading picks...');
  const loaded = guard(persistenceErrors, 'load pick store', () => loadPickStore(paths.picksFile));

  let tracked = 0;
  let grade: GradeCounts | null = null;
  let backfilled = 0;
  let performance: PerformanceDocument;

  if (loaded.ok) {
    const picks = loaded.value;
    tracked = trackNewPicks(picks, valueProps, topKeys, { today, now, defaultOdds: run.defaultOdds });
    console.log(`   Tracked ${tracked} new pick(s)`);
    guard(persistenceErrors, 'save pick store', () => savePickStore(paths.picksFile, picks));

    if (!options.skipGrading) {
      grade = await gradePendingPicks(picks, sources.stats, {
        today,
        now,
        delayMs: run.gradingDelayMs,
        verbose,
      });
      backfilled = backfillProfitLoss(picks);
      console.log(
        `   Graded ${grade.graded} (W ${grade.wins} / L ${grade.losses} / P ${grade.pushes}), ` +
        `${grade.skipped} awaiting stats, ${grade.errors} lookup errors, ${backfilled} P/L backfilled`
      );
      guard(persistenceErrors, 'save graded pick store', () => savePickStore(paths.picksFile, picks));
    }

    const rebuilt = buildPerformanceDocument(picks, now);
    guard(persistenceErrors, 'save performance', () => savePerformanceDocument(paths.performanceFile, rebuilt));
    performance = rebuilt;
  } else {
    console.warn('   Pick store unreadable; skipping tracking and grading');
    const previous = guard(persistenceErrors, 'load performance', () => loadPerformanceDocument(paths.performanceFile));
    performance = previous.ok ? previous.value : emptyPerformanceDocument();
  }

  console.log('📋 Step 5: Rendering dashboard...');
  const html = renderDashboard({
    generatedAt: now,
    today,
    yesterday: addDays(today, -1),
    performance,
    topPlays,
    displayProps,
    totalAnalyzed: analyzed.length,
    valuePlayCount: valueProps.length,
  });
  if (guard(persistenceErrors, 'write dashboard', () => writeDashboard(paths.dashboardFile, html)).ok) {
    console.log(`   Wrote ${paths.dashboardFile}`);
  }

  console.log('📋 Step 6: Saving props history...');
  guard(persistenceErrors, 'save props history', () => {
    const history = loadPropsHistory(paths.historyFile);
    recordPropsForDate(history, today, analyzed);
    savePropsHistory(paths.historyFile, history);
  });

  return {
    games: games.length,
    props: entries.length,
    uniqueLines: groups.length,
    unresolvedPlayers,
    analyzed: analyzed.length,
    valuePlays: valueProps.length,
    displayed: displayProps.length,
    topPlays,
    tracked,
    grade,
    backfilled,
    performance,
    persistenceErrors,
  };
}

/**
 * Grading-only pass over an existing pick store: grade → backfill → save →
 * aggregate → save.
 */
export async function runGrading(
  stats: PlayerStatsSource,
  options: { paths: Pick<PipelinePaths, 'picksFile' | 'performanceFile'>; now: Date; delayMs: number; verbose?: boolean }
): Promise<{ grade: GradeCounts; backfilled: number; performance: PerformanceDocument; persistenceErrors: string[] }> {
  const today = easternDate(options.now);
  const persistenceErrors: string[] = [];

  const store = loadPickStore(options.paths.picksFile);
  const grade = await gradePendingPicks(store, stats, {
    today,
    now: options.now,
    delayMs: options.delayMs,
    verbose: options.verbose,
  });
  const backfilled = backfillProfitLoss(store);
  guard(persistenceErrors, 'save pick store', () => savePickStore(options.paths.picksFile, store));

  const performance = buildPerformanceDocument(store, options.now);
  guard(persistenceErrors, 'save performance', () => savePerformanceDocument(options.paths.performanceFile, performance));

  return { grade, backfilled, performance, persistenceErrors };
}
