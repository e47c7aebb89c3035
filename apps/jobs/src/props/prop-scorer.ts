/**
 * Prop Scorer
 *
 * Multi-factor model that turns a player's stat profile, a posted line and the
 * opponent's defensive context into a 0-10 score, a point prediction, an
 * expected-value estimate and a win probability.
 *
 * Score = base 4.0
 *   + season edge ladder      (up to +3.5)
 *   + recent form ladder      (up to +2.5)
 *   + per-36 efficiency       (up to +1.5)
 *   + consistency             (up to +0.8)
 *   + opponent defense        (-0.5 .. +1.0)
 *   + shooting efficiency     (up to +0.8, points/threes only)
 * clamped to [0, 10].
 */

import {
  LEAGUE_AVERAGE_DEFENSE,
  OpponentDefenseProfile,
  PlayerStatProfile,
} from '../../adapters/DataSourceAdapter';
import { Ladder, ScoringConfig, minScoreFor } from '../config/scoring-config';
import { errMsg } from '../../lib/errors';
import { PropCategory, Side } from './prop-category';
import { PropAnalysis, PropContext } from './types';

export interface ExpectedValue {
  /** EV per unit staked, in percent */
  ev: number;
  /** Model win probability, integer percent */
  winProbability: number;
}

const round1 = (x: number): number => Math.round(x * 10) / 10;

function ladderBonus(ladder: Ladder, value: number): number {
  for (const [threshold, bonus] of ladder) {
    if (value >= threshold) return bonus;
  }
  return 0;
}

function sideEdges(stats: PlayerStatProfile, line: number, side: Side): { season: number; recent: number } {
  if (side === 'Under') {
    return { season: line - stats.seasonAvg, recent: line - stats.last10Avg };
  }
  return { season: stats.seasonAvg - line, recent: stats.last10Avg - line };
}

function assertFinite(label: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new Error(`${label} is not a finite number (${value})`);
  }
}

export class PropScorer {
  private readonly config: ScoringConfig;

  constructor(config: ScoringConfig) {
    this.config = config;
  }

  /**
   * Opponent pace-adjusted defensive factor relative to league average
   */
  defenseFactor(defense: OpponentDefenseProfile | undefined): number {
    const d = defense ?? LEAGUE_AVERAGE_DEFENSE;
    return (d.defRating / this.config.leagueDefRating) * (d.pace / this.config.leaguePace);
  }

  /**
   * 0-10 score for one side of a prop; 0.0 means disqualified
   */
  computeScore(
    stats: PlayerStatProfile,
    category: PropCategory,
    line: number,
    side: Side,
    defense?: OpponentDefenseProfile
  ): number {
    const cfg = this.config;

    if (stats.gamesPlayed < cfg.minGamesPlayed || stats.minutes < cfg.minMinutes) {
      return 0.0;
    }

    const edges = sideEdges(stats, line, side);

    const minEdge = side === 'Under' ? cfg.minEdge[category].under : cfg.minEdge[category].over;
    const gate = minEdge * cfg.edgeGateFraction;
    if (edges.season < gate && edges.recent < gate) {
      return 0.0;
    }

    let score = cfg.baseScore;

    score += ladderBonus(cfg.seasonEdgeLadder[category], edges.season);
    score += ladderBonus(cfg.recentFormLadder, edges.recent);

    if (stats.minutes > 0) {
      const per36 = (stats.seasonAvg / stats.minutes) * 36.0;
      score += ladderBonus(cfg.per36Ladder[category], per36);
    }

    if (stats.seasonAvg > 0) {
      const drift = Math.abs(stats.last10Avg - stats.seasonAvg) / stats.seasonAvg;
      const consistency = 1.0 - Math.min(drift, 1.0);
      score += consistency * cfg.consistencyWeight;
    }

    score += this.defenseAdjustment(this.defenseFactor(defense), side);

    if (category === 'points' || category === 'threes') {
      if (stats.fgPct >= 0.48) score += 0.5;
      else if (stats.fgPct >= 0.45) score += 0.3;

      if (category === 'threes' && stats.fg3Pct >= 0.37) score += 0.3;
    }

    return round1(Math.max(0.0, Math.min(score, 10.0)));
  }

  private defenseAdjustment(factor: number, side: Side): number {
    if (side === 'Over') {
      // Soft defense / fast pace helps overs
      if (factor > 1.05) return 1.0;
      if (factor > 1.02) return 0.5;
      if (factor < 0.95) return -0.5;
      return 0;
    }
    if (factor < 0.95) return 1.0;
    if (factor < 0.98) return 0.5;
    if (factor > 1.05) return -0.5;
    return 0;
  }

  /**
   * EV against the posted price using the model's win probability.
   *
   * true_prob = 0.50 + score bonus (score 7..10 → up to 15%) + edge bonus
   * (|edge| 0..2 → up to 15%), clamped to 40-70%.
   */
  computeExpectedValue(score: number, edge: number, odds: number, _side: Side): ExpectedValue {
    let payoutRatio: number;
    if (odds < 0) {
      payoutRatio = 100 / Math.abs(odds);
    } else {
      payoutRatio = odds / 100;
    }

    const scoreBonus = Math.min(Math.max(0, (score - 7.0) / 3.0), 1.0) * 0.15;
    const edgeBonus = Math.min(Math.abs(edge) / 2.0, 1.0) * 0.15;
    const trueProb = Math.max(0.4, Math.min(0.5 + scoreBonus + edgeBonus, 0.7));

    const ev = (trueProb * payoutRatio - (1 - trueProb)) * 100;
    return { ev: round1(ev), winProbability: Math.round(trueProb * 100) };
  }

  /**
   * Point estimate: 40% season / 60% last 10, nudged 5% toward the per-36
   * rate, scaled by the opponent factor (capped at ±10%)
   */
  computePrediction(
    stats: PlayerStatProfile,
    _category: PropCategory,
    _side: Side,
    defense?: OpponentDefenseProfile
  ): number {
    let prediction = stats.seasonAvg * 0.4 + stats.last10Avg * 0.6;

    if (stats.minutes > 0) {
      const per36 = (stats.seasonAvg / stats.minutes) * 36.0;
      prediction = prediction * 0.95 + per36 * 0.05;
    }

    const opponentMultiplier = Math.max(0.9, Math.min(this.defenseFactor(defense), 1.1));
    prediction *= opponentMultiplier;

    return round1(prediction);
  }

  /**
   * Full analysis of one side of a prop. Returns null (and logs) if anything
   * about the inputs prevents scoring; the caller just drops the prop.
   */
  analyze(
    context: PropContext,
    stats: PlayerStatProfile,
    category: PropCategory,
    line: number,
    odds: number,
    side: Side,
    defense?: OpponentDefenseProfile
  ): PropAnalysis | null {
    try {
      assertFinite('line', line);
      assertFinite('odds', odds);
      assertFinite('seasonAvg', stats.seasonAvg);
      assertFinite('last10Avg', stats.last10Avg);
      assertFinite('minutes', stats.minutes);
      assertFinite('gamesPlayed', stats.gamesPlayed);

      const prediction = this.computePrediction(stats, category, side, defense);
      const score = this.computeScore(stats, category, line, side, defense);
      const rawEdge = side === 'Under' ? line - prediction : prediction - line;
      const { ev, winProbability } = this.computeExpectedValue(score, rawEdge, odds, side);
      const edge = round1(rawEdge);

      return {
        ...context,
        category,
        line,
        odds,
        side,
        prediction,
        edge,
        score,
        ev,
        winProbability,
        seasonAvg: stats.seasonAvg,
        last10Avg: stats.last10Avg,
        gamesPlayed: stats.gamesPlayed,
        isValuePlay: score >= minScoreFor(this.config, category),
        insights: this.buildInsights(stats, edge, prediction, side, defense),
      };
    } catch (error) {
      console.warn(`[PROP_SCORER] Skipping ${context.playerName} ${category} ${side} ${line}: ${errMsg(error)}`);
      return null;
    }
  }

  private buildInsights(
    stats: PlayerStatProfile,
    edge: number,
    prediction: number,
    side: Side,
    defense: OpponentDefenseProfile | undefined
  ): string[] {
    const insights: string[] = [];
    const { last10Avg, seasonAvg } = stats;

    if (side === 'Over') {
      if (last10Avg > seasonAvg * 1.1) insights.push('Hot Streak');
      else if (last10Avg < seasonAvg * 0.9) insights.push('Cold Streak');
    } else if (last10Avg < seasonAvg * 0.9) {
      insights.push('Trending Down');
    }

    if (Math.abs(edge) >= 1.5) {
      insights.push(`Edge: ${edge >= 0 ? '+' : ''}${edge.toFixed(1)}`);
    }

    insights.push(`Model: ${prediction.toFixed(1)}`);

    if (defense) {
      if (defense.defRating >= this.config.weakDefRating) insights.push('Weak DEF Matchup');
      else if (defense.defRating <= this.config.toughDefRating) insights.push('Tough DEF Matchup');
    }

    return insights;
  }
}
