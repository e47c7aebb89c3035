import { PropCategory, Side } from './prop-category';

/**
 * Who/when context for a prop, resolved by the pipeline before scoring
 */
export interface PropContext {
  playerName: string;
  team: string;
  opponent: string;
  homeTeam: string;
  awayTeam: string;
  /** Display label, e.g. "Tue, Oct 21 • 07:30 PM ET" */
  gameTime: string;
  /** ET calendar date of tip-off, YYYY-MM-DD */
  gameDate: string;
  bookmaker: string;
}

export interface PropAnalysis extends PropContext {
  category: PropCategory;
  line: number;
  odds: number;
  side: Side;

  prediction: number;
  edge: number;
  score: number;
  ev: number;
  winProbability: number;

  seasonAvg: number;
  last10Avg: number;
  gamesPlayed: number;

  isValuePlay: boolean;
  insights: string[];
}
