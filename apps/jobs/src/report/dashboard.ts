import * as fs from 'fs';
import * as path from 'path';
import { PropAnalysis } from '../props/types';
import { PROP_CATEGORIES, categoryLabel } from '../props/prop-category';
import { highlightKey } from '../props/prop-selection';
import {
  DailyRollup,
  PerformanceDocument,
  ROLLUP_BUCKETS,
  RollupBucket,
} from '../performance/performance';
import { PersistenceError, errMsg } from '../../lib/errors';

/**
 * Static HTML dashboard: overall record, yesterday/today boxes, top plays and
 * one table per category. Everything interpolated is escaped.
 */

export interface DashboardInput {
  generatedAt: Date;
  /** ET dates used for the daily boxes */
  today: string;
  yesterday: string;
  performance: PerformanceDocument;
  topPlays: readonly PropAnalysis[];
  displayProps: readonly PropAnalysis[];
  totalAnalyzed: number;
  valuePlayCount: number;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string | number): string {
  return String(value).replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

export const formatOdds = (odds: number): string => (odds > 0 ? `+${odds}` : `${odds}`);

const formatUnits = (units: number): string => `${units >= 0 ? '+' : ''}${units.toFixed(2)}u`;

const BUCKET_LABEL: Record<RollupBucket, string> = {
  top6: 'Top Plays',
  points: categoryLabel('points'),
  assists: categoryLabel('assists'),
  rebounds: categoryLabel('rebounds'),
  threes: categoryLabel('threes'),
};

function recordLine(r: Pick<DailyRollup, 'wins' | 'losses' | 'pushes'>): string {
  return r.pushes > 0 ? `${r.wins}-${r.losses}-${r.pushes}` : `${r.wins}-${r.losses}`;
}

function renderDayBox(title: string, date: string, perf: PerformanceDocument): string {
  const day = perf.daily[date];
  if (!day) {
    return `
      <div class="day-box">
        <h3>${escapeHtml(title)} <span class="date">${escapeHtml(date)}</span></h3>
        <p class="muted">No graded picks</p>
      </div>`;
  }

  const byType = perf.dailyByType[date];
  const rows = byType
    ? ROLLUP_BUCKETS.map(bucket => {
        const r = byType[bucket];
        return `<tr><td>${escapeHtml(BUCKET_LABEL[bucket])}</td><td>${escapeHtml(recordLine(r))}</td><td>${escapeHtml(formatUnits(r.units))}</td></tr>`;
      }).join('\n')
    : '';

  return `
      <div class="day-box">
        <h3>${escapeHtml(title)} <span class="date">${escapeHtml(date)}</span></h3>
        <p class="record">${escapeHtml(recordLine(day))} · ${escapeHtml(formatUnits(day.units))} · ROI ${escapeHtml(day.roi.toFixed(1))}%</p>
        <table class="buckets">
${rows}
        </table>
      </div>`;
}

function renderPropRow(prop: PropAnalysis, topKeys: ReadonlySet<string>): string {
  const star = topKeys.has(highlightKey(prop)) ? '<span class="star">★</span> ' : '';
  const insights = prop.insights.map(i => `<span class="tag">${escapeHtml(i)}</span>`).join(' ');
  return `<tr class="${prop.isValuePlay ? 'value' : ''}">
          <td>${star}${escapeHtml(prop.playerName)}<div class="sub">${escapeHtml(prop.team || '?')} vs ${escapeHtml(prop.opponent || '?')} · ${escapeHtml(prop.gameTime)}</div></td>
          <td>${escapeHtml(prop.side)} ${escapeHtml(prop.line)}</td>
          <td>${escapeHtml(formatOdds(prop.odds))}</td>
          <td>${escapeHtml(prop.bookmaker)}</td>
          <td>${escapeHtml(prop.score.toFixed(1))}</td>
          <td>${escapeHtml(prop.ev.toFixed(1))}%</td>
          <td>${escapeHtml(prop.winProbability)}%</td>
          <td>${insights}</td>
        </tr>`;
}

function renderTopPlay(prop: PropAnalysis): string {
  return `
      <div class="top-play">
        <div class="player">${escapeHtml(prop.playerName)}</div>
        <div class="pick">${escapeHtml(prop.side)} ${escapeHtml(prop.line)} ${escapeHtml(categoryLabel(prop.category))} (${escapeHtml(formatOdds(prop.odds))}, ${escapeHtml(prop.bookmaker)})</div>
        <div class="meta">Score ${escapeHtml(prop.score.toFixed(1))} · Pred ${escapeHtml(prop.prediction.toFixed(1))} · Win ${escapeHtml(prop.winProbability)}%</div>
      </div>`;
}

export function renderDashboard(input: DashboardInput): string {
  const { performance: perf } = input;
  const topKeys = new Set(input.topPlays.map(highlightKey));

  const sections = PROP_CATEGORIES.map(category => {
    const props = input.displayProps.filter(p => p.category === category);
    if (props.length === 0) return '';
    return `
    <section class="category">
      <h2>${escapeHtml(categoryLabel(category))} <span class="count">${props.length}</span></h2>
      <table>
        <thead><tr><th>Player</th><th>Pick</th><th>Odds</th><th>Book</th><th>Score</th><th>EV</th><th>Win</th><th>Insights</th></tr></thead>
        <tbody>
        ${props.map(p => renderPropRow(p, topKeys)).join('\n        ')}
        </tbody>
      </table>
    </section>`;
  }).join('');

  const topPlays = input.topPlays.length > 0
    ? input.topPlays.map(renderTopPlay).join('')
    : '\n      <p class="muted">No value plays today</p>';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>NBA Props Dashboard</title>
  <style>
    body { font-family: -apple-system, "Segoe UI", Roboto, sans-serif; margin: 0; background: #0f172a; color: #e2e8f0; }
    header, main { max-width: 1100px; margin: 0 auto; padding: 16px; }
    h1 { margin: 0 0 4px; }
    .muted, .sub, .date { color: #94a3b8; font-size: 0.85em; }
    .summary, .days, .top-plays { display: flex; gap: 12px; flex-wrap: wrap; margin: 12px 0; }
    .stat, .day-box, .top-play { background: #1e293b; border-radius: 8px; padding: 12px; flex: 1 1 200px; }
    table { width: 100%; border-collapse: collapse; }
    th, td { text-align: left; padding: 6px 8px; border-bottom: 1px solid #334155; vertical-align: top; }
    tr.value td { background: #14532d33; }
    .tag { background: #334155; border-radius: 4px; padding: 1px 6px; font-size: 0.8em; white-space: nowrap; }
    .star { color: #facc15; }
  </style>
</head>
<body>
  <header>
    <h1>NBA Props Dashboard</h1>
    <div class="muted">Updated ${escapeHtml(input.generatedAt.toISOString())} · ${escapeHtml(input.totalAnalyzed)} props analysed · ${escapeHtml(input.valuePlayCount)} value plays</div>
  </header>
  <main>
    <section class="summary">
      <div class="stat"><div class="muted">Record</div><div>${escapeHtml(perf.wins)}-${escapeHtml(perf.losses)}</div></div>
      <div class="stat"><div class="muted">Units</div><div>${escapeHtml(formatUnits(perf.units))}</div></div>
      <div class="stat"><div class="muted">ROI</div><div>${escapeHtml(perf.roi.toFixed(1))}%</div></div>
      <div class="stat"><div class="muted">Graded bets</div><div>${escapeHtml(perf.totalBets)}</div></div>
    </section>
    <section class="days">${renderDayBox('Yesterday', input.yesterday, perf)}${renderDayBox('Today', input.today, perf)}
    </section>
    <h2>Top Plays</h2>
    <section class="top-plays">${topPlays}
    </section>${sections}
  </main>
</body>
</html>
`;
}

export function writeDashboard(filePath: string, html: string): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, html, 'utf-8');
  } catch (error) {
    throw new PersistenceError(filePath, `Could not write dashboard: ${errMsg(error)}`, { cause: error });
  }
}
