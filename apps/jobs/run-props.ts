#!/usr/bin/env node
import * as dotenv from 'dotenv';
dotenv.config();

import * as path from 'path';
import { Command } from 'commander';
import { AdapterFactory } from './adapters/AdapterFactory';
import { loadPlayerAliases } from './adapters/PlayerResolver';
import { loadScoringConfig } from './src/config/scoring-config';
import { runPropModel } from './src/pipeline/run-model';
import { PropCategory, categoryLabel } from './src/props/prop-category';
import {
  dataPaths,
  isVerbose,
  parseCategoriesOption,
  parseIntOption,
  resolveConfigDir,
  resolveDataDir,
} from './lib/job-context';

/**
 * Daily props job
 * - Pulls upcoming games and player props, scores both sides of every line
 * - Tracks value plays, grades finished picks, rebuilds performance
 * - Writes the dashboard and the day's props history
 */

interface RunPropsOptions {
  oddsSource?: string;
  daysAhead?: number;
  topPlays?: number;
  categories?: PropCategory[];
  dataDir?: string;
  snapshotDir?: string;
  statsDir?: string;
  output?: string;
  skipGrading?: boolean;
  verbose?: boolean;
}

async function main() {
  const program = new Command();

  program
    .name('run-props')
    .description('Score NBA player props, track and grade picks, render the dashboard')
    .option('--odds-source <name>', 'Odds adapter from datasources.yml (default: defaultOddsAdapter)')
    .option('--days-ahead <n>', 'Days past today to include', parseIntOption)
    .option('--top-plays <n>', 'Number of highlighted top plays', parseIntOption)
    .option('--categories <list>', 'Comma-separated prop categories', parseCategoriesOption)
    .option('--data-dir <dir>', 'Directory for pick store, performance and history files')
    .option('--snapshot-dir <dir>', 'Snapshot directory for the mock odds adapter')
    .option('--stats-dir <dir>', 'Directory with player_stats.json, game_logs.json, team_defense.json')
    .option('--output <file>', 'Dashboard HTML path', path.join('public', 'index.html'))
    .option('--skip-grading', 'Track new picks only')
    .option('--verbose', 'Per-game and per-pick logging');

  program.parse(process.argv);
  const opts = program.opts<RunPropsOptions>();
  const verbose = isVerbose(opts.verbose);

  console.log('🏀 NBA Props Job');

  const configDir = resolveConfigDir();
  const config = loadScoringConfig(configDir);
  const run = {
    ...config.run,
    ...(opts.daysAhead !== undefined && { daysAhead: opts.daysAhead }),
    ...(opts.topPlays !== undefined && { topPlaysCount: opts.topPlays }),
  };
  const dataDir = resolveDataDir(opts.dataDir);
  console.log(`   config=${configDir} data=${dataDir} daysAhead=${run.daysAhead} topPlays=${run.topPlaysCount}`);

  const factory = AdapterFactory.fromFile(path.join(configDir, 'datasources.yml'), {
    snapshotDir: opts.snapshotDir,
    statsDir: opts.statsDir,
    requestDelayMs: run.requestDelayMs,
    defaultOdds: run.defaultOdds,
    aliases: loadPlayerAliases(configDir),
  });
  const odds = factory.createOddsSource(opts.oddsSource);
  const stats = factory.createStatsSource();

  if (!(await odds.isAvailable())) {
    throw new Error(`Odds source "${odds.getName()}" is not available`);
  }

  const summary = await runPropModel(
    { odds, stats, defense: stats },
    {
      scoring: config.scoring,
      run,
      paths: dataPaths(dataDir, opts.output),
      now: new Date(),
      categories: opts.categories,
      skipGrading: opts.skipGrading,
      verbose,
    }
  );

  console.log(`\n[RUN_PROPS] Summary:`);
  console.log(`   games=${summary.games} props=${summary.props} uniqueLines=${summary.uniqueLines} unresolvedPlayers=${summary.unresolvedPlayers}`);
  console.log(`   analyzed=${summary.analyzed} valuePlays=${summary.valuePlays} displayed=${summary.displayed} tracked=${summary.tracked}`);
  if (summary.grade) {
    console.log(`   graded=${summary.grade.graded} wins=${summary.grade.wins} losses=${summary.grade.losses} pushes=${summary.grade.pushes} pending=${summary.grade.skipped + summary.grade.errors} backfilled=${summary.backfilled}`);
  }
  const perf = summary.performance;
  console.log(`   record=${perf.wins}-${perf.losses} units=${perf.units.toFixed(2)} roi=${perf.roi.toFixed(2)}%`);

  if (summary.topPlays.length > 0) {
    console.log('\n🔥 Top plays:');
    for (const play of summary.topPlays) {
      console.log(`   ${play.playerName} ${play.side} ${play.line} ${categoryLabel(play.category)} (${play.odds > 0 ? '+' : ''}${play.odds}, ${play.bookmaker}) score=${play.score.toFixed(1)}`);
    }
  }

  if (summary.persistenceErrors.length > 0) {
    console.warn(`\n⚠️  ${summary.persistenceErrors.length} persistence error(s):`);
    for (const e of summary.persistenceErrors) console.warn(`   - ${e}`);
  }
}

main()
  .catch((e) => {
    console.error('Fatal error running props job:', e);
    process.exit(1);
  });
