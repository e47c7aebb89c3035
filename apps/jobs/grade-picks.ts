#!/usr/bin/env node
import * as dotenv from 'dotenv';
dotenv.config();

import * as path from 'path';
import { Command } from 'commander';
import { AdapterFactory } from './adapters/AdapterFactory';
import { loadPlayerAliases } from './adapters/PlayerResolver';
import { loadScoringConfig } from './src/config/scoring-config';
import { runGrading } from './src/pipeline/run-model';
import { dataPaths, isVerbose, parseIntOption, resolveConfigDir, resolveDataDir } from './lib/job-context';

/**
 * Pick grading job
 * - Grades pending picks whose game date is before today (ET)
 * - Picks without a final stat yet stay pending for the next run
 * - Backfills missing P/L and rebuilds performance.json
 */

interface GradePicksOptions {
  dataDir?: string;
  statsDir?: string;
  delayMs?: number;
  verbose?: boolean;
}

async function main() {
  const program = new Command();

  program
    .name('grade-picks')
    .description('Grade pending picks and rebuild performance rollups')
    .option('--data-dir <dir>', 'Directory for pick store and performance files')
    .option('--stats-dir <dir>', 'Directory with game_logs.json')
    .option('--delay-ms <ms>', 'Delay after each graded pick', parseIntOption)
    .option('--verbose', 'Log every graded pick');

  program.parse(process.argv);
  const opts = program.opts<GradePicksOptions>();

  console.log('🧮 Grade Picks Job');

  const configDir = resolveConfigDir();
  const { run } = loadScoringConfig(configDir);
  const dataDir = resolveDataDir(opts.dataDir);
  const delayMs = opts.delayMs ?? run.gradingDelayMs;
  console.log(`   data=${dataDir} delayMs=${delayMs}`);

  const factory = AdapterFactory.fromFile(path.join(configDir, 'datasources.yml'), {
    statsDir: opts.statsDir,
    aliases: loadPlayerAliases(configDir),
  });

  const result = await runGrading(factory.createStatsSource(), {
    paths: dataPaths(dataDir),
    now: new Date(),
    delayMs,
    verbose: isVerbose(opts.verbose),
  });

  console.log(`\n[GRADE_PICKS] Summary:`);
  console.log(`   graded=${result.grade.graded} wins=${result.grade.wins} losses=${result.grade.losses} pushes=${result.grade.pushes}`);
  console.log(`   awaitingStats=${result.grade.skipped} lookupErrors=${result.grade.errors} backfilled=${result.backfilled}`);
  console.log(`   record=${result.performance.wins}-${result.performance.losses} units=${result.performance.units.toFixed(2)} roi=${result.performance.roi.toFixed(2)}%`);

  if (result.persistenceErrors.length > 0) {
    throw new Error(`Could not persist results: ${result.persistenceErrors.join('; ')}`);
  }
}

main()
  .catch((e) => {
    console.error('Fatal error grading picks:', e);
    process.exit(1);
  });
