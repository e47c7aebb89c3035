/**
 * Shared setup for the job entry points: config directory discovery, data
 * file layout and commander option parsers.
 */

import * as fs from 'fs';
import * as path from 'path';
import { InvalidArgumentError } from 'commander';
import { PipelinePaths } from '../src/pipeline/run-model';
import { PROP_CATEGORIES, PropCategory, isPropCategory } from '../src/props/prop-category';

/**
 * First existing config directory: PROPS_CONFIG_DIR, the directory beside the
 * job scripts, then apps/jobs/config under the working directory.
 */
export function resolveConfigDir(): string {
  const candidates = [
    process.env.PROPS_CONFIG_DIR,
    path.join(__dirname, '..', 'config'),
    path.join(process.cwd(), 'apps', 'jobs', 'config'),
  ].filter((p): p is string => Boolean(p));

  for (const candidate of candidates) {
    if (fs.existsSync(path.join(candidate, 'datasources.yml'))) {
      return candidate;
    }
  }

  console.warn(`[CONFIG] No datasources.yml found in: ${candidates.join(', ')}`);
  return candidates[candidates.length - 1];
}

export function resolveDataDir(flag: string | undefined): string {
  return path.resolve(flag || process.env.PROPS_DATA_DIR || 'data');
}

export function dataPaths(dataDir: string, dashboardFile?: string): PipelinePaths {
  return {
    picksFile: path.join(dataDir, 'prop_tracking.json'),
    performanceFile: path.join(dataDir, 'performance.json'),
    historyFile: path.join(dataDir, 'props_history.json'),
    dashboardFile: path.resolve(dashboardFile || path.join('public', 'index.html')),
  };
}

export const isVerbose = (flag: boolean | undefined): boolean =>
  Boolean(flag) || process.env.LOG_VERBOSE === 'true';

export function parseIntOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

export function parseCategoriesOption(value: string): PropCategory[] {
  const categories = value
    .split(',')
    .map(v => v.trim().toLowerCase())
    .filter(Boolean);
  const unknown = categories.filter(c => !isPropCategory(c));
  if (unknown.length > 0) {
    throw new InvalidArgumentError(`Unknown categories: ${unknown.join(', ')} (expected ${PROP_CATEGORIES.join(', ')})`);
  }
  return categories.filter(isPropCategory);
}
