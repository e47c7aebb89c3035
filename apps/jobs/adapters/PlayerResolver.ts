import fs from 'fs';
import path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errMsg } from '../lib/errors';

const SUFFIXES = ['jr', 'sr', 'ii', 'iii', 'iv'];

const aliasFileSchema = z.object({
  aliases: z.record(z.string()).default({}),
});

/**
 * Normalize a player name for fuzzy comparison: lower-case, accents stripped,
 * periods dropped, curly apostrophes straightened, whitespace collapsed
 */
export function normalizePlayerName(name: string): string {
  return name
    .toLowerCase()
    .trim()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/\./g, '')
    .replace(/[\u2018\u2019]/g, "'")
    .replace(/\s+/g, ' ');
}

function withoutSuffix(norm: string): string | null {
  for (const suffix of SUFFIXES) {
    if (norm.endsWith(` ${suffix}`)) {
      return norm.slice(0, -(suffix.length + 1));
    }
  }
  return null;
}

/**
 * Load sportsbook → stats-feed player aliases from player_aliases.yml.
 * A missing file means no aliases.
 */
export function loadPlayerAliases(configDir: string): Record<string, string> {
  const aliasPath = path.join(configDir, 'player_aliases.yml');
  if (!fs.existsSync(aliasPath)) {
    console.warn(`[PLAYER_RESOLVER] ${aliasPath} not found, continuing without aliases`);
    return {};
  }

  try {
    const parsed = aliasFileSchema.parse(yaml.load(fs.readFileSync(aliasPath, 'utf8')) ?? {});
    console.log(`[PLAYER_RESOLVER] Loaded ${Object.keys(parsed.aliases).length} player aliases from ${aliasPath}`);
    return parsed.aliases;
  } catch (error) {
    throw new ConfigError(`player_aliases.yml load failed: ${errMsg(error)}`, { cause: error });
  }
}

/**
 * Resolves sportsbook player names to records keyed by stats-feed names.
 *
 * Tried in order: exact key, case-insensitive key, alias, normalized name,
 * normalized name with/without a generational suffix.
 */
export class PlayerResolver<T> {
  private readonly exact = new Map<string, T>();
  private readonly lower = new Map<string, T>();
  private readonly normalized = new Map<string, T>();
  private readonly aliases = new Map<string, string>();
  private readonly cache = new Map<string, T | null>();

  constructor(records: Iterable<readonly [string, T]>, aliases: Record<string, string> = {}) {
    for (const [name, record] of records) {
      this.exact.set(name, record);
      if (!this.lower.has(name.toLowerCase())) this.lower.set(name.toLowerCase(), record);
      const norm = normalizePlayerName(name);
      if (!this.normalized.has(norm)) this.normalized.set(norm, record);
    }
    for (const [from, to] of Object.entries(aliases)) {
      this.aliases.set(from.toLowerCase(), to.toLowerCase());
    }
  }

  get size(): number {
    return this.exact.size;
  }

  resolve(name: string): T | null {
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;

    const result = this.lookup(name);
    this.cache.set(name, result);
    return result;
  }

  private lookup(name: string): T | null {
    const direct = this.exact.get(name) ?? this.lower.get(name.toLowerCase());
    if (direct !== undefined) return direct;

    const alias = this.aliases.get(name.toLowerCase());
    if (alias) {
      const aliased = this.lower.get(alias) ?? this.normalized.get(normalizePlayerName(alias));
      if (aliased !== undefined) return aliased;
    }

    const norm = normalizePlayerName(name);
    const byNorm = this.normalized.get(norm);
    if (byNorm !== undefined) return byNorm;

    // "Theo Banks Jr." vs "Theo Banks"
    const bare = withoutSuffix(norm);
    if (bare) {
      const match = this.normalized.get(bare);
      if (match !== undefined) return match;
    }

    // "Andre Okafor" vs "Andre Okafor Jr."
    for (const suffix of SUFFIXES) {
      const match = this.normalized.get(`${norm} ${suffix}`);
      if (match !== undefined) return match;
    }

    return null;
  }
}
