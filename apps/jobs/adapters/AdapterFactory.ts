/**
 * Adapter Factory
 *
 * Creates and configures data source adapters based on datasources.yml.
 */

import yaml from 'js-yaml';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  AdapterConfig,
  DataSourcesConfig,
  DefenseSource,
  OddsSource,
  PlayerStatsSource,
} from './DataSourceAdapter';
import { MockOddsAdapter } from './MockAdapter';
import { OddsApiAdapter } from './OddsApiAdapter';
import { FileStatsAdapter } from './FileStatsAdapter';
import { ConfigError, errMsg } from '../lib/errors';

const adapterConfigSchema = z.object({
  provider: z.string(),
  enabled: z.boolean().default(true),
  config: z.record(z.unknown()).default({}),
});

const dataSourcesSchema = z.object({
  adapters: z.record(adapterConfigSchema),
  defaultOddsAdapter: z.string(),
  statsAdapter: z.string(),
});

const oddsApiOptionsSchema = z.object({
  baseUrl: z.string().optional(),
  sportKey: z.string().optional(),
  regions: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

const fileOptionsSchema = z.object({
  dataPath: z.string(),
});

export interface FactoryOptions {
  /** Directory relative data paths in datasources.yml are resolved against */
  baseDir?: string;
  /** Overrides the mock adapter's configured dataPath */
  snapshotDir?: string;
  /** Overrides the file-stats adapter's configured dataPath */
  statsDir?: string;
  requestDelayMs?: number;
  defaultOdds?: number;
  aliases?: Record<string, string>;
}

export function parseDataSourcesYaml(content: string): DataSourcesConfig {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`datasources.yml is not valid YAML: ${errMsg(error)}`, { cause: error });
  }
  const parsed = dataSourcesSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid datasources.yml: ${issues}`);
  }
  return parsed.data;
}

export class AdapterFactory {
  private config: DataSourcesConfig;
  private options: FactoryOptions;

  constructor(config: DataSourcesConfig, options: FactoryOptions = {}) {
    this.config = config;
    this.options = options;
  }

  static fromFile(configPath: string, options: FactoryOptions = {}): AdapterFactory {
    if (!fs.existsSync(configPath)) {
      throw new ConfigError(`datasources.yml not found at ${configPath}`);
    }
    return new AdapterFactory(parseDataSourcesYaml(fs.readFileSync(configPath, 'utf8')), options);
  }

  private resolveDataPath(config: Record<string, unknown>, name: string, override?: string): string {
    if (override) {
      return override;
    }
    const parsed = fileOptionsSchema.safeParse(config);
    if (!parsed.success) {
      throw new ConfigError(`Adapter '${name}' needs config.dataPath`);
    }
    return path.resolve(this.options.baseDir ?? process.cwd(), parsed.data.dataPath);
  }

  private enabledConfig(name: string): AdapterConfig {
    const adapterConfig = this.config.adapters[name];

    if (!adapterConfig) {
      throw new ConfigError(
        `Adapter '${name}' not found in configuration (enabled: ${this.getAvailableAdapters().join(', ')})`
      );
    }

    if (!adapterConfig.enabled) {
      throw new ConfigError(`Adapter '${name}' is disabled`);
    }

    return adapterConfig;
  }

  /**
   * Create an odds source by name (defaults to defaultOddsAdapter)
   */
  createOddsSource(adapterName?: string): OddsSource {
    const name = adapterName || this.config.defaultOddsAdapter;
    const adapterConfig = this.enabledConfig(name);

    switch (adapterConfig.provider) {
      case 'odds-api': {
        const parsed = oddsApiOptionsSchema.safeParse(adapterConfig.config);
        if (!parsed.success) {
          throw new ConfigError(`Adapter '${name}' has invalid config: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
        }
        return new OddsApiAdapter({
          ...parsed.data,
          ...(this.options.requestDelayMs !== undefined && { requestDelayMs: this.options.requestDelayMs }),
          ...(this.options.defaultOdds !== undefined && { defaultOdds: this.options.defaultOdds }),
        });
      }

      case 'mock':
        return new MockOddsAdapter({
          dataPath: this.resolveDataPath(adapterConfig.config, name, this.options.snapshotDir),
          ...(this.options.defaultOdds !== undefined && { defaultOdds: this.options.defaultOdds }),
        });

      default:
        throw new ConfigError(`Unknown odds provider: ${adapterConfig.provider}`);
    }
  }

  /**
   * Create the stats source; the same object answers defense lookups
   */
  createStatsSource(): PlayerStatsSource & DefenseSource {
    const name = this.config.statsAdapter;
    const adapterConfig = this.enabledConfig(name);

    switch (adapterConfig.provider) {
      case 'file-stats':
        return FileStatsAdapter.fromDirectory(
          this.resolveDataPath(adapterConfig.config, name, this.options.statsDir),
          this.options.aliases
        );

      default:
        throw new ConfigError(`Unknown stats provider: ${adapterConfig.provider}`);
    }
  }

  /**
   * Get list of enabled adapters
   */
  getAvailableAdapters(): string[] {
    return Object.entries(this.config.adapters)
      .filter(([, adapter]) => adapter.enabled)
      .map(([name]) => name);
  }
}
