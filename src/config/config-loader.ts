/**
 * Configuration Loader for the chain-state store
 * Loads configuration with priority:
 * 1. Runtime options (passed to loadConfig)
 * 2. Environment variables
 * 3. Config file (.chainstate.json or chainstate.config.json)
 * 4. Default values
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import process from 'node:process';

import { ConfigurationError } from '../errors/index.ts';
import { isLogLevel } from '../utils/logger.ts';
import {
  type ChainStateConfig,
  DEFAULT_CHAINSTATE_CONFIG,
  loadChainStateConfigFromEnv,
  validateConfig,
} from './chainstate-config.ts';

export interface ConfigLoaderOptions {
  /** Directory searched for config files, defaults to the working directory */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigLoader {
  static loadConfig(
    options?: Partial<ChainStateConfig>,
    loaderOptions: ConfigLoaderOptions = {},
  ): ChainStateConfig {
    return new ConfigLoader(loaderOptions).load(options);
  }

  private readonly cwd: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(loaderOptions: ConfigLoaderOptions = {}) {
    this.cwd = loaderOptions.cwd ?? process.cwd();
    this.env = loaderOptions.env ?? process.env;
  }

  load(options?: Partial<ChainStateConfig>): ChainStateConfig {
    let config: ChainStateConfig = { ...DEFAULT_CHAINSTATE_CONFIG };

    const configFile = this.loadConfigFile();
    if (configFile) {
      config = { ...config, ...configFile };
    }

    config = { ...config, ...loadChainStateConfigFromEnv(this.env) };

    if (options) {
      config = { ...config, ...options };
    }

    const validationErrors = validateConfig(config);
    if (validationErrors.length > 0) {
      throw new ConfigurationError(validationErrors);
    }

    return config;
  }

  private loadConfigFile(): Partial<ChainStateConfig> | null {
    const configPaths = [
      path.join(this.cwd, '.chainstate.json'),
      path.join(this.cwd, 'chainstate.config.json'),
      path.join(this.cwd, 'config', 'chainstate.json'),
    ];

    for (const configPath of configPaths) {
      if (!fs.existsSync(configPath)) continue;

      const content = fs.readFileSync(configPath, 'utf-8');
      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch (e) {
        throw new ConfigurationError([`${configPath} is not valid JSON: ${String(e)}`]);
      }

      if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
        throw new ConfigurationError([`${configPath} must contain a JSON object`]);
      }
      return pickConfigFields(configPath, Object.entries(parsed));
    }

    return null;
  }
}

function pickConfigFields(
  configPath: string,
  entries: Array<[string, unknown]>,
): Partial<ChainStateConfig> {
  const picked: Partial<ChainStateConfig> = {};
  for (const [key, value] of entries) {
    switch (key) {
      case 'utxoBucket':
      case 'spendJournalBucket':
      case 'dagStateBucket':
      case 'tipHashesKey':
        if (typeof value !== 'string') {
          throw new ConfigurationError([`${configPath}: ${key} must be a string`]);
        }
        picked[key] = value;
        break;
      case 'logLevel':
        if (!isLogLevel(value)) {
          throw new ConfigurationError([`${configPath}: unknown log level ${String(value)}`]);
        }
        picked.logLevel = value;
        break;
    }
  }
  return picked;
}
