/**
 * Chain-State Store Configuration
 *
 * Bucket names partition the key space of the external store; the tip set
 * lives under a single key in the DAG-state bucket.
 */

import process from 'node:process';

import { isLogLevel, type LogLevel } from '../utils/logger.ts';

export interface ChainStateConfig {
  /** Bucket holding one entry per unspent output */
  utxoBucket: string;
  /** Bucket holding one spend journal per connected block */
  spendJournalBucket: string;
  /** Bucket holding DAG-wide state */
  dagStateBucket: string;
  /** Key of the tip set within the DAG-state bucket */
  tipHashesKey: string;
  logLevel: LogLevel;
}

export const DEFAULT_CHAINSTATE_CONFIG: Readonly<ChainStateConfig> = {
  utxoBucket: 'utxoset',
  spendJournalBucket: 'spendjournal',
  dagStateBucket: 'dagstate',
  tipHashesKey: 'dagtips',
  logLevel: 'info',
};

export const CHAINSTATE_ENV_VARS = {
  CHAINSTATE_UTXO_BUCKET: 'utxoBucket',
  CHAINSTATE_SPEND_JOURNAL_BUCKET: 'spendJournalBucket',
  CHAINSTATE_DAG_STATE_BUCKET: 'dagStateBucket',
  CHAINSTATE_TIP_HASHES_KEY: 'tipHashesKey',
} as const;

/**
 * Validate configuration
 */
export function validateConfig(config: ChainStateConfig): string[] {
  const errors: string[] = [];

  const buckets = [
    ['utxoBucket', config.utxoBucket],
    ['spendJournalBucket', config.spendJournalBucket],
    ['dagStateBucket', config.dagStateBucket],
  ] as const;

  for (const [name, value] of buckets) {
    if (typeof value !== 'string' || value.length === 0) {
      errors.push(`${name} must be a non-empty string`);
    }
  }

  const names = buckets.map(([, value]) => value);
  if (new Set(names).size !== names.length) {
    errors.push('Bucket names must be distinct');
  }

  if (typeof config.tipHashesKey !== 'string' || config.tipHashesKey.length === 0) {
    errors.push('tipHashesKey must be a non-empty string');
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push(`Unknown log level: ${String(config.logLevel)}`);
  }

  return errors;
}

/**
 * Load chain-state configuration from environment variables
 */
export function loadChainStateConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Partial<ChainStateConfig> {
  const config: Partial<ChainStateConfig> = {};

  for (const [variable, field] of Object.entries(CHAINSTATE_ENV_VARS)) {
    const value = env[variable];
    if (value !== undefined && value.trim() !== '') {
      config[field] = value.trim();
    }
  }

  const logLevel = env.CHAINSTATE_LOG_LEVEL?.trim().toLowerCase();
  if (logLevel) {
    if (isLogLevel(logLevel)) {
      config.logLevel = logLevel;
    } else {
      console.warn(`Ignoring unknown CHAINSTATE_LOG_LEVEL: ${logLevel}`);
    }
  }

  return config;
}
