/**
 * Configuration module exports
 */

export {
  CHAINSTATE_ENV_VARS,
  type ChainStateConfig,
  DEFAULT_CHAINSTATE_CONFIG,
  loadChainStateConfigFromEnv,
  validateConfig,
} from './chainstate-config.ts';

export { ConfigLoader, type ConfigLoaderOptions } from './config-loader.ts';
