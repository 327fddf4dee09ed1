export {
  applyEnvOverrides,
  loadSettings,
  parseCacheTtl,
  parseRequestTimeout,
  parseSettings
} from './settings';
export { loadEnvConfig, readEnvConfig } from './env';
export type {
  Settings,
  UpstreamConfig,
  CacheConfig,
  RetryConfig,
  PopularityScope,
  PopularityConfig,
  PathsConfig,
  LoggingConfig,
  EnvConfig
} from './types';
