export { resolveConfig, loadConfigFile, type ConfigLoadOptions } from './config-manager.js';
export {
  AnalyzerConfigSchema,
  ConfigFileSchema,
  parseDayMonthYear,
  type AnalyzerConfig,
  type ApiConfig,
  type ConfigFile,
  type NetworkConfig,
  type RateLimitConfig,
} from './schema.js';
