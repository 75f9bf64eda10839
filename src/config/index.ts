/**
 * Configuration Index
 *
 * - env.ts: environment and CLI helpers
 * - schema.ts: configuration type definitions
 * - presets.ts: built-in strategy presets
 * - loadConfig.ts: file loading, merging and validation
 */

export {
  envStr,
  isLiveTradingEnabled,
  parseCliOverrides,
  readEnv,
  type EnvSource,
} from "./env";

export type {
  AppConfig,
  BrokerEndpointConfig,
  CredentialConfig,
  ExpiryFormat,
  LegSpec,
  LogLevel,
  MarketDataType,
  OrderDataType,
  PartialEntryPolicy,
  RsiFilterConfig,
  StrategyConfig,
  StreamMode,
  StreamingConfig,
} from "./schema";

export {
  DEFAULT_STRATEGY_PRESET,
  STRATEGY_PRESETS,
  isStrategyPresetName,
  type StrategyPresetName,
} from "./presets";

export {
  DEFAULT_CREDENTIALS_FILE,
  DEFAULT_STRATEGY_FILE,
  loadAppConfig,
  parseStrategyConfig,
  type LoadConfigOptions,
} from "./loadConfig";
