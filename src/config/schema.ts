/**
 * Configuration Schema
 *
 * Type definitions for the application configuration. The loaded AppConfig is
 * frozen and handed to every component constructor; nothing else reads the
 * environment.
 */

import type { OptionType, ProductType, Side } from "../domain/trade.types";
import type { LogLevel } from "../utils/logger.util";
import type { ClockTime, Weekday } from "../utils/time.util";

export type { LogLevel } from "../utils/logger.util";

/**
 * What to do with already-placed legs when a later entry leg is rejected
 */
export type PartialEntryPolicy = "manual" | "unwind";

/**
 * Option symbol expiry code style
 */
export type ExpiryFormat = "weekly" | "monthly";

export type StreamMode = "data" | "order" | "both" | "off";

export type MarketDataType = "SymbolUpdate" | "DepthUpdate";

export type OrderDataType = "OnOrders" | "OnTrades" | "OnPositions" | "OnGeneral";

/**
 * One leg of the strategy, relative to the ATM strike
 */
export interface LegSpec {
  /** Label used as order tag and in logs */
  role: string;
  optionType: OptionType;
  side: Side;
  /** Points away from ATM: added for CE, subtracted for PE */
  offset: number;
  /** Lots per leg */
  qtyMultiplier: number;
}

/**
 * Optional RSI gate evaluated on broker candles before entry
 */
export interface RsiFilterConfig {
  resolution: string;
  length: number;
  historyDays: number;
  /** Enter only when RSI >= min */
  min?: number;
  /** Enter only when RSI <= max */
  max?: number;
}

export interface StrategyConfig {
  /** Preset the strategy was built from */
  preset: string;
  /** Option root, e.g. NIFTY */
  underlying: string;
  /** Index symbol quoted for spot, e.g. NSE:NIFTY50-INDEX */
  indexSymbol: string;
  exchange: string;
  /** Strike interval used for ATM rounding */
  strikeStep: number;
  lotSize: number;
  legs: readonly LegSpec[];
  /** Target as percent of deployed capital */
  targetPct: number;
  /** Stop-loss as percent of deployed capital */
  stopLossPct: number;
  entryWeekdays: readonly Weekday[];
  entryTime: ClockTime;
  exitTime: ClockTime;
  productType: ProductType;
  pollIntervalMs: number;
  orderPacingMs: number;
  partialEntryPolicy: PartialEntryPolicy;
  maxExitAttempts: number;
  /** Close the basket with reason MANUAL when shut down mid-trade */
  exitOnShutdown: boolean;
  expiryFormat: ExpiryFormat;
  /** Strike count requested from the option chain when resolving expiry */
  strikeCount: number;
  timezone: string;
  /** Exchange holidays, "YYYY-MM-DD" */
  holidays: readonly string[];
  rsiFilter: RsiFilterConfig | null;
}

export interface CredentialConfig {
  clientId: string;
  accessToken: string;
}

export interface BrokerEndpointConfig {
  apiUrl: string;
  dataUrl: string;
  timeoutMs: number;
}

export interface StreamingConfig {
  mode: StreamMode;
  dataUrl: string;
  orderUrl: string;
  dataType: MarketDataType;
  /** Extra symbols to stream besides the index */
  symbols: readonly string[];
  orderDataTypes: readonly OrderDataType[];
}

export interface AppConfig {
  credentials: CredentialConfig;
  strategy: StrategyConfig;
  broker: BrokerEndpointConfig;
  streaming: StreamingConfig;
  logLevel: LogLevel;
  /** Real orders are sent only when LIVE_TRADING carries the acknowledgement */
  liveTrading: boolean;
}
