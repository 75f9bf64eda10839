import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { BROKER_API, BROKER_WS, DEFAULT_STRATEGY, MARKET_HOURS } from "../constants/broker.constants";
import { BUY, SELL, type ProductType } from "../domain/trade.types";
import { ConfigurationError, toError } from "../errors/app.errors";
import { isLogLevel, type LogLevel } from "../utils/logger.util";
import { isRecord, type RawRecord } from "../utils/record.util";
import {
  assertTimeZone,
  formatClockTime,
  isWeekday,
  parseClockTime,
  secondsOfDay,
  type ClockTime,
  type Weekday,
} from "../utils/time.util";
import { envStr, isLiveTradingEnabled, parseCliOverrides, readEnv, type EnvSource } from "./env";
import {
  DEFAULT_STRATEGY_PRESET,
  STRATEGY_PRESETS,
  isStrategyPresetName,
} from "./presets";
import type {
  AppConfig,
  BrokerEndpointConfig,
  CredentialConfig,
  ExpiryFormat,
  LegSpec,
  MarketDataType,
  OrderDataType,
  PartialEntryPolicy,
  RsiFilterConfig,
  StrategyConfig,
  StreamMode,
  StreamingConfig,
} from "./schema";

export interface LoadConfigOptions {
  env?: EnvSource;
  argv?: string[];
  /** File reader, replaceable in tests */
  readFile?: (path: string) => string;
}

export const DEFAULT_CREDENTIALS_FILE = "auth_tokens.json";
export const DEFAULT_STRATEGY_FILE = "config.yaml";

const PRODUCT_TYPES: readonly ProductType[] = ["INTRADAY", "MARGIN", "CNC", "CO", "BO"];
const PARTIAL_ENTRY_POLICIES: readonly PartialEntryPolicy[] = ["manual", "unwind"];
const EXPIRY_FORMATS: readonly ExpiryFormat[] = ["weekly", "monthly"];
const STREAM_MODES: readonly StreamMode[] = ["data", "order", "both", "off"];
const MARKET_DATA_TYPES: readonly MarketDataType[] = ["SymbolUpdate", "DepthUpdate"];
const ORDER_DATA_TYPES: readonly OrderDataType[] = [
  "OnOrders",
  "OnTrades",
  "OnPositions",
  "OnGeneral",
];
const DATE_KEY_RE = /^\d{4}-\d{2}-\d{2}$/;

// ============================================================================
// Field readers
// ============================================================================

function fail(path: string, problem: string): never {
  throw new ConfigurationError(`Invalid config ${path}: ${problem}`);
}

function readString(raw: RawRecord, key: string, section: string, fallback?: string): string {
  const value = raw[key];
  if (value === undefined || value === null) {
    if (fallback !== undefined) return fallback;
    fail(`${section}.${key}`, "missing required key");
  }
  if (typeof value !== "string" && typeof value !== "number") {
    fail(`${section}.${key}`, "expected a string");
  }
  const text = String(value).trim();
  if (text === "") fail(`${section}.${key}`, "must not be empty");
  return text;
}

interface NumberRule {
  min?: number;
  exclusiveMin?: number;
  integer?: boolean;
  fallback?: number;
}

function readNumber(raw: RawRecord, key: string, section: string, rule: NumberRule = {}): number {
  const value = raw[key];
  if (value === undefined || value === null) {
    if (rule.fallback !== undefined) return rule.fallback;
    fail(`${section}.${key}`, "missing required key");
  }
  const parsed = typeof value === "string" ? Number(value.trim()) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed)) {
    fail(`${section}.${key}`, `expected a number, got ${JSON.stringify(value)}`);
  }
  if (rule.integer && !Number.isInteger(parsed)) {
    fail(`${section}.${key}`, `expected an integer, got ${parsed}`);
  }
  if (rule.min !== undefined && parsed < rule.min) {
    fail(`${section}.${key}`, `must be >= ${rule.min}, got ${parsed}`);
  }
  if (rule.exclusiveMin !== undefined && parsed <= rule.exclusiveMin) {
    fail(`${section}.${key}`, `must be > ${rule.exclusiveMin}, got ${parsed}`);
  }
  return parsed;
}

function readOptionalNumber(raw: RawRecord, key: string, section: string): number | undefined {
  if (raw[key] === undefined || raw[key] === null) return undefined;
  return readNumber(raw, key, section);
}

function readBoolean(raw: RawRecord, key: string, section: string, fallback: boolean): boolean {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  fail(`${section}.${key}`, `expected true or false, got ${JSON.stringify(value)}`);
}

function readEnum<T extends string>(
  raw: RawRecord,
  key: string,
  section: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    fail(`${section}.${key}`, `expected one of ${allowed.join(", ")}, got ${JSON.stringify(value)}`);
  }
  return match;
}

function readList(raw: RawRecord, key: string, section: string): unknown[] {
  const value = raw[key];
  if (value === undefined || value === null) return [];
  if (typeof value === "string") {
    return value
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);
  }
  if (!Array.isArray(value)) fail(`${section}.${key}`, "expected a list");
  return value;
}

function readClockTime(raw: RawRecord, key: string, section: string): ClockTime {
  const text = readString(raw, key, section);
  const parsed = parseClockTime(text);
  if (!parsed) fail(`${section}.${key}`, `expected HH:MM or HH:MM:SS, got "${text}"`);
  return parsed;
}

// ============================================================================
// Sections
// ============================================================================

function parseLegs(raw: RawRecord, section: string): LegSpec[] {
  const items = readList(raw, "legs", section);
  if (items.length === 0) fail(`${section}.legs`, "at least one leg is required");

  const roles = new Set<string>();
  return items.map((item, index) => {
    const path = `${section}.legs[${index}]`;
    if (!isRecord(item)) fail(path, "expected a mapping");

    const role = readString(item, "role", path);
    if (roles.has(role)) fail(`${path}.role`, `duplicate role "${role}"`);
    roles.add(role);

    if (item.side === undefined) fail(`${path}.side`, "missing required key");
    const sideText = readEnum(item, "side", path, ["BUY", "SELL"], "BUY");

    return {
      role,
      optionType: readEnum(item, "option_type", path, ["CE", "PE"], "CE"),
      side: sideText === "BUY" ? BUY : SELL,
      offset: readNumber(item, "offset", path, { min: 0 }),
      qtyMultiplier: readNumber(item, "qty_multiplier", path, { min: 1, integer: true }),
    };
  });
}

function parseRsiFilter(raw: RawRecord, section: string): RsiFilterConfig | null {
  const value = raw.rsi_filter;
  if (value === undefined || value === null || value === false) return null;
  const path = `${section}.rsi_filter`;
  if (!isRecord(value)) fail(path, "expected a mapping");

  const min = readOptionalNumber(value, "min", path);
  const max = readOptionalNumber(value, "max", path);
  if (min === undefined && max === undefined) fail(path, "set min, max or both");
  if (min !== undefined && max !== undefined && min > max) {
    fail(path, `min (${min}) must not exceed max (${max})`);
  }

  return {
    resolution: readString(value, "resolution", path, "5"),
    length: readNumber(value, "length", path, { min: 2, integer: true, fallback: 14 }),
    historyDays: readNumber(value, "history_days", path, { min: 1, integer: true, fallback: 5 }),
    min,
    max,
  };
}

export function parseStrategyConfig(raw: RawRecord, preset: string): StrategyConfig {
  const section = "strategy";

  const entryDays = readList(raw, "entry_days", section).map((day, index) => {
    const text = String(day).trim().toUpperCase().slice(0, 3);
    if (!isWeekday(text)) fail(`${section}.entry_days[${index}]`, `unknown weekday ${JSON.stringify(day)}`);
    return text;
  });
  if (entryDays.length === 0) fail(`${section}.entry_days`, "at least one weekday is required");

  const entryTime = readClockTime(raw, "entry_time", section);
  const exitTime = readClockTime(raw, "exit_time", section);
  if (secondsOfDay(entryTime) >= secondsOfDay(exitTime)) {
    fail(
      section,
      `entry_time (${formatClockTime(entryTime)}) must be before exit_time (${formatClockTime(exitTime)})`,
    );
  }

  const timezone = readString(raw, "timezone", section, MARKET_HOURS.TIMEZONE);
  try {
    assertTimeZone(timezone);
  } catch (err) {
    throw new ConfigurationError(`Invalid config ${section}.timezone: unknown timezone "${timezone}"`, toError(err));
  }

  const holidays = readList(raw, "holidays", section).map((day, index) => {
    const text = String(day).trim();
    if (!DATE_KEY_RE.test(text)) fail(`${section}.holidays[${index}]`, `expected YYYY-MM-DD, got "${text}"`);
    return text;
  });

  const weekdays: Weekday[] = Array.from(new Set(entryDays));

  return {
    preset,
    underlying: readString(raw, "underlying", section),
    indexSymbol: readString(raw, "index_symbol", section),
    exchange: readString(raw, "exchange", section, "NSE"),
    strikeStep: readNumber(raw, "strike_step", section, { exclusiveMin: 0 }),
    lotSize: readNumber(raw, "lot_size", section, { min: 1, integer: true }),
    legs: parseLegs(raw, section),
    targetPct: readNumber(raw, "target_percent", section, { min: 0 }),
    stopLossPct: readNumber(raw, "stop_loss_percent", section, { min: 0 }),
    entryWeekdays: weekdays,
    entryTime,
    exitTime,
    productType: readEnum(raw, "product_type", section, PRODUCT_TYPES, "INTRADAY"),
    pollIntervalMs:
      readNumber(raw, "poll_interval_seconds", section, {
        exclusiveMin: 0,
        fallback: DEFAULT_STRATEGY.POLL_INTERVAL_MS / 1000,
      }) * 1000,
    orderPacingMs: readNumber(raw, "order_pacing_ms", section, {
      min: 0,
      fallback: DEFAULT_STRATEGY.ORDER_PACING_MS,
    }),
    partialEntryPolicy: readEnum(raw, "partial_entry_policy", section, PARTIAL_ENTRY_POLICIES, "manual"),
    maxExitAttempts: readNumber(raw, "max_exit_attempts", section, {
      min: 1,
      integer: true,
      fallback: DEFAULT_STRATEGY.MAX_EXIT_ATTEMPTS,
    }),
    exitOnShutdown: readBoolean(raw, "exit_on_shutdown", section, false),
    expiryFormat: readEnum(raw, "expiry_format", section, EXPIRY_FORMATS, "weekly"),
    strikeCount: readNumber(raw, "strike_count", section, {
      min: 1,
      integer: true,
      fallback: DEFAULT_STRATEGY.STRIKE_COUNT,
    }),
    timezone,
    holidays,
    rsiFilter: parseRsiFilter(raw, section),
  };
}

function parseStreamingConfig(
  raw: RawRecord,
  env: EnvSource,
  cli: Record<string, string>,
): StreamingConfig {
  const section = "streaming";
  const modeOverride = cli.STREAM ?? readEnv(env, "STREAM_MODE");
  const merged: RawRecord = modeOverride ? { ...raw, mode: modeOverride } : raw;

  const orderDataTypes = readList(raw, "order_data_types", section).map((item, index) => {
    const match = ORDER_DATA_TYPES.find((candidate) => candidate === item);
    if (!match) {
      fail(`${section}.order_data_types[${index}]`, `expected one of ${ORDER_DATA_TYPES.join(", ")}`);
    }
    return match;
  });

  return {
    mode: readEnum(merged, "mode", section, STREAM_MODES, "both"),
    dataUrl: envStr(env, "STREAM_DATA_URL", BROKER_WS.DATA_URL),
    orderUrl: envStr(env, "STREAM_ORDER_URL", BROKER_WS.ORDER_URL),
    dataType: readEnum(raw, "data_type", section, MARKET_DATA_TYPES, "SymbolUpdate"),
    symbols: readList(raw, "symbols", section).map((s) => String(s).trim()),
    orderDataTypes: orderDataTypes.length > 0 ? orderDataTypes : [...ORDER_DATA_TYPES],
  };
}

function parseCredentials(text: string, path: string, doc: RawRecord): CredentialConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Credentials file ${path} is not valid JSON`, toError(err));
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Credentials file ${path} must contain a JSON object`);
  }

  const accessToken = parsed.access_token;
  if (typeof accessToken !== "string" || accessToken.trim() === "") {
    throw new ConfigurationError(`Credentials file ${path} is missing "access_token"`);
  }

  // client_id may sit next to the token or in the strategy file's broker section
  const brokerSection = isRecord(doc.broker) ? doc.broker : isRecord(doc.fyers) ? doc.fyers : {};
  const clientId = parsed.client_id ?? brokerSection.client_id;
  if (typeof clientId !== "string" || clientId.trim() === "") {
    throw new ConfigurationError(
      `Missing client id: set "client_id" in ${path} or broker.client_id in the strategy file`,
    );
  }

  return { clientId: clientId.trim(), accessToken: accessToken.trim() };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Load credentials and strategy parameters once at startup.
 * Both files are read-only inputs; any problem raises ConfigurationError.
 */
export function loadAppConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const cli = parseCliOverrides(options.argv ?? []);
  const readFile = options.readFile ?? ((path: string) => readFileSync(path, "utf8"));

  const read = (label: string, path: string): string => {
    try {
      return readFile(path);
    } catch (err) {
      throw new ConfigurationError(`Cannot read ${label} file ${path}: ${toError(err).message}`, toError(err));
    }
  };

  const strategyPath = cli.STRATEGY_FILE ?? envStr(env, "STRATEGY_FILE", DEFAULT_STRATEGY_FILE);
  const credentialsPath = cli.CREDENTIALS_FILE ?? envStr(env, "CREDENTIALS_FILE", DEFAULT_CREDENTIALS_FILE);

  let doc: unknown;
  try {
    doc = parseYaml(read("strategy", strategyPath));
  } catch (err) {
    if (err instanceof ConfigurationError) throw err;
    throw new ConfigurationError(`Strategy file ${strategyPath} is not valid YAML`, toError(err));
  }
  const root: RawRecord = isRecord(doc) ? doc : {};

  const credentials = parseCredentials(read("credentials", credentialsPath), credentialsPath, root);

  const strategySection = isRecord(root.strategy) ? root.strategy : {};
  const presetName = cli.PRESET ?? readString(strategySection, "preset", "strategy", DEFAULT_STRATEGY_PRESET);
  if (!isStrategyPresetName(presetName)) {
    throw new ConfigurationError(
      `Unknown strategy preset "${presetName}" (available: ${Object.keys(STRATEGY_PRESETS).join(", ")})`,
    );
  }
  const strategy = parseStrategyConfig({ ...STRATEGY_PRESETS[presetName], ...strategySection }, presetName);

  const streaming = parseStreamingConfig(
    isRecord(root.streaming) ? root.streaming : {},
    env,
    cli,
  );

  const broker: BrokerEndpointConfig = {
    apiUrl: envStr(env, "BROKER_API_URL", BROKER_API.BASE_URL),
    dataUrl: envStr(env, "BROKER_DATA_URL", BROKER_API.DATA_URL),
    timeoutMs: BROKER_API.REQUEST_TIMEOUT_MS,
  };

  const rawLevel = (readEnv(env, "LOG_LEVEL") ?? "info").toLowerCase();
  if (!isLogLevel(rawLevel)) {
    throw new ConfigurationError(`Invalid LOG_LEVEL "${rawLevel}" (expected debug, info, warn or error)`);
  }
  const logLevel: LogLevel = rawLevel;

  return deepFreeze({
    credentials,
    strategy,
    broker,
    streaming,
    logLevel,
    liveTrading: isLiveTradingEnabled(env),
  });
}
