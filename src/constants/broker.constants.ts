/**
 * Broker endpoints, market hours and defaults
 */

export const BROKER_API = {
  /** Trading API (profile, funds, positions, orders) */
  BASE_URL: "https://api-t1.fyers.in",
  /** Market data API (quotes, history, option chain) */
  DATA_URL: "https://api-t1.fyers.in/data",
  REQUEST_TIMEOUT_MS: 10_000,
} as const;

export const BROKER_WS = {
  DATA_URL: "wss://socket.fyers.in/hsm/v1-5/prod",
  ORDER_URL: "wss://socket.fyers.in/trade/v3",
  RECONNECT_BASE_MS: 1_000,
  RECONNECT_MAX_MS: 30_000,
  STABLE_CONNECTION_MS: 30_000,
  PING_INTERVAL_MS: 10_000,
  PONG_TIMEOUT_MS: 20_000,
  CONNECTION_TIMEOUT_MS: 15_000,
  DISCONNECT_GRACE_MS: 1_000,
  CHANNEL_CAPACITY: 1_000,
} as const;

/** Regular session, half-open window [OPEN, CLOSE) in exchange local time */
export const MARKET_HOURS = {
  OPEN: "09:15",
  CLOSE: "15:30",
  TIMEZONE: "Asia/Kolkata",
} as const;

/** Fyers order enums */
export const ORDER_TYPE = {
  LIMIT: 1,
  MARKET: 2,
  STOP: 3,
  STOP_LIMIT: 4,
} as const;

export const DEFAULT_STRATEGY = {
  POLL_INTERVAL_MS: 30_000,
  ORDER_PACING_MS: 500,
  MAX_EXIT_ATTEMPTS: 3,
  STRIKE_COUNT: 5,
} as const;

/** Value LIVE_TRADING must hold for real orders to be sent */
export const LIVE_TRADING_ACK = "I_UNDERSTAND_THE_RISKS";
