/**
 * Fyers REST Client
 *
 * axios implementation of BrokerClient against the Fyers API v3.
 *
 * - Reads (profile, quotes, history, option chain, positions, funds) are
 *   rate limited and retried with backoff on retryable errors.
 * - Orders are rate limited but never retried: a lost acknowledgement must
 *   not become a duplicate position.
 * - Every failure is mapped to a BrokerFailure; axios errors are compacted and
 *   the access token redacted before anything is logged.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { ORDER_TYPE } from "../../constants/broker.constants";
import type { BrokerEndpointConfig, CredentialConfig } from "../../config/schema";
import type { NetPosition } from "../../domain/trade.types";
import { silentLogger, type Logger } from "../../utils/logger.util";
import {
  isRecord,
  numberField,
  stringField,
  type RawRecord,
} from "../../utils/record.util";
import { extractCompactAxiosError, formatCompactError } from "../../utils/sanitize-axios-error.util";
import {
  failure,
  ok,
  type BrokerClient,
  type BrokerProfile,
  type BrokerResult,
  type Candle,
  type CandleRequest,
  type OrderAck,
  type OrderRequest,
} from "./broker-client";
import {
  createBrokerRateLimiters,
  statusOf,
  withRateLimitAndRetry,
  type BrokerRateLimiters,
  type RetryOptions,
} from "./rate-limit";

/** Response codes Fyers uses for an expired or invalid token */
const AUTH_ERROR_CODES = new Set([-8, -15, -16, -17]);

export interface FyersRestClientOptions {
  credentials: CredentialConfig;
  endpoints: BrokerEndpointConfig;
  logger?: Logger;
  /** Retry settings for reads */
  retry?: RetryOptions;
  rateLimiters?: BrokerRateLimiters;
  /** Transport override, used by tests */
  adapter?: AxiosAdapter;
}

type BodyParser<T> = (body: RawRecord) => T | null;

export class FyersRestClient implements BrokerClient {
  private readonly http: AxiosInstance;
  private readonly endpoints: BrokerEndpointConfig;
  private readonly logger: Logger;
  private readonly retry: RetryOptions;
  private readonly limiters: BrokerRateLimiters;
  private readonly secrets: readonly string[];

  constructor(options: FyersRestClientOptions) {
    const { clientId, accessToken } = options.credentials;
    this.endpoints = options.endpoints;
    this.logger = options.logger ?? silentLogger;
    this.retry = options.retry ?? {};
    this.limiters = options.rateLimiters ?? createBrokerRateLimiters();
    this.secrets = [`${clientId}:${accessToken}`, accessToken];
    this.http = axios.create({
      timeout: options.endpoints.timeoutMs,
      headers: {
        Authorization: `${clientId}:${accessToken}`,
        "Content-Type": "application/json",
      },
      adapter: options.adapter,
    });
  }

  async getProfile(): Promise<BrokerResult<BrokerProfile>> {
    return this.read("profile", `${this.endpoints.apiUrl}/api/v3/profile`, {}, (body) => {
      const data = body.data;
      if (!isRecord(data)) return null;
      const clientId = stringField(data, "fy_id");
      if (clientId === undefined) return null;
      return { name: stringField(data, "name") ?? "", clientId };
    });
  }

  async getQuote(symbols: readonly string[]): Promise<BrokerResult<Map<string, number>>> {
    const result = await this.read(
      "quotes",
      `${this.endpoints.dataUrl}/quotes`,
      { symbols: symbols.join(",") },
      parseQuotes,
    );
    if (!result.success) return result;

    const missing = symbols.filter((symbol) => !result.data.has(symbol));
    if (missing.length > 0) {
      return failure("rejected", `no quote for ${missing.join(", ")}`);
    }
    return result;
  }

  async getCandles(request: CandleRequest): Promise<BrokerResult<Candle[]>> {
    return this.read(
      "history",
      `${this.endpoints.dataUrl}/history`,
      {
        symbol: request.symbol,
        resolution: request.resolution,
        date_format: 1,
        range_from: request.from,
        range_to: request.to,
        cont_flag: 1,
      },
      parseCandles,
    );
  }

  async getNearestExpiry(indexSymbol: string, strikeCount: number): Promise<BrokerResult<Date>> {
    const result = await this.read(
      "option chain",
      `${this.endpoints.dataUrl}/options-chain-v3`,
      { symbol: indexSymbol, strikecount: strikeCount },
      parseExpiries,
    );
    if (!result.success) return result;

    if (result.data.length === 0) {
      return failure("rejected", `option chain for ${indexSymbol} lists no expiries`);
    }
    const nearest = Math.min(...result.data);
    return ok(new Date(nearest * 1000));
  }

  async placeOrder(order: OrderRequest): Promise<BrokerResult<OrderAck>> {
    const payload = {
      symbol: order.symbol,
      qty: order.quantity,
      type: ORDER_TYPE.MARKET,
      side: order.side,
      productType: order.productType,
      limitPrice: 0,
      stopPrice: 0,
      validity: "DAY",
      disclosedQty: 0,
      offlineOrder: false,
      ...(order.tag ? { orderTag: order.tag.replace(/[^A-Za-z0-9]/g, "") } : {}),
    };

    await this.limiters.orders.waitAndRecord();
    let body: unknown;
    try {
      const response = await this.http.post<unknown>(
        `${this.endpoints.apiUrl}/api/v3/orders/sync`,
        payload,
      );
      body = response.data;
    } catch (err) {
      return this.failureFromError<OrderAck>("order", err, "rejected");
    }

    const status = checkStatus(body);
    if (!status.success) return status;
    const orderId = stringField(status.data, "id");
    if (!orderId) {
      return failure("rejected", stringField(status.data, "message") ?? "order response carried no id");
    }
    return ok({ orderId, message: stringField(status.data, "message") ?? "" });
  }

  async getPositions(): Promise<BrokerResult<NetPosition[]>> {
    return this.read("positions", `${this.endpoints.apiUrl}/api/v3/positions`, {}, parsePositions);
  }

  async getFunds(): Promise<BrokerResult<number>> {
    return this.read("funds", `${this.endpoints.apiUrl}/api/v3/funds`, {}, parseUtilizedMargin);
  }

  private async read<T>(
    label: string,
    url: string,
    params: Record<string, string | number>,
    parse: BodyParser<T>,
  ): Promise<BrokerResult<T>> {
    this.logger.debug(`GET ${label}`);
    const result = await withRateLimitAndRetry(
      async () => {
        const response = await this.http.get<unknown>(url, { params });
        return response.data;
      },
      this.limiters.data,
      this.retry,
      (attempt, error, delayMs) => {
        this.logger.warn(
          `${label} request failed (attempt ${attempt}), retrying in ${delayMs}ms: ${this.describe(error)}`,
        );
      },
    );
    if (!result.success) {
      return this.failureFromError<T>(label, result.error, "transient");
    }

    const status = checkStatus(result.data);
    if (!status.success) {
      this.logger.warn(`${label} returned an error: ${status.error.message}`);
      return status;
    }

    const parsed = parse(status.data);
    if (parsed === null) {
      return failure("transient", `unexpected ${label} response shape`);
    }
    return ok(parsed);
  }

  private failureFromError<T>(
    label: string,
    error: unknown,
    fallbackKind: "rejected" | "transient",
  ): BrokerResult<T> {
    const compact = extractCompactAxiosError(error, this.secrets);
    const message = `${label} failed: ${formatCompactError(compact)}`;
    this.logger.warn(message);

    const httpStatus = statusOf(error);
    const isAuth =
      httpStatus === 401 ||
      httpStatus === 403 ||
      (compact.brokerCode !== undefined && AUTH_ERROR_CODES.has(compact.brokerCode));
    // A request that never got an answer is transient, whatever the call
    const kind = isAuth ? "auth" : compact.status === undefined ? "transient" : fallbackKind;
    return failure(kind, message, compact.brokerCode);
  }

  private describe(error: Error): string {
    return formatCompactError(extractCompactAxiosError(error, this.secrets));
  }
}

// ============================================================================
// Response parsing
// ============================================================================

/**
 * Every Fyers response carries `s: "ok" | "error"` plus `code` and `message`
 */
function checkStatus(body: unknown): BrokerResult<RawRecord> {
  if (!isRecord(body)) {
    return failure("transient", "response body is not an object");
  }
  if (body.s === "ok") return ok(body);

  const code = numberField(body, "code");
  const message = stringField(body, "message") ?? "broker returned an error";
  const kind = code !== undefined && AUTH_ERROR_CODES.has(code) ? "auth" : "rejected";
  return failure(kind, message, code);
}

function parseQuotes(body: RawRecord): Map<string, number> | null {
  if (!Array.isArray(body.d)) return null;
  const prices = new Map<string, number>();
  for (const entry of body.d) {
    if (!isRecord(entry) || entry.s !== "ok" || !isRecord(entry.v)) continue;
    const symbol = stringField(entry, "n");
    const lastPrice = numberField(entry.v, "lp");
    if (symbol !== undefined && lastPrice !== undefined) {
      prices.set(symbol, lastPrice);
    }
  }
  return prices;
}

function parseCandles(body: RawRecord): Candle[] | null {
  if (!Array.isArray(body.candles)) return null;
  const candles: Candle[] = [];
  for (const row of body.candles) {
    if (!Array.isArray(row) || row.length < 6) return null;
    const values = row.slice(0, 6).map((v) => (typeof v === "number" ? v : Number(v)));
    if (values.some((v) => !Number.isFinite(v))) return null;
    const [timestamp, open, high, low, close, volume] = values;
    candles.push({ timestamp, open, high, low, close, volume });
  }
  return candles;
}

/** Expiry instants of the option chain, epoch seconds */
function parseExpiries(body: RawRecord): number[] | null {
  const data = body.data;
  if (!isRecord(data) || !Array.isArray(data.expiryData)) return null;
  const expiries: number[] = [];
  for (const entry of data.expiryData) {
    if (!isRecord(entry)) continue;
    const expiry = numberField(entry, "expiry");
    if (expiry !== undefined) expiries.push(expiry);
  }
  return expiries;
}

function parsePositions(body: RawRecord): NetPosition[] | null {
  if (body.netPositions === undefined || body.netPositions === null) return [];
  if (!Array.isArray(body.netPositions)) return null;
  const positions: NetPosition[] = [];
  for (const entry of body.netPositions) {
    if (!isRecord(entry)) return null;
    const symbol = stringField(entry, "symbol");
    const netQty = numberField(entry, "netQty");
    const pnl = numberField(entry, "pl");
    if (symbol === undefined || netQty === undefined || pnl === undefined) return null;
    positions.push({ symbol, netQty, pnl });
  }
  return positions;
}

/**
 * Utilized margin: the "Utilized Amount" row of fund_limit, falling back to
 * a `utilized_margin` field on the first row
 */
function parseUtilizedMargin(body: RawRecord): number | null {
  if (!Array.isArray(body.fund_limit)) return null;
  const rows = body.fund_limit.filter(isRecord);

  const utilized = rows.find((row) => stringField(row, "title") === "Utilized Amount");
  if (utilized) {
    const amount = numberField(utilized, "equityAmount");
    if (amount !== undefined) return amount;
  }
  const first = rows[0];
  return first ? numberField(first, "utilized_margin") ?? null : null;
}
