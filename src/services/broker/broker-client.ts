/**
 * BrokerClient
 *
 * The narrow broker surface the engine depends on. Every call resolves to a
 * BrokerResult: a failure is a value carrying its kind, never a silent default
 * and never a thrown exception.
 */

import type { NetPosition, ProductType, Side } from "../../domain/trade.types";

export type BrokerFailureKind = "auth" | "rejected" | "transient";

export interface BrokerFailure {
  kind: BrokerFailureKind;
  message: string;
  /** Broker status code from the response body, when present */
  code?: number;
}

export type BrokerResult<T> =
  | { success: true; data: T }
  | { success: false; error: BrokerFailure };

export function ok<T>(data: T): BrokerResult<T> {
  return { success: true, data };
}

export function failure<T>(
  kind: BrokerFailureKind,
  message: string,
  code?: number,
): BrokerResult<T> {
  return { success: false, error: code === undefined ? { kind, message } : { kind, message, code } };
}

export interface BrokerProfile {
  name: string;
  clientId: string;
}

/** One OHLCV bar; `timestamp` in epoch seconds */
export interface Candle {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface CandleRequest {
  symbol: string;
  /** Broker resolution, e.g. "5" or "D" */
  resolution: string;
  /** Inclusive "YYYY-MM-DD" */
  from: string;
  /** Inclusive "YYYY-MM-DD" */
  to: string;
}

export interface OrderRequest {
  symbol: string;
  quantity: number;
  side: Side;
  productType: ProductType;
  /** Order tag, echoed in broker reports */
  tag?: string;
}

export interface OrderAck {
  orderId: string;
  message: string;
}

export interface BrokerClient {
  getProfile(): Promise<BrokerResult<BrokerProfile>>;
  /** Last traded price per requested symbol */
  getQuote(symbols: readonly string[]): Promise<BrokerResult<Map<string, number>>>;
  getCandles(request: CandleRequest): Promise<BrokerResult<Candle[]>>;
  /** Nearest listed expiry of the underlying's option chain */
  getNearestExpiry(indexSymbol: string, strikeCount: number): Promise<BrokerResult<Date>>;
  /** Market order; never retried */
  placeOrder(order: OrderRequest): Promise<BrokerResult<OrderAck>>;
  getPositions(): Promise<BrokerResult<NetPosition[]>>;
  /** Utilized margin */
  getFunds(): Promise<BrokerResult<number>>;
}

export function describeFailure(error: BrokerFailure): string {
  return error.code === undefined
    ? `${error.kind}: ${error.message}`
    : `${error.kind} (code ${error.code}): ${error.message}`;
}
