/**
 * Classifies inbound stream frames into a tagged StreamMessage.
 *
 * Explicit discriminators win: `type` "sf"/"if" is a quote, "dp" is depth,
 * and the order socket's envelopes carry `orders`, `trades` or `positions`.
 * Anything else falls through a fixed predicate order:
 *
 *   general (code + message) -> quote (ltp) -> depth (bids/asks/bid/ask)
 *   -> trade print (trade_price) -> trade update (tradeNumber)
 *   -> order update (orderNumber/id) -> position update (netQty/qty) -> unknown
 */

import { isRecord, numberField, stringField, type RawRecord } from "../../utils/record.util";

export type StreamMessage =
  | { kind: "general"; code: number | null; message: string; raw: RawRecord }
  | { kind: "quote"; symbol: string | null; ltp: number | null; raw: RawRecord }
  | { kind: "depth"; symbol: string | null; raw: RawRecord }
  | { kind: "tradePrint"; symbol: string | null; price: number | null; raw: RawRecord }
  | { kind: "trade"; symbol: string | null; tradeNumber: string | null; raw: RawRecord }
  | { kind: "order"; symbol: string | null; orderId: string | null; status: number | null; raw: RawRecord }
  | { kind: "position"; symbol: string | null; netQty: number | null; raw: RawRecord }
  | { kind: "unknown"; raw: unknown };

export type StreamMessageKind = StreamMessage["kind"];

const has = (record: RawRecord, key: string): boolean =>
  record[key] !== undefined && record[key] !== null;

const symbolOf = (record: RawRecord): string | null => stringField(record, "symbol") ?? null;

function quote(record: RawRecord): StreamMessage {
  return { kind: "quote", symbol: symbolOf(record), ltp: numberField(record, "ltp") ?? null, raw: record };
}

function depth(record: RawRecord): StreamMessage {
  return { kind: "depth", symbol: symbolOf(record), raw: record };
}

function trade(record: RawRecord): StreamMessage {
  return {
    kind: "trade",
    symbol: symbolOf(record),
    tradeNumber: stringField(record, "tradeNumber") ?? null,
    raw: record,
  };
}

function order(record: RawRecord): StreamMessage {
  return {
    kind: "order",
    symbol: symbolOf(record),
    orderId: stringField(record, "id") ?? stringField(record, "orderNumber") ?? null,
    status: numberField(record, "status") ?? null,
    raw: record,
  };
}

function position(record: RawRecord): StreamMessage {
  return {
    kind: "position",
    symbol: symbolOf(record),
    netQty: numberField(record, "netQty") ?? numberField(record, "qty") ?? null,
    raw: record,
  };
}

export function classifyMessage(raw: unknown): StreamMessage {
  if (!isRecord(raw)) return { kind: "unknown", raw };

  // Discriminated frames
  const type = raw.type;
  if (type === "sf" || type === "if") return quote(raw);
  if (type === "dp") return depth(raw);
  if (isRecord(raw.orders)) return order(raw.orders);
  if (isRecord(raw.trades)) return trade(raw.trades);
  if (isRecord(raw.positions)) return position(raw.positions);

  // Fallback predicates, in priority order
  if (has(raw, "code") && has(raw, "message")) {
    return {
      kind: "general",
      code: numberField(raw, "code") ?? null,
      message: stringField(raw, "message") ?? "",
      raw,
    };
  }
  if (has(raw, "ltp")) return quote(raw);
  if (has(raw, "bids") || has(raw, "asks") || has(raw, "bid") || has(raw, "ask")) return depth(raw);
  if (has(raw, "trade_price")) {
    return {
      kind: "tradePrint",
      symbol: symbolOf(raw),
      price: numberField(raw, "trade_price") ?? null,
      raw,
    };
  }
  if (has(raw, "tradeNumber")) return trade(raw);
  if (has(raw, "orderNumber") || has(raw, "id")) return order(raw);
  if (has(raw, "netQty") || has(raw, "qty")) return position(raw);

  return { kind: "unknown", raw };
}

/**
 * Parse one text frame. Arrays yield one message per element; text that is
 * not JSON yields a single unknown message.
 */
export function parseFrame(text: string): StreamMessage[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return [{ kind: "unknown", raw: text }];
  }
  return Array.isArray(parsed) ? parsed.map(classifyMessage) : [classifyMessage(parsed)];
}
