import { describe, test } from "node:test";
import assert from "node:assert";
import { classifyMessage, parseFrame } from "../../../src/services/streaming/message-classifier";

const kindOf = (raw: unknown): string => classifyMessage(raw).kind;

describe("classifyMessage", () => {
  test("explicit type discriminators win", () => {
    assert.strictEqual(kindOf({ type: "sf", symbol: "NSE:SBIN-EQ", ltp: 810.5 }), "quote");
    assert.strictEqual(kindOf({ type: "if", symbol: "NSE:NIFTY50-INDEX", ltp: 22050 }), "quote");
    assert.strictEqual(kindOf({ type: "dp", symbol: "NSE:SBIN-EQ", ltp: 810.5 }), "depth");
  });

  test("order socket envelopes unwrap their payload", () => {
    assert.deepStrictEqual(classifyMessage({ s: "ok", orders: { id: "25011300001", symbol: "NSE:X", status: 2 } }), {
      kind: "order",
      symbol: "NSE:X",
      orderId: "25011300001",
      status: 2,
      raw: { id: "25011300001", symbol: "NSE:X", status: 2 },
    });
    assert.strictEqual(kindOf({ s: "ok", trades: { tradeNumber: "T1" } }), "trade");
    assert.strictEqual(kindOf({ s: "ok", positions: { symbol: "NSE:X", netQty: 75 } }), "position");
  });

  test("fallback predicates apply in priority order", () => {
    assert.strictEqual(kindOf({ code: 200, message: "connected", ltp: 1 }), "general");
    assert.strictEqual(kindOf({ ltp: 1, bids: [] }), "quote");
    assert.strictEqual(kindOf({ bids: [], trade_price: 5 }), "depth");
    assert.strictEqual(kindOf({ trade_price: 5, tradeNumber: "T1" }), "tradePrint");
    assert.strictEqual(kindOf({ tradeNumber: "T1", id: "O1" }), "trade");
    assert.strictEqual(kindOf({ orderNumber: "O1", netQty: 5 }), "order");
    assert.strictEqual(kindOf({ qty: 5 }), "position");
    assert.strictEqual(kindOf({ hello: "world" }), "unknown");
  });

  test("code without message is not a general message", () => {
    assert.strictEqual(kindOf({ code: 200 }), "unknown");
  });

  test("extracts fields from fallback matches", () => {
    assert.deepStrictEqual(classifyMessage({ orderNumber: "O7", status: "6" }), {
      kind: "order",
      symbol: null,
      orderId: "O7",
      status: 6,
      raw: { orderNumber: "O7", status: "6" },
    });
    assert.deepStrictEqual(classifyMessage({ symbol: "NSE:X", qty: -75 }), {
      kind: "position",
      symbol: "NSE:X",
      netQty: -75,
      raw: { symbol: "NSE:X", qty: -75 },
    });
  });

  test("non-objects are unknown", () => {
    assert.deepStrictEqual(classifyMessage([1, 2]), { kind: "unknown", raw: [1, 2] });
    assert.deepStrictEqual(classifyMessage(null), { kind: "unknown", raw: null });
  });
});

describe("parseFrame", () => {
  test("one message per array element", () => {
    const messages = parseFrame('[{"ltp":1,"symbol":"A"},{"code":0,"message":"ok"}]');
    assert.deepStrictEqual(
      messages.map((m) => m.kind),
      ["quote", "general"],
    );
  });

  test("text that is not JSON is unknown", () => {
    assert.deepStrictEqual(parseFrame("not json"), [{ kind: "unknown", raw: "not json" }]);
  });
});
