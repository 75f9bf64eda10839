import { describe, test } from "node:test";
import assert from "node:assert";
import {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";
import { BUY, SELL } from "../../../src/domain/trade.types";
import { FyersRestClient } from "../../../src/services/broker/fyers-rest-client";
import { createBrokerRateLimiters } from "../../../src/services/broker/rate-limit";

interface Reply {
  status?: number;
  statusText?: string;
  data?: unknown;
  /** Fail without a response, like a dropped connection */
  networkError?: string;
}

const noWait = async (): Promise<void> => undefined;

/**
 * Client wired to an in-process adapter; `replies` are served in order and
 * the last one repeats
 */
function createClient(...replies: Reply[]) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const reply = replies.length > 1 ? replies.shift() : replies[0];
    if (!reply) throw new Error("no reply scripted");

    if (reply.networkError) {
      throw new AxiosError(reply.networkError, "ECONNRESET", config, null, undefined);
    }
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status ?? 200,
      statusText: reply.statusText ?? "OK",
      headers: {},
      config,
    };
    if (response.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${response.status}`,
        "ERR_BAD_REQUEST",
        config,
        null,
        response,
      );
    }
    return response;
  };

  const client = new FyersRestClient({
    credentials: { clientId: "client-1", accessToken: "test-secret" },
    endpoints: { apiUrl: "https://api.test", dataUrl: "https://api.test/data", timeoutMs: 1000 },
    retry: { maxRetries: 2, sleep: noWait },
    rateLimiters: createBrokerRateLimiters({ sleep: noWait }),
    adapter,
  });
  return { client, requests };
}

function only<T>(items: T[]): T {
  assert.strictEqual(items.length, 1);
  const [item] = items;
  return item;
}

describe("FyersRestClient", () => {
  describe("reads", () => {
    test("getProfile sends the client:token authorization header", async () => {
      const { client, requests } = createClient({
        data: { s: "ok", code: 200, data: { fy_id: "client-1", name: "Test Trader" } },
      });

      const result = await client.getProfile();

      assert.deepStrictEqual(result, { success: true, data: { name: "Test Trader", clientId: "client-1" } });
      const request = only(requests);
      assert.strictEqual(request.url, "https://api.test/api/v3/profile");
      assert.strictEqual(request.headers.get("Authorization"), "client-1:test-secret");
    });

    test("getQuote maps last traded prices by symbol", async () => {
      const { client, requests } = createClient({
        data: {
          s: "ok",
          d: [
            { n: "NSE:NIFTY50-INDEX", s: "ok", v: { lp: 22050.35 } },
            { n: "NSE:BANKNIFTY-INDEX", s: "error", v: {} },
          ],
        },
      });

      const result = await client.getQuote(["NSE:NIFTY50-INDEX"]);

      assert.ok(result.success);
      assert.strictEqual(result.data.get("NSE:NIFTY50-INDEX"), 22050.35);
      assert.deepStrictEqual(only(requests).params, { symbols: "NSE:NIFTY50-INDEX" });
    });

    test("getQuote fails when a requested symbol is missing", async () => {
      const { client } = createClient({
        data: { s: "ok", d: [{ n: "A", s: "ok", v: { lp: 10 } }] },
      });

      const result = await client.getQuote(["A", "B"]);

      assert.deepStrictEqual(result, { success: false, error: { kind: "rejected", message: "no quote for B" } });
    });

    test("getCandles passes the date range and parses rows", async () => {
      const { client, requests } = createClient({
        data: { s: "ok", candles: [[1736740800, 100, 110, 95, 105, 1200]] },
      });

      const result = await client.getCandles({
        symbol: "NSE:NIFTY50-INDEX",
        resolution: "5",
        from: "2025-01-08",
        to: "2025-01-13",
      });

      assert.deepStrictEqual(result, {
        success: true,
        data: [{ timestamp: 1736740800, open: 100, high: 110, low: 95, close: 105, volume: 1200 }],
      });
      const request = only(requests);
      assert.strictEqual(request.url, "https://api.test/data/history");
      assert.deepStrictEqual(request.params, {
        symbol: "NSE:NIFTY50-INDEX",
        resolution: "5",
        date_format: 1,
        range_from: "2025-01-08",
        range_to: "2025-01-13",
        cont_flag: 1,
      });
    });

    test("getNearestExpiry picks the earliest listed expiry", async () => {
      const { client, requests } = createClient({
        data: {
          s: "ok",
          data: {
            expiryData: [
              { date: "23-01-2025", expiry: "1737626400" },
              { date: "16-01-2025", expiry: "1737021600" },
            ],
          },
        },
      });

      const result = await client.getNearestExpiry("NSE:NIFTY50-INDEX", 5);

      assert.ok(result.success);
      assert.strictEqual(result.data.toISOString(), "2025-01-16T10:00:00.000Z");
      assert.deepStrictEqual(only(requests).params, { symbol: "NSE:NIFTY50-INDEX", strikecount: 5 });
    });

    test("getNearestExpiry rejects an empty chain", async () => {
      const { client } = createClient({ data: { s: "ok", data: { expiryData: [] } } });

      const result = await client.getNearestExpiry("NSE:NIFTY50-INDEX", 5);

      assert.deepStrictEqual(result, {
        success: false,
        error: { kind: "rejected", message: "option chain for NSE:NIFTY50-INDEX lists no expiries" },
      });
    });

    test("getPositions reads netPositions", async () => {
      const { client } = createClient({
        data: {
          s: "ok",
          netPositions: [{ symbol: "NSE:NIFTY2511622250CE", netQty: 75, pl: 12.5, buyAvg: 80 }],
        },
      });

      const result = await client.getPositions();

      assert.deepStrictEqual(result, {
        success: true,
        data: [{ symbol: "NSE:NIFTY2511622250CE", netQty: 75, pnl: 12.5 }],
      });
    });

    test("getPositions treats a missing list as no positions", async () => {
      const { client } = createClient({ data: { s: "ok", code: 200 } });

      assert.deepStrictEqual(await client.getPositions(), { success: true, data: [] });
    });

    test("getFunds returns the utilized amount", async () => {
      const { client } = createClient({
        data: {
          s: "ok",
          fund_limit: [
            { id: 1, title: "Total Balance", equityAmount: 500000 },
            { id: 2, title: "Utilized Amount", equityAmount: 123456.5 },
          ],
        },
      });

      assert.deepStrictEqual(await client.getFunds(), { success: true, data: 123456.5 });
    });

    test("getFunds reports an unexpected shape as transient", async () => {
      const { client } = createClient({ data: { s: "ok" } });

      assert.deepStrictEqual(await client.getFunds(), {
        success: false,
        error: { kind: "transient", message: "unexpected funds response shape" },
      });
    });

    test("reads are retried after a dropped connection", async () => {
      const { client, requests } = createClient(
        { networkError: "socket hang up" },
        { data: { s: "ok", fund_limit: [{ title: "Utilized Amount", equityAmount: 1000 }] } },
      );

      assert.deepStrictEqual(await client.getFunds(), { success: true, data: 1000 });
      assert.strictEqual(requests.length, 2);
    });
  });

  describe("failures", () => {
    test("HTTP 401 maps to auth and redacts the token", async () => {
      const { client, requests } = createClient({
        status: 401,
        statusText: "Unauthorized",
        data: { s: "error", code: -16, message: "token test-secret expired" },
      });

      const result = await client.getProfile();

      assert.deepStrictEqual(result, {
        success: false,
        error: {
          kind: "auth",
          code: -16,
          message:
            'profile failed: status=401 statusText="Unauthorized" method=GET url=https://api.test/api/v3/profile ' +
            'code=ERR_BAD_REQUEST brokerCode=-16 error="token <redacted> expired"',
        },
      });
      assert.strictEqual(requests.length, 1);
    });

    test("an auth code in a 200 body maps to auth", async () => {
      const { client } = createClient({ data: { s: "error", code: -15, message: "invalid token" } });

      assert.deepStrictEqual(await client.getPositions(), {
        success: false,
        error: { kind: "auth", message: "invalid token", code: -15 },
      });
    });
  });

  describe("placeOrder", () => {
    test("sends a market order and returns the order id", async () => {
      const { client, requests } = createClient({
        data: { s: "ok", code: 1101, message: "Order submitted", id: "25011300001" },
      });

      const result = await client.placeOrder({
        symbol: "NSE:NIFTY2511622250CE",
        quantity: 75,
        side: BUY,
        productType: "INTRADAY",
        tag: "BUY_OTM_CE",
      });

      assert.deepStrictEqual(result, {
        success: true,
        data: { orderId: "25011300001", message: "Order submitted" },
      });
      const request = only(requests);
      assert.strictEqual(request.method, "post");
      assert.strictEqual(request.url, "https://api.test/api/v3/orders/sync");
      assert.deepStrictEqual(JSON.parse(String(request.data)), {
        symbol: "NSE:NIFTY2511622250CE",
        qty: 75,
        type: 2,
        side: 1,
        productType: "INTRADAY",
        limitPrice: 0,
        stopPrice: 0,
        validity: "DAY",
        disclosedQty: 0,
        offlineOrder: false,
        orderTag: "BUYOTMCE",
      });
    });

    test("a broker rejection is returned with its code", async () => {
      const { client } = createClient({ data: { s: "error", code: -50, message: "Insufficient funds" } });

      const result = await client.placeOrder({
        symbol: "NSE:NIFTY2511622450CE",
        quantity: 225,
        side: SELL,
        productType: "INTRADAY",
      });

      assert.deepStrictEqual(result, {
        success: false,
        error: { kind: "rejected", message: "Insufficient funds", code: -50 },
      });
    });

    test("a dropped connection is not retried", async () => {
      const { client, requests } = createClient({ networkError: "socket hang up" });

      const result = await client.placeOrder({
        symbol: "NSE:NIFTY2511622250CE",
        quantity: 75,
        side: BUY,
        productType: "INTRADAY",
      });

      assert.strictEqual(requests.length, 1);
      assert.deepStrictEqual(result, {
        success: false,
        error: {
          kind: "transient",
          message:
            'order failed: method=POST url=https://api.test/api/v3/orders/sync code=ECONNRESET error="socket hang up"',
        },
      });
    });
  });
});
