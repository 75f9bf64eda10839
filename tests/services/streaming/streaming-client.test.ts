import { describe, test } from "node:test";
import assert from "node:assert";
import type { ConnectionError } from "../../../src/errors/app.errors";
import {
  StreamingClient,
  type StreamingClientOptions,
} from "../../../src/services/streaming/streaming-client";
import { createFakeSocketFactory, type FakeSocketFactory } from "../../helpers/fake-socket";
import { waitFor } from "../../helpers/wait";

function createClient(
  sockets: FakeSocketFactory,
  options: Partial<StreamingClientOptions> = {},
): StreamingClient {
  return new StreamingClient({
    kind: "data",
    url: "wss://stream.test/data",
    credentials: { clientId: "client-1", accessToken: "test-secret" },
    socketFactory: sockets.factory,
    reconnectBaseMs: 1,
    reconnectMaxMs: 5,
    random: () => 0,
    ...options,
  });
}

describe("StreamingClient", () => {
  test("authenticates the handshake and subscribes on connect", async () => {
    const sockets = createFakeSocketFactory();
    const client = createClient(sockets);
    client.subscribe("SymbolUpdate", ["NSE:A", "NSE:B"]);
    client.subscribe("DepthUpdate", ["NSE:A"]);

    client.connect();
    const socket = sockets.latest();
    assert.strictEqual(socket.url, "wss://stream.test/data");
    assert.deepStrictEqual(socket.headers, { Authorization: "client-1:test-secret" });
    assert.strictEqual(client.getState(), "CONNECTING");
    assert.deepStrictEqual(socket.sent, []);

    socket.open();

    assert.strictEqual(client.isConnected(), true);
    assert.deepStrictEqual(socket.frames(), [
      { type: "subscribe", dataType: "SymbolUpdate", symbols: ["NSE:A", "NSE:B"] },
      { type: "subscribe", dataType: "DepthUpdate", symbols: ["NSE:A"] },
    ]);

    await client.disconnect();
  });

  test("re-sends the same subscription set after a reconnect", async () => {
    const sockets = createFakeSocketFactory();
    const errors: ConnectionError[] = [];
    const client = createClient(sockets, { onDisconnect: (error) => errors.push(error) });
    client.subscribe("SymbolUpdate", ["NSE:A", "NSE:B"]);
    client.connect();
    const first = sockets.latest();
    first.open();

    first.serverClose(1006, "abnormal");
    assert.strictEqual(client.getState(), "RECONNECTING");
    await waitFor(() => sockets.sockets.length === 2);
    assert.strictEqual(client.getState(), "CONNECTING");
    const second = sockets.latest();
    second.open();
    assert.strictEqual(client.getState(), "CONNECTED");

    assert.deepStrictEqual(second.sent, first.sent);
    assert.strictEqual(errors.length, 1);
    assert.strictEqual(errors[0].message, 'data stream closed: code=1006 reason="abnormal"');
    assert.strictEqual(errors[0].closeCode, 1006);

    // the abandoned socket no longer feeds the channel
    first.receive('{"ltp":1,"symbol":"NSE:A"}');
    assert.strictEqual(client.channel.size, 0);

    await client.disconnect();
  });

  test("reconnects after a normal close it did not request", async () => {
    const sockets = createFakeSocketFactory();
    const client = createClient(sockets);
    client.connect();
    sockets.latest().open();

    sockets.latest().serverClose(1000, "server restart");
    await waitFor(() => sockets.sockets.length === 2);

    assert.strictEqual(client.getMetrics().disconnectCount, 1);
    await client.disconnect();
  });

  test("subscription changes while connected send only the difference", async () => {
    const sockets = createFakeSocketFactory();
    const client = createClient(sockets);
    client.subscribe("SymbolUpdate", ["NSE:A"]);
    client.connect();
    const socket = sockets.latest();
    socket.open();

    client.subscribe("SymbolUpdate", ["NSE:A", "NSE:C"]);
    client.unsubscribe("SymbolUpdate", ["NSE:A"]);

    assert.deepStrictEqual(socket.frames(), [
      { type: "subscribe", dataType: "SymbolUpdate", symbols: ["NSE:A"] },
      { type: "subscribe", dataType: "SymbolUpdate", symbols: ["NSE:C"] },
      { type: "unsubscribe", dataType: "SymbolUpdate", symbols: ["NSE:A"] },
    ]);
    assert.deepStrictEqual(client.getSubscriptions(), [{ dataType: "SymbolUpdate", symbol: "NSE:C" }]);

    await client.disconnect();
  });

  test("order feeds subscribe by data type only", async () => {
    const sockets = createFakeSocketFactory();
    const client = createClient(sockets, { kind: "order", url: "wss://stream.test/order" });
    client.subscribe("OnOrders");
    client.subscribe("OnPositions");

    assert.throws(() => client.subscribe("SymbolUpdate", ["NSE:A"]), RangeError);

    client.connect();
    sockets.latest().open();

    assert.deepStrictEqual(sockets.latest().frames(), [
      { type: "subscribe", dataType: "OnOrders" },
      { type: "subscribe", dataType: "OnPositions" },
    ]);
    await client.disconnect();
  });

  test("classified frames go to the channel and pong is swallowed", async () => {
    const sockets = createFakeSocketFactory();
    const client = createClient(sockets);
    client.connect();
    const socket = sockets.latest();
    socket.open();

    socket.receive('{"type":"sf","symbol":"NSE:A","ltp":101.5}');
    socket.receive("pong");

    assert.strictEqual(client.channel.size, 1);
    assert.deepStrictEqual(await client.channel.next(), {
      kind: "quote",
      symbol: "NSE:A",
      ltp: 101.5,
      raw: { type: "sf", symbol: "NSE:A", ltp: 101.5 },
    });
    assert.strictEqual(client.getMetrics().messagesReceived, 2);

    await client.disconnect();
  });

  test("a silent socket is terminated and replaced", async () => {
    const sockets = createFakeSocketFactory();
    const client = createClient(sockets, { pingIntervalMs: 2, pongTimeoutMs: 5 });
    client.connect();
    const first = sockets.latest();
    first.open();

    await waitFor(() => sockets.sockets.length === 2);

    assert.ok(first.sent.includes("ping"));
    assert.strictEqual(first.terminated, 1);
    await client.disconnect();
  });

  describe("disconnect", () => {
    test("closes once and stops reconnecting", async () => {
      const sockets = createFakeSocketFactory();
      const client = createClient(sockets);
      client.connect();
      const socket = sockets.latest();
      socket.open();

      const first = client.disconnect();
      const second = client.disconnect();
      await first;

      assert.strictEqual(first, second);
      assert.deepStrictEqual(socket.closeCalls, [{ code: 1000, reason: "Client disconnect" }]);
      assert.strictEqual(client.getState(), "DISCONNECTED");

      client.connect();
      assert.strictEqual(sockets.sockets.length, 1);
    });

    test("terminates when no close arrives within the grace period", async () => {
      const sockets = createFakeSocketFactory({ echoClose: false });
      const client = createClient(sockets, { disconnectGraceMs: 5 });
      client.connect();
      const socket = sockets.latest();
      socket.open();

      await client.disconnect();

      assert.strictEqual(socket.closeCalls.length, 1);
      assert.strictEqual(socket.terminated, 1);
      assert.strictEqual(client.getState(), "DISCONNECTED");
    });

    test("without a socket resolves at once", async () => {
      const client = createClient(createFakeSocketFactory());
      await client.disconnect();
      assert.strictEqual(client.getState(), "DISCONNECTED");
    });
  });
});
