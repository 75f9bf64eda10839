import { describe, test } from "node:test";
import assert from "node:assert";
import { ManualClock, SystemClock } from "../../src/core/clock";

describe("SystemClock", () => {
  test("sleep resolves early when aborted", async () => {
    const clock = new SystemClock();
    const controller = new AbortController();
    const started = Date.now();

    const sleeping = clock.sleep(60_000, controller.signal);
    controller.abort();
    await sleeping;

    assert.ok(Date.now() - started < 1000);
  });

  test("sleep on an aborted signal returns at once", async () => {
    const controller = new AbortController();
    controller.abort();
    await new SystemClock().sleep(60_000, controller.signal);
  });
});

describe("ManualClock", () => {
  test("sleep advances time and records the duration", async () => {
    const clock = new ManualClock(new Date("2025-01-13T04:15:00Z"));
    const seen: string[] = [];
    clock.onSleep = (now) => seen.push(now.toISOString());

    await clock.sleep(30_000);
    clock.advance(500);

    assert.deepStrictEqual(clock.sleeps, [30_000]);
    assert.deepStrictEqual(seen, ["2025-01-13T04:15:30.000Z"]);
    assert.strictEqual(clock.now().toISOString(), "2025-01-13T04:15:30.500Z");
  });

  test("sleep on an aborted signal does not move time", async () => {
    const clock = new ManualClock(new Date("2025-01-13T04:15:00Z"));
    const controller = new AbortController();
    controller.abort();

    await clock.sleep(30_000, controller.signal);

    assert.deepStrictEqual(clock.sleeps, []);
    assert.strictEqual(clock.now().toISOString(), "2025-01-13T04:15:00.000Z");
  });
});
