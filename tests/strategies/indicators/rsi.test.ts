import { describe, test } from "node:test";
import assert from "node:assert";
import { calculateRsi } from "../../../src/strategies/indicators/rsi";
import { candlesFromCloses } from "../../helpers/candles";

function rsiOf(closes: number[], period: number): number {
  const result = calculateRsi(candlesFromCloses(closes), period);
  assert.ok(result, "expected an RSI value");
  return result.rsi;
}

describe("calculateRsi", () => {
  test("needs period + 1 candles", () => {
    assert.strictEqual(calculateRsi(candlesFromCloses([1, 2, 3]), 3), null);
    assert.notStrictEqual(calculateRsi(candlesFromCloses([1, 2, 3, 4]), 3), null);
  });

  test("only gains gives 100, only losses gives 0", () => {
    assert.strictEqual(rsiOf([1, 2, 3, 4], 3), 100);
    assert.strictEqual(rsiOf([4, 3, 2, 1], 3), 0);
  });

  test("a flat series is neutral", () => {
    assert.strictEqual(rsiOf([5, 5, 5, 5], 3), 50);
  });

  test("seeds with simple averages", () => {
    // gains 2, losses 1 over two changes
    assert.ok(Math.abs(rsiOf([10, 12, 11], 2) - 200 / 3) < 1e-9);
  });

  test("smooths later changes with Wilder's method", () => {
    const result = calculateRsi(candlesFromCloses([10, 12, 11, 13]), 2);
    assert.ok(result);
    assert.strictEqual(result.avgGain, 1.5);
    assert.strictEqual(result.avgLoss, 0.25);
    assert.ok(Math.abs(result.rsi - (100 - 100 / 7)) < 1e-9);
    assert.strictEqual(result.timestamp, 1736740800 + 3 * 300);
  });
});
