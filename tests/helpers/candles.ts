import type { Candle } from "../../src/services/broker/broker-client";

/** Five-minute candles with the given closes */
export function candlesFromCloses(closes: readonly number[], start = 1736740800): Candle[] {
  return closes.map((close, i) => ({
    timestamp: start + i * 300,
    open: close,
    high: close,
    low: close,
    close,
    volume: 100,
  }));
}
