/**
 * RSI (Relative Strength Index) over candle closes, Wilder smoothing.
 *
 * RSI = 100 - 100 / (1 + avgGain / avgLoss). The first averages are simple
 * means over `period` changes; later changes are smoothed with alpha = 1/period.
 */

import type { Candle } from "../../services/broker/broker-client";

export interface RsiResult {
  /** 0-100 */
  rsi: number;
  avgGain: number;
  avgLoss: number;
  /** Timestamp of the last candle, epoch seconds */
  timestamp: number;
}

/**
 * Returns null when fewer than period + 1 candles are available
 */
export function calculateRsi(candles: readonly Candle[], period = 14): RsiResult | null {
  if (period < 1 || candles.length < period + 1) {
    return null;
  }

  const changes: number[] = [];
  for (let i = 1; i < candles.length; i++) {
    changes.push(candles[i].close - candles[i - 1].close);
  }

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 0; i < period; i++) {
    const change = changes[i];
    if (change > 0) {
      avgGain += change;
    } else {
      avgLoss += Math.abs(change);
    }
  }
  avgGain /= period;
  avgLoss /= period;

  for (let i = period; i < changes.length; i++) {
    const change = changes[i];
    const gain = change > 0 ? change : 0;
    const loss = change < 0 ? Math.abs(change) : 0;
    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
  }

  let rsi: number;
  if (avgLoss === 0) {
    rsi = avgGain === 0 ? 50 : 100;
  } else if (avgGain === 0) {
    rsi = 0;
  } else {
    rsi = 100 - 100 / (1 + avgGain / avgLoss);
  }

  return {
    rsi,
    avgGain,
    avgLoss,
    timestamp: candles[candles.length - 1].timestamp,
  };
}
