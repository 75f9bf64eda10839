/**
 * Strategy presets, expressed in the same shape as the `strategy:` section of
 * the strategy file. Keys set in the file override the preset.
 */

export const STRATEGY_PRESETS = {
  // Monday entry, call ratio ladder: +200 x1 BUY, +400 x3 SELL, +600 x2 BUY
  "ratio-call-ladder": {
    underlying: "NIFTY",
    index_symbol: "NSE:NIFTY50-INDEX",
    exchange: "NSE",
    strike_step: 50,
    lot_size: 75,
    legs: [
      { role: "BUY_OTM_CE", option_type: "CE", side: "BUY", offset: 200, qty_multiplier: 1 },
      { role: "SELL_CE", option_type: "CE", side: "SELL", offset: 400, qty_multiplier: 3 },
      { role: "BUY_HEDGE_CE", option_type: "CE", side: "BUY", offset: 600, qty_multiplier: 2 },
    ],
    target_percent: 1,
    stop_loss_percent: 1,
    entry_days: ["MON"],
    entry_time: "09:45",
    exit_time: "15:30",
    product_type: "INTRADAY",
    poll_interval_seconds: 30,
    expiry_format: "weekly",
  },
  // Daily short strangle: sell CE and PE 100 points away from ATM, out at 15:00
  "short-strangle": {
    underlying: "NIFTY",
    index_symbol: "NSE:NIFTY50-INDEX",
    exchange: "NSE",
    strike_step: 50,
    lot_size: 75,
    legs: [
      { role: "SELL_CE", option_type: "CE", side: "SELL", offset: 100, qty_multiplier: 1 },
      { role: "SELL_PE", option_type: "PE", side: "SELL", offset: 100, qty_multiplier: 1 },
    ],
    target_percent: 1.5,
    stop_loss_percent: 1,
    entry_days: ["MON", "TUE", "WED", "THU", "FRI"],
    entry_time: "09:20",
    exit_time: "15:00",
    product_type: "INTRADAY",
    poll_interval_seconds: 10,
    expiry_format: "weekly",
  },
} as const;

export type StrategyPresetName = keyof typeof STRATEGY_PRESETS;

export const DEFAULT_STRATEGY_PRESET: StrategyPresetName = "ratio-call-ladder";

export function isStrategyPresetName(value: string): value is StrategyPresetName {
  return Object.prototype.hasOwnProperty.call(STRATEGY_PRESETS, value);
}
