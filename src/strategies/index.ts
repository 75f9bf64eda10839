export {
  EntryPolicy,
  REGULAR_SESSION,
  isMarketOpen,
  isTradingDay,
  type EntryConfirmation,
  type EntryPolicyConfig,
  type MarketWindow,
} from "./entry-policy";
export { StrikeSelector, atmStrike, type StrikeSelectorConfig } from "./strike-selector";
export { buildOptionSymbol, expiryCode, isLastExpiryOfMonth, type OptionSymbolParts } from "./symbols";
export { calculateRsi, type RsiResult } from "./indicators/rsi";
