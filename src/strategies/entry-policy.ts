/**
 * EntryPolicy
 *
 * Decides when a basket may be entered. The schedule check is pure: the
 * weekday is one of the entry weekdays, the local time has reached the entry
 * time, and the regular session [09:15, 15:30) is open on a trading day
 * (Mon-Fri, not a listed holiday). All of it is evaluated in the strategy
 * timezone.
 *
 * The optional RSI filter is checked separately, after the schedule allows
 * entry, because it needs broker candles.
 */

import type { StrategyConfig } from "../config/schema";
import { MARKET_HOURS } from "../constants/broker.constants";
import { describeFailure, type BrokerClient } from "../services/broker/broker-client";
import { silentLogger, type Logger } from "../utils/logger.util";
import {
  clockTime,
  secondsOfDay,
  utcDateKey,
  zonedDateKey,
  zonedParts,
  type ClockTime,
} from "../utils/time.util";
import { calculateRsi } from "./indicators/rsi";

export type EntryPolicyConfig = Pick<
  StrategyConfig,
  "entryWeekdays" | "entryTime" | "timezone" | "holidays" | "rsiFilter" | "indexSymbol"
>;

export interface MarketWindow {
  open: ClockTime;
  close: ClockTime;
}

export const REGULAR_SESSION: MarketWindow = {
  open: clockTime(MARKET_HOURS.OPEN),
  close: clockTime(MARKET_HOURS.CLOSE),
};

const DAY_MS = 24 * 60 * 60 * 1000;

export function isTradingDay(now: Date, timeZone: string, holidays: readonly string[]): boolean {
  const { weekday } = zonedParts(now, timeZone);
  if (weekday === "SAT" || weekday === "SUN") return false;
  return !holidays.includes(zonedDateKey(now, timeZone));
}

/**
 * Regular session open: trading day and local time in [open, close)
 */
export function isMarketOpen(
  now: Date,
  timeZone: string,
  holidays: readonly string[],
  window: MarketWindow = REGULAR_SESSION,
): boolean {
  if (!isTradingDay(now, timeZone, holidays)) return false;
  const p = zonedParts(now, timeZone);
  const seconds = p.hour * 3600 + p.minute * 60 + p.second;
  return seconds >= secondsOfDay(window.open) && seconds < secondsOfDay(window.close);
}

export interface EntryConfirmation {
  allowed: boolean;
  detail: string;
}

export class EntryPolicy {
  constructor(
    private readonly config: EntryPolicyConfig,
    private readonly broker: BrokerClient | null = null,
    private readonly logger: Logger = silentLogger,
  ) {}

  shouldEnter(now: Date): boolean {
    const { timezone, holidays } = this.config;
    const p = zonedParts(now, timezone);
    if (!this.config.entryWeekdays.includes(p.weekday)) return false;

    const seconds = p.hour * 3600 + p.minute * 60 + p.second;
    if (seconds < secondsOfDay(this.config.entryTime)) return false;

    return isMarketOpen(now, timezone, holidays);
  }

  /**
   * Indicator gate; passes at once when no filter is configured.
   * A failed candle read blocks entry for this tick only.
   */
  async confirm(now: Date): Promise<EntryConfirmation> {
    const filter = this.config.rsiFilter;
    if (!filter) return { allowed: true, detail: "no indicator filter" };
    if (!this.broker) return { allowed: false, detail: "RSI filter needs a broker client" };

    const result = await this.broker.getCandles({
      symbol: this.config.indexSymbol,
      resolution: filter.resolution,
      from: utcDateKey(new Date(now.getTime() - filter.historyDays * DAY_MS)),
      to: utcDateKey(now),
    });
    if (!result.success) {
      const detail = `candles unavailable (${describeFailure(result.error)})`;
      this.logger.warn(`RSI filter: ${detail}`);
      return { allowed: false, detail };
    }

    const rsi = calculateRsi(result.data, filter.length);
    if (!rsi) {
      return {
        allowed: false,
        detail: `not enough candles for RSI(${filter.length}): ${result.data.length}`,
      };
    }

    const value = rsi.rsi.toFixed(2);
    if (filter.min !== undefined && rsi.rsi < filter.min) {
      return { allowed: false, detail: `RSI ${value} below ${filter.min}` };
    }
    if (filter.max !== undefined && rsi.rsi > filter.max) {
      return { allowed: false, detail: `RSI ${value} above ${filter.max}` };
    }
    return { allowed: true, detail: `RSI ${value} within range` };
  }
}
