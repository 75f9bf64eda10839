/**
 * StrikeSelector
 *
 * Turns a spot price into the strategy's legs. ATM is the spot rounded to the
 * nearest strike step (halves round up); each leg sits `offset` points out of
 * the money: above ATM for calls, below ATM for puts.
 *
 * Example, step 50 and call offsets 200/400/600:
 *   spot 22050 -> ATM 22050 -> 22250, 22450, 22650
 */

import type { StrategyConfig } from "../config/schema";
import type { Basket, Leg } from "../domain/trade.types";
import { buildOptionSymbol, expiryCode } from "./symbols";

export type StrikeSelectorConfig = Pick<
  StrategyConfig,
  "underlying" | "exchange" | "strikeStep" | "lotSize" | "legs" | "expiryFormat" | "timezone"
>;

export function atmStrike(spot: number, step: number): number {
  return Math.round(spot / step) * step;
}

export class StrikeSelector {
  constructor(private readonly config: StrikeSelectorConfig) {}

  /**
   * Legs in configured order, frozen
   */
  select(spot: number, expiry: Date): readonly Leg[] {
    if (!Number.isFinite(spot) || spot <= 0) {
      throw new RangeError(`spot must be a positive number, got ${spot}`);
    }

    const atm = atmStrike(spot, this.config.strikeStep);
    const code = expiryCode(expiry, this.config.expiryFormat, this.config.timezone);

    const legs = this.config.legs.map((legSpec): Leg => {
      const strike = legSpec.optionType === "CE" ? atm + legSpec.offset : atm - legSpec.offset;
      return Object.freeze({
        role: legSpec.role,
        symbol: buildOptionSymbol({
          exchange: this.config.exchange,
          underlying: this.config.underlying,
          expiryCode: code,
          strike,
          optionType: legSpec.optionType,
        }),
        optionType: legSpec.optionType,
        strike,
        side: legSpec.side,
        quantity: legSpec.qtyMultiplier * this.config.lotSize,
      });
    });
    return Object.freeze(legs);
  }

  buildBasket(id: string, spot: number, expiry: Date): Basket {
    return Object.freeze({ id, legs: this.select(spot, expiry) });
  }
}
