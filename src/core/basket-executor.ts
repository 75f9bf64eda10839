/**
 * BasketExecutor
 *
 * Places the legs of a basket one at a time, in order, waiting the pacing
 * interval between placements. The first leg that is not accepted stops the
 * basket: later legs are never sent and the result is "partial". Nothing is
 * retried or unwound here; that is the engine's call.
 */

import {
  BUY,
  SELL,
  sideLabel,
  type Basket,
  type ExecutionResult,
  type Leg,
  type LegExecution,
  type NetPosition,
  type ProductType,
  type Side,
} from "../domain/trade.types";
import { toError } from "../errors/app.errors";
import { describeFailure, type BrokerClient } from "../services/broker/broker-client";
import { silentLogger, type Logger } from "../utils/logger.util";
import type { Clock } from "./clock";

export type SideTransform = (side: Side) => Side;

export const keepSide: SideTransform = (side) => side;

export interface BasketExecutorOptions {
  broker: BrokerClient;
  clock: Clock;
  productType: ProductType;
  orderPacingMs: number;
  logger?: Logger;
}

export class BasketExecutor {
  private readonly broker: BrokerClient;
  private readonly clock: Clock;
  private readonly productType: ProductType;
  private readonly orderPacingMs: number;
  private readonly logger: Logger;

  constructor(options: BasketExecutorOptions) {
    this.broker = options.broker;
    this.clock = options.clock;
    this.productType = options.productType;
    this.orderPacingMs = options.orderPacingMs;
    this.logger = options.logger ?? silentLogger;
  }

  async execute(basket: Basket, sideTransform: SideTransform = keepSide): Promise<ExecutionResult> {
    const executions: LegExecution[] = [];
    const total = basket.legs.length;

    for (let i = 0; i < total; i++) {
      if (i > 0 && this.orderPacingMs > 0) {
        await this.clock.sleep(this.orderPacingMs);
      }

      const execution = await this.placeLeg(basket.legs[i], sideTransform);
      executions.push(execution);
      this.logLeg(basket.id, i + 1, total, execution);

      if (!execution.accepted) {
        this.logger.warn(
          `[${basket.id}] stopped after leg ${i + 1}/${total}; ${total - i - 1} leg(s) not sent`,
        );
        return { basketId: basket.id, status: "partial", legs: executions };
      }
    }

    return { basketId: basket.id, status: "complete", legs: executions };
  }

  /**
   * Closing basket for the live net positions of `basket`'s symbols, in the
   * basket's leg order. Flat positions and symbols outside the basket are left
   * out; an empty result means nothing is open.
   */
  buildExitBasket(positions: readonly NetPosition[], basket: Basket, id = `${basket.id}-exit`): Basket {
    const bySymbol = new Map<string, number>();
    for (const position of positions) {
      bySymbol.set(position.symbol, (bySymbol.get(position.symbol) ?? 0) + position.netQty);
    }

    const seen = new Set<string>();
    const legs: Leg[] = [];
    for (const leg of basket.legs) {
      if (seen.has(leg.symbol)) continue;
      seen.add(leg.symbol);

      const netQty = bySymbol.get(leg.symbol) ?? 0;
      if (netQty === 0) continue;
      legs.push(
        Object.freeze({
          ...leg,
          side: netQty > 0 ? SELL : BUY,
          quantity: Math.abs(netQty),
        }),
      );
    }

    return Object.freeze({ id, legs: Object.freeze(legs) });
  }

  private async placeLeg(leg: Leg, sideTransform: SideTransform): Promise<LegExecution> {
    const side = sideTransform(leg.side);
    const base = { role: leg.role, symbol: leg.symbol, side, quantity: leg.quantity };

    try {
      const result = await this.broker.placeOrder({
        symbol: leg.symbol,
        quantity: leg.quantity,
        side,
        productType: this.productType,
        tag: leg.role,
      });
      if (result.success) {
        return { ...base, orderId: result.data.orderId, accepted: true, errorDetail: null };
      }
      return { ...base, orderId: null, accepted: false, errorDetail: describeFailure(result.error) };
    } catch (err) {
      return { ...base, orderId: null, accepted: false, errorDetail: toError(err).message };
    }
  }

  private logLeg(basketId: string, index: number, total: number, leg: LegExecution): void {
    const head = `[${basketId}] leg ${index}/${total} ${leg.role} ${sideLabel(leg.side)} ${leg.quantity} ${leg.symbol}`;
    if (leg.accepted) {
      this.logger.info(`${head} -> order ${leg.orderId}`);
    } else {
      this.logger.error(`${head} -> rejected: ${leg.errorDetail}`);
    }
  }
}
