/**
 * Paper order gate
 *
 * Wraps a BrokerClient. Unless live trading was acknowledged, orders never
 * reach the broker: they are acknowledged with SIM-n ids and their net
 * quantities are kept locally so the exit path sees the simulated legs.
 * Every read passes through to the wrapped client.
 */

import { sideLabel, type NetPosition } from "../../domain/trade.types";
import { silentLogger, type Logger } from "../../utils/logger.util";
import {
  ok,
  type BrokerClient,
  type BrokerProfile,
  type BrokerResult,
  type Candle,
  type CandleRequest,
  type OrderAck,
  type OrderRequest,
} from "./broker-client";

export class PaperOrderGate implements BrokerClient {
  private sequence = 0;
  private readonly simulated = new Map<string, number>();

  constructor(
    private readonly inner: BrokerClient,
    private readonly liveTrading: boolean,
    private readonly logger: Logger = silentLogger,
  ) {}

  get isLive(): boolean {
    return this.liveTrading;
  }

  getProfile(): Promise<BrokerResult<BrokerProfile>> {
    return this.inner.getProfile();
  }

  getQuote(symbols: readonly string[]): Promise<BrokerResult<Map<string, number>>> {
    return this.inner.getQuote(symbols);
  }

  getCandles(request: CandleRequest): Promise<BrokerResult<Candle[]>> {
    return this.inner.getCandles(request);
  }

  getNearestExpiry(indexSymbol: string, strikeCount: number): Promise<BrokerResult<Date>> {
    return this.inner.getNearestExpiry(indexSymbol, strikeCount);
  }

  async placeOrder(order: OrderRequest): Promise<BrokerResult<OrderAck>> {
    if (this.liveTrading) {
      return this.inner.placeOrder(order);
    }

    this.sequence += 1;
    const orderId = `SIM-${this.sequence}`;
    const netQty = (this.simulated.get(order.symbol) ?? 0) + order.side * order.quantity;
    this.simulated.set(order.symbol, netQty);
    this.logger.info(
      `[PAPER] ${sideLabel(order.side)} ${order.quantity} ${order.symbol} -> ${orderId}`,
    );
    return ok({ orderId, message: "simulated" });
  }

  /**
   * Broker positions, plus simulated legs the broker does not report
   */
  async getPositions(): Promise<BrokerResult<NetPosition[]>> {
    const result = await this.inner.getPositions();
    if (!result.success || this.liveTrading || this.simulated.size === 0) {
      return result;
    }

    const reported = new Set(result.data.map((p) => p.symbol));
    const paper: NetPosition[] = [];
    for (const [symbol, netQty] of this.simulated) {
      if (!reported.has(symbol)) paper.push({ symbol, netQty, pnl: 0 });
    }
    return ok([...result.data, ...paper]);
  }

  getFunds(): Promise<BrokerResult<number>> {
    return this.inner.getFunds();
  }
}
