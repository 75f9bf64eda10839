import type { NetPosition } from "../../src/domain/trade.types";
import {
  failure,
  ok,
  type BrokerClient,
  type BrokerProfile,
  type BrokerResult,
  type Candle,
  type CandleRequest,
  type OrderAck,
  type OrderRequest,
} from "../../src/services/broker/broker-client";

export const INDEX_SYMBOL = "NSE:NIFTY50-INDEX";

/** Thursday 2025-01-16 15:30 IST */
export const NEAREST_EXPIRY = new Date("2025-01-16T10:00:00Z");

/**
 * In-memory broker. Positions are derived from the orders it accepted; the
 * P&L of each read comes from `pnlSequence` (the last value repeats) and is
 * booked on the first position.
 */
export class FakeBroker implements BrokerClient {
  spot = 22050;
  expiry: BrokerResult<Date> = ok(NEAREST_EXPIRY);
  candles: BrokerResult<Candle[]> = ok([]);
  /** Consumed one per call; the last entry repeats */
  funds: BrokerResult<number>[] = [ok(100000)];
  pnlSequence: number[] = [0];
  /** Served before derived positions, one per call */
  positionOverrides: BrokerResult<NetPosition[]>[] = [];
  /** 0-based order call indexes to reject */
  rejectOrders = new Set<number>();
  quoteFailure: BrokerResult<Map<string, number>> | null = null;

  readonly orders: OrderRequest[] = [];
  readonly candleRequests: CandleRequest[] = [];
  positionReads = 0;
  fundsReads = 0;

  private readonly net = new Map<string, number>();

  async getProfile(): Promise<BrokerResult<BrokerProfile>> {
    return ok({ name: "Test Trader", clientId: "client-1" });
  }

  async getQuote(symbols: readonly string[]): Promise<BrokerResult<Map<string, number>>> {
    if (this.quoteFailure) return this.quoteFailure;
    return ok(new Map(symbols.map((symbol) => [symbol, this.spot])));
  }

  async getCandles(request: CandleRequest): Promise<BrokerResult<Candle[]>> {
    this.candleRequests.push(request);
    return this.candles;
  }

  async getNearestExpiry(): Promise<BrokerResult<Date>> {
    return this.expiry;
  }

  async placeOrder(order: OrderRequest): Promise<BrokerResult<OrderAck>> {
    const index = this.orders.length;
    this.orders.push(order);
    if (this.rejectOrders.has(index)) {
      return failure("rejected", "margin shortfall", -50);
    }
    this.net.set(order.symbol, (this.net.get(order.symbol) ?? 0) + order.side * order.quantity);
    return ok({ orderId: `ORD-${index + 1}`, message: "placed" });
  }

  async getPositions(): Promise<BrokerResult<NetPosition[]>> {
    this.positionReads++;
    const override = this.positionOverrides.shift();
    if (override) return override;

    const pnl = this.pnlSequence.length > 1 ? this.pnlSequence.shift() ?? 0 : this.pnlSequence[0] ?? 0;
    const positions = [...this.net].map(
      ([symbol, netQty], index): NetPosition => ({ symbol, netQty, pnl: index === 0 ? pnl : 0 }),
    );
    return ok(positions);
  }

  async getFunds(): Promise<BrokerResult<number>> {
    this.fundsReads++;
    const next = this.funds.length > 1 ? this.funds.shift() : this.funds[0];
    return next ?? ok(0);
  }

  netQty(symbol: string): number {
    return this.net.get(symbol) ?? 0;
  }
}
