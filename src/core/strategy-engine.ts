/**
 * StrategyEngine
 *
 * One entry cycle of a basket strategy:
 *
 *   WAITING_ENTRY -> ENTERING -> MONITORING -> EXITING -> DONE
 *                       |                         |
 *                       +--------> FAILED <-------+
 *
 * The engine is the only owner of MonitoringState. It enters at most once per
 * trading day and `run()` returns once the cycle is DONE or FAILED, or when
 * the shutdown signal fires while waiting.
 */

import type { StrategyConfig } from "../config/schema";
import {
  invertSide,
  sideLabel,
  type Basket,
  type ExecutionResult,
  type ExitReason,
  type MonitoringState,
} from "../domain/trade.types";
import { describeFailure, type BrokerClient } from "../services/broker/broker-client";
import { EntryPolicy } from "../strategies/entry-policy";
import { StrikeSelector } from "../strategies/strike-selector";
import { formatAmount, silentLogger, type Logger } from "../utils/logger.util";
import { zonedDateKey } from "../utils/time.util";
import { BasketExecutor } from "./basket-executor";
import type { Clock } from "./clock";
import { PositionMonitor } from "./position-monitor";

export type EngineState =
  | "WAITING_ENTRY"
  | "ENTERING"
  | "MONITORING"
  | "EXITING"
  | "DONE"
  | "FAILED";

export interface EngineOutcome {
  state: EngineState;
  basketId: string | null;
  exitReason: ExitReason;
  /** Sum of basket position P&L read after the exit; null if unavailable */
  realizedPnl: number | null;
  /** Why the cycle failed, when it did */
  failure: string | null;
}

export interface StrategyEngineOptions {
  config: StrategyConfig;
  broker: BrokerClient;
  clock: Clock;
  logger?: Logger;
  selector?: StrikeSelector;
  entryPolicy?: EntryPolicy;
  executor?: BasketExecutor;
  monitor?: PositionMonitor;
}

export class StrategyEngine {
  private readonly config: StrategyConfig;
  private readonly broker: BrokerClient;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly selector: StrikeSelector;
  private readonly entryPolicy: EntryPolicy;
  private readonly executor: BasketExecutor;
  private readonly monitor: PositionMonitor;

  private state: EngineState = "WAITING_ENTRY";
  private basket: Basket | null = null;
  private monitoring: MonitoringState | null = null;
  private lastEntryDate: string | null = null;
  private exitReason: ExitReason = "NONE";
  private realizedPnl: number | null = null;
  private failure: string | null = null;

  constructor(options: StrategyEngineOptions) {
    this.config = options.config;
    this.broker = options.broker;
    this.clock = options.clock;
    this.logger = options.logger ?? silentLogger;
    this.selector = options.selector ?? new StrikeSelector(options.config);
    this.entryPolicy =
      options.entryPolicy ?? new EntryPolicy(options.config, options.broker, this.logger);
    this.executor =
      options.executor ??
      new BasketExecutor({
        broker: options.broker,
        clock: options.clock,
        productType: options.config.productType,
        orderPacingMs: options.config.orderPacingMs,
        logger: this.logger,
      });
    this.monitor =
      options.monitor ??
      new PositionMonitor({
        broker: options.broker,
        clock: options.clock,
        config: options.config,
        logger: this.logger,
      });
  }

  get currentState(): EngineState {
    return this.state;
  }

  get monitoringState(): Readonly<MonitoringState> | null {
    return this.monitoring;
  }

  async run(signal: AbortSignal): Promise<EngineOutcome> {
    if (this.state === "DONE" || this.state === "FAILED") {
      this.reset();
    }

    await this.waitForEntry(signal);

    if (this.state === "MONITORING" && this.monitoring) {
      const decision = await this.monitor.poll(this.config.pollIntervalMs, signal);
      this.monitoring.deployedCapital = decision.deployedCapital;

      if (decision.reason === "MANUAL" && !this.config.exitOnShutdown) {
        this.logOpenBasket();
      } else {
        await this.exit(decision.reason);
      }
    }

    return this.outcome();
  }

  private async waitForEntry(signal: AbortSignal): Promise<void> {
    while (!signal.aborted && this.state === "WAITING_ENTRY") {
      const now = this.clock.now();
      const today = zonedDateKey(now, this.config.timezone);

      if (this.lastEntryDate !== today && this.entryPolicy.shouldEnter(now)) {
        const confirmation = await this.entryPolicy.confirm(now);
        if (confirmation.allowed) {
          await this.enter(now, today);
          return;
        }
        this.logger.info(`Entry deferred: ${confirmation.detail}`);
      }

      await this.clock.sleep(this.config.pollIntervalMs, signal);
    }
  }

  private async enter(now: Date, today: string): Promise<void> {
    this.state = "ENTERING";
    this.lastEntryDate = today;
    const { indexSymbol } = this.config;

    const quote = await this.broker.getQuote([indexSymbol]);
    if (!quote.success) {
      return this.fail(`spot lookup failed: ${describeFailure(quote.error)}`);
    }
    const spot = quote.data.get(indexSymbol);
    if (spot === undefined || !(spot > 0)) {
      return this.fail(`no usable spot price for ${indexSymbol}`);
    }

    const expiry = await this.broker.getNearestExpiry(indexSymbol, this.config.strikeCount);
    if (!expiry.success) {
      return this.fail(`expiry lookup failed: ${describeFailure(expiry.error)}`);
    }

    const basket = this.selector.buildBasket(`${this.config.preset}-${today}`, spot, expiry.data);
    this.basket = basket;
    this.logger.info(
      `Entering ${basket.id}: spot=${formatAmount(spot)} expiry=${zonedDateKey(expiry.data, this.config.timezone)} ` +
        basket.legs.map((leg) => `${leg.role}=${sideLabel(leg.side)} ${leg.quantity} ${leg.symbol}`).join(", "),
    );

    const result = await this.executor.execute(basket);
    if (result.status === "partial") {
      await this.handlePartialEntry(result);
      return;
    }

    const funds = await this.broker.getFunds();
    let deployedCapital: number | null = null;
    if (!funds.success) {
      this.logger.warn(`Funds unavailable after entry, thresholds disarmed: ${describeFailure(funds.error)}`);
    } else if (funds.data > 0) {
      deployedCapital = funds.data;
    } else {
      this.logger.warn("Broker reports no utilized margin yet, thresholds disarmed");
    }

    this.monitoring = {
      active: true,
      deployedCapital,
      entryTimestamp: now.getTime(),
      exitReason: "NONE",
    };
    this.monitor.watchBasket(basket, deployedCapital, now);
    this.state = "MONITORING";
    this.logger.info(
      `Basket ${basket.id} entered; capital=${deployedCapital === null ? "unknown" : formatAmount(deployedCapital)} ` +
        `target=${this.config.targetPct}% stopLoss=${this.config.stopLossPct}%`,
    );
  }

  private async handlePartialEntry(result: ExecutionResult): Promise<void> {
    const accepted = result.legs.filter((leg) => leg.accepted);
    const open = accepted
      .map((leg) => `${sideLabel(leg.side)} ${leg.quantity} ${leg.symbol} (order ${leg.orderId})`)
      .join(", ");

    if (this.config.partialEntryPolicy === "unwind" && accepted.length > 0 && this.basket) {
      // legs are placed in order and stop at the first rejection
      const unwind: Basket = {
        id: `${this.basket.id}-unwind`,
        legs: this.basket.legs.slice(0, accepted.length),
      };
      this.logger.warn(`Partial entry, unwinding ${accepted.length} accepted leg(s): ${open}`);
      const unwound = await this.executor.execute(unwind, invertSide);
      if (unwound.status === "partial") {
        this.logger.error(`Unwind of ${unwind.id} incomplete; manual action required`);
      }
    } else if (accepted.length > 0) {
      this.logger.error(`Partial entry left open legs for manual action: ${open}`);
    }

    this.fail(`entry basket ${result.basketId} partially executed (${accepted.length}/${this.basket?.legs.length ?? 0} legs)`);
  }

  private async exit(reason: ExitReason): Promise<void> {
    const basket = this.basket;
    if (!basket || !this.monitoring) return;

    this.state = "EXITING";
    this.exitReason = reason;
    this.monitoring.exitReason = reason;
    this.logger.info(`Exiting ${basket.id}: ${reason}`);

    const attempts = this.config.maxExitAttempts;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (attempt > 1) {
        await this.clock.sleep(this.config.pollIntervalMs);
      }

      const positions = await this.broker.getPositions();
      if (!positions.success) {
        this.logger.warn(
          `Exit attempt ${attempt}/${attempts}: positions unavailable (${describeFailure(positions.error)})`,
        );
        continue;
      }

      const exitBasket = this.executor.buildExitBasket(positions.data, basket, `${basket.id}-exit-${attempt}`);
      if (exitBasket.legs.length === 0) {
        await this.finish(basket);
        return;
      }

      const result = await this.executor.execute(exitBasket);
      if (result.status === "complete") {
        await this.finish(basket);
        return;
      }
      this.logger.warn(`Exit attempt ${attempt}/${attempts} partial; rebuilding from live positions`);
    }

    const residual = await this.broker.getPositions();
    const detail = residual.success
      ? this.executor
          .buildExitBasket(residual.data, basket)
          .legs.map((leg) => `${leg.symbol} net ${leg.side > 0 ? -leg.quantity : leg.quantity}`)
          .join(", ") || "none"
      : `unknown (${describeFailure(residual.error)})`;
    this.logger.error(`Exit of ${basket.id} failed after ${attempts} attempt(s); residual positions: ${detail}`);
    this.fail(`exit incomplete after ${attempts} attempt(s)`);
  }

  private async finish(basket: Basket): Promise<void> {
    const symbols = new Set(basket.legs.map((leg) => leg.symbol));
    const positions = await this.broker.getPositions();
    if (positions.success) {
      this.realizedPnl = positions.data
        .filter((position) => symbols.has(position.symbol))
        .reduce((sum, position) => sum + position.pnl, 0);
      this.logger.info(`Basket ${basket.id} closed (${this.exitReason}); realized pnl=${formatAmount(this.realizedPnl)}`);
    } else {
      this.logger.warn(`Basket ${basket.id} closed (${this.exitReason}); realized pnl unavailable`);
    }

    this.monitoring = null;
    this.state = "DONE";
  }

  private logOpenBasket(): void {
    const basket = this.basket;
    if (!basket) return;
    this.logger.warn(
      `Shutdown with basket ${basket.id} still open: ` +
        basket.legs.map((leg) => `${sideLabel(leg.side)} ${leg.quantity} ${leg.symbol}`).join(", "),
    );
    this.exitReason = "MANUAL";
    if (this.monitoring) this.monitoring.exitReason = "MANUAL";
  }

  private fail(reason: string): void {
    this.failure = reason;
    this.state = "FAILED";
    this.logger.error(`Strategy cycle failed: ${reason}`);
  }

  private reset(): void {
    this.state = "WAITING_ENTRY";
    this.basket = null;
    this.monitoring = null;
    this.exitReason = "NONE";
    this.realizedPnl = null;
    this.failure = null;
  }

  private outcome(): EngineOutcome {
    return {
      state: this.state,
      basketId: this.basket?.id ?? null,
      exitReason: this.exitReason,
      realizedPnl: this.realizedPnl,
      failure: this.failure,
    };
  }
}
