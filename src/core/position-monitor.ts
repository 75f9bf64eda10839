/**
 * PositionMonitor
 *
 * Polls live positions of the watched basket and decides when to exit.
 * Thresholds are a percentage of deployed capital; while capital is unknown
 * they stay disarmed and funds are re-read every tick. The close check
 * applies regardless.
 */

import type { StrategyConfig } from "../config/schema";
import type { Basket, ExitDecision } from "../domain/trade.types";
import { describeFailure, type BrokerClient } from "../services/broker/broker-client";
import { REGULAR_SESSION } from "../strategies/entry-policy";
import { formatAmount, silentLogger, type Logger } from "../utils/logger.util";
import {
  earlierOf,
  formatClockTime,
  secondsOfDay,
  zonedClockTime,
  zonedDateKey,
  type ClockTime,
} from "../utils/time.util";
import type { Clock } from "./clock";

export interface ExitInputs {
  pnl: number;
  deployedCapital: number | null;
  targetPct: number;
  stopLossPct: number;
  closeReached: boolean;
}

export interface ExitThresholds {
  targetAmount: number;
  stopLossAmount: number;
}

/**
 * Null when capital is unknown or not positive
 */
export function exitThresholds(
  deployedCapital: number | null,
  targetPct: number,
  stopLossPct: number,
): ExitThresholds | null {
  if (deployedCapital === null || !(deployedCapital > 0)) return null;
  return {
    targetAmount: (deployedCapital * targetPct) / 100,
    stopLossAmount: (deployedCapital * stopLossPct) / 100,
  };
}

/**
 * Target first, then stop-loss, then the close; both bounds inclusive
 */
export function evaluateExit(inputs: ExitInputs): ExitDecision {
  const limits = exitThresholds(inputs.deployedCapital, inputs.targetPct, inputs.stopLossPct);
  const decide = (reason: ExitDecision["reason"]): ExitDecision => ({
    reason,
    pnl: inputs.pnl,
    targetAmount: limits?.targetAmount ?? null,
    stopLossAmount: limits?.stopLossAmount ?? null,
    deployedCapital: inputs.deployedCapital,
  });

  if (limits) {
    if (inputs.pnl >= limits.targetAmount) return decide("TARGET");
    if (inputs.pnl <= -limits.stopLossAmount) return decide("STOP_LOSS");
  }
  if (inputs.closeReached) return decide("MARKET_CLOSE");
  return decide("NONE");
}

export type PositionMonitorConfig = Pick<
  StrategyConfig,
  "targetPct" | "stopLossPct" | "exitTime" | "timezone"
>;

export interface PositionMonitorOptions {
  broker: BrokerClient;
  clock: Clock;
  config: PositionMonitorConfig;
  logger?: Logger;
}

interface Watch {
  basket: Basket;
  symbols: Set<string>;
  deployedCapital: number | null;
  tradingDate: string;
}

const amount = (value: number | null): string => (value === null ? "n/a" : formatAmount(value));
const loss = (value: number | null): string => (value === null ? "n/a" : `-${formatAmount(value)}`);

export class PositionMonitor {
  private readonly broker: BrokerClient;
  private readonly clock: Clock;
  private readonly config: PositionMonitorConfig;
  private readonly logger: Logger;
  private watch: Watch | null = null;

  constructor(options: PositionMonitorOptions) {
    this.broker = options.broker;
    this.clock = options.clock;
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
  }

  /** Exits are forced at the earlier of the exit time and the session close */
  get closeTime(): ClockTime {
    return earlierOf(this.config.exitTime, REGULAR_SESSION.close);
  }

  /**
   * Start watching a basket entered at `entryAt`
   */
  watchBasket(basket: Basket, deployedCapital: number | null, entryAt: Date): void {
    this.watch = {
      basket,
      symbols: new Set(basket.legs.map((leg) => leg.symbol)),
      deployedCapital,
      tradingDate: zonedDateKey(entryAt, this.config.timezone),
    };
  }

  get deployedCapital(): number | null {
    return this.watch?.deployedCapital ?? null;
  }

  isCloseReached(now: Date): boolean {
    const { timezone } = this.config;
    // A session that rolled past midnight is over
    if (this.watch && zonedDateKey(now, timezone) !== this.watch.tradingDate) return true;
    return secondsOfDay(zonedClockTime(now, timezone)) >= secondsOfDay(this.closeTime);
  }

  /**
   * One evaluation. A failed position read yields NONE unless the close has
   * been reached.
   */
  async tick(): Promise<ExitDecision> {
    const watch = this.requireWatch();
    const closeReached = this.isCloseReached(this.clock.now());

    if (watch.deployedCapital === null || watch.deployedCapital <= 0) {
      await this.refreshCapital(watch);
    }

    const positions = await this.broker.getPositions();
    if (!positions.success) {
      this.logger.warn(`Position read failed: ${describeFailure(positions.error)}`);
      const reason = closeReached ? "MARKET_CLOSE" : "NONE";
      const limits = exitThresholds(watch.deployedCapital, this.config.targetPct, this.config.stopLossPct);
      const decision: ExitDecision = {
        reason,
        pnl: null,
        targetAmount: limits?.targetAmount ?? null,
        stopLossAmount: limits?.stopLossAmount ?? null,
        deployedCapital: watch.deployedCapital,
      };
      this.logDecision(decision);
      return decision;
    }

    const pnl = positions.data
      .filter((position) => watch.symbols.has(position.symbol))
      .reduce((sum, position) => sum + position.pnl, 0);

    const decision = evaluateExit({
      pnl,
      deployedCapital: watch.deployedCapital,
      targetPct: this.config.targetPct,
      stopLossPct: this.config.stopLossPct,
      closeReached,
    });
    this.logDecision(decision);
    return decision;
  }

  /**
   * Tick every `intervalMs` until an exit reason appears. Aborting the signal
   * returns MANUAL.
   */
  async poll(intervalMs: number, signal: AbortSignal): Promise<ExitDecision> {
    let last: ExitDecision | null = null;

    while (!signal.aborted) {
      last = await this.tick();
      if (last.reason !== "NONE") return last;
      await this.clock.sleep(intervalMs, signal);
    }

    const limits = exitThresholds(this.deployedCapital, this.config.targetPct, this.config.stopLossPct);
    const manual: ExitDecision = {
      reason: "MANUAL",
      pnl: last?.pnl ?? null,
      targetAmount: limits?.targetAmount ?? null,
      stopLossAmount: limits?.stopLossAmount ?? null,
      deployedCapital: this.deployedCapital,
    };
    this.logger.info(`Monitoring stopped by shutdown; last pnl=${amount(manual.pnl)}`);
    return manual;
  }

  private async refreshCapital(watch: Watch): Promise<void> {
    const funds = await this.broker.getFunds();
    if (!funds.success) {
      this.logger.warn(`Funds still unavailable, thresholds disarmed: ${describeFailure(funds.error)}`);
      return;
    }
    if (funds.data > 0) {
      watch.deployedCapital = funds.data;
      this.logger.info(`Deployed capital now known: ${formatAmount(funds.data)}`);
    }
  }

  private requireWatch(): Watch {
    if (!this.watch) throw new Error("PositionMonitor has no basket to watch");
    return this.watch;
  }

  private logDecision(decision: ExitDecision): void {
    this.logger.info(
      `pnl=${amount(decision.pnl)} target=${amount(decision.targetAmount)} ` +
        `stopLoss=${loss(decision.stopLossAmount)} capital=${amount(decision.deployedCapital)} ` +
        `close=${formatClockTime(this.closeTime)} -> ${decision.reason}`,
    );
  }
}
