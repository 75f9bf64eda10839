/**
 * Core trading types shared by the strategy engine, executor and monitor.
 */

export type OptionType = "CE" | "PE";

/** Broker side encoding: BUY = +1, SELL = -1 */
export type Side = 1 | -1;

export const BUY: Side = 1;
export const SELL: Side = -1;

export function sideLabel(side: Side): "BUY" | "SELL" {
  return side === BUY ? "BUY" : "SELL";
}

export function invertSide(side: Side): Side {
  return side === BUY ? SELL : BUY;
}

export type ProductType = "INTRADAY" | "MARGIN" | "CNC" | "CO" | "BO";

/** One option order within a basket */
export interface Leg {
  readonly role: string;
  readonly symbol: string;
  readonly optionType: OptionType;
  readonly strike: number;
  readonly side: Side;
  readonly quantity: number;
}

/** Legs executed together, in the order they are listed */
export interface Basket {
  readonly id: string;
  readonly legs: readonly Leg[];
}

export interface LegExecution {
  role: string;
  symbol: string;
  side: Side;
  quantity: number;
  orderId: string | null;
  accepted: boolean;
  errorDetail: string | null;
}

export type ExecutionStatus = "complete" | "partial";

export interface ExecutionResult {
  basketId: string;
  status: ExecutionStatus;
  /** Attempted legs only, in placement order */
  legs: LegExecution[];
}

export type ExitReason =
  | "TARGET"
  | "STOP_LOSS"
  | "MARKET_CLOSE"
  | "MANUAL"
  | "NONE";

export interface ExitDecision {
  reason: ExitReason;
  pnl: number | null;
  targetAmount: number | null;
  stopLossAmount: number | null;
  deployedCapital: number | null;
}

export interface MonitoringState {
  active: boolean;
  /** Utilized margin after entry; null until the broker reports it */
  deployedCapital: number | null;
  entryTimestamp: number;
  exitReason: ExitReason;
}

export interface NetPosition {
  symbol: string;
  netQty: number;
  pnl: number;
}
