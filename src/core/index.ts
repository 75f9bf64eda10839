/**
 * Core Module Index
 *
 * Scheduling, execution and monitoring of a basket strategy.
 */

export { ManualClock, SystemClock, type Clock } from "./clock";
export {
  BasketExecutor,
  keepSide,
  type BasketExecutorOptions,
  type SideTransform,
} from "./basket-executor";
export {
  PositionMonitor,
  evaluateExit,
  exitThresholds,
  type ExitInputs,
  type ExitThresholds,
  type PositionMonitorOptions,
} from "./position-monitor";
export {
  StrategyEngine,
  type EngineOutcome,
  type EngineState,
  type StrategyEngineOptions,
} from "./strategy-engine";
export {
  ShutdownCoordinator,
  type ProcessLike,
  type ShutdownCoordinatorOptions,
  type TeardownStep,
} from "./shutdown-coordinator";
