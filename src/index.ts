/**
 * Options basket trader
 *
 * Library entry point. The runnable process lives in app/main.ts.
 */

export * from "./config";
export * from "./core";
export * from "./strategies";
export * from "./services/broker";
export * from "./services/streaming";
export * from "./domain/trade.types";
export * from "./errors/app.errors";
export {
  ConsoleLogger,
  formatAmount,
  silentLogger,
  type ConsoleLoggerOptions,
  type Logger,
} from "./utils/logger.util";
export { sanitizeAxiosError, redactSensitiveValues } from "./utils/sanitize-axios-error.util";
