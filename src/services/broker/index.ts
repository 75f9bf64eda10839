export {
  failure,
  ok,
  describeFailure,
  type BrokerClient,
  type BrokerFailure,
  type BrokerFailureKind,
  type BrokerProfile,
  type BrokerResult,
  type Candle,
  type CandleRequest,
  type OrderAck,
  type OrderRequest,
} from "./broker-client";
export { FyersRestClient, type FyersRestClientOptions } from "./fyers-rest-client";
export { PaperOrderGate } from "./paper-order-gate";
export {
  RateLimiter,
  calculateBackoff,
  createBrokerRateLimiters,
  isRetryableError,
  withRateLimitAndRetry,
  withRetry,
  type BrokerRateLimiters,
  type RetryConfig,
  type RetryOptions,
  type RetryResult,
} from "./rate-limit";
