/**
 * Execution Module
 *
 * Turns crossover events into orders on Binance Futures.
 */

// Types
export type {
  ExecutionCoordinatorConfig,
  BinanceClientConfig,
  RateLimiterConfig,
  RetryPolicy,
  ExecutionRequest,
  FailureKind,
  VenueOrderResult,
  TradingVenue,
  ExecutionOutcome,
  ExecutionEvents,
  OrderSide,
} from './types.js';
export type { KlineQuery } from './BinanceOrderClient.js';

// Classes
export { BinanceOrderClient } from './BinanceOrderClient.js';
export { ExecutionCoordinator, backoffDelay } from './ExecutionCoordinator.js';
export { TokenBucketRateLimiter } from './RateLimiter.js';
export { classifyVenueError, describeVenueError } from './venueErrors.js';
