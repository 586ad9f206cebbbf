/**
 * Types for Execution
 */

import type { CrossoverEvent, OrderSide } from '../types.js';
import type { SuppressionReason } from '../ledger/types.js';

// ===========================================
// Configuration Types
// ===========================================

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the second attempt; doubles each attempt */
  baseDelayMs: number;
  /** Upper bound of a single delay */
  maxDelayMs: number;
}

export interface ExecutionCoordinatorConfig {
  /** Kill switch: when false, crossovers are only notified */
  enabled: boolean;

  /** Fixed order quantity per symbol */
  quantities: Readonly<Record<string, number>>;

  /** Symbols whose crossovers are only notified, never executed */
  notifyOnly: readonly string[];

  retry: RetryPolicy;

  /** Also notify suppressed duplicates */
  notifySuppressed: boolean;
}

/**
 * Binance API client configuration
 */
export interface BinanceClientConfig {
  apiKey: string;
  apiSecret: string;
  testnet: boolean;
}

export interface RateLimiterConfig {
  /** Burst size */
  capacity: number;
  /** One token is added every interval */
  refillIntervalMs: number;
}

// ===========================================
// Order Types
// ===========================================

export interface ExecutionRequest {
  symbol: string;
  side: OrderSide;
  quantity: number;
}

export type FailureKind = 'transient' | 'permanent';

/**
 * Result of a single order submission
 */
export type VenueOrderResult =
  | { kind: 'success'; orderId: string; executedQty?: number; avgPrice?: number }
  | { kind: FailureKind; reason: string };

/**
 * Order placement surface of a trading venue
 */
export interface TradingVenue {
  submitOrder(request: ExecutionRequest): Promise<VenueOrderResult>;
}

/**
 * Final outcome of handling one crossover event
 */
export type ExecutionOutcome =
  | {
      status: 'executed';
      event: CrossoverEvent;
      request: ExecutionRequest;
      orderId: string;
      attempts: number;
    }
  | {
      status: 'failed';
      event: CrossoverEvent;
      request: ExecutionRequest;
      kind: FailureKind;
      reason: string;
      attempts: number;
    }
  | {
      status: 'suppressed';
      event: CrossoverEvent;
      reason: SuppressionReason;
      detail: string;
    }
  | { status: 'disabled'; event: CrossoverEvent };

// ===========================================
// Event Types
// ===========================================

export type ExecutionEvents = {
  outcome: [outcome: ExecutionOutcome];
  retrying: [request: ExecutionRequest, attempt: number, delayMs: number, reason: string];
  error: [error: Error];
};

export type { OrderSide };
