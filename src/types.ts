/**
 * Common types for the Crossover Signal Bot
 */

// ===========================================
// Market Data Types
// ===========================================

/**
 * A single timestamped price observation for a symbol.
 * Produced by a price source; never mutated downstream.
 */
export interface PriceSample {
  readonly symbol: string;
  /** Close time of the observation (ms since epoch) */
  readonly timestamp: number;
  readonly price: number;
  /**
   * Set on back-filled samples that closed before the subscription began.
   * They warm the averages but never trigger a notification or an order.
   */
  readonly historical?: boolean;
}

/**
 * Reason a price sample was discarded before reaching the averages
 */
export type DataQualityReason = 'out_of_order' | 'malformed';

export interface DataQualityWarning {
  symbol: string;
  reason: DataQualityReason;
  message: string;
  sample: PriceSample;
  lastTimestamp: number | null;
}

// ===========================================
// Strategy Types
// ===========================================

/**
 * golden: short MA crossed above long MA
 * death: short MA crossed below long MA
 */
export type CrossDirection = 'golden' | 'death';

/**
 * Rolling moving-average state of one symbol after the latest accepted sample
 */
export interface MAState {
  symbol: string;
  timestamp: number;
  price: number;
  /** null until the short window has filled */
  shortMa: number | null;
  /** null until the long window has filled */
  longMa: number | null;
  /** Number of samples consumed so far */
  samples: number;
  /** True once the long window has enough history */
  warm: boolean;
}

/**
 * Emitted once per detected sign flip of (short MA - long MA)
 */
export interface CrossoverEvent {
  readonly symbol: string;
  readonly direction: CrossDirection;
  readonly timestamp: number;
  readonly price: number;
  readonly shortMa: number;
  readonly longMa: number;
}

// ===========================================
// Ledger Types
// ===========================================

export interface LedgerEntry {
  symbol: string;
  /** Direction of the last confirmed execution */
  lastDirection: CrossDirection | null;
  /** Market timestamp of the event that triggered the last execution */
  lastSignalAt: number | null;
  /** Wall-clock time the last execution was confirmed */
  lastExecutedAt: number | null;
  lastOrderId: string | null;
}

/**
 * Per-symbol lifecycle, derived from MA warmth and the ledger
 */
export type SymbolPhase = 'COLD' | 'WARM_NEUTRAL' | 'WARM_LONG' | 'WARM_SHORT';

// ===========================================
// Order Types
// ===========================================

export type OrderSide = 'BUY' | 'SELL';

export function sideForDirection(direction: CrossDirection): OrderSide {
  return direction === 'golden' ? 'BUY' : 'SELL';
}
