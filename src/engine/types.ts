/**
 * Types for the crossover engine
 */

import type { SymbolSettings } from '../config.js';
import type {
  CrossoverEvent,
  DataQualityWarning,
  LedgerEntry,
  SymbolPhase,
} from '../types.js';
import type { ExecutionOutcome, RetryPolicy, RateLimiterConfig } from '../execution/types.js';

/**
 * Static engine configuration, fixed for the lifetime of an engine instance
 */
export interface EngineConfig {
  symbols: readonly SymbolSettings[];
  autoTrade: boolean;
  notifySuppressed: boolean;
  /** Delay before resubscribing after a price stream ends or fails */
  reconnectDelayMs: number;
  retry: RetryPolicy;
  rateLimit: RateLimiterConfig;
}

export interface SymbolStatus {
  symbol: string;
  phase: SymbolPhase;
  running: boolean;
  samples: number;
  lastPrice: number | null;
  lastSampleAt: number | null;
  shortMa: number | null;
  longMa: number | null;
  shortWindow: number;
  longWindow: number;
  ledger: LedgerEntry | null;
  lastError: string | null;
}

export interface EngineStatus {
  running: boolean;
  autoTrade: boolean;
  startedAt: number | null;
  symbols: SymbolStatus[];
}

export type EngineEvents = {
  signalDetected: [event: CrossoverEvent];
  outcome: [outcome: ExecutionOutcome];
  dataQuality: [warning: DataQualityWarning];
  streamEnded: [symbol: string];
  workerError: [symbol: string, error: Error];
};

export type WorkerEvents = {
  signalDetected: [event: CrossoverEvent];
  outcome: [outcome: ExecutionOutcome];
  streamEnded: [symbol: string];
  error: [error: Error];
};
