/**
 * Types for the Position/Cooldown Ledger
 */

import type { CrossDirection, LedgerEntry } from '../types.js';

export type SuppressionReason = 'duplicate_direction' | 'min_interval';

/**
 * Decision of the ledger for a requested execution
 */
export type LedgerVerdict =
  | { allowed: true }
  | { allowed: false; reason: SuppressionReason; detail: string };

/**
 * Per-symbol ledger settings
 */
export interface LedgerSymbolConfig {
  symbol: string;
  /** Minimum time between executions regardless of direction (0 = off) */
  minIntervalMs: number;
}

/**
 * Persisted form of the ledger, keyed by symbol
 */
export type LedgerSnapshot = Record<string, LedgerEntry>;

/**
 * Durable storage for the ledger
 */
export interface LedgerStore {
  load(): Promise<LedgerSnapshot>;
  save(snapshot: LedgerSnapshot): Promise<void>;
}

export type LedgerEvents = {
  recorded: [entry: LedgerEntry];
  error: [error: Error];
};

export type { CrossDirection, LedgerEntry };
