/**
 * Types for price sources
 */

import type { KlineInterval } from 'binance';
import type { PriceSample } from '../types.js';
import type { KlineQuery } from '../execution/BinanceOrderClient.js';

export type { KlineInterval };

/**
 * Supplies an ordered, unbounded stream of samples per symbol.
 * The stream ends when the signal is aborted.
 */
export interface PriceSource {
  subscribe(symbol: string, signal: AbortSignal): AsyncIterable<PriceSample>;
}

/**
 * Kline history provider (BinanceOrderClient in production)
 */
export interface KlineClient {
  getKlines(query: KlineQuery): Promise<unknown[][]>;
}

/**
 * Configuration for the polling kline source
 */
export interface PollingKlineSourceConfig {
  interval: KlineInterval;
  pollIntervalMs: number;
  /** Klines fetched on the first poll to warm the averages */
  backfillLimit: number;
  /** Klines fetched on later polls */
  pollLimit: number;
}

/**
 * Parsed kline row
 */
export interface ParsedKline {
  openTime: number;
  closeTime: number;
  close: number;
}
