/**
 * Moving Average Tracker
 *
 * Maintains a short and a long simple moving average per symbol from
 * the price stream. Out-of-order and malformed samples are discarded and
 * reported as data-quality warnings instead of corrupting the averages.
 */

import EventEmitter from 'eventemitter3';
import { logger } from '../logger.js';
import type { DataQualityWarning, MAState, PriceSample } from '../types.js';
import type { MovingAverageWindows } from './types.js';
import { createSimpleMovingAverage, type StreamingAverage } from './indicators.js';

interface TrackerEventTypes {
  dataQuality: [DataQualityWarning];
}

interface SymbolSeries {
  windows: MovingAverageWindows;
  short: StreamingAverage;
  long: StreamingAverage;
  state: MAState;
}

export class MovingAverageTracker extends EventEmitter<TrackerEventTypes> {
  private series: Map<string, SymbolSeries> = new Map();

  /**
   * Create the MA state of a symbol. Re-registering resets it.
   */
  public register(symbol: string, windows: MovingAverageWindows): void {
    this.series.set(symbol, {
      windows,
      short: createSimpleMovingAverage(windows.shortWindow),
      long: createSimpleMovingAverage(windows.longWindow),
      state: {
        symbol,
        timestamp: 0,
        price: 0,
        shortMa: null,
        longMa: null,
        samples: 0,
        warm: false,
      },
    });

    logger.debug('Moving averages registered', { symbol, ...windows });
  }

  public remove(symbol: string): boolean {
    return this.series.delete(symbol);
  }

  public has(symbol: string): boolean {
    return this.series.has(symbol);
  }

  /**
   * Feed one sample. Returns the updated state, or null when the sample
   * was discarded.
   */
  public update(symbol: string, sample: PriceSample): MAState | null {
    const series = this.series.get(symbol);
    if (!series) {
      throw new Error(`Symbol not registered with tracker: ${symbol}`);
    }

    const lastTimestamp = series.state.samples > 0 ? series.state.timestamp : null;

    const malformed = this.findMalformation(symbol, sample);
    if (malformed) {
      this.reject(symbol, 'malformed', malformed, sample, lastTimestamp);
      return null;
    }

    if (lastTimestamp !== null && sample.timestamp <= lastTimestamp) {
      this.reject(
        symbol,
        'out_of_order',
        `Sample at ${sample.timestamp} is not after last accepted ${lastTimestamp}`,
        sample,
        lastTimestamp
      );
      return null;
    }

    const shortMa = series.short.next(sample.price);
    const longMa = series.long.next(sample.price);
    const samples = series.state.samples + 1;

    series.state = {
      symbol,
      timestamp: sample.timestamp,
      price: sample.price,
      shortMa: shortMa ?? null,
      longMa: longMa ?? null,
      samples,
      warm: samples >= series.windows.longWindow && longMa !== undefined,
    };

    return { ...series.state };
  }

  public getState(symbol: string): MAState | null {
    const series = this.series.get(symbol);
    return series ? { ...series.state } : null;
  }

  public isWarm(symbol: string): boolean {
    return this.series.get(symbol)?.state.warm ?? false;
  }

  private findMalformation(symbol: string, sample: PriceSample): string | null {
    if (sample.symbol !== symbol) {
      return `Sample for ${sample.symbol} routed to ${symbol}`;
    }
    if (!Number.isFinite(sample.timestamp)) {
      return `Invalid timestamp ${sample.timestamp}`;
    }
    if (!Number.isFinite(sample.price) || sample.price <= 0) {
      return `Invalid price ${sample.price}`;
    }
    return null;
  }

  private reject(
    symbol: string,
    reason: DataQualityWarning['reason'],
    message: string,
    sample: PriceSample,
    lastTimestamp: number | null
  ): void {
    logger.warn('Price sample discarded', { symbol, reason, message });
    this.emit('dataQuality', { symbol, reason, message, sample, lastTimestamp });
  }
}
