/**
 * Technical Indicators Helper
 *
 * Streaming simple moving averages backed by the technicalindicators library.
 * Each average is recalculated from its kept window, so float error never
 * accumulates over a long stream.
 */

import { SMA } from 'technicalindicators';

export type SpreadSign = -1 | 0 | 1;

/**
 * Incremental moving average: feed one price, get the current average
 * (undefined until the window has filled)
 */
export interface StreamingAverage {
  readonly period: number;
  next(price: number): number | undefined;
}

/**
 * Create a streaming simple moving average for the given window
 */
export function createSimpleMovingAverage(period: number): StreamingAverage {
  const window: number[] = [];

  return {
    period,
    next: (price: number) => {
      window.push(price);
      if (window.length > period) {
        window.shift();
      }
      if (window.length < period) {
        return undefined;
      }
      return SMA.calculate({ period, values: window })[0];
    },
  };
}

/**
 * Relative difference below which two averages count as equal.
 * Averages of the same prices over different windows can differ in the
 * last bits of the float.
 */
export const SPREAD_EPSILON = 1e-10;

/**
 * Sign of (short - long). Equal averages yield 0.
 */
export function spreadSign(shortMa: number, longMa: number): SpreadSign {
  const spread = shortMa - longMa;
  const scale = Math.max(Math.abs(shortMa), Math.abs(longMa));
  if (Math.abs(spread) <= scale * SPREAD_EPSILON) return 0;
  return spread > 0 ? 1 : -1;
}

/**
 * Round a value to the venue's display precision.
 * Only used at output; averages are never rounded mid-computation.
 */
export function formatPrice(value: number, precision: number): string {
  return value.toFixed(precision);
}
