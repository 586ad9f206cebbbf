/**
 * Types for the strategy layer
 */

import type { SpreadSign } from './indicators.js';

/**
 * Window lengths (in samples) of the two moving averages
 */
export interface MovingAverageWindows {
  shortWindow: number;
  longWindow: number;
}

/**
 * Detector memory for one symbol.
 * sign is null until the first warm state has been seen.
 */
export interface DetectorState {
  sign: SpreadSign | null;
  lastTimestamp: number | null;
}
