export { MovingAverageTracker } from './MovingAverageTracker.js';
export { CrossoverDetector } from './CrossoverDetector.js';
export { createSimpleMovingAverage, spreadSign, formatPrice } from './indicators.js';
export type { StreamingAverage, SpreadSign } from './indicators.js';
export type { MovingAverageWindows, DetectorState } from './types.js';
