/**
 * Crossover Detector
 *
 * Watches the sign of (short MA - long MA) per symbol and emits a
 * golden or death cross when it strictly flips between warm updates.
 *
 * - the first warm update only seeds the sign
 * - a zero spread keeps the previous sign
 */

import { logger } from '../logger.js';
import type { CrossoverEvent, MAState } from '../types.js';
import type { DetectorState } from './types.js';
import { spreadSign } from './indicators.js';

export class CrossoverDetector {
  private states: Map<string, DetectorState> = new Map();

  public register(symbol: string): void {
    this.states.set(symbol, { sign: null, lastTimestamp: null });
  }

  public remove(symbol: string): boolean {
    return this.states.delete(symbol);
  }

  /**
   * Evaluate the next MA update of a symbol.
   * Updates must arrive in the order the tracker produced them.
   */
  public evaluate(state: MAState): CrossoverEvent | null {
    const memory = this.states.get(state.symbol);
    if (!memory) {
      throw new Error(`Symbol not registered with detector: ${state.symbol}`);
    }

    if (!state.warm || state.shortMa === null || state.longMa === null) {
      return null;
    }

    const sign = spreadSign(state.shortMa, state.longMa);
    const previous = memory.sign;
    memory.lastTimestamp = state.timestamp;

    if (previous === null) {
      memory.sign = sign;
      logger.debug('Crossover sign seeded', { symbol: state.symbol, sign });
      return null;
    }

    if (sign === 0 || sign === previous) {
      return null;
    }

    memory.sign = sign;

    // Seeded on an exactly flat spread: nothing to flip from yet
    if (previous === 0) {
      return null;
    }

    const event: CrossoverEvent = {
      symbol: state.symbol,
      direction: sign > 0 ? 'golden' : 'death',
      timestamp: state.timestamp,
      price: state.price,
      shortMa: state.shortMa,
      longMa: state.longMa,
    };

    logger.info('Crossover detected', {
      symbol: event.symbol,
      direction: event.direction,
      shortMa: event.shortMa,
      longMa: event.longMa,
    });

    return event;
  }

  /**
   * Lazily map an ordered sequence of MA states to the crossovers it contains
   */
  public *scan(states: Iterable<MAState>): Generator<CrossoverEvent, void, undefined> {
    for (const state of states) {
      const event = this.evaluate(state);
      if (event) {
        yield event;
      }
    }
  }

  public getState(symbol: string): DetectorState | null {
    const memory = this.states.get(symbol);
    return memory ? { ...memory } : null;
  }
}
