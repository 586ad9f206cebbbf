/**
 * Symbol Worker
 *
 * Consumes the price stream of one symbol in arrival order:
 * Sample → Moving averages → Crossover detection → Notification → Execution
 *
 * Historical samples only update the averages and the detector's sign.
 *
 * A stream that ends or fails is resubscribed after a delay. Errors stay
 * inside the worker and never affect other symbols.
 */

import EventEmitter from 'eventemitter3';
import { logger, errorMessage } from '../logger.js';
import type { SymbolSettings } from '../config.js';
import type { PriceSource } from '../consumers/types.js';
import type { ExecutionCoordinator } from '../execution/ExecutionCoordinator.js';
import type { PositionLedger } from '../ledger/PositionLedger.js';
import type { NotificationSink } from '../notification/types.js';
import type { CrossoverDetector } from '../strategy/CrossoverDetector.js';
import type { MovingAverageTracker } from '../strategy/MovingAverageTracker.js';
import type { PriceSample } from '../types.js';
import { sleep } from '../utils/sleep.js';
import type { SymbolStatus, WorkerEvents } from './types.js';

export interface SymbolWorkerDeps {
  source: PriceSource;
  tracker: MovingAverageTracker;
  detector: CrossoverDetector;
  ledger: PositionLedger;
  coordinator: ExecutionCoordinator;
  sink: NotificationSink;
}

export class SymbolWorker extends EventEmitter<WorkerEvents> {
  private running = false;
  private lastError: string | null = null;

  constructor(
    private readonly settings: SymbolSettings,
    private readonly deps: SymbolWorkerDeps,
    private readonly reconnectDelayMs: number
  ) {
    super();
  }

  get symbol(): string {
    return this.settings.symbol;
  }

  /**
   * Run until the signal is aborted
   */
  async run(signal: AbortSignal): Promise<void> {
    const { symbol } = this.settings;
    this.running = true;
    logger.info('Symbol worker started', { symbol });

    while (!signal.aborted) {
      try {
        for await (const sample of this.deps.source.subscribe(symbol, signal)) {
          // No new evaluation once shutdown is signalled
          if (signal.aborted) break;
          await this.process(sample);
        }

        if (!signal.aborted) {
          logger.warn('Price stream ended, resubscribing', {
            symbol,
            delayMs: this.reconnectDelayMs,
          });
          this.emit('streamEnded', symbol);
        }
      } catch (error) {
        const normalized = error instanceof Error ? error : new Error(String(error));
        this.lastError = normalized.message;
        logger.error('Symbol worker error, resubscribing', {
          symbol,
          error: normalized.message,
          delayMs: this.reconnectDelayMs,
        });
        this.emit('error', normalized);
      }

      if (!signal.aborted) {
        await sleep(this.reconnectDelayMs, signal);
      }
    }

    this.running = false;
    logger.info('Symbol worker stopped', { symbol });
  }

  /**
   * Process a single sample; exposed for replay
   */
  async process(sample: PriceSample): Promise<void> {
    const state = this.deps.tracker.update(this.settings.symbol, sample);
    if (!state) return;

    const event = this.deps.detector.evaluate(state);
    if (!event) return;

    if (sample.historical) {
      logger.debug('Crossover in back-filled history, not acted on', {
        symbol: event.symbol,
        direction: event.direction,
        timestamp: event.timestamp,
      });
      return;
    }

    this.emit('signalDetected', event);

    try {
      await this.deps.sink.notify({ type: 'signal', event });
    } catch (error) {
      logger.error('Failed to deliver signal notification', {
        symbol: event.symbol,
        error: errorMessage(error),
      });
    }

    const outcome = await this.deps.coordinator.handle(event);
    this.emit('outcome', outcome);
  }

  getStatus(): SymbolStatus {
    const { symbol, shortWindow, longWindow } = this.settings;
    const state = this.deps.tracker.getState(symbol);
    const warm = state?.warm ?? false;
    const hasSamples = state !== null && state.samples > 0;

    return {
      symbol,
      phase: this.deps.ledger.phaseOf(symbol, warm),
      running: this.running,
      samples: state?.samples ?? 0,
      lastPrice: hasSamples ? state.price : null,
      lastSampleAt: hasSamples ? state.timestamp : null,
      shortMa: state?.shortMa ?? null,
      longMa: state?.longMa ?? null,
      shortWindow,
      longWindow,
      ledger: this.deps.ledger.getEntry(symbol),
      lastError: this.lastError,
    };
  }
}
