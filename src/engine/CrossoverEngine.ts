/**
 * Crossover Engine
 *
 * Owns the shared moving-average tracker, crossover detector, ledger and
 * execution coordinator, and runs one worker per configured symbol.
 *
 * Shutdown aborts every worker: in-flight executions finish, nothing new
 * is evaluated, and the ledger is flushed as the only durable state.
 */

import EventEmitter from 'eventemitter3';
import { logger } from '../logger.js';
import type { PriceSource } from '../consumers/types.js';
import { ExecutionCoordinator } from '../execution/ExecutionCoordinator.js';
import { TokenBucketRateLimiter } from '../execution/RateLimiter.js';
import type { TradingVenue } from '../execution/types.js';
import { PositionLedger } from '../ledger/PositionLedger.js';
import type { LedgerStore } from '../ledger/types.js';
import type { NotificationSink } from '../notification/types.js';
import { CrossoverDetector } from '../strategy/CrossoverDetector.js';
import { MovingAverageTracker } from '../strategy/MovingAverageTracker.js';
import { SymbolWorker } from './SymbolWorker.js';
import type { EngineConfig, EngineEvents, EngineStatus, SymbolStatus } from './types.js';

export interface EngineDeps {
  source: PriceSource;
  venue: TradingVenue;
  sink: NotificationSink;
  ledgerStore: LedgerStore;
  /** Wall clock used for ledger execution times */
  clock?: () => number;
}

export class CrossoverEngine extends EventEmitter<EngineEvents> {
  readonly tracker = new MovingAverageTracker();
  readonly detector = new CrossoverDetector();
  readonly ledger: PositionLedger;
  readonly coordinator: ExecutionCoordinator;

  private readonly workers: Map<string, SymbolWorker> = new Map();
  private abortController: AbortController | null = null;
  private runs: Promise<void>[] = [];
  private startedAt: number | null = null;

  constructor(
    private readonly config: EngineConfig,
    private readonly deps: EngineDeps
  ) {
    super();

    this.ledger = new PositionLedger(deps.ledgerStore, deps.clock);
    this.coordinator = new ExecutionCoordinator(
      {
        enabled: config.autoTrade,
        quantities: Object.fromEntries(config.symbols.map((s) => [s.symbol, s.quantity])),
        notifyOnly: config.symbols.filter((s) => s.mode === 'notify').map((s) => s.symbol),
        retry: config.retry,
        notifySuppressed: config.notifySuppressed,
      },
      deps.venue,
      this.ledger,
      deps.sink,
      new TokenBucketRateLimiter(config.rateLimit)
    );

    this.tracker.on('dataQuality', (warning) => this.emit('dataQuality', warning));

    logger.info('Crossover Engine initialized', {
      symbols: config.symbols.map((s) => s.symbol),
      autoTrade: config.autoTrade,
    });
  }

  /**
   * Restore the ledger and start one worker per symbol
   */
  async start(): Promise<void> {
    if (this.abortController) {
      logger.warn('Crossover Engine already running');
      return;
    }

    await this.ledger.restore(
      this.config.symbols.map((s) => ({ symbol: s.symbol, minIntervalMs: s.minIntervalMs }))
    );

    const controller = new AbortController();
    this.abortController = controller;
    this.startedAt = Date.now();

    for (const settings of this.config.symbols) {
      const { symbol } = settings;
      this.tracker.register(symbol, {
        shortWindow: settings.shortWindow,
        longWindow: settings.longWindow,
      });
      this.detector.register(symbol);

      const worker = new SymbolWorker(
        settings,
        {
          source: this.deps.source,
          tracker: this.tracker,
          detector: this.detector,
          ledger: this.ledger,
          coordinator: this.coordinator,
          sink: this.deps.sink,
        },
        this.config.reconnectDelayMs
      );
      this.attachWorker(worker);
      this.workers.set(symbol, worker);
    }

    this.runs = [...this.workers.values()].map((worker) => worker.run(controller.signal));

    logger.info('Crossover Engine started', { workers: this.workers.size });
  }

  /**
   * Stop all workers and wait for in-flight work to settle
   */
  async stop(): Promise<void> {
    const controller = this.abortController;
    if (!controller) return;

    logger.info('Stopping Crossover Engine');
    controller.abort();

    const results = await Promise.allSettled(this.runs);
    for (const result of results) {
      if (result.status === 'rejected') {
        logger.error('Worker ended with error', { error: String(result.reason) });
      }
    }

    await this.coordinator.drain();
    await this.ledger.flush();

    for (const worker of this.workers.values()) {
      worker.removeAllListeners();
      this.tracker.remove(worker.symbol);
      this.detector.remove(worker.symbol);
    }
    this.workers.clear();
    this.runs = [];
    this.abortController = null;
    this.startedAt = null;

    logger.info('Crossover Engine stopped');
  }

  isRunning(): boolean {
    return this.abortController !== null;
  }

  getStatus(): EngineStatus {
    return {
      running: this.isRunning(),
      autoTrade: this.config.autoTrade,
      startedAt: this.startedAt,
      symbols: [...this.workers.values()].map((worker) => worker.getStatus()),
    };
  }

  getSymbolStatus(symbol: string): SymbolStatus | null {
    return this.workers.get(symbol)?.getStatus() ?? null;
  }

  private attachWorker(worker: SymbolWorker): void {
    worker.on('signalDetected', (event) => this.emit('signalDetected', event));
    worker.on('outcome', (outcome) => this.emit('outcome', outcome));
    worker.on('streamEnded', (symbol) => this.emit('streamEnded', symbol));
    worker.on('error', (error) => this.emit('workerError', worker.symbol, error));
  }
}
