/**
 * Position/Cooldown Ledger
 *
 * Remembers the direction of the last confirmed execution per symbol and
 * gates new executions:
 * - the same direction twice in a row is a duplicate and is suppressed
 * - an optional minimum interval suppresses executions too close to the
 *   previous one, whatever their direction
 *
 * Only confirmed executions are recorded. The ledger is the sole state
 * restored after a restart.
 */

import EventEmitter from 'eventemitter3';
import { logger, errorMessage } from '../logger.js';
import type { CrossDirection, LedgerEntry, SymbolPhase } from '../types.js';
import type {
  LedgerEvents,
  LedgerSnapshot,
  LedgerStore,
  LedgerSymbolConfig,
  LedgerVerdict,
} from './types.js';

interface LedgerSlot {
  entry: LedgerEntry;
  minIntervalMs: number;
}

export class PositionLedger extends EventEmitter<LedgerEvents> {
  private slots: Map<string, LedgerSlot> = new Map();
  private persistChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: LedgerStore,
    private readonly clock: () => number = () => Date.now()
  ) {
    super();
  }

  /**
   * Load persisted entries for the configured symbols.
   * Entries of symbols that are no longer configured are dropped.
   */
  public async restore(symbols: readonly LedgerSymbolConfig[]): Promise<void> {
    const persisted = await this.store.load();
    this.slots.clear();

    for (const config of symbols) {
      this.register(config.symbol, config.minIntervalMs, persisted[config.symbol]);
    }

    const dropped = Object.keys(persisted).filter((symbol) => !this.slots.has(symbol));
    if (dropped.length > 0) {
      logger.info('Pruned ledger entries of unconfigured symbols', { dropped });
    }

    logger.info('Ledger restored', {
      symbols: symbols.length,
      withHistory: symbols.filter((s) => persisted[s.symbol]?.lastDirection).length,
    });

    await this.persist();
  }

  /**
   * Create the entry of a symbol if it does not exist yet
   */
  public register(symbol: string, minIntervalMs: number, existing?: LedgerEntry): void {
    const current = this.slots.get(symbol);
    if (current) {
      current.minIntervalMs = minIntervalMs;
      return;
    }

    this.slots.set(symbol, {
      minIntervalMs,
      entry: existing
        ? { ...existing }
        : {
            symbol,
            lastDirection: null,
            lastSignalAt: null,
            lastExecutedAt: null,
            lastOrderId: null,
          },
    });
  }

  public remove(symbol: string): boolean {
    return this.slots.delete(symbol);
  }

  /**
   * Decide whether an execution in the given direction may go ahead.
   * now is the market time of the triggering event.
   */
  public evaluate(symbol: string, direction: CrossDirection, now: number): LedgerVerdict {
    const slot = this.requireSlot(symbol);
    const { entry, minIntervalMs } = slot;

    if (entry.lastDirection === direction) {
      return {
        allowed: false,
        reason: 'duplicate_direction',
        detail: `Last execution was already ${direction}`,
      };
    }

    if (minIntervalMs > 0 && entry.lastSignalAt !== null) {
      const elapsed = now - entry.lastSignalAt;
      if (elapsed < minIntervalMs) {
        return {
          allowed: false,
          reason: 'min_interval',
          detail: `${elapsed}ms since last execution, minimum is ${minIntervalMs}ms`,
        };
      }
    }

    return { allowed: true };
  }

  public mayExecute(symbol: string, direction: CrossDirection, now: number): boolean {
    return this.evaluate(symbol, direction, now).allowed;
  }

  /**
   * Record a confirmed execution and persist the ledger.
   * Persistence failures are reported but do not undo the in-memory record.
   */
  public async record(
    symbol: string,
    direction: CrossDirection,
    now: number,
    orderId: string | null = null
  ): Promise<void> {
    const slot = this.requireSlot(symbol);

    slot.entry = {
      symbol,
      lastDirection: direction,
      lastSignalAt: now,
      lastExecutedAt: this.clock(),
      lastOrderId: orderId,
    };

    logger.info('Ledger updated', { symbol, direction, orderId });
    this.emit('recorded', { ...slot.entry });

    await this.persist();
  }

  public getEntry(symbol: string): LedgerEntry | null {
    const slot = this.slots.get(symbol);
    return slot ? { ...slot.entry } : null;
  }

  /**
   * Lifecycle phase of a symbol given whether its averages are warm
   */
  public phaseOf(symbol: string, warm: boolean): SymbolPhase {
    if (!warm) return 'COLD';

    const direction = this.slots.get(symbol)?.entry.lastDirection ?? null;
    if (direction === 'golden') return 'WARM_LONG';
    if (direction === 'death') return 'WARM_SHORT';
    return 'WARM_NEUTRAL';
  }

  public snapshot(): LedgerSnapshot {
    const snapshot: LedgerSnapshot = {};
    for (const [symbol, slot] of this.slots) {
      snapshot[symbol] = { ...slot.entry };
    }
    return snapshot;
  }

  /**
   * Wait for pending writes to finish
   */
  public async flush(): Promise<void> {
    await this.persistChain;
  }

  private requireSlot(symbol: string): LedgerSlot {
    const slot = this.slots.get(symbol);
    if (!slot) {
      throw new Error(`Symbol not registered with ledger: ${symbol}`);
    }
    return slot;
  }

  // Writes are chained so a slow save never overwrites a newer one
  private persist(): Promise<void> {
    const snapshot = this.snapshot();

    this.persistChain = this.persistChain.then(async () => {
      try {
        await this.store.save(snapshot);
      } catch (error) {
        const normalized = error instanceof Error ? error : new Error(String(error));
        logger.error('Failed to persist ledger', { error: errorMessage(error) });
        this.emit('error', normalized);
      }
    });

    return this.persistChain;
  }
}
