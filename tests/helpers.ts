/**
 * In-process stand-ins shared by the tests
 */

import type { PriceSource } from '../src/consumers/types.js';
import type { SymbolSettings } from '../src/config.js';
import type { EngineConfig } from '../src/engine/types.js';
import type { ExecutionRequest, TradingVenue, VenueOrderResult } from '../src/execution/types.js';
import type { EngineNotification, NotificationSink } from '../src/notification/types.js';
import type { CrossoverEvent, MAState, PriceSample } from '../src/types.js';

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function createDeferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * Samples at start, start + step, ... for the given prices
 */
export function samplesOf(
  symbol: string,
  prices: readonly number[],
  start = 1000,
  step = 1000
): PriceSample[] {
  return prices.map((price, i) => ({ symbol, timestamp: start + i * step, price }));
}

/**
 * Yields a fixed list of samples per symbol, then stays open until aborted
 */
export class ReplaySource implements PriceSource {
  private drained: Map<string, Deferred> = new Map();

  constructor(private readonly streams: Readonly<Record<string, readonly PriceSample[]>>) {}

  async *subscribe(symbol: string, signal: AbortSignal): AsyncGenerator<PriceSample, void, undefined> {
    for (const sample of this.streams[symbol] ?? []) {
      yield sample;
    }
    this.deferredFor(symbol).resolve();
    await waitForAbort(signal);
  }

  /**
   * Resolves once every sample of the symbol has been processed
   */
  whenDrained(symbol: string): Promise<void> {
    return this.deferredFor(symbol).promise;
  }

  private deferredFor(symbol: string): Deferred {
    let deferred = this.drained.get(symbol);
    if (!deferred) {
      deferred = createDeferred();
      this.drained.set(symbol, deferred);
    }
    return deferred;
  }
}

/**
 * Records requests and plays back scripted results per symbol;
 * unscripted requests succeed with order-1, order-2, ...
 */
export class FakeVenue implements TradingVenue {
  readonly requests: ExecutionRequest[] = [];
  private scripts: Map<string, VenueOrderResult[]> = new Map();
  private nextOrder = 1;

  script(symbol: string, ...results: VenueOrderResult[]): this {
    this.scripts.set(symbol, [...(this.scripts.get(symbol) ?? []), ...results]);
    return this;
  }

  async submitOrder(request: ExecutionRequest): Promise<VenueOrderResult> {
    this.requests.push(request);
    const scripted = this.scripts.get(request.symbol)?.shift();
    if (scripted) return scripted;
    return { kind: 'success', orderId: `order-${this.nextOrder++}` };
  }
}

export class RecordingSink implements NotificationSink {
  readonly notifications: EngineNotification[] = [];

  async notify(notification: EngineNotification): Promise<void> {
    this.notifications.push(notification);
  }

  types(): string[] {
    return this.notifications.map((n) => n.type);
  }
}

export function symbolSettings(
  symbol: string,
  overrides: Partial<Omit<SymbolSettings, 'symbol'>> = {}
): SymbolSettings {
  return {
    symbol,
    mode: 'trade',
    shortWindow: 3,
    longWindow: 5,
    quantity: 0.01,
    leverage: 10,
    minIntervalMs: 0,
    pricePrecision: 2,
    ...overrides,
  };
}

export function engineConfig(
  symbols: SymbolSettings[],
  overrides: Partial<Omit<EngineConfig, 'symbols'>> = {}
): EngineConfig {
  return {
    symbols,
    autoTrade: true,
    notifySuppressed: false,
    reconnectDelayMs: 1,
    retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 4 },
    rateLimit: { capacity: 10, refillIntervalMs: 100 },
    ...overrides,
  };
}

export function crossoverEvent(overrides: Partial<CrossoverEvent> = {}): CrossoverEvent {
  return {
    symbol: 'BTCUSDT',
    direction: 'golden',
    timestamp: 60000,
    price: 50000,
    shortMa: 49900,
    longMa: 49800,
    ...overrides,
  };
}

export function warmState(symbol: string, timestamp: number, shortMa: number, longMa: number): MAState {
  return {
    symbol,
    timestamp,
    price: shortMa,
    shortMa,
    longMa,
    samples: 100,
    warm: true,
  };
}
