/**
 * Tests for CrossoverEngine
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { PollingKlineSource } from '../../src/consumers/PollingKlineSource.js';
import { CrossoverEngine } from '../../src/engine/CrossoverEngine.js';
import { MemoryLedgerStore } from '../../src/ledger/LedgerStore.js';
import type { KlineClient, PriceSource } from '../../src/consumers/types.js';
import type { ExecutionOutcome, TradingVenue, VenueOrderResult } from '../../src/execution/types.js';
import type { CrossoverEvent, DataQualityWarning, PriceSample } from '../../src/types.js';
import {
  FakeVenue,
  RecordingSink,
  ReplaySource,
  createDeferred,
  engineConfig,
  samplesOf,
  symbolSettings,
  waitForAbort,
} from '../helpers.js';

const DIP_AND_RECOVERY = [10, 10, 10, 10, 10, 9, 8, 12, 13, 14];

/** Binance kline row closing at the end of the given minute */
function minuteKline(minute: number, close: number): unknown[] {
  return [minute * 60000, '1', '1', '1', String(close), '1', (minute + 1) * 60000 - 1];
}

describe('CrossoverEngine', () => {
  const engines: CrossoverEngine[] = [];
  const recorded = new Map<
    CrossoverEngine,
    { signals: CrossoverEvent[]; outcomes: ExecutionOutcome[] }
  >();

  function track(engine: CrossoverEngine): CrossoverEngine {
    engines.push(engine);
    const signals: CrossoverEvent[] = [];
    const outcomes: ExecutionOutcome[] = [];
    engine.on('signalDetected', (event) => signals.push(event));
    engine.on('outcome', (outcome) => outcomes.push(outcome));
    recorded.set(engine, { signals, outcomes });
    return engine;
  }

  function signalsOf(engine: CrossoverEngine): CrossoverEvent[] {
    return recorded.get(engine)?.signals ?? [];
  }

  function outcomesOf(engine: CrossoverEngine): ExecutionOutcome[] {
    return recorded.get(engine)?.outcomes ?? [];
  }

  afterEach(async () => {
    await Promise.all(engines.map((engine) => engine.stop()));
    engines.length = 0;
    recorded.clear();
  });

  it('should execute exactly one buy when the short average overtakes after a dip', async () => {
    const source = new ReplaySource({ BTCUSDT: samplesOf('BTCUSDT', DIP_AND_RECOVERY) });
    const venue = new FakeVenue();
    const sink = new RecordingSink();
    const engine = track(
      new CrossoverEngine(engineConfig([symbolSettings('BTCUSDT')]), {
        source,
        venue,
        sink,
        ledgerStore: new MemoryLedgerStore(),
      })
    );

    await engine.start();
    await source.whenDrained('BTCUSDT');

    expect(signalsOf(engine).map((e) => [e.direction, e.timestamp])).toEqual([['golden', 9000]]);
    expect(venue.requests).toEqual([{ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01 }]);
    expect(sink.types()).toEqual(['signal', 'executed']);
    expect(outcomesOf(engine).map((o) => o.status)).toEqual(['executed']);

    const status = engine.getSymbolStatus('BTCUSDT');
    expect(status).toMatchObject({
      symbol: 'BTCUSDT',
      phase: 'WARM_LONG',
      running: true,
      samples: 10,
      lastPrice: 14,
      lastSampleAt: 10000,
    });
    expect(status?.ledger?.lastOrderId).toBe('order-1');
  });

  it('should suppress a second golden cross with no executed death cross between', async () => {
    // short 2 / long 3: golden at 4000, death at 5000, golden again at 6000
    const source = new ReplaySource({
      ETHUSDT: samplesOf('ETHUSDT', [10, 10, 9, 12, 5, 20]),
    });
    const venue = new FakeVenue();
    const sink = new RecordingSink();
    const engine = track(
      new CrossoverEngine(
        engineConfig([
          symbolSettings('ETHUSDT', { shortWindow: 2, longWindow: 3, minIntervalMs: 1500 }),
        ]),
        { source, venue, sink, ledgerStore: new MemoryLedgerStore() }
      )
    );

    await engine.start();
    await source.whenDrained('ETHUSDT');

    expect(signalsOf(engine).map((e) => [e.direction, e.timestamp])).toEqual([
      ['golden', 4000],
      ['death', 5000],
      ['golden', 6000],
    ]);
    expect(venue.requests.map((r) => r.side)).toEqual(['BUY']);
    expect(
      outcomesOf(engine).map((o) => (o.status === 'suppressed' ? o.reason : o.status))
    ).toEqual(['executed', 'min_interval', 'duplicate_direction']);
  });

  it('should record once when the first attempt fails transiently', async () => {
    const source = new ReplaySource({ BTCUSDT: samplesOf('BTCUSDT', DIP_AND_RECOVERY) });
    const venue = new FakeVenue().script('BTCUSDT', { kind: 'transient', reason: 'HTTP 503' });
    const sink = new RecordingSink();
    const store = new MemoryLedgerStore();
    const engine = track(
      new CrossoverEngine(engineConfig([symbolSettings('BTCUSDT')]), {
        source,
        venue,
        sink,
        ledgerStore: store,
      })
    );
    let ledgerUpdates = 0;
    engine.ledger.on('recorded', () => ledgerUpdates++);

    await engine.start();
    await source.whenDrained('BTCUSDT');

    expect(venue.requests).toHaveLength(2);
    expect(ledgerUpdates).toBe(1);
    expect(sink.types()).toEqual(['signal', 'executed']);
  });

  it('should not execute again when the same history is replayed after a restart', async () => {
    const store = new MemoryLedgerStore();
    const venue = new FakeVenue();
    const config = engineConfig([symbolSettings('BTCUSDT')]);

    const firstSource = new ReplaySource({ BTCUSDT: samplesOf('BTCUSDT', DIP_AND_RECOVERY) });
    const first = track(
      new CrossoverEngine(config, {
        source: firstSource,
        venue,
        sink: new RecordingSink(),
        ledgerStore: store,
      })
    );
    await first.start();
    await firstSource.whenDrained('BTCUSDT');
    await first.stop();

    const secondSource = new ReplaySource({ BTCUSDT: samplesOf('BTCUSDT', DIP_AND_RECOVERY) });
    const second = track(
      new CrossoverEngine(config, {
        source: secondSource,
        venue,
        sink: new RecordingSink(),
        ledgerStore: store,
      })
    );
    await second.start();
    await secondSource.whenDrained('BTCUSDT');

    expect(venue.requests).toHaveLength(1);
    expect(outcomesOf(second)).toMatchObject([
      { status: 'suppressed', reason: 'duplicate_direction' },
    ]);
  });

  it('should not act on crossovers inside the start-up back-fill', async () => {
    // short 2 / long 3: golden and death inside the history, golden once live
    const rows = [10, 10, 9, 12, 5].map((price, minute) => minuteKline(minute, price));
    const client: KlineClient = { getKlines: async () => [...rows] };
    const source = new PollingKlineSource(
      client,
      { interval: '1m', pollIntervalMs: 1, backfillLimit: 100, pollLimit: 5 },
      () => 10 * 60000
    );
    const venue = new FakeVenue();
    const sink = new RecordingSink();
    const engine = track(
      new CrossoverEngine(
        engineConfig([symbolSettings('BTCUSDT', { shortWindow: 2, longWindow: 3 })]),
        { source, venue, sink, ledgerStore: new MemoryLedgerStore() }
      )
    );

    await engine.start();
    await vi.waitFor(() => expect(engine.getSymbolStatus('BTCUSDT')?.samples).toBe(5));

    expect(engine.detector.getState('BTCUSDT')?.sign).toBe(-1);
    expect(venue.requests).toEqual([]);
    expect(sink.notifications).toEqual([]);

    rows.push(minuteKline(5, 20));
    await vi.waitFor(() => expect(outcomesOf(engine)).toHaveLength(1));

    expect(signalsOf(engine).map((e) => [e.direction, e.timestamp])).toEqual([
      ['golden', 6 * 60000 - 1],
    ]);
    expect(venue.requests).toEqual([{ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01 }]);
    expect(sink.types()).toEqual(['signal', 'executed']);
  });

  it('should place identical orders when two fresh engines replay the same prices', async () => {
    // short 2 / long 3: golden, death, golden, death
    const prices = [10, 10, 9, 12, 5, 20, 4, 4.5, 3];
    const replay = async (): Promise<FakeVenue> => {
      const source = new ReplaySource({ SOLUSDT: samplesOf('SOLUSDT', prices) });
      const venue = new FakeVenue();
      const engine = track(
        new CrossoverEngine(
          engineConfig([symbolSettings('SOLUSDT', { shortWindow: 2, longWindow: 3 })]),
          { source, venue, sink: new RecordingSink(), ledgerStore: new MemoryLedgerStore() }
        )
      );
      await engine.start();
      await source.whenDrained('SOLUSDT');
      return venue;
    };

    const first = await replay();
    const second = await replay();

    expect(first.requests.map((r) => r.side)).toEqual(['BUY', 'SELL', 'BUY', 'SELL']);
    expect(second.requests).toEqual(first.requests);
  });

  it('should keep symbols isolated from each other', async () => {
    const source = new ReplaySource({
      BTCUSDT: samplesOf('BTCUSDT', DIP_AND_RECOVERY),
      ETHUSDT: samplesOf('ETHUSDT', DIP_AND_RECOVERY),
    });
    const venue = new FakeVenue().script('BTCUSDT', {
      kind: 'permanent',
      reason: 'Binance Error -2019: Margin is insufficient.',
    });
    const sink = new RecordingSink();
    const engine = track(
      new CrossoverEngine(
        engineConfig([symbolSettings('BTCUSDT'), symbolSettings('ETHUSDT')]),
        { source, venue, sink, ledgerStore: new MemoryLedgerStore() }
      )
    );

    await engine.start();
    await Promise.all([source.whenDrained('BTCUSDT'), source.whenDrained('ETHUSDT')]);

    expect(engine.ledger.getEntry('BTCUSDT')?.lastDirection).toBeNull();
    expect(engine.ledger.getEntry('ETHUSDT')?.lastDirection).toBe('golden');
    expect(engine.getSymbolStatus('BTCUSDT')?.phase).toBe('WARM_NEUTRAL');
    expect(engine.getSymbolStatus('ETHUSDT')?.phase).toBe('WARM_LONG');
  });

  it('should only notify signals when auto-trading is off', async () => {
    const source = new ReplaySource({ BTCUSDT: samplesOf('BTCUSDT', DIP_AND_RECOVERY) });
    const venue = new FakeVenue();
    const sink = new RecordingSink();
    const engine = track(
      new CrossoverEngine(engineConfig([symbolSettings('BTCUSDT')], { autoTrade: false }), {
        source,
        venue,
        sink,
        ledgerStore: new MemoryLedgerStore(),
      })
    );

    await engine.start();
    await source.whenDrained('BTCUSDT');

    expect(sink.types()).toEqual(['signal']);
    expect(venue.requests).toHaveLength(0);
    expect(outcomesOf(engine).map((o) => o.status)).toEqual(['disabled']);
  });

  it('should forward data-quality warnings and carry on', async () => {
    const samples: PriceSample[] = [
      { symbol: 'BTCUSDT', timestamp: 2000, price: 10 },
      { symbol: 'BTCUSDT', timestamp: 1000, price: 10 },
      { symbol: 'BTCUSDT', timestamp: 3000, price: Number.NaN },
      { symbol: 'BTCUSDT', timestamp: 4000, price: 11 },
    ];
    const source = new ReplaySource({ BTCUSDT: samples });
    const engine = track(
      new CrossoverEngine(engineConfig([symbolSettings('BTCUSDT')]), {
        source,
        venue: new FakeVenue(),
        sink: new RecordingSink(),
        ledgerStore: new MemoryLedgerStore(),
      })
    );
    const warnings: DataQualityWarning[] = [];
    engine.on('dataQuality', (warning) => warnings.push(warning));

    await engine.start();
    await source.whenDrained('BTCUSDT');

    expect(warnings.map((w) => w.reason)).toEqual(['out_of_order', 'malformed']);
    expect(engine.getSymbolStatus('BTCUSDT')?.samples).toBe(2);
  });

  it('should resubscribe after a stream failure without affecting other symbols', async () => {
    const replay = new ReplaySource({
      BTCUSDT: samplesOf('BTCUSDT', DIP_AND_RECOVERY),
      ETHUSDT: samplesOf('ETHUSDT', DIP_AND_RECOVERY),
    });
    let failures = 0;
    const source: PriceSource = {
      subscribe(symbol, signal) {
        if (symbol === 'BTCUSDT' && failures === 0) {
          failures++;
          return (async function* (): AsyncGenerator<PriceSample> {
            throw new Error('stream reset');
          })();
        }
        return replay.subscribe(symbol, signal);
      },
    };
    const venue = new FakeVenue();
    const engine = track(
      new CrossoverEngine(
        engineConfig([symbolSettings('BTCUSDT'), symbolSettings('ETHUSDT')]),
        { source, venue, sink: new RecordingSink(), ledgerStore: new MemoryLedgerStore() }
      )
    );
    const workerErrors: string[] = [];
    engine.on('workerError', (symbol, error) => workerErrors.push(`${symbol}: ${error.message}`));

    await engine.start();
    await Promise.all([replay.whenDrained('BTCUSDT'), replay.whenDrained('ETHUSDT')]);

    expect(workerErrors).toEqual(['BTCUSDT: stream reset']);
    expect(engine.getSymbolStatus('BTCUSDT')?.lastError).toBe('stream reset');
    expect(venue.requests.map((r) => r.symbol).sort()).toEqual(['BTCUSDT', 'ETHUSDT']);
  });

  it('should let an in-flight execution finish on shutdown', async () => {
    const submitted = createDeferred();
    const release = createDeferred();
    const venue: TradingVenue = {
      async submitOrder(): Promise<VenueOrderResult> {
        submitted.resolve();
        await release.promise;
        return { kind: 'success', orderId: 'late-1' };
      },
    };
    const store = new MemoryLedgerStore();
    const engine = track(
      new CrossoverEngine(engineConfig([symbolSettings('BTCUSDT')]), {
        source: new ReplaySource({ BTCUSDT: samplesOf('BTCUSDT', DIP_AND_RECOVERY) }),
        venue,
        sink: new RecordingSink(),
        ledgerStore: store,
      })
    );

    await engine.start();
    await submitted.promise;

    const stopping = engine.stop();
    release.resolve();
    await stopping;

    expect(engine.isRunning()).toBe(false);
    expect(engine.ledger.getEntry('BTCUSDT')?.lastOrderId).toBe('late-1');
    expect((await store.load())['BTCUSDT']?.lastOrderId).toBe('late-1');
    // The sample after the crossover is never evaluated
    expect(outcomesOf(engine)).toHaveLength(1);
  });

  it('should report its status', async () => {
    const source: PriceSource = {
      subscribe: async function* (_symbol, signal): AsyncGenerator<PriceSample> {
        await waitForAbort(signal);
      },
    };
    const engine = track(
      new CrossoverEngine(engineConfig([symbolSettings('BTCUSDT')]), {
        source,
        venue: new FakeVenue(),
        sink: new RecordingSink(),
        ledgerStore: new MemoryLedgerStore(),
      })
    );

    expect(engine.getStatus()).toEqual({
      running: false,
      autoTrade: true,
      startedAt: null,
      symbols: [],
    });

    await engine.start();
    const status = engine.getStatus();

    expect(status.running).toBe(true);
    expect(status.symbols).toHaveLength(1);
    expect(status.symbols[0]).toMatchObject({
      symbol: 'BTCUSDT',
      phase: 'COLD',
      samples: 0,
      lastPrice: null,
      shortWindow: 3,
      longWindow: 5,
    });
    expect(engine.getSymbolStatus('DOGEUSDT')).toBeNull();

    await engine.stop();
    expect(engine.getStatus().symbols).toEqual([]);
  });
});
