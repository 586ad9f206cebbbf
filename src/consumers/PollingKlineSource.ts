/**
 * Polling Kline Source
 *
 * Polls Binance Futures klines for a symbol and yields one price sample
 * per closed kline (close time, close price). The first poll of every
 * subscription back-fills enough history to warm the moving averages; those
 * samples are flagged as historical. The last yielded close time is kept
 * across subscriptions so a resubscribe only yields newer klines.
 *
 * Poll failures are logged and retried on the next tick; the stream only
 * ends when the subscriber aborts.
 */

import { logger, errorMessage } from '../logger.js';
import type { PriceSample } from '../types.js';
import { sleep } from '../utils/sleep.js';
import type {
  KlineClient,
  ParsedKline,
  PollingKlineSourceConfig,
  PriceSource,
} from './types.js';

export class PollingKlineSource implements PriceSource {
  private lastCloseTimes: Map<string, number> = new Map();

  constructor(
    private readonly client: KlineClient,
    private readonly config: PollingKlineSourceConfig,
    private readonly clock: () => number = () => Date.now()
  ) {
    logger.info('Polling kline source initialized', {
      interval: config.interval,
      pollIntervalMs: config.pollIntervalMs,
      backfillLimit: config.backfillLimit,
    });
  }

  async *subscribe(symbol: string, signal: AbortSignal): AsyncGenerator<PriceSample, void, undefined> {
    let limit = this.config.backfillLimit;
    let historical = true;

    logger.info('Subscribing to klines', { symbol, interval: this.config.interval });

    while (!signal.aborted) {
      try {
        const rows = await this.client.getKlines({
          symbol,
          interval: this.config.interval,
          limit,
        });
        const now = this.clock();

        for (const row of rows) {
          const kline = parseKlineRow(row);
          if (!kline) {
            logger.warn('Skipping unparseable kline', { symbol });
            continue;
          }

          // Only confirmed candles
          const lastCloseTime = this.lastCloseTimes.get(symbol) ?? 0;
          if (kline.closeTime >= now || kline.closeTime <= lastCloseTime) {
            continue;
          }

          this.lastCloseTimes.set(symbol, kline.closeTime);
          yield historical
            ? { symbol, timestamp: kline.closeTime, price: kline.close, historical }
            : { symbol, timestamp: kline.closeTime, price: kline.close };
        }

        limit = this.config.pollLimit;
        historical = false;
      } catch (error) {
        logger.warn('Kline poll failed, retrying next tick', {
          symbol,
          error: errorMessage(error),
        });
      }

      await sleep(this.config.pollIntervalMs, signal);
    }

    logger.info('Kline subscription closed', { symbol });
  }
}

/**
 * Parse a raw Binance kline row:
 * [openTime, open, high, low, close, volume, closeTime, ...]
 */
export function parseKlineRow(row: readonly unknown[]): ParsedKline | null {
  const openTime = Number(row[0]);
  const close = parseFloat(String(row[4]));
  const closeTime = Number(row[6]);

  if (!Number.isFinite(openTime) || !Number.isFinite(closeTime)) {
    return null;
  }

  // A NaN close is passed on so the tracker reports it as malformed
  return { openTime, closeTime, close };
}
