/**
 * Execution Coordinator
 *
 * Turns crossover events into at most one order each:
 * Event → Ledger gate → Rate limit → Order (with retry) → Ledger record → Notify
 *
 * Events of the same symbol are handled one at a time, in arrival order.
 */

import EventEmitter from 'eventemitter3';
import { logger, errorMessage } from '../logger.js';
import { sideForDirection, type CrossoverEvent } from '../types.js';
import { sleep } from '../utils/sleep.js';
import type { PositionLedger } from '../ledger/PositionLedger.js';
import type { EngineNotification, NotificationSink } from '../notification/types.js';
import type { TokenBucketRateLimiter } from './RateLimiter.js';
import type {
  ExecutionCoordinatorConfig,
  ExecutionEvents,
  ExecutionOutcome,
  ExecutionRequest,
  RetryPolicy,
  TradingVenue,
  VenueOrderResult,
} from './types.js';

/**
 * Delay before the attempt following `attempt` (1-based)
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

export class ExecutionCoordinator extends EventEmitter<ExecutionEvents> {
  private pending: Map<string, Promise<unknown>> = new Map();

  constructor(
    private readonly config: ExecutionCoordinatorConfig,
    private readonly venue: TradingVenue,
    private readonly ledger: PositionLedger,
    private readonly sink: NotificationSink,
    private readonly limiter?: TokenBucketRateLimiter
  ) {
    super();

    logger.info('Execution Coordinator initialized', {
      enabled: config.enabled,
      notifyOnly: config.notifyOnly,
      maxAttempts: config.retry.maxAttempts,
      baseDelayMs: config.retry.baseDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
    });
  }

  /**
   * Handle one crossover event.
   * Queued behind any event of the same symbol still in progress.
   */
  async handle(event: CrossoverEvent): Promise<ExecutionOutcome> {
    const previous = this.pending.get(event.symbol) ?? Promise.resolve();
    const run = previous.then(() => this.execute(event));

    // Keep the queue alive even if this run rejects
    const tail = run.catch((error: unknown) => {
      logger.error('Execution queue entry failed', {
        symbol: event.symbol,
        error: errorMessage(error),
      });
      this.emit('error', error instanceof Error ? error : new Error(String(error)));
    });
    this.pending.set(event.symbol, tail);

    try {
      return await run;
    } finally {
      if (this.pending.get(event.symbol) === tail) {
        this.pending.delete(event.symbol);
      }
    }
  }

  /**
   * Wait until every queued execution has settled
   */
  async drain(): Promise<void> {
    await Promise.all(this.pending.values());
  }

  getStatus(): { enabled: boolean; inFlight: string[] } {
    return {
      enabled: this.config.enabled,
      inFlight: [...this.pending.keys()],
    };
  }

  private async execute(event: CrossoverEvent): Promise<ExecutionOutcome> {
    const executionId = `${event.symbol}-${event.timestamp}-${event.direction}`;

    // Guard: kill switch
    if (!this.config.enabled) {
      logger.debug('Auto-trading disabled, signal not executed', { executionId });
      return this.finish({ status: 'disabled', event });
    }

    if (this.config.notifyOnly.includes(event.symbol)) {
      logger.debug('Notify-only symbol, signal not executed', { executionId });
      return this.finish({ status: 'disabled', event });
    }

    // Guard: duplicate direction / minimum interval
    const verdict = this.ledger.evaluate(event.symbol, event.direction, event.timestamp);
    if (!verdict.allowed) {
      logger.info('Execution suppressed', {
        executionId,
        reason: verdict.reason,
        detail: verdict.detail,
      });
      if (this.config.notifySuppressed) {
        await this.notify({
          type: 'suppressed',
          event,
          reason: verdict.reason,
          detail: verdict.detail,
        });
      }
      return this.finish({
        status: 'suppressed',
        event,
        reason: verdict.reason,
        detail: verdict.detail,
      });
    }

    const quantity = this.config.quantities[event.symbol];
    const request: ExecutionRequest = {
      symbol: event.symbol,
      side: sideForDirection(event.direction),
      quantity: quantity ?? 0,
    };

    if (quantity === undefined || !(quantity > 0)) {
      return this.fail(event, request, 'permanent', 'No order quantity configured', 0);
    }

    logger.info('Processing crossover for execution', { executionId, request });

    const { maxAttempts } = this.config.retry;
    let lastReason = 'No attempt made';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const result = await this.submit(request);

      if (result.kind === 'success') {
        await this.ledger.record(event.symbol, event.direction, event.timestamp, result.orderId);
        await this.notify({
          type: 'executed',
          event,
          request,
          orderId: result.orderId,
          attempts: attempt,
        });
        logger.info('Order execution completed', {
          executionId,
          orderId: result.orderId,
          attempts: attempt,
        });
        return this.finish({
          status: 'executed',
          event,
          request,
          orderId: result.orderId,
          attempts: attempt,
        });
      }

      if (result.kind === 'permanent') {
        return this.fail(event, request, 'permanent', result.reason, attempt);
      }

      lastReason = result.reason;
      if (attempt < maxAttempts) {
        const delayMs = backoffDelay(attempt, this.config.retry);
        logger.warn(`Order attempt failed, attempt ${attempt}/${maxAttempts}`, {
          executionId,
          reason: result.reason,
          retryInMs: delayMs,
        });
        this.emit('retrying', request, attempt, delayMs, result.reason);
        await sleep(delayMs);
      }
    }

    return this.fail(event, request, 'transient', lastReason, maxAttempts);
  }

  private async submit(request: ExecutionRequest): Promise<VenueOrderResult> {
    await this.limiter?.acquire();

    try {
      return await this.venue.submitOrder(request);
    } catch (error) {
      // A venue that throws instead of returning a result is treated as a network fault
      return { kind: 'transient', reason: errorMessage(error) };
    }
  }

  private async fail(
    event: CrossoverEvent,
    request: ExecutionRequest,
    kind: 'transient' | 'permanent',
    reason: string,
    attempts: number
  ): Promise<ExecutionOutcome> {
    logger.error('Order execution failed', {
      symbol: event.symbol,
      direction: event.direction,
      kind,
      reason,
      attempts,
    });
    await this.notify({ type: 'failed', event, request, kind, reason, attempts });
    return this.finish({ status: 'failed', event, request, kind, reason, attempts });
  }

  private async notify(notification: EngineNotification): Promise<void> {
    try {
      await this.sink.notify(notification);
    } catch (error) {
      logger.error('Failed to deliver execution notification', {
        type: notification.type,
        error: errorMessage(error),
      });
    }
  }

  private finish(outcome: ExecutionOutcome): ExecutionOutcome {
    this.emit('outcome', outcome);
    return outcome;
  }
}
