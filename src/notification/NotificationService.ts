/**
 * Notification Service
 *
 * Notification sink of the engine: formats signals and execution
 * outcomes and delivers them to the operator's Telegram chat.
 * Delivery failures are reported through the error event, never thrown.
 */

import EventEmitter from 'eventemitter3';
import { logger } from '../logger.js';
import type { SymbolRejection } from '../config.js';
import type {
  EngineNotification,
  MessageTransport,
  NotificationEvents,
  NotificationServiceConfig,
  NotificationSink,
} from './types.js';
import { TelegramClient } from './TelegramClient.js';
import {
  formatNotification,
  formatErrorMessage,
  formatStartupMessage,
  formatShutdownMessage,
} from './formatter.js';

export class NotificationService
  extends EventEmitter<NotificationEvents>
  implements NotificationSink
{
  private readonly transport: MessageTransport;
  private readonly config: NotificationServiceConfig;

  constructor(config: NotificationServiceConfig, transport?: MessageTransport) {
    super();
    this.config = config;
    this.transport =
      transport ??
      new TelegramClient({
        botToken: config.botToken,
        chatId: config.chatId,
        retryAttempts: config.retryAttempts,
        retryDelayMs: config.retryDelayMs,
      });

    logger.info('Notification Service initialized');
  }

  /**
   * Verify Telegram connection on startup
   */
  public async verifyConnection(): Promise<boolean> {
    return this.transport.verifyConnection();
  }

  /**
   * Deliver an engine notification
   */
  public async notify(notification: EngineNotification): Promise<void> {
    const precision = this.precisionFor(notification.event.symbol);
    const message = formatNotification(notification, precision);
    const success = await this.transport.sendMessage(message);

    if (success) {
      logger.info('Notification sent', {
        type: notification.type,
        symbol: notification.event.symbol,
      });
      this.emit('sent', notification);
    } else {
      logger.error('Failed to send notification', {
        type: notification.type,
        symbol: notification.event.symbol,
      });
      this.emit('error', new Error(`Failed to send ${notification.type} notification`));
    }
  }

  /**
   * Send startup notification
   */
  public async sendStartupNotification(
    symbols: readonly string[],
    interval: string,
    testnet: boolean,
    autoTrade: boolean,
    rejected: readonly SymbolRejection[] = []
  ): Promise<boolean> {
    const message = formatStartupMessage(symbols, interval, testnet, autoTrade, rejected);
    return this.transport.sendMessage(message);
  }

  /**
   * Send shutdown notification
   */
  public async sendShutdownNotification(reason: string): Promise<boolean> {
    return this.transport.sendMessage(formatShutdownMessage(reason));
  }

  /**
   * Send error notification, separate from signal notifications
   */
  public async sendErrorNotification(errorType: string, errorMessage: string): Promise<boolean> {
    logger.warn('Sending error notification', { errorType, errorMessage });
    return this.transport.sendMessage(formatErrorMessage(errorType, errorMessage, Date.now()));
  }

  private precisionFor(symbol: string): number {
    return this.config.pricePrecision[symbol] ?? this.config.defaultPricePrecision;
  }
}
