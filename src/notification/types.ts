/**
 * Types for Notification Service
 */

import type { CrossoverEvent } from '../types.js';
import type { ExecutionRequest, FailureKind } from '../execution/types.js';
import type { SuppressionReason } from '../ledger/types.js';

/**
 * Configuration for Notification Service
 */
export interface NotificationServiceConfig {
  botToken: string;
  chatId: string;
  retryAttempts: number;
  retryDelayMs: number;
  /** Display decimals per symbol */
  pricePrecision: Readonly<Record<string, number>>;
  defaultPricePrecision: number;
}

/**
 * Human-facing events produced by the engine
 */
export type EngineNotification =
  | { type: 'signal'; event: CrossoverEvent }
  | {
      type: 'executed';
      event: CrossoverEvent;
      request: ExecutionRequest;
      orderId: string;
      attempts: number;
    }
  | {
      type: 'failed';
      event: CrossoverEvent;
      request: ExecutionRequest;
      kind: FailureKind;
      reason: string;
      attempts: number;
    }
  | {
      type: 'suppressed';
      event: CrossoverEvent;
      reason: SuppressionReason;
      detail: string;
    };

/**
 * Anything that can deliver engine notifications to the operator
 */
export interface NotificationSink {
  notify(notification: EngineNotification): Promise<void>;
}

/**
 * Message delivery channel (Telegram in production)
 */
export interface MessageTransport {
  sendMessage(text: string): Promise<boolean>;
  verifyConnection(): Promise<boolean>;
}

export type NotificationEvents = {
  sent: [notification: EngineNotification];
  error: [error: Error];
};
