/**
 * Message Formatter
 *
 * Formats engine notifications for Telegram (HTML parse mode).
 */

import type { CrossoverEvent } from '../types.js';
import type { SymbolRejection } from '../config.js';
import { formatPrice } from '../strategy/indicators.js';
import type { EngineNotification } from './types.js';

/**
 * Format any engine notification
 */
export function formatNotification(notification: EngineNotification, precision: number): string {
  switch (notification.type) {
    case 'signal':
      return formatSignalMessage(notification.event, precision);
    case 'executed':
      return [
        `✅ <b>Order executed</b> ${escapeHtml(notification.event.symbol)}`,
        '',
        `• Side: <code>${notification.request.side}</code>`,
        `• Quantity: <code>${notification.request.quantity}</code>`,
        `• Order ID: <code>${escapeHtml(notification.orderId)}</code>`,
        `• Attempts: <code>${notification.attempts}</code>`,
        `• Signal price: <code>${formatPrice(notification.event.price, precision)}</code>`,
      ].join('\n');
    case 'failed':
      return [
        `❌ <b>Order failed</b> ${escapeHtml(notification.event.symbol)}`,
        '',
        `• Side: <code>${notification.request.side}</code>`,
        `• Quantity: <code>${notification.request.quantity}</code>`,
        `• Failure: <code>${notification.kind}</code> after ${notification.attempts} attempt(s)`,
        `• Reason: <code>${escapeHtml(notification.reason)}</code>`,
      ].join('\n');
    case 'suppressed':
      return [
        `⏸ <b>Signal suppressed</b> ${escapeHtml(notification.event.symbol)}`,
        '',
        `• Direction: <code>${notification.event.direction}</code>`,
        `• Reason: <code>${notification.reason}</code>`,
        `• Detail: ${escapeHtml(notification.detail)}`,
      ].join('\n');
  }
}

/**
 * Format a detected crossover
 */
export function formatSignalMessage(event: CrossoverEvent, precision: number): string {
  const golden = event.direction === 'golden';
  const emoji = golden ? '📈' : '📉';
  const title = golden ? 'Golden cross (BUY signal)' : 'Death cross (SELL signal)';

  return [
    `${emoji} <b>${title}</b> ${escapeHtml(event.symbol)}`,
    '',
    `• Price: <code>${formatPrice(event.price, precision)}</code>`,
    `• Short MA: <code>${formatPrice(event.shortMa, precision)}</code>`,
    `• Long MA: <code>${formatPrice(event.longMa, precision)}</code>`,
    `• Time: <code>${formatTime(event.timestamp)}</code>`,
  ].join('\n');
}

/**
 * Format an error notification
 */
export function formatErrorMessage(errorType: string, message: string, timestamp: number): string {
  return [
    '❗ <b>BOT ERROR DETECTED</b>',
    '',
    `• Type: <code>${escapeHtml(errorType)}</code>`,
    `• Message: <code>${escapeHtml(message)}</code>`,
    `• Time: <code>${formatTime(timestamp)}</code>`,
  ].join('\n');
}

/**
 * Format a startup notification
 */
export function formatStartupMessage(
  symbols: readonly string[],
  interval: string,
  testnet: boolean,
  autoTrade: boolean,
  rejected: readonly SymbolRejection[]
): string {
  const lines = [
    '🚀 <b>Crossover bot started</b>',
    '',
    `• Environment: <code>${testnet ? 'testnet' : 'mainnet'}</code>`,
    `• Symbols: <code>${escapeHtml(symbols.join(', '))}</code>`,
    `• Timeframe: <code>${escapeHtml(interval)}</code>`,
    `• Auto-trade: <code>${autoTrade ? 'on' : 'off'}</code>`,
  ];

  for (const rejection of rejected) {
    lines.push(
      `⚠️ Not monitoring <code>${escapeHtml(rejection.symbol)}</code>: ${escapeHtml(rejection.errors.join('; '))}`
    );
  }

  return lines.join('\n');
}

/**
 * Format a shutdown notification
 */
export function formatShutdownMessage(reason: string): string {
  return ['🛑 <b>Crossover bot stopped</b>', '', `• Reason: <code>${escapeHtml(reason)}</code>`].join(
    '\n'
  );
}

/**
 * UTC timestamp, e.g. 2024-03-01 12:15:00 UTC
 */
export function formatTime(timestamp: number): string {
  return `${new Date(timestamp).toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

/**
 * Escape characters Telegram treats as HTML markup
 */
export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
