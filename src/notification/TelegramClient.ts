/**
 * Telegram Client
 *
 * Sends HTML messages through the Telegram Bot API with retries.
 * Rate-limit responses (429) wait for Telegram's retry_after.
 */

import TelegramBot from 'node-telegram-bot-api';
import { logger, maskSecret, errorMessage } from '../logger.js';
import { sleep } from '../utils/sleep.js';
import type { MessageTransport } from './types.js';

export interface TelegramClientConfig {
  botToken: string;
  chatId: string;
  retryAttempts: number;
  retryDelayMs: number;
}

export class TelegramClient implements MessageTransport {
  private bot: TelegramBot;
  private readonly config: TelegramClientConfig;

  constructor(config: TelegramClientConfig) {
    this.config = config;
    this.bot = new TelegramBot(config.botToken);

    logger.info('Telegram client initialized', {
      chatId: maskSecret(config.chatId),
    });
  }

  /**
   * Send a message with retry logic.
   * Returns true if the message was delivered.
   */
  public async sendMessage(text: string): Promise<boolean> {
    const { retryAttempts, retryDelayMs } = this.config;
    let lastError = 'No attempt made';

    for (let attempt = 1; attempt <= retryAttempts; attempt++) {
      try {
        await this.bot.sendMessage(this.config.chatId, text, {
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        });

        logger.debug('Telegram message sent', { attempt });
        return true;
      } catch (error) {
        lastError = errorMessage(error);
        if (attempt === retryAttempts) break;

        const retryAfterMs = extractRetryAfterMs(error);
        const waitMs = retryAfterMs ?? retryDelayMs * attempt;
        logger.warn(
          retryAfterMs !== null ? 'Telegram rate limit hit, waiting...' : 'Telegram send failed, retrying...',
          { attempt, waitMs, error: lastError }
        );
        await sleep(waitMs);
      }
    }

    logger.error('Failed to send Telegram message after all retries', {
      error: lastError,
    });
    return false;
  }

  /**
   * Verify the bot token is valid
   */
  public async verifyConnection(): Promise<boolean> {
    try {
      const me = await this.bot.getMe();
      logger.info('Telegram bot verified', { username: me.username });
      return true;
    } catch (error) {
      logger.error('Failed to verify Telegram bot', { error: errorMessage(error) });
      return false;
    }
  }
}

/**
 * retry_after (seconds) of a 429 response, in milliseconds
 */
export function extractRetryAfterMs(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('response' in error)) {
    return null;
  }

  const response = error.response;
  if (typeof response !== 'object' || response === null) return null;
  if (!('statusCode' in response) || response.statusCode !== 429) return null;
  if (!('body' in response) || typeof response.body !== 'object' || response.body === null) {
    return null;
  }

  const body = response.body;
  if (!('parameters' in body) || typeof body.parameters !== 'object' || body.parameters === null) {
    return null;
  }

  const parameters = body.parameters;
  if ('retry_after' in parameters && typeof parameters.retry_after === 'number') {
    return parameters.retry_after * 1000;
  }
  return null;
}
