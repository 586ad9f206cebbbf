/**
 * Binance Order Client
 *
 * Wrapper around the Binance USD-M Futures REST API. Places market
 * orders as tagged results, sets leverage and serves kline history to
 * the price source.
 */

import { USDMClient } from 'binance';
import type { KlineInterval } from 'binance';
import { logger, maskSecret } from '../logger.js';
import { classifyVenueError, describeVenueError } from './venueErrors.js';
import type {
  BinanceClientConfig,
  ExecutionRequest,
  TradingVenue,
  VenueOrderResult,
} from './types.js';

export interface KlineQuery {
  symbol: string;
  interval: KlineInterval;
  limit?: number;
}

export class BinanceOrderClient implements TradingVenue {
  private client: USDMClient;

  /** Whether using testnet */
  public readonly isTestnet: boolean;

  constructor(config: BinanceClientConfig) {
    this.isTestnet = config.testnet;
    this.client = new USDMClient(
      {
        api_key: config.apiKey,
        api_secret: config.apiSecret,
      },
      undefined,
      config.testnet
    );

    logger.info('Binance Order Client initialized', {
      testnet: config.testnet,
      apiKey: config.apiKey ? maskSecret(config.apiKey) : '(none)',
    });
  }

  /**
   * Verify API connection and permissions
   */
  async verifyConnection(): Promise<boolean> {
    try {
      await this.client.getAccountInformation();
      logger.info('Binance API connection verified');
      return true;
    } catch (error) {
      logger.error('Binance API connection failed', {
        error: describeVenueError(error),
      });
      return false;
    }
  }

  /**
   * Set leverage for symbol
   */
  async setLeverage(symbol: string, leverage: number): Promise<boolean> {
    try {
      await this.client.setLeverage({ symbol, leverage });
      logger.info('Leverage set successfully', { symbol, leverage });
      return true;
    } catch (error) {
      // Binance rejects a leverage change to the current value
      const errorMsg = describeVenueError(error);
      if (errorMsg.includes('No need to change leverage')) {
        logger.debug('Leverage already set', { symbol, leverage });
        return true;
      }
      logger.error('Failed to set leverage', { symbol, leverage, error: errorMsg });
      return false;
    }
  }

  /**
   * Submit a market order; failures come back classified, never thrown
   */
  async submitOrder(request: ExecutionRequest): Promise<VenueOrderResult> {
    try {
      logger.info('Submitting market order', {
        symbol: request.symbol,
        side: request.side,
        quantity: request.quantity,
      });

      const result = await this.client.submitNewOrder({
        symbol: request.symbol,
        side: request.side,
        type: 'MARKET',
        quantity: request.quantity,
      });

      const orderResult: VenueOrderResult = {
        kind: 'success',
        orderId: String(result.orderId),
        executedQty: parseFloat(String(result.executedQty)),
        avgPrice: parseFloat(String(result.avgPrice)),
      };

      logger.info('Market order executed', {
        orderId: orderResult.orderId,
        executedQty: orderResult.executedQty,
        avgPrice: orderResult.avgPrice,
      });

      return orderResult;
    } catch (error) {
      const kind = classifyVenueError(error);
      const reason = describeVenueError(error);
      logger.error('Market order failed', {
        symbol: request.symbol,
        side: request.side,
        quantity: request.quantity,
        kind,
        error: reason,
      });

      return { kind, reason };
    }
  }

  /**
   * Fetch recent klines (oldest first)
   */
  async getKlines(query: KlineQuery): Promise<unknown[][]> {
    return this.client.getKlines({
      symbol: query.symbol,
      interval: query.interval,
      limit: query.limit,
    });
  }
}
