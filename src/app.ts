/**
 * Application
 *
 * Wires the configured modules together:
 * Kline Source → Crossover Engine (tracker, detector, ledger, coordinator) → Notification Service
 */

import { logger, errorMessage } from './logger.js';
import type { AppConfig, SymbolSettings } from './config.js';
import { PollingKlineSource } from './consumers/index.js';
import { CrossoverEngine } from './engine/index.js';
import type { EngineStatus } from './engine/index.js';
import { BinanceOrderClient } from './execution/index.js';
import { JsonFileLedgerStore } from './ledger/index.js';
import { NotificationService } from './notification/index.js';
import { StatusServer } from './status/index.js';

/** Klines requested on every poll after the back-fill */
const POLL_LIMIT = 5;

export interface LeverageClient {
  setLeverage(symbol: string, leverage: number): Promise<boolean>;
}

/**
 * Set the configured leverage of every traded symbol.
 * Returns the symbols whose leverage could not be set.
 */
export async function configureLeverage(
  client: LeverageClient,
  symbols: readonly SymbolSettings[]
): Promise<SymbolSettings[]> {
  const failed: SymbolSettings[] = [];
  for (const settings of symbols) {
    if (settings.mode === 'notify') continue;
    if (!(await client.setLeverage(settings.symbol, settings.leverage))) {
      failed.push(settings);
    }
  }
  return failed;
}

export class App {
  private binanceClient: BinanceOrderClient;
  private notificationService: NotificationService;
  private engine: CrossoverEngine;
  private statusServer: StatusServer;
  private isRunning = false;

  constructor(private readonly config: AppConfig) {
    // Shared Binance client: orders and kline history
    this.binanceClient = new BinanceOrderClient({
      apiKey: config.binance.apiKey,
      apiSecret: config.binance.apiSecret,
      testnet: config.binance.testnet,
    });

    this.notificationService = new NotificationService({
      botToken: config.telegram.botToken,
      chatId: config.telegram.chatId,
      retryAttempts: 3,
      retryDelayMs: 1000,
      pricePrecision: Object.fromEntries(
        config.engine.symbols.map((s) => [s.symbol, s.pricePrecision])
      ),
      defaultPricePrecision: 4,
    });

    const source = new PollingKlineSource(this.binanceClient, {
      interval: config.market.interval,
      pollIntervalMs: config.market.pollIntervalMs,
      backfillLimit: config.market.backfillLimit,
      pollLimit: POLL_LIMIT,
    });

    this.engine = new CrossoverEngine(config.engine, {
      source,
      venue: this.binanceClient,
      sink: this.notificationService,
      ledgerStore: new JsonFileLedgerStore(config.ledger.filePath),
    });

    this.statusServer = new StatusServer(config.status, this.engine);

    this.setupEventPipeline();
  }

  private setupEventPipeline(): void {
    this.engine.on('signalDetected', (event) => {
      logger.info('Signal detected', {
        symbol: event.symbol,
        direction: event.direction,
        price: event.price,
      });
    });

    this.engine.on('outcome', (outcome) => {
      logger.info('Execution outcome', {
        symbol: outcome.event.symbol,
        direction: outcome.event.direction,
        status: outcome.status,
      });
    });

    this.engine.on('dataQuality', (warning) => {
      logger.warn('Data quality warning', {
        symbol: warning.symbol,
        reason: warning.reason,
      });
    });

    this.engine.on('streamEnded', (symbol) => {
      logger.warn('Price stream ended', { symbol });
    });

    this.engine.on('workerError', (symbol, error) => {
      void this.handleError(`Worker ${symbol}`, error.message);
    });

    this.engine.coordinator.on('retrying', (request, attempt, delayMs, reason) => {
      logger.info('Retrying order', { symbol: request.symbol, attempt, delayMs, reason });
    });

    this.engine.coordinator.on('error', (error) => {
      void this.handleError('ExecutionCoordinator', error.message);
    });

    this.engine.ledger.on('error', (error) => {
      void this.handleError('PositionLedger', error.message);
    });

    this.notificationService.on('error', (error) => {
      logger.error('Notification Service error', { error: error.message });
    });
  }

  /**
   * Start the application
   */
  public async start(): Promise<void> {
    const { engine, binance, market, rejectedSymbols } = this.config;
    const symbols = engine.symbols.map((s) => s.symbol);

    logger.info('Starting Crossover Signal Bot', {
      symbols,
      interval: market.interval,
      testnet: binance.testnet,
      autoTrade: engine.autoTrade,
      statusEnabled: this.config.status.enabled,
    });

    for (const rejection of rejectedSymbols) {
      logger.warn('Symbol rejected by configuration', rejection);
    }

    const telegramOk = await this.notificationService.verifyConnection();
    if (!telegramOk) {
      throw new Error('Failed to verify Telegram connection');
    }

    if (engine.autoTrade) {
      const binanceOk = await this.binanceClient.verifyConnection();
      if (!binanceOk) {
        throw new Error('Failed to verify Binance API connection');
      }
      const failed = await configureLeverage(this.binanceClient, engine.symbols);
      for (const settings of failed) {
        await this.handleError(
          'Leverage',
          `Could not set ${settings.leverage}x for ${settings.symbol}; orders use the account's current leverage`
        );
      }
    } else {
      logger.info('Auto-trading is disabled (AUTO_TRADE=false)');
    }

    await this.statusServer.start();
    await this.engine.start();

    await this.notificationService.sendStartupNotification(
      symbols,
      market.interval,
      binance.testnet,
      engine.autoTrade,
      rejectedSymbols
    );

    this.isRunning = true;
    logger.info('Bot started successfully');
  }

  /**
   * Stop the application gracefully
   */
  public async stop(reason: string = 'Manual shutdown'): Promise<void> {
    if (!this.isRunning) return;

    logger.info('Stopping Crossover Signal Bot', { reason });
    this.isRunning = false;

    await this.engine.stop();
    await this.notificationService.sendShutdownNotification(reason);
    await this.statusServer.stop();

    logger.info('Bot stopped successfully');
  }

  private async handleError(source: string, message: string): Promise<void> {
    logger.error(`${source} error`, { error: message });
    try {
      await this.notificationService.sendErrorNotification(source, message);
    } catch (error) {
      logger.error('Failed to send error notification', { error: errorMessage(error) });
    }
  }

  public getStatus(): EngineStatus {
    return this.engine.getStatus();
  }
}
