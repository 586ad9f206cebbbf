/**
 * Status Server
 *
 * Read-only HTTP API over the engine's per-symbol state.
 */

import Fastify, { FastifyInstance } from 'fastify';
import { logger, errorMessage } from '../logger.js';
import type { StatusProvider, StatusServerConfig } from './types.js';

export class StatusServer {
  private server: FastifyInstance;
  private config: StatusServerConfig;
  private provider: StatusProvider;
  private startTime: number = Date.now();
  private listening = false;

  private get uptime(): number {
    return Date.now() - this.startTime;
  }

  constructor(config: StatusServerConfig, provider: StatusProvider) {
    this.config = config;
    this.provider = provider;
    this.server = Fastify({ logger: false });
    this.registerRoutes();
  }

  /**
   * Start listening, unless disabled
   */
  async start(): Promise<void> {
    if (!this.config.enabled) {
      logger.info('Status server is disabled');
      return;
    }

    try {
      await this.server.listen({
        port: this.config.port,
        host: this.config.host,
      });
      this.listening = true;
      this.startTime = Date.now();
      logger.info('Status server started', {
        url: `http://${this.config.host}:${this.config.port}`,
      });
    } catch (error) {
      logger.error('Failed to start status server', { error: errorMessage(error) });
      throw error;
    }
  }

  async stop(): Promise<void> {
    await this.server.close();
    if (this.listening) {
      this.listening = false;
      logger.info('Status server stopped');
    }
  }

  /**
   * Underlying Fastify instance (used for request injection)
   */
  getServer(): FastifyInstance {
    return this.server;
  }

  private registerRoutes(): void {
    this.server.get('/api/health', async () => {
      const { running } = this.provider.getStatus();
      return { status: running ? 'ok' : 'stopped', uptime: this.uptime };
    });

    this.server.get('/api/status', async () => {
      return this.provider.getStatus();
    });

    this.server.get<{ Params: { symbol: string } }>(
      '/api/symbols/:symbol',
      async (request, reply) => {
        const symbol = request.params.symbol.toUpperCase();
        const status = this.provider.getSymbolStatus(symbol);
        if (!status) {
          return reply.code(404).send({ error: `Unknown symbol: ${symbol}` });
        }
        return status;
      }
    );
  }
}
