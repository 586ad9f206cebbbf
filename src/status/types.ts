import type { EngineStatus, SymbolStatus } from '../engine/types.js';

export interface StatusServerConfig {
  enabled: boolean;
  port: number;
  host: string;
}

/**
 * Read-only view of the engine served by the status API
 */
export interface StatusProvider {
  getStatus(): EngineStatus;
  getSymbolStatus(symbol: string): SymbolStatus | null;
}
