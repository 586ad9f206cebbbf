export { PositionLedger } from './PositionLedger.js';
export { JsonFileLedgerStore, MemoryLedgerStore, parseLedgerSnapshot } from './LedgerStore.js';
export type {
  LedgerVerdict,
  LedgerSnapshot,
  LedgerStore,
  LedgerSymbolConfig,
  LedgerEvents,
  SuppressionReason,
} from './types.js';
