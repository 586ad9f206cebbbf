export { CrossoverEngine } from './CrossoverEngine.js';
export type { EngineDeps } from './CrossoverEngine.js';
export { SymbolWorker } from './SymbolWorker.js';
export type { SymbolWorkerDeps } from './SymbolWorker.js';
export type {
  EngineConfig,
  EngineEvents,
  EngineStatus,
  SymbolStatus,
  WorkerEvents,
} from './types.js';
