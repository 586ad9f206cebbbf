export { StatusServer } from './StatusServer.js';
export type { StatusProvider, StatusServerConfig } from './types.js';
