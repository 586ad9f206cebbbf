export { PollingKlineSource, parseKlineRow } from './PollingKlineSource.js';
export type {
  PriceSource,
  KlineClient,
  KlineInterval,
  PollingKlineSourceConfig,
  ParsedKline,
} from './types.js';
