/**
 * Configuration
 *
 * Builds one immutable configuration snapshot from the environment
 * (and an optional JSON file of per-symbol overrides). Changing it
 * requires a restart.
 */

import { readFileSync } from 'node:fs';
import type { KlineInterval } from 'binance';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ===========================================
// Types
// ===========================================

/**
 * trade: crossovers are executed (subject to AUTO_TRADE)
 * notify: crossovers are only notified
 */
export type SymbolMode = 'trade' | 'notify';

const SYMBOL_MODES: readonly SymbolMode[] = ['trade', 'notify'];

export interface SymbolSettings {
  symbol: string;
  mode: SymbolMode;
  shortWindow: number;
  longWindow: number;
  /** Fixed order quantity (base asset) */
  quantity: number;
  /** Futures leverage (1-125) */
  leverage: number;
  /** Minimum time between executions, 0 disables the guard */
  minIntervalMs: number;
  /** Display decimals for prices */
  pricePrecision: number;
}

/**
 * A configured symbol that will not be monitored
 */
export interface SymbolRejection {
  symbol: string;
  errors: string[];
}

export interface AppConfig {
  binance: {
    apiKey: string;
    apiSecret: string;
    testnet: boolean;
  };
  telegram: {
    botToken: string;
    chatId: string;
  };
  market: {
    interval: KlineInterval;
    pollIntervalMs: number;
    backfillLimit: number;
  };
  engine: {
    symbols: readonly SymbolSettings[];
    autoTrade: boolean;
    notifySuppressed: boolean;
    reconnectDelayMs: number;
    retry: {
      maxAttempts: number;
      baseDelayMs: number;
      maxDelayMs: number;
    };
    rateLimit: {
      capacity: number;
      refillIntervalMs: number;
    };
  };
  ledger: {
    filePath: string;
  };
  status: {
    enabled: boolean;
    port: number;
    host: string;
  };
  rejectedSymbols: readonly SymbolRejection[];
}

type Env = Record<string, string | undefined>;

const KLINE_INTERVALS: readonly KlineInterval[] = [
  '1m', '3m', '5m', '15m', '30m', '1h', '2h', '4h', '6h', '8h', '12h', '1d', '3d', '1w', '1M',
];

const SYMBOL_PATTERN = /^[A-Z0-9]{2,20}$/;

// ===========================================
// Environment helpers
// ===========================================

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
  const value = env[key] ?? defaultValue;
  if (value === undefined || value === '') {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

function requirePositive(key: string, value: number): number {
  if (!(value > 0)) {
    throw new ConfigurationError(`${key} must be greater than 0`);
  }
  return value;
}

// ===========================================
// Symbol settings
// ===========================================

/**
 * Check one symbol's settings; returns the list of problems (empty when valid)
 */
export function validateSymbolSettings(settings: SymbolSettings): string[] {
  const errors: string[] = [];

  if (!SYMBOL_PATTERN.test(settings.symbol)) {
    errors.push(`invalid symbol "${settings.symbol}"`);
  }
  if (!Number.isInteger(settings.shortWindow) || settings.shortWindow < 1) {
    errors.push('shortWindow must be a positive integer');
  }
  if (!Number.isInteger(settings.longWindow) || settings.longWindow < 1) {
    errors.push('longWindow must be a positive integer');
  }
  if (settings.shortWindow >= settings.longWindow) {
    errors.push('shortWindow must be smaller than longWindow');
  }
  if (!(settings.quantity > 0)) {
    errors.push('quantity must be greater than 0');
  }
  if (!Number.isInteger(settings.leverage) || settings.leverage < 1 || settings.leverage > 125) {
    errors.push('leverage must be an integer between 1 and 125');
  }
  if (!(settings.minIntervalMs >= 0)) {
    errors.push('minIntervalMs must not be negative');
  }
  if (!Number.isInteger(settings.pricePrecision) || settings.pricePrecision < 0 || settings.pricePrecision > 12) {
    errors.push('pricePrecision must be an integer between 0 and 12');
  }
  if (!SYMBOL_MODES.includes(settings.mode)) {
    errors.push('mode must be "trade" or "notify"');
  }

  return errors;
}

/**
 * Parse the JSON document of per-symbol overrides:
 * an array of objects with a symbol and any SymbolSettings fields
 */
export function parseSymbolOverrides(document: unknown): Map<string, Partial<SymbolSettings>> {
  if (!Array.isArray(document)) {
    throw new ConfigurationError('Symbols file must contain a JSON array');
  }

  const overrides = new Map<string, Partial<SymbolSettings>>();
  const numericKeys = [
    'shortWindow',
    'longWindow',
    'quantity',
    'leverage',
    'minIntervalMs',
    'pricePrecision',
  ] as const;

  const items: unknown[] = document;
  for (const item of items) {
    if (typeof item !== 'object' || item === null || !('symbol' in item) || typeof item.symbol !== 'string') {
      throw new ConfigurationError('Every symbols file entry needs a "symbol" string');
    }

    const symbol = item.symbol.toUpperCase();
    const override: Partial<SymbolSettings> = { symbol };

    for (const key of numericKeys) {
      if (!(key in item)) continue;
      const value: unknown = Reflect.get(item, key);
      if (typeof value !== 'number') {
        throw new ConfigurationError(`${symbol}: ${key} must be a number`);
      }
      override[key] = value;
    }

    if ('mode' in item) {
      const value: unknown = Reflect.get(item, 'mode');
      const mode = SYMBOL_MODES.find((candidate) => candidate === value);
      if (!mode) {
        throw new ConfigurationError(`${symbol}: mode must be "trade" or "notify"`);
      }
      override.mode = mode;
    }

    overrides.set(symbol, override);
  }

  return overrides;
}

function readSymbolsFile(filePath: string): unknown {
  try {
    return JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read symbols file ${filePath}: ${reason}`);
  }
}

// ===========================================
// Loader
// ===========================================

/**
 * Build the configuration snapshot.
 * Global problems throw ConfigurationError; per-symbol problems only
 * exclude that symbol and are listed in rejectedSymbols.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const autoTrade = getEnvBoolean(env, 'AUTO_TRADE', false);

  const interval = getEnvVar(env, 'KLINE_INTERVAL', '15m');
  const klineInterval = KLINE_INTERVALS.find((candidate) => candidate === interval);
  if (!klineInterval) {
    throw new ConfigurationError(`Unsupported KLINE_INTERVAL: ${interval}`);
  }

  const defaults: Omit<SymbolSettings, 'symbol' | 'mode'> = {
    shortWindow: getEnvNumber(env, 'MA_SHORT_WINDOW', 9),
    longWindow: getEnvNumber(env, 'MA_LONG_WINDOW', 26),
    quantity: getEnvNumber(env, 'ORDER_QUANTITY', 0.001),
    leverage: getEnvNumber(env, 'LEVERAGE', 10),
    minIntervalMs: getEnvNumber(env, 'MIN_EXECUTION_INTERVAL_MS', 0),
    pricePrecision: getEnvNumber(env, 'PRICE_PRECISION', 4),
  };

  const symbolsFile = env['SYMBOLS_FILE'];
  const overrides = symbolsFile
    ? parseSymbolOverrides(readSymbolsFile(symbolsFile))
    : new Map<string, Partial<SymbolSettings>>();

  const listed = (env['SYMBOLS'] ?? (overrides.size > 0 ? '' : 'BTCUSDT'))
    .split(',')
    .map((symbol) => symbol.trim().toUpperCase())
    .filter((symbol) => symbol.length > 0);
  const symbolNames = [...new Set([...listed, ...overrides.keys()])];

  const notifyOnly = new Set(
    (env['NOTIFY_ONLY_SYMBOLS'] ?? '')
      .split(',')
      .map((symbol) => symbol.trim().toUpperCase())
      .filter((symbol) => symbol.length > 0)
  );

  const symbols: SymbolSettings[] = [];
  const rejectedSymbols: SymbolRejection[] = [];

  for (const symbol of symbolNames) {
    const mode: SymbolMode = notifyOnly.has(symbol) ? 'notify' : 'trade';
    const settings: SymbolSettings = { ...defaults, mode, ...overrides.get(symbol), symbol };
    const errors = validateSymbolSettings(settings);
    if (errors.length > 0) {
      rejectedSymbols.push({ symbol, errors });
    } else {
      symbols.push(Object.freeze(settings));
    }
  }

  if (symbols.length === 0) {
    const details = rejectedSymbols.map((r) => `${r.symbol}: ${r.errors.join(', ')}`).join('; ');
    throw new ConfigurationError(`No valid symbol to monitor${details ? ` (${details})` : ''}`);
  }

  const longestWindow = Math.max(...symbols.map((s) => s.longWindow));
  const backfillLimit = getEnvNumber(env, 'BACKFILL_LIMIT', 100);
  if (backfillLimit < longestWindow + 1 || backfillLimit > 1500) {
    throw new ConfigurationError(
      `BACKFILL_LIMIT must be between ${longestWindow + 1} and 1500`
    );
  }

  const config: AppConfig = {
    binance: {
      apiKey: autoTrade ? getEnvVar(env, 'BINANCE_API_KEY') : env['BINANCE_API_KEY'] ?? '',
      apiSecret: autoTrade ? getEnvVar(env, 'BINANCE_API_SECRET') : env['BINANCE_API_SECRET'] ?? '',
      testnet: getEnvBoolean(env, 'BINANCE_TESTNET', true),
    },
    telegram: {
      botToken: getEnvVar(env, 'TELEGRAM_BOT_TOKEN'),
      chatId: getEnvVar(env, 'TELEGRAM_CHAT_ID'),
    },
    market: {
      interval: klineInterval,
      pollIntervalMs: requirePositive('POLL_INTERVAL_MS', getEnvNumber(env, 'POLL_INTERVAL_MS', 60000)),
      backfillLimit,
    },
    engine: {
      symbols,
      autoTrade,
      notifySuppressed: getEnvBoolean(env, 'NOTIFY_SUPPRESSED', false),
      reconnectDelayMs: requirePositive(
        'RECONNECT_DELAY_MS',
        getEnvNumber(env, 'RECONNECT_DELAY_MS', 5000)
      ),
      retry: {
        maxAttempts: requirePositive(
          'EXECUTION_MAX_ATTEMPTS',
          getEnvNumber(env, 'EXECUTION_MAX_ATTEMPTS', 3)
        ),
        baseDelayMs: getEnvNumber(env, 'EXECUTION_RETRY_BASE_MS', 1000),
        maxDelayMs: getEnvNumber(env, 'EXECUTION_RETRY_MAX_MS', 10000),
      },
      rateLimit: {
        capacity: requirePositive('ORDER_RATE_CAPACITY', getEnvNumber(env, 'ORDER_RATE_CAPACITY', 5)),
        refillIntervalMs: requirePositive(
          'ORDER_RATE_REFILL_MS',
          getEnvNumber(env, 'ORDER_RATE_REFILL_MS', 1000)
        ),
      },
    },
    ledger: {
      filePath: getEnvVar(env, 'LEDGER_FILE', 'data/ledger.json'),
    },
    status: {
      enabled: getEnvBoolean(env, 'STATUS_ENABLED', true),
      port: getEnvNumber(env, 'STATUS_PORT', 3000),
      host: getEnvVar(env, 'STATUS_HOST', '0.0.0.0'),
    },
    rejectedSymbols,
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
