/**
 * Ledger Stores
 *
 * JSON file persistence for the ledger, plus an in-memory store.
 * The file is replaced atomically (write to a temp file, then rename).
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { logger, errorMessage } from '../logger.js';
import type { LedgerEntry } from '../types.js';
import type { LedgerSnapshot, LedgerStore } from './types.js';

export class JsonFileLedgerStore implements LedgerStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<LedgerSnapshot> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info('No ledger file found, starting empty', { file: this.filePath });
        return {};
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logger.warn('Ledger file is not valid JSON, starting empty', {
        file: this.filePath,
        error: errorMessage(error),
      });
      return {};
    }

    return parseLedgerSnapshot(parsed);
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tmpPath = `${this.filePath}.tmp`;

    await mkdir(dir, { recursive: true });
    await writeFile(tmpPath, JSON.stringify(snapshot, null, 2), 'utf8');
    await rename(tmpPath, this.filePath);
  }
}

export class MemoryLedgerStore implements LedgerStore {
  private snapshot: LedgerSnapshot;
  public saves = 0;

  constructor(initial: LedgerSnapshot = {}) {
    this.snapshot = cloneSnapshot(initial);
  }

  async load(): Promise<LedgerSnapshot> {
    return cloneSnapshot(this.snapshot);
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    this.snapshot = cloneSnapshot(snapshot);
    this.saves++;
  }
}

/**
 * Keep only well-formed entries of an untrusted ledger document
 */
export function parseLedgerSnapshot(value: unknown): LedgerSnapshot {
  if (!isRecord(value)) {
    logger.warn('Ledger document is not an object, ignoring it');
    return {};
  }

  const snapshot: LedgerSnapshot = {};
  for (const [symbol, entry] of Object.entries(value)) {
    if (isLedgerEntry(entry) && entry.symbol === symbol) {
      snapshot[symbol] = { ...entry };
    } else {
      logger.warn('Skipping invalid ledger entry', { symbol });
    }
  }
  return snapshot;
}

function isLedgerEntry(value: unknown): value is LedgerEntry {
  if (!isRecord(value)) return false;

  const { symbol, lastDirection, lastSignalAt, lastExecutedAt, lastOrderId } = value;
  return (
    typeof symbol === 'string' &&
    (lastDirection === null || lastDirection === 'golden' || lastDirection === 'death') &&
    isNullableNumber(lastSignalAt) &&
    isNullableNumber(lastExecutedAt) &&
    (lastOrderId === null || typeof lastOrderId === 'string')
  );
}

function isNullableNumber(value: unknown): boolean {
  return value === null || (typeof value === 'number' && Number.isFinite(value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

function cloneSnapshot(snapshot: LedgerSnapshot): LedgerSnapshot {
  const copy: LedgerSnapshot = {};
  for (const [symbol, entry] of Object.entries(snapshot)) {
    copy[symbol] = { ...entry };
  }
  return copy;
}
