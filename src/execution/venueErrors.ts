/**
 * Venue error classification
 *
 * Maps errors thrown by the Binance client to transient (retryable)
 * or permanent failures. Anything unrecognised is permanent.
 */

import type { FailureKind } from './types.js';

const TRANSIENT_BINANCE_CODES = new Set([
  -1001, // DISCONNECTED
  -1003, // TOO_MANY_REQUESTS
  -1007, // TIMEOUT
  -1015, // TOO_MANY_ORDERS
  -1021, // INVALID_TIMESTAMP (clock drift)
]);

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNABORTED',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'ENOTFOUND',
]);

export function classifyVenueError(error: unknown): FailureKind {
  if (typeof error !== 'object' || error === null) {
    return 'permanent';
  }

  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'number' && TRANSIENT_BINANCE_CODES.has(code)) {
    return 'transient';
  }
  if (typeof code === 'string' && TRANSIENT_NETWORK_CODES.has(code)) {
    return 'transient';
  }

  const status = httpStatusOf(error);
  if (status !== null && (status === 418 || status === 429 || status >= 500)) {
    return 'transient';
  }

  return 'permanent';
}

/**
 * Normalize various error types to string message
 */
export function describeVenueError(error: unknown): string {
  if (error && typeof error === 'object') {
    // Binance API error
    if ('code' in error && typeof error.code === 'number') {
      const msg =
        'msg' in error && typeof error.msg === 'string'
          ? error.msg
          : 'message' in error && typeof error.message === 'string'
            ? error.message
            : 'Unknown error';
      return `Binance Error ${error.code}: ${msg}`;
    }
    // HTTP error with response
    const status = httpStatusOf(error);
    if (status !== null) {
      return `HTTP ${status}`;
    }
    if (error instanceof Error) {
      return error.message;
    }
    if ('message' in error && typeof error.message === 'string') {
      return error.message;
    }
  }
  return String(error);
}

function httpStatusOf(error: object): number | null {
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response;
    if ('status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return null;
}
