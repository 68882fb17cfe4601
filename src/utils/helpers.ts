/**
 * QueryGate - Utility Helper Functions
 * Common utility functions used throughout the service
 */

import { v4 as uuidv4 } from 'uuid';

import { QueryCancelledError, QueryTimeoutError } from './types.js';

/**
 * Generate a unique request ID
 */
export function generateRequestId(): string {
  return uuidv4();
}

/**
 * Race a promise against a deadline and an optional abort signal.
 *
 * Rejects with QueryTimeoutError when the deadline passes first and with
 * QueryCancelledError when the signal fires first. The timer and the abort
 * listener are always removed once the race settles.
 */
export function withDeadline<T>(
  work: Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new QueryCancelledError());
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (): boolean => {
      if (settled) {
        return false;
      }
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      return true;
    };

    const onAbort = (): void => {
      if (finish()) {
        reject(new QueryCancelledError());
      }
    };

    const timer = setTimeout(() => {
      if (finish()) {
        reject(new QueryTimeoutError(timeoutMs));
      }
    }, timeoutMs);

    signal?.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        if (finish()) {
          resolve(value);
        }
      },
      (error: unknown) => {
        if (finish()) {
          reject(error);
        }
      }
    );
  });
}

/**
 * Recursively freeze a plain object graph
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze<unknown>(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Split a comma-separated value into trimmed, non-empty entries
 */
export function splitList(value: string | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Extract client IP from request headers
 */
export function getClientIp(headers: Record<string, string | string[] | undefined>): string {
  const forwardedFor = headers['x-forwarded-for'];
  if (forwardedFor) {
    const ips = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor;
    return ips?.split(',')[0]?.trim() ?? 'unknown';
  }

  const realIp = headers['x-real-ip'];
  if (realIp) {
    return Array.isArray(realIp) ? (realIp[0] ?? 'unknown') : realIp;
  }

  return 'unknown';
}

/**
 * Describe an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check if running in production
 */
export function isProduction(): boolean {
  return process.env['NODE_ENV'] === 'production';
}
