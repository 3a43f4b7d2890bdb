/**
 * Gateway - Utility Helper Functions
 */

import { v4 as uuidv4 } from 'uuid';

export function generateRequestId(): string {
  return uuidv4();
}

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m|h|d)$/;

const DURATION_MULTIPLIERS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

export function isDuration(value: string): boolean {
  return DURATION_PATTERN.test(value);
}

/**
 * Parse a duration string to milliseconds
 * Supports: 100ms, 5s, 2m, 1h, 1d
 */
export function parseDuration(duration: string): number {
  const match = DURATION_PATTERN.exec(duration);
  const amount = match?.[1];
  const unit = match?.[2];

  if (amount === undefined || unit === undefined) {
    throw new Error(`Invalid duration format: ${duration}`);
  }

  return Math.round(parseFloat(amount) * (DURATION_MULTIPLIERS[unit] ?? 1));
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  if (ms < 60 * 1000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }

  if (ms < 60 * 60 * 1000) {
    return `${(ms / (60 * 1000)).toFixed(1)}m`;
  }

  return `${(ms / (60 * 60 * 1000)).toFixed(1)}h`;
}

/**
 * Race a promise against a timer. The underlying work is not cancelled; only
 * this caller stops waiting for it.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Get client IP address from request headers
 */
export function getClientIp(
  headers: Record<string, string | string[] | undefined>,
  fallback = 'unknown'
): string {
  const forwardedFor = headers['x-forwarded-for'];
  if (forwardedFor) {
    const ips = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor;
    return ips?.split(',')[0]?.trim() ?? fallback;
  }

  const realIp = headers['x-real-ip'];
  if (realIp) {
    return Array.isArray(realIp) ? (realIp[0] ?? fallback) : realIp;
  }

  return fallback;
}
