/**
 * Helper Function Tests
 */

import { describe, it, expect } from '@jest/globals';

import {
  errorMessage,
  formatDuration,
  generateRequestId,
  getClientIp,
  isDuration,
  isRecord,
  parseDuration,
  withTimeout,
} from '../../src/utils/helpers.js';

describe('parseDuration', () => {
  it('should parse each supported unit', () => {
    expect(parseDuration('250ms')).toBe(250);
    expect(parseDuration('60s')).toBe(60_000);
    expect(parseDuration('5m')).toBe(300_000);
    expect(parseDuration('1h')).toBe(3_600_000);
    expect(parseDuration('1d')).toBe(86_400_000);
  });

  it('should accept fractional amounts', () => {
    expect(parseDuration('1.5s')).toBe(1500);
  });

  it('should reject malformed durations', () => {
    expect(() => parseDuration('60')).toThrow('Invalid duration format: 60');
    expect(() => parseDuration('five minutes')).toThrow('Invalid duration format');
    expect(isDuration('10w')).toBe(false);
    expect(isDuration('10m')).toBe(true);
  });
});

describe('formatDuration', () => {
  it('should pick the largest sensible unit', () => {
    expect(formatDuration(999)).toBe('999ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(90_000)).toBe('1.5m');
    expect(formatDuration(5_400_000)).toBe('1.5h');
  });
});

describe('withTimeout', () => {
  it('should resolve with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve('done'), 50, () => new Error('late'))).resolves.toBe('done');
  });

  it('should reject with the timeout error when the promise is too slow', async () => {
    const never = new Promise<string>(() => undefined);
    await expect(withTimeout(never, 10, () => new Error('too slow'))).rejects.toThrow('too slow');
  });

  it('should pass through the original rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 50, () => new Error('late'))).rejects.toThrow(
      'boom'
    );
  });
});

describe('getClientIp', () => {
  it('should prefer the first X-Forwarded-For address', () => {
    expect(getClientIp({ 'x-forwarded-for': '10.0.0.1, 10.0.0.2' })).toBe('10.0.0.1');
  });

  it('should fall back to X-Real-IP and then the fallback', () => {
    expect(getClientIp({ 'x-real-ip': '10.0.0.9' })).toBe('10.0.0.9');
    expect(getClientIp({}, '127.0.0.1')).toBe('127.0.0.1');
  });
});

describe('misc helpers', () => {
  it('should generate distinct UUID request ids', () => {
    const first = generateRequestId();
    expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(generateRequestId()).not.toBe(first);
  });

  it('should recognise plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });

  it('should describe thrown values', () => {
    expect(errorMessage(new Error('bad'))).toBe('bad');
    expect(errorMessage(42)).toBe('42');
  });
});
