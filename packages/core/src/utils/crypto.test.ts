import { describe, it, expect } from 'vitest';
import { secureCompare, uuidv7, sanitizeForLogging } from './crypto.js';

describe('secureCompare', () => {
  it('should return true for identical strings', () => {
    expect(secureCompare('test-secret', 'test-secret')).toBe(true);
  });

  it('should return false for different strings of equal length', () => {
    expect(secureCompare('test-secret', 'test-secreT')).toBe(false);
  });

  it('should return false for different lengths', () => {
    expect(secureCompare('short', 'longer-value')).toBe(false);
  });

  it('should accept buffers', () => {
    expect(secureCompare(Buffer.from('abc'), Buffer.from('abc'))).toBe(true);
  });
});

describe('uuidv7', () => {
  it('should produce an RFC 9562 shaped v7 identifier', () => {
    const id = uuidv7();
    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('should be unique across calls', () => {
    const ids = new Set(Array.from({ length: 50 }, () => uuidv7()));
    expect(ids.size).toBe(50);
  });

  it('should sort by creation time across milliseconds', async () => {
    const first = uuidv7();
    await new Promise((resolve) => setTimeout(resolve, 5));
    const second = uuidv7();
    expect(first < second).toBe(true);
  });
});

describe('sanitizeForLogging', () => {
  it('should redact sk- style API keys in strings', () => {
    expect(sanitizeForLogging('key is sk-abcdefghijklmnopqrstuvwxyz')).toBe(
      'key is [REDACTED_API_KEY]'
    );
  });

  it('should redact bearer tokens', () => {
    expect(sanitizeForLogging('Authorization: Bearer abc.def.ghi')).toBe(
      'Authorization: Bearer [REDACTED_TOKEN]'
    );
  });

  it('should redact sensitive object keys', () => {
    expect(sanitizeForLogging({ apiKey: 'test-secret', model: 'm' })).toEqual({
      apiKey: '[REDACTED]',
      model: 'm',
    });
  });

  it('should recurse into arrays and nested objects', () => {
    expect(sanitizeForLogging([{ nested: { password: 'x' } }])).toEqual([
      { nested: { password: '[REDACTED]' } },
    ]);
  });

  it('should flatten errors into name and message', () => {
    expect(sanitizeForLogging(new TypeError('bad'))).toEqual({ name: 'TypeError', message: 'bad' });
  });

  it('should pass through numbers, booleans and nullish values', () => {
    expect(sanitizeForLogging(3)).toBe(3);
    expect(sanitizeForLogging(false)).toBe(false);
    expect(sanitizeForLogging(null)).toBeNull();
    expect(sanitizeForLogging(undefined)).toBeUndefined();
  });
});
