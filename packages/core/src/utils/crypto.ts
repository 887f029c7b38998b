/**
 * Cryptographic Utilities
 *
 * Security considerations:
 * - Uses Node.js built-in crypto module
 * - Constant-time comparison for shared secrets
 * - Secure random generation for run identifiers
 */

import { randomBytes, timingSafeEqual } from 'node:crypto';

/**
 * Constant-time comparison of two strings/buffers.
 * Used for the sandbox server's X-API-Key check.
 */
export function secureCompare(a: string | Buffer, b: string | Buffer): boolean {
  const bufA = typeof a === 'string' ? Buffer.from(a) : a;
  const bufB = typeof b === 'string' ? Buffer.from(b) : b;

  // Length check (leaks length only)
  if (bufA.length !== bufB.length) {
    return false;
  }

  return timingSafeEqual(bufA, bufB);
}

/**
 * Generate a UUID v7 (time-sortable), used as the correlation id of a run.
 * Based on RFC 9562
 */
export function uuidv7(): string {
  const timestamp = Date.now();
  const random = randomBytes(10);

  // Timestamp in 48 bits (6 bytes)
  const timestampBytes = Buffer.alloc(6);
  timestampBytes.writeUIntBE(timestamp, 0, 6);

  const uuid = Buffer.alloc(16);
  timestampBytes.copy(uuid, 0);

  // version (4 bits) + rand_a (12 bits)
  uuid[6] = 0x70 | (random[0]! & 0x0f);
  uuid[7] = random[1]!;

  // variant (2 bits) + rand_b (62 bits)
  uuid[8] = 0x80 | (random[2]! & 0x3f);
  random.copy(uuid, 9, 3, 10);

  const hex = uuid.toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

const SECRET_PATTERNS: { regex: RegExp; replacement: string }[] = [
  // API keys
  { regex: /sk-[a-zA-Z0-9-_]{20,}/g, replacement: '[REDACTED_API_KEY]' },
  {
    regex: /api[_-]?key["\s:=]+["']?[a-zA-Z0-9-_]{16,}["']?/gi,
    replacement: '[REDACTED_API_KEY]',
  },
  // Tokens
  { regex: /bearer\s+[a-zA-Z0-9-_.]+/gi, replacement: 'Bearer [REDACTED_TOKEN]' },
  { regex: /token["\s:=]+["']?[a-zA-Z0-9-_.]{20,}["']?/gi, replacement: '[REDACTED_TOKEN]' },
  // Passwords
  { regex: /password["\s:=]+["']?[^"'\s]{1,}["']?/gi, replacement: '[REDACTED_PASSWORD]' },
];

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'apikey', 'api_key', 'authorization'];

/**
 * Sanitize a value for safe logging (remove potential secrets).
 * Strings are pattern-scrubbed; object keys that look sensitive are redacted.
 */
export function sanitizeForLogging(input: unknown): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (typeof input === 'string') {
    let sanitized = input;
    for (const { regex, replacement } of SECRET_PATTERNS) {
      sanitized = sanitized.replace(regex, replacement);
    }
    return sanitized;
  }

  if (Array.isArray(input)) {
    return input.map(sanitizeForLogging);
  }

  if (input instanceof Error) {
    return { name: input.name, message: sanitizeForLogging(input.message) };
  }

  if (typeof input === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some((s) => lowerKey.includes(s))) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeForLogging(value);
      }
    }
    return sanitized;
  }

  return input;
}
