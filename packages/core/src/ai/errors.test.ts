import { describe, it, expect } from 'vitest';
import {
  LLMTransportError,
  RateLimitError,
  InvalidResponseError,
  ProviderUnavailableError,
  AuthenticationError,
} from './errors.js';

describe('LLMTransportError', () => {
  it('sets all fields correctly', () => {
    const cause = new Error('original');
    const err = new LLMTransportError('Something failed', {
      provider: 'openrouter.ai',
      code: 'SOME_ERROR',
      recoverable: true,
      statusCode: 503,
      cause,
    });
    expect(err.message).toBe('Something failed');
    expect(err.provider).toBe('openrouter.ai');
    expect(err.code).toBe('SOME_ERROR');
    expect(err.recoverable).toBe(true);
    expect(err.statusCode).toBe(503);
    expect(err.cause).toBe(cause);
    expect(err.name).toBe('LLMTransportError');
    expect(err).toBeInstanceOf(Error);
  });

  it('works without optional fields', () => {
    const err = new LLMTransportError('Minimal error', {
      provider: 'local',
      code: 'GENERIC',
      recoverable: false,
    });
    expect(err.statusCode).toBeUndefined();
    expect(err.cause).toBeUndefined();
  });
});

describe('subclasses', () => {
  it('RateLimitError is recoverable with status 429', () => {
    const err = new RateLimitError('p');
    expect(err.message).toBe('Rate limited by p');
    expect(err.code).toBe('RATE_LIMIT');
    expect(err.recoverable).toBe(true);
    expect(err.statusCode).toBe(429);
    expect(err).toBeInstanceOf(LLMTransportError);
  });

  it('InvalidResponseError includes the detail', () => {
    const err = new InvalidResponseError('p', 'bad json', 400);
    expect(err.message).toBe('Invalid response from p: bad json');
    expect(err.code).toBe('INVALID_RESPONSE');
    expect(err.recoverable).toBe(false);
    expect(err.statusCode).toBe(400);
    expect(err.name).toBe('InvalidResponseError');
  });

  it('ProviderUnavailableError includes the detail', () => {
    const err = new ProviderUnavailableError('p', 'connection refused');
    expect(err.message).toBe('Provider p is unavailable: connection refused');
    expect(err.code).toBe('PROVIDER_UNAVAILABLE');
    expect(err.recoverable).toBe(true);
    expect(err.statusCode).toBeUndefined();
  });

  it('AuthenticationError defaults to status 401', () => {
    const err = new AuthenticationError('p');
    expect(err.message).toBe('Authentication failed for p');
    expect(err.statusCode).toBe(401);
    expect(new AuthenticationError('p', 403).statusCode).toBe(403);
  });
});
