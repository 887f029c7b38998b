/**
 * LLM transport error types.
 *
 * Raised at the chat-completion boundary. Each error carries structured
 * metadata for logging; the agent loop treats all of them as fatal for a run.
 */

export class LLMTransportError extends Error {
  readonly provider: string;
  readonly code: string;
  readonly recoverable: boolean;
  readonly statusCode?: number;

  constructor(
    message: string,
    options: {
      provider: string;
      code: string;
      recoverable: boolean;
      statusCode?: number;
      cause?: Error;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = 'LLMTransportError';
    this.provider = options.provider;
    this.code = options.code;
    this.recoverable = options.recoverable;
    this.statusCode = options.statusCode;
  }
}

export class RateLimitError extends LLMTransportError {
  constructor(provider: string, cause?: Error) {
    super(`Rate limited by ${provider}`, {
      provider,
      code: 'RATE_LIMIT',
      recoverable: true,
      statusCode: 429,
      cause,
    });
    this.name = 'RateLimitError';
  }
}

export class InvalidResponseError extends LLMTransportError {
  constructor(provider: string, detail: string, statusCode?: number, cause?: Error) {
    super(`Invalid response from ${provider}: ${detail}`, {
      provider,
      code: 'INVALID_RESPONSE',
      recoverable: false,
      statusCode,
      cause,
    });
    this.name = 'InvalidResponseError';
  }
}

export class ProviderUnavailableError extends LLMTransportError {
  constructor(provider: string, detail: string, statusCode?: number, cause?: Error) {
    super(`Provider ${provider} is unavailable: ${detail}`, {
      provider,
      code: 'PROVIDER_UNAVAILABLE',
      recoverable: true,
      statusCode,
      cause,
    });
    this.name = 'ProviderUnavailableError';
  }
}

export class AuthenticationError extends LLMTransportError {
  constructor(provider: string, statusCode = 401, cause?: Error) {
    super(`Authentication failed for ${provider}`, {
      provider,
      code: 'AUTH_FAILED',
      recoverable: false,
      statusCode,
      cause,
    });
    this.name = 'AuthenticationError';
  }
}
