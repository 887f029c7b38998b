/**
 * LLM Client
 *
 * Sends a conversation to any OpenAI-compatible chat-completions endpoint
 * (OpenRouter by default) using the `openai` package with a custom baseURL.
 * A single request per call: retries are left to the caller, and every
 * failure surfaces as an LLMTransportError.
 */

import OpenAI from 'openai';
import type { ChatMessage, ChatOptions, ModelConfig } from '@deepread/shared';
import {
  AuthenticationError,
  InvalidResponseError,
  LLMTransportError,
  ProviderUnavailableError,
  RateLimitError,
} from './errors.js';
import type { SecureLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';

export interface LLMClient {
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<string>;
}

function providerName(baseUrl: string): string {
  try {
    return new URL(baseUrl).host;
  } catch {
    return baseUrl;
  }
}

export class OpenAICompatibleClient implements LLMClient {
  private readonly client: OpenAI;
  private readonly provider: string;

  constructor(
    private readonly config: ModelConfig,
    apiKey: string,
    private readonly logger?: SecureLogger
  ) {
    this.provider = providerName(config.baseUrl);
    this.client = new OpenAI({
      apiKey,
      baseURL: config.baseUrl,
      timeout: config.requestTimeoutMs,
      maxRetries: 0,
    });
  }

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    const model = options.model ?? this.config.model;
    const maxTokens = options.maxTokens ?? this.config.maxTokens;

    const params: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      temperature: options.temperature ?? this.config.temperature,
      ...(maxTokens !== undefined ? { max_tokens: maxTokens } : {}),
    };

    this.logger?.debug('Sending chat completion', { model, messages: messages.length });

    let response: OpenAI.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(params);
    } catch (error) {
      throw this.mapError(error);
    }

    const content = response.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new InvalidResponseError(this.provider, 'response has no message content');
    }
    return content;
  }

  private mapError(error: unknown): LLMTransportError {
    if (error instanceof OpenAI.APIError) {
      const status = typeof error.status === 'number' ? error.status : undefined;
      if (status === 429) {
        return new RateLimitError(this.provider, error);
      }
      if (status === 401 || status === 403) {
        return new AuthenticationError(this.provider, status, error);
      }
      if (status === undefined || status >= 500) {
        return new ProviderUnavailableError(this.provider, error.message, status, error);
      }
      return new InvalidResponseError(this.provider, error.message, status, error);
    }
    return new ProviderUnavailableError(
      this.provider,
      toErrorMessage(error),
      undefined,
      error instanceof Error ? error : undefined
    );
  }
}
