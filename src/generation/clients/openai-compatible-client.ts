/**
 * OpenAI-compatible chat completion client (Groq, OpenRouter, OpenAI, local servers)
 */

import OpenAI from 'openai';
import {
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatMessage,
  ClientInfo,
  GenerationClientError,
  LLMClient
} from '../interface';
import { Logger, createModuleLogger } from '../../system/logging/logger';
import { toErrorMessage } from '../../system/error-handling';

export interface OpenAICompatibleClientConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs?: number;
  maxRetries?: number;
  defaultMaxTokens?: number;
  defaultTemperature?: number;
  logger?: Logger;
}

export class OpenAICompatibleClient implements LLMClient {
  private client: OpenAI;
  private config: Required<Omit<OpenAICompatibleClientConfig, 'logger'>>;
  private logger: Logger;

  constructor(config: OpenAICompatibleClientConfig) {
    if (!config.apiKey) {
      throw GenerationClientError.authenticationError('Generation API key is required');
    }

    const { logger, ...settings } = config;
    this.config = {
      timeoutMs: 60000,
      maxRetries: 2,
      defaultMaxTokens: 2000,
      defaultTemperature: 0.3,
      ...settings
    };
    this.logger = logger ?? createModuleLogger('generation.client');

    this.client = new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
      timeout: this.config.timeoutMs,
      maxRetries: this.config.maxRetries
    });
  }

  /**
   * Send a chat completion request
   */
  async chatCompletion(request: ChatCompletionRequest, signal?: AbortSignal): Promise<ChatCompletionResponse> {
    const model = request.model ?? this.config.model;
    const startTime = Date.now();

    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model,
        messages: request.messages.map(toMessageParam),
        max_tokens: request.maxTokens ?? this.config.defaultMaxTokens,
        temperature: request.temperature ?? this.config.defaultTemperature,
        stream: false
      }, { signal });
    } catch (error) {
      throw this.handleError(error);
    }

    const choice = response.choices[0];
    if (!choice) {
      throw GenerationClientError.invalidResponse(`Completion ${response.id} has no choices`);
    }

    this.logger.debug('Chat completion finished', {
      model: response.model,
      durationMs: Date.now() - startTime,
      totalTokens: response.usage?.total_tokens ?? 0
    }, 'chatCompletion');

    return {
      id: response.id,
      model: response.model,
      content: choice.message.content ?? '',
      finishReason: choice.finish_reason ?? 'stop',
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0
      }
    };
  }

  /**
   * Minimal completion to check credentials and reachability
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.client.chat.completions.create({
        model: this.config.model,
        messages: [{ role: 'user', content: 'ping' }],
        max_tokens: 1
      });
      return true;
    } catch (error) {
      this.logger.warn('Generation endpoint connection test failed', { error: toErrorMessage(error) }, 'testConnection');
      return false;
    }
  }

  getClientInfo(): ClientInfo {
    return {
      provider: 'openai-compatible',
      model: this.config.model,
      baseUrl: this.config.baseUrl
    };
  }

  private handleError(error: unknown): GenerationClientError {
    if (error instanceof OpenAI.APIUserAbortError) {
      return GenerationClientError.networkError('Generation request aborted', error);
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return GenerationClientError.networkError(`Network error: ${error.message}`, error);
    }
    if (error instanceof OpenAI.APIError) {
      switch (error.status) {
        case 401:
        case 403:
          return GenerationClientError.authenticationError('Generation API authentication failed', error.status);
        case 429: {
          const retryAfter = error.headers?.['retry-after'];
          const seconds = retryAfter ? Number.parseInt(retryAfter, 10) : Number.NaN;
          return GenerationClientError.rateLimitError(
            'Generation API rate limit exceeded',
            Number.isFinite(seconds) ? seconds : undefined
          );
        }
        default:
          return GenerationClientError.apiError(`Generation API error: ${error.message}`, error.status, error);
      }
    }
    return GenerationClientError.apiError(`Unexpected generation error: ${toErrorMessage(error)}`, undefined, error);
  }
}

function toMessageParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}
