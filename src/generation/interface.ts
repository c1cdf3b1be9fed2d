/**
 * Text-generation client contract
 */

/**
 * Chat client for an OpenAI-compatible completion endpoint
 */
export interface LLMClient {
  /**
   * Send a chat completion request
   */
  chatCompletion(request: ChatCompletionRequest, signal?: AbortSignal): Promise<ChatCompletionResponse>;

  /**
   * Cheap round trip to check credentials and reachability
   */
  testConnection(): Promise<boolean>;

  getClientInfo(): ClientInfo;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionRequest {
  messages: ChatMessage[];
  /** Defaults to the client's configured model */
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface ChatCompletionResponse {
  id: string;
  model: string;
  /** Content of the first choice */
  content: string;
  finishReason: string;
  usage: TokenUsage;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ClientInfo {
  provider: string;
  model: string;
  baseUrl: string;
}

export enum GenerationClientErrorType {
  API_ERROR = 'api_error',
  AUTHENTICATION_ERROR = 'authentication_error',
  RATE_LIMIT_ERROR = 'rate_limit_error',
  NETWORK_ERROR = 'network_error',
  INVALID_RESPONSE = 'invalid_response'
}

/**
 * Failure talking to the generation endpoint
 */
export class GenerationClientError extends Error {
  constructor(
    message: string,
    public readonly type: GenerationClientErrorType,
    public readonly retryable: boolean = false,
    public readonly status?: number,
    public readonly retryAfterSeconds?: number,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'GenerationClientError';
  }

  static apiError(message: string, status?: number, cause?: unknown): GenerationClientError {
    const retryable = status === undefined || status >= 500;
    return new GenerationClientError(message, GenerationClientErrorType.API_ERROR, retryable, status, undefined, cause);
  }

  static authenticationError(message: string, status?: number): GenerationClientError {
    return new GenerationClientError(message, GenerationClientErrorType.AUTHENTICATION_ERROR, false, status);
  }

  static rateLimitError(message: string, retryAfterSeconds?: number): GenerationClientError {
    return new GenerationClientError(message, GenerationClientErrorType.RATE_LIMIT_ERROR, true, 429, retryAfterSeconds);
  }

  static networkError(message: string, cause?: unknown): GenerationClientError {
    return new GenerationClientError(message, GenerationClientErrorType.NETWORK_ERROR, true, undefined, undefined, cause);
  }

  static invalidResponse(message: string): GenerationClientError {
    return new GenerationClientError(message, GenerationClientErrorType.INVALID_RESPONSE, false);
  }
}
