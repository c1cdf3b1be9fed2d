import type { ChatCompletionRequest, ChatCompletionResponse, ClientInfo, LLMClient } from '../../src/generation/interface';

/**
 * Scripted LLM client: answers with queued replies and records every request
 */
export class ScriptedClient implements LLMClient {
  public requests: ChatCompletionRequest[] = [];
  public signals: Array<AbortSignal | undefined> = [];
  private replies: Array<string | Error> = [];

  constructor(...replies: Array<string | Error>) {
    this.replies = replies;
  }

  async chatCompletion(request: ChatCompletionRequest, signal?: AbortSignal): Promise<ChatCompletionResponse> {
    this.requests.push(request);
    this.signals.push(signal);
    const reply = this.replies.shift() ?? '';
    if (reply instanceof Error) {
      throw reply;
    }
    return {
      id: `completion-${this.requests.length}`,
      model: 'test-model',
      content: reply,
      finishReason: 'stop',
      usage: { promptTokens: 10, completionTokens: 20, totalTokens: 30 }
    };
  }

  async testConnection(): Promise<boolean> {
    return true;
  }

  getClientInfo(): ClientInfo {
    return { provider: 'scripted', model: 'test-model', baseUrl: 'http://localhost' };
  }
}
