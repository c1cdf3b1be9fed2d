import type { Language } from '../system/config/languages';
import type { ProblemPayload, Solution, SolutionGenerator } from '../delivery/types';
import { GenerationError, toErrorMessage } from '../system/error-handling';
import { Logger, createModuleLogger } from '../system/logging/logger';
import { GenerationClientError, LLMClient } from './interface';
import { buildSolutionMessages } from './prompt-builder';
import { parseSolutionResponse } from './response-parser';

export interface LlmSolutionGeneratorOptions {
  client: LLMClient;
  maxTokens?: number;
  temperature?: number;
  logger?: Logger;
}

/**
 * Solve stage backed by a chat completion endpoint
 */
export class LlmSolutionGenerator implements SolutionGenerator {
  private client: LLMClient;
  private maxTokens?: number;
  private temperature?: number;
  private logger: Logger;

  constructor(options: LlmSolutionGeneratorOptions) {
    this.client = options.client;
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;
    this.logger = options.logger ?? createModuleLogger('generation.solver');
  }

  async generate(problem: ProblemPayload, language: Language, signal?: AbortSignal): Promise<Solution> {
    const context = { problemId: problem.problemId, language };
    this.logger.debug('Requesting solution', context, 'generate');

    let content: string;
    try {
      const response = await this.client.chatCompletion({
        messages: buildSolutionMessages(problem, language),
        maxTokens: this.maxTokens,
        temperature: this.temperature
      }, signal);
      content = response.content;
    } catch (error) {
      const kind = error instanceof GenerationClientError ? ` (${error.type})` : '';
      throw new GenerationError(`Solution request failed${kind}: ${toErrorMessage(error)}`, error, context);
    }

    if (!content.trim()) {
      throw new GenerationError(`Empty response for ${problem.problemId} in ${language}`, undefined, context);
    }

    const parsed = parseSolutionResponse(content, language);
    return { language, ...parsed };
  }

  healthCheck(): Promise<boolean> {
    return this.client.testConnection();
  }
}
