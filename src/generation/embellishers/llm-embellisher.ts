import type { Embellisher, Embellishment, ProblemPayload, Solution } from '../../delivery/types';
import { LANGUAGE_PROFILES } from '../../system/config/languages';
import { EmbellishmentError, toErrorMessage } from '../../system/error-handling';
import { Logger, createModuleLogger } from '../../system/logging/logger';
import type { LLMClient } from '../interface';
import { buildCommentaryMessages } from '../prompt-builder';

const MAX_COMMENTS = 3;

export interface LlmEmbellisherOptions {
  client: LLMClient;
  temperature?: number;
  logger?: Logger;
}

/**
 * Strip list markers, comment markers and quotes the model adds anyway
 */
export function cleanCommentLine(line: string): string {
  return line
    .trim()
    .replace(/^(?:[-*•]|\d+[.)]|\/\/|#)\s*/, '')
    .replace(/^["'`](.*)["'`]$/, '$1')
    .trim();
}

/**
 * Embellish stage that asks the generation endpoint for a few one-liners
 */
export class LlmEmbellisher implements Embellisher {
  private client: LLMClient;
  private temperature: number;
  private logger: Logger;

  constructor(options: LlmEmbellisherOptions) {
    this.client = options.client;
    this.temperature = options.temperature ?? 0.9;
    this.logger = options.logger ?? createModuleLogger('generation.commentary');
  }

  async embellish(problem: ProblemPayload, solution: Solution, signal?: AbortSignal): Promise<Embellishment> {
    let content: string;
    try {
      const response = await this.client.chatCompletion({
        messages: buildCommentaryMessages(problem, solution),
        maxTokens: 300,
        temperature: this.temperature
      }, signal);
      content = response.content;
    } catch (error) {
      throw new EmbellishmentError(`Commentary request failed: ${toErrorMessage(error)}`, error);
    }

    const commentary = content
      .split(/\r?\n/)
      .map(cleanCommentLine)
      .filter(line => line.length > 0)
      .slice(0, MAX_COMMENTS);

    if (commentary.length === 0) {
      throw new EmbellishmentError(`Commentary response for ${problem.problemId} was empty`);
    }

    this.logger.debug('Commentary generated', { problemId: problem.problemId, lines: commentary.length }, 'embellish');

    const prefix = LANGUAGE_PROFILES[solution.language].commentPrefix;
    return {
      commentary,
      annotatedCode: [...commentary.map(line => `${prefix} ${line}`), '', solution.code].join('\n')
    };
  }
}
