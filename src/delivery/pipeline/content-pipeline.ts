/**
 * Content pipeline: Fetched → Solved → Embellished → Sent.
 *
 * Every stage either yields the next state or a typed failure naming the stage.
 * No state is shared between executions, so one pipeline instance serves all
 * concurrent subscribers. Nothing is retried here.
 */

import type { Problem } from '../../db/types';
import {
  DegradedEmbellishmentWarning,
  DeliveryError,
  DeliveryErrorType,
  GenerationError,
  RunInterruptedError,
  SendError,
  toErrorMessage
} from '../../system/error-handling';
import { Logger, createModuleLogger } from '../../system/logging/logger';
import type {
  EmbellishedState,
  EmbellishmentFailurePolicy,
  Embellisher,
  FetchedState,
  MessageSender,
  PipelineContext,
  PipelineResult,
  PipelineStage,
  ProblemPayload,
  SentState,
  SolutionGenerator,
  SolvedState,
  StageResult
} from '../types';
import { composeDeliveryMessage } from './message-composer';

export interface ContentPipelineOptions {
  generator: SolutionGenerator;
  embellisher: Embellisher;
  sender: MessageSender;
  /** Timezone used for the date in the subject line */
  timezone?: string;
  embellishmentFailurePolicy?: EmbellishmentFailurePolicy;
  logger?: Logger;
}

export class ContentPipeline {
  private generator: SolutionGenerator;
  private embellisher: Embellisher;
  private sender: MessageSender;
  private timezone: string;
  private embellishmentFailurePolicy: EmbellishmentFailurePolicy;
  private logger: Logger;

  constructor(options: ContentPipelineOptions) {
    this.generator = options.generator;
    this.embellisher = options.embellisher;
    this.sender = options.sender;
    this.timezone = options.timezone ?? 'UTC';
    this.embellishmentFailurePolicy = options.embellishmentFailurePolicy ?? 'degrade';
    this.logger = options.logger ?? createModuleLogger('pipeline');
  }

  async execute(problem: Problem, context: PipelineContext): Promise<PipelineResult> {
    const fetched = await this.runStage('fetch', context, async () => this.fetch(problem));
    if (!fetched.ok) return fetched;

    const solved = await this.runStage('solve', context, () => this.solve(fetched.state, context));
    if (!solved.ok) return solved;

    const embellished = await this.embellish(solved.state, context);
    if (!embellished.ok) return embellished;

    return this.runStage('send', context, () => this.send(embellished.state, context));
  }

  /**
   * Normalize the catalog record into a stage-neutral payload. Pure.
   */
  fetch(problem: Problem): FetchedState {
    const title = problem.title.trim();
    const description = problem.description.trim();
    if (!title || !description) {
      throw new DeliveryError(`Problem ${problem.identity} has no title or description`, DeliveryErrorType.INVALID_INPUT, false, {
        stage: 'fetch'
      });
    }

    const payload: ProblemPayload = {
      problemId: problem.identity,
      title,
      description,
      difficulty: problem.difficulty,
      tags: Array.from(new Set(problem.tags.map(tag => tag.trim()).filter(tag => tag.length > 0))),
      constraints: [...problem.constraints],
      examples: problem.examples.map(example => ({ ...example })),
      hints: [...problem.hints],
      testCases: problem.test_cases.map(testCase => ({ ...testCase }))
    };

    return { state: 'fetched', payload };
  }

  private async solve(state: FetchedState, context: PipelineContext): Promise<SolvedState> {
    const solution = await this.generator.generate(state.payload, context.subscriber.language, context.signal);
    if (!solution.code.trim()) {
      throw new GenerationError(`Empty solution for ${state.payload.problemId} in ${context.subscriber.language}`);
    }
    return { state: 'solved', payload: state.payload, solution };
  }

  /**
   * A failed embellishment degrades to the plain solution unless the policy is `fail`.
   * An interruption is always a failure.
   */
  private async embellish(state: SolvedState, context: PipelineContext): Promise<StageResult<EmbellishedState>> {
    const result = await this.runStage('embellish', context, async (): Promise<EmbellishedState> => {
      const embellishment = await this.embellisher.embellish(state.payload, state.solution, context.signal);
      return { state: 'embellished', payload: state.payload, solution: state.solution, embellishment };
    });

    if (result.ok || result.error instanceof RunInterruptedError || this.embellishmentFailurePolicy === 'fail') {
      return result;
    }

    const warning = new DegradedEmbellishmentWarning(result.error);
    this.logger.warn(
      'Embellishment failed, continuing with plain solution',
      { subscriber: context.subscriber.identity, problemId: state.payload.problemId, error: result.error.message },
      'embellish'
    );
    return {
      ok: true,
      state: { state: 'embellished', payload: state.payload, solution: state.solution, embellishment: null, warning }
    };
  }

  private async send(state: EmbellishedState, context: PipelineContext): Promise<SentState> {
    const message = composeDeliveryMessage({
      to: context.subscriber.identity,
      asOf: context.asOf,
      timezone: this.timezone,
      payload: state.payload,
      solution: state.solution,
      embellishment: state.embellishment
    });

    const receipt = await this.sender.send(message, context.signal);

    return {
      state: 'sent',
      payload: state.payload,
      solution: state.solution,
      embellishment: state.embellishment,
      warning: state.warning,
      message,
      receipt
    };
  }

  private async runStage<T extends EmbellishedState | FetchedState | SolvedState | SentState>(
    stage: PipelineStage,
    context: PipelineContext,
    operation: () => Promise<T>
  ): Promise<StageResult<T>> {
    try {
      if (context.signal?.aborted) {
        throw new RunInterruptedError(stage, abortReason(context.signal));
      }
      const state = await raceAbort(operation(), stage, context.signal);
      this.logger.debug(`Stage ${stage} completed`, { subscriber: context.subscriber.identity }, 'execute');
      return { ok: true, state };
    } catch (error) {
      return { ok: false, stage, error: toStageError(stage, error) };
    }
  }
}

function toStageError(stage: PipelineStage, error: unknown): DeliveryError {
  if (error instanceof DeliveryError) {
    return error;
  }
  switch (stage) {
    case 'solve':
      return new GenerationError(toErrorMessage(error), error);
    case 'send':
      return new SendError(toErrorMessage(error), error);
    case 'embellish':
      return new DeliveryError(toErrorMessage(error), DeliveryErrorType.EMBELLISHMENT, false, { stage, cause: error });
    case 'fetch':
      return new DeliveryError(toErrorMessage(error), DeliveryErrorType.INVALID_INPUT, false, { stage, cause: error });
  }
}

export function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason === undefined) return 'aborted';
  return toErrorMessage(reason);
}

/**
 * Settle with the operation, or reject with `RunInterruptedError` as soon as the signal aborts.
 */
function raceAbort<T>(operation: Promise<T>, stage: PipelineStage, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return operation;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new RunInterruptedError(stage, abortReason(signal)));
    operation.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
    // the operation may abort the signal before it first yields
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}
