/**
 * Delivery types: pipeline states, collaborator contracts and run reports.
 */

import type { Language } from '../system/config/languages';
import type { Difficulty, ProblemExample, ProblemTestCase, Subscriber } from '../db/types';
import type { DeliveryError, DegradedEmbellishmentWarning } from '../system/error-handling';

export type PipelineStage = 'fetch' | 'solve' | 'embellish' | 'send';

/** Where a subscriber's processing stopped: a pipeline stage, selection, or the history write */
export type FailureStage = 'select' | PipelineStage | 'record';

export type SelectionPolicy = 'lowest-id' | 'random';

export type EmbellishmentFailurePolicy = 'degrade' | 'fail';

/**
 * Stage-neutral problem payload produced by Fetch.
 */
export interface ProblemPayload {
  problemId: string;
  title: string;
  description: string;
  difficulty: Difficulty;
  tags: string[];
  constraints: string[];
  examples: ProblemExample[];
  hints: string[];
  testCases: ProblemTestCase[];
}

export interface Solution {
  language: Language;
  code: string;
  explanation: string;
  timeComplexity: string;
  spaceComplexity: string;
  approach: string;
}

export interface Embellishment {
  commentary: string[];
  /** Solution code with inline comments added */
  annotatedCode: string;
}

export interface OutgoingMessage {
  to: string;
  subject: string;
  text: string;
  html?: string;
}

export interface SendReceipt {
  messageId: string;
}

/**
 * External text-generation capability, Solve stage.
 */
export interface SolutionGenerator {
  generate(problem: ProblemPayload, language: Language, signal?: AbortSignal): Promise<Solution>;
  healthCheck(): Promise<boolean>;
}

/**
 * Humor or commentary augmentation, Embellish stage.
 */
export interface Embellisher {
  embellish(problem: ProblemPayload, solution: Solution, signal?: AbortSignal): Promise<Embellishment>;
}

/**
 * External send capability, Send stage.
 */
export interface MessageSender {
  send(message: OutgoingMessage, signal?: AbortSignal): Promise<SendReceipt>;
  healthCheck(): Promise<boolean>;
}

export interface FetchedState {
  state: 'fetched';
  payload: ProblemPayload;
}

export interface SolvedState {
  state: 'solved';
  payload: ProblemPayload;
  solution: Solution;
}

export interface EmbellishedState {
  state: 'embellished';
  payload: ProblemPayload;
  solution: Solution;
  /** null when embellishment failed and the pipeline degraded */
  embellishment: Embellishment | null;
  warning?: DegradedEmbellishmentWarning;
}

export interface SentState {
  state: 'sent';
  payload: ProblemPayload;
  solution: Solution;
  embellishment: Embellishment | null;
  warning?: DegradedEmbellishmentWarning;
  message: OutgoingMessage;
  receipt: SendReceipt;
}

export type PipelineState = FetchedState | SolvedState | EmbellishedState | SentState;

export type StageResult<T extends PipelineState> =
  | { ok: true; state: T }
  | { ok: false; stage: PipelineStage; error: DeliveryError };

export type PipelineResult = StageResult<SentState>;

export interface PipelineContext {
  subscriber: Subscriber;
  asOf: Date;
  signal?: AbortSignal;
}

export type SubscriberOutcomeStatus = 'success' | 'failure' | 'no-content-available' | 'not-attempted';

export interface ReportedError {
  name: string;
  type?: string;
  message: string;
}

export interface SubscriberRunEntry {
  subscriberId: string;
  problemId: string | null;
  status: SubscriberOutcomeStatus;
  degraded: boolean;
  stage?: FailureStage;
  error?: ReportedError;
  warning?: string;
  messageId?: string;
  durationMs?: number;
}

export type RunTrigger = 'scheduled' | 'manual';

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  noContent: number;
  notAttempted: number;
  degraded: number;
}

export interface RunReport {
  runId: string;
  trigger: RunTrigger;
  asOf: Date;
  startedAt: Date;
  finishedAt: Date;
  timedOut: boolean;
  cancelled: boolean;
  /** Ordered by subscriber identity */
  entries: readonly SubscriberRunEntry[];
  summary: RunSummary;
}

export interface RunOptions {
  trigger?: RunTrigger;
  /** External cancellation, e.g. process shutdown */
  signal?: AbortSignal;
}

/**
 * Anything that can execute one delivery run; the scheduler depends only on this.
 */
export interface RunExecutor {
  runOnce(asOf: Date, options?: RunOptions): Promise<RunReport>;
}
