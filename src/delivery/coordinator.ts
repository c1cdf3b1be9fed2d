/**
 * Delivery coordinator.
 *
 * One run: take the active subscribers and the catalog/history snapshots, select an
 * unseen problem per subscriber, drive it through the content pipeline on a bounded
 * worker pool, record each attempt and return a RunReport. Only storage being
 * unreachable before any pipeline starts fails the run; everything after that is
 * isolated to the subscriber it happened to.
 */

import { randomUUID } from 'crypto';
import type { Problem, Subscriber } from '../db/types';
import type { DeliveryHistory, ProblemCatalog, SubscriberDirectory } from '../db/types/repository';
import {
  CatalogUnavailableError,
  DeliveryError,
  DirectoryUnavailableError,
  HistoryUnavailableError,
  NoContentAvailableError,
  describeError,
  toError,
  toErrorMessage
} from '../system/error-handling';
import { Logger, createModuleLogger } from '../system/logging/logger';
import { compareIdentity, selectProblem } from './selection';
import type {
  FailureStage,
  PipelineContext,
  PipelineResult,
  ReportedError,
  RunExecutor,
  RunOptions,
  RunReport,
  RunSummary,
  SelectionPolicy,
  SubscriberRunEntry
} from './types';
import { runBounded } from './worker-pool';

/**
 * The pipeline as seen by the coordinator.
 */
export interface ContentProducer {
  execute(problem: Problem, context: PipelineContext): Promise<PipelineResult>;
}

export interface CoordinatorOptions {
  directory: SubscriberDirectory;
  catalog: ProblemCatalog;
  history: DeliveryHistory;
  pipeline: ContentProducer;
  concurrency?: number;
  runTimeoutMs?: number;
  selectionPolicy?: SelectionPolicy;
  random?: () => number;
  now?: () => Date;
  generateRunId?: () => string;
  logger?: Logger;
}

interface RunSnapshot {
  runId: string;
  asOf: Date;
  catalog: Problem[];
  delivered: Map<string, Set<string>>;
  signal: AbortSignal;
}

export class Coordinator implements RunExecutor {
  private directory: SubscriberDirectory;
  private catalog: ProblemCatalog;
  private history: DeliveryHistory;
  private pipeline: ContentProducer;
  private concurrency: number;
  private runTimeoutMs: number;
  private selectionPolicy: SelectionPolicy;
  private random: () => number;
  private now: () => Date;
  private generateRunId: () => string;
  private logger: Logger;

  constructor(options: CoordinatorOptions) {
    this.directory = options.directory;
    this.catalog = options.catalog;
    this.history = options.history;
    this.pipeline = options.pipeline;
    this.concurrency = Math.max(1, options.concurrency ?? 3);
    this.runTimeoutMs = options.runTimeoutMs ?? 30 * 60 * 1000;
    this.selectionPolicy = options.selectionPolicy ?? 'lowest-id';
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.generateRunId = options.generateRunId ?? randomUUID;
    this.logger = options.logger ?? createModuleLogger('coordinator');
  }

  /**
   * Execute one delivery run. Rejects only with a systemic error.
   */
  async runOnce(asOf: Date, options: RunOptions = {}): Promise<RunReport> {
    const runId = this.generateRunId();
    const trigger = options.trigger ?? 'manual';
    const startedAt = this.now();

    this.logger.info('Delivery run starting', { runId, trigger, asOf: asOf.toISOString() }, 'runOnce');

    const subscribers = await this.loadSubscribers();
    const catalog = await this.loadCatalog();
    const delivered = await this.loadHistory(subscribers);

    const controller = new AbortController();
    let timedOut = false;
    const onExternalAbort = (): void => controller.abort(new Error('run cancelled'));
    if (options.signal?.aborted) {
      onExternalAbort();
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new Error(`run timeout of ${this.runTimeoutMs}ms exceeded`));
    }, this.runTimeoutMs);

    const snapshot: RunSnapshot = { runId, asOf, catalog, delivered, signal: controller.signal };
    const slots = await runBounded(subscribers, subscriber => this.processSubscriber(subscriber, snapshot), {
      concurrency: this.concurrency,
      signal: controller.signal
    }).finally(() => {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onExternalAbort);
    });

    const entries = slots.map((slot, index): SubscriberRunEntry => {
      const subscriber = subscribers[index];
      switch (slot.status) {
        case 'fulfilled':
          return slot.value;
        case 'skipped':
          return notAttempted(subscriber);
        case 'rejected':
          this.logger.error('Unexpected error while processing subscriber', toError(slot.reason), {
            subscriber: subscriber.identity
          });
          return failureEntry(subscriber.identity, null, 'select', slot.reason);
      }
    });

    const report: RunReport = Object.freeze({
      runId,
      trigger,
      asOf,
      startedAt,
      finishedAt: this.now(),
      timedOut,
      cancelled: !timedOut && controller.signal.aborted,
      entries: Object.freeze(entries),
      summary: summarizeEntries(entries)
    });

    this.logger.info('Delivery run finished', { runId, ...report.summary, timedOut, cancelled: report.cancelled }, 'runOnce');
    return report;
  }

  private async processSubscriber(subscriber: Subscriber, snapshot: RunSnapshot): Promise<SubscriberRunEntry> {
    const startedAt = Date.now();
    const delivered = snapshot.delivered.get(subscriber.identity) ?? new Set<string>();
    const problem = selectProblem(snapshot.catalog, delivered, subscriber.difficulty, {
      policy: this.selectionPolicy,
      random: this.random
    });

    if (!problem) {
      const error = new NoContentAvailableError(subscriber.identity, subscriber.difficulty);
      this.logger.info('No unseen problem available', { subscriber: subscriber.identity, difficulty: subscriber.difficulty }, 'select');
      return {
        subscriberId: subscriber.identity,
        problemId: null,
        status: 'no-content-available',
        degraded: false,
        stage: 'select',
        error: reportError(error),
        durationMs: Date.now() - startedAt
      };
    }

    let result: PipelineResult;
    try {
      result = await this.pipeline.execute(problem, {
        subscriber,
        asOf: snapshot.asOf,
        signal: snapshot.signal
      });
    } catch (error) {
      const stage = error instanceof DeliveryError && error.stage ? error.stage : 'fetch';
      this.logger.error('Unexpected pipeline error', toError(error), {
        subscriber: subscriber.identity,
        problemId: problem.identity,
        stage
      }, 'deliver');
      return this.recordFailure(subscriber, problem, snapshot, stage, error, startedAt);
    }

    if (!result.ok) {
      this.logger.error('Delivery failed', result.error, {
        subscriber: subscriber.identity,
        problemId: problem.identity,
        stage: result.stage
      }, 'deliver');
      return this.recordFailure(subscriber, problem, snapshot, result.stage, result.error, startedAt);
    }

    const { warning, receipt } = result.state;
    try {
      await this.history.record({
        subscriber_id: subscriber.identity,
        problem_id: problem.identity,
        run_id: snapshot.runId,
        attempted_at: this.now(),
        outcome: 'success',
        stage: null,
        reason: warning ? warning.message : null,
        degraded: warning !== undefined,
        language: subscriber.language
      });
    } catch (error) {
      this.logger.error('Message sent but success record not written', toError(error), {
        subscriber: subscriber.identity,
        problemId: problem.identity,
        messageId: receipt.messageId
      }, 'record');
      const entry = failureEntry(subscriber.identity, problem.identity, 'record', error);
      entry.messageId = receipt.messageId;
      entry.durationMs = Date.now() - startedAt;
      return entry;
    }

    const logData = { subscriber: subscriber.identity, problemId: problem.identity, messageId: receipt.messageId };
    if (warning) {
      this.logger.warn('Delivered without embellishment', { ...logData, reason: warning.message }, 'deliver');
    } else {
      this.logger.info('Delivered', logData, 'deliver');
    }

    return {
      subscriberId: subscriber.identity,
      problemId: problem.identity,
      status: 'success',
      degraded: warning !== undefined,
      warning: warning?.message,
      messageId: receipt.messageId,
      durationMs: Date.now() - startedAt
    };
  }

  private async recordFailure(
    subscriber: Subscriber,
    problem: Problem,
    snapshot: RunSnapshot,
    stage: FailureStage,
    error: unknown,
    startedAt: number
  ): Promise<SubscriberRunEntry> {
    const entry = failureEntry(subscriber.identity, problem.identity, stage, error);
    entry.durationMs = Date.now() - startedAt;
    try {
      await this.history.record({
        subscriber_id: subscriber.identity,
        problem_id: problem.identity,
        run_id: snapshot.runId,
        attempted_at: this.now(),
        outcome: 'failure',
        stage,
        reason: toErrorMessage(error),
        degraded: false,
        language: subscriber.language
      });
    } catch (recordError) {
      this.logger.error('Could not record failed delivery', toError(recordError), { subscriber: subscriber.identity }, 'record');
      entry.warning = `failure record not written: ${toErrorMessage(recordError)}`;
    }
    return entry;
  }

  /**
   * Active subscribers, one per identity, ordered by identity.
   */
  private async loadSubscribers(): Promise<Subscriber[]> {
    let subscribers: Subscriber[];
    try {
      subscribers = await this.directory.listActive();
    } catch (error) {
      throw asSystemic(error, cause => new DirectoryUnavailableError(`Subscriber directory unavailable: ${toErrorMessage(cause)}`, cause));
    }

    const unique = new Map<string, Subscriber>();
    for (const subscriber of subscribers) {
      if (subscriber.active && !unique.has(subscriber.identity)) {
        unique.set(subscriber.identity, subscriber);
      }
    }
    return Array.from(unique.values()).sort((a, b) => compareIdentity(a.identity, b.identity));
  }

  private async loadCatalog(): Promise<Problem[]> {
    try {
      return await this.catalog.listByDifficulty('any');
    } catch (error) {
      throw asSystemic(error, cause => new CatalogUnavailableError(`Problem catalog unavailable: ${toErrorMessage(cause)}`, cause));
    }
  }

  /**
   * Success-history snapshot for every subscriber, taken before any pipeline starts.
   */
  private async loadHistory(subscribers: Subscriber[]): Promise<Map<string, Set<string>>> {
    const delivered = new Map<string, Set<string>>();
    try {
      for (const subscriber of subscribers) {
        delivered.set(subscriber.identity, await this.history.deliveredProblemIds(subscriber.identity));
      }
    } catch (error) {
      throw asSystemic(error, cause => new HistoryUnavailableError(`Delivery history unavailable: ${toErrorMessage(cause)}`, cause));
    }
    return delivered;
  }
}

function asSystemic(error: unknown, wrap: (cause: unknown) => DeliveryError): DeliveryError {
  if (error instanceof DeliveryError && error.systemic) {
    return error;
  }
  return wrap(error);
}

export function reportError(error: unknown): ReportedError {
  if (error instanceof DeliveryError) {
    return { name: error.name, type: error.type, message: error.message };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: describeError(error) };
}

function failureEntry(subscriberId: string, problemId: string | null, stage: FailureStage, error: unknown): SubscriberRunEntry {
  return {
    subscriberId,
    problemId,
    status: 'failure',
    degraded: false,
    stage,
    error: reportError(error)
  };
}

function notAttempted(subscriber: Subscriber): SubscriberRunEntry {
  return {
    subscriberId: subscriber.identity,
    problemId: null,
    status: 'not-attempted',
    degraded: false
  };
}

export function summarizeEntries(entries: readonly SubscriberRunEntry[]): RunSummary {
  const count = (predicate: (entry: SubscriberRunEntry) => boolean): number => entries.filter(predicate).length;
  return {
    total: entries.length,
    succeeded: count(entry => entry.status === 'success'),
    failed: count(entry => entry.status === 'failure'),
    noContent: count(entry => entry.status === 'no-content-available'),
    notAttempted: count(entry => entry.status === 'not-attempted'),
    degraded: count(entry => entry.degraded)
  };
}
