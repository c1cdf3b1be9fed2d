/**
 * Scheduler Module
 *
 * Fires delivery runs once a day at a configured hour:minute in a configured
 * timezone using node-cron. At most one run is in flight; a trigger that arrives
 * while a run is in progress is skipped and logged, never queued. With a run lock
 * the same holds across processes sharing the database. Missed fires (process
 * down, host asleep) are not replayed.
 */

import cron, { ScheduledTask } from 'node-cron';
import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import type { RunLock } from '../../db/types/repository';
import type { RunExecutor, RunReport, RunSummary, RunTrigger } from '../../delivery/types';
import { ConfigurationError, toError } from '../error-handling';
import { Logger, createModuleLogger } from '../logging/logger';
import { DailySchedule, computeNextFireTime, computePreviousFireTime, toCronExpression, validateSchedule } from './next-fire';

export { computeNextFireTime, computePreviousFireTime, toCronExpression, validateSchedule } from './next-fire';
export type { DailySchedule } from './next-fire';

/** `skip` is the only policy: missed fires are dropped */
export type CatchUpPolicy = 'skip';

export type SkipReason = 'run-in-progress' | 'missed-fire' | 'stopping';

export type TriggerOutcome =
  | { status: 'completed'; report: RunReport }
  | { status: 'skipped'; reason: SkipReason }
  | { status: 'failed'; error: Error };

export interface ExecutionRecord {
  trigger: RunTrigger;
  firedAt: Date;
  finishedAt: Date;
  status: TriggerOutcome['status'];
  runId?: string;
  summary?: RunSummary;
  skipReason?: SkipReason;
  error?: string;
}

export interface SchedulerStatus {
  running: boolean;
  runInProgress: boolean;
  schedule: DailySchedule;
  cronExpression: string;
  catchUpPolicy: CatchUpPolicy;
  nextFireAt: Date | null;
  lastRun: ExecutionRecord | null;
  completedCount: number;
  failedCount: number;
  skippedCount: number;
}

export interface TriggerSchedulerOptions {
  executor: RunExecutor;
  schedule: DailySchedule;
  /** Only `skip` exists; kept explicit so configuration states it */
  catchUpPolicy?: CatchUpPolicy;
  /** A tick later than this past its slot counts as missed */
  misfireGraceMs?: number;
  /** Lease taken around every run; a trigger finding it held elsewhere is skipped */
  runLock?: RunLock;
  /** Lease lifetime; must outlast the longest run */
  runLockTtlMs?: number;
  /** Lease owner id, unique per scheduler by default */
  lockOwner?: string;
  now?: () => Date;
  logger?: Logger;
}

const HISTORY_LIMIT = 10;

interface InFlightRun {
  trigger: RunTrigger;
  controller: AbortController;
  promise: Promise<TriggerOutcome>;
}

export class TriggerScheduler extends EventEmitter {
  private executor: RunExecutor;
  private schedule: DailySchedule;
  private catchUpPolicy: CatchUpPolicy;
  private misfireGraceMs: number;
  private runLock: RunLock | null;
  private runLockTtlMs: number;
  private lockOwner: string;
  private now: () => Date;
  private logger: Logger;
  private job: ScheduledTask | null = null;
  private inFlight: InFlightRun | null = null;
  private nextFireAt: Date | null = null;
  private stopping = false;
  private history: ExecutionRecord[] = [];
  private counts = { completed: 0, failed: 0, skipped: 0 };

  constructor(options: TriggerSchedulerOptions) {
    super();
    assertSchedule(options.schedule);

    this.executor = options.executor;
    this.schedule = { ...options.schedule };
    this.catchUpPolicy = options.catchUpPolicy ?? 'skip';
    this.misfireGraceMs = options.misfireGraceMs ?? 5 * 60 * 1000;
    this.runLock = options.runLock ?? null;
    this.runLockTtlMs = options.runLockTtlMs ?? 35 * 60 * 1000;
    this.lockOwner = options.lockOwner ?? `${process.pid}-${randomUUID()}`;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createModuleLogger('scheduler');
  }

  /**
   * Start firing on the configured cadence
   */
  start(): void {
    if (this.job) {
      return;
    }

    const expression = toCronExpression(this.schedule);
    if (!cron.validate(expression)) {
      throw new ConfigurationError(`Invalid cron expression: ${expression}`);
    }

    this.job = cron.schedule(expression, () => {
      this.handleTick().catch((error: unknown) => {
        this.logger.error('Scheduled tick failed', toError(error), undefined, 'tick');
      });
    }, {
      scheduled: true,
      timezone: this.schedule.timezone,
      recoverMissedExecutions: false
    });

    this.nextFireAt = computeNextFireTime(this.schedule, this.now());
    this.logger.info('Scheduler started', {
      cron: expression,
      timezone: this.schedule.timezone,
      catchUpPolicy: this.catchUpPolicy,
      nextFireAt: this.nextFireAt.toISOString()
    }, 'start');
    this.emit('schedulerStarted', this.nextFireAt);
  }

  /**
   * Stop firing. An in-flight run is cancelled and awaited.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    try {
      if (this.job) {
        this.job.stop();
        this.job = null;
      }
      this.nextFireAt = null;

      const inFlight = this.inFlight;
      if (inFlight) {
        this.logger.warn('Cancelling in-flight run', { trigger: inFlight.trigger }, 'stop');
        inFlight.controller.abort(new Error('scheduler stopping'));
        await inFlight.promise;
      }
    } finally {
      this.stopping = false;
    }

    this.logger.info('Scheduler stopped', undefined, 'stop');
    this.emit('schedulerStopped');
  }

  /**
   * Run immediately. Skipped, not queued, when a run is already in progress.
   */
  triggerNow(): Promise<TriggerOutcome> {
    return this.trigger('manual', this.now());
  }

  /**
   * Change the time of day; takes effect from the next fire.
   */
  reschedule(hour: number, minute: number, timezone?: string): void {
    const schedule: DailySchedule = { hour, minute, timezone: timezone ?? this.schedule.timezone };
    assertSchedule(schedule);

    const wasRunning = this.job !== null;
    if (this.job) {
      this.job.stop();
      this.job = null;
    }
    this.schedule = schedule;
    this.logger.info('Schedule changed', { ...schedule }, 'reschedule');

    if (wasRunning) {
      this.start();
    }
  }

  isRunning(): boolean {
    return this.job !== null;
  }

  isRunInProgress(): boolean {
    return this.inFlight !== null;
  }

  getNextFireTime(): Date | null {
    return this.nextFireAt;
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.isRunning(),
      runInProgress: this.isRunInProgress(),
      schedule: { ...this.schedule },
      cronExpression: toCronExpression(this.schedule),
      catchUpPolicy: this.catchUpPolicy,
      nextFireAt: this.nextFireAt,
      lastRun: this.history.length > 0 ? this.history[this.history.length - 1] : null,
      completedCount: this.counts.completed,
      failedCount: this.counts.failed,
      skippedCount: this.counts.skipped
    };
  }

  /**
   * Last ten triggers, oldest first
   */
  getHistory(): ExecutionRecord[] {
    return [...this.history];
  }

  /**
   * Cron callback. Drops the tick if it is too late for the slot it belongs to.
   */
  async handleTick(): Promise<TriggerOutcome> {
    const firedAt = this.now();
    const slot = computePreviousFireTime(this.schedule, firedAt);
    this.nextFireAt = computeNextFireTime(this.schedule, firedAt);

    if (firedAt.getTime() - slot.getTime() > this.misfireGraceMs) {
      this.logger.warn('Missed fire dropped, waiting for next occurrence', {
        slot: slot.toISOString(),
        firedAt: firedAt.toISOString(),
        nextFireAt: this.nextFireAt.toISOString()
      }, 'tick');
      return this.skip('scheduled', firedAt, 'missed-fire');
    }

    return this.trigger('scheduled', firedAt);
  }

  private trigger(trigger: RunTrigger, firedAt: Date): Promise<TriggerOutcome> {
    if (this.stopping) {
      return Promise.resolve(this.skip(trigger, firedAt, 'stopping'));
    }
    if (this.inFlight) {
      this.logger.warn('Run already in progress, trigger skipped', {
        trigger,
        inFlight: this.inFlight.trigger
      }, 'trigger');
      return Promise.resolve(this.skip(trigger, firedAt, 'run-in-progress'));
    }

    const controller = new AbortController();
    const promise = this.execute(trigger, firedAt, controller.signal).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = { trigger, controller, promise };
    return promise;
  }

  private async execute(trigger: RunTrigger, firedAt: Date, signal: AbortSignal): Promise<TriggerOutcome> {
    let leased = false;
    let outcome: TriggerOutcome;
    try {
      leased = this.runLock ? await this.runLock.acquire(this.lockOwner, this.runLockTtlMs) : true;
      if (!leased) {
        this.logger.warn('Run in progress in another process, trigger skipped', { trigger }, 'trigger');
        return this.skip(trigger, firedAt, 'run-in-progress');
      }

      this.emit('runStarted', trigger, firedAt);
      const report = await this.executor.runOnce(firedAt, { trigger, signal });
      outcome = { status: 'completed', report };
      this.counts.completed++;
      this.emit('runCompleted', report);
    } catch (error) {
      const failure = toError(error);
      outcome = { status: 'failed', error: failure };
      this.counts.failed++;
      this.logger.error('Delivery run failed', failure, { trigger }, 'execute');
      this.emit('runFailed', failure);
    } finally {
      if (leased) {
        await this.releaseLease();
      }
    }

    this.recordExecution({
      trigger,
      firedAt,
      finishedAt: this.now(),
      status: outcome.status,
      runId: outcome.status === 'completed' ? outcome.report.runId : undefined,
      summary: outcome.status === 'completed' ? outcome.report.summary : undefined,
      error: outcome.status === 'failed' ? outcome.error.message : undefined
    });
    return outcome;
  }

  /**
   * A lease that cannot be released expires on its own.
   */
  private async releaseLease(): Promise<void> {
    if (!this.runLock) {
      return;
    }
    try {
      await this.runLock.release(this.lockOwner);
    } catch (error) {
      this.logger.error('Could not release run lock', toError(error), { owner: this.lockOwner }, 'execute');
    }
  }

  private skip(trigger: RunTrigger, firedAt: Date, reason: SkipReason): TriggerOutcome {
    this.counts.skipped++;
    this.recordExecution({ trigger, firedAt, finishedAt: this.now(), status: 'skipped', skipReason: reason });
    this.emit('runSkipped', trigger, reason);
    return { status: 'skipped', reason };
  }

  private recordExecution(record: ExecutionRecord): void {
    this.history.push(record);
    if (this.history.length > HISTORY_LIMIT) {
      this.history.shift();
    }
  }
}

function assertSchedule(schedule: DailySchedule): void {
  const problems = validateSchedule(schedule);
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid schedule: ${problems.join('; ')}`, problems);
  }
}
