/**
 * Error Handling Module
 *
 * Error taxonomy for the delivery system. Systemic errors abort a whole run and are
 * surfaced to the operator; every other error is isolated to one subscriber.
 */

import type { FailureStage } from '../../delivery/types';

export enum DeliveryErrorType {
  CONFIGURATION = 'configuration',
  DIRECTORY_UNAVAILABLE = 'directory_unavailable',
  CATALOG_UNAVAILABLE = 'catalog_unavailable',
  HISTORY_UNAVAILABLE = 'history_unavailable',
  NO_CONTENT_AVAILABLE = 'no_content_available',
  GENERATION = 'generation',
  EMBELLISHMENT = 'embellishment',
  DEGRADED_EMBELLISHMENT = 'degraded_embellishment',
  SEND = 'send',
  INTERRUPTED = 'interrupted',
  DUPLICATE_DELIVERY = 'duplicate_delivery',
  CATALOG_DOCUMENT = 'catalog_document',
  INVALID_INPUT = 'invalid_input'
}

export interface DeliveryErrorOptions {
  stage?: FailureStage;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class DeliveryError extends Error {
  public readonly type: DeliveryErrorType;
  public readonly systemic: boolean;
  public readonly stage?: FailureStage;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(message: string, type: DeliveryErrorType, systemic: boolean, options: DeliveryErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'DeliveryError';
    this.type = type;
    this.systemic = systemic;
    this.stage = options.stage;
    this.context = options.context ?? {};
    this.timestamp = new Date();
  }

  toString(): string {
    const stage = this.stage ? ` (stage: ${this.stage})` : '';
    return `[${this.type}] ${this.message}${stage}`;
  }
}

/**
 * Missing or invalid configuration. Fatal at startup.
 */
export class ConfigurationError extends DeliveryError {
  public readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(message, DeliveryErrorType.CONFIGURATION, true, { context: { problems } });
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

export class DirectoryUnavailableError extends DeliveryError {
  constructor(message: string, cause?: unknown) {
    super(message, DeliveryErrorType.DIRECTORY_UNAVAILABLE, true, { cause });
    this.name = 'DirectoryUnavailableError';
  }
}

export class CatalogUnavailableError extends DeliveryError {
  constructor(message: string, cause?: unknown) {
    super(message, DeliveryErrorType.CATALOG_UNAVAILABLE, true, { cause });
    this.name = 'CatalogUnavailableError';
  }
}

export class HistoryUnavailableError extends DeliveryError {
  constructor(message: string, cause?: unknown) {
    super(message, DeliveryErrorType.HISTORY_UNAVAILABLE, true, { cause });
    this.name = 'HistoryUnavailableError';
  }
}

export class NoContentAvailableError extends DeliveryError {
  constructor(subscriberId: string, difficulty: string) {
    super(
      `No unseen problem matches difficulty "${difficulty}" for ${subscriberId}`,
      DeliveryErrorType.NO_CONTENT_AVAILABLE,
      false,
      { stage: 'select', context: { subscriberId, difficulty } }
    );
    this.name = 'NoContentAvailableError';
  }
}

export class GenerationError extends DeliveryError {
  constructor(message: string, cause?: unknown, context?: Record<string, unknown>) {
    super(message, DeliveryErrorType.GENERATION, false, { stage: 'solve', cause, context });
    this.name = 'GenerationError';
  }
}

/**
 * Raised by embellishers; the pipeline turns it into a warning or a failure by policy.
 */
export class EmbellishmentError extends DeliveryError {
  constructor(message: string, cause?: unknown) {
    super(message, DeliveryErrorType.EMBELLISHMENT, false, { stage: 'embellish', cause });
    this.name = 'EmbellishmentError';
  }
}

/**
 * Not thrown: attached to a delivered result whose embellishment was skipped.
 */
export class DegradedEmbellishmentWarning extends DeliveryError {
  constructor(cause: unknown) {
    super(
      `Embellishment failed, sending plain solution: ${toErrorMessage(cause)}`,
      DeliveryErrorType.DEGRADED_EMBELLISHMENT,
      false,
      { stage: 'embellish', cause }
    );
    this.name = 'DegradedEmbellishmentWarning';
  }
}

export class SendError extends DeliveryError {
  constructor(message: string, cause?: unknown, context?: Record<string, unknown>) {
    super(message, DeliveryErrorType.SEND, false, { stage: 'send', cause, context });
    this.name = 'SendError';
  }
}

export class RunInterruptedError extends DeliveryError {
  constructor(stage: FailureStage, reason: string) {
    super(`Interrupted during ${stage}: ${reason}`, DeliveryErrorType.INTERRUPTED, false, { stage });
    this.name = 'RunInterruptedError';
  }
}

export class DuplicateDeliveryError extends DeliveryError {
  constructor(subscriberId: string, problemId: string) {
    super(
      `A successful delivery of ${problemId} to ${subscriberId} is already recorded`,
      DeliveryErrorType.DUPLICATE_DELIVERY,
      false,
      { stage: 'record', context: { subscriberId, problemId } }
    );
    this.name = 'DuplicateDeliveryError';
  }
}

export class CatalogDocumentError extends DeliveryError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, DeliveryErrorType.CATALOG_DOCUMENT, false, { context: { issues } });
    this.name = 'CatalogDocumentError';
    this.issues = issues;
  }
}

export class InvalidInputError extends DeliveryError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, DeliveryErrorType.INVALID_INPUT, false, { context });
    this.name = 'InvalidInputError';
  }
}

export function isSystemicError(error: unknown): error is DeliveryError {
  return error instanceof DeliveryError && error.systemic;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(toErrorMessage(error));
}

/**
 * Short, log-friendly description: `Name: message`
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return toErrorMessage(error);
}
