import { CatalogDocumentError, ConfigurationError, InvalidInputError } from '../system/error-handling';
import type { TriggerOutcome } from '../system/scheduler';

export enum ExitCode {
  SUCCESS = 0,
  SYSTEMIC_FAILURE = 1,
  CONFIGURATION_ERROR = 2,
  UNHEALTHY = 3,
  RUN_SKIPPED = 4,
  INVALID_INPUT = 64
}

export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigurationError) {
    return ExitCode.CONFIGURATION_ERROR;
  }
  if (error instanceof CatalogDocumentError || error instanceof InvalidInputError) {
    return ExitCode.INVALID_INPUT;
  }
  return ExitCode.SYSTEMIC_FAILURE;
}

/**
 * A completed run exits 0 even when some subscribers failed.
 */
export function exitCodeForOutcome(outcome: TriggerOutcome): ExitCode {
  switch (outcome.status) {
    case 'completed':
      return ExitCode.SUCCESS;
    case 'skipped':
      return ExitCode.RUN_SKIPPED;
    case 'failed':
      return exitCodeForError(outcome.error);
  }
}
