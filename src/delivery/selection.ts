/**
 * Problem selection.
 *
 * A pure function of (catalog snapshot, success-history snapshot, subscriber
 * preferences). It never touches storage; the coordinator takes the snapshots.
 */

import type { DifficultyPreference, Problem } from '../db/types';
import type { SelectionPolicy } from './types';

export interface SelectionOptions {
  policy?: SelectionPolicy;
  /** Random source for the `random` policy, values in [0, 1) */
  random?: () => number;
}

/**
 * Ordinal comparison, independent of the process locale.
 */
export function compareIdentity(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function matchesDifficulty(problem: Problem, preference: DifficultyPreference): boolean {
  return preference === 'any' || problem.difficulty === preference;
}

/**
 * Problems the subscriber may still receive, ordered by identity.
 */
export function eligibleProblems(
  catalog: readonly Problem[],
  delivered: ReadonlySet<string>,
  preference: DifficultyPreference
): Problem[] {
  return catalog
    .filter(problem => matchesDifficulty(problem, preference) && !delivered.has(problem.identity))
    .sort((a, b) => compareIdentity(a.identity, b.identity));
}

/**
 * Pick the next problem for a subscriber, or null when every matching problem
 * already has a success record.
 */
export function selectProblem(
  catalog: readonly Problem[],
  delivered: ReadonlySet<string>,
  preference: DifficultyPreference,
  options: SelectionOptions = {}
): Problem | null {
  const candidates = eligibleProblems(catalog, delivered, preference);
  if (candidates.length === 0) {
    return null;
  }

  if (options.policy === 'random') {
    const random = options.random ?? Math.random;
    const index = Math.min(candidates.length - 1, Math.max(0, Math.floor(random() * candidates.length)));
    return candidates[index];
  }

  return candidates[0];
}
