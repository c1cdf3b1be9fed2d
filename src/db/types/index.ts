/**
 * Entity types persisted by the delivery database
 */

import type { Language } from '../../system/config/languages';

export type Difficulty = 'easy' | 'medium' | 'hard';

export type DifficultyPreference = Difficulty | 'any';

export const DIFFICULTIES: readonly Difficulty[] = ['easy', 'medium', 'hard'];

export function isDifficulty(value: string): value is Difficulty {
  return DIFFICULTIES.some(difficulty => difficulty === value);
}

export function isDifficultyPreference(value: string): value is DifficultyPreference {
  return value === 'any' || isDifficulty(value);
}

export interface Subscriber {
  /** Unique opaque identity, an email address in practice */
  identity: string;
  language: Language;
  difficulty: DifficultyPreference;
  active: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface ProblemExample {
  input: string;
  output: string;
  explanation?: string;
}

export interface ProblemTestCase {
  input: string;
  expected_output: string;
}

/**
 * Immutable catalog entry. Examples, constraints, hints and test cases are passed
 * through to content production unmodified.
 */
export interface Problem {
  identity: string;
  title: string;
  description: string;
  difficulty: Difficulty;
  tags: string[];
  constraints: string[];
  examples: ProblemExample[];
  hints: string[];
  test_cases: ProblemTestCase[];
  created_at: Date;
}

export type NewProblem = Omit<Problem, 'created_at'>;

export type DeliveryOutcome = 'success' | 'failure';

export interface DeliveryRecord {
  id: number;
  subscriber_id: string;
  problem_id: string;
  run_id: string | null;
  attempted_at: Date;
  outcome: DeliveryOutcome;
  /** Stage that failed; null on success */
  stage: string | null;
  reason: string | null;
  degraded: boolean;
  language: Language | null;
}

export type NewDeliveryRecord = Omit<DeliveryRecord, 'id'>;

export interface SubscriberDeliveryStats {
  subscriberId: string;
  totalDelivered: number;
  totalFailed: number;
  byDifficulty: Record<Difficulty, number>;
  lastDeliveredAt: Date | null;
}

export interface DeliveryTotals {
  successful: number;
  failed: number;
}
