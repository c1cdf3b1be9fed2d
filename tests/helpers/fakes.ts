/**
 * In-memory collaborators for delivery tests
 */

import type {
  DeliveryRecord,
  DeliveryTotals,
  Difficulty,
  DifficultyPreference,
  NewDeliveryRecord,
  Problem,
  Subscriber,
  SubscriberDeliveryStats
} from '../../src/db/types';
import type {
  DeliveryHistory,
  ProblemCatalog,
  RunLease,
  RunLock,
  SubscribeResult,
  SubscriberDirectory,
  SubscriberPreferences
} from '../../src/db/types/repository';
import type {
  Embellisher,
  Embellishment,
  MessageSender,
  OutgoingMessage,
  ProblemPayload,
  SendReceipt,
  Solution,
  SolutionGenerator
} from '../../src/delivery/types';
import type { Language } from '../../src/system/config/languages';
import { DuplicateDeliveryError } from '../../src/system/error-handling';
import { Logger } from '../../src/system/logging/logger';

export const CREATED_AT = new Date('2024-01-01T00:00:00.000Z');

export function silentLogger(): Logger {
  return new Logger({ consoleOutput: false });
}

export function makeProblem(identity: string, difficulty: Difficulty = 'easy', overrides: Partial<Problem> = {}): Problem {
  return {
    identity,
    title: `Problem ${identity}`,
    description: `Description of ${identity}`,
    difficulty,
    tags: [],
    constraints: [],
    examples: [],
    hints: [],
    test_cases: [],
    created_at: CREATED_AT,
    ...overrides
  };
}

export function makeSubscriber(identity: string, overrides: Partial<Subscriber> = {}): Subscriber {
  return {
    identity,
    language: 'python',
    difficulty: 'any',
    active: true,
    created_at: CREATED_AT,
    updated_at: CREATED_AT,
    ...overrides
  };
}

export class InMemoryDirectory implements SubscriberDirectory {
  public failWith: Error | null = null;
  private subscribers = new Map<string, Subscriber>();

  constructor(subscribers: Subscriber[] = []) {
    subscribers.forEach(subscriber => this.subscribers.set(subscriber.identity, { ...subscriber }));
  }

  async listActive(): Promise<Subscriber[]> {
    if (this.failWith) throw this.failWith;
    return Array.from(this.subscribers.values())
      .filter(subscriber => subscriber.active)
      .sort((a, b) => (a.identity < b.identity ? -1 : 1));
  }

  async findByIdentity(identity: string): Promise<Subscriber | null> {
    return this.subscribers.get(identity) ?? null;
  }

  async subscribe(identity: string, language: Language, difficulty: DifficultyPreference): Promise<SubscribeResult> {
    const existing = this.subscribers.get(identity);
    const subscriber = makeSubscriber(identity, { language, difficulty });
    this.subscribers.set(identity, subscriber);
    if (!existing) return { subscriber, status: 'created' };
    return { subscriber, status: existing.active ? 'updated' : 'reactivated' };
  }

  async deactivate(identity: string): Promise<boolean> {
    const existing = this.subscribers.get(identity);
    if (!existing || !existing.active) return false;
    existing.active = false;
    return true;
  }

  async updatePreferences(identity: string, preferences: SubscriberPreferences): Promise<Subscriber | null> {
    const existing = this.subscribers.get(identity);
    if (!existing) return null;
    existing.language = preferences.language ?? existing.language;
    existing.difficulty = preferences.difficulty ?? existing.difficulty;
    return { ...existing };
  }

  async countActive(): Promise<number> {
    return (await this.listActive()).length;
  }

  async countAll(): Promise<number> {
    return this.subscribers.size;
  }

  async healthCheck(): Promise<boolean> {
    return this.failWith === null;
  }
}

export class InMemoryCatalog implements ProblemCatalog {
  public failWith: Error | null = null;

  constructor(private problems: Problem[] = []) {}

  async findById(identity: string): Promise<Problem | null> {
    return this.problems.find(problem => problem.identity === identity) ?? null;
  }

  async listByDifficulty(difficulty: DifficultyPreference): Promise<Problem[]> {
    if (this.failWith) throw this.failWith;
    return this.problems
      .filter(problem => difficulty === 'any' || problem.difficulty === difficulty)
      .sort((a, b) => (a.identity < b.identity ? -1 : 1));
  }

  async count(): Promise<number> {
    return this.problems.length;
  }

  async countByDifficulty(): Promise<Record<Difficulty, number>> {
    const counts: Record<Difficulty, number> = { easy: 0, medium: 0, hard: 0 };
    this.problems.forEach(problem => counts[problem.difficulty]++);
    return counts;
  }

  async healthCheck(): Promise<boolean> {
    return this.failWith === null;
  }
}

export class InMemoryHistory implements DeliveryHistory {
  public records: DeliveryRecord[] = [];
  public failReadsWith: Error | null = null;
  /** Fail `record` for these subscribers */
  public failWritesFor = new Set<string>();

  async record(record: NewDeliveryRecord): Promise<DeliveryRecord> {
    if (this.failWritesFor.has(record.subscriber_id)) {
      throw new Error('history write failed');
    }
    const duplicate = record.outcome === 'success' && this.records.some(existing =>
      existing.outcome === 'success' &&
      existing.subscriber_id === record.subscriber_id &&
      existing.problem_id === record.problem_id
    );
    if (duplicate) {
      throw new DuplicateDeliveryError(record.subscriber_id, record.problem_id);
    }
    const stored = { id: this.records.length + 1, ...record };
    this.records.push(stored);
    return stored;
  }

  async deliveredProblemIds(subscriberId: string): Promise<Set<string>> {
    if (this.failReadsWith) throw this.failReadsWith;
    return new Set(this.successes(subscriberId).map(record => record.problem_id));
  }

  async listForSubscriber(subscriberId: string, limit = 50): Promise<DeliveryRecord[]> {
    return this.records.filter(record => record.subscriber_id === subscriberId).reverse().slice(0, limit);
  }

  async getSubscriberStats(subscriberId: string): Promise<SubscriberDeliveryStats> {
    const successes = this.successes(subscriberId);
    return {
      subscriberId,
      totalDelivered: successes.length,
      totalFailed: this.records.filter(record => record.subscriber_id === subscriberId && record.outcome === 'failure').length,
      byDifficulty: { easy: 0, medium: 0, hard: 0 },
      lastDeliveredAt: successes.length > 0 ? successes[successes.length - 1].attempted_at : null
    };
  }

  async getTotals(): Promise<DeliveryTotals> {
    return {
      successful: this.records.filter(record => record.outcome === 'success').length,
      failed: this.records.filter(record => record.outcome === 'failure').length
    };
  }

  async healthCheck(): Promise<boolean> {
    return this.failReadsWith === null;
  }

  successes(subscriberId: string): DeliveryRecord[] {
    return this.records.filter(record => record.subscriber_id === subscriberId && record.outcome === 'success');
  }
}

export function makeSolution(language: Language = 'python', code = 'def solve():\n    return 42'): Solution {
  return {
    language,
    code,
    explanation: 'Return the answer.',
    timeComplexity: 'O(1)',
    spaceComplexity: 'O(1)',
    approach: 'Look it up.'
  };
}

export class FakeGenerator implements SolutionGenerator {
  public calls: Array<{ problemId: string; language: Language }> = [];
  /** Problem ids whose generation fails */
  public failFor = new Set<string>();
  public healthy = true;

  async generate(problem: ProblemPayload, language: Language): Promise<Solution> {
    this.calls.push({ problemId: problem.problemId, language });
    if (this.failFor.has(problem.problemId)) {
      throw new Error(`generator unavailable for ${problem.problemId}`);
    }
    return makeSolution(language, `# ${problem.problemId}\ndef solve():\n    return 42`);
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}

export class FakeEmbellisher implements Embellisher {
  public fail = false;

  async embellish(_problem: ProblemPayload, solution: Solution): Promise<Embellishment> {
    if (this.fail) {
      throw new Error('no jokes today');
    }
    return { commentary: ['It works on my machine.'], annotatedCode: `# It works on my machine.\n\n${solution.code}` };
  }
}

export class FakeSender implements MessageSender {
  public sent: OutgoingMessage[] = [];
  /** Recipients whose send fails */
  public failFor = new Set<string>();
  public healthy = true;

  async send(message: OutgoingMessage): Promise<SendReceipt> {
    if (this.failFor.has(message.to)) {
      throw new Error(`mailbox unavailable: ${message.to}`);
    }
    this.sent.push(message);
    return { messageId: `msg-${this.sent.length}` };
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}

export class InMemoryRunLock implements RunLock {
  public owner: string | null = null;
  public acquireFailsWith: Error | null = null;
  public released: string[] = [];

  async acquire(owner: string, _ttlMs: number): Promise<boolean> {
    if (this.acquireFailsWith) throw this.acquireFailsWith;
    if (this.owner !== null && this.owner !== owner) return false;
    this.owner = owner;
    return true;
  }

  async release(owner: string): Promise<void> {
    this.released.push(owner);
    if (this.owner === owner) this.owner = null;
  }

  async holder(): Promise<RunLease | null> {
    if (this.owner === null) return null;
    return { owner: this.owner, acquiredAt: new Date(0), expiresAt: new Date(0) };
  }
}
