/**
 * Data-access contracts used by the coordinator.
 *
 * Implementations report infrastructure failures with the matching
 * `*UnavailableError`; the coordinator decides whether that aborts the run.
 */

import type { Language } from '../../system/config/languages';
import type {
  DeliveryRecord,
  DeliveryTotals,
  Difficulty,
  DifficultyPreference,
  NewDeliveryRecord,
  NewProblem,
  Problem,
  Subscriber,
  SubscriberDeliveryStats
} from './index';

export interface HealthCheckable {
  /** Resolves true when the backing store answers a trivial query */
  healthCheck(): Promise<boolean>;
}

/**
 * Read-only keyed lookup of problems.
 */
export interface ProblemCatalog extends HealthCheckable {
  findById(identity: string): Promise<Problem | null>;

  /** Problems of one difficulty, or all of them for `any`, ordered by identity */
  listByDifficulty(difficulty: DifficultyPreference): Promise<Problem[]>;

  count(): Promise<number>;

  countByDifficulty(): Promise<Record<Difficulty, number>>;
}

export interface CatalogUpsertResult {
  inserted: number;
  updated: number;
  total: number;
}

/**
 * Write side of the catalog, used only by `init-data`.
 */
export interface ProblemCatalogLoader {
  upsertMany(problems: NewProblem[]): Promise<CatalogUpsertResult>;
}

/**
 * Append-only delivery ledger.
 */
export interface DeliveryHistory extends HealthCheckable {
  /**
   * Append one attempt. Rejects a second success record for the same
   * (subscriber, problem) pair with `DuplicateDeliveryError`.
   */
  record(record: NewDeliveryRecord): Promise<DeliveryRecord>;

  /** Problems with a success record for the subscriber */
  deliveredProblemIds(subscriberId: string): Promise<Set<string>>;

  listForSubscriber(subscriberId: string, limit?: number): Promise<DeliveryRecord[]>;

  getSubscriberStats(subscriberId: string): Promise<SubscriberDeliveryStats>;

  getTotals(): Promise<DeliveryTotals>;
}

export interface SubscriberPreferences {
  language?: Language;
  difficulty?: DifficultyPreference;
}

export interface SubscribeResult {
  subscriber: Subscriber;
  status: 'created' | 'reactivated' | 'updated';
}

/**
 * Subscriber identity to preferences and active flag.
 */
export interface SubscriberDirectory extends HealthCheckable {
  /** Active subscribers ordered by identity */
  listActive(): Promise<Subscriber[]>;

  findByIdentity(identity: string): Promise<Subscriber | null>;

  subscribe(identity: string, language: Language, difficulty: DifficultyPreference): Promise<SubscribeResult>;

  /** Returns false when the identity is unknown or already inactive */
  deactivate(identity: string): Promise<boolean>;

  updatePreferences(identity: string, preferences: SubscriberPreferences): Promise<Subscriber | null>;

  countActive(): Promise<number>;

  countAll(): Promise<number>;
}

export interface RunLease {
  owner: string;
  acquiredAt: Date;
  expiresAt: Date;
}

/**
 * Lease on "a delivery run is in progress", shared by every process using the
 * same storage. An expired lease counts as free.
 */
export interface RunLock {
  /** True when `owner` holds the lease afterwards */
  acquire(owner: string, ttlMs: number): Promise<boolean>;

  /** No-op unless `owner` holds the lease */
  release(owner: string): Promise<void>;

  holder(): Promise<RunLease | null>;
}
