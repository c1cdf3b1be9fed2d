import { DatabaseConnectionManager } from '../config/connection';
import { DifficultyPreference, Subscriber, isDifficultyPreference } from '../types';
import { SubscribeResult, SubscriberDirectory, SubscriberPreferences } from '../types/repository';
import { Language, isKnownLanguage } from '../../system/config/languages';
import { Logger, createModuleLogger } from '../../system/logging/logger';
import { toErrorMessage } from '../../system/error-handling';

interface SubscriberRow {
  identity: string;
  language: string;
  difficulty: string;
  active: number;
  created_at: string;
  updated_at: string;
}

/**
 * Subscriber directory backed by the `subscribers` table.
 * Unsubscribing only clears the active flag; rows are never deleted.
 */
export class SubscriberRepository implements SubscriberDirectory {
  private logger: Logger;

  constructor(private readonly connection: DatabaseConnectionManager, logger?: Logger) {
    this.logger = logger ?? createModuleLogger('db.subscribers');
  }

  public async listActive(): Promise<Subscriber[]> {
    const db = await this.connection.getConnection();
    const rows = await db.all<SubscriberRow[]>(
      `SELECT * FROM subscribers WHERE active = 1 ORDER BY identity`
    );
    const subscribers: Subscriber[] = [];
    for (const row of rows) {
      try {
        subscribers.push(this.mapToSubscriber(row));
      } catch (error) {
        this.logger.warn('Skipping unreadable subscriber row', { identity: row.identity, reason: toErrorMessage(error) }, 'listActive');
      }
    }
    return subscribers;
  }

  public async findByIdentity(identity: string): Promise<Subscriber | null> {
    const db = await this.connection.getConnection();
    const row = await db.get<SubscriberRow>(`SELECT * FROM subscribers WHERE identity = ?`, identity);
    return row ? this.mapToSubscriber(row) : null;
  }

  /**
   * Create, reactivate or update a subscription
   */
  public async subscribe(identity: string, language: Language, difficulty: DifficultyPreference): Promise<SubscribeResult> {
    const status = await this.connection.withTransaction(async db => {
      const now = new Date().toISOString();
      const existing = await db.get<SubscriberRow>(`SELECT * FROM subscribers WHERE identity = ?`, identity);

      if (!existing) {
        await db.run(
          `INSERT INTO subscribers (identity, language, difficulty, active, created_at, updated_at)
           VALUES (?, ?, ?, 1, ?, ?)`,
          identity,
          language,
          difficulty,
          now,
          now
        );
        return 'created' as const;
      }

      await db.run(
        `UPDATE subscribers SET language = ?, difficulty = ?, active = 1, updated_at = ? WHERE identity = ?`,
        language,
        difficulty,
        now,
        identity
      );
      return existing.active === 1 ? ('updated' as const) : ('reactivated' as const);
    });

    const subscriber = await this.findByIdentity(identity);
    if (!subscriber) {
      throw new Error(`Subscriber ${identity} missing after ${status}`);
    }
    this.logger.info('Subscription saved', { identity, status, language, difficulty }, 'subscribe');
    return { subscriber, status };
  }

  public async deactivate(identity: string): Promise<boolean> {
    const db = await this.connection.getConnection();
    const result = await db.run(
      `UPDATE subscribers SET active = 0, updated_at = ? WHERE identity = ? AND active = 1`,
      new Date().toISOString(),
      identity
    );
    return (result.changes ?? 0) > 0;
  }

  public async updatePreferences(identity: string, preferences: SubscriberPreferences): Promise<Subscriber | null> {
    const existing = await this.findByIdentity(identity);
    if (!existing) {
      return null;
    }

    const db = await this.connection.getConnection();
    await db.run(
      `UPDATE subscribers SET language = ?, difficulty = ?, updated_at = ? WHERE identity = ?`,
      preferences.language ?? existing.language,
      preferences.difficulty ?? existing.difficulty,
      new Date().toISOString(),
      identity
    );
    return this.findByIdentity(identity);
  }

  public async countActive(): Promise<number> {
    const db = await this.connection.getConnection();
    const result = await db.get<{ count: number }>(`SELECT COUNT(*) as count FROM subscribers WHERE active = 1`);
    return result?.count ?? 0;
  }

  public async countAll(): Promise<number> {
    const db = await this.connection.getConnection();
    const result = await db.get<{ count: number }>(`SELECT COUNT(*) as count FROM subscribers`);
    return result?.count ?? 0;
  }

  public async healthCheck(): Promise<boolean> {
    try {
      await this.countAll();
      return true;
    } catch (error) {
      this.logger.warn('Subscriber directory health check failed', { error: toErrorMessage(error) }, 'healthCheck');
      return false;
    }
  }

  private mapToSubscriber(row: SubscriberRow): Subscriber {
    if (!isKnownLanguage(row.language)) {
      throw new Error(`Subscriber ${row.identity} has unsupported language "${row.language}"`);
    }
    if (!isDifficultyPreference(row.difficulty)) {
      throw new Error(`Subscriber ${row.identity} has unknown difficulty "${row.difficulty}"`);
    }

    return {
      identity: row.identity,
      language: row.language,
      difficulty: row.difficulty,
      active: row.active === 1,
      created_at: new Date(row.created_at),
      updated_at: new Date(row.updated_at)
    };
  }
}
