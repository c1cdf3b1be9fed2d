import { DatabaseConnectionManager } from '../config/connection';
import {
  DeliveryRecord,
  DeliveryTotals,
  Difficulty,
  NewDeliveryRecord,
  SubscriberDeliveryStats,
  isDifficulty
} from '../types';
import { DeliveryHistory } from '../types/repository';
import { isKnownLanguage } from '../../system/config/languages';
import { DuplicateDeliveryError, toErrorMessage } from '../../system/error-handling';
import { Logger, createModuleLogger } from '../../system/logging/logger';

interface DeliveryRow {
  id: number;
  subscriber_id: string;
  problem_id: string;
  run_id: string | null;
  attempted_at: string;
  outcome: string;
  stage: string | null;
  reason: string | null;
  degraded: number;
  language: string | null;
}

/**
 * Append-only delivery ledger backed by `delivery_history`.
 *
 * Only success records take part in deduplication: a failed attempt leaves the
 * problem eligible for the next run.
 */
export class DeliveryHistoryRepository implements DeliveryHistory {
  private logger: Logger;

  constructor(private readonly connection: DatabaseConnectionManager, logger?: Logger) {
    this.logger = logger ?? createModuleLogger('db.history');
  }

  /**
   * Append one attempt; a second success for the same pair is refused
   */
  public async record(record: NewDeliveryRecord): Promise<DeliveryRecord> {
    const id = await this.connection.withTransaction(async db => {
      if (record.outcome === 'success') {
        const existing = await db.get<{ id: number }>(
          `SELECT id FROM delivery_history
           WHERE subscriber_id = ? AND problem_id = ? AND outcome = 'success'
           LIMIT 1`,
          record.subscriber_id,
          record.problem_id
        );
        if (existing) {
          throw new DuplicateDeliveryError(record.subscriber_id, record.problem_id);
        }
      }

      const result = await db.run(
        `INSERT INTO delivery_history
         (subscriber_id, problem_id, run_id, attempted_at, outcome, stage, reason, degraded, language)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        record.subscriber_id,
        record.problem_id,
        record.run_id,
        record.attempted_at.toISOString(),
        record.outcome,
        record.stage,
        record.reason,
        record.degraded ? 1 : 0,
        record.language
      );
      if (result.lastID === undefined) {
        throw new Error('Delivery record insert returned no row id');
      }
      return result.lastID;
    });

    return { id, ...record };
  }

  public async deliveredProblemIds(subscriberId: string): Promise<Set<string>> {
    const db = await this.connection.getConnection();
    const rows = await db.all<{ problem_id: string }[]>(
      `SELECT DISTINCT problem_id FROM delivery_history WHERE subscriber_id = ? AND outcome = 'success'`,
      subscriberId
    );
    return new Set(rows.map(row => row.problem_id));
  }

  /**
   * Most recent attempts first
   */
  public async listForSubscriber(subscriberId: string, limit = 50): Promise<DeliveryRecord[]> {
    const db = await this.connection.getConnection();
    const rows = await db.all<DeliveryRow[]>(
      `SELECT * FROM delivery_history WHERE subscriber_id = ? ORDER BY attempted_at DESC, id DESC LIMIT ?`,
      subscriberId,
      limit
    );
    return rows.map(row => this.mapToRecord(row));
  }

  public async getSubscriberStats(subscriberId: string): Promise<SubscriberDeliveryStats> {
    const db = await this.connection.getConnection();

    const totals = await db.get<{ delivered: number | null; failed: number | null; last_delivered: string | null }>(
      `SELECT
         SUM(CASE WHEN outcome = 'success' THEN 1 ELSE 0 END) as delivered,
         SUM(CASE WHEN outcome = 'failure' THEN 1 ELSE 0 END) as failed,
         MAX(CASE WHEN outcome = 'success' THEN attempted_at END) as last_delivered
       FROM delivery_history WHERE subscriber_id = ?`,
      subscriberId
    );

    const rows = await db.all<{ difficulty: string; count: number }[]>(
      `SELECT p.difficulty as difficulty, COUNT(*) as count
       FROM delivery_history h JOIN problems p ON p.identity = h.problem_id
       WHERE h.subscriber_id = ? AND h.outcome = 'success'
       GROUP BY p.difficulty`,
      subscriberId
    );

    const byDifficulty: Record<Difficulty, number> = { easy: 0, medium: 0, hard: 0 };
    for (const row of rows) {
      if (isDifficulty(row.difficulty)) {
        byDifficulty[row.difficulty] = row.count;
      }
    }

    return {
      subscriberId,
      totalDelivered: totals?.delivered ?? 0,
      totalFailed: totals?.failed ?? 0,
      byDifficulty,
      lastDeliveredAt: totals?.last_delivered ? new Date(totals.last_delivered) : null
    };
  }

  public async getTotals(): Promise<DeliveryTotals> {
    const db = await this.connection.getConnection();
    const result = await db.get<{ successful: number | null; failed: number | null }>(
      `SELECT
         SUM(CASE WHEN outcome = 'success' THEN 1 ELSE 0 END) as successful,
         SUM(CASE WHEN outcome = 'failure' THEN 1 ELSE 0 END) as failed
       FROM delivery_history`
    );
    return {
      successful: result?.successful ?? 0,
      failed: result?.failed ?? 0
    };
  }

  /**
   * Read-only probe; never writes a record
   */
  public async healthCheck(): Promise<boolean> {
    try {
      const db = await this.connection.getConnection();
      await db.get(`SELECT id FROM delivery_history LIMIT 1`);
      return true;
    } catch (error) {
      this.logger.warn('Delivery history health check failed', { error: toErrorMessage(error) }, 'healthCheck');
      return false;
    }
  }

  private mapToRecord(row: DeliveryRow): DeliveryRecord {
    return {
      id: row.id,
      subscriber_id: row.subscriber_id,
      problem_id: row.problem_id,
      run_id: row.run_id,
      attempted_at: new Date(row.attempted_at),
      outcome: row.outcome === 'success' ? 'success' : 'failure',
      stage: row.stage,
      reason: row.reason,
      degraded: row.degraded === 1,
      language: row.language !== null && isKnownLanguage(row.language) ? row.language : null
    };
  }
}
