/**
 * Migration: per-attempt run, stage, degradation and language columns
 * Version: 2
 */

import type { SqliteDatabase } from '../../config/connection';

export default {
  version: 2,
  description: 'delivery_history run_id, stage, degraded, language',

  async up(db: SqliteDatabase): Promise<void> {
    await db.run('ALTER TABLE delivery_history ADD COLUMN run_id TEXT');
    await db.run('ALTER TABLE delivery_history ADD COLUMN stage TEXT');
    await db.run('ALTER TABLE delivery_history ADD COLUMN degraded INTEGER NOT NULL DEFAULT 0');
    await db.run('ALTER TABLE delivery_history ADD COLUMN language TEXT');

    await db.run(`
      CREATE INDEX IF NOT EXISTS idx_delivery_history_lookup
      ON delivery_history(subscriber_id, outcome, problem_id)
    `);
    await db.run('CREATE INDEX IF NOT EXISTS idx_delivery_history_run ON delivery_history(run_id)');
  },

  async down(db: SqliteDatabase): Promise<void> {
    await db.run('DROP INDEX IF EXISTS idx_delivery_history_run');
    await db.run('DROP INDEX IF EXISTS idx_delivery_history_lookup');
    await db.run('ALTER TABLE delivery_history DROP COLUMN language');
    await db.run('ALTER TABLE delivery_history DROP COLUMN degraded');
    await db.run('ALTER TABLE delivery_history DROP COLUMN stage');
    await db.run('ALTER TABLE delivery_history DROP COLUMN run_id');
  }
};
