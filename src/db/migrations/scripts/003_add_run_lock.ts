/**
 * Migration: run lease shared by every process on the database
 * Version: 3
 */

import type { SqliteDatabase } from '../../config/connection';

export default {
  version: 3,
  description: 'run_lock lease table',

  async up(db: SqliteDatabase): Promise<void> {
    await db.run(`
      CREATE TABLE IF NOT EXISTS run_lock (
        name TEXT PRIMARY KEY,
        owner TEXT NOT NULL,
        acquired_at TEXT NOT NULL,
        expires_at TEXT NOT NULL
      )
    `);
  },

  async down(db: SqliteDatabase): Promise<void> {
    await db.run('DROP TABLE IF EXISTS run_lock');
  }
};
