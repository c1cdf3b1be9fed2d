/**
 * Migration: initial schema
 * Version: 1
 */

import type { SqliteDatabase } from '../../config/connection';

export default {
  version: 1,
  description: 'subscribers, problems and delivery_history',

  async up(db: SqliteDatabase): Promise<void> {
    await db.run(`
      CREATE TABLE IF NOT EXISTS subscribers (
        identity TEXT PRIMARY KEY,
        language TEXT NOT NULL,
        difficulty TEXT NOT NULL CHECK (difficulty IN ('easy', 'medium', 'hard', 'any')),
        active INTEGER NOT NULL DEFAULT 1 CHECK (active IN (0, 1)),
        created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await db.run(`
      CREATE TABLE IF NOT EXISTS problems (
        identity TEXT PRIMARY KEY,
        title TEXT NOT NULL UNIQUE,
        description TEXT NOT NULL,
        difficulty TEXT NOT NULL CHECK (difficulty IN ('easy', 'medium', 'hard')),
        tags TEXT NOT NULL DEFAULT '[]',
        constraints TEXT NOT NULL DEFAULT '[]',
        examples TEXT NOT NULL DEFAULT '[]',
        hints TEXT NOT NULL DEFAULT '[]',
        test_cases TEXT NOT NULL DEFAULT '[]',
        created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    // Append-only; at most one success per (subscriber_id, problem_id) is enforced by the repository
    await db.run(`
      CREATE TABLE IF NOT EXISTS delivery_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        subscriber_id TEXT NOT NULL REFERENCES subscribers(identity),
        problem_id TEXT NOT NULL REFERENCES problems(identity),
        attempted_at DATETIME NOT NULL,
        outcome TEXT NOT NULL CHECK (outcome IN ('success', 'failure')),
        reason TEXT
      )
    `);

    await db.run('CREATE INDEX IF NOT EXISTS idx_subscribers_active ON subscribers(active)');
    await db.run('CREATE INDEX IF NOT EXISTS idx_problems_difficulty ON problems(difficulty)');
  },

  async down(db: SqliteDatabase): Promise<void> {
    await db.run('DROP INDEX IF EXISTS idx_problems_difficulty');
    await db.run('DROP INDEX IF EXISTS idx_subscribers_active');
    await db.run('DROP TABLE IF EXISTS delivery_history');
    await db.run('DROP TABLE IF EXISTS problems');
    await db.run('DROP TABLE IF EXISTS subscribers');
  }
};
