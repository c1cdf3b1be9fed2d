/**
 * Migration types
 */

import type { SqliteDatabase } from '../config/connection';

export interface MigrationScript {
  version: number;
  description: string;
  up(db: SqliteDatabase): Promise<void>;
  down(db: SqliteDatabase): Promise<void>;
}

export interface MigrationRecord {
  version: number;
  description: string;
  applied_at: Date;
  execution_time: number;
}

export interface MigrationStats {
  currentVersion: number;
  latestVersion: number;
  pending: number[];
}

export class MigrationError extends Error {
  constructor(
    public readonly version: number,
    public readonly direction: 'up' | 'down',
    message: string,
    cause?: unknown
  ) {
    super(`Migration v${version} (${direction}) failed: ${message}`, { cause });
    this.name = 'MigrationError';
  }
}
