import { DatabaseConnectionManager } from '../config/connection';
import { MigrationError, MigrationRecord, MigrationScript, MigrationStats } from '../types/migration';
import { migrations as bundledMigrations } from './scripts';
import { Logger, createModuleLogger } from '../../system/logging/logger';
import { toErrorMessage } from '../../system/error-handling';

const MIGRATION_TABLE = 'schema_migrations';

interface MigrationRow {
  version: number;
  description: string;
  applied_at: string;
  execution_time: number;
}

/**
 * Applies versioned schema migrations, each in its own transaction.
 */
export class MigrationManager {
  private migrations: MigrationScript[];
  private logger: Logger;

  constructor(
    private readonly connection: DatabaseConnectionManager,
    options: { migrations?: MigrationScript[]; logger?: Logger } = {}
  ) {
    this.migrations = [...(options.migrations ?? bundledMigrations)].sort((a, b) => a.version - b.version);
    this.logger = options.logger ?? createModuleLogger('migrations');
  }

  /**
   * Apply every pending migration. Returns the versions applied.
   */
  public async migrate(): Promise<number[]> {
    await this.ensureMigrationTable();
    const applied = new Set((await this.getAppliedMigrations()).map(record => record.version));
    const done: number[] = [];

    for (const migration of this.migrations) {
      if (applied.has(migration.version)) {
        continue;
      }
      await this.execute(migration, 'up');
      done.push(migration.version);
    }

    if (done.length > 0) {
      this.logger.info('Migrations applied', { versions: done }, 'migrate');
    }
    return done;
  }

  /**
   * Roll back every applied migration above `targetVersion`, newest first.
   */
  public async rollback(targetVersion: number): Promise<number[]> {
    await this.ensureMigrationTable();
    const applied = new Set((await this.getAppliedMigrations()).map(record => record.version));
    const rolledBack: number[] = [];

    for (const migration of [...this.migrations].reverse()) {
      if (migration.version > targetVersion && applied.has(migration.version)) {
        await this.execute(migration, 'down');
        rolledBack.push(migration.version);
      }
    }
    return rolledBack;
  }

  public async getAppliedMigrations(): Promise<MigrationRecord[]> {
    await this.ensureMigrationTable();
    const db = await this.connection.getConnection();
    const rows = await db.all<MigrationRow[]>(`SELECT * FROM ${MIGRATION_TABLE} ORDER BY version`);
    return rows.map(row => ({
      version: row.version,
      description: row.description,
      applied_at: new Date(row.applied_at),
      execution_time: row.execution_time
    }));
  }

  public async getStats(): Promise<MigrationStats> {
    const applied = new Set((await this.getAppliedMigrations()).map(record => record.version));
    const versions = this.migrations.map(migration => migration.version);
    return {
      currentVersion: Math.max(0, ...Array.from(applied)),
      latestVersion: Math.max(0, ...versions),
      pending: versions.filter(version => !applied.has(version))
    };
  }

  private async ensureMigrationTable(): Promise<void> {
    const db = await this.connection.getConnection();
    await db.run(`
      CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
        version INTEGER PRIMARY KEY,
        description TEXT NOT NULL,
        applied_at DATETIME NOT NULL,
        execution_time INTEGER NOT NULL
      )
    `);
  }

  private async execute(migration: MigrationScript, direction: 'up' | 'down'): Promise<void> {
    const startTime = Date.now();
    try {
      await this.connection.withTransaction(async db => {
        if (direction === 'up') {
          await migration.up(db);
          await db.run(
            `INSERT INTO ${MIGRATION_TABLE} (version, description, applied_at, execution_time) VALUES (?, ?, ?, ?)`,
            migration.version,
            migration.description,
            new Date().toISOString(),
            Date.now() - startTime
          );
        } else {
          await migration.down(db);
          await db.run(`DELETE FROM ${MIGRATION_TABLE} WHERE version = ?`, migration.version);
        }
      });
      this.logger.debug(`Migration v${migration.version} ${direction}`, { description: migration.description }, 'execute');
    } catch (error) {
      throw new MigrationError(migration.version, direction, toErrorMessage(error), error);
    }
  }
}
