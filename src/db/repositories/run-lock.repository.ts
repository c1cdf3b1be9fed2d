import { DatabaseConnectionManager } from '../config/connection';
import { RunLease, RunLock } from '../types/repository';
import { Logger, createModuleLogger } from '../../system/logging/logger';

interface RunLockRow {
  name: string;
  owner: string;
  acquired_at: string;
  expires_at: string;
}

export interface RunLockOptions {
  /** Lock row name; one row per independent run kind */
  name?: string;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Run lease backed by the `run_lock` table. Claims happen inside BEGIN IMMEDIATE,
 * so two processes on the same database file cannot both win.
 */
export class RunLockRepository implements RunLock {
  private name: string;
  private now: () => Date;
  private logger: Logger;

  constructor(private readonly connection: DatabaseConnectionManager, options: RunLockOptions = {}) {
    this.name = options.name ?? 'delivery';
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createModuleLogger('db.run-lock');
  }

  public async acquire(owner: string, ttlMs: number): Promise<boolean> {
    return this.connection.withTransaction(async db => {
      const now = this.now();
      const row = await db.get<RunLockRow>(`SELECT * FROM run_lock WHERE name = ?`, this.name);

      if (row && row.owner !== owner) {
        if (new Date(row.expires_at).getTime() > now.getTime()) {
          this.logger.info('Run lock held by another owner', { owner: row.owner, expiresAt: row.expires_at }, 'acquire');
          return false;
        }
        this.logger.warn('Taking over expired run lock', { previousOwner: row.owner, expiredAt: row.expires_at }, 'acquire');
      }

      await db.run(
        `INSERT INTO run_lock (name, owner, acquired_at, expires_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(name) DO UPDATE SET
           owner = excluded.owner,
           acquired_at = excluded.acquired_at,
           expires_at = excluded.expires_at`,
        this.name,
        owner,
        now.toISOString(),
        new Date(now.getTime() + ttlMs).toISOString()
      );
      this.logger.debug('Run lock acquired', { owner, ttlMs }, 'acquire');
      return true;
    });
  }

  public async release(owner: string): Promise<void> {
    const db = await this.connection.getConnection();
    const result = await db.run(`DELETE FROM run_lock WHERE name = ? AND owner = ?`, this.name, owner);
    if ((result.changes ?? 0) > 0) {
      this.logger.debug('Run lock released', { owner }, 'release');
    }
  }

  public async holder(): Promise<RunLease | null> {
    const db = await this.connection.getConnection();
    const row = await db.get<RunLockRow>(`SELECT * FROM run_lock WHERE name = ?`, this.name);
    if (!row || new Date(row.expires_at).getTime() <= this.now().getTime()) {
      return null;
    }
    return {
      owner: row.owner,
      acquiredAt: new Date(row.acquired_at),
      expiresAt: new Date(row.expires_at)
    };
  }
}
