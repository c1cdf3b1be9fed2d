import fs from 'fs';
import path from 'path';
import sqlite3 from 'sqlite3';
import { Database, open } from 'sqlite';
import { Logger, createModuleLogger } from '../../system/logging/logger';
import { toErrorMessage } from '../../system/error-handling';

export type SqliteDatabase = Database<sqlite3.Database, sqlite3.Statement>;

export const MEMORY_DATABASE = ':memory:';

/**
 * Connection status
 */
export interface ConnectionStatus {
  isConnected: boolean;
  filename: string;
  lastError: string | null;
  lastActivity: Date | null;
  transactionsCommitted: number;
  transactionsRolledBack: number;
}

export interface ConnectionOptions {
  filename: string;
  busyTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Owns the single SQLite connection shared by the repositories.
 *
 * Transactions are serialized through an internal lock because every caller
 * shares the same connection.
 */
export class DatabaseConnectionManager {
  private db: SqliteDatabase | null = null;
  private opening: Promise<SqliteDatabase> | null = null;
  private transactionLock: Promise<void> = Promise.resolve();
  private options: Required<Omit<ConnectionOptions, 'logger'>>;
  private logger: Logger;
  private status: ConnectionStatus;

  constructor(options: ConnectionOptions) {
    this.options = {
      busyTimeoutMs: 5000,
      ...options
    };
    this.logger = options.logger ?? createModuleLogger('db');
    this.status = {
      isConnected: false,
      filename: options.filename,
      lastError: null,
      lastActivity: null,
      transactionsCommitted: 0,
      transactionsRolledBack: 0
    };
  }

  /**
   * Open on first use
   */
  public async getConnection(): Promise<SqliteDatabase> {
    if (this.db) {
      return this.db;
    }
    if (!this.opening) {
      this.opening = this.openConnection().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  /**
   * Run `operation` inside BEGIN IMMEDIATE / COMMIT, rolling back on error
   */
  public async withTransaction<T>(operation: (db: SqliteDatabase) => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const previous = this.transactionLock;
    this.transactionLock = previous.then(() => current);
    await previous;

    try {
      const db = await this.getConnection();
      await db.run('BEGIN IMMEDIATE TRANSACTION');
      try {
        const result = await operation(db);
        await db.run('COMMIT');
        this.updateStatus({ transactionsCommitted: this.status.transactionsCommitted + 1 });
        return result;
      } catch (error) {
        await db.run('ROLLBACK');
        this.updateStatus({ transactionsRolledBack: this.status.transactionsRolledBack + 1 });
        throw error;
      }
    } finally {
      release();
    }
  }

  public async healthCheck(): Promise<boolean> {
    try {
      const db = await this.getConnection();
      const result = await db.get<{ health_check: number }>('SELECT 1 as health_check');
      this.updateStatus({ isConnected: true, lastError: null });
      return result?.health_check === 1;
    } catch (error) {
      this.updateStatus({ isConnected: false, lastError: toErrorMessage(error) });
      this.logger.warn('Database health check failed', { error: toErrorMessage(error) }, 'healthCheck');
      return false;
    }
  }

  public async close(): Promise<void> {
    const db = this.db;
    this.db = null;
    if (db) {
      await db.close();
      this.updateStatus({ isConnected: false });
      this.logger.debug('Database connection closed', { filename: this.options.filename }, 'close');
    }
  }

  public getStatus(): ConnectionStatus {
    return { ...this.status };
  }

  private async openConnection(): Promise<SqliteDatabase> {
    const filename = this.options.filename;
    try {
      if (filename !== MEMORY_DATABASE) {
        fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
      }

      const db = await open({
        filename,
        driver: sqlite3.Database,
        mode: sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE
      });

      if (filename !== MEMORY_DATABASE) {
        await db.run('PRAGMA journal_mode = WAL');
        await db.run('PRAGMA synchronous = NORMAL');
      }
      await db.run('PRAGMA foreign_keys = ON');
      await db.run(`PRAGMA busy_timeout = ${Math.floor(this.options.busyTimeoutMs)}`);

      this.db = db;
      this.updateStatus({ isConnected: true, lastError: null });
      this.logger.debug('Database connection opened', { filename }, 'open');
      return db;
    } catch (error) {
      this.updateStatus({ isConnected: false, lastError: toErrorMessage(error) });
      throw error;
    }
  }

  private updateStatus(updates: Partial<ConnectionStatus>): void {
    this.status = { ...this.status, ...updates, lastActivity: new Date() };
  }
}
