/**
 * @fileoverview Shared SQLite connection for the document and trace stores.
 *
 * One database file per data directory, opened in WAL mode and guarded by a
 * proper-lockfile process lock so two sourcewise processes never write the
 * same file. `:memory:` databases skip the lock.
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import lockfile from 'proper-lockfile';
import { StorageError, type StorageOperation } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { applyMigrations } from './migrations.js';

export const DATABASE_FILENAME = 'sourcewise.sqlite';
export const IN_MEMORY_DATABASE = ':memory:';

/** A lock not refreshed for this long is treated as left behind by a crashed process. */
const LOCK_STALE_TIMEOUT_MS = 10 * 60_000;
const LOCK_UPDATE_INTERVAL_MS = 60_000;
const LOCK_MAX_RETRIES = 5;

export function resolveDatabasePath(dataDir: string): string {
  return path.resolve(dataDir, DATABASE_FILENAME);
}

export class SqliteDatabase {
  private db: Database.Database | null;
  private releaseLock: (() => Promise<void>) | null;
  private lockCompromisedError: Error | null = null;

  private constructor(
    readonly dbPath: string,
    db: Database.Database,
    releaseLock: (() => Promise<void>) | null,
  ) {
    this.db = db;
    this.releaseLock = releaseLock;
  }

  static async open(dbPath: string): Promise<SqliteDatabase> {
    if (dbPath === IN_MEMORY_DATABASE) {
      return new SqliteDatabase(dbPath, SqliteDatabase.connect(dbPath), null);
    }

    const lockPath = `${dbPath}.lock`;
    let releaseLock: (() => Promise<void>) | null = null;
    let instance: SqliteDatabase | null = null;
    try {
      await fs.mkdir(path.dirname(dbPath), { recursive: true });
      await fs.writeFile(dbPath, '', { flag: 'a' });
    } catch (error) {
      throw new StorageError('open', false, `cannot create ${dbPath}: ${getErrorMessage(error)}`, toError(error));
    }

    try {
      // Without onCompromised, proper-lockfile throws from a timer and takes
      // the process down.
      releaseLock = await lockfile.lock(dbPath, {
        lockfilePath: lockPath,
        stale: LOCK_STALE_TIMEOUT_MS,
        update: LOCK_UPDATE_INTERVAL_MS,
        onCompromised: (err) => {
          logWarning('SQLite lock compromised; treating storage as unsafe', { path: lockPath, error: err.message });
          instance?.markCompromised(err);
        },
        retries: {
          retries: LOCK_MAX_RETRIES,
          factor: 1.5,
          minTimeout: 100,
          maxTimeout: 2_000,
        },
      });
    } catch (error) {
      throw new StorageError('lock', true, `${dbPath} is in use by another process: ${getErrorMessage(error)}`, toError(error));
    }

    try {
      instance = new SqliteDatabase(dbPath, SqliteDatabase.connect(dbPath), releaseLock);
      return instance;
    } catch (error) {
      await releaseLock().catch((lockError: unknown) => {
        logWarning('Failed to release lock during open cleanup', { path: lockPath, error: getErrorMessage(lockError) });
      });
      throw error;
    }
  }

  private static connect(dbPath: string): Database.Database {
    let db: Database.Database;
    try {
      db = new Database(dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.pragma('foreign_keys = ON');
      db.pragma('busy_timeout = 5000');
    } catch (error) {
      throw new StorageError('open', false, getErrorMessage(error), toError(error));
    }

    try {
      const report = applyMigrations(db);
      if (report.applied.length > 0) {
        logDebug('Applied schema migrations', { path: dbPath, applied: report.applied });
      }
    } catch (error) {
      db.close();
      throw new StorageError('migrate', false, getErrorMessage(error), toError(error));
    }
    return db;
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  /**
   * Run `fn` against the live connection, mapping driver exceptions to
   * StorageError for the given operation.
   */
  use<T>(operation: StorageOperation, fn: (db: Database.Database) => T): T {
    if (this.lockCompromisedError) {
      throw new StorageError('lock', false, `lock on ${this.dbPath} was compromised`, this.lockCompromisedError);
    }
    const db = this.db;
    if (!db) {
      throw new StorageError(operation, false, `${this.dbPath} is closed`);
    }
    try {
      return fn(db);
    } catch (error) {
      if (error instanceof StorageError) throw error;
      // SQLITE_BUSY clears once the other writer finishes.
      const busy = error instanceof Error && 'code' in error && error.code === 'SQLITE_BUSY';
      throw new StorageError(operation, busy, getErrorMessage(error), toError(error));
    }
  }

  async close(): Promise<void> {
    try {
      this.db?.close();
    } finally {
      this.db = null;
      const release = this.releaseLock;
      this.releaseLock = null;
      if (release) {
        await release().catch((lockError: unknown) => {
          logWarning('Failed to release lock during close', { path: this.dbPath, error: getErrorMessage(lockError) });
        });
      }
    }
  }

  private markCompromised(error: Error): void {
    this.lockCompromisedError = error;
    try {
      this.db?.close();
    } catch (closeError) {
      logWarning('Failed to close DB after lock compromise', { path: this.dbPath, error: getErrorMessage(closeError) });
    }
    this.db = null;
    this.releaseLock = null;
  }
}
