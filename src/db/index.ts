/**
 * Database - SQLite (sql.js WASM) for local persistence
 *
 * In-memory WASM database that saves to ~/.marketsync/marketsync.db after
 * each mutation (or once per transaction). Creates a backup on startup.
 */

import initSqlJs, { type Database as SqlJsDatabase, type SqlValue } from 'sql.js';
import { join } from 'path';
import { mkdirSync, existsSync, readFileSync, writeFileSync, renameSync, readdirSync, statSync, unlinkSync } from 'fs';
import { createLogger } from '../utils/logger';
import { resolveStateDir } from '../utils/config';
import { SCHEMA_SQL } from './schema';

const logger = createLogger('db');

/** Values accepted as SQL parameters. Booleans bind as 0/1, undefined as NULL. */
export type SqlParam = string | number | boolean | null | undefined;

/** A result row, column name to value. */
export type Row = Record<string, SqlValue>;

// ---------------------------------------------------------------------------
// Database interface
// ---------------------------------------------------------------------------

export interface Database {
  close(): void;
  save(): void;

  /** Execute a statement; returns the number of rows it modified. */
  run(sql: string, params?: SqlParam[]): number;
  query(sql: string, params?: SqlParam[]): Row[];
  get(sql: string, params?: SqlParam[]): Row | undefined;

  /**
   * Run `fn` inside BEGIN/COMMIT. Rolls back and rethrows on error.
   * Nested calls join the outer transaction.
   */
  transaction<T>(fn: () => T): T;
}

// ---------------------------------------------------------------------------
// Module-level state
// ---------------------------------------------------------------------------

let dbInstance: Database | null = null;
let dbInitPromise: Promise<Database> | null = null;

function toBindValues(params: SqlParam[]): SqlValue[] {
  return params.map((value) => {
    if (value === undefined) return null;
    if (typeof value === 'boolean') return value ? 1 : 0;
    return value;
  });
}

/**
 * Wrap a sql.js handle in the Database interface. `persist` runs after every
 * committed mutation; pass null for a purely in-memory database.
 */
function wrapDatabase(db: SqlJsDatabase, persist: (() => void) | null, onClose: () => void): Database {
  let transactionDepth = 0;

  function persistIfIdle(): void {
    if (persist && transactionDepth === 0) persist();
  }

  const instance: Database = {
    close() {
      persist?.();
      db.close();
      onClose();
    },

    save() {
      persist?.();
    },

    run(sql: string, params: SqlParam[] = []): number {
      db.run(sql, toBindValues(params));
      const modified = db.getRowsModified();
      persistIfIdle();
      return modified;
    },

    query(sql: string, params: SqlParam[] = []): Row[] {
      const stmt = db.prepare(sql);
      try {
        stmt.bind(toBindValues(params));
        const results: Row[] = [];
        while (stmt.step()) {
          results.push(stmt.getAsObject());
        }
        return results;
      } finally {
        stmt.free();
      }
    },

    get(sql: string, params: SqlParam[] = []): Row | undefined {
      const stmt = db.prepare(sql);
      try {
        stmt.bind(toBindValues(params));
        return stmt.step() ? stmt.getAsObject() : undefined;
      } finally {
        stmt.free();
      }
    },

    transaction<T>(fn: () => T): T {
      if (transactionDepth > 0) {
        return fn();
      }
      db.run('BEGIN');
      transactionDepth = 1;
      try {
        const result = fn();
        db.run('COMMIT');
        transactionDepth = 0;
        persistIfIdle();
        return result;
      } catch (err) {
        transactionDepth = 0;
        db.run('ROLLBACK');
        throw err;
      }
    },
  };

  return instance;
}

// ---------------------------------------------------------------------------
// createDatabase (disk-backed singleton)
// ---------------------------------------------------------------------------

/**
 * Open the on-disk database, create tables, and return a Database handle.
 * Calling multiple times returns the same singleton.
 */
export async function createDatabase(stateDir = resolveStateDir()): Promise<Database> {
  if (dbInstance) return dbInstance;
  if (dbInitPromise) return dbInitPromise;

  const dbFile = join(stateDir, 'marketsync.db');
  const backupDir = join(stateDir, 'backups');

  dbInitPromise = (async () => {
    if (!existsSync(stateDir)) {
      mkdirSync(stateDir, { recursive: true });
    }

    logger.info({ file: dbFile }, 'Opening database');

    const SQL = await initSqlJs();
    const sqlDb = existsSync(dbFile) ? new SQL.Database(readFileSync(dbFile)) : new SQL.Database();

    sqlDb.run(SCHEMA_SQL);

    function saveDb(): void {
      const tmpPath = dbFile + '.tmp';
      writeFileSync(tmpPath, Buffer.from(sqlDb.export()));
      renameSync(tmpPath, dbFile);
    }

    function pruneBackups(maxFiles: number): void {
      const files = readdirSync(backupDir)
        .filter((name) => name.endsWith('.db'))
        .map((name) => ({ name, path: join(backupDir, name), mtimeMs: statSync(join(backupDir, name)).mtimeMs }))
        .sort((a, b) => b.mtimeMs - a.mtimeMs);
      for (const file of files.slice(maxFiles)) {
        try {
          unlinkSync(file.path);
        } catch (error) {
          logger.warn({ error, file: file.name }, 'Failed to delete old backup');
        }
      }
    }

    if (existsSync(dbFile)) {
      try {
        if (!existsSync(backupDir)) mkdirSync(backupDir, { recursive: true });
        const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
        writeFileSync(join(backupDir, `marketsync-${timestamp}.db`), Buffer.from(sqlDb.export()));
        pruneBackups(Math.max(1, Number.parseInt(process.env.MARKETSYNC_DB_BACKUP_MAX || '10', 10)));
        logger.info('Created startup backup');
      } catch (err) {
        logger.warn({ err }, 'Failed to create startup backup');
      }
    }

    saveDb();

    const instance = wrapDatabase(sqlDb, saveDb, () => {
      dbInstance = null;
      dbInitPromise = null;
    });
    dbInstance = instance;
    return instance;
  })();

  return dbInitPromise;
}

/**
 * A fresh database with the full schema that never touches disk.
 */
export async function createInMemoryDatabase(): Promise<Database> {
  const SQL = await initSqlJs();
  const sqlDb = new SQL.Database();
  sqlDb.run(SCHEMA_SQL);
  return wrapDatabase(sqlDb, null, () => undefined);
}
