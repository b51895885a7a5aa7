import Database from 'better-sqlite3';
import { join } from 'path';
import { readFileSync } from 'fs';
import logger from '../config/logger';
import { DATABASE } from '../config/constants';

export type SqliteDatabase = Database.Database;

export interface OpenDatabaseOptions {
  /** Defaults to CONVERSATION_DB_PATH; use ':memory:' for an ephemeral store */
  filename?: string;
  busyTimeoutMs?: number;
}

const log = logger.child({ service: 'database' });

const SCHEMA_PATH = join(__dirname, 'schema.sql');

let cachedSchema: string | undefined;

const loadSchema = (): string => {
  if (cachedSchema === undefined) {
    cachedSchema = readFileSync(SCHEMA_PATH, 'utf-8');
  }
  return cachedSchema;
};

/**
 * Open a connection and make sure the schema exists.
 * The caller owns the connection and must close it.
 */
export const openDatabase = (options: OpenDatabaseOptions = {}): SqliteDatabase => {
  const filename = options.filename ?? DATABASE.PATH;
  const busyTimeoutMs = options.busyTimeoutMs ?? DATABASE.BUSY_TIMEOUT_MS;

  log.info({ filename }, 'Opening conversation database');

  const db = new Database(filename);

  try {
    if (filename !== DATABASE.IN_MEMORY) {
      db.pragma('journal_mode = WAL'); // concurrent readers alongside one writer
    }
    db.pragma('foreign_keys = ON'); // required for ON DELETE CASCADE
    db.pragma(`busy_timeout = ${Math.trunc(busyTimeoutMs)}`);

    db.exec(loadSchema());
  } catch (error) {
    log.error({ error, filename }, 'Failed to initialize database schema');
    db.close();
    throw error;
  }

  log.debug({ filename }, 'Database schema ready');
  return db;
};

/**
 * Run `fn` against a freshly opened connection and close it on every exit path
 */
export const withDatabase = <T>(fn: (db: SqliteDatabase) => T, options: OpenDatabaseOptions = {}): T => {
  const db = openDatabase(options);
  try {
    return fn(db);
  } finally {
    db.close();
  }
};

/**
 * Run `fn` in an IMMEDIATE transaction: the write lock is taken up front, so
 * read-then-write sequences are serialized against writers in other processes.
 * Nested calls become savepoints of the outer transaction.
 */
export const runImmediate = <T>(db: SqliteDatabase, fn: () => T): T => {
  return db.transaction(fn).immediate();
};
