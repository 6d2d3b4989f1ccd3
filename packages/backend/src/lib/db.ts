import { readFileSync, readdirSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import Database, { type RunResult } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import * as schema from '../db/schema.js';
import { getConfig } from './config/app.js';

const MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations/', import.meta.url));

/**
 * Anything that can run queries: the database itself or an open transaction.
 */
export type DbExecutor = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;

/**
 * Apply every bootstrap script in migrations/ in file-name order.
 * The scripts are idempotent (CREATE ... IF NOT EXISTS).
 */
export function applySchema(connection: Database.Database): void {
  const files = readdirSync(MIGRATIONS_DIR)
    .filter((file) => file.endsWith('.sql'))
    .sort();

  for (const file of files) {
    connection.exec(readFileSync(`${MIGRATIONS_DIR}${file}`, 'utf8'));
  }
}

function openConnection(path: string): Database.Database {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }
  const connection = new Database(path);
  connection.pragma('journal_mode = WAL');
  connection.pragma('foreign_keys = ON');
  applySchema(connection);
  return connection;
}

export const sqlite = openConnection(getConfig().databasePath);

export const db = drizzle(sqlite, { schema });

export function closeDatabase(): void {
  if (sqlite.open) {
    sqlite.close();
  }
}

const UNIQUE_VIOLATIONS = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);

/**
 * True when a write failed on a UNIQUE or PRIMARY KEY constraint.
 */
export function isUniqueViolation(error: unknown): error is Database.SqliteError {
  return error instanceof Database.SqliteError && UNIQUE_VIOLATIONS.has(error.code);
}
