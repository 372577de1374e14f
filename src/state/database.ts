/**
 * SQLite database for run history
 * Uses sql.js for cross-platform compatibility (pure JS, no native compilation)
 */

import initSqlJs, { Database as SqlJsDatabase, SqlValue } from 'sql.js';
import * as fs from 'fs';
import * as path from 'path';
import { env } from '../lib/env';
import { logger } from '../lib/logger';

let db: SqlJsDatabase | null = null;
let dbPath: string = env.DB_PATH;

const SCHEMA = `
-- One row per refresh invocation
CREATE TABLE IF NOT EXISTS refresh_runs (
  run_id TEXT PRIMARY KEY,
  database_name TEXT NOT NULL,
  source_instance TEXT NOT NULL,
  destination_instance TEXT NOT NULL,
  array_endpoint TEXT NOT NULL,
  dry_run INTEGER NOT NULL DEFAULT 0,
  started_at INTEGER NOT NULL,
  completed_at INTEGER,
  status TEXT NOT NULL,
  final_state TEXT,
  destination_outcome TEXT,
  failed_step TEXT,
  error_message TEXT,
  overwrite_ms INTEGER,
  total_ms INTEGER
);

CREATE INDEX IF NOT EXISTS idx_refresh_runs_started ON refresh_runs(started_at);
CREATE INDEX IF NOT EXISTS idx_refresh_runs_destination ON refresh_runs(destination_instance, database_name);
`;

export async function initDatabase(filePath: string = env.DB_PATH): Promise<SqlJsDatabase> {
  if (db) return db;

  dbPath = filePath;
  logger.debug(`Initializing history database at ${dbPath}`);

  // Initialize SQL.js
  const SQL = await initSqlJs();

  // Load existing database if it exists
  const dbDir = path.dirname(dbPath);
  if (!fs.existsSync(dbDir)) {
    fs.mkdirSync(dbDir, { recursive: true });
  }

  const database = fs.existsSync(dbPath) ? new SQL.Database(fs.readFileSync(dbPath)) : new SQL.Database();

  // Initialize schema
  database.run(SCHEMA);
  db = database;

  // Save immediately to ensure file exists
  saveDatabase();

  return database;
}

export function getDatabase(): SqlJsDatabase {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

export function saveDatabase(): void {
  if (db) {
    const data = db.export();
    fs.writeFileSync(dbPath, Buffer.from(data));
  }
}

export function closeDatabase(): void {
  if (db) {
    saveDatabase();
    db.close();
    db = null;
    logger.debug('History database closed');
  }
}

export type Row = Record<string, SqlValue>;
export type Param = SqlValue | undefined;

// Helper class to provide better-sqlite3 compatible API
export class DatabaseWrapper {
  private db: SqlJsDatabase;

  constructor(database: SqlJsDatabase) {
    this.db = database;
  }

  prepare(sql: string): StatementWrapper {
    return new StatementWrapper(this.db, sql);
  }
}

export class StatementWrapper {
  private db: SqlJsDatabase;
  private sql: string;

  constructor(db: SqlJsDatabase, sql: string) {
    this.db = db;
    this.sql = sql;
  }

  // Convert undefined to null for sql.js compatibility
  private sanitizeParams(params: Param[]): SqlValue[] {
    return params.map((p) => (p === undefined ? null : p));
  }

  run(...params: Param[]): { changes: number } {
    this.db.run(this.sql, this.sanitizeParams(params));
    const changes = this.db.getRowsModified();
    saveDatabase();
    return { changes };
  }

  get(...params: Param[]): Row | undefined {
    const stmt = this.db.prepare(this.sql);
    try {
      stmt.bind(this.sanitizeParams(params));
      return stmt.step() ? stmt.getAsObject() : undefined;
    } finally {
      stmt.free();
    }
  }

  all(...params: Param[]): Row[] {
    const results: Row[] = [];
    const stmt = this.db.prepare(this.sql);
    try {
      stmt.bind(this.sanitizeParams(params));
      while (stmt.step()) {
        results.push(stmt.getAsObject());
      }
    } finally {
      stmt.free();
    }
    return results;
  }
}
