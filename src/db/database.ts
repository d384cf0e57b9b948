import { existsSync, readFileSync, renameSync, writeFileSync } from "fs";
import initSqlJs from "sql.js";
import type { Database as SqlJsDatabase, SqlJsStatic } from "sql.js";
import { logger } from "../middleware/requestLogger";

export type SqlValue = string | number | null;
export type SqlParams = readonly SqlValue[];

export interface RunResult {
  changes: number;
}

/** An open SQLite database and the file it is saved to. */
export interface Database {
  readonly handle: SqlJsDatabase;
  readonly filename: string;
}

export const ID_COUNTER_NAME = "global";

const IN_MEMORY = ":memory:";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS id_counter (
    name TEXT PRIMARY KEY,
    value INTEGER NOT NULL
  );

  INSERT OR IGNORE INTO id_counter (name, value) VALUES ('${ID_COUNTER_NAME}', 0);

  CREATE TABLE IF NOT EXISTS events (
    id INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    description TEXT NOT NULL,
    date TEXT NOT NULL,
    startTime TEXT NOT NULL,
    location TEXT NOT NULL,
    createdAt TEXT NOT NULL,
    updatedAt TEXT
  );

  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    email TEXT NOT NULL,
    createdAt TEXT NOT NULL,
    updatedAt TEXT
  );

  CREATE TABLE IF NOT EXISTS tickets (
    id INTEGER PRIMARY KEY,
    eventId INTEGER NOT NULL,
    userId INTEGER NOT NULL,
    price REAL NOT NULL,
    createdAt TEXT NOT NULL,
    updatedAt TEXT
  );
`;

let sqlJs: Promise<SqlJsStatic> | undefined;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs();
  }
  return sqlJs;
}

/** Writes the whole database image to its file. In-memory databases are never saved. */
function save(db: Database) {
  if (db.filename === IN_MEMORY) {
    return;
  }

  const tmp = `${db.filename}.tmp`;
  writeFileSync(tmp, Buffer.from(db.handle.export()));
  renameSync(tmp, db.filename);
}

function isRead(sql: string): boolean {
  return /^\s*SELECT\b/i.test(sql);
}

/**
 * Opens (or creates) the SQLite file and makes sure every table exists.
 * Pass ":memory:" for a throwaway database.
 */
export async function openDatabase(filename: string): Promise<Database> {
  const SQL = await loadSqlJs();

  const handle =
    filename !== IN_MEMORY && existsSync(filename)
      ? new SQL.Database(readFileSync(filename))
      : new SQL.Database();

  const db: Database = { handle, filename };
  handle.exec(SCHEMA);
  save(db);

  logger.info("Connected to SQLite database", { filename });
  return db;
}

export async function closeDatabase(db: Database): Promise<void> {
  db.handle.close();
}

/**
 * Statements run to completion synchronously, so a caller that makes
 * several of these calls without awaiting in between sees no other writes.
 * Every write is saved to the database file before returning.
 */
export function run(db: Database, sql: string, params: SqlParams = []): RunResult {
  db.handle.run(sql, [...params]);
  const changes = db.handle.getRowsModified();
  save(db);
  return { changes };
}

/** First row of the result, or undefined. Works for `… RETURNING` writes too. */
export function get(db: Database, sql: string, params: SqlParams = []): unknown {
  const statement = db.handle.prepare(sql, [...params]);
  try {
    return statement.step() ? statement.getAsObject() : undefined;
  } finally {
    statement.free();
    if (!isRead(sql)) save(db);
  }
}

export function all(db: Database, sql: string, params: SqlParams = []): unknown[] {
  const statement = db.handle.prepare(sql, [...params]);
  try {
    const rows: unknown[] = [];
    while (statement.step()) {
      rows.push(statement.getAsObject());
    }
    return rows;
  } finally {
    statement.free();
  }
}
