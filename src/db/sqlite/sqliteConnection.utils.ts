import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export interface SqliteConnectionOptions {
  /** Path to the database file. Use ':memory:' for in-memory database. */
  path: string;
  /** Open without write access (default: false) */
  readonly?: boolean;
  /** Fail instead of creating a missing file (default: false) */
  fileMustExist?: boolean;
}

/**
 * Open or create a SQLite database connection.
 *
 * @param options - Connection options
 * @returns Open database instance
 */
export const openDatabase = (
  options: SqliteConnectionOptions,
): Database.Database => {
  const { path, readonly = false, fileMustExist = false } = options;

  // Ensure parent directory exists when the file may be created
  if (path !== ":memory:" && !readonly && !fileMustExist) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(path, { readonly, fileMustExist });

  if (!readonly) {
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
  }

  return db;
};

/**
 * Close the database connection.
 *
 * @param db - Database instance to close
 */
export const closeDatabase = (db: Database.Database): void => {
  db.close();
};
