import type Database from "better-sqlite3";

/**
 * DB schema version - bump when the Employees table changes.
 */
export const DB_SCHEMA_VERSION = 1;

/**
 * Set the DB schema version in the SQLite user_version pragma.
 * Called by initializeSchema() before creating tables.
 */
export const setDbSchemaVersion = (db: Database.Database): void => {
  db.pragma(`user_version = ${DB_SCHEMA_VERSION}`);
};

/**
 * Read the schema version stored in the database (0 for a fresh file).
 */
export const getDbSchemaVersion = (db: Database.Database): number => {
  const version = db.pragma("user_version", { simple: true });
  return typeof version === "number" ? version : 0;
};
