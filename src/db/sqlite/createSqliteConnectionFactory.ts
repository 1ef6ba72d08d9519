import type Database from "better-sqlite3";
import type {
  ConnectionFactory,
  DbCommand,
  DbConnection,
  DbValue,
  ExecutionResult,
} from "../DbConnection.js";
import {
  parseSqliteConnectionString,
  type SqliteConnectionSettings,
} from "./parseSqliteConnectionString.js";
import { closeDatabase, openDatabase } from "./sqliteConnection.utils.js";
import { initializeSchema } from "./sqliteSchema.utils.js";

type SqliteValue = string | number | bigint | null;

type NamedParameters = Record<string, SqliteValue>;

/**
 * SQLite has no date type; dates are stored as ISO-8601 text.
 */
const toSqliteValue = (value: DbValue): SqliteValue =>
  value instanceof Date ? value.toISOString() : value;

const createSqliteCommand = (db: Database.Database, text: string): DbCommand => {
  const parameters: NamedParameters = {};
  let parameterCount = 0;

  return {
    text,

    addParameter(name: string, value: DbValue): void {
      // better-sqlite3 binds `:id` from the key `id`
      parameters[name.replace(/^[:@$]/, "")] = toSqliteValue(value);
      parameterCount++;
    },

    async executeReader<Row>(): Promise<Row[]> {
      if (parameterCount === 0) {
        return db.prepare<[], Row>(text).all();
      }
      return db.prepare<NamedParameters, Row>(text).all(parameters);
    },

    async executeNonQuery(): Promise<ExecutionResult> {
      const info =
        parameterCount === 0
          ? db.prepare<[]>(text).run()
          : db.prepare<NamedParameters>(text).run(parameters);
      return {
        rowsAffected: info.changes,
        lastInsertId: Number(info.lastInsertRowid),
      };
    },
  };
};

const createSqliteConnection = (
  settings: SqliteConnectionSettings,
): DbConnection => {
  let db: Database.Database | null = null;

  return {
    async open(): Promise<void> {
      if (db) {
        return;
      }

      const opened = openDatabase({
        path: settings.path,
        readonly: settings.mode === "ReadOnly",
        fileMustExist: settings.mode === "ReadWrite",
      });

      if (settings.mode === "ReadWriteCreate") {
        try {
          initializeSchema(opened);
        } catch (error) {
          closeDatabase(opened);
          throw error;
        }
      }

      db = opened;
    },

    createCommand(text: string): DbCommand {
      if (!db) {
        throw new Error("Connection is not open");
      }
      return createSqliteCommand(db, text);
    },

    async close(): Promise<void> {
      if (db) {
        closeDatabase(db);
        db = null;
      }
    },
  };
};

/**
 * Create a ConnectionFactory backed by better-sqlite3.
 *
 * Every connection opens its own handle on the database file, so an
 * in-memory data source is private to one connection.
 *
 * @returns ConnectionFactory implementation
 */
export const createSqliteConnectionFactory = (): ConnectionFactory => ({
  createConnection(connectionString: string): DbConnection {
    return createSqliteConnection(parseSqliteConnectionString(connectionString));
  },
});
