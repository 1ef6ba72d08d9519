import type Database from "better-sqlite3";
import { setDbSchemaVersion } from "../versions.js";

/**
 * SQLite schema for the employee store.
 *
 * Column names follow the Northwind `Employees` table. Dates are ISO-8601
 * text. `ReportsTo` points at another employee but carries no foreign key,
 * since better-sqlite3 enforces foreign keys by default.
 */

const EMPLOYEES_TABLE = `
CREATE TABLE IF NOT EXISTS Employees (
  EmployeeID INTEGER PRIMARY KEY AUTOINCREMENT,
  LastName TEXT NOT NULL,
  FirstName TEXT NOT NULL,
  Title TEXT,
  TitleOfCourtesy TEXT,
  BirthDate TEXT,
  HireDate TEXT,
  Address TEXT,
  City TEXT,
  Region TEXT,
  PostalCode TEXT,
  Country TEXT,
  HomePhone TEXT,
  Extension TEXT,
  Notes TEXT,
  ReportsTo INTEGER,
  PhotoPath TEXT
)`;

const INDEXES = [
  "CREATE INDEX IF NOT EXISTS idx_employees_last_name ON Employees(LastName)",
  "CREATE INDEX IF NOT EXISTS idx_employees_postal_code ON Employees(PostalCode)",
];

/**
 * Initialize the schema on a database connection.
 * Creates the table and indexes if they don't exist.
 *
 * @param db - better-sqlite3 database instance
 */
export const initializeSchema = (db: Database.Database): void => {
  setDbSchemaVersion(db);

  db.exec(EMPLOYEES_TABLE);

  for (const indexSql of INDEXES) {
    db.exec(indexSql);
  }
};

/**
 * Drop all tables.
 *
 * @param db - better-sqlite3 database instance
 */
export const dropAllTables = (db: Database.Database): void => {
  db.exec("DROP TABLE IF EXISTS Employees");
};
