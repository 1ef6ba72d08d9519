import { ConfigurationError } from "../../errors/EmployeeServiceError.js";

/**
 * How a SQLite connection opens its file.
 * - ReadOnly: no writes, file must exist
 * - ReadWrite: file must exist
 * - ReadWriteCreate: file and schema are created when missing
 */
export type SqliteOpenMode = "ReadOnly" | "ReadWrite" | "ReadWriteCreate";

export interface SqliteConnectionSettings {
  path: string;
  mode: SqliteOpenMode;
}

const DATA_SOURCE_KEYWORDS = new Set(["data source", "datasource", "filename"]);

const OPEN_MODES = new Map<string, SqliteOpenMode>([
  ["readonly", "ReadOnly"],
  ["readwrite", "ReadWrite"],
  ["readwritecreate", "ReadWriteCreate"],
]);

/**
 * Parse a SQLite connection string.
 *
 * Accepts a bare path (`./data/employees.db`, `:memory:`) or keyword pairs
 * separated by semicolons (`Data Source=./data/employees.db;Mode=ReadOnly`).
 * Keywords are case-insensitive.
 *
 * @throws ConfigurationError on a blank string, an unknown keyword or mode,
 * or a missing data source
 */
export const parseSqliteConnectionString = (
  connectionString: string,
): SqliteConnectionSettings => {
  const trimmed = connectionString.trim();
  if (trimmed.length === 0) {
    throw new ConfigurationError(
      "Connection string cannot be empty or contain only white-space characters.",
    );
  }

  if (!trimmed.includes("=")) {
    return { path: trimmed, mode: "ReadWriteCreate" };
  }

  let path: string | undefined;
  let mode: SqliteOpenMode = "ReadWriteCreate";

  for (const segment of trimmed.split(";")) {
    if (segment.trim().length === 0) {
      continue;
    }

    const separator = segment.indexOf("=");
    if (separator < 0) {
      throw new ConfigurationError(
        `Malformed connection string segment: "${segment.trim()}"`,
      );
    }

    const keyword = segment.slice(0, separator).trim();
    const value = segment.slice(separator + 1).trim();

    if (DATA_SOURCE_KEYWORDS.has(keyword.toLowerCase())) {
      path = value;
    } else if (keyword.toLowerCase() === "mode") {
      const parsed = OPEN_MODES.get(value.toLowerCase());
      if (!parsed) {
        throw new ConfigurationError(`Unsupported SQLite open mode: "${value}"`);
      }
      mode = parsed;
    } else {
      throw new ConfigurationError(
        `Unsupported connection string keyword: "${keyword}"`,
      );
    }
  }

  if (!path) {
    throw new ConfigurationError("Connection string has no Data Source.");
  }

  if (path === ":memory:" && mode === "ReadOnly") {
    throw new ConfigurationError("An in-memory database cannot be opened read-only.");
  }

  return { path, mode };
};

/**
 * Inverse of parseSqliteConnectionString, in keyword form.
 */
export const formatSqliteConnectionString = (
  settings: SqliteConnectionSettings,
): string => `Data Source=${settings.path};Mode=${settings.mode}`;
