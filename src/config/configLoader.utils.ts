import { existsSync, readFileSync } from "node:fs";
import { dirname, isAbsolute, join, resolve } from "node:path";
import {
  formatSqliteConnectionString,
  parseSqliteConnectionString,
} from "../db/sqlite/parseSqliteConnectionString.js";
import { ConfigurationError } from "../errors/EmployeeServiceError.js";
import { type StoreConfig, StoreConfigSchema } from "./Config.schemas.js";

/**
 * Supported config file name.
 */
export const CONFIG_FILE_NAME = "employee-store.config.json" as const;

/**
 * Find a config file in the given directory.
 *
 * @param directory - Directory to search in
 * @returns Path to config file, or null if not found
 */
export const findConfigFile = (directory: string): string | null => {
  const configPath = join(directory, CONFIG_FILE_NAME);
  return existsSync(configPath) ? configPath : null;
};

/**
 * Parse and validate config content.
 * Pure function - unit tested.
 *
 * @param content - Raw JSON string from config file
 * @returns Validated store config
 * @throws ConfigurationError if JSON is invalid or config structure is invalid
 */
export const parseConfig = (content: string): StoreConfig => {
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch (e) {
    throw new ConfigurationError("Invalid JSON", { cause: e });
  }

  const result = StoreConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid config: ${issues}`);
  }
  return result.data;
};

/**
 * Make a relative SQLite data source absolute, relative to `baseDirectory`.
 * `:memory:` and absolute paths are kept as they are.
 */
export const resolveDataSource = (
  config: StoreConfig,
  baseDirectory: string,
): StoreConfig => {
  const settings = parseSqliteConnectionString(config.database.connectionString);
  if (settings.path === ":memory:" || isAbsolute(settings.path)) {
    return config;
  }

  return {
    ...config,
    database: {
      ...config.database,
      connectionString: formatSqliteConnectionString({
        ...settings,
        path: resolve(baseDirectory, settings.path),
      }),
    },
  };
};

/**
 * Load and validate a JSON config file.
 * Thin I/O wrapper around parseConfig; resolves the data source against
 * the config file's directory.
 */
export const loadConfig = (configPath: string): StoreConfig => {
  if (!existsSync(configPath)) {
    throw new ConfigurationError(`Config file not found: ${configPath}`);
  }

  let config: StoreConfig;
  try {
    config = parseConfig(readFileSync(configPath, "utf-8"));
  } catch (e) {
    if (e instanceof ConfigurationError && e.message === "Invalid JSON") {
      throw new ConfigurationError(`Failed to parse JSON config: ${configPath}`, {
        cause: e,
      });
    }
    throw e;
  }

  return resolveDataSource(config, dirname(configPath));
};

/**
 * Load config from a directory, auto-detecting the config file.
 *
 * @param directory - Directory to search for config
 * @returns Validated store config
 * @throws ConfigurationError if no config file found or config is invalid
 */
export const loadConfigFromDirectory = (directory: string): StoreConfig => {
  const configPath = findConfigFile(directory);
  if (!configPath) {
    throw new ConfigurationError(`No config file found in: ${directory}`);
  }
  return loadConfig(configPath);
};
