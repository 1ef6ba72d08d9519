import { loadConfigFromDirectory } from "./config/configLoader.utils.js";
import { createSqliteConnectionFactory } from "./db/sqlite/createSqliteConnectionFactory.js";
import { createEmployeeRepository } from "./employees/createEmployeeRepository.js";
import type { EmployeeRepository } from "./employees/EmployeeRepository.js";
import { consoleLogger } from "./logging/ConsoleStoreLogger.js";
import { silentLogger } from "./logging/SilentStoreLogger.js";
import type { StoreLogger } from "./logging/StoreLogger.js";

export interface OpenEmployeeRepositoryOptions {
  /** Logger used unless the config sets `logging.silent` (default: console) */
  logger?: StoreLogger;
}

/**
 * Load `employee-store.config.json` from `directory` and return a repository
 * on the configured database.
 *
 * @throws ConfigurationError if the config is missing or invalid
 */
export const openEmployeeRepository = (
  directory: string,
  options: OpenEmployeeRepositoryOptions = {},
): EmployeeRepository => {
  const config = loadConfigFromDirectory(directory);
  const logger =
    config.logging?.silent === true ? silentLogger : (options.logger ?? consoleLogger);

  logger.info(`Database: ${config.database.provider}`);

  return createEmployeeRepository({
    connectionFactory: createSqliteConnectionFactory(),
    connectionString: config.database.connectionString,
    logger,
  });
};
