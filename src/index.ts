export type {
  Employee,
  EmployeeInput,
  EmployeeSummary,
  NewEmployee,
} from "./employees/Employee.schemas.js";
export {
  EmployeeIdSchema,
  EmployeeSchema,
  NewEmployeeSchema,
} from "./employees/Employee.schemas.js";
export type { EmployeeRepository } from "./employees/EmployeeRepository.js";
export {
  createEmployeeRepository,
  type EmployeeRepositoryOptions,
} from "./employees/createEmployeeRepository.js";
export type {
  ConnectionFactory,
  DbCommand,
  DbConnection,
  DbValue,
  ExecutionResult,
} from "./db/DbConnection.js";
export { createSqliteConnectionFactory } from "./db/sqlite/createSqliteConnectionFactory.js";
export {
  formatSqliteConnectionString,
  parseSqliteConnectionString,
  type SqliteConnectionSettings,
  type SqliteOpenMode,
} from "./db/sqlite/parseSqliteConnectionString.js";
export { dropAllTables, initializeSchema } from "./db/sqlite/sqliteSchema.utils.js";
export {
  ConfigurationError,
  EmployeeServiceError,
  NotFoundError,
  PersistenceError,
  ValidationError,
} from "./errors/EmployeeServiceError.js";
export type { StoreConfig } from "./config/Config.schemas.js";
export {
  CONFIG_FILE_NAME,
  loadConfig,
  loadConfigFromDirectory,
  parseConfig,
} from "./config/configLoader.utils.js";
export { openEmployeeRepository, type OpenEmployeeRepositoryOptions } from "./openEmployeeRepository.js";
export type { StoreLogger } from "./logging/StoreLogger.js";
export { consoleLogger, createConsoleStoreLogger } from "./logging/ConsoleStoreLogger.js";
export { silentLogger } from "./logging/SilentStoreLogger.js";
