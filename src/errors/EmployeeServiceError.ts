/**
 * Base class for every error the employee store surfaces to callers.
 */
export class EmployeeServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmployeeServiceError";
  }
}

/**
 * Missing or unusable connection settings: no factory, a blank connection
 * string, a factory that yields no connection, or an invalid config file.
 */
export class ConfigurationError extends EmployeeServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/**
 * An argument was rejected before touching the store.
 */
export class ValidationError extends EmployeeServiceError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends EmployeeServiceError {
  constructor(
    message: string,
    public readonly employeeId: number,
  ) {
    super(message);
    this.name = "NotFoundError";
  }
}

/**
 * Wraps a driver failure raised while opening a connection or executing a
 * statement. The driver error is kept as `cause`.
 */
export class PersistenceError extends EmployeeServiceError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "PersistenceError";
  }
}
