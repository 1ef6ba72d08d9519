/**
 * Value that can be bound to a statement parameter.
 * `null` is the store's null marker; providers decide how `Date` is encoded.
 */
export type DbValue = string | number | bigint | Date | null;

/**
 * Outcome of a statement that does not return rows.
 */
export interface ExecutionResult {
  /** Rows inserted, updated or deleted */
  rowsAffected: number;
  /** Row id generated by the last insert, or null when the provider has none */
  lastInsertId: number | null;
}

/**
 * A single SQL statement with its bound parameters.
 */
export interface DbCommand {
  readonly text: string;

  /**
   * Bind a value to a named placeholder.
   * The name is given without its prefix: `addParameter("id", 5)` binds `:id`.
   */
  addParameter(name: string, value: DbValue): void;

  /**
   * Run a query and return every row.
   */
  executeReader<Row>(): Promise<Row[]>;

  /**
   * Run an insert, update or delete.
   */
  executeNonQuery(): Promise<ExecutionResult>;
}

/**
 * A connection to the relational store.
 * Used by: EmployeeRepository (one connection per operation)
 */
export interface DbConnection {
  /**
   * Open the underlying connection. Must be called before `createCommand`.
   *
   * @throws Error if the store cannot be reached
   */
  open(): Promise<void>;

  /**
   * Create a command for the given statement text.
   * Values are never part of the text; bind them with `addParameter`.
   */
  createCommand(text: string): DbCommand;

  /**
   * Release the connection. Safe to call on a connection that never opened.
   */
  close(): Promise<void>;
}

/**
 * Produces connections from a provider-specific connection string.
 */
export interface ConnectionFactory {
  /**
   * @param connectionString - Provider-specific connection string
   * @returns A closed connection, or null when the provider cannot create one
   */
  createConnection(connectionString: string): DbConnection | null;
}
