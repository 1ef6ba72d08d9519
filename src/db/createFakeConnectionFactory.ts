import type {
  ConnectionFactory,
  DbCommand,
  DbConnection,
  DbValue,
  ExecutionResult,
} from "./DbConnection.js";

export interface RecordedCommand {
  text: string;
  parameters: Record<string, DbValue>;
}

/**
 * Create a fake connection factory for testing.
 *
 * Delegates to `inner` (usually the SQLite factory on a temporary file) and
 * records every command with its bound parameters. Failures can be injected
 * at open, execution or close time.
 *
 * @example
 * const commands: RecordedCommand[] = [];
 * const factory = createFakeConnectionFactory({
 *   inner: createSqliteConnectionFactory(),
 *   onCommand: (command) => commands.push(command),
 * });
 */
export const createFakeConnectionFactory = (options: {
  inner: ConnectionFactory;
  /** Return null instead of a connection */
  yieldNoConnection?: boolean;
  /** Thrown by open() */
  openError?: Error;
  /** Thrown by executeReader() and executeNonQuery() */
  executionError?: Error;
  /** Thrown by close(), after the inner connection is released */
  closeError?: Error;
  /** Callback invoked with each command once it executes */
  onCommand?: (command: RecordedCommand) => void;
  /** Callback invoked each time a connection is closed */
  onClose?: () => void;
}): ConnectionFactory => {
  const {
    inner,
    yieldNoConnection,
    openError,
    executionError,
    closeError,
    onCommand,
    onClose,
  } = options;

  const wrapCommand = (command: DbCommand): DbCommand => {
    const parameters: Record<string, DbValue> = {};

    const record = (): void => {
      onCommand?.({ text: command.text, parameters: { ...parameters } });
      if (executionError) {
        throw executionError;
      }
    };

    return {
      text: command.text,

      addParameter(name: string, value: DbValue): void {
        parameters[name] = value;
        command.addParameter(name, value);
      },

      async executeReader<Row>(): Promise<Row[]> {
        record();
        return command.executeReader<Row>();
      },

      async executeNonQuery(): Promise<ExecutionResult> {
        record();
        return command.executeNonQuery();
      },
    };
  };

  const wrapConnection = (connection: DbConnection): DbConnection => ({
    async open(): Promise<void> {
      if (openError) {
        throw openError;
      }
      await connection.open();
    },

    createCommand(text: string): DbCommand {
      return wrapCommand(connection.createCommand(text));
    },

    async close(): Promise<void> {
      onClose?.();
      await connection.close();
      if (closeError) {
        throw closeError;
      }
    },
  });

  return {
    createConnection(connectionString: string): DbConnection | null {
      if (yieldNoConnection) {
        return null;
      }
      const connection = inner.createConnection(connectionString);
      return connection ? wrapConnection(connection) : null;
    },
  };
};
