import { ConfigurationError } from "../errors/EmployeeServiceError.js";
import type { ConnectionFactory, DbConnection } from "./DbConnection.js";

/**
 * Run `work` on a freshly opened connection and close it on every exit path.
 * When `work` (or `open`) fails, that error is rethrown even if closing fails too.
 *
 * @throws ConfigurationError if the factory yields no connection
 */
export const withConnection = async <T>(
  factory: ConnectionFactory,
  connectionString: string,
  work: (connection: DbConnection) => Promise<T>,
): Promise<T> => {
  const connection = factory.createConnection(connectionString);
  if (!connection) {
    throw new ConfigurationError(
      "Can't connect to database: the connection factory returned no connection.",
    );
  }

  let result: T;
  try {
    await connection.open();
    result = await work(connection);
  } catch (error) {
    // The operation error is the one the caller sees
    await connection.close().catch(() => undefined);
    throw error;
  }
  await connection.close();
  return result;
};
