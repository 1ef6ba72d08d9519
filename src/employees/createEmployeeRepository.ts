import type {
  ConnectionFactory,
  DbCommand,
  DbConnection,
  DbValue,
} from "../db/DbConnection.js";
import { withConnection } from "../db/withConnection.js";
import {
  ConfigurationError,
  EmployeeServiceError,
  NotFoundError,
  PersistenceError,
} from "../errors/EmployeeServiceError.js";
import { silentLogger } from "../logging/SilentStoreLogger.js";
import type { StoreLogger } from "../logging/StoreLogger.js";
import type { EmployeeRepository } from "./EmployeeRepository.js";
import {
  DELETE_EMPLOYEE_SQL,
  INSERT_EMPLOYEE_SQL,
  SELECT_EMPLOYEE_SQL,
  SELECT_EMPLOYEES_SQL,
  UPDATE_EMPLOYEE_SQL,
} from "./employeeSql.js";
import {
  parseEmployee,
  parseEmployeeId,
  parseNewEmployee,
} from "./employeeValidation.js";
import {
  type EmployeeRow,
  type EmployeeSummaryRow,
  rowToEmployee,
  rowToEmployeeSummary,
} from "./rowToEmployee.js";

export interface EmployeeRepositoryOptions {
  /** Produces one connection per operation */
  connectionFactory: ConnectionFactory | null;
  /** Passed to the factory unchanged */
  connectionString: string | null;
  /** Defaults to the silent logger */
  logger?: StoreLogger;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const bindParameters = (
  command: DbCommand,
  values: Record<string, DbValue>,
): void => {
  for (const [name, value] of Object.entries(values)) {
    command.addParameter(name, value);
  }
};

/**
 * Create an EmployeeRepository over the given connection factory.
 *
 * @throws ConfigurationError if the factory is missing or the connection
 * string is blank
 */
export const createEmployeeRepository = (
  options: EmployeeRepositoryOptions,
): EmployeeRepository => {
  const { logger = silentLogger } = options;

  if (!options.connectionFactory) {
    throw new ConfigurationError("Connection factory cannot be null.");
  }
  if (!options.connectionString || options.connectionString.trim().length === 0) {
    throw new ConfigurationError(
      "Connection string cannot be empty or contain only white-space characters.",
    );
  }

  const connectionFactory: ConnectionFactory = options.connectionFactory;
  const connectionString: string = options.connectionString;

  /**
   * Driver failures become PersistenceError; service errors pass through.
   */
  const run = async <T>(
    action: string,
    work: (connection: DbConnection) => Promise<T>,
  ): Promise<T> => {
    try {
      return await withConnection(connectionFactory, connectionString, work);
    } catch (error) {
      if (error instanceof EmployeeServiceError) {
        throw error;
      }
      logger.error(`Failed ${action}: ${describeError(error)}`);
      throw new PersistenceError(`An error occurred while ${action}.`, error);
    }
  };

  return {
    async listEmployees() {
      return run("listing employees", async (connection) => {
        const command = connection.createCommand(SELECT_EMPLOYEES_SQL);
        const rows = await command.executeReader<EmployeeSummaryRow>();
        return rows.map(rowToEmployeeSummary);
      });
    },

    async getEmployee(id) {
      const employeeId = parseEmployeeId(id);

      return run(`reading employee ${employeeId}`, async (connection) => {
        const command = connection.createCommand(SELECT_EMPLOYEE_SQL);
        command.addParameter("id", employeeId);

        const rows = await command.executeReader<EmployeeRow>();
        const row = rows[0];
        if (row === undefined) {
          throw new NotFoundError(`Employee with ID ${employeeId} not found.`, employeeId);
        }
        return rowToEmployee(row);
      });
    },

    async addEmployee(employee) {
      const input = parseNewEmployee(employee);

      const id = await run("adding the employee", async (connection) => {
        const command = connection.createCommand(INSERT_EMPLOYEE_SQL);
        bindParameters(command, {
          firstName: input.firstName,
          lastName: input.lastName,
          title: input.title,
        });

        const { lastInsertId } = await command.executeNonQuery();
        if (lastInsertId === null) {
          throw new PersistenceError("The store did not report the generated employee ID.");
        }
        return lastInsertId;
      });

      logger.success(`Added employee ${id}`);
      return id;
    },

    async removeEmployee(id) {
      const employeeId = parseEmployeeId(id);

      const rowsAffected = await run("removing the employee", async (connection) => {
        const command = connection.createCommand(DELETE_EMPLOYEE_SQL);
        command.addParameter("id", employeeId);

        const result = await command.executeNonQuery();
        return result.rowsAffected;
      });

      if (rowsAffected > 0) {
        logger.success(`Removed employee ${employeeId}`);
      }
    },

    async updateEmployee(employee) {
      const input = parseEmployee(employee);

      const rowsAffected = await run("updating the employee", async (connection) => {
        const command = connection.createCommand(UPDATE_EMPLOYEE_SQL);
        bindParameters(command, {
          id: input.id,
          firstName: input.firstName,
          lastName: input.lastName,
          title: input.title,
          titleOfCourtesy: input.titleOfCourtesy,
          birthDate: input.birthDate,
          hireDate: input.hireDate,
          address: input.address,
          city: input.city,
          region: input.region,
          postalCode: input.postalCode,
          country: input.country,
          homePhone: input.homePhone,
          extension: input.extension,
          notes: input.notes,
          reportsTo: input.reportsTo,
          photoPath: input.photoPath,
        });

        const result = await command.executeNonQuery();
        return result.rowsAffected;
      });

      if (rowsAffected === 0) {
        logger.warn(`No employee with ID ${input.id} to update`);
        throw new NotFoundError(`Employee with ID ${input.id} not found.`, input.id);
      }

      logger.success(`Updated employee ${input.id}`);
    },
  };
};
