import type {
  Employee,
  EmployeeInput,
  EmployeeSummary,
  NewEmployee,
} from "./Employee.schemas.js";

/**
 * CRUD access to the Employees table.
 *
 * Each call acquires its own connection and releases it before returning,
 * whether the call succeeds or fails.
 */
export interface EmployeeRepository {
  /**
   * List every employee with its ID, name and title.
   * Order is whatever the store returns.
   */
  listEmployees(): Promise<EmployeeSummary[]>;

  /**
   * Get a single employee with the full column set.
   *
   * @param id - Employee ID
   * @throws NotFoundError if no employee has this ID
   * @throws ValidationError if the ID is not an integer
   */
  getEmployee(id: number): Promise<Employee>;

  /**
   * Insert first name, last name and title.
   *
   * @returns The ID generated by the store
   * @throws ValidationError if the employee is null or malformed
   * @throws PersistenceError if the insert fails
   */
  addEmployee(employee: NewEmployee | null): Promise<number>;

  /**
   * Delete an employee. Idempotent (no error if the ID is unknown).
   *
   * @param id - Employee ID
   * @throws PersistenceError if the delete fails
   */
  removeEmployee(id: number): Promise<void>;

  /**
   * Overwrite every mutable field of an existing employee.
   * Omitted nullable fields are stored as NULL.
   *
   * @throws ValidationError if the employee is null or malformed
   * @throws NotFoundError if no row was updated
   */
  updateEmployee(employee: EmployeeInput | null): Promise<void>;
}
