/**
 * Logging interface for the employee store.
 *
 * All output goes to stderr so that a host process keeps stdout for itself.
 *
 * @example
 * ```typescript
 * logger.success("Added employee 12");
 * logger.warn("No employee with ID 40 to update");
 * ```
 */
export interface StoreLogger {
  /**
   * Log a success message (green ✓).
   */
  success(message: string): void;

  /**
   * Log an info message (neutral).
   */
  info(message: string): void;

  /**
   * Log a warning message (yellow ⚠).
   */
  warn(message: string): void;

  /**
   * Log an error message (red ✗).
   */
  error(message: string): void;
}
