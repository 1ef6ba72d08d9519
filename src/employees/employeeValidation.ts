import type { z } from "zod";
import { ValidationError } from "../errors/EmployeeServiceError.js";
import {
  type Employee,
  EmployeeIdSchema,
  EmployeeSchema,
  NewEmployeeSchema,
} from "./Employee.schemas.js";

type ValidNewEmployee = z.output<typeof NewEmployeeSchema>;

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")} ${issue.message}` : issue.message,
    )
    .join("; ");

/**
 * Any integer is a valid lookup key, zero and negatives included.
 *
 * @throws ValidationError unless `value` is a safe integer
 */
export const parseEmployeeId = (value: unknown): number => {
  const result = EmployeeIdSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid employee ID: ${formatIssues(result.error)}`);
  }
  return result.data;
};

/**
 * @throws ValidationError on a null argument or a malformed record
 */
export const parseNewEmployee = (value: unknown): ValidNewEmployee => {
  if (value == null) {
    throw new ValidationError("Employee cannot be null.");
  }
  const result = NewEmployeeSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid employee: ${formatIssues(result.error)}`);
  }
  return result.data;
};

/**
 * @throws ValidationError on a null argument or a malformed record
 */
export const parseEmployee = (value: unknown): Employee => {
  if (value == null) {
    throw new ValidationError("Employee cannot be null.");
  }
  const result = EmployeeSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid employee: ${formatIssues(result.error)}`);
  }
  return result.data;
};
