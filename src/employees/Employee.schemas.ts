import { z } from "zod";

// --- Field schemas ---

const name = z
  .string({ required_error: "is required", invalid_type_error: "must be a string" })
  .min(1, "must not be empty");

/** Absent and null both become the store's null marker */
const nullableText = z
  .string({ invalid_type_error: "must be a string" })
  .nullish()
  .transform((value) => value ?? null);

const nullableDate = z
  .date({ invalid_type_error: "must be a Date" })
  .nullish()
  .transform((value) => value ?? null);

export const EmployeeIdSchema = z
  .number({ required_error: "is required", invalid_type_error: "must be a number" })
  .int("must be an integer")
  .safe("must be a safe integer");

// --- Record schemas ---

/** Fields written by addEmployee */
export const NewEmployeeSchema = z.object({
  firstName: name,
  lastName: name,
  title: nullableText,
});

/** Full record, as read by getEmployee and written by updateEmployee */
export const EmployeeSchema = z.object({
  id: EmployeeIdSchema,
  firstName: name,
  lastName: name,
  title: nullableText,
  titleOfCourtesy: nullableText,
  birthDate: nullableDate,
  hireDate: nullableDate,
  address: nullableText,
  city: nullableText,
  region: nullableText,
  postalCode: nullableText,
  country: nullableText,
  homePhone: nullableText,
  extension: nullableText,
  notes: nullableText,
  /** Another employee's ID; not checked against the table */
  reportsTo: z
    .number({ invalid_type_error: "must be a number" })
    .int("must be an integer")
    .nullish()
    .transform((value) => value ?? null),
  photoPath: nullableText,
});

// --- Inferred Types ---

export type NewEmployee = z.input<typeof NewEmployeeSchema>;
export type EmployeeInput = z.input<typeof EmployeeSchema>;
export type Employee = z.output<typeof EmployeeSchema>;

/** Columns returned by listEmployees */
export type EmployeeSummary = Pick<Employee, "id" | "firstName" | "lastName" | "title">;
