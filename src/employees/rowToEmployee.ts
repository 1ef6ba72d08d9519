import type { Employee, EmployeeSummary } from "./Employee.schemas.js";

export interface EmployeeSummaryRow {
  EmployeeID: number;
  FirstName: string;
  LastName: string;
  Title: string | null;
}

/**
 * Row shape of the full-record lookup.
 * Dates arrive as ISO text from SQLite; other providers may hand back Date.
 */
export interface EmployeeRow extends EmployeeSummaryRow {
  TitleOfCourtesy: string | null;
  BirthDate: string | Date | null;
  HireDate: string | Date | null;
  Address: string | null;
  City: string | null;
  Region: string | null;
  PostalCode: string | null;
  Country: string | null;
  HomePhone: string | null;
  Extension: string | null;
  Notes: string | null;
  ReportsTo: number | null;
  PhotoPath: string | null;
}

/** `YYYY-MM-DD HH:MM[:SS[.fff]]` with no zone, as SQLite's own date functions write it */
const ZONELESS_DATETIME = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

/**
 * Stored text is ISO-8601. Zoneless date-times are read as UTC.
 *
 * @throws Error if the text is not a date
 */
export const parseStoredDate = (text: string): Date => {
  const match = ZONELESS_DATETIME.exec(text);
  const date = new Date(match ? `${match[1]}T${match[2]}Z` : text);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Unreadable date value: "${text}"`);
  }
  return date;
};

const toDate = (value: string | Date | null): Date | null => {
  if (value === null || value instanceof Date) {
    return value;
  }
  return parseStoredDate(value);
};

export const rowToEmployeeSummary = (row: EmployeeSummaryRow): EmployeeSummary => ({
  id: row.EmployeeID,
  firstName: row.FirstName,
  lastName: row.LastName,
  title: row.Title,
});

export const rowToEmployee = (row: EmployeeRow): Employee => ({
  ...rowToEmployeeSummary(row),
  titleOfCourtesy: row.TitleOfCourtesy,
  birthDate: toDate(row.BirthDate),
  hireDate: toDate(row.HireDate),
  address: row.Address,
  city: row.City,
  region: row.Region,
  postalCode: row.PostalCode,
  country: row.Country,
  homePhone: row.HomePhone,
  extension: row.Extension,
  notes: row.Notes,
  reportsTo: row.ReportsTo,
  photoPath: row.PhotoPath,
});
