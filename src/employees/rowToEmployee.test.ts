import { describe, expect, it } from "vitest";
import {
  type EmployeeRow,
  parseStoredDate,
  rowToEmployee,
  rowToEmployeeSummary,
} from "./rowToEmployee.js";

const row = (overrides?: Partial<EmployeeRow>): EmployeeRow => ({
  EmployeeID: 7,
  FirstName: "Margaret",
  LastName: "Hamilton",
  Title: "Engineer",
  TitleOfCourtesy: "Ms.",
  BirthDate: "1936-08-17T00:00:00.000Z",
  HireDate: null,
  Address: "1 Main Street",
  City: "Paoli",
  Region: "IN",
  PostalCode: "47454",
  Country: "USA",
  HomePhone: "555-0100",
  Extension: "42",
  Notes: null,
  ReportsTo: 2,
  PhotoPath: null,
  ...overrides,
});

describe(rowToEmployeeSummary.name, () => {
  it("maps the listing columns", () => {
    expect(
      rowToEmployeeSummary({ EmployeeID: 3, FirstName: "Ada", LastName: "Byron", Title: null }),
    ).toEqual({ id: 3, firstName: "Ada", lastName: "Byron", title: null });
  });
});

describe(rowToEmployee.name, () => {
  it("maps every column", () => {
    expect(rowToEmployee(row())).toEqual({
      id: 7,
      firstName: "Margaret",
      lastName: "Hamilton",
      title: "Engineer",
      titleOfCourtesy: "Ms.",
      birthDate: new Date(Date.UTC(1936, 7, 17)),
      hireDate: null,
      address: "1 Main Street",
      city: "Paoli",
      region: "IN",
      postalCode: "47454",
      country: "USA",
      homePhone: "555-0100",
      extension: "42",
      notes: null,
      reportsTo: 2,
      photoPath: null,
    });
  });

  it("keeps Date values handed back by the driver", () => {
    const hired = new Date(Date.UTC(1959, 0, 1));

    expect(rowToEmployee(row({ HireDate: hired })).hireDate).toEqual(hired);
  });

  it("rejects an unreadable stored date", () => {
    expect(() => rowToEmployee(row({ BirthDate: "sometime in 1936" }))).toThrow(
      'Unreadable date value: "sometime in 1936"',
    );
  });

  it("keeps nulls as null", () => {
    const employee = rowToEmployee(row({ Title: null, ReportsTo: null, BirthDate: null }));

    expect(employee.title).toBeNull();
    expect(employee.reportsTo).toBeNull();
    expect(employee.birthDate).toBeNull();
  });
});

describe(parseStoredDate.name, () => {
  it("reads ISO text with a zone", () => {
    expect(parseStoredDate("1936-08-17T00:00:00.000Z")).toEqual(new Date(Date.UTC(1936, 7, 17)));
  });

  it("reads zoneless date-times as UTC", () => {
    expect(parseStoredDate("1948-12-08 00:00:00")).toEqual(new Date(Date.UTC(1948, 11, 8)));
    expect(parseStoredDate("1992-05-01 09:30")).toEqual(
      new Date(Date.UTC(1992, 4, 1, 9, 30)),
    );
    expect(parseStoredDate("1992-05-01T09:30:15.250")).toEqual(
      new Date(Date.UTC(1992, 4, 1, 9, 30, 15, 250)),
    );
  });

  it("reads a bare date as UTC midnight", () => {
    expect(parseStoredDate("1994-11-15")).toEqual(new Date(Date.UTC(1994, 10, 15)));
  });

  it("rejects text that is not a date", () => {
    expect(() => parseStoredDate("not a date")).toThrow('Unreadable date value: "not a date"');
  });
});
