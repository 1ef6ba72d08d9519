/**
 * Statements run against the Employees table.
 * Every caller-supplied value is a named placeholder; none is ever spliced into the text.
 */

export const SELECT_EMPLOYEES_SQL =
  "SELECT EmployeeID, FirstName, LastName, Title FROM Employees";

export const SELECT_EMPLOYEE_SQL =
  "SELECT EmployeeID, FirstName, LastName, Title, TitleOfCourtesy, BirthDate, HireDate, Address, City, Region, PostalCode, Country, HomePhone, Extension, Notes, ReportsTo, PhotoPath FROM Employees WHERE EmployeeID = :id";

export const INSERT_EMPLOYEE_SQL =
  "INSERT INTO Employees (FirstName, LastName, Title) VALUES (:firstName, :lastName, :title)";

export const DELETE_EMPLOYEE_SQL = "DELETE FROM Employees WHERE EmployeeID = :id";

export const UPDATE_EMPLOYEE_SQL =
  "UPDATE Employees SET FirstName=:firstName, LastName=:lastName, Title=:title, TitleOfCourtesy=:titleOfCourtesy, BirthDate=:birthDate, HireDate=:hireDate, Address=:address, City=:city, Region=:region, PostalCode=:postalCode, Country=:country, HomePhone=:homePhone, Extension=:extension, Notes=:notes, ReportsTo=:reportsTo, PhotoPath=:photoPath WHERE EmployeeID=:id";
