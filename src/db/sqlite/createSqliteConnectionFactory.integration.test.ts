import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { DbConnection } from "../DbConnection.js";
import { getDbSchemaVersion } from "../versions.js";
import { createSqliteConnectionFactory } from "./createSqliteConnectionFactory.js";
import { closeDatabase, openDatabase } from "./sqliteConnection.utils.js";
import { dropAllTables } from "./sqliteSchema.utils.js";

describe(createSqliteConnectionFactory.name, () => {
  let dir: string;
  let dbPath: string;
  const factory = createSqliteConnectionFactory();

  const connect = async (connectionString: string): Promise<DbConnection> => {
    const connection = factory.createConnection(connectionString);
    if (!connection) {
      throw new Error("expected a connection");
    }
    await connection.open();
    return connection;
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "employee-store-sqlite-"));
    dbPath = join(dir, "nested", "employees.db");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates the file and schema in ReadWriteCreate mode", async () => {
    const connection = await connect(`Data Source=${dbPath}`);
    await connection.close();

    const db = openDatabase({ path: dbPath, fileMustExist: true });
    const table = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'Employees'",
      )
      .get();
    const version = getDbSchemaVersion(db);
    closeDatabase(db);

    expect(table).toEqual({ name: "Employees" });
    expect(version).toBe(1);
  });

  it("drops the Employees table and recreates it on the next open", async () => {
    await (await connect(dbPath)).close();

    const listTable = (db: ReturnType<typeof openDatabase>) =>
      db
        .prepare<[], { name: string }>(
          "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'Employees'",
        )
        .get();

    const db = openDatabase({ path: dbPath, fileMustExist: true });
    dropAllTables(db);
    const afterDrop = listTable(db);
    closeDatabase(db);

    await (await connect(dbPath)).close();

    const reopened = openDatabase({ path: dbPath, fileMustExist: true });
    const afterReopen = listTable(reopened);
    closeDatabase(reopened);

    expect(afterDrop).toBeUndefined();
    expect(afterReopen).toEqual({ name: "Employees" });
  });

  it("binds named parameters and stores dates as ISO text", async () => {
    const connection = await connect(dbPath);

    const insert = connection.createCommand(
      "INSERT INTO Employees (FirstName, LastName, BirthDate) VALUES (:firstName, :lastName, :birthDate)",
    );
    insert.addParameter("firstName", "Ada");
    insert.addParameter("lastName", "Byron");
    insert.addParameter("birthDate", new Date(Date.UTC(1980, 4, 17)));
    const result = await insert.executeNonQuery();

    const select = connection.createCommand(
      "SELECT FirstName, BirthDate FROM Employees WHERE EmployeeID = :id",
    );
    select.addParameter(":id", result.lastInsertId);
    const rows = await select.executeReader<{ FirstName: string; BirthDate: string }>();

    await connection.close();

    expect(result).toEqual({ rowsAffected: 1, lastInsertId: 1 });
    expect(rows).toEqual([{ FirstName: "Ada", BirthDate: "1980-05-17T00:00:00.000Z" }]);
  });

  it("runs statements without parameters", async () => {
    const connection = await connect(dbPath);

    const rows = await connection
      .createCommand("SELECT COUNT(*) AS count FROM Employees")
      .executeReader<{ count: number }>();

    await connection.close();

    expect(rows).toEqual([{ count: 0 }]);
  });

  it("shares data between connections on the same file", async () => {
    const writer = await connect(dbPath);
    const insert = writer.createCommand(
      "INSERT INTO Employees (FirstName, LastName) VALUES (:firstName, :lastName)",
    );
    insert.addParameter("firstName", "Grace");
    insert.addParameter("lastName", "Hopper");
    await insert.executeNonQuery();
    await writer.close();

    const reader = await connect(dbPath);
    const rows = await reader
      .createCommand("SELECT LastName FROM Employees")
      .executeReader<{ LastName: string }>();
    await reader.close();

    expect(rows).toEqual([{ LastName: "Hopper" }]);
  });

  it("requires an existing file in ReadWrite mode", async () => {
    const connection = factory.createConnection(`Data Source=${dbPath};Mode=ReadWrite`);

    await expect(connection?.open()).rejects.toThrow();
  });

  it("refuses writes in ReadOnly mode", async () => {
    await (await connect(dbPath)).close();

    const connection = await connect(`Data Source=${dbPath};Mode=ReadOnly`);
    const insert = connection.createCommand(
      "INSERT INTO Employees (FirstName, LastName) VALUES (:firstName, :lastName)",
    );
    insert.addParameter("firstName", "Alan");
    insert.addParameter("lastName", "Turing");

    await expect(insert.executeNonQuery()).rejects.toThrow(/readonly/);
    await connection.close();
  });

  it("refuses commands before open", () => {
    const connection = factory.createConnection(dbPath);

    expect(() => connection?.createCommand("SELECT 1")).toThrow("Connection is not open");
  });

  it("tolerates closing twice", async () => {
    const connection = await connect(dbPath);

    await connection.close();
    await expect(connection.close()).resolves.toBeUndefined();
  });
});
