import { describe, it, expect, vi, beforeEach } from "vitest";

const mysql = vi.hoisted(() => {
  const variables: Record<string, string | number> = {};
  const connection = {
    query: vi.fn(async (sql: string) => {
      const name = /^SELECT @@(\w+) AS value$/.exec(sql)?.[1] ?? "";
      return [[{ value: variables[name] }], []];
    }),
    end: vi.fn(async () => undefined),
    destroy: vi.fn(),
  };
  return { variables, connection, createConnection: vi.fn(async () => connection) };
});

vi.mock("mysql2/promise", () => ({ createConnection: mysql.createConnection }));

import { Mysql2VariablesReader } from "./mysql-reader.js";

const endpoint = { host: "mysql.internal", port: 3306, user: "admin", password: "test-password" };
const signal = () => new AbortController().signal;

describe("Mysql2VariablesReader", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    for (const key of Object.keys(mysql.variables)) delete mysql.variables[key];
  });

  it("reads each variable as a string and closes the connection", async () => {
    Object.assign(mysql.variables, { wait_timeout: 1800, require_secure_transport: "OFF" });

    const values = await new Mysql2VariablesReader(5000).readVariables(
      endpoint,
      ["wait_timeout", "require_secure_transport"],
      signal(),
    );

    expect(values).toEqual({ wait_timeout: "1800", require_secure_transport: "OFF" });
    expect(mysql.createConnection).toHaveBeenCalledWith({
      host: "mysql.internal",
      port: 3306,
      user: "admin",
      password: "test-password",
      connectTimeout: 5000,
    });
    expect(mysql.connection.query).toHaveBeenCalledWith("SELECT @@wait_timeout AS value");
    expect(mysql.connection.end).toHaveBeenCalledTimes(1);
  });

  it("reports an unreachable server", async () => {
    mysql.createConnection.mockRejectedValueOnce(new Error("connect ETIMEDOUT"));

    await expect(
      new Mysql2VariablesReader(5000).readVariables(endpoint, ["wait_timeout"], signal()),
    ).rejects.toMatchObject({
      kind: "INFRASTRUCTURE",
      code: "DB_UNREACHABLE",
      message: "cannot connect to MySQL at mysql.internal:3306: connect ETIMEDOUT",
    });
  });

  it("refuses variable names that are not identifiers", async () => {
    await expect(
      new Mysql2VariablesReader(5000).readVariables(endpoint, ["x; DROP TABLE t"], signal()),
    ).rejects.toMatchObject({ code: "DB_QUERY_FAILED" });
    expect(mysql.connection.query).not.toHaveBeenCalled();
    expect(mysql.connection.end).toHaveBeenCalledTimes(1);
  });

  it("destroys the connection when ending it fails", async () => {
    mysql.connection.end.mockRejectedValueOnce(new Error("socket closed"));
    mysql.variables.wait_timeout = "1800";

    await new Mysql2VariablesReader(5000).readVariables(endpoint, ["wait_timeout"], signal());
    expect(mysql.connection.destroy).toHaveBeenCalledTimes(1);
  });
});
