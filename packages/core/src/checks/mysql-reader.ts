import { createConnection, type Connection, type RowDataPacket } from "mysql2/promise";
import { VerificationError, errorMessage } from "../internal/errors.js";

export interface DatabaseEndpoint {
  host: string;
  port: number;
  user: string;
  password: string;
}

/** Reads server variables (`SELECT @@name`) as strings. */
export interface DatabaseVariablesReader {
  readVariables(
    endpoint: DatabaseEndpoint,
    names: readonly string[],
    signal: AbortSignal,
  ): Promise<Record<string, string>>;
}

const VARIABLE_NAME = /^[a-z_]+$/;

export class Mysql2VariablesReader implements DatabaseVariablesReader {
  constructor(private readonly connectTimeoutMs: number) {}

  async readVariables(
    endpoint: DatabaseEndpoint,
    names: readonly string[],
    signal: AbortSignal,
  ): Promise<Record<string, string>> {
    signal.throwIfAborted();
    let connection: Connection;
    try {
      connection = await createConnection({
        host: endpoint.host,
        port: endpoint.port,
        user: endpoint.user,
        password: endpoint.password,
        connectTimeout: this.connectTimeoutMs,
      });
    } catch (err) {
      throw VerificationError.infrastructure(
        "DB_UNREACHABLE",
        `cannot connect to MySQL at ${endpoint.host}:${endpoint.port}: ${errorMessage(err)}`,
        err,
      );
    }

    const onAbort = () => connection.destroy();
    signal.addEventListener("abort", onAbort, { once: true });
    try {
      const values: Record<string, string> = {};
      for (const name of names) {
        signal.throwIfAborted();
        if (!VARIABLE_NAME.test(name)) throw new Error(`invalid server variable name ${name}`);
        const [rows] = await connection.query<RowDataPacket[]>(`SELECT @@${name} AS value`);
        values[name] = String(rows[0]?.value);
      }
      return values;
    } catch (err) {
      signal.throwIfAborted();
      throw VerificationError.infrastructure(
        "DB_QUERY_FAILED",
        `reading MySQL server variables failed: ${errorMessage(err)}`,
        err,
      );
    } finally {
      signal.removeEventListener("abort", onAbort);
      await connection.end().catch(() => connection.destroy());
    }
  }
}
