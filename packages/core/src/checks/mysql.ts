import { VerificationError } from "../internal/errors.js";
import { createChecksLogger, type Logger } from "../observability/logger.js";
import type { CheckContext, Handler, StageValue } from "../pipeline/handler.js";
import { refString, type ClusterClient, type ObjectRef } from "../cluster/types.js";
import { clusterCall } from "./cluster-call.js";
import type { DatabaseEndpoint, DatabaseVariablesReader } from "./mysql-reader.js";

export const MYSQL_CREDENTIALS_SECRET: ObjectRef = { namespace: "mysql", name: "default-creds" };

const CREDENTIAL_KEYS = ["username", "password", "endpoint", "port"] as const;

/** Server variables the platform's schema migrations rely on. */
export const EXPECTED_MYSQL_VARIABLES: Readonly<Record<string, string>> = {
  connect_timeout: "20",
  explicit_defaults_for_timestamp: "1",
  innodb_print_all_deadlocks: "1",
  lower_case_table_names: "1",
  net_read_timeout: "60",
  net_write_timeout: "120",
  require_secure_transport: "0",
  wait_timeout: "1800",
};

export class MysqlChecker implements Handler {
  private readonly log: Logger = createChecksLogger("mysql");

  constructor(
    private readonly cluster: ClusterClient,
    private readonly reader: DatabaseVariablesReader,
  ) {}

  async handle(ctx: CheckContext): Promise<StageValue[]> {
    const endpoint = await this.endpoint(ctx);
    const expected = Object.entries(EXPECTED_MYSQL_VARIABLES);
    const got = await this.reader.readVariables(
      endpoint,
      expected.map(([key]) => key),
      ctx.signal,
    );

    for (const [key, value] of expected) {
      if (got[key] !== value) {
        throw new VerificationError({
          kind: "CONFIGURATION",
          code: "DB_CONFIG_MISMATCH",
          message: `MySQL variable ${key}: expected ${value}, got ${got[key] ?? "nothing"}`,
          field: key,
          details: { key, expected: value, got: got[key] },
        });
      }
    }
    this.log.debug({ host: endpoint.host }, "MySQL variables match");
    return [];
  }

  private async endpoint(ctx: CheckContext): Promise<DatabaseEndpoint> {
    const secret = refString(MYSQL_CREDENTIALS_SECRET);
    const data = await clusterCall(ctx, `read Secret ${secret}`, () =>
      this.cluster.getSecretData(MYSQL_CREDENTIALS_SECRET),
    );
    if (!data) {
      throw VerificationError.configuration("SECRET_NOT_FOUND", `Secret ${secret} not found`, secret);
    }

    const missing = CREDENTIAL_KEYS.filter((key) => !(key in data));
    if (missing.length > 0) {
      throw new VerificationError({
        kind: "CONFIGURATION",
        code: "SECRET_KEYS_MISSING",
        message: `Secret ${secret} lacks ${missing.join(", ")}`,
        field: secret,
        details: { keys: missing },
      });
    }
    const empty = CREDENTIAL_KEYS.filter((key) => !data[key]);
    if (empty.length > 0) {
      throw new VerificationError({
        kind: "CONFIGURATION",
        code: "SECRET_KEYS_EMPTY",
        message: `Secret ${secret} has empty ${empty.join(", ")}`,
        field: secret,
        details: { keys: empty },
      });
    }

    const port = Number(data.port);
    if (!Number.isInteger(port) || port <= 0) {
      throw VerificationError.configuration(
        "SECRET_PORT_INVALID",
        `Secret ${secret} has a non-numeric port ${JSON.stringify(data.port)}`,
        `${secret}.port`,
      );
    }
    return {
      host: data.endpoint,
      port,
      user: data.username,
      password: data.password,
    };
  }
}
