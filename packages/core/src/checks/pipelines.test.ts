import { beforeAll, describe, it, expect, vi } from "vitest";
import { buildProviderPipeline, type CheckDependencies } from "./pipelines.js";
import { MemoryClusterClient } from "../cluster/memory.js";
import { EphemeralExecutor } from "../executor/ephemeral-executor.js";
import { checkContext } from "../pipeline/handler.js";
import { defaultPolicyRegistry } from "../policy/registry.js";
import { encodePolicyDocument } from "../policy/codec.js";
import { StageError, failedStage, rootCause } from "../internal/errors.js";
import {
  AWS_ISSUER,
  FakeAwsGateway,
  FakeAzureGateway,
  FakeDatabase,
  envConfigs,
  prepareCluster,
  urlEncoded,
} from "../../tests/helpers/fakes.js";
import { createSigningKey, fakeFetch, type SigningKey } from "../../tests/helpers/oidc.js";

const DISCOVERY = `https://${AWS_ISSUER}/.well-known/openid-configuration`;
const JWKS_URI = "https://keys.test/openid/v1/jwks";
const BOUNDARY_ARN = "arn:aws:iam::123:policy/web-identity/blue/crossplane-provider-blue-boundary";

let trusted: SigningKey;
let stranger: SigningKey;

beforeAll(async () => {
  trusted = await createSigningKey("trusted");
  stranger = await createSigningKey("stranger");
});

function awsSetup(signer: () => SigningKey = () => trusted) {
  const cluster = prepareCluster(
    new MemoryClusterClient({
      issueToken: (_ref, request) => signer().sign({ audience: request.audiences[0] ?? "" }),
    }),
  );
  cluster.addServiceAccount({ namespace: "crossplane", name: "aws-provider", annotations: {} });

  const registry = defaultPolicyRegistry();
  const gateway = new FakeAwsGateway();
  gateway.trustPolicy = urlEncoded({
    Version: "2012-10-17",
    Statement: [
      {
        Effect: "Allow",
        Principal: { Federated: `arn:aws:iam::123:oidc-provider/${AWS_ISSUER}` },
        Action: "sts:AssumeRoleWithWebIdentity",
        Condition: {
          StringLike: { [`${AWS_ISSUER}:sub`]: "system:serviceaccount:crossplane:aws-*" },
        },
      },
    ],
  });
  gateway.setDefaultPolicy(BOUNDARY_ARN, encodePolicyDocument(registry.managedPolicy("aws", "boundary")));

  const database = new FakeDatabase();
  const aws = vi.fn((_region: string) => gateway);
  const deps: CheckDependencies = {
    cluster,
    executor: new EphemeralExecutor({ cluster, pollIntervalMs: 1, timeoutMs: 500 }),
    registry,
    database,
    aws,
    azure: new FakeAzureGateway(),
    config: { TOKEN_EXPIRATION_SECONDS: 3600, GCLOUD_IMAGE: "google/cloud-sdk:slim" },
    fetch: fakeFetch({
      [DISCOVERY]: { body: { issuer: `https://${AWS_ISSUER}`, jwks_uri: JWKS_URI } },
      [JWKS_URI]: { body: { keys: [trusted.jwk] } },
    }),
  };
  return { cluster, gateway, database, aws, deps };
}

describe("buildProviderPipeline", () => {
  it.each([
    [
      "aws",
      envConfigs.aws,
      [
        "STORAGE_CLASS",
        "NODE_GROUPS",
        "DATABASE_CONFIG",
        "OIDC_ISSUER",
        "SERVICE_ACCOUNT_TOKENS",
        "JWT_VERIFICATION",
        "ROLE_POLICY",
      ],
    ],
    [
      "azure",
      envConfigs.azure,
      [
        "STORAGE_CLASS",
        "NODE_GROUPS",
        "DATABASE_CONFIG",
        "OIDC_ISSUER",
        "SERVICE_ACCOUNT_TOKENS",
        "JWT_VERIFICATION",
        "ROLE_POLICY",
      ],
    ],
    [
      "gcp",
      envConfigs.gcp,
      ["STORAGE_CLASS", "NODE_GROUPS", "DATABASE_CONFIG", "SERVICE_ACCOUNT_BINDING", "ROLE_PERMISSIONS"],
    ],
  ])("orders the %s stages", (provider, envConfig, stages) => {
    const pipeline = buildProviderPipeline(envConfig, awsSetup().deps);
    expect(pipeline.name).toBe(provider);
    expect(pipeline.stageIds).toEqual(stages);
  });

  it("builds the AWS gateway for the cluster's region", () => {
    const { aws, deps } = awsSetup();
    buildProviderPipeline(envConfigs.aws, deps);
    expect(aws).toHaveBeenCalledWith("us-west-2");
  });

  it("runs every AWS check with the issued token", async () => {
    const { gateway, database, deps } = awsSetup();

    await expect(buildProviderPipeline(envConfigs.aws, deps).handle(checkContext())).resolves.toEqual([]);
    expect(database.calls).toHaveLength(1);
    expect(gateway.assumed).toHaveLength(1);
    expect(gateway.assumed[0]?.roleArn).toBe(
      "arn:aws:iam::123:role/web-identity/blue/crossplane-provider-blue",
    );
  });

  it("stops at the first failing stage", async () => {
    const { cluster, database, deps } = awsSetup();
    cluster.storageClasses.length = 0;

    const err = await buildProviderPipeline(envConfigs.aws, deps)
      .handle(checkContext())
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StageError);
    expect(failedStage(err)).toBe("STORAGE_CLASS");
    expect(rootCause(err)).toMatchObject({ code: "NO_DEFAULT_STORAGE_CLASS" });
    expect(database.calls).toHaveLength(0);
  });

  it("labels tokens the issuer did not sign", async () => {
    const { gateway, deps } = awsSetup(() => stranger);

    const err = await buildProviderPipeline(envConfigs.aws, deps)
      .handle(checkContext())
      .catch((e: unknown) => e);
    expect(failedStage(err)).toBe("JWT_VERIFICATION");
    expect(rootCause(err)).toMatchObject({ kind: "PROTOCOL", code: "JWT_INVALID" });
    expect(gateway.assumed).toHaveLength(0);
  });
});
