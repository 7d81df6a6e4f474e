import { placeholderContextOf, type EnvConfig } from "../config/env-config.js";
import type { EngineConfig } from "../config/config.js";
import { Pipeline, type PipelineStage } from "../pipeline/pipeline.js";
import type { ClusterClient } from "../cluster/types.js";
import type { EphemeralExecutor } from "../executor/ephemeral-executor.js";
import type { PolicyRegistry } from "../policy/registry.js";
import type { FetchFn } from "../identity/http.js";
import { OidcIssuerChecker, type FederatedProvider } from "../identity/oidc.js";
import { ServiceAccountTokenIssuer } from "../identity/tokens.js";
import { JwtVerifier } from "../identity/jwt.js";
import type { AwsGateway } from "../cloud/aws.js";
import type { AzureGateway } from "../cloud/azure.js";
import { StorageClassChecker } from "./storage-class.js";
import { NodeGroupChecker } from "./node-groups.js";
import { MysqlChecker } from "./mysql.js";
import type { DatabaseVariablesReader } from "./mysql-reader.js";
import { AwsRolePolicyChecker } from "./aws-role.js";
import { AzureRoleDefinitionChecker } from "./azure-role.js";
import { ServiceAccountBindingChecker } from "./service-account-binding.js";
import { GcpRolePermissionsChecker } from "./gcp-role.js";

export const SESSION_NAME = "cluster-preflight";

export interface CheckDependencies {
  cluster: ClusterClient;
  executor: EphemeralExecutor;
  registry: PolicyRegistry;
  database: DatabaseVariablesReader;
  /** Builds the AWS gateway for the cluster's region. */
  aws: (region: string) => AwsGateway;
  azure: AzureGateway;
  config: Pick<EngineConfig, "TOKEN_EXPIRATION_SECONDS" | "GCLOUD_IMAGE">;
  fetch?: FetchFn;
}

function clusterStages(deps: CheckDependencies): PipelineStage[] {
  return [
    {
      stage: "STORAGE_CLASS",
      handler: new StorageClassChecker(deps.cluster),
      message: "checked storage class",
    },
    {
      stage: "NODE_GROUPS",
      handler: new NodeGroupChecker(deps.cluster),
      message: "checked node groups",
    },
    {
      stage: "DATABASE_CONFIG",
      handler: new MysqlChecker(deps.cluster, deps.database),
      message: "checked MySQL",
    },
  ];
}

function federationStages(
  provider: FederatedProvider,
  issuerUrl: string,
  deps: CheckDependencies,
): PipelineStage[] {
  return [
    {
      stage: "OIDC_ISSUER",
      handler: new OidcIssuerChecker({ provider, issuerUrl, fetch: deps.fetch }),
      message: "checked OIDC issuer",
    },
    {
      stage: "SERVICE_ACCOUNT_TOKENS",
      handler: new ServiceAccountTokenIssuer({
        provider,
        cluster: deps.cluster,
        expirationSeconds: deps.config.TOKEN_EXPIRATION_SECONDS,
      }),
      message: "issued ServiceAccount tokens",
    },
    {
      stage: "JWT_VERIFICATION",
      handler: new JwtVerifier({ provider, fetch: deps.fetch }),
      message: "checked JWTs",
    },
  ];
}

/** The ordered checks for the cloud the environment configuration names. */
export function buildProviderPipeline(envConfig: EnvConfig, deps: CheckDependencies): Pipeline {
  const { clusterName, cloudSpec } = envConfig.spec;
  const placeholders = placeholderContextOf(envConfig);

  switch (cloudSpec.provider) {
    case "aws":
      return new Pipeline("aws", [
        ...clusterStages(deps),
        ...federationStages("aws", cloudSpec.aws.oidcUrl, deps),
        {
          stage: "ROLE_POLICY",
          handler: new AwsRolePolicyChecker({
            gateway: deps.aws(cloudSpec.cloudZone),
            registry: deps.registry,
            placeholders,
            accountId: cloudSpec.aws.accountID,
            clusterName,
            sessionName: SESSION_NAME,
          }),
          message: "checked provider role",
        },
      ]);
    case "azure":
      return new Pipeline("azure", [
        ...clusterStages(deps),
        ...federationStages("azure", cloudSpec.azure.oidcUrl, deps),
        {
          stage: "ROLE_POLICY",
          handler: new AzureRoleDefinitionChecker({
            gateway: deps.azure,
            registry: deps.registry,
            placeholders,
            tenantId: cloudSpec.azure.tenantID,
            clientId: cloudSpec.azure.clientID,
            subscriptionId: cloudSpec.azure.subscriptionID,
            resourceGroup: cloudSpec.azure.resourceGroup,
            clusterName,
          }),
          message: "checked provider role",
        },
      ]);
    case "gcp":
      return new Pipeline("gcp", [
        ...clusterStages(deps),
        {
          stage: "SERVICE_ACCOUNT_BINDING",
          handler: new ServiceAccountBindingChecker({
            cluster: deps.cluster,
            clusterName,
            projectId: cloudSpec.gcp.projectID,
          }),
          message: "checked ServiceAccount binding",
        },
        {
          stage: "ROLE_PERMISSIONS",
          handler: new GcpRolePermissionsChecker({
            executor: deps.executor,
            registry: deps.registry,
            image: deps.config.GCLOUD_IMAGE,
          }),
          message: "checked provider role",
        },
      ]);
  }
}
