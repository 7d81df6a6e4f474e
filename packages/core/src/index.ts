export { loadConfig, type EngineConfig } from "./config/config.js";
export {
  decodeEnvConfig,
  encodeEnvConfig,
  parseEnvConfig,
  placeholderContextOf,
  type CloudProvider,
  type EnvConfig,
} from "./config/env-config.js";
export {
  CleanupError,
  ContractError,
  PermissionMismatchError,
  StageError,
  VerificationError,
  failedStage,
  isVerificationError,
  rootCause,
  type VerificationErrorKind,
} from "./internal/errors.js";
export { logger, createChildLogger, type Logger } from "./observability/logger.js";
export {
  STAGE_IDS,
  checkContext,
  expectValue,
  type CheckContext,
  type Handler,
  type StageId,
  type StageValue,
} from "./pipeline/handler.js";
export { Pipeline, type PipelineStage } from "./pipeline/pipeline.js";
export { decodePolicyDocument, decodeUrlEncodedPolicyDocument, encodePolicyDocument } from "./policy/codec.js";
export { diff, formatChange } from "./policy/diff.js";
export { PolicyEquivalenceEngine, equivalent, missingActions } from "./policy/equivalence.js";
export { materialize, substitute } from "./policy/placeholders.js";
export { PolicyRegistry, defaultPolicyRegistry } from "./policy/registry.js";
export type { ChangeRecord, EquivalenceResult, PermissionDocument, PlaceholderContext } from "./policy/types.js";
export { OidcIssuerChecker, discoveryUrl, isValidIssuer } from "./identity/oidc.js";
export { ServiceAccountTokenIssuer } from "./identity/tokens.js";
export { JwtVerifier } from "./identity/jwt.js";
export type { FetchFn } from "./identity/http.js";
export type { ClusterClient } from "./cluster/types.js";
export { KubeClusterClient } from "./cluster/kube.js";
export { MemoryClusterClient } from "./cluster/memory.js";
export { EphemeralExecutor, type EphemeralJob, type JobOutcome } from "./executor/ephemeral-executor.js";
export { ResourceLifecycleManager, type ScaffoldingPlan } from "./lifecycle/resource-lifecycle.js";
export { InClusterCheckLauncher, scaffoldingPlan } from "./lifecycle/in-cluster-launcher.js";
export { SdkAwsGateway, type AwsGateway } from "./cloud/aws.js";
export { SdkAzureGateway, type AzureGateway } from "./cloud/azure.js";
export { buildProviderPipeline, type CheckDependencies } from "./checks/pipelines.js";
export {
  runInstallationChecks,
  type InstallationCheckOptions,
  type InstallationCheckReport,
} from "./checks/run.js";
