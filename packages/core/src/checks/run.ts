import { loadConfig, type EngineConfig } from "../config/config.js";
import { decodeEnvConfig, parseEnvConfig, type EnvConfig } from "../config/env-config.js";
import { createChecksLogger } from "../observability/logger.js";
import { checkContext, type StageId } from "../pipeline/handler.js";
import { KubeClusterClient } from "../cluster/kube.js";
import { EphemeralExecutor } from "../executor/ephemeral-executor.js";
import { defaultPolicyRegistry } from "../policy/registry.js";
import { SdkAwsGateway } from "../cloud/aws.js";
import { SdkAzureGateway } from "../cloud/azure.js";
import { Mysql2VariablesReader } from "./mysql-reader.js";
import { buildProviderPipeline, type CheckDependencies } from "./pipelines.js";

export interface InstallationCheckOptions extends Partial<Omit<CheckDependencies, "config">> {
  config?: EngineConfig;
  signal?: AbortSignal;
}

export interface InstallationCheckReport {
  provider: EnvConfig["spec"]["cloudSpec"]["provider"];
  stages: StageId[];
}

/**
 * Runs every check for the configured cloud. Accepts the configuration
 * document or its base64 form as handed to the checker pod. Rejects with a
 * StageError naming the first failing stage.
 */
export async function runInstallationChecks(
  envConfig: EnvConfig | string,
  options: InstallationCheckOptions = {},
): Promise<InstallationCheckReport> {
  const log = createChecksLogger();
  const doc = typeof envConfig === "string" ? decodeEnvConfig(envConfig) : parseEnvConfig(envConfig);
  const config = options.config ?? loadConfig();

  const cluster = options.cluster ?? KubeClusterClient.create(config.KUBECONFIG);
  const deps: CheckDependencies = {
    cluster,
    executor:
      options.executor ??
      new EphemeralExecutor({
        cluster,
        pollIntervalMs: config.POD_POLL_INTERVAL_MS,
        timeoutMs: config.POD_TIMEOUT_MS,
        imagePullPolicy: config.CHECKER_IMAGE_PULL_POLICY,
      }),
    registry: options.registry ?? defaultPolicyRegistry(),
    database: options.database ?? new Mysql2VariablesReader(config.DB_CONNECT_TIMEOUT_MS),
    aws: options.aws ?? ((region) => new SdkAwsGateway(region)),
    azure: options.azure ?? new SdkAzureGateway(),
    config,
    fetch: options.fetch,
  };

  const pipeline = buildProviderPipeline(doc, deps);
  log.info({ cluster: doc.spec.clusterName, provider: pipeline.name }, "running installation checks");
  await pipeline.handle(checkContext(options.signal));
  log.info({ stages: pipeline.stageIds.length }, "all checks passed");
  return { provider: doc.spec.cloudSpec.provider, stages: pipeline.stageIds };
}
