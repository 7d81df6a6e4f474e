import { encodeEnvConfig, type EnvConfig } from "../config/env-config.js";
import { StageError, VerificationError, errorMessage } from "../internal/errors.js";
import { createClusterLogger } from "../observability/logger.js";
import type { CheckContext } from "../pipeline/handler.js";
import type { ClusterClient, ObjectRef } from "../cluster/types.js";
import type { EphemeralExecutor } from "../executor/ephemeral-executor.js";
import { ResourceLifecycleManager, type ScaffoldingPlan } from "./resource-lifecycle.js";

export const ENV_CONFIG_VARIABLE = "ENVCONFIG";

const RUNNER_NAMESPACE = "kube-system";

export interface InClusterCheckLauncherOptions {
  cluster: ClusterClient;
  executor: EphemeralExecutor;
  image: string;
  /** Prefix of every object the launcher creates. */
  appName?: string;
}

/** Objects the checker pod needs, all named after `appName`. */
export function scaffoldingPlan(appName: string): ScaffoldingPlan & { pod: ObjectRef } {
  return {
    serviceAccount: { namespace: RUNNER_NAMESPACE, name: `${appName}-sa` },
    namespacedRules: [
      {
        namespace: "crossplane",
        rules: [
          {
            apiGroups: [""],
            resources: ["serviceaccounts", "serviceaccounts/token"],
            verbs: ["*"],
          },
          { apiGroups: [""], resources: ["pods", "pods/log"], verbs: ["*"] },
        ],
      },
      {
        namespace: "mysql",
        rules: [{ apiGroups: [""], resources: ["secrets"], verbs: ["get"] }],
      },
    ],
    clusterRules: [
      { apiGroups: ["storage.k8s.io"], resources: ["storageclasses"], verbs: ["get", "list"] },
      { apiGroups: [""], resources: ["nodes"], verbs: ["get", "list"] },
    ],
    roleName: `${appName}-role`,
    roleBindingName: `${appName}-rolebinding`,
    clusterRoleName: `${appName}-clusterrole`,
    clusterRoleBindingName: `${appName}-clusterrolebinding`,
    pod: { namespace: RUNNER_NAMESPACE, name: `${appName}-pod` },
  };
}

/**
 * Runs the checks from outside the cluster: provisions the scaffolding,
 * starts the checker pod with the environment configuration, relays its
 * output and tears everything down again.
 */
export class InClusterCheckLauncher {
  private readonly log = createClusterLogger();
  private readonly plan: ReturnType<typeof scaffoldingPlan>;
  private readonly lifecycle: ResourceLifecycleManager;

  constructor(private readonly options: InClusterCheckLauncherOptions) {
    this.plan = scaffoldingPlan(options.appName ?? "cluster-preflight");
    this.lifecycle = new ResourceLifecycleManager(options.cluster, this.plan);
  }

  /** Returns the checker's output lines once it succeeded. */
  async run(ctx: CheckContext, envConfig: EnvConfig): Promise<string[]> {
    let lines: string[];
    try {
      lines = await this.provisionAndRun(ctx, envConfig);
    } catch (err) {
      if (!ctx.signal.aborted) {
        await this.lifecycle.teardown().catch((cleanupErr: unknown) => {
          this.log.error({ error: errorMessage(cleanupErr) }, "cleanup after failed checks failed");
        });
      }
      throw err;
    }
    await this.lifecycle.teardown();
    this.log.info("resources cleaned up");
    return lines;
  }

  /** Removes whatever a previous run left behind. */
  async cleanup(): Promise<void> {
    await this.lifecycle.teardown();
    this.log.info("resources cleaned up");
  }

  private async provisionAndRun(ctx: CheckContext, envConfig: EnvConfig): Promise<string[]> {
    try {
      await this.lifecycle.provision(ctx);
    } catch (err) {
      throw new StageError("SCAFFOLDING", err);
    }

    const { pod } = this.plan;
    try {
      const { phase, lines } = await this.options.executor.runToCompletion(ctx, {
        ...pod,
        serviceAccountName: this.plan.serviceAccount.name,
        image: this.options.image,
        command: [],
        env: { [ENV_CONFIG_VARIABLE]: encodeEnvConfig(envConfig) },
      });
      for (const line of lines) this.log.info({ pod: pod.name }, line);
      if (phase === "Failed") {
        throw new VerificationError({
          kind: "CONFIGURATION",
          code: "IN_CLUSTER_CHECKS_FAILED",
          message: `in-cluster checks failed: ${lines.at(-1) ?? "no output"}`,
          details: { lines },
        });
      }
      return lines;
    } catch (err) {
      throw new StageError("CHECKER_POD", err);
    }
  }
}
