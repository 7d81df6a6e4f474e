import {
  CleanupError,
  VerificationError,
  errorMessage,
  type CleanupFailure,
} from "../internal/errors.js";
import { createClusterLogger } from "../observability/logger.js";
import type { CheckContext } from "../pipeline/handler.js";
import {
  isNotFound,
  refString,
  type ClusterClient,
  type ObjectRef,
  type PolicyRule,
  type ServiceAccountSubject,
} from "../cluster/types.js";

export interface NamespacedRules {
  namespace: string;
  rules: PolicyRule[];
}

/** RBAC scaffolding that lets a runner pod call the cluster API. */
export interface ScaffoldingPlan {
  serviceAccount: ObjectRef;
  /** One Role and RoleBinding per namespace. */
  namespacedRules: NamespacedRules[];
  clusterRules: PolicyRule[];
  roleName: string;
  roleBindingName: string;
  clusterRoleName: string;
  clusterRoleBindingName: string;
  /** Runner pod created after the scaffolding; removed first on teardown. */
  pod?: ObjectRef;
}

type Step = { kind: string; id: string; run: () => Promise<void> };

export class ResourceLifecycleManager {
  private readonly log = createClusterLogger();

  constructor(
    private readonly cluster: ClusterClient,
    private readonly plan: ScaffoldingPlan,
  ) {}

  private get subject(): ServiceAccountSubject {
    return { kind: "ServiceAccount", ...this.plan.serviceAccount };
  }

  /**
   * Creates ServiceAccount, Roles, ClusterRole, RoleBindings and the
   * ClusterRoleBinding in that order. Stops at the first failure; whatever was
   * created stays for teardown.
   */
  async provision(ctx: CheckContext): Promise<void> {
    const { cluster, plan } = this;
    const namespaces = new Set([
      plan.serviceAccount.namespace,
      ...plan.namespacedRules.map((r) => r.namespace),
    ]);
    for (const namespace of namespaces) {
      ctx.signal.throwIfAborted();
      await this.create("Namespace", namespace, () => cluster.ensureNamespace(namespace));
    }

    const steps: Step[] = [
      {
        kind: "ServiceAccount",
        id: refString(plan.serviceAccount),
        run: () => cluster.createServiceAccount(plan.serviceAccount),
      },
      ...plan.namespacedRules.map(({ namespace, rules }) => {
        const ref = { namespace, name: plan.roleName };
        return { kind: "Role", id: refString(ref), run: () => cluster.createRole(ref, rules) };
      }),
      {
        kind: "ClusterRole",
        id: plan.clusterRoleName,
        run: () => cluster.createClusterRole(plan.clusterRoleName, plan.clusterRules),
      },
      ...plan.namespacedRules.map(({ namespace }) => {
        const ref = { namespace, name: plan.roleBindingName };
        return {
          kind: "RoleBinding",
          id: refString(ref),
          run: () => cluster.createRoleBinding(ref, plan.roleName, this.subject),
        };
      }),
      {
        kind: "ClusterRoleBinding",
        id: plan.clusterRoleBindingName,
        run: () =>
          cluster.createClusterRoleBinding(
            plan.clusterRoleBindingName,
            plan.clusterRoleName,
            this.subject,
          ),
      },
    ];

    for (const step of steps) {
      ctx.signal.throwIfAborted();
      await this.create(step.kind, step.id, step.run);
    }
  }

  /**
   * Deletes everything in reverse creation order. Every deletion is attempted;
   * absent objects count as deleted and other failures are collected into a
   * CleanupError. Safe to call any number of times.
   */
  async teardown(): Promise<void> {
    const { cluster, plan } = this;
    const steps: Step[] = [];
    if (plan.pod) {
      const pod = plan.pod;
      steps.push({ kind: "Pod", id: refString(pod), run: () => cluster.deletePod(pod) });
    }
    steps.push({
      kind: "ClusterRoleBinding",
      id: plan.clusterRoleBindingName,
      run: () => cluster.deleteClusterRoleBinding(plan.clusterRoleBindingName),
    });
    for (const { namespace } of [...plan.namespacedRules].reverse()) {
      const ref = { namespace, name: plan.roleBindingName };
      steps.push({
        kind: "RoleBinding",
        id: refString(ref),
        run: () => cluster.deleteRoleBinding(ref),
      });
    }
    steps.push({
      kind: "ClusterRole",
      id: plan.clusterRoleName,
      run: () => cluster.deleteClusterRole(plan.clusterRoleName),
    });
    for (const { namespace } of [...plan.namespacedRules].reverse()) {
      const ref = { namespace, name: plan.roleName };
      steps.push({ kind: "Role", id: refString(ref), run: () => cluster.deleteRole(ref) });
    }
    steps.push({
      kind: "ServiceAccount",
      id: refString(plan.serviceAccount),
      run: () => cluster.deleteServiceAccount(plan.serviceAccount),
    });

    const failures: CleanupFailure[] = [];
    for (const step of steps) {
      try {
        await step.run();
        this.log.info({ kind: step.kind, name: step.id }, `deleted ${step.id} ${step.kind}`);
      } catch (err) {
        if (isNotFound(err)) continue;
        this.log.error(
          { kind: step.kind, name: step.id, error: errorMessage(err) },
          "delete failed",
        );
        failures.push({ resource: `${step.kind} ${step.id}`, error: err });
      }
    }
    if (failures.length > 0) throw new CleanupError(failures);
  }

  /** `run` resolving to false means the object already existed. */
  private async create(kind: string, id: string, run: () => Promise<boolean | void>) {
    let created: boolean | void;
    try {
      created = await run();
    } catch (err) {
      throw VerificationError.infrastructure(
        "SCAFFOLDING_FAILED",
        `failed to create ${kind} ${id}: ${errorMessage(err)}`,
        err,
      );
    }
    if (created === false) {
      this.log.debug({ kind, name: id }, `${id} ${kind} already exists`);
      return;
    }
    this.log.info({ kind, name: id }, `created ${id} ${kind}`);
  }
}
