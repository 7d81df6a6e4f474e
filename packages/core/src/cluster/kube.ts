import { CoreV1Api, KubeConfig, RbacAuthorizationV1Api, StorageV1Api } from "@kubernetes/client-node";
import {
  ClusterApiError,
  refString,
  type ClusterClient,
  type ClusterObjectInfo,
  type ObjectRef,
  type PodPhase,
  type PodSpec,
  type PolicyRule,
  type ServiceAccountSubject,
  type TokenRequest,
} from "./types.js";

const RBAC_GROUP = "rbac.authorization.k8s.io";
const POD_PHASES = new Set<string>(["Pending", "Running", "Succeeded", "Failed", "Unknown"]);

function isPodPhase(value: string | undefined): value is PodPhase {
  return value !== undefined && POD_PHASES.has(value);
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "number") {
    return err.code;
  }
  return undefined;
}

function toClusterError(what: string, err: unknown): ClusterApiError {
  const status = statusOf(err);
  const detail = err instanceof Error ? err.message : String(err);
  return new ClusterApiError(`${what} failed${status ? ` (${status})` : ""}: ${detail}`, status, err);
}

type Meta = { name?: string; labels?: Record<string, string>; annotations?: Record<string, string> };

const infoOf = (metadata: Meta | undefined): ClusterObjectInfo => ({
  name: metadata?.name ?? "",
  labels: metadata?.labels ?? {},
  annotations: metadata?.annotations ?? {},
});

/** ClusterClient over the official Kubernetes client. */
export class KubeClusterClient implements ClusterClient {
  private readonly core: CoreV1Api;
  private readonly rbac: RbacAuthorizationV1Api;
  private readonly storage: StorageV1Api;

  constructor(kubeConfig: KubeConfig) {
    this.core = kubeConfig.makeApiClient(CoreV1Api);
    this.rbac = kubeConfig.makeApiClient(RbacAuthorizationV1Api);
    this.storage = kubeConfig.makeApiClient(StorageV1Api);
  }

  /** Loads the given kubeconfig file, or the default chain (in-cluster, $HOME/.kube/config). */
  static create(kubeconfigPath?: string): KubeClusterClient {
    const kc = new KubeConfig();
    if (kubeconfigPath) kc.loadFromFile(kubeconfigPath);
    else kc.loadFromDefault();
    return new KubeClusterClient(kc);
  }

  private async call<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw toClusterError(what, err);
    }
  }

  private async read<T>(what: string, fn: () => Promise<T>): Promise<T | undefined> {
    try {
      return await fn();
    } catch (err) {
      if (statusOf(err) === 404) return undefined;
      throw toClusterError(what, err);
    }
  }

  async ensureNamespace(name: string) {
    try {
      await this.core.createNamespace({ body: { metadata: { name } } });
      return true;
    } catch (err) {
      if (statusOf(err) === 409) return false;
      throw toClusterError(`create Namespace ${name}`, err);
    }
  }

  async getPodPhase(ref: ObjectRef) {
    const pod = await this.read(`read Pod ${refString(ref)}`, () =>
      this.core.readNamespacedPod({ name: ref.name, namespace: ref.namespace }),
    );
    if (!pod) return undefined;
    const phase = pod.status?.phase;
    // A freshly created pod may not report a phase yet
    return isPodPhase(phase) ? phase : "Pending";
  }

  async createPod(spec: PodSpec) {
    await this.call(`create Pod ${refString(spec)}`, () =>
      this.core.createNamespacedPod({
        namespace: spec.namespace,
        body: {
          apiVersion: "v1",
          kind: "Pod",
          metadata: { name: spec.name, namespace: spec.namespace, labels: spec.labels },
          spec: {
            serviceAccountName: spec.serviceAccountName,
            restartPolicy: "Never",
            containers: [
              {
                name: spec.name,
                image: spec.image,
                imagePullPolicy: spec.imagePullPolicy,
                command: spec.command,
                env: Object.entries(spec.env ?? {}).map(([name, value]) => ({ name, value })),
              },
            ],
          },
        },
      }),
    );
  }

  async deletePod(ref: ObjectRef) {
    await this.call(`delete Pod ${refString(ref)}`, () =>
      this.core.deleteNamespacedPod({ name: ref.name, namespace: ref.namespace }),
    );
  }

  async readPodLog(ref: ObjectRef) {
    return this.call(`read log of Pod ${refString(ref)}`, () =>
      this.core.readNamespacedPodLog({ name: ref.name, namespace: ref.namespace }),
    );
  }

  async listServiceAccounts(namespace: string) {
    const list = await this.call(`list ServiceAccounts in ${namespace}`, () =>
      this.core.listNamespacedServiceAccount({ namespace }),
    );
    return list.items.map((sa) => ({
      namespace,
      name: sa.metadata?.name ?? "",
      annotations: sa.metadata?.annotations ?? {},
    }));
  }

  async getServiceAccount(ref: ObjectRef) {
    const sa = await this.read(`read ServiceAccount ${refString(ref)}`, () =>
      this.core.readNamespacedServiceAccount({ name: ref.name, namespace: ref.namespace }),
    );
    if (!sa) return undefined;
    return { ...ref, annotations: sa.metadata?.annotations ?? {} };
  }

  async createServiceAccount(ref: ObjectRef) {
    await this.call(`create ServiceAccount ${refString(ref)}`, () =>
      this.core.createNamespacedServiceAccount({
        namespace: ref.namespace,
        body: { metadata: { name: ref.name, namespace: ref.namespace } },
      }),
    );
  }

  async deleteServiceAccount(ref: ObjectRef) {
    await this.call(`delete ServiceAccount ${refString(ref)}`, () =>
      this.core.deleteNamespacedServiceAccount({ name: ref.name, namespace: ref.namespace }),
    );
  }

  async createServiceAccountToken(ref: ObjectRef, request: TokenRequest) {
    const res = await this.call(`create token for ServiceAccount ${refString(ref)}`, () =>
      this.core.createNamespacedServiceAccountToken({
        name: ref.name,
        namespace: ref.namespace,
        body: {
          spec: { audiences: request.audiences, expirationSeconds: request.expirationSeconds },
        },
      }),
    );
    const token = res.status?.token;
    if (!token) {
      throw new ClusterApiError(`token request for ${refString(ref)} returned no token`);
    }
    return token;
  }

  async createRole(ref: ObjectRef, rules: PolicyRule[]) {
    await this.call(`create Role ${refString(ref)}`, () =>
      this.rbac.createNamespacedRole({
        namespace: ref.namespace,
        body: { metadata: { name: ref.name, namespace: ref.namespace }, rules },
      }),
    );
  }

  async deleteRole(ref: ObjectRef) {
    await this.call(`delete Role ${refString(ref)}`, () =>
      this.rbac.deleteNamespacedRole({ name: ref.name, namespace: ref.namespace }),
    );
  }

  async createClusterRole(name: string, rules: PolicyRule[]) {
    await this.call(`create ClusterRole ${name}`, () =>
      this.rbac.createClusterRole({ body: { metadata: { name }, rules } }),
    );
  }

  async deleteClusterRole(name: string) {
    await this.call(`delete ClusterRole ${name}`, () => this.rbac.deleteClusterRole({ name }));
  }

  async createRoleBinding(ref: ObjectRef, roleName: string, subject: ServiceAccountSubject) {
    await this.call(`create RoleBinding ${refString(ref)}`, () =>
      this.rbac.createNamespacedRoleBinding({
        namespace: ref.namespace,
        body: {
          metadata: { name: ref.name, namespace: ref.namespace },
          roleRef: { apiGroup: RBAC_GROUP, kind: "Role", name: roleName },
          subjects: [{ ...subject }],
        },
      }),
    );
  }

  async deleteRoleBinding(ref: ObjectRef) {
    await this.call(`delete RoleBinding ${refString(ref)}`, () =>
      this.rbac.deleteNamespacedRoleBinding({ name: ref.name, namespace: ref.namespace }),
    );
  }

  async createClusterRoleBinding(
    name: string,
    clusterRoleName: string,
    subject: ServiceAccountSubject,
  ) {
    await this.call(`create ClusterRoleBinding ${name}`, () =>
      this.rbac.createClusterRoleBinding({
        body: {
          metadata: { name },
          roleRef: { apiGroup: RBAC_GROUP, kind: "ClusterRole", name: clusterRoleName },
          subjects: [{ ...subject }],
        },
      }),
    );
  }

  async deleteClusterRoleBinding(name: string) {
    await this.call(`delete ClusterRoleBinding ${name}`, () =>
      this.rbac.deleteClusterRoleBinding({ name }),
    );
  }

  async listStorageClasses() {
    const list = await this.call("list StorageClasses", () => this.storage.listStorageClass());
    return list.items.map((sc) => infoOf(sc.metadata));
  }

  async listNodes() {
    const list = await this.call("list Nodes", () => this.core.listNode());
    return list.items.map((node) => infoOf(node.metadata));
  }

  async getSecretData(ref: ObjectRef) {
    const secret = await this.read(`read Secret ${refString(ref)}`, () =>
      this.core.readNamespacedSecret({ name: ref.name, namespace: ref.namespace }),
    );
    if (!secret) return undefined;
    const data: Record<string, string> = {};
    for (const [key, value] of Object.entries(secret.data ?? {})) {
      data[key] = Buffer.from(value, "base64").toString("utf8");
    }
    return data;
  }
}
