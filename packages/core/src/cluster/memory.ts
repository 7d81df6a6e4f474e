import {
  ClusterApiError,
  refString,
  type ClusterClient,
  type ClusterObjectInfo,
  type ObjectRef,
  type PodPhase,
  type PodSpec,
  type PolicyRule,
  type ServiceAccountInfo,
  type ServiceAccountSubject,
  type TokenRequest,
} from "./types.js";

/** How a pod created in the memory cluster behaves. */
export interface PodScript {
  /** Phase reported by successive reads; the last one repeats. */
  phases: PodPhase[];
  log: string;
}

type PodEntry = {
  spec: PodSpec;
  script: PodScript;
  reads: number;
  /** Reads left before a deleted pod disappears. */
  terminating?: number;
};

type Binding = { roleName: string; subject: ServiceAccountSubject };

export interface MemoryClusterOptions {
  podBehavior?: (spec: PodSpec) => PodScript;
  issueToken?: (ref: ObjectRef, request: TokenRequest) => string | Promise<string>;
  /** Number of phase reads a deleted pod keeps answering before it is gone. */
  podDeletionLag?: number;
}

const notFound = (kind: string, id: string) => new ClusterApiError(`${kind} ${id} not found`, 404);
const conflict = (kind: string, id: string) =>
  new ClusterApiError(`${kind} ${id} already exists`, 409);

/**
 * In-process cluster. Keeps every object in maps and records mutations in
 * `events` ("create Pod ns/name", "delete ClusterRole name", ...).
 */
export class MemoryClusterClient implements ClusterClient {
  readonly namespaces = new Set<string>();
  readonly serviceAccounts = new Map<string, ServiceAccountInfo>();
  readonly roles = new Map<string, PolicyRule[]>();
  readonly clusterRoles = new Map<string, PolicyRule[]>();
  readonly roleBindings = new Map<string, Binding>();
  readonly clusterRoleBindings = new Map<string, Binding>();
  readonly storageClasses: ClusterObjectInfo[] = [];
  readonly nodes: ClusterObjectInfo[] = [];
  readonly secrets = new Map<string, Record<string, string>>();
  readonly tokenRequests: { ref: ObjectRef; request: TokenRequest }[] = [];
  readonly events: string[] = [];

  private readonly pods = new Map<string, PodEntry>();
  private readonly failures = new Map<string, Error>();

  constructor(private readonly options: MemoryClusterOptions = {}) {}

  /** Makes the next call of `operation` reject with `error`. */
  failNext(operation: keyof ClusterClient, error: Error = new ClusterApiError("boom", 500)) {
    this.failures.set(operation, error);
  }

  podExists(ref: ObjectRef): boolean {
    return this.pods.has(refString(ref));
  }

  podSpec(ref: ObjectRef): PodSpec | undefined {
    return this.pods.get(refString(ref))?.spec;
  }

  addServiceAccount(info: ServiceAccountInfo) {
    this.serviceAccounts.set(refString(info), info);
  }

  private maybeFail(operation: keyof ClusterClient) {
    const error = this.failures.get(operation);
    if (error) {
      this.failures.delete(operation);
      throw error;
    }
  }

  private record(event: string) {
    this.events.push(event);
  }

  async ensureNamespace(name: string) {
    this.maybeFail("ensureNamespace");
    if (this.namespaces.has(name)) return false;
    this.namespaces.add(name);
    return true;
  }

  async getPodPhase(ref: ObjectRef) {
    this.maybeFail("getPodPhase");
    const key = refString(ref);
    const entry = this.pods.get(key);
    if (!entry) return undefined;
    const { phases } = entry.script;
    const phase = phases[Math.min(entry.reads, phases.length - 1)] ?? "Unknown";
    entry.reads++;
    if (entry.terminating !== undefined) {
      if (entry.terminating <= 0) {
        this.pods.delete(key);
        return undefined;
      }
      entry.terminating--;
    }
    return phase;
  }

  async createPod(spec: PodSpec) {
    this.maybeFail("createPod");
    const key = refString(spec);
    if (this.pods.has(key)) throw conflict("Pod", key);
    const script = this.options.podBehavior?.(spec) ?? { phases: ["Succeeded"], log: "" };
    this.pods.set(key, { spec, script, reads: 0 });
    this.record(`create Pod ${key}`);
  }

  async deletePod(ref: ObjectRef) {
    this.maybeFail("deletePod");
    const key = refString(ref);
    const entry = this.pods.get(key);
    if (!entry || entry.terminating !== undefined) throw notFound("Pod", key);
    const lag = this.options.podDeletionLag ?? 0;
    if (lag > 0) entry.terminating = lag;
    else this.pods.delete(key);
    this.record(`delete Pod ${key}`);
  }

  async readPodLog(ref: ObjectRef) {
    this.maybeFail("readPodLog");
    const key = refString(ref);
    const entry = this.pods.get(key);
    if (!entry) throw notFound("Pod", key);
    return entry.script.log;
  }

  async listServiceAccounts(namespace: string) {
    this.maybeFail("listServiceAccounts");
    return [...this.serviceAccounts.values()].filter((sa) => sa.namespace === namespace);
  }

  async getServiceAccount(ref: ObjectRef) {
    this.maybeFail("getServiceAccount");
    return this.serviceAccounts.get(refString(ref));
  }

  async createServiceAccount(ref: ObjectRef) {
    this.maybeFail("createServiceAccount");
    const key = refString(ref);
    if (this.serviceAccounts.has(key)) throw conflict("ServiceAccount", key);
    this.serviceAccounts.set(key, { ...ref, annotations: {} });
    this.record(`create ServiceAccount ${key}`);
  }

  async deleteServiceAccount(ref: ObjectRef) {
    this.maybeFail("deleteServiceAccount");
    const key = refString(ref);
    if (!this.serviceAccounts.delete(key)) throw notFound("ServiceAccount", key);
    this.record(`delete ServiceAccount ${key}`);
  }

  async createServiceAccountToken(ref: ObjectRef, request: TokenRequest) {
    this.maybeFail("createServiceAccountToken");
    const key = refString(ref);
    if (!this.serviceAccounts.has(key)) throw notFound("ServiceAccount", key);
    this.tokenRequests.push({ ref, request });
    return this.options.issueToken ? this.options.issueToken(ref, request) : `token-${key}`;
  }

  async createRole(ref: ObjectRef, rules: PolicyRule[]) {
    this.maybeFail("createRole");
    const key = refString(ref);
    if (this.roles.has(key)) throw conflict("Role", key);
    this.roles.set(key, rules);
    this.record(`create Role ${key}`);
  }

  async deleteRole(ref: ObjectRef) {
    this.maybeFail("deleteRole");
    const key = refString(ref);
    if (!this.roles.delete(key)) throw notFound("Role", key);
    this.record(`delete Role ${key}`);
  }

  async createClusterRole(name: string, rules: PolicyRule[]) {
    this.maybeFail("createClusterRole");
    if (this.clusterRoles.has(name)) throw conflict("ClusterRole", name);
    this.clusterRoles.set(name, rules);
    this.record(`create ClusterRole ${name}`);
  }

  async deleteClusterRole(name: string) {
    this.maybeFail("deleteClusterRole");
    if (!this.clusterRoles.delete(name)) throw notFound("ClusterRole", name);
    this.record(`delete ClusterRole ${name}`);
  }

  async createRoleBinding(ref: ObjectRef, roleName: string, subject: ServiceAccountSubject) {
    this.maybeFail("createRoleBinding");
    const key = refString(ref);
    if (this.roleBindings.has(key)) throw conflict("RoleBinding", key);
    this.roleBindings.set(key, { roleName, subject });
    this.record(`create RoleBinding ${key}`);
  }

  async deleteRoleBinding(ref: ObjectRef) {
    this.maybeFail("deleteRoleBinding");
    const key = refString(ref);
    if (!this.roleBindings.delete(key)) throw notFound("RoleBinding", key);
    this.record(`delete RoleBinding ${key}`);
  }

  async createClusterRoleBinding(
    name: string,
    clusterRoleName: string,
    subject: ServiceAccountSubject,
  ) {
    this.maybeFail("createClusterRoleBinding");
    if (this.clusterRoleBindings.has(name)) throw conflict("ClusterRoleBinding", name);
    this.clusterRoleBindings.set(name, { roleName: clusterRoleName, subject });
    this.record(`create ClusterRoleBinding ${name}`);
  }

  async deleteClusterRoleBinding(name: string) {
    this.maybeFail("deleteClusterRoleBinding");
    if (!this.clusterRoleBindings.delete(name)) throw notFound("ClusterRoleBinding", name);
    this.record(`delete ClusterRoleBinding ${name}`);
  }

  async listStorageClasses() {
    this.maybeFail("listStorageClasses");
    return [...this.storageClasses];
  }

  async listNodes() {
    this.maybeFail("listNodes");
    return [...this.nodes];
  }

  async getSecretData(ref: ObjectRef) {
    this.maybeFail("getSecretData");
    return this.secrets.get(refString(ref));
  }
}
