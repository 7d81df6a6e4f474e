export type PodPhase = "Pending" | "Running" | "Succeeded" | "Failed" | "Unknown";

export interface ObjectRef {
  namespace: string;
  name: string;
}

export interface PodSpec extends ObjectRef {
  serviceAccountName: string;
  image: string;
  command: string[];
  env?: Record<string, string>;
  imagePullPolicy?: "Always" | "IfNotPresent" | "Never";
  labels?: Record<string, string>;
}

export interface PolicyRule {
  apiGroups: string[];
  resources: string[];
  verbs: string[];
}

export interface ServiceAccountSubject {
  kind: "ServiceAccount";
  namespace: string;
  name: string;
}

export interface ServiceAccountInfo extends ObjectRef {
  annotations: Record<string, string>;
}

export interface ClusterObjectInfo {
  name: string;
  labels: Record<string, string>;
  annotations: Record<string, string>;
}

export interface TokenRequest {
  audiences: string[];
  expirationSeconds: number;
}

/**
 * The slice of the Kubernetes API the checks use. Missing objects are
 * reported as `undefined` by readers and as a 404 ClusterApiError by
 * mutators.
 */
export interface ClusterClient {
  /** Resolves to false when the namespace already existed. */
  ensureNamespace(name: string): Promise<boolean>;

  getPodPhase(ref: ObjectRef): Promise<PodPhase | undefined>;
  createPod(spec: PodSpec): Promise<void>;
  deletePod(ref: ObjectRef): Promise<void>;
  readPodLog(ref: ObjectRef): Promise<string>;

  listServiceAccounts(namespace: string): Promise<ServiceAccountInfo[]>;
  getServiceAccount(ref: ObjectRef): Promise<ServiceAccountInfo | undefined>;
  createServiceAccount(ref: ObjectRef): Promise<void>;
  deleteServiceAccount(ref: ObjectRef): Promise<void>;
  createServiceAccountToken(ref: ObjectRef, request: TokenRequest): Promise<string>;

  createRole(ref: ObjectRef, rules: PolicyRule[]): Promise<void>;
  deleteRole(ref: ObjectRef): Promise<void>;
  createClusterRole(name: string, rules: PolicyRule[]): Promise<void>;
  deleteClusterRole(name: string): Promise<void>;
  createRoleBinding(ref: ObjectRef, roleName: string, subject: ServiceAccountSubject): Promise<void>;
  deleteRoleBinding(ref: ObjectRef): Promise<void>;
  createClusterRoleBinding(
    name: string,
    clusterRoleName: string,
    subject: ServiceAccountSubject,
  ): Promise<void>;
  deleteClusterRoleBinding(name: string): Promise<void>;

  listStorageClasses(): Promise<ClusterObjectInfo[]>;
  listNodes(): Promise<ClusterObjectInfo[]>;
  /** Secret data, base64-decoded. */
  getSecretData(ref: ObjectRef): Promise<Record<string, string> | undefined>;
}

export class ClusterApiError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "ClusterApiError";
    this.status = status;
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof ClusterApiError && err.status === 404;
}

export function isAlreadyExists(err: unknown): boolean {
  return err instanceof ClusterApiError && err.status === 409;
}

export const refString = (ref: ObjectRef) => `${ref.namespace}/${ref.name}`;
