import { readFileSync } from "node:fs";
import path from "node:path";
import { DEFAULT_POLICY_DATA_DIR } from "../policy/registry.js";
import type { EphemeralJob } from "../executor/ephemeral-executor.js";

export const GCP_SERVICE_ACCOUNT = "gcp-provider-sa";
export const WORKLOAD_IDENTITY_ANNOTATION = "iam.gke.io/gcp-service-account";
export const ROLE_CHECKER_POD = "gcp-crossplane-role-checker";

/** Google service account the provider ServiceAccount must impersonate. */
export function providerServiceAccountEmail(clusterName: string, projectId: string): string {
  return `uxp-provider-${clusterName}@${projectId}.iam.gserviceaccount.com`;
}

let script: string | undefined;

/** Prints the `;`-separated permissions of the single uxp_provider role bound to the pod. */
export function rolePermissionsScript(): string {
  script ??= readFileSync(path.join(DEFAULT_POLICY_DATA_DIR, "gcp-role-permissions.sh"), "utf8");
  return script;
}

export function rolePermissionsJob(namespace: string, image: string): EphemeralJob {
  return {
    namespace,
    name: ROLE_CHECKER_POD,
    serviceAccountName: GCP_SERVICE_ACCOUNT,
    image,
    command: ["/bin/bash", "-c", rolePermissionsScript()],
  };
}
