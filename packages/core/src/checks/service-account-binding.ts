import { VerificationError } from "../internal/errors.js";
import type { CheckContext, Handler, StageValue } from "../pipeline/handler.js";
import { refString, type ClusterClient, type ObjectRef } from "../cluster/types.js";
import {
  GCP_SERVICE_ACCOUNT,
  WORKLOAD_IDENTITY_ANNOTATION,
  providerServiceAccountEmail,
} from "../cloud/gcp.js";
import { PROVIDER_NAMESPACE } from "../identity/tokens.js";
import { clusterCall } from "./cluster-call.js";

export interface ServiceAccountBindingCheckerOptions {
  cluster: ClusterClient;
  clusterName: string;
  projectId: string;
}

/** The GCP provider ServiceAccount must be bound to its Google service account. */
export class ServiceAccountBindingChecker implements Handler {
  constructor(private readonly options: ServiceAccountBindingCheckerOptions) {}

  async handle(ctx: CheckContext): Promise<StageValue[]> {
    const ref: ObjectRef = { namespace: PROVIDER_NAMESPACE, name: GCP_SERVICE_ACCOUNT };
    const sa = await clusterCall(ctx, `read ServiceAccount ${refString(ref)}`, () =>
      this.options.cluster.getServiceAccount(ref),
    );
    if (!sa) {
      throw VerificationError.configuration(
        "SERVICE_ACCOUNT_NOT_FOUND",
        `ServiceAccount ${refString(ref)} not found`,
        refString(ref),
      );
    }

    const expected = providerServiceAccountEmail(this.options.clusterName, this.options.projectId);
    const got = sa.annotations[WORKLOAD_IDENTITY_ANNOTATION];
    if (got !== expected) {
      throw new VerificationError({
        kind: "CONFIGURATION",
        code: "SERVICE_ACCOUNT_ANNOTATION_MISMATCH",
        message: `ServiceAccount ${refString(ref)} annotation ${WORKLOAD_IDENTITY_ANNOTATION}: expected ${expected}, got ${got ?? "nothing"}`,
        field: WORKLOAD_IDENTITY_ANNOTATION,
        details: { key: WORKLOAD_IDENTITY_ANNOTATION, expected, got },
      });
    }
    return [];
  }
}
