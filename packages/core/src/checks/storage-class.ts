import { VerificationError } from "../internal/errors.js";
import type { CheckContext, Handler, StageValue } from "../pipeline/handler.js";
import type { ClusterClient } from "../cluster/types.js";
import { clusterCall } from "./cluster-call.js";

export const DEFAULT_STORAGE_CLASS_ANNOTATION = "storageclass.kubernetes.io/is-default-class";

/** Passes when some StorageClass is marked as the cluster default. */
export class StorageClassChecker implements Handler {
  constructor(private readonly cluster: ClusterClient) {}

  async handle(ctx: CheckContext): Promise<StageValue[]> {
    const classes = await clusterCall(ctx, "list StorageClasses", () =>
      this.cluster.listStorageClasses(),
    );
    if (!classes.some((sc) => sc.annotations[DEFAULT_STORAGE_CLASS_ANNOTATION] === "true")) {
      throw VerificationError.configuration(
        "NO_DEFAULT_STORAGE_CLASS",
        `no StorageClass is annotated ${DEFAULT_STORAGE_CLASS_ANNOTATION}=true`,
      );
    }
    return [];
  }
}
