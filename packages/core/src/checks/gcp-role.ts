import type { CheckContext, Handler, StageValue } from "../pipeline/handler.js";
import type { EphemeralExecutor } from "../executor/ephemeral-executor.js";
import type { PolicyRegistry } from "../policy/registry.js";
import { rolePermissionsJob } from "../cloud/gcp.js";
import { PROVIDER_NAMESPACE } from "../identity/tokens.js";

export interface GcpRolePermissionsCheckerOptions {
  executor: EphemeralExecutor;
  registry: PolicyRegistry;
  /** Image with the gcloud CLI. */
  image: string;
}

/**
 * Lists the permissions of the provider's custom role from inside the cluster,
 * under the provider's workload identity, and requires every expected one.
 */
export class GcpRolePermissionsChecker implements Handler {
  constructor(private readonly options: GcpRolePermissionsCheckerOptions) {}

  async handle(ctx: CheckContext): Promise<StageValue[]> {
    const { executor, registry, image } = this.options;
    await executor.checkPermissions(
      ctx,
      rolePermissionsJob(PROVIDER_NAMESPACE, image),
      registry.permissions("gcp", "role-permissions"),
    );
    return [];
  }
}
