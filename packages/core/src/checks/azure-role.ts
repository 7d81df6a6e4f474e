import {
  PermissionMismatchError,
  VerificationError,
  errorMessage,
  isVerificationError,
} from "../internal/errors.js";
import { createChecksLogger, type Logger } from "../observability/logger.js";
import {
  expectValue,
  type CheckContext,
  type Handler,
  type StageValue,
} from "../pipeline/handler.js";
import { formatChange } from "../policy/diff.js";
import { PolicyEquivalenceEngine, missingActions } from "../policy/equivalence.js";
import type { PolicyRegistry } from "../policy/registry.js";
import type { PlaceholderContext } from "../policy/types.js";
import {
  providerRoleName,
  resourceGroupScope,
  roleDefinitionDocument,
  type AzureGateway,
} from "../cloud/azure.js";

export interface AzureRoleDefinitionCheckerOptions {
  gateway: AzureGateway;
  registry: PolicyRegistry;
  placeholders: PlaceholderContext;
  tenantId: string;
  clientId: string;
  subscriptionId: string;
  resourceGroup: string;
  clusterName: string;
}

/**
 * Exchanges the first issued token for management-plane access and compares
 * the provider role definition in the resource group with the expected one.
 */
export class AzureRoleDefinitionChecker implements Handler {
  private readonly log: Logger = createChecksLogger("azure-role");
  private readonly engine: PolicyEquivalenceEngine;

  constructor(private readonly options: AzureRoleDefinitionCheckerOptions) {
    this.engine = new PolicyEquivalenceEngine(options.placeholders);
  }

  async handle(ctx: CheckContext, ...inputs: StageValue[]): Promise<StageValue[]> {
    const { tokens } = expectValue(inputs, "tokens");
    const [assertion] = tokens;
    if (assertion === undefined) {
      throw VerificationError.configuration("NO_TOKENS_ISSUED", "no token to exchange");
    }

    const { gateway, tenantId, clientId, subscriptionId, resourceGroup, clusterName } =
      this.options;
    const scope = resourceGroupScope(subscriptionId, resourceGroup);
    const roleName = providerRoleName(clusterName);

    ctx.signal.throwIfAborted();
    const definitions = await gateway
      .listRoleDefinitions({ tenantId, clientId, subscriptionId, assertion }, scope, ctx.signal)
      .catch((err: unknown) => {
        ctx.signal.throwIfAborted();
        if (isVerificationError(err)) throw err;
        throw VerificationError.infrastructure(
          "AZURE_REQUEST_FAILED",
          `failed to list role definitions in ${scope}: ${errorMessage(err)}`,
          err,
        );
      });

    const definition = definitions.find((d) => d.roleName === roleName);
    if (!definition) {
      throw VerificationError.configuration(
        "ROLE_NOT_FOUND",
        `role definition ${roleName} not found in ${scope}`,
        roleName,
      );
    }

    const observed = roleDefinitionDocument(definition);
    const { equivalent, changelog } = this.engine.compare(
      observed,
      this.options.registry.document("azure", "role-definition"),
    );
    if (!equivalent) {
      const missing = missingActions(changelog);
      throw new PermissionMismatchError({
        code: "ROLE_PERMISSIONS_MISMATCH",
        changelog,
        missing,
        message: `role ${roleName} does not match the expected permissions: ${changelog
          .map(formatChange)
          .join("; ")}`,
      });
    }
    this.log.debug({ role: definition.id }, "role definition matches");
    return [];
  }
}
