import { AuthorizationManagementClient } from "@azure/arm-authorization";
import { ClientAssertionCredential } from "@azure/identity";
import { VerificationError, errorMessage } from "../internal/errors.js";
import type { PermissionDocument, PermissionStatement } from "../policy/types.js";

export const MANAGEMENT_SCOPE = "https://management.azure.com/.default";

export function providerRoleName(clusterName: string): string {
  return `${clusterName}-crossplane-provider`;
}

export function resourceGroupScope(subscriptionId: string, resourceGroup: string): string {
  return `subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}`;
}

export interface AzurePermission {
  actions: string[];
  notActions: string[];
}

export interface AzureRoleDefinition {
  id: string;
  roleName: string;
  permissions: AzurePermission[];
}

export interface AzureFederation {
  tenantId: string;
  clientId: string;
  subscriptionId: string;
  /** Cluster-issued token presented as the client assertion. */
  assertion: string;
}

export interface AzureGateway {
  listRoleDefinitions(
    federation: AzureFederation,
    scope: string,
    signal: AbortSignal,
  ): Promise<AzureRoleDefinition[]>;
}

/**
 * Merges the actions of a role definition's permission entries into one Allow
 * statement. notActions are not compared. An action granted twice is rejected.
 */
export function roleDefinitionDocument(definition: AzureRoleDefinition): PermissionDocument {
  const actions: string[] = [];
  const seen = new Set<string>();
  for (const permission of definition.permissions) {
    for (const action of permission.actions) {
      if (seen.has(action)) {
        throw VerificationError.protocol(
          "DUPLICATE_PERMISSION",
          `role ${definition.roleName} grants ${action} more than once`,
          { action },
        );
      }
      seen.add(action);
      actions.push(action);
    }
  }

  const statements: PermissionStatement[] = [];
  if (actions.length > 0) statements.push({ Effect: "Allow", Action: actions });
  return { Statement: statements };
}

/** AzureGateway over @azure/identity and the authorization management client. */
export class SdkAzureGateway implements AzureGateway {
  async listRoleDefinitions(
    federation: AzureFederation,
    scope: string,
    signal: AbortSignal,
  ): Promise<AzureRoleDefinition[]> {
    const credential = new ClientAssertionCredential(
      federation.tenantId,
      federation.clientId,
      async () => federation.assertion,
    );
    // Exchange up front so a rejected federation is reported as such.
    try {
      await credential.getToken(MANAGEMENT_SCOPE, { abortSignal: signal });
    } catch (err) {
      signal.throwIfAborted();
      throw VerificationError.infrastructure(
        "AZURE_TOKEN_EXCHANGE_FAILED",
        `exchanging the ServiceAccount token failed: ${errorMessage(err)}`,
        err,
      );
    }

    const client = new AuthorizationManagementClient(credential, federation.subscriptionId);
    const definitions: AzureRoleDefinition[] = [];
    for await (const def of client.roleDefinitions.list(scope, { abortSignal: signal })) {
      definitions.push({
        id: def.id ?? "",
        roleName: def.roleName ?? "",
        permissions: (def.permissions ?? []).map((p) => ({
          actions: p.actions ?? [],
          notActions: p.notActions ?? [],
        })),
      });
    }
    return definitions;
  }
}
