import { VerificationError, errorMessage } from "../internal/errors.js";
import { createIdentityLogger, type Logger } from "../observability/logger.js";
import {
  expectValue,
  type CheckContext,
  type Handler,
  type StageValue,
} from "../pipeline/handler.js";
import { isNotFound, refString, type ClusterClient, type ObjectRef } from "../cluster/types.js";
import type { FederatedProvider } from "./oidc.js";

export const PROVIDER_NAMESPACE = "crossplane";

export const TOKEN_AUDIENCES: Readonly<Record<FederatedProvider, string>> = {
  aws: "amazonaws.com",
  azure: "api://AzureADTokenExchange",
};

const AWS_SERVICE_ACCOUNT_PREFIX = "aws-";
export const AZURE_SERVICE_ACCOUNT = "azure-provider-sa";

export interface ServiceAccountTokenIssuerOptions {
  provider: FederatedProvider;
  cluster: ClusterClient;
  expirationSeconds: number;
}

/**
 * Requests short-lived tokens for the provider ServiceAccounts. Forwards the
 * JWKS URI it receives and adds the issued tokens.
 */
export class ServiceAccountTokenIssuer implements Handler {
  private readonly log: Logger;

  constructor(private readonly options: ServiceAccountTokenIssuerOptions) {
    this.log = createIdentityLogger(options.provider);
  }

  async handle(ctx: CheckContext, ...inputs: StageValue[]): Promise<StageValue[]> {
    const jwksUri = expectValue(inputs, "jwksUri");

    const tokens: string[] = [];
    for (const ref of await this.serviceAccounts(ctx)) {
      ctx.signal.throwIfAborted();
      const token = await this.requestToken(ref);
      if (token) tokens.push(token);
    }

    if (tokens.length === 0) {
      throw VerificationError.configuration(
        "NO_TOKENS_ISSUED",
        `no ${this.options.provider} provider ServiceAccount tokens could be issued in namespace ${PROVIDER_NAMESPACE}`,
      );
    }
    this.log.debug({ count: tokens.length }, "issued ServiceAccount tokens");
    return [jwksUri, { kind: "tokens", tokens }];
  }

  private async serviceAccounts(ctx: CheckContext): Promise<ObjectRef[]> {
    if (this.options.provider === "azure") {
      return [{ namespace: PROVIDER_NAMESPACE, name: AZURE_SERVICE_ACCOUNT }];
    }
    ctx.signal.throwIfAborted();
    const accounts = await this.options.cluster
      .listServiceAccounts(PROVIDER_NAMESPACE)
      .catch((err: unknown) => {
        throw VerificationError.infrastructure(
          "SERVICE_ACCOUNT_LIST_FAILED",
          `failed to list ServiceAccounts in ${PROVIDER_NAMESPACE}: ${errorMessage(err)}`,
          err,
        );
      });
    return accounts
      .filter((sa) => sa.name.startsWith(AWS_SERVICE_ACCOUNT_PREFIX))
      .map(({ namespace, name }) => ({ namespace, name }));
  }

  /** Undefined when the ServiceAccount does not exist. */
  private async requestToken(ref: ObjectRef): Promise<string | undefined> {
    const { cluster, provider, expirationSeconds } = this.options;
    try {
      return await cluster.createServiceAccountToken(ref, {
        audiences: [TOKEN_AUDIENCES[provider]],
        expirationSeconds,
      });
    } catch (err) {
      if (isNotFound(err)) {
        this.log.warn({ serviceAccount: refString(ref) }, "ServiceAccount not found");
        return undefined;
      }
      throw VerificationError.infrastructure(
        "TOKEN_REQUEST_FAILED",
        `failed to request a token for ${refString(ref)}: ${errorMessage(err)}`,
        err,
      );
    }
  }
}
