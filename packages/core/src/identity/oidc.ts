import { z } from "zod";
import { VerificationError } from "../internal/errors.js";
import { createIdentityLogger, type Logger } from "../observability/logger.js";
import type { CheckContext, Handler, StageValue } from "../pipeline/handler.js";
import { getJson, type FetchFn } from "./http.js";

export type FederatedProvider = "aws" | "azure";

/** Issuer shapes of EKS and AKS clusters. EKS issuers are configured without a scheme. */
export const ISSUER_PATTERNS: Readonly<Record<FederatedProvider, RegExp>> = {
  aws: new RegExp(
    String.raw`^oidc\.eks\.(af|il|ap|ca|eu|me|sa|us|cn|us-gov|us-iso|us-isob)-` +
      String.raw`(central|north|(north(?:east|west))|south|south(?:east|west)|east|west)-\d{1}\.amazonaws\.com\/id\/\w+$`,
  ),
  azure: /^https:\/\/.+\.oic\.prod-aks\.azure\.com\/[\w+-]+\/[\w+-]+\/$/,
};

const WELL_KNOWN_PATH = "/.well-known/openid-configuration";

const DiscoveryDocument = z.object({
  jwks_uri: z.string().optional(),
});

export function isValidIssuer(provider: FederatedProvider, issuerUrl: string): boolean {
  return ISSUER_PATTERNS[provider].test(issuerUrl);
}

export function discoveryUrl(issuerUrl: string): string {
  const url = issuerUrl.replace(/\/$/, "") + WELL_KNOWN_PATH;
  return url.startsWith("https://") ? url : `https://${url}`;
}

export interface OidcIssuerCheckerOptions {
  provider: FederatedProvider;
  issuerUrl: string;
  fetch?: FetchFn;
}

/**
 * Checks the cluster's OIDC issuer: its shape first, then its discovery
 * document. Emits the discovered JWKS URI.
 */
export class OidcIssuerChecker implements Handler {
  private readonly log: Logger;
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: OidcIssuerCheckerOptions) {
    this.log = createIdentityLogger(options.provider);
    this.fetchFn = options.fetch ?? globalThis.fetch;
  }

  async handle(ctx: CheckContext): Promise<StageValue[]> {
    const { provider, issuerUrl } = this.options;
    if (!isValidIssuer(provider, issuerUrl)) {
      throw VerificationError.configuration(
        "OIDC_URL_MALFORMED",
        `OIDC issuer ${JSON.stringify(issuerUrl)} is not a valid ${provider} issuer URL`,
        `spec.cloudSpec.${provider}.oidcUrl`,
      );
    }

    const url = discoveryUrl(issuerUrl);
    const body = await getJson(this.fetchFn, url, ctx.signal, {
      unreachable: "OIDC_DISCOVERY_UNREACHABLE",
      non200: "OIDC_DISCOVERY_NON_200",
      malformed: "OIDC_DISCOVERY_MALFORMED",
    });

    const parsed = DiscoveryDocument.safeParse(body);
    if (!parsed.success) {
      throw VerificationError.infrastructure(
        "OIDC_DISCOVERY_MALFORMED",
        `${url} did not return an OpenID configuration document`,
      );
    }
    const uri = parsed.data.jwks_uri;
    if (!uri) {
      throw VerificationError.configuration(
        "OIDC_JWKS_URI_MISSING",
        `${url} has no jwks_uri`,
        "jwks_uri",
      );
    }

    this.log.debug({ jwksUri: uri }, "discovered JWKS URI");
    return [{ kind: "jwksUri", uri }];
  }
}
