import { createLocalJWKSet, errors as joseErrors, jwtVerify } from "jose";
import { z } from "zod";
import { VerificationError, errorMessage } from "../internal/errors.js";
import { createIdentityLogger, type Logger } from "../observability/logger.js";
import {
  expectValue,
  type CheckContext,
  type Handler,
  type StageValue,
} from "../pipeline/handler.js";
import { getJson, type FetchFn } from "./http.js";
import type { FederatedProvider } from "./oidc.js";
import { TOKEN_AUDIENCES } from "./tokens.js";

const Jwk = z.object({
  kty: z.string(),
  kid: z.string().optional(),
  alg: z.string().optional(),
  use: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
  crv: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
});

const JwkSet = z.object({ keys: z.array(Jwk) });

export interface JwtVerifierOptions {
  provider: FederatedProvider;
  fetch?: FetchFn;
}

/**
 * Verifies every issued token against the issuer's JWKS: signature, expiry
 * and audience. The key set is fetched once per run and never cached.
 */
export class JwtVerifier implements Handler {
  private readonly log: Logger;
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: JwtVerifierOptions) {
    this.log = createIdentityLogger(options.provider);
    this.fetchFn = options.fetch ?? globalThis.fetch;
  }

  async handle(ctx: CheckContext, ...inputs: StageValue[]): Promise<StageValue[]> {
    const { uri } = expectValue(inputs, "jwksUri");
    const tokens = expectValue(inputs, "tokens");

    const keySet = await this.fetchKeySet(ctx, uri);
    const audience = TOKEN_AUDIENCES[this.options.provider];

    for (const [index, token] of tokens.tokens.entries()) {
      ctx.signal.throwIfAborted();
      try {
        await jwtVerify(token, keySet, { audience });
      } catch (err) {
        throw VerificationError.protocol(
          "JWT_INVALID",
          `token ${index + 1} of ${tokens.tokens.length} failed verification: ${errorMessage(err)}`,
          { index, reason: err instanceof joseErrors.JOSEError ? err.code : undefined },
        );
      }
    }

    this.log.debug({ count: tokens.tokens.length }, "verified tokens");
    return [tokens];
  }

  private async fetchKeySet(ctx: CheckContext, uri: string) {
    const body = await getJson(this.fetchFn, uri, ctx.signal, {
      unreachable: "JWKS_UNREACHABLE",
      non200: "JWKS_NON_200",
      malformed: "JWKS_MALFORMED",
    });
    const parsed = JwkSet.safeParse(body);
    if (!parsed.success) {
      throw VerificationError.infrastructure("JWKS_MALFORMED", `${uri} did not return a JSON Web Key Set`);
    }
    return createLocalJWKSet(parsed.data);
  }
}
