import { VerificationError, errorMessage, isVerificationError } from "../internal/errors.js";
import { createChecksLogger, type Logger } from "../observability/logger.js";
import {
  expectValue,
  type CheckContext,
  type Handler,
  type StageValue,
} from "../pipeline/handler.js";
import { decodeUrlEncodedPolicyDocument } from "../policy/codec.js";
import { PolicyEquivalenceEngine } from "../policy/equivalence.js";
import type { PolicyRegistry } from "../policy/registry.js";
import type { PlaceholderContext } from "../policy/types.js";
import {
  providerRoleName,
  webIdentityArn,
  type AwsGateway,
  type AwsIamReader,
} from "../cloud/aws.js";

export interface AwsRolePolicyCheckerOptions {
  gateway: AwsGateway;
  registry: PolicyRegistry;
  placeholders: PlaceholderContext;
  accountId: string;
  clusterName: string;
  /** RoleSessionName of the assumed sessions. */
  sessionName: string;
}

/**
 * Federates every issued token into the provider role and checks, with the
 * resulting credentials, the role's trust policy and the default version of
 * each managed policy next to it.
 */
export class AwsRolePolicyChecker implements Handler {
  private readonly log: Logger = createChecksLogger("aws-role");
  private readonly engine: PolicyEquivalenceEngine;

  constructor(private readonly options: AwsRolePolicyCheckerOptions) {
    this.engine = new PolicyEquivalenceEngine(options.placeholders);
  }

  async handle(ctx: CheckContext, ...inputs: StageValue[]): Promise<StageValue[]> {
    const { tokens } = expectValue(inputs, "tokens");
    const { gateway, accountId, clusterName, sessionName } = this.options;
    const roleName = providerRoleName(clusterName);
    const roleArn = webIdentityArn(accountId, clusterName, "role", roleName);

    for (const token of tokens) {
      const credentials = await awsCall(ctx, `assume ${roleArn}`, () =>
        gateway.assumeRoleWithWebIdentity(
          { roleArn, sessionName, webIdentityToken: token },
          ctx.signal,
        ),
      );
      const iam = gateway.iam(credentials);
      await this.checkTrustPolicy(ctx, iam, roleName);
      for (const suffix of this.options.registry.managedPolicySuffixes("aws")) {
        await this.checkManagedPolicy(ctx, iam, roleName, suffix);
      }
    }
    this.log.debug({ role: roleArn, sessions: tokens.length }, "role policies match");
    return [];
  }

  private async checkTrustPolicy(ctx: CheckContext, iam: AwsIamReader, roleName: string) {
    const encoded = await awsCall(ctx, `read role ${roleName}`, () =>
      iam.getRoleTrustPolicy(roleName, ctx.signal),
    );
    if (encoded === undefined) {
      throw VerificationError.protocol(
        "NO_TRUST_POLICY",
        `role ${roleName} has no assume-role policy document`,
      );
    }
    this.engine.verify(
      `trust policy of role ${roleName}`,
      decodeUrlEncodedPolicyDocument(encoded),
      this.options.registry.document("aws", "assume-role"),
    );
  }

  private async checkManagedPolicy(
    ctx: CheckContext,
    iam: AwsIamReader,
    roleName: string,
    suffix: string,
  ) {
    const { accountId, clusterName, registry } = this.options;
    const policyArn = webIdentityArn(accountId, clusterName, "policy", roleName, suffix);

    const versions = await awsCall(ctx, `list versions of ${policyArn}`, () =>
      iam.listPolicyVersions(policyArn, ctx.signal),
    );
    const defaultVersion = versions.find((v) => v.isDefault);
    if (!defaultVersion) {
      throw VerificationError.protocol(
        "NO_DEFAULT_POLICY_VERSION",
        `policy ${policyArn} has no default version`,
      );
    }

    const encoded = await awsCall(ctx, `read ${policyArn} ${defaultVersion.versionId}`, () =>
      iam.getPolicyVersionDocument(policyArn, defaultVersion.versionId, ctx.signal),
    );
    if (encoded === undefined) {
      throw VerificationError.protocol(
        "POLICY_DOCUMENT_MISSING",
        `policy ${policyArn} version ${defaultVersion.versionId} has no document`,
      );
    }
    this.engine.verify(
      `policy ${policyArn}`,
      decodeUrlEncodedPolicyDocument(encoded),
      registry.managedPolicy("aws", suffix),
    );
  }
}

async function awsCall<T>(ctx: CheckContext, description: string, call: () => Promise<T>): Promise<T> {
  ctx.signal.throwIfAborted();
  try {
    return await call();
  } catch (err) {
    ctx.signal.throwIfAborted();
    if (isVerificationError(err)) throw err;
    throw VerificationError.infrastructure(
      "AWS_REQUEST_FAILED",
      `failed to ${description}: ${errorMessage(err)}`,
      err,
    );
  }
}
