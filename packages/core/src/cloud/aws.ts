import { AssumeRoleWithWebIdentityCommand, STSClient } from "@aws-sdk/client-sts";
import {
  GetPolicyVersionCommand,
  GetRoleCommand,
  IAMClient,
  ListPolicyVersionsCommand,
} from "@aws-sdk/client-iam";
import { VerificationError } from "../internal/errors.js";

export type ArnType = "role" | "policy";

/** `arn:aws:iam::<account>:<type>/web-identity/<cluster>/<name>[-<suffix>]` */
export function webIdentityArn(
  accountId: string,
  clusterName: string,
  type: ArnType,
  name: string,
  suffix?: string,
): string {
  const arn = `arn:aws:iam::${accountId}:${type}/web-identity/${clusterName}/${name}`;
  return suffix === undefined ? arn : `${arn}-${suffix}`;
}

export function providerRoleName(clusterName: string): string {
  return `crossplane-provider-${clusterName}`;
}

export interface TemporaryCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken: string;
}

export interface PolicyVersionInfo {
  versionId: string;
  isDefault: boolean;
}

/** IAM reads made with the credentials of an assumed role. Documents stay URL-encoded. */
export interface AwsIamReader {
  getRoleTrustPolicy(roleName: string, signal: AbortSignal): Promise<string | undefined>;
  listPolicyVersions(policyArn: string, signal: AbortSignal): Promise<PolicyVersionInfo[]>;
  getPolicyVersionDocument(
    policyArn: string,
    versionId: string,
    signal: AbortSignal,
  ): Promise<string | undefined>;
}

export interface AwsGateway {
  assumeRoleWithWebIdentity(
    input: { roleArn: string; sessionName: string; webIdentityToken: string },
    signal: AbortSignal,
  ): Promise<TemporaryCredentials>;
  iam(credentials: TemporaryCredentials): AwsIamReader;
}

/** AwsGateway over the v3 SDK clients. */
export class SdkAwsGateway implements AwsGateway {
  private readonly sts: STSClient;

  constructor(private readonly region: string) {
    this.sts = new STSClient({ region });
  }

  async assumeRoleWithWebIdentity(
    input: { roleArn: string; sessionName: string; webIdentityToken: string },
    signal: AbortSignal,
  ): Promise<TemporaryCredentials> {
    const out = await this.sts.send(
      new AssumeRoleWithWebIdentityCommand({
        RoleArn: input.roleArn,
        RoleSessionName: input.sessionName,
        WebIdentityToken: input.webIdentityToken,
      }),
      { abortSignal: signal },
    );
    const creds = out.Credentials;
    if (!creds?.AccessKeyId || !creds.SecretAccessKey || !creds.SessionToken) {
      throw VerificationError.protocol(
        "STS_NO_CREDENTIALS",
        `AssumeRoleWithWebIdentity on ${input.roleArn} returned no credentials`,
      );
    }
    return {
      accessKeyId: creds.AccessKeyId,
      secretAccessKey: creds.SecretAccessKey,
      sessionToken: creds.SessionToken,
    };
  }

  iam(credentials: TemporaryCredentials): AwsIamReader {
    const client = new IAMClient({ region: this.region, credentials });
    return {
      async getRoleTrustPolicy(roleName, signal) {
        const out = await client.send(new GetRoleCommand({ RoleName: roleName }), {
          abortSignal: signal,
        });
        return out.Role?.AssumeRolePolicyDocument;
      },
      async listPolicyVersions(policyArn, signal) {
        const out = await client.send(new ListPolicyVersionsCommand({ PolicyArn: policyArn }), {
          abortSignal: signal,
        });
        return (out.Versions ?? []).flatMap((v) =>
          v.VersionId ? [{ versionId: v.VersionId, isDefault: v.IsDefaultVersion === true }] : [],
        );
      },
      async getPolicyVersionDocument(policyArn, versionId, signal) {
        const out = await client.send(
          new GetPolicyVersionCommand({ PolicyArn: policyArn, VersionId: versionId }),
          { abortSignal: signal },
        );
        return out.PolicyVersion?.Document;
      },
    };
  }
}
