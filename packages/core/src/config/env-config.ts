import { z } from "zod";
import { VerificationError, errorMessage } from "../internal/errors.js";
import type { PlaceholderContext } from "../policy/types.js";

const required = z.string().trim().min(1, "is required");

const AwsCloudSpec = z.object({
  provider: z.literal("aws"),
  cloudZone: required,
  aws: z.object({
    accountID: required,
    oidcUrl: required,
  }),
});

const AzureCloudSpec = z.object({
  provider: z.literal("azure"),
  cloudZone: required,
  azure: z.object({
    clientID: required,
    tenantID: required,
    subscriptionID: required,
    resourceGroup: required,
    oidcUrl: required,
  }),
});

const GcpCloudSpec = z.object({
  provider: z.literal("gcp"),
  cloudZone: required,
  gcp: z.object({
    projectID: required,
    projectNumber: z.string().optional(),
  }),
});

const CloudSpec = z.discriminatedUnion("provider", [AwsCloudSpec, AzureCloudSpec, GcpCloudSpec]);

const EnvConfigSchema = z.object({
  apiVersion: z.string().optional(),
  kind: z.literal("EnvConfig"),
  metadata: z.object({ name: z.string().optional() }).passthrough().optional(),
  spec: z
    .object({
      clusterName: required,
      cloudSpec: CloudSpec,
    })
    .passthrough(),
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;
export type CloudSpec = z.infer<typeof CloudSpec>;
export type CloudProvider = CloudSpec["provider"];
export type AwsCloudSpec = z.infer<typeof AwsCloudSpec>;
export type AzureCloudSpec = z.infer<typeof AzureCloudSpec>;
export type GcpCloudSpec = z.infer<typeof GcpCloudSpec>;

/** Validates an already-parsed environment configuration document. */
export function parseEnvConfig(doc: unknown): EnvConfig {
  const parsed = EnvConfigSchema.safeParse(doc);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join(".") : "";
    throw VerificationError.configuration(
      "ENV_CONFIG_INVALID",
      `invalid environment configuration: ${field}: ${issue?.message ?? "unknown issue"}`,
      field,
    );
  }
  return parsed.data;
}

/** Reads the base64-encoded JSON form handed to the in-cluster checker pod. */
export function decodeEnvConfig(encoded: string): EnvConfig {
  let doc: unknown;
  try {
    doc = JSON.parse(Buffer.from(encoded, "base64").toString("utf8"));
  } catch (err) {
    throw VerificationError.configuration(
      "ENV_CONFIG_UNREADABLE",
      `environment configuration is not base64-encoded JSON: ${errorMessage(err)}`,
    );
  }
  return parseEnvConfig(doc);
}

export function encodeEnvConfig(config: EnvConfig): string {
  return Buffer.from(JSON.stringify(config), "utf8").toString("base64");
}

/** Strips scheme and trailing slashes: "https://host/id/x/" -> "host/id/x". */
export function issuerIdOf(oidcUrl: string): string {
  return oidcUrl.replace(/^https?:\/\//, "").replace(/\/+$/, "");
}

export function placeholderContextOf(config: EnvConfig): PlaceholderContext {
  const clusterName = config.spec.clusterName;
  const cloud = config.spec.cloudSpec;
  switch (cloud.provider) {
    case "aws":
      return {
        clusterName,
        accountId: cloud.aws.accountID,
        issuerId: issuerIdOf(cloud.aws.oidcUrl),
      };
    case "azure":
      return {
        clusterName,
        accountId: cloud.azure.subscriptionID,
        issuerId: issuerIdOf(cloud.azure.oidcUrl),
      };
    case "gcp":
      return { clusterName, accountId: cloud.gcp.projectID, issuerId: "" };
  }
}
