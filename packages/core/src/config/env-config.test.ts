import { describe, it, expect } from "vitest";
import {
  decodeEnvConfig,
  encodeEnvConfig,
  issuerIdOf,
  parseEnvConfig,
  placeholderContextOf,
} from "./env-config.js";
import { VerificationError } from "../internal/errors.js";

const awsDoc = {
  apiVersion: "preflight/v1",
  kind: "EnvConfig",
  spec: {
    clusterName: "blue",
    cloudSpec: {
      provider: "aws",
      cloudZone: "us-west-2",
      aws: {
        accountID: "123456789012",
        oidcUrl: "https://oidc.eks.us-west-2.amazonaws.com/id/ABCDEF/",
      },
    },
  },
};

describe("environment configuration", () => {
  it("accepts a complete AWS document", () => {
    const cfg = parseEnvConfig(awsDoc);
    expect(cfg.spec.clusterName).toBe("blue");
    expect(cfg.spec.cloudSpec.provider).toBe("aws");
  });

  it("names the missing field", () => {
    const doc = structuredClone(awsDoc);
    doc.spec.cloudSpec.aws.accountID = "";
    try {
      parseEnvConfig(doc);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(VerificationError);
      expect(err).toMatchObject({
        kind: "CONFIGURATION",
        code: "ENV_CONFIG_INVALID",
        field: "spec.cloudSpec.aws.accountID",
      });
    }
  });

  it("rejects an unknown provider", () => {
    const doc = structuredClone(awsDoc);
    doc.spec.cloudSpec.provider = "openstack";
    expect(() => parseEnvConfig(doc)).toThrow(/spec\.cloudSpec\.provider/);
  });

  it("round-trips through the base64 form", () => {
    const cfg = parseEnvConfig(awsDoc);
    expect(decodeEnvConfig(encodeEnvConfig(cfg))).toEqual(cfg);
  });

  it("rejects a payload that is not JSON", () => {
    const encoded = Buffer.from("kind: EnvConfig").toString("base64");
    expect(() => decodeEnvConfig(encoded)).toThrow(/not base64-encoded JSON/);
  });

  it("derives placeholder values per provider", () => {
    expect(placeholderContextOf(parseEnvConfig(awsDoc))).toEqual({
      clusterName: "blue",
      accountId: "123456789012",
      issuerId: "oidc.eks.us-west-2.amazonaws.com/id/ABCDEF",
    });

    const gcp = parseEnvConfig({
      kind: "EnvConfig",
      spec: {
        clusterName: "green",
        cloudSpec: { provider: "gcp", cloudZone: "europe-west1", gcp: { projectID: "proj-1" } },
      },
    });
    expect(placeholderContextOf(gcp)).toEqual({
      clusterName: "green",
      accountId: "proj-1",
      issuerId: "",
    });
  });

  it("strips scheme and trailing slash from issuers", () => {
    expect(issuerIdOf("https://westeurope.oic.prod-aks.azure.com/t/c/")).toBe(
      "westeurope.oic.prod-aks.azure.com/t/c",
    );
    expect(issuerIdOf("oidc.eks.us-east-1.amazonaws.com/id/X")).toBe(
      "oidc.eks.us-east-1.amazonaws.com/id/X",
    );
  });
});
