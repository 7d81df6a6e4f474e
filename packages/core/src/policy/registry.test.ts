import { describe, it, expect } from "vitest";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_POLICY_DATA_DIR, PolicyRegistry, defaultPolicyRegistry } from "./registry.js";

describe("PolicyRegistry", () => {
  const registry = defaultPolicyRegistry();

  it("reads the data directory beside the package sources", () => {
    const packageRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../..");
    expect(DEFAULT_POLICY_DATA_DIR).toBe(path.join(packageRoot, "data") + path.sep);
  });

  it("loads the AWS trust policy and managed policies", () => {
    const trust = registry.document("aws", "assume-role");
    expect(trust.Statement[0]?.Action).toEqual(["sts:AssumeRoleWithWebIdentity"]);
    expect(registry.managedPolicySuffixes("aws")).toEqual(["boundary"]);
    const boundary = registry.managedPolicy("aws", "boundary");
    expect(boundary.Statement[0]?.Sid).toBe("AllowAllActionsApartFromListed");
    expect(boundary.Statement[0]?.NotAction).toContain("iam:PassRole");
  });

  it("loads the Azure role definition and the GCP permission set", () => {
    const role = registry.document("azure", "role-definition");
    expect(role.Statement[0]?.Action).toHaveLength(49);
    expect(registry.permissions("gcp", "role-permissions").has("cloudsql.instances.create")).toBe(
      true,
    );
    expect(registry.managedPolicySuffixes("gcp")).toEqual([]);
  });

  it("is immutable", () => {
    const trust = registry.document("aws", "assume-role");
    expect(Object.isFrozen(trust)).toBe(true);
    expect(Object.isFrozen(trust.Statement[0])).toBe(true);
    expect(() => trust.Statement.push(...trust.Statement)).toThrow(TypeError);
  });

  it("returns the same instance on every call", () => {
    expect(defaultPolicyRegistry()).toBe(registry);
  });

  it("fails on an unknown kind", () => {
    expect(() => registry.document("gcp", "role-permissions")).toThrow(
      /No expected gcp policy document of kind role-permissions/,
    );
    expect(() => registry.permissions("aws", "assume-role")).toThrow(/No expected aws permission set/);
  });

  it("loads from another directory", () => {
    const dir = mkdtempSync(path.join(tmpdir(), "policies-"));
    const extra = { Statement: [{ Effect: "Allow", Action: "s3:*" }] };
    writeFileSync(path.join(dir, "aws.json"), JSON.stringify({ "managed-policy:extra": extra }));
    writeFileSync(path.join(dir, "azure.json"), "{}");
    writeFileSync(path.join(dir, "gcp.json"), JSON.stringify({ "role-permissions": ["a", "b"] }));

    const custom = PolicyRegistry.load(dir);
    expect(custom.managedPolicySuffixes("aws")).toEqual(["extra"]);
    expect([...custom.permissions("gcp", "role-permissions")]).toEqual(["a", "b"]);
  });
});
