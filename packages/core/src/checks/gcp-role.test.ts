import { describe, it, expect } from "vitest";
import { GcpRolePermissionsChecker } from "./gcp-role.js";
import { MemoryClusterClient, type PodScript } from "../cluster/memory.js";
import { EphemeralExecutor } from "../executor/ephemeral-executor.js";
import { checkContext } from "../pipeline/handler.js";
import { defaultPolicyRegistry } from "../policy/registry.js";
import type { PodSpec } from "../cluster/types.js";

const expected = [...defaultPolicyRegistry().permissions("gcp", "role-permissions")];

function setup(script: PodScript) {
  const specs: PodSpec[] = [];
  const cluster = new MemoryClusterClient({
    podBehavior: (spec) => {
      specs.push(spec);
      return script;
    },
  });
  const checker = new GcpRolePermissionsChecker({
    executor: new EphemeralExecutor({ cluster, pollIntervalMs: 1, timeoutMs: 500 }),
    registry: defaultPolicyRegistry(),
    image: "google/cloud-sdk:slim",
  });
  return { cluster, specs, checker };
}

describe("GcpRolePermissionsChecker", () => {
  it("lists the role from a pod running as the provider", async () => {
    const { cluster, specs, checker } = setup({
      phases: ["Pending", "Succeeded"],
      log: `${[...expected, "storage.buckets.get"].join(";")}\n`,
    });

    await expect(checker.handle(checkContext())).resolves.toEqual([]);
    expect(specs).toHaveLength(1);
    expect(specs[0]).toMatchObject({
      namespace: "crossplane",
      name: "gcp-crossplane-role-checker",
      serviceAccountName: "gcp-provider-sa",
      image: "google/cloud-sdk:slim",
    });
    expect(cluster.events).toEqual([
      "create Pod crossplane/gcp-crossplane-role-checker",
      "delete Pod crossplane/gcp-crossplane-role-checker",
    ]);
  });

  it("names missing permissions", async () => {
    const { checker } = setup({ phases: ["Succeeded"], log: expected.slice(1).join(";") });

    await expect(checker.handle(checkContext())).rejects.toMatchObject({
      kind: "PERMISSION_MISMATCH",
      code: "MISSING_PERMISSIONS",
      missing: [expected[0]],
    });
  });

  it("reports why the script failed", async () => {
    const { checker } = setup({
      phases: ["Running", "Failed"],
      log: "no uxp_provider role is bound to uxp-provider-blue@proj-1.iam.gserviceaccount.com\n",
    });

    await expect(checker.handle(checkContext())).rejects.toMatchObject({
      kind: "CONFIGURATION",
      code: "CHECK_JOB_FAILED",
      message:
        "pod crossplane/gcp-crossplane-role-checker failed: no uxp_provider role is bound to uxp-provider-blue@proj-1.iam.gserviceaccount.com",
    });
  });
});
