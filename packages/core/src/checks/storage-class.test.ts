import { describe, it, expect } from "vitest";
import { StorageClassChecker } from "./storage-class.js";
import { MemoryClusterClient } from "../cluster/memory.js";
import { checkContext } from "../pipeline/handler.js";
import { VerificationError } from "../internal/errors.js";
import { prepareCluster } from "../../tests/helpers/fakes.js";

describe("StorageClassChecker", () => {
  it("passes when one class is the default", async () => {
    const cluster = prepareCluster(new MemoryClusterClient());
    await expect(new StorageClassChecker(cluster).handle(checkContext())).resolves.toEqual([]);
  });

  it("fails without a default class", async () => {
    const cluster = new MemoryClusterClient();
    cluster.storageClasses.push({
      name: "gp3",
      labels: {},
      annotations: { "storageclass.kubernetes.io/is-default-class": "false" },
    });

    const err = await new StorageClassChecker(cluster).handle(checkContext()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(VerificationError);
    expect(err).toMatchObject({ kind: "CONFIGURATION", code: "NO_DEFAULT_STORAGE_CLASS" });
  });

  it("wraps API failures", async () => {
    const cluster = new MemoryClusterClient();
    cluster.failNext("listStorageClasses", new Error("connection refused"));

    await expect(new StorageClassChecker(cluster).handle(checkContext())).rejects.toMatchObject({
      kind: "INFRASTRUCTURE",
      code: "CLUSTER_REQUEST_FAILED",
      message: "failed to list StorageClasses: connection refused",
    });
  });

  it("does not call the cluster once cancelled", async () => {
    const cluster = prepareCluster(new MemoryClusterClient());
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));

    await expect(
      new StorageClassChecker(cluster).handle(checkContext(controller.signal)),
    ).rejects.toThrow("cancelled");
  });
});
