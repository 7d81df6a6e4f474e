import { describe, it, expect } from "vitest";
import { NodeGroupChecker } from "./node-groups.js";
import { MemoryClusterClient } from "../cluster/memory.js";
import { checkContext } from "../pipeline/handler.js";
import { prepareCluster } from "../../tests/helpers/fakes.js";

describe("NodeGroupChecker", () => {
  it("passes with a GPU node", async () => {
    const cluster = prepareCluster(new MemoryClusterClient());
    await expect(new NodeGroupChecker(cluster).handle(checkContext())).resolves.toEqual([]);
  });

  it("fails when no node is labelled type=gpu", async () => {
    const cluster = new MemoryClusterClient();
    cluster.nodes.push({ name: "node-a", labels: { type: "general" }, annotations: {} });

    await expect(new NodeGroupChecker(cluster).handle(checkContext())).rejects.toMatchObject({
      kind: "CONFIGURATION",
      code: "NO_GPU_NODES",
      message: "no node is labelled type=gpu",
    });
  });
});
