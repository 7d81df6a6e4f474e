import { VerificationError } from "../internal/errors.js";
import type { CheckContext, Handler, StageValue } from "../pipeline/handler.js";
import type { ClusterClient } from "../cluster/types.js";
import { clusterCall } from "./cluster-call.js";

const NODE_TYPE_LABEL = "type";
const GPU_NODE_TYPE = "gpu";

/** Passes when at least one node belongs to a GPU node group. */
export class NodeGroupChecker implements Handler {
  constructor(private readonly cluster: ClusterClient) {}

  async handle(ctx: CheckContext): Promise<StageValue[]> {
    const nodes = await clusterCall(ctx, "list nodes", () => this.cluster.listNodes());
    if (!nodes.some((node) => node.labels[NODE_TYPE_LABEL] === GPU_NODE_TYPE)) {
      throw VerificationError.configuration(
        "NO_GPU_NODES",
        `no node is labelled ${NODE_TYPE_LABEL}=${GPU_NODE_TYPE}`,
      );
    }
    return [];
  }
}
