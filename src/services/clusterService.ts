import { decodeClusterStatusNodes, decodeNodes } from "../apiClient/decode.js";
import { silentLogger, type Logger } from "../telemetry/logger.js";
import type { Transport } from "../types/interfaces.js";
import type { NodeSummary } from "../types/cluster.js";
import { CLUSTER_STATUS_PATH, NODES_PATH } from "./paths.js";

export class ClusterService {
  private readonly logger: Logger;

  constructor(
    private readonly transport: Transport,
    options?: { logger?: Logger }
  ) {
    this.logger = options?.logger ?? silentLogger;
  }

  /** `/nodes` first; any failure there falls back to the `node` entries of `/cluster/status`. */
  async listNodes(): Promise<NodeSummary[]> {
    try {
      return decodeNodes(await this.transport.get(NODES_PATH));
    } catch (err) {
      this.logger.debug({ err }, "node list failed, falling back to cluster status");
    }
    return decodeClusterStatusNodes(await this.transport.get(CLUSTER_STATUS_PATH));
  }
}
