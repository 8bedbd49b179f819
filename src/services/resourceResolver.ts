import { decodeClusterResources } from "../apiClient/decode.js";
import { VmNotFoundError } from "../errors.js";
import { silentLogger, type Logger } from "../telemetry/logger.js";
import type { ClusterResource, VmLocation } from "../types/cluster.js";
import type { Transport, VmResolver } from "../types/interfaces.js";
import { CLUSTER_VM_RESOURCES_PATH } from "./paths.js";

const MAX_VMID = 4_294_967_295;

/** Unsigned 32-bit parse; `null` when the identifier is not a plain number. */
export function parseVmid(identifier: string): number | null {
  if (!/^\+?\d+$/.test(identifier)) return null;
  const vmid = Number(identifier);
  return Number.isSafeInteger(vmid) && vmid <= MAX_VMID ? vmid : null;
}

export class ResourceResolver implements VmResolver {
  private readonly logger: Logger;

  constructor(
    private readonly transport: Transport,
    options?: { logger?: Logger }
  ) {
    this.logger = options?.logger ?? silentLogger;
  }

  /** Fresh inventory on every call; nothing is cached. */
  async listResources(): Promise<ClusterResource[]> {
    return decodeClusterResources(await this.transport.get(CLUSTER_VM_RESOURCES_PATH));
  }

  /**
   * A numeric identifier is matched against vmids first. Whether or not that
   * matched anything parseable, the exact name is tried next, so "300" can
   * still find a VM named "300".
   */
  async resolve(identifier: string): Promise<VmLocation> {
    const resources = await this.listResources();

    const vmid = parseVmid(identifier);
    if (vmid !== null) {
      const byId = resources.find((r) => r.vmid === vmid);
      if (byId) {
        this.logger.debug({ identifier, node: byId.node, vmid: byId.vmid }, "resolved vm by id");
        return { node: byId.node, vmid: byId.vmid };
      }
    }

    const byName = resources.find((r) => r.name === identifier);
    if (byName) {
      this.logger.debug({ identifier, node: byName.node, vmid: byName.vmid }, "resolved vm by name");
      return { node: byName.node, vmid: byName.vmid };
    }

    throw new VmNotFoundError(identifier);
  }
}
