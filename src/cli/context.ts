import { PveClient } from "../apiClient/pveClient.js";
import type { ConnectionSettings } from "../config/env.js";
import { ClusterService } from "../services/clusterService.js";
import { ResourceResolver } from "../services/resourceResolver.js";
import { SnapshotService } from "../services/snapshotService.js";
import { TaskPoller } from "../services/taskWaiter.js";
import { VmService } from "../services/vmService.js";
import type { Logger } from "../telemetry/logger.js";
import type { VersionInfo } from "../types/cluster.js";

export interface CommandContext {
  settings: ConnectionSettings;
  snapshots: SnapshotService;
  vms: VmService;
  cluster: ClusterService;
  /** Version reported by the host the connection probe selected. */
  version: VersionInfo;
  close(): Promise<void>;
}

/** `signal` cancels every API request made through the context. */
export type OpenContext = (settings: ConnectionSettings, logger: Logger, signal?: AbortSignal) => Promise<CommandContext>;

export const openContext: OpenContext = async (settings, logger, signal) => {
  const { client, version } = await PveClient.connect({
    hosts: settings.hosts,
    defaultPort: settings.port,
    token: settings.token,
    verifySsl: settings.verifySsl,
    probeTimeoutMs: settings.probeTimeoutMs,
    protocol: settings.protocol,
    logger,
    signal
  });
  logger.debug({ baseUrl: client.baseUrl }, "connected");

  const resolver = new ResourceResolver(client, { logger });
  const waiter = new TaskPoller(client, {
    intervalMs: settings.pollIntervalMs,
    timeoutMs: settings.taskTimeoutMs,
    logger
  });

  return {
    settings,
    snapshots: new SnapshotService({ transport: client, resolver, waiter, logger }),
    vms: new VmService(client, resolver),
    cluster: new ClusterService(client, { logger }),
    version,
    close: () => client.close()
  };
};
