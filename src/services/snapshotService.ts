import { decodeSnapshots, decodeTaskHandle } from "../apiClient/decode.js";
import { silentLogger, type Logger } from "../telemetry/logger.js";
import type { FormBody, TaskWaiter, Transport, VmResolver } from "../types/interfaces.js";
import type { VmLocation } from "../types/cluster.js";
import type {
  CreateSnapshotRequest,
  SnapshotAction,
  SnapshotList,
  SnapshotTaskResult
} from "../types/snapshot.js";
import type { TaskRef, TaskStatus, TaskWaitOptions } from "../types/task.js";
import { compactLocalStamp, localDateTime } from "../utils/time.js";
import { rollbackPath, snapshotPath, snapshotsPath } from "./paths.js";

/** Pseudo-snapshot the API lists for the live VM state. */
export const CURRENT_STATE_ENTRY = "current";

export interface SnapshotServiceOptions {
  transport: Transport;
  resolver: VmResolver;
  waiter: TaskWaiter;
  logger?: Logger;
  now?: () => Date;
}

export interface SnapshotOperationHooks {
  /** Called once the task is accepted, before polling starts. */
  onSubmitted?: (result: SnapshotTaskResult) => void;
  onProgress?: (status: TaskStatus) => void;
  signal?: AbortSignal;
}

export function defaultSnapshotName(now: Date): string {
  return `snapshot-${compactLocalStamp(now)}`;
}

export function defaultSnapshotDescription(now: Date): string {
  return `Snapshot created on ${localDateTime(now)}`;
}

export class SnapshotService {
  private readonly transport: Transport;
  private readonly resolver: VmResolver;
  private readonly waiter: TaskWaiter;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: SnapshotServiceOptions) {
    this.transport = options.transport;
    this.resolver = options.resolver;
    this.waiter = options.waiter;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async create(vm: string, request: CreateSnapshotRequest = {}, hooks?: SnapshotOperationHooks): Promise<SnapshotTaskResult> {
    const location = await this.resolver.resolve(vm);
    const now = this.now();
    const snapname = request.snapname ?? defaultSnapshotName(now);
    const form: FormBody = {
      snapname,
      description: request.description ?? defaultSnapshotDescription(now),
      vmstate: request.vmstate ? 1 : undefined
    };

    const upid = decodeTaskHandle(await this.transport.post(snapshotsPath(location), form), "snapshot create");
    return this.track("create", location, snapname, upid, hooks);
  }

  async delete(vm: string, snapname: string, hooks?: SnapshotOperationHooks): Promise<SnapshotTaskResult> {
    const location = await this.resolver.resolve(vm);
    const upid = decodeTaskHandle(await this.transport.delete(snapshotPath(location, snapname)), "snapshot delete");
    return this.track("delete", location, snapname, upid, hooks);
  }

  async rollback(vm: string, snapname: string, hooks?: SnapshotOperationHooks): Promise<SnapshotTaskResult> {
    const location = await this.resolver.resolve(vm);
    const upid = decodeTaskHandle(await this.transport.post(rollbackPath(location, snapname)), "snapshot rollback");
    return this.track("rollback", location, snapname, upid, hooks);
  }

  async list(vm: string): Promise<SnapshotList> {
    const location = await this.resolver.resolve(vm);
    const snapshots = decodeSnapshots(await this.transport.get(snapshotsPath(location)));
    return { location, snapshots: snapshots.filter((s) => s.name !== CURRENT_STATE_ENTRY) };
  }

  private async track(
    action: SnapshotAction,
    location: VmLocation,
    snapname: string,
    upid: string,
    hooks?: SnapshotOperationHooks
  ): Promise<SnapshotTaskResult> {
    const task: TaskRef = { node: location.node, upid };
    const result: SnapshotTaskResult = { action, location, snapname, task };
    this.logger.info({ action, node: location.node, vmid: location.vmid, snapname, upid }, "snapshot task submitted");
    hooks?.onSubmitted?.(result);

    const waitOptions: TaskWaitOptions = { onProgress: hooks?.onProgress, signal: hooks?.signal };
    await this.waiter.wait(task, waitOptions);
    this.logger.info({ action, upid }, "snapshot task completed");
    return result;
  }
}
