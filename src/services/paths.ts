import type { VmLocation } from "../types/cluster.js";
import type { TaskRef } from "../types/task.js";

const seg = encodeURIComponent;

export const CLUSTER_VM_RESOURCES_PATH = "/cluster/resources?type=vm";
export const NODES_PATH = "/nodes";
export const CLUSTER_STATUS_PATH = "/cluster/status";

export function qemuPath(location: VmLocation): string {
  return `/nodes/${seg(location.node)}/qemu/${location.vmid}`;
}

export function snapshotsPath(location: VmLocation): string {
  return `${qemuPath(location)}/snapshot`;
}

export function snapshotPath(location: VmLocation, snapname: string): string {
  return `${snapshotsPath(location)}/${seg(snapname)}`;
}

export function rollbackPath(location: VmLocation, snapname: string): string {
  return `${snapshotPath(location, snapname)}/rollback`;
}

export function vmStatusPath(location: VmLocation): string {
  return `${qemuPath(location)}/status/current`;
}

export function taskStatusPath(task: TaskRef): string {
  return `/nodes/${seg(task.node)}/tasks/${seg(task.upid)}/status`;
}
