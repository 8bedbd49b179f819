import type { VmLocation } from "./cluster.js";
import type { TaskRef } from "./task.js";

export interface SnapshotDescriptor {
  name: string;
  description?: string;
  /** Epoch seconds. */
  snaptime?: number;
}

export interface CreateSnapshotRequest {
  snapname?: string;
  description?: string;
  /** Include RAM and device state. */
  vmstate?: boolean;
}

export type SnapshotAction = "create" | "delete" | "rollback";

export interface SnapshotTaskResult {
  action: SnapshotAction;
  location: VmLocation;
  snapname: string;
  task: TaskRef;
}

export interface SnapshotList {
  location: VmLocation;
  snapshots: SnapshotDescriptor[];
}
