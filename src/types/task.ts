/**
 * A task handle is only meaningful on the node that issued it, so the two
 * always travel together.
 */
export interface TaskRef {
  node: string;
  upid: string;
}

export type TaskState = "running" | "stopped";

export interface TaskStatus {
  state: TaskState;
  /** Present only once the task has stopped. */
  exitStatus?: string;
}

export interface TaskWaitOptions {
  intervalMs?: number;
  /** No deadline when unset. */
  timeoutMs?: number;
  signal?: AbortSignal;
  onProgress?: (status: TaskStatus) => void;
}
