import type { ClusterResource, VmLocation } from "./cluster.js";
import type { TaskRef, TaskStatus, TaskWaitOptions } from "./task.js";

export type FormBody = Record<string, string | number | undefined>;

/**
 * Authenticated request/response primitive. Every verb resolves to the
 * unwrapped `data` member of the response envelope; callers narrow it.
 */
export interface Transport {
  get(path: string): Promise<unknown>;
  post(path: string, form?: FormBody): Promise<unknown>;
  delete(path: string): Promise<unknown>;
}

export interface VmResolver {
  resolve(identifier: string): Promise<VmLocation>;
  listResources(): Promise<ClusterResource[]>;
}

export interface TaskWaiter {
  wait(task: TaskRef, options?: TaskWaitOptions): Promise<TaskStatus>;
}
