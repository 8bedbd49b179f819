import { setTimeout as delay } from "node:timers/promises";
import { decodeTaskStatus } from "../apiClient/decode.js";
import { TaskFailedError, TaskProtocolError, TaskTimeoutError } from "../errors.js";
import { silentLogger, type Logger } from "../telemetry/logger.js";
import type { TaskWaiter, Transport } from "../types/interfaces.js";
import type { TaskRef, TaskStatus, TaskWaitOptions } from "../types/task.js";
import { taskStatusPath } from "./paths.js";

export const DEFAULT_POLL_INTERVAL_MS = 2_000;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface TaskPollerOptions {
  intervalMs?: number;
  timeoutMs?: number;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
}

const sleepFor: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Polls `/nodes/{node}/tasks/{upid}/status` at a fixed interval until the task
 * stops. Only `running` and `stopped` are known states; `stopped` succeeds
 * only with exit status `OK`.
 */
export class TaskPoller implements TaskWaiter {
  private readonly intervalMs: number;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(
    private readonly transport: Transport,
    options: TaskPollerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? sleepFor;
    this.now = options.now ?? Date.now;
  }

  async wait(task: TaskRef, options: TaskWaitOptions = {}): Promise<TaskStatus> {
    const intervalMs = options.intervalMs ?? this.intervalMs;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const { signal } = options;
    const startedAt = this.now();
    let polls = 0;

    for (;;) {
      signal?.throwIfAborted();

      const raw = decodeTaskStatus(await this.transport.get(taskStatusPath(task)));
      polls += 1;
      this.logger.debug({ node: task.node, upid: task.upid, status: raw.status, exitStatus: raw.exitStatus, polls }, "task poll");

      if (raw.status === "stopped") {
        if (raw.exitStatus === "OK") {
          return { state: "stopped", exitStatus: raw.exitStatus };
        }
        throw new TaskFailedError(task, raw.exitStatus);
      }
      if (raw.status !== "running") {
        throw new TaskProtocolError(task, raw.status);
      }

      options.onProgress?.({ state: "running" });

      if (timeoutMs !== undefined && this.now() - startedAt >= timeoutMs) {
        throw new TaskTimeoutError(task, timeoutMs);
      }

      try {
        await this.sleep(intervalMs, signal);
      } catch (err) {
        if (signal?.aborted) throw signal.reason;
        throw err;
      }
    }
  }
}
