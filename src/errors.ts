import type { TaskRef } from "./types/task.js";

export class PveToolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PveToolError";
  }
}

export class HttpError extends PveToolError {
  public readonly statusCode: number;
  public readonly statusText: string;
  public readonly body: string;

  constructor(statusCode: number, statusText: string, body: string) {
    const status = statusText ? `${statusCode} ${statusText}` : String(statusCode);
    super(`API request failed with status ${status}: ${body}`);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.statusText = statusText;
    this.body = body;
  }
}

export class AllHostsFailedError extends PveToolError {
  public readonly hosts: string[];

  constructor(hosts: string[], cause?: unknown) {
    super(`All hosts failed (${hosts.join(", ") || "no hosts configured"})`, { cause });
    this.name = "AllHostsFailedError";
    this.hosts = hosts;
  }
}

export class VmNotFoundError extends PveToolError {
  public readonly identifier: string;

  constructor(identifier: string) {
    super(`VM '${identifier}' not found in cluster`);
    this.name = "VmNotFoundError";
    this.identifier = identifier;
  }
}

export class TaskFailedError extends PveToolError {
  public readonly task: TaskRef;
  /** Raw exit value reported by the node; undefined when the task stopped without one. */
  public readonly exitStatus: string | undefined;

  constructor(task: TaskRef, exitStatus: string | undefined) {
    super(`Task failed: ${exitStatus ?? "no exit status"}`);
    this.name = "TaskFailedError";
    this.task = task;
    this.exitStatus = exitStatus;
  }
}

export class TaskProtocolError extends PveToolError {
  public readonly task: TaskRef;
  public readonly status: unknown;

  constructor(task: TaskRef, status: unknown) {
    super(`Unknown task status: ${typeof status === "string" ? status : JSON.stringify(status) ?? "undefined"}`);
    this.name = "TaskProtocolError";
    this.task = task;
    this.status = status;
  }
}

export class TaskTimeoutError extends PveToolError {
  public readonly task: TaskRef;
  public readonly timeoutMs: number;

  constructor(task: TaskRef, timeoutMs: number) {
    super(`Task ${task.upid} on node ${task.node} did not finish within ${timeoutMs}ms`);
    this.name = "TaskTimeoutError";
    this.task = task;
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends PveToolError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
