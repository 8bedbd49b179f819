import { describe, expect, it, vi } from "vitest";
import { TaskFailedError, TaskProtocolError, TaskTimeoutError } from "../../errors.js";
import type { TaskRef } from "../../types/task.js";
import { TaskPoller, type Sleep } from "../taskWaiter.js";
import { FakeTransport } from "./fakeTransport.js";

const task: TaskRef = { node: "pve2", upid: "UPID:pve2:0001:qmsnapshot:205:root@pam:" };
const STATUS_PATH = "/nodes/pve2/tasks/UPID%3Apve2%3A0001%3Aqmsnapshot%3A205%3Aroot%40pam%3A/status";

const running = { status: "running" };
const stoppedOk = { status: "stopped", exitstatus: "OK" };

function setup(...replies: unknown[]) {
  const transport = new FakeTransport().reply("GET", STATUS_PATH, ...replies);
  const sleeps: number[] = [];
  const sleep: Sleep = async (ms) => {
    sleeps.push(ms);
  };
  return { transport, sleeps, poller: new TaskPoller(transport, { sleep }) };
}

describe("TaskPoller", () => {
  it("succeeds once the task stops with exit status OK", async () => {
    const { poller, transport, sleeps } = setup(running, stoppedOk);
    await expect(poller.wait(task)).resolves.toEqual({ state: "stopped", exitStatus: "OK" });
    expect(transport.callsTo("GET", STATUS_PATH)).toHaveLength(2);
    expect(sleeps).toEqual([2000]);
  });

  it("reports progress for every running poll", async () => {
    const { poller } = setup(running, running, running, stoppedOk);
    const onProgress = vi.fn();
    await poller.wait(task, { onProgress });
    expect(onProgress).toHaveBeenCalledTimes(3);
    expect(onProgress).toHaveBeenCalledWith({ state: "running" });
  });

  it("fails with the literal exit text when the task errors", async () => {
    const { poller, transport } = setup(running, running, { status: "stopped", exitstatus: "job errored" });
    const err = await poller.wait(task).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TaskFailedError);
    expect(err).toMatchObject({ exitStatus: "job errored", message: "Task failed: job errored", task });
    expect(transport.calls).toHaveLength(3);
  });

  it("treats a stopped task without exit status as failed", async () => {
    const { poller } = setup({ status: "stopped" });
    await expect(poller.wait(task)).rejects.toThrow("Task failed: no exit status");
  });

  it("treats exit statuses other than OK as failures", async () => {
    const { poller } = setup({ status: "stopped", exitstatus: "WARNINGS: 1" });
    await expect(poller.wait(task)).rejects.toMatchObject({ name: "TaskFailedError", exitStatus: "WARNINGS: 1" });
  });

  it("raises a protocol error for unknown task states", async () => {
    const { poller } = setup(running, { status: "queued" });
    const err = await poller.wait(task).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TaskProtocolError);
    expect(err).toMatchObject({ message: "Unknown task status: queued", status: "queued" });
  });

  it("raises a protocol error when the status document has no status", async () => {
    const { poller } = setup({ exitstatus: "OK" });
    await expect(poller.wait(task)).rejects.toBeInstanceOf(TaskProtocolError);
  });

  it("uses the configured poll interval", async () => {
    const transport = new FakeTransport().reply("GET", STATUS_PATH, running, running, stoppedOk);
    const sleeps: number[] = [];
    const poller = new TaskPoller(transport, {
      intervalMs: 500,
      sleep: async (ms) => {
        sleeps.push(ms);
      }
    });
    await poller.wait(task);
    transport.reply("GET", STATUS_PATH, running, stoppedOk);
    await poller.wait(task, { intervalMs: 50 });
    expect(sleeps).toEqual([500, 500, 50]);
  });

  it("gives up after the deadline", async () => {
    const transport = new FakeTransport().reply("GET", STATUS_PATH, running);
    let clock = 0;
    const poller = new TaskPoller(transport, {
      timeoutMs: 5_000,
      now: () => clock,
      sleep: async (ms) => {
        clock += ms;
      }
    });
    const err = await poller.wait(task).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TaskTimeoutError);
    expect(err).toMatchObject({ timeoutMs: 5_000 });
    // Polls at t=0, 2000, 4000 and 6000; the last one is past the deadline.
    expect(transport.calls).toHaveLength(4);
  });

  it("waits indefinitely when no deadline is set", async () => {
    const replies = [...Array.from({ length: 50 }, () => running), stoppedOk];
    const { poller, transport } = setup(...replies);
    await expect(poller.wait(task)).resolves.toEqual({ state: "stopped", exitStatus: "OK" });
    expect(transport.calls).toHaveLength(51);
  });

  it("stops waiting when the signal aborts during a sleep", async () => {
    const controller = new AbortController();
    const reason = new Error("Interrupted while waiting for task");
    const transport = new FakeTransport().reply("GET", STATUS_PATH, running);
    const poller = new TaskPoller(transport, {
      sleep: async (_ms, signal) => {
        controller.abort(reason);
        signal?.throwIfAborted();
      }
    });
    await expect(poller.wait(task, { signal: controller.signal })).rejects.toBe(reason);
    expect(transport.calls).toHaveLength(1);
  });

  it("does not poll with an already aborted signal", async () => {
    const { poller, transport } = setup(stoppedOk);
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));
    await expect(poller.wait(task, { signal: controller.signal })).rejects.toThrow("cancelled");
    expect(transport.calls).toHaveLength(0);
  });

  it("sleeps with timers by default", async () => {
    const transport = new FakeTransport().reply("GET", STATUS_PATH, running, stoppedOk);
    const poller = new TaskPoller(transport, { intervalMs: 1 });
    await expect(poller.wait(task)).resolves.toEqual({ state: "stopped", exitStatus: "OK" });
  });

  it("propagates transport errors from a poll", async () => {
    const transport = new FakeTransport().fail("GET", STATUS_PATH, new Error("socket hang up"));
    const poller = new TaskPoller(transport);
    await expect(poller.wait(task)).rejects.toThrow("socket hang up");
  });
});
