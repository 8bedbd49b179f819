import { PveToolError } from "../errors.js";
import type { ClusterResource, NodeSummary, VersionInfo } from "../types/cluster.js";
import type { SnapshotDescriptor } from "../types/snapshot.js";
import type { VmStatusDocument } from "../types/vm.js";

// Response bodies arrive as `unknown`; everything below narrows them field by field.

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function optionalCount(value: unknown): number | undefined {
  const n = optionalNumber(value);
  return n !== undefined && Number.isInteger(n) && n >= 0 ? n : undefined;
}

function expectList(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new PveToolError(`Unexpected response for ${what}: expected a list`);
  }
  return value;
}

export function unwrapEnvelope(payload: unknown, what: string): unknown {
  if (!isRecord(payload) || !("data" in payload)) {
    throw new PveToolError(`Unexpected response for ${what}: missing data envelope`);
  }
  return payload.data;
}

/** Entries without a node name or an integer vmid are dropped. */
export function decodeClusterResources(value: unknown): ClusterResource[] {
  const resources: ClusterResource[] = [];
  for (const item of expectList(value, "cluster resources")) {
    if (!isRecord(item)) continue;
    const node = optionalString(item.node);
    const vmid = optionalCount(item.vmid);
    if (node === undefined || vmid === undefined) continue;
    resources.push({
      node,
      vmid,
      name: optionalString(item.name),
      type: optionalString(item.type) ?? "unknown",
      status: optionalString(item.status)
    });
  }
  return resources;
}

export function decodeSnapshots(value: unknown): SnapshotDescriptor[] {
  const snapshots: SnapshotDescriptor[] = [];
  for (const item of expectList(value, "snapshot list")) {
    if (!isRecord(item)) continue;
    const name = optionalString(item.name);
    if (name === undefined) continue;
    snapshots.push({
      name,
      description: optionalString(item.description),
      snaptime: optionalNumber(item.snaptime)
    });
  }
  return snapshots;
}

export interface RawTaskStatus {
  status: unknown;
  exitStatus?: string;
}

export function decodeTaskStatus(value: unknown): RawTaskStatus {
  if (!isRecord(value)) {
    return { status: value };
  }
  return { status: value.status, exitStatus: optionalString(value.exitstatus) };
}

export function decodeTaskHandle(value: unknown, what: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new PveToolError(`Unexpected response for ${what}: expected a task id`);
  }
  return value;
}

export function decodeVmStatus(value: unknown): VmStatusDocument {
  if (!isRecord(value)) return {};
  return {
    name: optionalString(value.name),
    status: optionalString(value.status),
    qmpstatus: optionalString(value.qmpstatus),
    cpu: optionalNumber(value.cpu),
    cpus: optionalNumber(value.cpus),
    mem: optionalCount(value.mem),
    maxmem: optionalCount(value.maxmem),
    uptime: optionalCount(value.uptime)
  };
}

/** Strict: any malformed entry fails the whole list so callers can fall back. */
export function decodeNodes(value: unknown): NodeSummary[] {
  return expectList(value, "node list").map((item) => {
    const node = isRecord(item) ? optionalString(item.node) : undefined;
    const status = isRecord(item) ? optionalString(item.status) : undefined;
    if (node === undefined || status === undefined) {
      throw new PveToolError("Unexpected response for node list: entry without node or status");
    }
    return { node, status };
  });
}

export function decodeClusterStatusNodes(value: unknown): NodeSummary[] {
  const nodes: NodeSummary[] = [];
  for (const item of expectList(value, "cluster status")) {
    if (!isRecord(item) || item.type !== "node") continue;
    const node = optionalString(item.node) ?? optionalString(item.name);
    if (node === undefined) continue;
    nodes.push({ node, status: optionalString(item.status) ?? "unknown" });
  }
  return nodes;
}

export function decodeVersion(value: unknown): VersionInfo {
  if (!isRecord(value)) return {};
  return {
    version: optionalString(value.version),
    release: optionalString(value.release),
    repoid: optionalString(value.repoid)
  };
}
