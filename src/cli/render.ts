import type { NodeSummary, VersionInfo } from "../types/cluster.js";
import type { SnapshotList, SnapshotTaskResult } from "../types/snapshot.js";
import type { VmInfo, VmListEntry, VmStatusCheck } from "../types/vm.js";
import { epochSecondsToUtc } from "../utils/time.js";

export const TASK_COMPLETED = "✓ Task completed successfully";

export function renderSubmitted(result: SnapshotTaskResult): string {
  const { node, vmid } = result.location;
  switch (result.action) {
    case "create":
      return `Creating snapshot '${result.snapname}' on node ${node} for VM ${vmid}...`;
    case "delete":
      return `Deleting snapshot '${result.snapname}' on node ${node} for VM ${vmid}...`;
    case "rollback":
      return `Rolling back VM ${vmid} to snapshot '${result.snapname}' on node ${node}...`;
  }
}

export function renderSnapshotList(list: SnapshotList): string[] {
  const { node, vmid } = list.location;
  return [
    `Snapshots for VM ${vmid} on node ${node}:`,
    ...list.snapshots.map(
      (snap) =>
        `- ${snap.name} [${snap.description ?? "No description"}] (Created: ${epochSecondsToUtc(snap.snaptime) ?? "Unknown"})`
    )
  ];
}

export function renderVmInfo(info: VmInfo): string[] {
  const lines = ["VM Information:", `  Node: ${info.node}`, `  VMID: ${info.vmid}`];
  if (info.name !== undefined) lines.push(`  Name: ${info.name}`);
  if (info.status !== undefined) lines.push(`  Status: ${info.status}`);
  if (info.cpuPercent !== undefined) lines.push(`  CPU Usage: ${info.cpuPercent.toFixed(2)}%`);
  if (info.memory !== undefined) {
    const { usedMb, maxMb, percent } = info.memory;
    lines.push(`  Memory: ${usedMb} MB / ${maxMb} MB (${percent.toFixed(1)}%)`);
  }
  return lines;
}

export function renderVmCheck(check: VmStatusCheck): string[] {
  const lines = [`VM ID: ${check.vmid}`, `Name: ${check.name}`, `Node: ${check.node}`, `Status: ${check.status}`];
  if (check.uptime) {
    const { days, hours, minutes } = check.uptime;
    lines.push(`Uptime: ${days}d ${hours}h ${minutes}m`);
  }
  return lines;
}

function row(vmid: string, name: string, node: string, status: string): string {
  return `${vmid.padEnd(8)} ${name.padEnd(20)} ${node.padEnd(10)} ${status.padEnd(10)}`.trimEnd();
}

export function renderVmTable(vms: VmListEntry[]): string[] {
  if (vms.length === 0) {
    return ["No VMs found"];
  }
  return [
    "VMs in cluster:",
    row("VMID", "Name", "Node", "Status"),
    "-".repeat(50),
    ...vms.map((vm) => row(String(vm.vmid), vm.name ?? "-", vm.node, vm.status))
  ];
}

export function renderNodes(nodes: NodeSummary[]): string[] {
  return ["Cluster nodes:", ...nodes.map((n) => `- ${n.node} (${n.status})`)];
}

export function renderVersion(version: VersionInfo): string[] {
  const lines = ["✓ Connection successful!"];
  if (version.version !== undefined) lines.push(`  Proxmox VE version: ${version.version}`);
  return lines;
}
