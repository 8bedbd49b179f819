import { decodeVmStatus } from "../apiClient/decode.js";
import type { Transport, VmResolver } from "../types/interfaces.js";
import type { VmLocation } from "../types/cluster.js";
import type { MemoryUsage, Uptime, VmInfo, VmListEntry, VmStatusCheck, VmStatusDocument } from "../types/vm.js";
import { vmStatusPath } from "./paths.js";

const MIB = 1_048_576;

/** Usage fraction as a percentage; values above 100 are passed through. */
export function cpuPercent(cpu: number | undefined): number | undefined {
  return cpu === undefined ? undefined : cpu * 100;
}

/** Undefined unless both values are known and the maximum is positive. */
export function memoryUsage(mem: number | undefined, maxmem: number | undefined): MemoryUsage | undefined {
  if (mem === undefined || maxmem === undefined || maxmem <= 0) return undefined;
  return {
    usedMb: Math.floor(mem / MIB),
    maxMb: Math.floor(maxmem / MIB),
    percent: (mem / maxmem) * 100
  };
}

export function splitUptime(seconds: number): Uptime {
  return {
    days: Math.floor(seconds / 86_400),
    hours: Math.floor((seconds % 86_400) / 3_600),
    minutes: Math.floor((seconds % 3_600) / 60)
  };
}

export class VmService {
  constructor(
    private readonly transport: Transport,
    private readonly resolver: VmResolver
  ) {}

  async info(vm: string): Promise<VmInfo> {
    const { location, doc } = await this.currentStatus(vm);
    return {
      ...location,
      name: doc.name,
      status: doc.status,
      cpuPercent: cpuPercent(doc.cpu),
      memory: memoryUsage(doc.mem, doc.maxmem)
    };
  }

  async check(vm: string): Promise<VmStatusCheck> {
    const { location, doc } = await this.currentStatus(vm);
    const status = doc.status ?? "unknown";
    return {
      ...location,
      name: doc.name ?? "Unknown",
      status,
      uptime: status === "running" && doc.uptime !== undefined ? splitUptime(doc.uptime) : undefined
    };
  }

  /** Exact node match when `node` is given; an empty list is a normal result. */
  async listVms(node?: string): Promise<VmListEntry[]> {
    const resources = await this.resolver.listResources();
    return resources
      .filter((r) => node === undefined || r.node === node)
      .map((r) => ({ vmid: r.vmid, name: r.name, node: r.node, status: r.status ?? "unknown" }));
  }

  private async currentStatus(vm: string): Promise<{ location: VmLocation; doc: VmStatusDocument }> {
    const location = await this.resolver.resolve(vm);
    const doc = decodeVmStatus(await this.transport.get(vmStatusPath(location)));
    return { location, doc };
  }
}
