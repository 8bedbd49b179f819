import type { VmLocation } from "./cluster.js";

/**
 * `status/current` document. The API returns many more keys; only the ones
 * the client reports are modeled, each independently optional.
 */
export interface VmStatusDocument {
  name?: string;
  status?: string;
  qmpstatus?: string;
  cpu?: number;
  cpus?: number;
  mem?: number;
  maxmem?: number;
  uptime?: number;
}

export interface MemoryUsage {
  usedMb: number;
  maxMb: number;
  percent: number;
}

export interface Uptime {
  days: number;
  hours: number;
  minutes: number;
}

export interface VmInfo extends VmLocation {
  name?: string;
  status?: string;
  cpuPercent?: number;
  memory?: MemoryUsage;
}

export interface VmStatusCheck extends VmLocation {
  name: string;
  status: string;
  uptime?: Uptime;
}

export interface VmListEntry {
  vmid: number;
  name?: string;
  node: string;
  status: string;
}
