export interface ClusterResource {
  node: string;
  vmid: number;
  name?: string;
  type: string;
  status?: string;
}

export interface VmLocation {
  node: string;
  vmid: number;
}

export interface NodeSummary {
  node: string;
  status: string;
}

export interface VersionInfo {
  version?: string;
  release?: string;
  repoid?: string;
}
