import { describe, expect, it } from "vitest";
import { VmNotFoundError } from "../../errors.js";
import { ResourceResolver } from "../resourceResolver.js";
import { cpuPercent, memoryUsage, splitUptime, VmService } from "../vmService.js";
import { CLUSTER_RESOURCES, FakeTransport } from "./fakeTransport.js";

function setup() {
  const transport = new FakeTransport().reply("GET", "/cluster/resources?type=vm", CLUSTER_RESOURCES);
  return { transport, service: new VmService(transport, new ResourceResolver(transport)) };
}

describe("usage helpers", () => {
  it("scales cpu fractions to percent", () => {
    expect(cpuPercent(0.125)).toBe(12.5);
    expect(cpuPercent(1.5)).toBe(150);
    expect(cpuPercent(undefined)).toBeUndefined();
  });

  it("reports memory in whole MiB", () => {
    expect(memoryUsage(536870912, 2147483648)).toEqual({ usedMb: 512, maxMb: 2048, percent: 25 });
    expect(memoryUsage(1572864, 3145728)).toEqual({ usedMb: 1, maxMb: 3, percent: 50 });
  });

  it("omits memory without a positive maximum", () => {
    expect(memoryUsage(1024, undefined)).toBeUndefined();
    expect(memoryUsage(undefined, 1024)).toBeUndefined();
    expect(memoryUsage(1024, 0)).toBeUndefined();
  });

  it("splits uptime into days, hours and minutes", () => {
    expect(splitUptime(93784)).toEqual({ days: 1, hours: 2, minutes: 3 });
    expect(splitUptime(59)).toEqual({ days: 0, hours: 0, minutes: 0 });
  });
});

describe("VmService", () => {
  it("builds VM info from the current status document", async () => {
    const { transport, service } = setup();
    transport.reply("GET", "/nodes/pve1/qemu/100/status/current", {
      name: "web01",
      status: "running",
      cpu: 0.125,
      mem: 536870912,
      maxmem: 2147483648,
      uptime: 93784
    });

    await expect(service.info("web01")).resolves.toEqual({
      node: "pve1",
      vmid: 100,
      name: "web01",
      status: "running",
      cpuPercent: 12.5,
      memory: { usedMb: 512, maxMb: 2048, percent: 25 }
    });
  });

  it("leaves missing fields out of VM info", async () => {
    const { transport, service } = setup();
    transport.reply("GET", "/nodes/pve2/qemu/205/status/current", { status: "stopped", mem: 0 });

    await expect(service.info("205")).resolves.toEqual({
      node: "pve2",
      vmid: 205,
      name: undefined,
      status: "stopped",
      cpuPercent: undefined,
      memory: undefined
    });
  });

  it("includes uptime only for running VMs", async () => {
    const { transport, service } = setup();
    transport
      .reply("GET", "/nodes/pve1/qemu/100/status/current", { name: "web01", status: "running", uptime: 93784 })
      .reply("GET", "/nodes/pve2/qemu/200/status/current", { name: "100", status: "stopped", uptime: 93784 });

    await expect(service.check("100")).resolves.toEqual({
      node: "pve1",
      vmid: 100,
      name: "web01",
      status: "running",
      uptime: { days: 1, hours: 2, minutes: 3 }
    });
    await expect(service.check("200")).resolves.toMatchObject({ status: "stopped", uptime: undefined });
  });

  it("falls back to placeholder name and status", async () => {
    const { transport, service } = setup();
    transport.reply("GET", "/nodes/pve2/qemu/205/status/current", {});

    await expect(service.check("205")).resolves.toEqual({
      node: "pve2",
      vmid: 205,
      name: "Unknown",
      status: "unknown",
      uptime: undefined
    });
  });

  it("fails for VMs missing from the inventory", async () => {
    const { service } = setup();
    await expect(service.check("ghost")).rejects.toBeInstanceOf(VmNotFoundError);
  });

  it("lists every VM with a node", async () => {
    const { service } = setup();
    const vms = await service.listVms();
    expect(vms.map((vm) => vm.vmid)).toEqual([100, 200, 205, 301]);
    expect(vms[0]).toEqual({ vmid: 100, name: "web01", node: "pve1", status: "running" });
  });

  it("filters by exact node name", async () => {
    const { service } = setup();
    await expect(service.listVms("pve2")).resolves.toEqual([
      { vmid: 200, name: "100", node: "pve2", status: "stopped" },
      { vmid: 205, name: "db01", node: "pve2", status: "running" }
    ]);
    await expect(service.listVms("pve")).resolves.toEqual([]);
  });

  it("returns an empty list for a node without VMs", async () => {
    const { service } = setup();
    await expect(service.listVms("pve3")).resolves.toEqual([]);
  });

  it("defaults a missing status to unknown", async () => {
    const transport = new FakeTransport().reply("GET", "/cluster/resources?type=vm", [
      { node: "pve1", vmid: 900, type: "qemu" }
    ]);
    const service = new VmService(transport, new ResourceResolver(transport));
    await expect(service.listVms()).resolves.toEqual([{ vmid: 900, name: undefined, node: "pve1", status: "unknown" }]);
  });
});
